import assert from 'node:assert/strict';
import test from 'node:test';

import type { ErrorObject } from 'ajv';

import { ContentValidationError, StructuralValidationError } from '../lib/errors.js';
import { resolveRelationships } from '../lib/hierarchy/relationship_resolver.js';
import { DataContainer } from '../lib/records/record_store.js';
import { formatAjvErrors } from '../lib/validation/ajv.js';
import {
  buildContentSchema,
  hierarchicalDocumentSchema
} from '../lib/validation/document_schemas.js';
import {
  AjvValidationGate,
  assertContent,
  assertStructure
} from '../lib/validation/validation_gate.js';
import {
  ValidatorRegistry,
  type CrossCategoryValidator,
  type SingleCategoryValidator
} from '../lib/validation/validator_registry.js';
import { SAMPLE_RECORDS, loadSampleRules } from './test_support.js';

const rules = loadSampleRules();
const contentSchema = buildContentSchema(rules);

const asymIds: SingleCategoryValidator = {
  kind: 'single-category',
  name: 'asym-ids',
  category: 'struct_asym',
  validate: (category) =>
    category
      .values('id')
      .flatMap((id, index) => (id === '?' ? [`row ${index + 1} has no id`] : []))
};

const polyEntities: CrossCategoryValidator = {
  kind: 'cross-category',
  name: 'poly-entities',
  categories: ['entity_poly', 'entity'],
  validate: (poly, entity) => {
    const known = new Set(entity.values('id'));
    return poly
      .values('entity_id')
      .filter((id) => !known.has(id))
      .map((id) => `entity '${id}' is not defined`);
  }
};

test('the structural schema accepts resolver output', () => {
  const document = resolveRelationships(DataContainer.fromFlatRecords(SAMPLE_RECORDS), rules, {
    mode: 'strict'
  });
  const gate = new AjvValidationGate();

  assert.deepEqual(gate.validate(document, hierarchicalDocumentSchema), { valid: true, errors: [] });
  assert.deepEqual(gate.validate(document, contentSchema), { valid: true, errors: [] });
});

test('assertStructure rejects blocks holding bare item keys', () => {
  assert.throws(
    () => assertStructure(new AjvValidationGate(), { T: { entity: [] } }, hierarchicalDocumentSchema),
    (error: unknown) =>
      error instanceof StructuralValidationError &&
      error.message === 'Hierarchical input failed structural validation with 1 error(s)' &&
      error.issues[0] === "/T: unexpected property 'entity'"
  );
});

test('the structural schema requires at least one data block', () => {
  const report = new AjvValidationGate().validate({}, hierarchicalDocumentSchema);

  assert.deepEqual(report, {
    valid: false,
    errors: ['/: must NOT have fewer than 1 properties']
  });
});

test('enumerations of u-typed items ignore case', () => {
  const gate = new AjvValidationGate();

  assert.equal(
    gate.validate({ T: { _entity: [{ id: '1', type: 'POLYMER' }] } }, contentSchema).valid,
    true
  );

  const report = gate.validate({ T: { _entity: [{ id: '1', type: 'protein' }] } }, contentSchema);
  assert.equal(report.valid, false);
  assert.ok(
    report.errors.includes(
      '/T/_entity/0/type: must be equal to one of the allowed values (polymer, POLYMER, non-polymer, NON-POLYMER, water, WATER)'
    )
  );
});

test('numeric items accept numbers, numeric text with uncertainty and null tokens', () => {
  const gate = new AjvValidationGate();
  const document = (value: unknown) => ({ T: { _entity: [{ id: '1', formula_weight: value }] } });

  for (const value of [18.015, '18.015', '12.5(3)', '-1e3', '?', '.']) {
    assert.equal(gate.validate(document(value), contentSchema).valid, true, String(value));
  }

  const report = gate.validate(document('heavy'), contentSchema);
  assert.ok(
    report.errors.some((error) =>
      error.startsWith('/T/_entity/0/formula_weight: must match pattern')
    )
  );
});

test('mandatory items are required unless the parent supplies them', () => {
  const gate = new AjvValidationGate();

  const missingId = gate.validate({ T: { _entity: [{ type: 'water' }] } }, contentSchema);
  assert.ok(missingId.errors.includes("/T/_entity/0: must have required property 'id'"));

  const nested = gate.validate(
    { T: { _entity: [{ id: '1', _entity_poly: { type: 'polypeptide(L)' } }] } },
    contentSchema
  );
  assert.deepEqual(nested, { valid: true, errors: [] });
});

test('ValidatorRegistry prefixes issues with block and validator names', () => {
  const registry = new ValidatorRegistry().register(asymIds).register(polyEntities);
  const container = DataContainer.fromFlatRecords({
    TEST: {
      entity: [{ id: '1' }],
      entity_poly: [{ entity_id: '1' }, { entity_id: '4' }],
      struct_asym: [{ id: 'A' }, { id: '?' }]
    },
    OTHER: { exptl: [{ method: 'X' }] }
  });

  assert.equal(registry.size, 2);
  assert.deepEqual(registry.run(container), [
    'TEST/asym-ids: row 2 has no id',
    "TEST/poly-entities: entity '4' is not defined"
  ]);
});

test('ValidatorRegistry refuses a second validator with the same name', () => {
  const registry = new ValidatorRegistry().register(asymIds);

  assert.throws(() => registry.register({ ...asymIds }), /Validator 'asym-ids' is already registered/);
});

test('assertContent reports registry issues with schema errors', () => {
  const container = DataContainer.fromFlatRecords({
    TEST: { entity: [{ id: '1' }], struct_asym: [{ id: '?', entity_id: '1' }] }
  });
  const document = resolveRelationships(container, rules, { mode: 'strict' });

  assert.throws(
    () =>
      assertContent(
        new AjvValidationGate(),
        document,
        contentSchema,
        container,
        new ValidatorRegistry().register(asymIds)
      ),
    (error: unknown) =>
      error instanceof ContentValidationError &&
      error.message === 'Converted document failed content validation with 1 error(s)' &&
      error.issues[0] === 'TEST/asym-ids: row 1 has no id'
  );
  assert.doesNotThrow(() =>
    assertContent(new AjvValidationGate(), document, contentSchema, container, null)
  );
});

test('formatAjvErrors names the location and allowed values', () => {
  const errors: ErrorObject[] = [
    {
      keyword: 'enum',
      instancePath: '',
      schemaPath: '#/enum',
      params: { allowedValues: ['a', 'b'] },
      message: 'must be equal to one of the allowed values'
    },
    {
      keyword: 'additionalProperties',
      instancePath: '/rows/0',
      schemaPath: '#/additionalProperties',
      params: { additionalProperty: 'extra' },
      message: 'must NOT have additional properties'
    },
    {
      keyword: 'type',
      instancePath: '/rows',
      schemaPath: '#/type',
      params: { type: 'array' },
      message: 'must be array'
    }
  ];

  assert.deepEqual(formatAjvErrors(errors), [
    '/: must be equal to one of the allowed values (a, b)',
    "/rows/0: unexpected property 'extra'",
    '/rows: must be array'
  ]);
  assert.deepEqual(formatAjvErrors(null), []);
});

import assert from 'node:assert/strict';
import test from 'node:test';

import { CacheManager } from '../lib/cache_manager.js';
import type { ConversionConfig } from '../lib/config.js';
import { FlatnestConverter } from '../lib/converter.js';
import {
  ContentValidationError,
  RelationshipResolutionError,
  StructuralValidationError
} from '../lib/errors.js';
import type { ConversionMode } from '../lib/hierarchy/document.js';
import { silentLogger } from '../lib/logger.js';
import { parseFlatRecords } from '../lib/records/flat_records.js';
import type { ValidationGate } from '../lib/validation/validation_gate.js';
import { ValidatorRegistry } from '../lib/validation/validator_registry.js';
import { fixturePath } from './test_fs.js';
import { SAMPLE_RECORDS, canonicalRecords } from './test_support.js';

function configFor(mode: ConversionMode, withSchema = false): ConversionConfig {
  return {
    dictionaryPath: fixturePath('sample.dic'),
    schemaPath: withSchema ? fixturePath('sample.xsd') : null,
    cacheDir: null,
    mode,
    logMode: 'quiet'
  };
}

async function createConverter(mode: ConversionMode, withSchema = false) {
  return FlatnestConverter.create({ config: configFor(mode, withSchema), logger: silentLogger });
}

test('nests the entity example and flattens it back', async () => {
  const converter = await createConverter('strict');
  const json = converter.toJson(
    parseFlatRecords({
      EX: {
        entity: [{ id: '1', type: 'polymer' }],
        entity_poly: [{ entity_id: '1', type: 'polypeptide(L)' }]
      }
    })
  );

  assert.deepEqual(JSON.parse(json), {
    EX: {
      _entity: [{ id: '1', type: 'polymer', _entity_poly: { type: 'polypeptide(L)' } }]
    }
  });
  assert.deepEqual(converter.fromJson(json).toFlatRecords(), {
    EX: {
      entity: [{ id: '1', type: 'polymer' }],
      entity_poly: [{ entity_id: '1', type: 'polypeptide(L)' }]
    }
  });
  converter.dispose();
});

test('JSON and XML round trips keep every record', async () => {
  const converter = await createConverter('strict', true);
  const container = parseFlatRecords(SAMPLE_RECORDS);

  assert.deepEqual(
    canonicalRecords(converter.fromJson(converter.toJson(container)).toFlatRecords()),
    canonicalRecords(SAMPLE_RECORDS)
  );
  assert.deepEqual(
    canonicalRecords(converter.fromXml(converter.toXml(container)).toFlatRecords()),
    canonicalRecords(SAMPLE_RECORDS)
  );
  converter.dispose();
});

test('strict mode checks dictionary content, permissive mode does not', async () => {
  const records = { EX: { entity: [{ id: '1', type: 'protein' }] } };

  const strict = await createConverter('strict');
  assert.throws(
    () => strict.toJson(parseFlatRecords(records)),
    (error: unknown) =>
      error instanceof ContentValidationError &&
      error.issues.includes(
        '/EX/_entity/0/type: must be equal to one of the allowed values (polymer, POLYMER, non-polymer, NON-POLYMER, water, WATER)'
      )
  );

  const permissive = await createConverter('permissive');
  assert.deepEqual(JSON.parse(permissive.toJson(parseFlatRecords(records))), {
    EX: { _entity: [{ id: '1', type: 'protein' }] }
  });
});

test('orphaned records fail strict conversion only', async () => {
  const records = { EX: { entity: [{ id: '1' }], struct_asym: [{ id: 'A', entity_id: '2' }] } };

  const strict = await createConverter('strict');
  assert.throws(() => strict.toJson(parseFlatRecords(records)), RelationshipResolutionError);

  const permissive = await createConverter('permissive');
  const flat = permissive.fromJson(permissive.toJson(parseFlatRecords(records))).toFlatRecords();
  assert.deepEqual(canonicalRecords(flat), canonicalRecords(records));
});

test('strict mode rejects malformed documents before flattening', async () => {
  const document = JSON.stringify({ EX: { entity: [{ id: '1' }] } });

  const strict = await createConverter('strict');
  assert.throws(
    () => strict.fromJson(document),
    (error: unknown) =>
      error instanceof StructuralValidationError &&
      error.message === 'Hierarchical input failed structural validation with 1 error(s)'
  );

  const permissive = await createConverter('permissive');
  assert.throws(
    () => permissive.fromJson(document),
    (error: unknown) =>
      error instanceof StructuralValidationError &&
      error.issues[0] === "EX: 'entity' is not a category key"
  );
});

test('registered validators and custom gates take part in strict conversion', async () => {
  const schemas: unknown[] = [];
  const gate: ValidationGate = {
    validate: (_document, schema) => {
      schemas.push(schema);
      return { valid: true, errors: [] };
    }
  };
  const validators = new ValidatorRegistry().register({
    kind: 'single-category',
    name: 'no-water',
    category: 'entity',
    validate: (category) =>
      category.values('type').includes('water') ? ['water is not allowed here'] : []
  });
  const converter = await FlatnestConverter.create({
    config: configFor('strict'),
    logger: silentLogger,
    gate,
    validators
  });

  assert.throws(
    () => converter.toJson(parseFlatRecords({ EX: { entity: [{ id: '1', type: 'water' }] } })),
    (error: unknown) =>
      error instanceof ContentValidationError &&
      error.issues.length === 1 &&
      error.issues[0] === 'EX/no-water: water is not allowed here'
  );
  assert.equal(schemas.length, 1);
});

test('dispose clears an owned cache and leaves a shared one alone', async () => {
  const shared = new CacheManager({ cacheDir: null });
  const converter = await FlatnestConverter.create({
    config: configFor('strict'),
    logger: silentLogger,
    cache: shared
  });
  converter.dispose();
  assert.equal(shared.metadata.size, 1);
  assert.equal(shared.mappings.size, 1);

  const again = await FlatnestConverter.create({
    config: configFor('strict'),
    logger: silentLogger,
    cache: shared
  });
  assert.equal(again.rules, converter.rules);
  assert.equal(shared.stats.memoryHits, 1);
});

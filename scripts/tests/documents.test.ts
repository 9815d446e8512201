import assert from 'node:assert/strict';
import test from 'node:test';

import { StructuralValidationError } from '../lib/errors.js';
import type { HierarchicalDocument } from '../lib/hierarchy/document.js';
import { flattenDocument } from '../lib/hierarchy/flattener.js';
import { parseJsonDocument, serializeJsonDocument } from '../lib/hierarchy/json_document.js';
import { resolveRelationships } from '../lib/hierarchy/relationship_resolver.js';
import { parseXmlDocument, serializeXmlDocument } from '../lib/hierarchy/xml_document.js';
import { DataContainer } from '../lib/records/record_store.js';
import { SAMPLE_RECORDS, loadSampleRules } from './test_support.js';

const rules = loadSampleRules();

function sampleDocument(): HierarchicalDocument {
  return resolveRelationships(DataContainer.fromFlatRecords(SAMPLE_RECORDS), rules, {
    mode: 'strict'
  });
}

test('JSON output writes numeric items as numbers', () => {
  const text = serializeJsonDocument(
    { T: { _entity: [{ id: '1', formula_weight: '2.5' }] } },
    rules
  );

  assert.equal(
    text,
    [
      '{',
      '  "T": {',
      '    "_entity": [',
      '      {',
      '        "id": "1",',
      '        "formula_weight": 2.5',
      '      }',
      '    ]',
      '  }',
      '}',
      ''
    ].join('\n')
  );
});

test('JSON output keeps numeric text whose number form would differ', () => {
  const text = serializeJsonDocument(
    {
      T: {
        _entity: [
          {
            id: '1',
            formula_weight: '1.50',
            _entity_poly: { _entity_poly_seq: [{ num: '10' }, { num: '?' }, { num: '007' }] }
          }
        ]
      }
    },
    rules
  );

  assert.deepEqual(JSON.parse(text), {
    T: {
      _entity: [
        {
          id: '1',
          formula_weight: '1.50',
          _entity_poly: { _entity_poly_seq: [{ num: 10 }, { num: '?' }, { num: '007' }] }
        }
      ]
    }
  });
});

test('JSON text flattens back to the original values', () => {
  const document = parseJsonDocument(serializeJsonDocument(sampleDocument(), rules));
  const entity = flattenDocument(document, rules).getBlock('TEST')?.getCategory('entity');

  assert.deepEqual(entity?.values('formula_weight'), ['1234.5', '18.015']);
});

test('parseJsonDocument reports malformed input as a structural error', () => {
  assert.throws(
    () => parseJsonDocument('{"T": '),
    (error: unknown) =>
      error instanceof StructuralValidationError &&
      error.message === 'Hierarchical input is not valid JSON' &&
      error.issues.length === 1
  );
});

test('XML output reads back to the same document', () => {
  const document = sampleDocument();
  const xml = serializeXmlDocument(document, rules);

  assert.ok(xml.startsWith('<?xml version="1.0" encoding="UTF-8"?>\n<datablock datablockName="TEST">'));
  assert.deepEqual(parseXmlDocument(xml, rules), document);
});

test('XML output follows schema item locations and escapes markup', () => {
  const schemaRules = loadSampleRules(true);
  const document: HierarchicalDocument = {
    T: {
      _entity: [{ id: '1', pdbx_description: 'A & B <x>', formula_weight: '18.015' }],
      _exptl: [{ entry_id: 'T', method: 'X-RAY "DIFFRACTION"' }]
    }
  };
  const xml = serializeXmlDocument(document, schemaRules);

  assert.ok(xml.includes('<formula_weight>18.015</formula_weight>'));
  assert.deepEqual(parseXmlDocument(xml, schemaRules), document);
});

test('parseXmlDocument groups rows by relation multiplicity', () => {
  const xml = `<?xml version="1.0" encoding="UTF-8"?>
<datablock datablockName="TEST">
  <category name="entity">
    <entity id="1" type="polymer">
      <pdbx_description>Test protein</pdbx_description>
      <category name="entity_poly">
        <entity_poly type="polypeptide(L)">
          <category name="entity_poly_seq">
            <entity_poly_seq num="1" mon_id="MET"/>
          </category>
        </entity_poly>
      </category>
    </entity>
  </category>
</datablock>`;

  assert.deepEqual(parseXmlDocument(xml, rules), {
    TEST: {
      _entity: [
        {
          id: '1',
          type: 'polymer',
          pdbx_description: 'Test protein',
          _entity_poly: {
            type: 'polypeptide(L)',
            _entity_poly_seq: [{ num: '1', mon_id: 'MET' }]
          }
        }
      ]
    }
  });
});

test('parseXmlDocument rejects documents without a named data block', () => {
  assert.throws(
    () => parseXmlDocument('<other/>', rules),
    /XML input must have a single <datablock> root element/
  );
  assert.throws(
    () => parseXmlDocument('<datablock><category name="entity"/></datablock>', rules),
    /<datablock> element has no datablockName attribute/
  );
});

test('parseXmlDocument collects layout problems', () => {
  assert.throws(
    () =>
      parseXmlDocument(
        '<datablock datablockName="T"><category><entity id="1"/></category>' +
          '<category name="entity"><entry id="1"/></category></datablock>',
        rules
      ),
    (error: unknown) =>
      error instanceof StructuralValidationError &&
      error.message === 'XML document has 2 structural problem(s)' &&
      error.issues.join('\n') ===
        'T: <category> element without a name attribute\nT/entity: unexpected element <entry>'
  );
});

test('serializeXmlDocument requires exactly one data block', () => {
  assert.throws(
    () => serializeXmlDocument({ A: {}, B: {} }, rules),
    /An XML document holds exactly one data block, got 2/
  );
});

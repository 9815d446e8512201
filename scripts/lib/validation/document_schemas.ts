import type { SchemaObject } from 'ajv';

import type { ItemMapping, MappingRules } from '../mapping/types.js';
import { INAPPLICABLE_VALUE, UNKNOWN_VALUE } from '../records/null_values.js';

export const NUMERIC_TEXT_PATTERN = '^[+-]?(\\d+\\.?\\d*|\\.\\d+)([eE][+-]?\\d+)?(\\(\\d+\\))?$';

const nullToken = { enum: [UNKNOWN_VALUE, INAPPLICABLE_VALUE, ''] };

/** Shape every hierarchical document has, whatever the dictionary. */
export const hierarchicalDocumentSchema: SchemaObject = {
  $id: 'flatnest:hierarchical-document',
  type: 'object',
  minProperties: 1,
  additionalProperties: { $ref: '#/definitions/block' },
  definitions: {
    scalar: { type: ['string', 'number', 'boolean', 'null'] },
    row: {
      type: 'object',
      patternProperties: {
        '^_.+$': { $ref: '#/definitions/group' },
        '^[^_]': { $ref: '#/definitions/scalar' }
      },
      additionalProperties: false
    },
    group: {
      oneOf: [{ $ref: '#/definitions/row' }, { type: 'array', items: { $ref: '#/definitions/row' } }]
    },
    block: {
      type: 'object',
      patternProperties: { '^_.+$': { $ref: '#/definitions/group' } },
      additionalProperties: false
    }
  }
};

function caseVariants(values: readonly string[]): string[] {
  return Array.from(
    new Set(values.flatMap((value) => [value, value.toLowerCase(), value.toUpperCase()]))
  );
}

function itemSchema(item: ItemMapping): SchemaObject {
  if (item.enumeration.length > 0) {
    // u-prefixed type codes (ucode, uchar3, ...) compare case-insensitively
    const values = item.typeCode?.toLowerCase().startsWith('u')
      ? caseVariants(item.enumeration)
      : [...item.enumeration];
    return { anyOf: [{ enum: values }, nullToken] };
  }
  if (item.numeric) {
    return {
      anyOf: [{ type: 'number' }, { type: 'string', pattern: NUMERIC_TEXT_PATTERN }, nullToken]
    };
  }
  return { type: ['string', 'number', 'boolean', 'null'] };
}

/**
 * Schema of dictionary content rules: enumerations, numeric items and
 * mandatory items, for rows at any nesting depth.
 */
export function buildContentSchema(rules: MappingRules): SchemaObject {
  const definitionNames = new Map<string, string>();
  Array.from(rules.categories.keys()).forEach((name, index) => {
    definitionNames.set(name, `category${index}`);
  });

  const groupOf = (category: string): SchemaObject => {
    const ref = { $ref: `#/definitions/${definitionNames.get(category) ?? ''}` };
    return { oneOf: [ref, { type: 'array', items: ref }] };
  };

  const definitions: Record<string, SchemaObject> = {};
  for (const category of rules.categories.values()) {
    const properties: Record<string, SchemaObject> = {};
    const required: string[] = [];

    for (const item of category.items.values()) {
      properties[item.name] = itemSchema(item);
      // linked items are dropped from nested rows and restored on flattening
      if (item.mandatory && !rules.fkMap.linkFor(category.name, item.name)) {
        required.push(item.name);
      }
    }
    for (const child of rules.fkMap.childCategories(category.name)) {
      properties[`_${child}`] = groupOf(child);
    }

    const definitionName = definitionNames.get(category.name);
    if (definitionName) {
      definitions[definitionName] = {
        type: 'object',
        properties,
        ...(required.length > 0 ? { required } : {})
      };
    }
  }

  const blockProperties: Record<string, SchemaObject> = {};
  for (const name of rules.categories.keys()) {
    blockProperties[`_${name}`] = groupOf(name);
  }

  return {
    type: 'object',
    additionalProperties: { type: 'object', properties: blockProperties },
    definitions
  };
}

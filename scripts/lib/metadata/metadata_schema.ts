import { createAjv } from '../validation/ajv.js';
import type { SourceMetadata } from './types.js';

const nullableString = { type: ['string', 'null'] };
const stringList = { type: 'array', items: { type: 'string' } };

const linkSchema = {
  type: 'object',
  required: ['childCategory', 'childItem', 'parentCategory', 'parentItem', 'linkGroupId'],
  properties: {
    childCategory: { type: 'string' },
    childItem: { type: 'string' },
    parentCategory: { type: 'string' },
    parentItem: { type: 'string' },
    linkGroupId: nullableString
  }
};

const dictionarySchema = {
  type: 'object',
  required: ['title', 'version', 'categories', 'items', 'itemTypes', 'links', 'groupedLinks'],
  properties: {
    title: nullableString,
    version: nullableString,
    categories: {
      type: 'object',
      additionalProperties: {
        type: 'object',
        required: ['id', 'description', 'mandatory', 'keys', 'multiplicity'],
        properties: {
          id: { type: 'string' },
          description: nullableString,
          mandatory: { type: 'boolean' },
          keys: stringList,
          multiplicity: { enum: ['single', 'multiple', null] }
        }
      }
    },
    items: {
      type: 'object',
      additionalProperties: {
        type: 'object',
        required: [
          'name',
          'category',
          'item',
          'typeCode',
          'mandatory',
          'enumeration',
          'description'
        ],
        properties: {
          name: { type: 'string' },
          category: { type: 'string' },
          item: { type: 'string' },
          typeCode: nullableString,
          mandatory: { type: 'boolean' },
          enumeration: stringList,
          description: nullableString
        }
      }
    },
    itemTypes: {
      type: 'object',
      additionalProperties: {
        type: 'object',
        required: ['code', 'primitiveCode'],
        properties: { code: { type: 'string' }, primitiveCode: nullableString }
      }
    },
    links: { type: 'array', items: linkSchema },
    groupedLinks: { type: 'array', items: linkSchema }
  }
};

const schemaMetadataSchema = {
  type: 'object',
  required: ['targetNamespace', 'complexTypes'],
  properties: {
    targetNamespace: nullableString,
    complexTypes: {
      type: 'object',
      additionalProperties: {
        type: 'array',
        items: {
          type: 'object',
          required: ['name', 'type', 'kind', 'required'],
          properties: {
            name: { type: 'string' },
            type: nullableString,
            kind: { enum: ['attribute', 'element'] },
            required: { type: 'boolean' }
          }
        }
      }
    }
  }
};

const sourceMetadataSchema = {
  oneOf: [
    {
      type: 'object',
      required: ['kind', 'dictionary'],
      properties: { kind: { const: 'dictionary' }, dictionary: dictionarySchema }
    },
    {
      type: 'object',
      required: ['kind', 'schema'],
      properties: { kind: { const: 'schema' }, schema: schemaMetadataSchema }
    }
  ]
};

const validateSourceMetadata = createAjv().compile<SourceMetadata>(sourceMetadataSchema);

/** Checks a persisted cache value; `null` when it is not metadata. */
export function decodeSourceMetadata(raw: unknown): SourceMetadata | null {
  return validateSourceMetadata(raw) ? raw : null;
}

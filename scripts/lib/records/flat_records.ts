import { StructuralValidationError } from '../errors.js';
import { createAjv, formatAjvErrors } from '../validation/ajv.js';
import { UNKNOWN_VALUE } from './null_values.js';
import { DataContainer, type FlatRecords } from './record_store.js';

type FlatScalar = string | number | boolean | null;
type FlatRecordsInput = Record<string, Record<string, Array<Record<string, FlatScalar>>>>;

const flatRecordsSchema = {
  type: 'object',
  additionalProperties: {
    type: 'object',
    additionalProperties: {
      type: 'array',
      items: {
        type: 'object',
        additionalProperties: { type: ['string', 'number', 'boolean', 'null'] }
      }
    }
  }
};

const validateFlatRecords = createAjv().compile<FlatRecordsInput>(flatRecordsSchema);

/** Container for `{ block: { category: rows } }` input; numbers and booleans become text, `null` the unknown token. */
export function parseFlatRecords(raw: unknown): DataContainer {
  if (!validateFlatRecords(raw)) {
    const errors = formatAjvErrors(validateFlatRecords.errors);
    throw new StructuralValidationError(
      `Flat records input has ${errors.length} structural problem(s)`,
      errors
    );
  }

  const records: FlatRecords = {};
  for (const [blockName, categories] of Object.entries(raw)) {
    records[blockName] = {};
    for (const [category, rows] of Object.entries(categories)) {
      records[blockName][category] = rows.map((row) => {
        const text: Record<string, string> = {};
        for (const [item, value] of Object.entries(row)) {
          text[item] = value === null ? UNKNOWN_VALUE : String(value);
        }
        return text;
      });
    }
  }

  return DataContainer.fromFlatRecords(records);
}

import { StructuralValidationError } from '../errors.js';
import type { MappingRules } from '../mapping/types.js';
import {
  parseCategoryKey,
  type DocumentGroup,
  type DocumentRow,
  type HierarchicalDocument
} from './document.js';

type JsonValue = string | number | JsonRow | JsonRow[];
type JsonRow = { [key: string]: JsonValue };

/** Number for values whose canonical literal is the value itself, so text survives a reparse. */
function numericLiteral(value: string): number | null {
  const parsed = Number(value);
  return value.trim() !== '' && Number.isFinite(parsed) && String(parsed) === value ? parsed : null;
}

function encodeRow(row: DocumentRow, category: string, rules: MappingRules): JsonRow {
  const items = rules.categories.get(category)?.items;
  const result: JsonRow = {};

  for (const [key, value] of Object.entries(row)) {
    if (typeof value === 'string') {
      const numeric = items?.get(key)?.numeric ? numericLiteral(value) : null;
      result[key] = numeric ?? value;
      continue;
    }
    const child = parseCategoryKey(key);
    result[key] = encodeGroup(value, child ?? key, rules);
  }

  return result;
}

function encodeGroup(group: DocumentGroup, category: string, rules: MappingRules): JsonRow | JsonRow[] {
  return Array.isArray(group)
    ? group.map((row) => encodeRow(row, category, rules))
    : encodeRow(group, category, rules);
}

/**
 * JSON text for a hierarchical document. Numeric items are written as JSON
 * numbers when that does not change their text; everything else stays a string.
 */
export function serializeJsonDocument(
  document: HierarchicalDocument,
  rules: MappingRules
): string {
  const output: Record<string, Record<string, JsonRow | JsonRow[]>> = {};
  for (const [blockName, block] of Object.entries(document)) {
    const encoded: Record<string, JsonRow | JsonRow[]> = {};
    for (const [key, group] of Object.entries(block)) {
      encoded[key] = encodeGroup(group, parseCategoryKey(key) ?? key, rules);
    }
    output[blockName] = encoded;
  }
  return `${JSON.stringify(output, null, 2)}\n`;
}

export function parseJsonDocument(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch (error) {
    throw new StructuralValidationError('Hierarchical input is not valid JSON', [
      error instanceof Error ? error.message : String(error)
    ]);
  }
}

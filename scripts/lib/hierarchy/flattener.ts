import { StructuralValidationError } from '../errors.js';
import type { ParentRelation } from '../mapping/fk_map.js';
import type { MappingRules } from '../mapping/types.js';
import { UNKNOWN_VALUE } from '../records/null_values.js';
import { Category, DataBlock, DataContainer, type Row } from '../records/record_store.js';
import { isPlainObject, parseCategoryKey } from './document.js';

interface ParentContext {
  category: string;
  relation: ParentRelation;
  values: Row;
}

function scalarText(value: unknown): string | null {
  if (value === null) {
    return UNKNOWN_VALUE;
  }
  if (typeof value === 'string') {
    return value;
  }
  if (typeof value === 'number' || typeof value === 'boolean') {
    return String(value);
  }
  return null;
}

function asRowList(value: unknown): Array<Record<string, unknown>> | null {
  if (isPlainObject(value)) {
    return [value];
  }
  if (Array.isArray(value) && value.every(isPlainObject)) {
    return value;
  }
  return null;
}

class BlockFlattener {
  private readonly rows = new Map<string, Row[]>();

  constructor(
    private readonly rules: MappingRules,
    private readonly issues: string[]
  ) {}

  addGroup(
    category: string,
    value: unknown,
    location: string,
    parent: ParentContext | null
  ): void {
    if (!this.rows.has(category)) {
      this.rows.set(category, []);
    }

    const rows = asRowList(value);
    if (!rows) {
      this.issues.push(`${location}: category value must be an object or a list of objects`);
      return;
    }

    const indexed = Array.isArray(value);
    rows.forEach((row, index) => {
      this.addRow(category, row, indexed ? `${location}[${index}]` : location, parent);
    });
  }

  toBlock(name: string): DataBlock {
    return new DataBlock(
      name,
      Array.from(this.rows, ([category, rows]) => Category.fromRows(category, rows))
    );
  }

  private addRow(
    category: string,
    row: Record<string, unknown>,
    location: string,
    parent: ParentContext | null
  ): void {
    const own: Row = {};
    const nested: Array<{ key: string; child: string; relation: ParentRelation; value: unknown }> =
      [];

    for (const [key, value] of Object.entries(row)) {
      const child = parseCategoryKey(key);
      if (child !== null) {
        const relation = this.rules.fkMap.relationBetween(child, category);
        if (!relation) {
          this.issues.push(
            `${location}: nested category '${key}' has no declared relationship to '${category}'`
          );
          continue;
        }
        nested.push({ key, child, relation, value });
        continue;
      }

      const text = scalarText(value);
      if (text === null) {
        this.issues.push(`${location}: item '${key}' must hold a scalar value`);
        continue;
      }
      own[key] = text;
    }

    // foreign keys come first, taken from the parent unless the row carries them
    const flat: Row = {};
    for (const pair of parent?.relation.pairs ?? []) {
      if (!Object.hasOwn(own, pair.childItem)) {
        flat[pair.childItem] = parent?.values[pair.parentItem] ?? UNKNOWN_VALUE;
      }
    }
    Object.assign(flat, own);

    const rows = this.rows.get(category) ?? [];
    rows.push(flat);
    this.rows.set(category, rows);

    for (const entry of nested) {
      this.addGroup(entry.child, entry.value, `${location}/${entry.key}`, {
        category,
        relation: entry.relation,
        values: flat
      });
    }
  }
}

/**
 * Rebuilds flat categories from a hierarchical document, depth first,
 * restoring foreign-key items of nested rows from their parents. All shape
 * problems are reported together.
 */
export function flattenDocument(document: unknown, rules: MappingRules): DataContainer {
  if (!isPlainObject(document)) {
    throw new StructuralValidationError('Hierarchical document must be an object of data blocks');
  }

  const issues: string[] = [];
  const blocks: DataBlock[] = [];

  for (const [blockName, blockValue] of Object.entries(document)) {
    if (!isPlainObject(blockValue)) {
      issues.push(`${blockName}: data block must be an object`);
      continue;
    }

    const flattener = new BlockFlattener(rules, issues);
    for (const [key, value] of Object.entries(blockValue)) {
      const category = parseCategoryKey(key);
      if (category === null) {
        issues.push(`${blockName}: '${key}' is not a category key`);
        continue;
      }
      flattener.addGroup(category, value, `${blockName}/${key}`, null);
    }
    blocks.push(flattener.toBlock(blockName));
  }

  if (issues.length > 0) {
    throw new StructuralValidationError(
      `Hierarchical document has ${issues.length} structural problem(s)`,
      issues
    );
  }

  return new DataContainer(blocks);
}

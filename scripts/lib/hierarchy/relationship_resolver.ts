import { RelationshipResolutionError } from '../errors.js';
import { silentLogger, type Logger } from '../logger.js';
import type { ParentRelation } from '../mapping/fk_map.js';
import type { MappingRules } from '../mapping/types.js';
import { isNullToken } from '../records/null_values.js';
import type { Category, DataBlock, DataContainer } from '../records/record_store.js';
import {
  categoryKey,
  materializeGroup,
  type ConversionMode,
  type DocumentBlock,
  type DocumentRow,
  type HierarchicalDocument,
  type RowGroup
} from './document.js';

export interface ResolveOptions {
  mode: ConversionMode;
  logger?: Logger;
}

interface Attachment {
  parentCategory: string;
  parentRow: number;
  relation: ParentRelation;
  /** Foreign-key items matched against the parent; omitted from the nested row. */
  linkedItems: ReadonlySet<string>;
}

function recordId(category: string, row: number): string {
  return `${category}#${row}`;
}

interface ParentMatch {
  row: number;
  /** Number of parent rows holding the looked-up values. */
  count: number;
}

class ParentIndex {
  private readonly indexes = new Map<string, Map<string, ParentMatch>>();

  /** First row of `parent` whose `items` hold `values`. */
  lookup(parent: Category, items: string[], values: string[]): ParentMatch | undefined {
    const indexKey = `${parent.name}\u0000${items.join('\u0000')}`;
    let index = this.indexes.get(indexKey);
    if (!index) {
      index = new Map();
      for (let row = 0; row < parent.rowCount; row += 1) {
        const tuple = items.map((item) => parent.value(item, row));
        if (tuple.some(isNullToken)) {
          continue;
        }
        const key = JSON.stringify(tuple);
        const match = index.get(key);
        if (match) {
          match.count += 1;
        } else {
          index.set(key, { row, count: 1 });
        }
      }
      this.indexes.set(indexKey, index);
    }
    return index.get(JSON.stringify(values));
  }
}

class BlockResolver {
  private readonly attachments = new Map<string, Attachment>();
  private readonly children = new Map<string, Map<string, number[]>>();
  private readonly parentIndex = new ParentIndex();

  constructor(
    private readonly block: DataBlock,
    private readonly rules: MappingRules,
    private readonly mode: ConversionMode,
    private readonly logger: Logger
  ) {}

  resolve(failures: string[]): DocumentBlock {
    const orphans = this.attachRecords();
    this.enforceSingleRelations(failures);
    this.rejectCycles();

    if (orphans.length > 0) {
      if (this.mode === 'strict') {
        failures.push(...orphans);
      } else {
        this.logger.warn(
          `Block '${this.block.name}': ${orphans.length} record(s) with unresolved parents kept at top level`
        );
        orphans.forEach((orphan) => this.logger.debug(orphan));
      }
    }

    this.indexChildren();
    return this.buildBlock();
  }

  private hasChildItems(category: Category, relation: ParentRelation): boolean {
    return relation.pairs.every((pair) => category.hasItem(pair.childItem));
  }

  private parentFor(relation: ParentRelation): Category | undefined {
    const parent = this.block.getCategory(relation.parentCategory);
    return parent && relation.pairs.every((pair) => parent.hasItem(pair.parentItem))
      ? parent
      : undefined;
  }

  private describeRow(category: Category, row: number): string {
    return `Block '${this.block.name}': _${category.name} row ${row + 1}`;
  }

  private attachRecords(): string[] {
    const orphans: string[] = [];

    for (const category of this.block.categories) {
      const relations = this.rules.fkMap
        .parentRelations(category.name)
        .filter((relation) => this.hasChildItems(category, relation));
      if (relations.length === 0) {
        continue;
      }
      const resolvable = relations.filter((relation) => this.parentFor(relation) !== undefined);
      // parent category, or one of its linked items, is not in the block
      const dangling = relations.filter((relation) => this.parentFor(relation) === undefined);

      for (let row = 0; row < category.rowCount; row += 1) {
        const outcome = this.attachRow(category, row, resolvable);
        const orphan =
          outcome === undefined ? this.danglingReference(category, row, dangling) : outcome;
        if (orphan) {
          orphans.push(orphan);
        }
      }
    }

    return orphans;
  }

  /**
   * Attaches the row under the first relation with usable values. Returns
   * an orphan message, `null` once decided, or `undefined` when no relation
   * had usable values.
   */
  private attachRow(
    category: Category,
    row: number,
    relations: readonly ParentRelation[]
  ): string | null | undefined {
    for (const relation of relations) {
      const parent = this.parentFor(relation);
      const pairs = relation.pairs.filter(
        (pair) => !isNullToken(category.value(pair.childItem, row))
      );
      if (!parent || pairs.length === 0) {
        continue;
      }

      const values = pairs.map((pair) => category.value(pair.childItem, row));
      const described = pairs
        .map((pair, index) => `${pair.parentItem}=${values[index]}`)
        .join(', ');
      const match = this.parentIndex.lookup(
        parent,
        pairs.map((pair) => pair.parentItem),
        values
      );

      if (match === undefined) {
        return `${this.describeRow(category, row)} references missing _${parent.name} (${described})`;
      }
      if (match.count > 1 && pairs.length < relation.pairs.length) {
        return `${this.describeRow(category, row)} matches ${match.count} _${parent.name} records (${described})`;
      }
      this.attachments.set(recordId(category.name, row), {
        parentCategory: parent.name,
        parentRow: match.row,
        relation,
        linkedItems: new Set(pairs.map((pair) => pair.childItem))
      });
      return null;
    }
    return undefined;
  }

  private danglingReference(
    category: Category,
    row: number,
    relations: readonly ParentRelation[]
  ): string | undefined {
    for (const relation of relations) {
      const pairs = relation.pairs.filter(
        (pair) => !isNullToken(category.value(pair.childItem, row))
      );
      if (pairs.length > 0) {
        const described = pairs
          .map((pair) => `${pair.parentItem}=${category.value(pair.childItem, row)}`)
          .join(', ');
        return `${this.describeRow(category, row)} references missing _${relation.parentCategory} (${described})`;
      }
    }
    return undefined;
  }

  private enforceSingleRelations(failures: string[]): void {
    const seen = new Set<string>();
    for (const [id, attachment] of this.attachments) {
      if (attachment.relation.multiplicity !== 'single') {
        continue;
      }
      const slot = `${recordId(attachment.parentCategory, attachment.parentRow)}>${attachment.relation.childCategory}`;
      if (!seen.has(slot)) {
        seen.add(slot);
        continue;
      }

      const message = `Block '${this.block.name}': _${attachment.parentCategory} row ${attachment.parentRow + 1} has more than one _${attachment.relation.childCategory} record`;
      if (this.mode === 'strict') {
        failures.push(message);
      } else {
        this.logger.warn(`${message}; extra record kept at top level`);
        this.attachments.delete(id);
      }
    }
  }

  private rejectCycles(): void {
    const acyclic = new Set<string>();
    for (const start of this.attachments.keys()) {
      const path: string[] = [];
      const onPath = new Set<string>();
      let current: string | undefined = start;

      while (current !== undefined && !acyclic.has(current)) {
        if (onPath.has(current)) {
          const cycle = path.slice(path.indexOf(current)).concat(current);
          throw new RelationshipResolutionError(
            `Block '${this.block.name}' contains a cyclic parent chain`,
            [cycle.join(' -> ')]
          );
        }
        onPath.add(current);
        path.push(current);
        const attachment = this.attachments.get(current);
        current = attachment
          ? recordId(attachment.parentCategory, attachment.parentRow)
          : undefined;
      }

      path.forEach((id) => acyclic.add(id));
    }
  }

  private indexChildren(): void {
    for (const category of this.block.categories) {
      for (let row = 0; row < category.rowCount; row += 1) {
        const attachment = this.attachments.get(recordId(category.name, row));
        if (!attachment) {
          continue;
        }
        const parentId = recordId(attachment.parentCategory, attachment.parentRow);
        const byCategory = this.children.get(parentId) ?? new Map<string, number[]>();
        const rows = byCategory.get(category.name) ?? [];
        rows.push(row);
        byCategory.set(category.name, rows);
        this.children.set(parentId, byCategory);
      }
    }
  }

  private buildRow(category: Category, row: number): DocumentRow {
    const id = recordId(category.name, row);
    const linkedItems = this.attachments.get(id)?.linkedItems;
    const result: DocumentRow = {};

    for (const item of category.itemNames) {
      if (!linkedItems?.has(item)) {
        result[item] = category.value(item, row);
      }
    }

    for (const [childName, rows] of this.children.get(id) ?? []) {
      const child = this.block.getCategory(childName);
      const relation = this.attachments.get(recordId(childName, rows[0]))?.relation;
      if (!child || !relation) {
        continue;
      }
      const group: RowGroup =
        relation.multiplicity === 'single' && rows.length === 1
          ? { kind: 'single', row: this.buildRow(child, rows[0]) }
          : { kind: 'multiple', rows: rows.map((childRow) => this.buildRow(child, childRow)) };
      result[categoryKey(childName)] = materializeGroup(group);
    }

    return result;
  }

  private buildBlock(): DocumentBlock {
    const result: DocumentBlock = {};
    for (const category of this.block.categories) {
      const roots: number[] = [];
      for (let row = 0; row < category.rowCount; row += 1) {
        if (!this.attachments.has(recordId(category.name, row))) {
          roots.push(row);
        }
      }
      if (roots.length === 0 && category.rowCount > 0) {
        continue;
      }

      const multiplicity = this.rules.categories.get(category.name)?.multiplicity ?? 'multiple';
      const group: RowGroup =
        multiplicity === 'single' && roots.length === 1
          ? { kind: 'single', row: this.buildRow(category, roots[0]) }
          : { kind: 'multiple', rows: roots.map((row) => this.buildRow(category, row)) };
      result[categoryKey(category.name)] = materializeGroup(group);
    }
    return result;
  }
}

/**
 * Nests flat records under their parents following the foreign-key table.
 * Unresolvable records stay at top level in permissive mode and fail the
 * whole call in strict mode; cycles always fail.
 */
export function resolveRelationships(
  container: DataContainer,
  rules: MappingRules,
  options: ResolveOptions
): HierarchicalDocument {
  const logger = options.logger ?? silentLogger;
  const failures: string[] = [];
  const document: HierarchicalDocument = {};

  for (const block of container.blocks) {
    document[block.name] = new BlockResolver(block, rules, options.mode, logger).resolve(failures);
  }

  if (failures.length > 0) {
    throw new RelationshipResolutionError(
      `Relationship resolution failed with ${failures.length} problem(s)`,
      failures
    );
  }

  return document;
}

export type DocumentRow = { [key: string]: string | DocumentRow | DocumentRow[] };
export type DocumentGroup = DocumentRow | DocumentRow[];
export type DocumentBlock = { [categoryKey: string]: DocumentGroup };
export type HierarchicalDocument = { [blockName: string]: DocumentBlock };

/** Rows of one category under one parent (or at block level). */
export type RowGroup =
  | { kind: 'single'; row: DocumentRow }
  | { kind: 'multiple'; rows: DocumentRow[] };

export type ConversionMode = 'strict' | 'permissive';

export function categoryKey(category: string): string {
  return `_${category}`;
}

/** Category name for a `_category` key, `null` for item keys. */
export function parseCategoryKey(key: string): string | null {
  return key.length > 1 && key.startsWith('_') ? key.slice(1) : null;
}

export function materializeGroup(group: RowGroup): DocumentGroup {
  return group.kind === 'single' ? group.row : group.rows;
}

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

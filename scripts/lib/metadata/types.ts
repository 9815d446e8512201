export type Multiplicity = 'single' | 'multiple';

export interface CategoryDefinition {
  id: string;
  description: string | null;
  mandatory: boolean;
  keys: string[];
  multiplicity: Multiplicity | null;
}

export interface ItemDefinition {
  /** Full tag form, e.g. `_entity.id`. */
  name: string;
  category: string;
  item: string;
  typeCode: string | null;
  mandatory: boolean;
  enumeration: string[];
  description: string | null;
}

export interface ItemTypeDefinition {
  code: string;
  primitiveCode: string | null;
}

export interface LinkDeclaration {
  childCategory: string;
  childItem: string;
  parentCategory: string;
  parentItem: string;
  /** Set only for grouped (category-pair specific) declarations. */
  linkGroupId: string | null;
}

export interface DictionaryMetadata {
  title: string | null;
  version: string | null;
  categories: Record<string, CategoryDefinition>;
  items: Record<string, ItemDefinition>;
  itemTypes: Record<string, ItemTypeDefinition>;
  links: LinkDeclaration[];
  groupedLinks: LinkDeclaration[];
}

export interface SchemaField {
  name: string;
  type: string | null;
  kind: 'attribute' | 'element';
  required: boolean;
}

export interface SchemaMetadata {
  targetNamespace: string | null;
  /** Keyed by complex type name, e.g. `entityType`. */
  complexTypes: Record<string, SchemaField[]>;
}

export type SourceMetadata =
  | { kind: 'dictionary'; dictionary: DictionaryMetadata }
  | { kind: 'schema'; schema: SchemaMetadata };

export function splitItemName(fullName: string): { category: string; item: string } | null {
  const trimmed = fullName.trim().replace(/^_/, '');
  const dot = trimmed.indexOf('.');
  if (dot <= 0 || dot === trimmed.length - 1) {
    return null;
  }
  return { category: trimmed.slice(0, dot), item: trimmed.slice(dot + 1) };
}

export function sortRecord<T>(record: Record<string, T>): Record<string, T> {
  const sorted: Record<string, T> = {};
  for (const key of Object.keys(record).sort(compareText)) {
    sorted[key] = record[key];
  }
  return sorted;
}

export function compareText(a: string, b: string): number {
  if (a === b) {
    return 0;
  }
  return a < b ? -1 : 1;
}

/** Numeric ids order numerically, anything else by code point; absent ids sort first. */
export function compareGroupIds(a: string | null, b: string | null): number {
  if (a === null || b === null) {
    return a === b ? 0 : a === null ? -1 : 1;
  }
  const left = Number(a);
  const right = Number(b);
  if (Number.isFinite(left) && Number.isFinite(right) && left !== right) {
    return left - right;
  }
  return compareText(a, b);
}

export function compareLinks(a: LinkDeclaration, b: LinkDeclaration): number {
  return (
    compareText(a.childCategory, b.childCategory) ||
    compareText(a.childItem, b.childItem) ||
    compareGroupIds(a.linkGroupId, b.linkGroupId) ||
    compareText(a.parentCategory, b.parentCategory) ||
    compareText(a.parentItem, b.parentItem)
  );
}

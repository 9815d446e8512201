import type { Multiplicity } from '../metadata/types.js';
import type { FkMap } from './fk_map.js';

export type ItemLocation = 'attribute' | 'element';

export type GroupingStrategy = 'single-key' | 'composite-key' | 'row-position';

export interface ItemMapping {
  name: string;
  xmlName: string;
  location: ItemLocation;
  typeCode: string | null;
  numeric: boolean;
  mandatory: boolean;
  enumeration: readonly string[];
}

export interface CategoryMapping {
  name: string;
  elementName: string;
  keys: readonly string[];
  grouping: GroupingStrategy;
  /** How top-level rows of this category are grouped. */
  multiplicity: Multiplicity;
  items: ReadonlyMap<string, ItemMapping>;
}

export interface MappingRules {
  categories: ReadonlyMap<string, CategoryMapping>;
  fkMap: FkMap;
  warnings: readonly string[];
}

const XML_NAME_START = /^[A-Za-z_]/;

export function toXmlName(name: string): string {
  const sanitized = name.replace(/[^A-Za-z0-9_.-]/g, '_');
  return XML_NAME_START.test(sanitized) ? sanitized : `_${sanitized}`;
}

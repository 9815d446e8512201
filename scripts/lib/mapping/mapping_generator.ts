import type { Logger } from '../logger.js';
import {
  compareGroupIds,
  compareLinks,
  compareText,
  type DictionaryMetadata,
  type ItemDefinition,
  type LinkDeclaration,
  type SchemaField,
  type SchemaMetadata
} from '../metadata/types.js';
import { FkMap, type ForeignKeyLink, type KeyPair, type ParentRelation } from './fk_map.js';
import {
  toXmlName,
  type CategoryMapping,
  type GroupingStrategy,
  type ItemLocation,
  type ItemMapping,
  type MappingRules
} from './types.js';

export const NUMERIC_TYPE_CODES = new Set([
  'int',
  'integer',
  'float',
  'real',
  'number',
  'numb',
  'positive_int',
  'decimal',
  'double',
  // XML Schema integer family, compared lower-cased
  'long',
  'short',
  'byte',
  'positiveinteger',
  'negativeinteger',
  'nonnegativeinteger',
  'nonpositiveinteger',
  'unsignedlong',
  'unsignedint',
  'unsignedshort',
  'unsignedbyte'
]);

export const CONTENT_TYPE_CODES = new Set(['text']);

// element names the XML document layout uses itself
const RESERVED_XML_NAMES = new Set(['category', 'datablock']);

const SCHEMA_TYPE_SUFFIX = 'Type';

function baseTypeCode(code: string): string {
  return code.trim().toLowerCase().replace(/^xsd?:/, '');
}

export function isNumericType(
  typeCode: string | null,
  itemTypes: DictionaryMetadata['itemTypes']
): boolean {
  if (!typeCode) {
    return false;
  }
  if (NUMERIC_TYPE_CODES.has(baseTypeCode(typeCode))) {
    return true;
  }
  return itemTypes[typeCode]?.primitiveCode?.toLowerCase() === 'numb';
}

function locateItem(
  itemName: string,
  xmlName: string,
  keys: readonly string[],
  typeCode: string | null,
  field: SchemaField | undefined
): ItemLocation {
  if (keys.includes(itemName) || RESERVED_XML_NAMES.has(xmlName)) {
    return 'attribute';
  }
  if (field) {
    return field.kind;
  }
  return typeCode && CONTENT_TYPE_CODES.has(baseTypeCode(typeCode)) ? 'element' : 'attribute';
}

function groupingFor(keys: readonly string[]): GroupingStrategy {
  if (keys.length === 0) {
    return 'row-position';
  }
  return keys.length === 1 ? 'single-key' : 'composite-key';
}

function collectCategoryNames(
  dictionary: DictionaryMetadata,
  schema: SchemaMetadata | null
): string[] {
  const names = new Set<string>(Object.keys(dictionary.categories));
  for (const item of Object.values(dictionary.items)) {
    names.add(item.category);
  }
  for (const typeName of Object.keys(schema?.complexTypes ?? {})) {
    if (typeName.endsWith(SCHEMA_TYPE_SUFFIX) && typeName.length > SCHEMA_TYPE_SUFFIX.length) {
      names.add(typeName.slice(0, -SCHEMA_TYPE_SUFFIX.length));
    }
  }
  return Array.from(names).sort(compareText);
}

function buildCategoryMapping(
  name: string,
  dictionary: DictionaryMetadata,
  schema: SchemaMetadata | null
): CategoryMapping {
  const definition = dictionary.categories[name];
  const keys = definition?.keys ?? [];
  const fields = new Map<string, SchemaField>();
  for (const field of schema?.complexTypes[`${name}${SCHEMA_TYPE_SUFFIX}`] ?? []) {
    fields.set(field.name, field);
  }

  const definitions = new Map<string, ItemDefinition>();
  for (const item of Object.values(dictionary.items)) {
    if (item.category === name) {
      definitions.set(item.item, item);
    }
  }

  const itemNames = Array.from(new Set([...definitions.keys(), ...fields.keys()])).sort(
    compareText
  );
  const items = new Map<string, ItemMapping>();
  for (const itemName of itemNames) {
    const itemDefinition = definitions.get(itemName);
    const field = fields.get(itemName);
    const typeCode = itemDefinition?.typeCode ?? field?.type ?? null;
    const xmlName = toXmlName(itemName);
    items.set(itemName, {
      name: itemName,
      xmlName,
      location: locateItem(itemName, xmlName, keys, typeCode, field),
      typeCode,
      numeric: isNumericType(typeCode, dictionary.itemTypes),
      mandatory: itemDefinition?.mandatory ?? field?.required ?? false,
      enumeration: itemDefinition?.enumeration ?? []
    });
  }

  return {
    name,
    elementName: toXmlName(name),
    keys,
    grouping: groupingFor(keys),
    multiplicity: definition?.multiplicity ?? 'multiple',
    items
  };
}

function describeLink(link: LinkDeclaration): string {
  return `_${link.childCategory}.${link.childItem} -> _${link.parentCategory}.${link.parentItem}`;
}

function resolveLinks(
  dictionary: DictionaryMetadata,
  categories: ReadonlyMap<string, CategoryMapping>,
  warnings: string[]
): ForeignKeyLink[] {
  const candidates = new Map<string, { general: LinkDeclaration[]; grouped: LinkDeclaration[] }>();

  const accept = (link: LinkDeclaration, origin: 'general' | 'grouped'): void => {
    for (const category of [link.childCategory, link.parentCategory]) {
      if (!categories.has(category)) {
        warnings.push(`Dropped link ${describeLink(link)}: unknown category '${category}'`);
        return;
      }
    }
    if (link.childCategory === link.parentCategory && link.childItem === link.parentItem) {
      warnings.push(`Dropped link ${describeLink(link)}: item links to itself`);
      return;
    }

    const key = `${link.childCategory}.${link.childItem}`;
    const entry = candidates.get(key) ?? { general: [], grouped: [] };
    entry[origin].push(link);
    candidates.set(key, entry);
  };

  [...dictionary.links].sort(compareLinks).forEach((link) => accept(link, 'general'));
  [...dictionary.groupedLinks].sort(compareLinks).forEach((link) => accept(link, 'grouped'));

  const resolved: ForeignKeyLink[] = [];
  for (const key of Array.from(candidates.keys()).sort(compareText)) {
    const entry = candidates.get(key);
    if (!entry) {
      continue;
    }
    // category-pair specific declarations win over general ones
    const origin = entry.grouped.length > 0 ? 'grouped' : 'general';
    const declarations = [...entry[origin]].sort(
      (a, b) =>
        compareGroupIds(a.linkGroupId, b.linkGroupId) ||
        compareText(a.parentCategory, b.parentCategory) ||
        compareText(a.parentItem, b.parentItem)
    );
    const chosen = declarations[0];
    const parents = new Set(declarations.map((link) => `${link.parentCategory}.${link.parentItem}`));
    if (parents.size > 1) {
      warnings.push(
        `Item _${key} has ${parents.size} ${origin} parent declarations; using ${describeLink(chosen)}`
      );
    }

    resolved.push({
      childCategory: chosen.childCategory,
      childItem: chosen.childItem,
      parentCategory: chosen.parentCategory,
      parentItem: chosen.parentItem,
      origin,
      linkGroupId: chosen.linkGroupId
    });
  }

  return resolved;
}

function buildRelations(
  links: ForeignKeyLink[],
  categories: ReadonlyMap<string, CategoryMapping>
): ParentRelation[] {
  const grouped = new Map<string, { child: string; parent: string; pairs: KeyPair[] }>();
  for (const link of links) {
    const key = `${link.childCategory}\u0000${link.parentCategory}`;
    const entry = grouped.get(key) ?? {
      child: link.childCategory,
      parent: link.parentCategory,
      pairs: []
    };
    entry.pairs.push({ childItem: link.childItem, parentItem: link.parentItem });
    grouped.set(key, entry);
  }

  const relations: ParentRelation[] = [];
  for (const { child, parent, pairs } of grouped.values()) {
    const childKeys = categories.get(child)?.keys ?? [];
    const parentKeys = categories.get(parent)?.keys ?? [];
    const childItems = new Set(pairs.map((pair) => pair.childItem));
    const parentItems = new Set(pairs.map((pair) => pair.parentItem));

    relations.push({
      childCategory: child,
      parentCategory: parent,
      pairs: [...pairs].sort((a, b) => compareText(a.childItem, b.childItem)),
      // the child's own key is fully determined by the parent: at most one child row per parent
      multiplicity:
        childKeys.length > 0 && childKeys.every((key) => childItems.has(key)) ? 'single' : 'multiple',
      coversParentKey: parentKeys.length > 0 && parentKeys.every((key) => parentItems.has(key))
    });
  }

  return relations.sort(
    (a, b) =>
      compareText(a.childCategory, b.childCategory) ||
      Number(b.coversParentKey) - Number(a.coversParentKey) ||
      b.pairs.length - a.pairs.length ||
      compareText(a.parentCategory, b.parentCategory)
  );
}

/**
 * Derives category mappings and the foreign-key table from dictionary (and
 * optional schema) metadata. Output depends only on metadata content.
 */
export function buildMappingRules(
  dictionary: DictionaryMetadata,
  schema: SchemaMetadata | null = null,
  logger?: Logger
): MappingRules {
  const categories = new Map<string, CategoryMapping>();
  for (const name of collectCategoryNames(dictionary, schema)) {
    categories.set(name, buildCategoryMapping(name, dictionary, schema));
  }

  const warnings: string[] = [];
  const links = resolveLinks(dictionary, categories, warnings);
  const fkMap = new FkMap(links, buildRelations(links, categories));

  for (const warning of warnings) {
    logger?.warn(warning);
  }
  logger?.debug(
    `Built mapping rules: ${categories.size} categories, ${links.length} links, ${fkMap.relations.length} relations`
  );

  return { categories, fkMap, warnings };
}

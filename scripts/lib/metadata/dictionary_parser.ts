import { createAjv, formatAjvErrors } from '../validation/ajv.js';
import { firstValue, readDdl, type DdlBlock, type DdlValues } from './ddl_reader.js';
import {
  compareLinks,
  sortRecord,
  splitItemName,
  type CategoryDefinition,
  type DictionaryMetadata,
  type ItemDefinition,
  type ItemTypeDefinition,
  type LinkDeclaration,
  type Multiplicity
} from './types.js';

function isYes(value: string | null): boolean {
  return value !== null && ['yes', 'y', 'implicit'].includes(value.trim().toLowerCase());
}

function requireItemName(name: string, context: string): { category: string; item: string } {
  const parts = splitItemName(name);
  if (!parts) {
    throw new Error(`Malformed item name '${name}' in ${context}`);
  }
  return parts;
}

function finalize(
  title: string | null,
  version: string | null,
  categories: Record<string, CategoryDefinition>,
  items: Record<string, ItemDefinition>,
  itemTypes: Record<string, ItemTypeDefinition>,
  links: LinkDeclaration[],
  groupedLinks: LinkDeclaration[]
): DictionaryMetadata {
  const dedupe = (values: LinkDeclaration[]): LinkDeclaration[] => {
    const seen = new Map<string, LinkDeclaration>();
    for (const link of values) {
      const key = JSON.stringify([
        link.childCategory,
        link.childItem,
        link.parentCategory,
        link.parentItem,
        link.linkGroupId
      ]);
      if (!seen.has(key)) {
        seen.set(key, link);
      }
    }
    return Array.from(seen.values()).sort(compareLinks);
  };

  return {
    title,
    version,
    categories: sortRecord(categories),
    items: sortRecord(items),
    itemTypes: sortRecord(itemTypes),
    links: dedupe(links),
    groupedLinks: dedupe(groupedLinks)
  };
}

function collectLinks(values: DdlValues, context: string): LinkDeclaration[] {
  const children = values.get('item_linked.child_name') ?? [];
  const parents = values.get('item_linked.parent_name') ?? [];
  if (children.length !== parents.length) {
    throw new Error(`Unpaired _item_linked names in ${context}`);
  }

  return children.map((childName, index) => {
    const child = requireItemName(childName, context);
    const parent = requireItemName(parents[index], context);
    return {
      childCategory: child.category,
      childItem: child.item,
      parentCategory: parent.category,
      parentItem: parent.item,
      linkGroupId: null
    };
  });
}

function collectGroupedLinks(values: DdlValues, context: string): LinkDeclaration[] {
  const childNames = values.get('pdbx_item_linked_group_list.child_name') ?? [];
  const parentNames = values.get('pdbx_item_linked_group_list.parent_name') ?? [];
  const childCategories = values.get('pdbx_item_linked_group_list.child_category_id') ?? [];
  const parentCategories = values.get('pdbx_item_linked_group_list.parent_category_id') ?? [];
  const groupIds = values.get('pdbx_item_linked_group_list.link_group_id') ?? [];

  return childNames.map((childName, index) => {
    const child = requireItemName(childName, context);
    const parent = requireItemName(parentNames[index] ?? '', context);
    return {
      childCategory: childCategories[index] ?? child.category,
      childItem: child.item,
      parentCategory: parentCategories[index] ?? parent.category,
      parentItem: parent.item,
      linkGroupId: groupIds[index] ?? '1'
    };
  });
}

function collectItemTypes(values: DdlValues, target: Record<string, ItemTypeDefinition>): void {
  const codes = values.get('item_type_list.code') ?? [];
  const primitives = values.get('item_type_list.primitive_code') ?? [];
  codes.forEach((code, index) => {
    target[code] = { code, primitiveCode: primitives[index] ?? null };
  });
}

export function dictionaryFromDdl(blocks: DdlBlock[]): DictionaryMetadata {
  const block = blocks[0];
  if (!block) {
    throw new Error('Dictionary source contains no data_ block');
  }

  const categories: Record<string, CategoryDefinition> = {};
  const items: Record<string, ItemDefinition> = {};
  const itemTypes: Record<string, ItemTypeDefinition> = {};
  const links: LinkDeclaration[] = [];
  const groupedLinks: LinkDeclaration[] = [];
  const ownDefinitions = new Set<string>();

  const containers: Array<{ context: string; values: DdlValues }> = [
    { context: `data_${block.name}`, values: block.values },
    ...block.frames.map((frame) => ({ context: `save_${frame.name}`, values: frame.values }))
  ];

  for (const { context, values } of containers) {
    links.push(...collectLinks(values, context));
    groupedLinks.push(...collectGroupedLinks(values, context));
    collectItemTypes(values, itemTypes);
  }

  for (const frame of block.frames) {
    const values = frame.values;
    const categoryId = firstValue(values, 'category.id');
    if (categoryId) {
      categories[categoryId] = {
        id: categoryId,
        description: firstValue(values, 'category.description'),
        mandatory: isYes(firstValue(values, 'category.mandatory_code')),
        keys: (values.get('category_key.name') ?? []).flatMap((name) => {
          const parts = splitItemName(name);
          return parts && parts.category === categoryId ? [parts.item] : [];
        }),
        multiplicity: null
      };
      continue;
    }

    const names = values.get('item.name') ?? [];
    if (names.length === 0) {
      continue;
    }

    const mandatoryCodes = values.get('item.mandatory_code') ?? [];
    const ownName = names.find((name) => name === `_${frame.name.replace(/^_/, '')}`) ?? names[0];
    const typeCode = firstValue(values, 'item_type.code');

    names.forEach((name, index) => {
      const parts = requireItemName(name, `save_${frame.name}`);
      const fullName = `_${parts.category}.${parts.item}`;
      const isOwn = name === ownName;
      if (items[fullName] && (!isOwn || ownDefinitions.has(fullName))) {
        return;
      }

      items[fullName] = {
        name: fullName,
        category: parts.category,
        item: parts.item,
        typeCode: isOwn ? (typeCode ?? items[fullName]?.typeCode ?? null) : typeCode,
        mandatory: isYes(mandatoryCodes[index] ?? null),
        enumeration: isOwn ? [...(values.get('item_enumeration.value') ?? [])] : [],
        description: isOwn ? firstValue(values, 'item_description.description') : null
      };
      if (isOwn) {
        ownDefinitions.add(fullName);
      }
    });
  }

  return finalize(
    firstValue(block.values, 'dictionary.title'),
    firstValue(block.values, 'dictionary.version'),
    categories,
    items,
    itemTypes,
    links,
    groupedLinks
  );
}

export function parseDdlDictionary(text: string): DictionaryMetadata {
  return dictionaryFromDdl(readDdl(text));
}

interface JsonDictionarySource {
  title?: string;
  version?: string;
  categories: Array<{
    id: string;
    keys?: string[];
    mandatory?: boolean;
    description?: string;
    multiplicity?: Multiplicity;
  }>;
  items: Array<{
    name: string;
    type?: string;
    mandatory?: boolean;
    enumeration?: string[];
    description?: string;
  }>;
  itemTypes?: Array<{ code: string; primitive?: string }>;
  links?: Array<{ child: string; parent: string }>;
  groupedLinks?: Array<{ child: string; parent: string; linkGroupId: string }>;
}

const stringArray = { type: 'array', items: { type: 'string' } };

const jsonDictionarySchema = {
  type: 'object',
  required: ['categories', 'items'],
  additionalProperties: false,
  properties: {
    title: { type: 'string' },
    version: { type: 'string' },
    categories: {
      type: 'array',
      items: {
        type: 'object',
        required: ['id'],
        additionalProperties: false,
        properties: {
          id: { type: 'string', minLength: 1 },
          keys: stringArray,
          mandatory: { type: 'boolean' },
          description: { type: 'string' },
          multiplicity: { enum: ['single', 'multiple'] }
        }
      }
    },
    items: {
      type: 'array',
      items: {
        type: 'object',
        required: ['name'],
        additionalProperties: false,
        properties: {
          name: { type: 'string', pattern: '^_?[^.]+\\.[^.]+$' },
          type: { type: 'string' },
          mandatory: { type: 'boolean' },
          enumeration: stringArray,
          description: { type: 'string' }
        }
      }
    },
    itemTypes: {
      type: 'array',
      items: {
        type: 'object',
        required: ['code'],
        properties: { code: { type: 'string' }, primitive: { type: 'string' } }
      }
    },
    links: {
      type: 'array',
      items: {
        type: 'object',
        required: ['child', 'parent'],
        properties: { child: { type: 'string' }, parent: { type: 'string' } }
      }
    },
    groupedLinks: {
      type: 'array',
      items: {
        type: 'object',
        required: ['child', 'parent', 'linkGroupId'],
        properties: {
          child: { type: 'string' },
          parent: { type: 'string' },
          linkGroupId: { type: 'string' }
        }
      }
    }
  }
};

const validateJsonDictionary = createAjv().compile<JsonDictionarySource>(jsonDictionarySchema);

export function dictionaryFromJson(raw: unknown): DictionaryMetadata {
  if (!validateJsonDictionary(raw)) {
    const issues = formatAjvErrors(validateJsonDictionary.errors);
    throw new Error(`Invalid JSON dictionary:\n${issues.join('\n')}`);
  }

  const categories: Record<string, CategoryDefinition> = {};
  for (const category of raw.categories) {
    categories[category.id] = {
      id: category.id,
      description: category.description ?? null,
      mandatory: category.mandatory ?? false,
      keys: category.keys ?? [],
      multiplicity: category.multiplicity ?? null
    };
  }

  const items: Record<string, ItemDefinition> = {};
  for (const entry of raw.items) {
    const parts = requireItemName(entry.name, 'JSON dictionary');
    const fullName = `_${parts.category}.${parts.item}`;
    items[fullName] = {
      name: fullName,
      category: parts.category,
      item: parts.item,
      typeCode: entry.type ?? null,
      mandatory: entry.mandatory ?? false,
      enumeration: entry.enumeration ?? [],
      description: entry.description ?? null
    };
  }

  const itemTypes: Record<string, ItemTypeDefinition> = {};
  for (const itemType of raw.itemTypes ?? []) {
    itemTypes[itemType.code] = { code: itemType.code, primitiveCode: itemType.primitive ?? null };
  }

  const toLink = (child: string, parent: string, linkGroupId: string | null): LinkDeclaration => {
    const childParts = requireItemName(child, 'JSON dictionary link');
    const parentParts = requireItemName(parent, 'JSON dictionary link');
    return {
      childCategory: childParts.category,
      childItem: childParts.item,
      parentCategory: parentParts.category,
      parentItem: parentParts.item,
      linkGroupId
    };
  };

  return finalize(
    raw.title ?? null,
    raw.version ?? null,
    categories,
    items,
    itemTypes,
    (raw.links ?? []).map((link) => toLink(link.child, link.parent, null)),
    (raw.groupedLinks ?? []).map((link) => toLink(link.child, link.parent, link.linkGroupId))
  );
}

import { XMLBuilder, XMLParser } from 'fast-xml-parser';

import { StructuralValidationError } from '../errors.js';
import type { Multiplicity } from '../metadata/types.js';
import { toXmlName, type CategoryMapping, type MappingRules } from '../mapping/types.js';
import { attributeValue, childNodes, isXmlNode, type XmlNode } from '../xml_nodes.js';
import {
  categoryKey,
  materializeGroup,
  parseCategoryKey,
  type DocumentBlock,
  type DocumentGroup,
  type DocumentRow,
  type HierarchicalDocument,
  type RowGroup
} from './document.js';

const XML_DECLARATION = '<?xml version="1.0" encoding="UTF-8"?>';
const BLOCK_TAG = 'datablock';
const CATEGORY_TAG = 'category';

type XmlOutput = { [key: string]: string | XmlOutput | XmlOutput[] };

function elementNameFor(category: string, mapping: CategoryMapping | undefined): string {
  return mapping?.elementName ?? toXmlName(category);
}

function encodeRow(row: DocumentRow, category: string, rules: MappingRules): XmlOutput {
  const mapping = rules.categories.get(category);
  const attributes: XmlOutput = {};
  const elements: XmlOutput = {};
  const nested: XmlOutput[] = [];

  for (const [key, value] of Object.entries(row)) {
    const child = parseCategoryKey(key);
    if (child !== null && typeof value !== 'string') {
      nested.push(encodeCategory(child, value, rules));
      continue;
    }
    if (typeof value !== 'string') {
      throw new StructuralValidationError(`Item '${key}' of '${category}' is not a scalar value`);
    }

    const item = mapping?.items.get(key);
    const xmlName = item?.xmlName ?? toXmlName(key);
    if (item?.location === 'element') {
      elements[xmlName] = value;
    } else {
      attributes[`@_${xmlName}`] = value;
    }
  }

  return nested.length > 0
    ? { ...attributes, ...elements, [CATEGORY_TAG]: nested }
    : { ...attributes, ...elements };
}

function encodeCategory(category: string, group: DocumentGroup, rules: MappingRules): XmlOutput {
  const rows = Array.isArray(group) ? group : [group];
  return {
    '@_name': category,
    [elementNameFor(category, rules.categories.get(category))]: rows.map((row) =>
      encodeRow(row, category, rules)
    )
  };
}

/** XML text for a single-block hierarchical document. */
export function serializeXmlDocument(
  document: HierarchicalDocument,
  rules: MappingRules
): string {
  const blocks = Object.entries(document);
  if (blocks.length !== 1) {
    throw new StructuralValidationError(
      `An XML document holds exactly one data block, got ${blocks.length}`
    );
  }

  const [blockName, block] = blocks[0];
  const categories: XmlOutput[] = [];
  for (const [key, group] of Object.entries(block)) {
    const category = parseCategoryKey(key);
    if (category === null) {
      throw new StructuralValidationError(`Block key '${key}' is not a category key`);
    }
    categories.push(encodeCategory(category, group, rules));
  }

  const builder = new XMLBuilder({
    ignoreAttributes: false,
    attributeNamePrefix: '@_',
    format: true,
    indentBy: '  ',
    suppressEmptyNode: false
  });

  const body: string = builder.build({
    [BLOCK_TAG]: { '@_datablockName': blockName, [CATEGORY_TAG]: categories }
  });
  return `${XML_DECLARATION}\n${body.trim()}\n`;
}

class XmlDocumentReader {
  readonly issues: string[] = [];

  constructor(private readonly rules: MappingRules) {}

  readCategories(
    node: XmlNode,
    parentCategory: string | null,
    location: string,
    target: DocumentRow | DocumentBlock
  ): void {
    const collected = new Map<string, DocumentRow[]>();

    for (const categoryNode of childNodes(node, CATEGORY_TAG)) {
      const name = attributeValue(categoryNode, 'name');
      if (!name) {
        this.issues.push(`${location}: <category> element without a name attribute`);
        continue;
      }

      const mapping = this.rules.categories.get(name);
      const rowTag = elementNameFor(name, mapping);
      const rows = collected.get(name) ?? [];
      const rowValues = categoryNode[rowTag];
      const rowNodes = Array.isArray(rowValues) ? rowValues : [];
      rowNodes.forEach((rowNode: unknown, index) => {
        rows.push(this.readRow(rowNode, name, `${location}/${name}[${index}]`));
      });

      for (const key of Object.keys(categoryNode)) {
        if (key !== rowTag && !key.startsWith('@_')) {
          this.issues.push(`${location}/${name}: unexpected element <${key}>`);
        }
      }
      collected.set(name, rows);
    }

    for (const [name, rows] of collected) {
      const multiplicity: Multiplicity =
        parentCategory === null
          ? (this.rules.categories.get(name)?.multiplicity ?? 'multiple')
          : (this.rules.fkMap.relationBetween(name, parentCategory)?.multiplicity ?? 'multiple');
      const group: RowGroup =
        multiplicity === 'single' && rows.length === 1
          ? { kind: 'single', row: rows[0] }
          : { kind: 'multiple', rows };
      target[categoryKey(name)] = materializeGroup(group);
    }
  }

  private readRow(node: unknown, category: string, location: string): DocumentRow {
    const row: DocumentRow = {};
    if (node === '') {
      return row;
    }
    if (!isXmlNode(node)) {
      this.issues.push(`${location}: row element must not hold text`);
      return row;
    }

    const itemNames = new Map<string, string>();
    for (const item of this.rules.categories.get(category)?.items.values() ?? []) {
      itemNames.set(item.xmlName, item.name);
    }
    const itemName = (xmlName: string): string => itemNames.get(xmlName) ?? xmlName;

    for (const [key, value] of Object.entries(node)) {
      if (key === CATEGORY_TAG) {
        continue;
      }
      if (key.startsWith('@_')) {
        row[itemName(key.slice(2))] = String(value);
        continue;
      }
      if (key === '#text') {
        this.issues.push(`${location}: row element must not hold text`);
        continue;
      }

      const occurrences: unknown[] = Array.isArray(value) ? value : [value];
      if (occurrences.length !== 1) {
        this.issues.push(`${location}: item element <${key}> appears ${occurrences.length} times`);
        continue;
      }
      const content = occurrences[0];
      if (typeof content === 'string') {
        row[itemName(key)] = content;
      } else if (isXmlNode(content) && typeof content['#text'] === 'string') {
        row[itemName(key)] = content['#text'];
      } else {
        this.issues.push(`${location}: item element <${key}> must hold text only`);
      }
    }

    this.readCategories(node, category, location, row);
    return row;
  }
}

/** Hierarchical document for an XML text, grouping rows by declared multiplicity. */
export function parseXmlDocument(xml: string, rules: MappingRules): HierarchicalDocument {
  const parser = new XMLParser({
    ignoreAttributes: false,
    attributeNamePrefix: '@_',
    ignoreDeclaration: true,
    parseTagValue: false,
    parseAttributeValue: false,
    trimValues: true,
    isArray: (_name, _jPath, _isLeafNode, isAttribute) => !isAttribute
  });

  let parsed: unknown;
  try {
    parsed = parser.parse(xml, true);
  } catch (error) {
    throw new StructuralValidationError('Hierarchical input is not well-formed XML', [
      error instanceof Error ? error.message : String(error)
    ]);
  }

  const blocks = isXmlNode(parsed) ? childNodes(parsed, BLOCK_TAG) : [];
  if (blocks.length !== 1) {
    throw new StructuralValidationError(
      `XML input must have a single <${BLOCK_TAG}> root element`
    );
  }

  const blockNode = blocks[0];
  const blockName = attributeValue(blockNode, 'datablockName');
  if (!blockName) {
    throw new StructuralValidationError(`<${BLOCK_TAG}> element has no datablockName attribute`);
  }

  const reader = new XmlDocumentReader(rules);
  const block: DocumentBlock = {};
  reader.readCategories(blockNode, null, blockName, block);

  if (reader.issues.length > 0) {
    throw new StructuralValidationError(
      `XML document has ${reader.issues.length} structural problem(s)`,
      reader.issues
    );
  }

  return { [blockName]: block };
}

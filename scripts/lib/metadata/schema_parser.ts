import { XMLParser } from 'fast-xml-parser';

import { sortRecord, type SchemaField, type SchemaMetadata } from './types.js';
import { attributeValue, childNodes, isXmlNode, type XmlNode } from '../xml_nodes.js';

const LIST_TAGS = new Set([
  'complexType',
  'element',
  'attribute',
  'sequence',
  'all',
  'choice',
  'complexContent',
  'extension'
]);

const CONTAINER_TAGS = ['sequence', 'all', 'choice', 'complexContent', 'extension'];

function stripPrefix(name: string): string {
  const colon = name.indexOf(':');
  return colon >= 0 ? name.slice(colon + 1) : name;
}

function collectFields(node: XmlNode, fields: SchemaField[]): void {
  for (const tag of CONTAINER_TAGS) {
    for (const child of childNodes(node, tag)) {
      collectFields(child, fields);
    }
  }

  for (const attribute of childNodes(node, 'attribute')) {
    const name = attributeValue(attribute, 'name') ?? attributeValue(attribute, 'ref');
    if (!name) {
      continue;
    }
    fields.push({
      name: stripPrefix(name),
      type: attributeValue(attribute, 'type'),
      kind: 'attribute',
      required: attributeValue(attribute, 'use') === 'required'
    });
  }

  for (const element of childNodes(node, 'element')) {
    // an element with an inline complex type is the row wrapper, not a field
    const inlineTypes = childNodes(element, 'complexType');
    if (inlineTypes.length > 0) {
      for (const inlineType of inlineTypes) {
        collectFields(inlineType, fields);
      }
      continue;
    }

    const name = attributeValue(element, 'name') ?? attributeValue(element, 'ref');
    if (!name) {
      continue;
    }
    fields.push({
      name: stripPrefix(name),
      type: attributeValue(element, 'type'),
      kind: 'element',
      required: attributeValue(element, 'minOccurs') !== '0'
    });
  }
}

export function parseXsdSchema(xml: string): SchemaMetadata {
  const parser = new XMLParser({
    ignoreAttributes: false,
    attributeNamePrefix: '@_',
    removeNSPrefix: true,
    parseAttributeValue: false,
    isArray: (name, _jPath, _isLeafNode, isAttribute) => !isAttribute && LIST_TAGS.has(name)
  });

  const parsed: unknown = parser.parse(xml);
  const root = isXmlNode(parsed) ? parsed.schema : undefined;
  if (!isXmlNode(root)) {
    throw new Error('XML schema source has no <schema> root element');
  }

  const complexTypes: Record<string, SchemaField[]> = {};
  for (const complexType of childNodes(root, 'complexType')) {
    const name = attributeValue(complexType, 'name');
    if (!name) {
      continue;
    }
    const fields: SchemaField[] = [];
    collectFields(complexType, fields);
    complexTypes[name] = fields;
  }

  return {
    targetNamespace: attributeValue(root, 'targetNamespace'),
    complexTypes: sortRecord(complexTypes)
  };
}

export type XmlNode = Record<string, unknown>;

export function isXmlNode(value: unknown): value is XmlNode {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function childNodes(node: XmlNode, tag: string): XmlNode[] {
  const value = node[tag];
  if (Array.isArray(value)) {
    return value.filter(isXmlNode);
  }
  return isXmlNode(value) ? [value] : [];
}

export function attributeValue(node: XmlNode, name: string): string | null {
  const value = node[`@_${name}`];
  return typeof value === 'string' ? value : null;
}

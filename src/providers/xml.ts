import { XMLParser } from 'fast-xml-parser';

/**
 * Elements that may repeat inside a Namecheap response.
 * Always parsed as arrays so a single occurrence reads the same as many.
 */
const REPEATED_ELEMENTS = new Set([
  'Error',
  'Warning',
  'Nameserver',
  'host',
  'Forward',
  'Domain',
  'DomainCheckResult',
]);

// XML parser configuration
// Values stay strings; callers convert the attributes they need.
const xmlParser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: '@_',
  parseAttributeValue: false,
  parseTagValue: false,
  trimValues: true,
  isArray: (tagName, _jPath, _isLeafNode, isAttribute) => !isAttribute && REPEATED_ELEMENTS.has(tagName),
});

/**
 * Parsed element: attributes under "@_Name", text under "#text", children by tag name
 */
export type XmlNode = Record<string, unknown>;

/**
 * @throws Error when the document is not well-formed XML
 */
export function parseXml(text: string): XmlNode {
  const parsed: unknown = xmlParser.parse(text.trim(), true);
  return isNode(parsed) ? parsed : {};
}

export function isNode(value: unknown): value is XmlNode {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * All child elements with the given tag, as raw values (element object or text)
 */
export function children(node: XmlNode | undefined, name: string): unknown[] {
  const value = node?.[name];
  if (value === undefined) {
    return [];
  }
  return Array.isArray(value) ? value : [value];
}

/**
 * First child element with the given tag.
 * An element without attributes or children parses to a bare string; it is returned as an empty node.
 */
export function child(node: XmlNode | undefined, name: string): XmlNode | undefined {
  const [first] = children(node, name);
  return first === undefined ? undefined : asNode(first);
}

/**
 * Treat an element value as a node; bare text becomes { '#text': value }
 */
export function asNode(value: unknown): XmlNode {
  return isNode(value) ? value : { '#text': value };
}

export function attr(node: XmlNode | undefined, name: string): string {
  const value = node?.[`@_${name}`];
  return value === undefined || value === null ? '' : String(value);
}

export function flag(node: XmlNode | undefined, name: string): boolean {
  return attr(node, name).toLowerCase() === 'true';
}

/**
 * Text content of an element value as returned by children()
 */
export function text(value: unknown): string {
  if (isNode(value)) {
    const inner = value['#text'];
    return inner === undefined || inner === null ? '' : String(inner);
  }
  return value === undefined || value === null ? '' : String(value);
}

/**
 * Text content of the first child element with the given tag
 */
export function childText(node: XmlNode | undefined, name: string): string {
  return text(children(node, name)[0]);
}

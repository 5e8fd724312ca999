/**
 * XML document loading.
 *
 * Documents are reduced to a small element tree: tag, string attributes and
 * child elements in document order. Text, comments, processing instructions
 * and the XML declaration are dropped; the files read here carry all of
 * their data in attributes. Attribute values are kept verbatim.
 */
import { XMLParser, XMLValidator } from 'fast-xml-parser';
import { SystemError, ErrorCodes } from './errors.js';
import { readFileSync } from './file-system.js';

export interface XmlElement {
  readonly tag: string;
  readonly attributes: Readonly<Record<string, string>>;
  readonly children: readonly XmlElement[];
}

const ATTRIBUTES_KEY = ':@';
const TEXT_KEY = '#text';

const parser = new XMLParser({
  preserveOrder: true,
  ignoreAttributes: false,
  attributeNamePrefix: '',
  ignoreDeclaration: true,
  ignorePiTags: true,
  parseAttributeValue: false,
  parseTagValue: false,
  trimValues: false,
});

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toAttributes(value: unknown): Record<string, string> {
  const attributes: Record<string, string> = {};
  if (!isRecord(value)) return attributes;
  for (const [name, attr] of Object.entries(value)) {
    if (typeof attr === 'string') {
      attributes[name] = attr;
    }
  }
  return attributes;
}

function toElements(nodes: unknown): XmlElement[] {
  const elements: XmlElement[] = [];
  if (!Array.isArray(nodes)) return elements;

  for (const node of nodes) {
    if (!isRecord(node)) continue;
    for (const [key, value] of Object.entries(node)) {
      if (key === ATTRIBUTES_KEY || key === TEXT_KEY) continue;
      elements.push({
        tag: key,
        attributes: toAttributes(node[ATTRIBUTES_KEY]),
        children: toElements(value),
      });
    }
  }
  return elements;
}

/**
 * Parse an XML document and return its root element.
 * Throws a SystemError (PARSE_ERROR) for malformed documents.
 */
export function parseXml(content: string, source = '<inline>'): XmlElement {
  const validation = XMLValidator.validate(content);
  if (validation !== true) {
    throw new SystemError(
      ErrorCodes.PARSE_ERROR,
      `Malformed XML in ${source}: ${validation.err.msg} (line ${validation.err.line})`,
      { source, line: validation.err.line, col: validation.err.col }
    );
  }

  const parsed: unknown = parser.parse(content);
  const roots = toElements(parsed);
  const [root] = roots;
  if (!root || roots.length !== 1) {
    throw new SystemError(
      ErrorCodes.PARSE_ERROR,
      `Expected exactly one root element in ${source}, found ${roots.length}`,
      { source }
    );
  }
  return root;
}

/**
 * Read and parse an XML file.
 */
export function loadXmlSync(filePath: string): XmlElement {
  let content: string;
  try {
    content = readFileSync(filePath);
  } catch (error) {
    throw new SystemError(
      ErrorCodes.FILE_UNREADABLE,
      `Failed to read XML file: ${filePath}`,
      { filePath, error }
    );
  }
  return parseXml(content, filePath);
}

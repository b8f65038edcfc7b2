import { XMLParser, XMLValidator } from 'fast-xml-parser';
import { decodeXml } from './xml-encoding';
import { XmlSyntaxError } from './xml-syntax.error';

export interface XmlAttribute {
  readonly localName: string;
  readonly prefix?: string;
  readonly namespace?: string;
  readonly value: string;
}

/**
 * Element of a parsed document with namespace prefixes resolved to URIs.
 * `namespace` is undefined for elements in no namespace.
 */
export interface XmlElement {
  readonly localName: string;
  readonly prefix?: string;
  readonly namespace?: string;
  readonly attributes: readonly XmlAttribute[];
  readonly children: readonly XmlElement[];
  /** text segments and child elements in document order */
  readonly content: readonly XmlContent[];
}

export type XmlContent = string | XmlElement;

export interface ParsedXml {
  readonly root: XmlElement;
  readonly encoding: string;
}

type NamespaceScope = ReadonlyMap<string, string>;

const XML_NAMESPACE = 'http://www.w3.org/XML/1998/namespace';
const ATTRIBUTES_KEY = ':@';
const TEXT_KEY = '#text';
const CDATA_KEY = '#cdata';

const ROOT_SCOPE: NamespaceScope = new Map([['xml', XML_NAMESPACE]]);

const PREDEFINED_ENTITIES: ReadonlyMap<string, string> = new Map([
  ['amp', '&'],
  ['lt', '<'],
  ['gt', '>'],
  ['apos', "'"],
  ['quot', '"'],
]);

const REFERENCE = /&(?:#x([0-9A-Fa-f]+);|#([0-9]+);|([A-Za-z_:][\w.:-]*);)?/g;
const INTERNAL_SUBSET = /<!DOCTYPE[^[>]*\[([\s\S]*?)\]\s*>/;
const ENTITY_DECLARATION = /<!ENTITY\s+([A-Za-z_:][\w.:-]*)\s+(?:"([^"]*)"|'([^']*)')\s*>/g;

/**
 * Decodes, checks and parses raw XML bytes into a namespace-aware tree.
 * Throws XmlSyntaxError for anything that is not a single well-formed
 * document.
 */
export function parseXml(content: Buffer): ParsedXml {
  const { text, encoding } = decodeXml(content);

  if (text.trim().length === 0) {
    throw new XmlSyntaxError('Document is empty');
  }

  const validation = XMLValidator.validate(text);
  if (validation !== true) {
    throw new XmlSyntaxError(validation.err.msg, validation.err.line, validation.err.col);
  }

  // parser entity handling is off: every text and attribute value goes through expandReferences
  const entities = readDeclaredEntities(text);
  const expand = (_name: string, value: string): string => expandReferences(value, entities);

  const parser = new XMLParser({
    preserveOrder: true,
    ignoreAttributes: false,
    attributeNamePrefix: '',
    parseTagValue: false,
    parseAttributeValue: false,
    trimValues: false,
    processEntities: false,
    cdataPropName: CDATA_KEY,
    ignoreDeclaration: true,
    ignorePiTags: true,
    tagValueProcessor: expand,
    attributeValueProcessor: expand,
  });

  const parsed: unknown = parser.parse(text);
  const { elements } = buildChildren(parsed, ROOT_SCOPE);

  if (elements.length !== 1) {
    throw new XmlSyntaxError(
      elements.length === 0 ? 'Document has no root element' : 'Document has more than one root element',
    );
  }

  return { root: elements[0], encoding };
}

/** XPath-style string value: all descendant text in document order */
export function stringValue(element: XmlElement): string {
  return element.content.map((segment) => (typeof segment === 'string' ? segment : stringValue(segment))).join('');
}

export function qualifiedName(element: XmlElement): string {
  return element.namespace ? `{${element.namespace}}${element.localName}` : element.localName;
}

/**
 * Replaces character references and references to predefined or declared
 * entities. Any other `&` makes the document malformed.
 */
function expandReferences(value: string, entities: ReadonlyMap<string, string>): string {
  if (!value.includes('&')) {
    return value;
  }

  return value.replace(
    REFERENCE,
    (reference: string, hex: string | undefined, decimal: string | undefined, name: string | undefined) => {
      if (hex !== undefined) {
        return characterFor(Number.parseInt(hex, 16), reference);
      }
      if (decimal !== undefined) {
        return characterFor(Number.parseInt(decimal, 10), reference);
      }
      if (name === undefined) {
        throw new XmlSyntaxError(`Malformed entity reference near '${value}'`);
      }

      const replacement = PREDEFINED_ENTITIES.get(name) ?? entities.get(name);
      if (replacement === undefined) {
        throw new XmlSyntaxError(`Entity '${name}' is not declared`);
      }
      return replacement;
    },
  );
}

/** Internal general entities with literal values; the first declaration of a name wins. */
function readDeclaredEntities(text: string): ReadonlyMap<string, string> {
  const entities = new Map<string, string>();
  const subset = INTERNAL_SUBSET.exec(text);
  if (!subset) {
    return entities;
  }

  for (const declaration of subset[1].matchAll(ENTITY_DECLARATION)) {
    const [, name, doubleQuoted, singleQuoted] = declaration;
    if (!entities.has(name)) {
      entities.set(name, expandReferences(doubleQuoted ?? singleQuoted ?? '', entities));
    }
  }

  return entities;
}

function characterFor(codePoint: number, reference: string): string {
  const allowed =
    codePoint === 0x9 ||
    codePoint === 0xa ||
    codePoint === 0xd ||
    (codePoint >= 0x20 && codePoint <= 0xd7ff) ||
    (codePoint >= 0xe000 && codePoint <= 0xfffd) ||
    (codePoint >= 0x10000 && codePoint <= 0x10ffff);

  if (!allowed) {
    throw new XmlSyntaxError(`Character reference '${reference}' is not a legal XML character`);
  }
  return String.fromCodePoint(codePoint);
}

function buildChildren(nodes: unknown, scope: NamespaceScope): { elements: XmlElement[]; content: XmlContent[] } {
  const elements: XmlElement[] = [];
  const content: XmlContent[] = [];

  if (!Array.isArray(nodes)) {
    return { elements, content };
  }

  for (const node of nodes) {
    if (!isRecord(node)) {
      continue;
    }

    for (const [key, value] of Object.entries(node)) {
      if (key === ATTRIBUTES_KEY) {
        continue;
      }
      if (key === TEXT_KEY) {
        appendText(content, String(value));
        continue;
      }
      if (key === CDATA_KEY) {
        appendText(content, cdataText(value));
        continue;
      }
      // comments and processing instructions
      if (key.startsWith('?') || key.startsWith('#') || key.startsWith('!')) {
        continue;
      }
      const element = buildElement(key, value, node[ATTRIBUTES_KEY], scope);
      elements.push(element);
      content.push(element);
    }
  }

  return { elements, content };
}

function appendText(content: XmlContent[], text: string): void {
  if (text.length === 0) {
    return;
  }
  const last = content.length - 1;
  const previous = content[last];
  if (typeof previous === 'string') {
    content[last] = previous + text;
  } else {
    content.push(text);
  }
}

/** CDATA sections arrive as `[{ '#text': raw }]`, with no entity expansion */
function cdataText(value: unknown): string {
  if (!Array.isArray(value)) {
    return '';
  }
  return value
    .map((part) => (isRecord(part) && part[TEXT_KEY] !== undefined ? String(part[TEXT_KEY]) : ''))
    .join('');
}

function buildElement(
  qname: string,
  rawChildren: unknown,
  rawAttributes: unknown,
  parentScope: NamespaceScope,
): XmlElement {
  const declared = isRecord(rawAttributes) ? rawAttributes : {};
  const scope = extendScope(parentScope, declared);

  const attributes: XmlAttribute[] = [];
  for (const [name, value] of Object.entries(declared)) {
    if (name === 'xmlns' || name.startsWith('xmlns:')) {
      continue;
    }
    const { prefix, localName } = splitQName(name);
    attributes.push({
      localName,
      prefix,
      // unprefixed attributes are in no namespace
      namespace: prefix ? resolvePrefix(prefix, scope) : undefined,
      value: String(value),
    });
  }

  const { prefix, localName } = splitQName(qname);
  const namespace = prefix ? resolvePrefix(prefix, scope) : scope.get('') || undefined;
  const { elements, content } = buildChildren(rawChildren, scope);

  return { localName, prefix, namespace, attributes, children: elements, content };
}

function extendScope(parent: NamespaceScope, attributes: Record<string, unknown>): NamespaceScope {
  let scope: Map<string, string> | undefined;

  for (const [name, value] of Object.entries(attributes)) {
    let prefix: string | undefined;
    if (name === 'xmlns') {
      prefix = '';
    } else if (name.startsWith('xmlns:')) {
      prefix = name.slice('xmlns:'.length);
    }
    if (prefix === undefined) {
      continue;
    }

    scope = scope ?? new Map(parent);
    scope.set(prefix, String(value));
  }

  return scope ?? parent;
}

function resolvePrefix(prefix: string, scope: NamespaceScope): string {
  const uri = scope.get(prefix);
  if (!uri) {
    throw new XmlSyntaxError(`Namespace prefix '${prefix}' is not declared`);
  }
  return uri;
}

function splitQName(name: string): { prefix?: string; localName: string } {
  const separator = name.indexOf(':');
  if (separator === -1) {
    return { localName: name };
  }
  return { prefix: name.slice(0, separator), localName: name.slice(separator + 1) };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

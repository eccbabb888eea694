import { XMLBuilder, XMLParser } from 'fast-xml-parser';
import { debugManager } from './debug-manager.js';
import { getErrorMessage } from './error-helper.js';
import { DidlError, MalformedXmlError } from '../errors/didl-errors.js';

/**
 * Namespaces used by DIDL-Lite metadata, keyed by their preferred prefix.
 * The empty prefix is the DIDL-Lite default namespace.
 */
export const NAMESPACES = {
  '': 'urn:schemas-upnp-org:metadata-1-0/DIDL-Lite/',
  dc: 'http://purl.org/dc/elements/1.1/',
  upnp: 'urn:schemas-upnp-org:metadata-1-0/upnp/',
  r: 'urn:schemas-rinconnetworks-com:metadata-1-0/',
  ms: 'http://www.sonos.com/Services/1.1',
  dlna: 'urn:schemas-dlna-org:metadata-1-0'
} as const;

export type NamespaceId = keyof typeof NAMESPACES;

const XML_NAMESPACE = 'http://www.w3.org/XML/1998/namespace';
const XML_DECLARATION = '<?xml version="1.0" encoding="UTF-8"?>';

const ATTR_PREFIX = '@_';
const TEXT_NODE = '#text';
const ATTRIBUTES_KEY = ':@';

/**
 * An XML element with namespace-resolved names.
 *
 * `tag` and qualified attribute names use Clark notation (`{uri}local`);
 * names outside any namespace are kept as the bare local name.
 */
export interface XmlElement {
  tag: string;
  attributes: Record<string, string>;
  children: XmlElement[];
  text: string | undefined;
}

export interface SerializeOptions {
  declaration?: boolean;
}

/**
 * Build the Clark-notation name for a tag in one of the known namespaces
 */
export function nsTag(nsId: NamespaceId, local: string): string {
  return `{${NAMESPACES[nsId]}}${local}`;
}

export function localName(tag: string): string {
  const end = tag.indexOf('}');
  return tag.startsWith('{') && end > 0 ? tag.slice(end + 1) : tag;
}

export function namespaceOf(tag: string): string | undefined {
  const end = tag.indexOf('}');
  return tag.startsWith('{') && end > 0 ? tag.slice(1, end) : undefined;
}

// ---------------------------------------------------------------------------
// Namespace prefix registry
// ---------------------------------------------------------------------------

const PREFIX_PATTERN = /^(?:[A-Za-z_][\w.-]*)?$/;

class NamespaceRegistry {
  private readonly uriByPrefix = new Map<string, string>();
  private readonly prefixByUri = new Map<string, string>();

  register(prefix: string, uri: string): boolean {
    if (this.uriByPrefix.get(prefix) === uri) {
      return false;
    }
    const previousUri = this.uriByPrefix.get(prefix);
    if (previousUri !== undefined) {
      this.prefixByUri.delete(previousUri);
    }
    const previousPrefix = this.prefixByUri.get(uri);
    if (previousPrefix !== undefined) {
      this.uriByPrefix.delete(previousPrefix);
    }
    this.uriByPrefix.set(prefix, uri);
    this.prefixByUri.set(uri, prefix);
    return true;
  }

  prefixFor(uri: string): string | undefined {
    return this.prefixByUri.get(uri);
  }
}

const registry = new NamespaceRegistry();
let namespacesRegistered = false;

/**
 * Register the known namespaces once per process. Safe to call repeatedly.
 */
export function ensureNamespacesRegistered(): void {
  if (namespacesRegistered) {
    return;
  }
  namespacesRegistered = true;
  for (const [prefix, uri] of Object.entries(NAMESPACES)) {
    registry.register(prefix, uri);
  }
  debugManager.debug('xml', 'Registered DIDL-Lite namespace prefixes');
}

/**
 * Register a preferred prefix for a namespace URI used when serializing.
 * Registering an identical pair again is a no-op.
 */
export function registerNamespace(prefix: string, uri: string): void {
  if (!PREFIX_PATTERN.test(prefix) || /^ns\d+$/.test(prefix) || prefix.toLowerCase().startsWith('xml')) {
    throw new DidlError(`Invalid namespace prefix '${prefix}'`, 'INVALID_NAMESPACE_PREFIX');
  }
  ensureNamespacesRegistered();
  if (registry.register(prefix, uri)) {
    debugManager.debug('xml', `Namespace prefix '${prefix}' bound to ${uri}`);
  }
}

export function registeredPrefix(uri: string): string | undefined {
  ensureNamespacesRegistered();
  return registry.prefixFor(uri);
}

// ---------------------------------------------------------------------------
// Character filtering
// ---------------------------------------------------------------------------

const ILLEGAL_XML_CHARS =
  /[\u0000-\u0008\u000B\u000C\u000E-\u001F\uFFFE\uFFFF]|[\uD800-\uDBFF](?![\uDC00-\uDFFF])|(?<![\uD800-\uDBFF])[\uDC00-\uDFFF]/g;

/**
 * Remove code points that may not appear in an XML 1.0 document
 */
export function filterIllegalXmlChars(text: string): string {
  return text.replace(ILLEGAL_XML_CHARS, '');
}

// ---------------------------------------------------------------------------
// Element helpers
// ---------------------------------------------------------------------------

export function createElement(tag: string, attributes: Record<string, string> = {}, text?: string): XmlElement {
  return { tag, attributes: { ...attributes }, children: [], text };
}

export function appendChild(
  parent: XmlElement,
  tag: string,
  text?: string,
  attributes: Record<string, string> = {}
): XmlElement {
  const child = createElement(tag, attributes, text);
  parent.children.push(child);
  return child;
}

export function findChild(element: XmlElement, tag: string): XmlElement | undefined {
  return element.children.find(child => child.tag === tag);
}

export function findChildren(element: XmlElement, tag: string): XmlElement[] {
  return element.children.filter(child => child.tag === tag);
}

/**
 * Text of the first matching child; '' when the child exists but is empty
 */
export function findChildText(element: XmlElement, tag: string): string | undefined {
  const child = findChild(element, tag);
  return child ? child.text ?? '' : undefined;
}

export function getAttribute(element: XmlElement, name: string): string | undefined {
  return Object.hasOwn(element.attributes, name) ? element.attributes[name] : undefined;
}

// ---------------------------------------------------------------------------
// Parsing
// ---------------------------------------------------------------------------

const xmlParser = new XMLParser({
  preserveOrder: true,
  ignoreAttributes: false,
  attributeNamePrefix: ATTR_PREFIX,
  textNodeName: TEXT_NODE,
  parseAttributeValue: false,
  parseTagValue: false,
  trimValues: false,
  ignoreDeclaration: true,
  ignorePiTags: true,
  htmlEntities: true
});

type NamespaceScope = ReadonlyMap<string, string>;

const ROOT_SCOPE: NamespaceScope = new Map([['xml', XML_NAMESPACE]]);

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function resolveName(name: string, scope: NamespaceScope, isAttribute: boolean): string {
  const colon = name.indexOf(':');
  if (colon < 0) {
    const defaultUri = isAttribute ? undefined : scope.get('');
    return defaultUri ? `{${defaultUri}}${name}` : name;
  }
  const prefix = name.slice(0, colon);
  const uri = scope.get(prefix);
  if (uri === undefined) {
    throw new MalformedXmlError(`unbound namespace prefix '${prefix}' in <${name}>`);
  }
  return `{${uri}}${name.slice(colon + 1)}`;
}

function convertElement(name: string, content: unknown, rawAttributes: unknown, parentScope: NamespaceScope): XmlElement {
  let scope = parentScope;
  const plainAttributes: Array<[string, string]> = [];

  if (isRecord(rawAttributes)) {
    for (const [key, value] of Object.entries(rawAttributes)) {
      const attrName = key.startsWith(ATTR_PREFIX) ? key.slice(ATTR_PREFIX.length) : key;
      const attrValue = String(value);
      if (attrName === 'xmlns' || attrName.startsWith('xmlns:')) {
        const declared = new Map(scope);
        declared.set(attrName === 'xmlns' ? '' : attrName.slice('xmlns:'.length), attrValue);
        scope = declared;
      } else {
        plainAttributes.push([attrName, attrValue]);
      }
    }
  }

  const attributes: Record<string, string> = {};
  for (const [attrName, attrValue] of plainAttributes) {
    attributes[resolveName(attrName, scope, true)] = attrValue;
  }

  const element = createElement(resolveName(name, scope, false), attributes);
  convertContent(content, scope, element);
  return element;
}

function convertContent(content: unknown, scope: NamespaceScope, target: XmlElement): void {
  if (!Array.isArray(content)) {
    return;
  }
  for (const node of content) {
    if (!isRecord(node)) {
      continue;
    }
    for (const [key, value] of Object.entries(node)) {
      if (key === ATTRIBUTES_KEY || key.startsWith('?') || key.startsWith('!')) {
        continue;
      }
      if (key === TEXT_NODE) {
        target.text = (target.text ?? '') + String(value);
        continue;
      }
      target.children.push(convertElement(key, value, node[ATTRIBUTES_KEY], scope));
    }
  }
  // Indentation between child elements is not content
  if (target.children.length > 0 && target.text !== undefined && target.text.trim() === '') {
    target.text = undefined;
  }
}

/**
 * Parse an XML document into its namespace-resolved root element.
 * Input that is not well-formed raises MalformedXmlError.
 */
export function parseXml(xml: string): XmlElement {
  const source = xml.trim();
  if (source.length === 0) {
    throw new MalformedXmlError('empty document');
  }

  let nodes: unknown;
  try {
    nodes = xmlParser.parse(source, true);
  } catch (error) {
    throw new MalformedXmlError(getErrorMessage(error));
  }

  const document = createElement('#document');
  convertContent(nodes, ROOT_SCOPE, document);
  const [root] = document.children;
  if (!root) {
    throw new MalformedXmlError('document has no root element');
  }
  debugManager.trace('xml', `Parsed <${localName(root.tag)}> with ${root.children.length} children`);
  return root;
}

// ---------------------------------------------------------------------------
// Serialization
// ---------------------------------------------------------------------------

const xmlBuilder = new XMLBuilder({
  preserveOrder: true,
  ignoreAttributes: false,
  attributeNamePrefix: ATTR_PREFIX,
  textNodeName: TEXT_NODE,
  suppressEmptyNode: true,
  format: false
});

/**
 * Choose a prefix for every namespace the tree uses. Registered prefixes win;
 * anything else gets a generated `nsN` prefix. The empty prefix is only
 * handed out when no element in the tree is outside every namespace.
 */
function assignPrefixes(root: XmlElement): Map<string, string> {
  const elementUris: string[] = [];
  const attributeUris = new Set<string>();
  let hasUnqualifiedElement = false;

  const visit = (element: XmlElement): void => {
    const uri = namespaceOf(element.tag);
    if (uri === undefined) {
      hasUnqualifiedElement = true;
    } else if (!elementUris.includes(uri)) {
      elementUris.push(uri);
    }
    for (const name of Object.keys(element.attributes)) {
      const attrUri = namespaceOf(name);
      if (attrUri !== undefined && attrUri !== XML_NAMESPACE) {
        attributeUris.add(attrUri);
        if (!elementUris.includes(attrUri)) {
          elementUris.push(attrUri);
        }
      }
    }
    element.children.forEach(visit);
  };
  visit(root);

  const prefixes = new Map<string, string>();
  let generated = 0;
  for (const uri of elementUris) {
    let prefix = registeredPrefix(uri);
    if (prefix === '' && (hasUnqualifiedElement || attributeUris.has(uri))) {
      prefix = undefined;
    }
    prefixes.set(uri, prefix ?? `ns${generated++}`);
  }
  return prefixes;
}

function qualifiedName(name: string, prefixes: ReadonlyMap<string, string>): string {
  const uri = namespaceOf(name);
  if (uri === undefined) {
    return name;
  }
  const local = localName(name);
  if (uri === XML_NAMESPACE) {
    return `xml:${local}`;
  }
  const prefix = prefixes.get(uri);
  return prefix ? `${prefix}:${local}` : local;
}

function toOrderedNode(
  element: XmlElement,
  prefixes: ReadonlyMap<string, string>,
  declarations: ReadonlyArray<[string, string]>
): Record<string, unknown> {
  const attributes: Record<string, string> = {};
  for (const [name, uri] of declarations) {
    attributes[ATTR_PREFIX + name] = uri;
  }
  for (const [name, value] of Object.entries(element.attributes)) {
    attributes[ATTR_PREFIX + qualifiedName(name, prefixes)] = filterIllegalXmlChars(value);
  }

  const children: Array<Record<string, unknown>> = [];
  const text = element.text === undefined ? '' : filterIllegalXmlChars(element.text);
  if (text.length > 0) {
    children.push({ [TEXT_NODE]: text });
  }
  for (const child of element.children) {
    children.push(toOrderedNode(child, prefixes, []));
  }

  const node: Record<string, unknown> = { [qualifiedName(element.tag, prefixes)]: children };
  if (Object.keys(attributes).length > 0) {
    node[ATTRIBUTES_KEY] = attributes;
  }
  return node;
}

/**
 * Serialize an element tree. Every namespace in use is declared once on the
 * root element, default namespace first and the rest ordered by prefix.
 */
export function serializeXml(element: XmlElement, options: SerializeOptions = {}): string {
  ensureNamespacesRegistered();
  const prefixes = assignPrefixes(element);
  const declarations: Array<[string, string]> = [...prefixes.entries()]
    .sort(([, a], [, b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([uri, prefix]) => [prefix ? `xmlns:${prefix}` : 'xmlns', uri]);

  const body: string = xmlBuilder.build([toOrderedNode(element, prefixes, declarations)]);
  debugManager.trace('xml', `Serialized <${localName(element.tag)}>`, { length: body.length });
  return options.declaration ? XML_DECLARATION + body : body;
}

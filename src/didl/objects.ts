import {
  appendChild,
  createElement,
  findChildText,
  findChildren,
  getAttribute,
  localName,
  nsTag,
  type XmlElement
} from '../utils/xml.js';
import { debugManager } from '../utils/debug-manager.js';
import { DidlMetadataError, MissingRequiredAttributeError, MissingRequiredFieldError } from '../errors/didl-errors.js';
import { parseInteger, readRequiredText, requireField, writeText } from './fields.js';
import { isItemKind, upnpClassFor } from './hierarchy.js';
import { resourceFromElement, resourceToElement } from './resource.js';
import {
  WRITE_STATUSES,
  type DidlContainerFields,
  type DidlItemFields,
  type DidlObjectFields,
  type DidlObjectKind,
  type SearchClass,
  type WriteStatus
} from './types.js';

/** Everything a constructor fills in besides identity and title */
export type Defaults<T extends DidlObjectFields> = Omit<T, 'objectId' | 'parentId' | 'title'>;

/** Field group tagged with the concrete kind it belongs to */
export type Kinded<T> = T & { readonly kind: DidlObjectKind };

export function className(kind: DidlObjectKind): string {
  return kind.charAt(0).toUpperCase() + kind.slice(1);
}

function isWriteStatus(value: string): value is WriteStatus {
  return WRITE_STATUSES.some(status => status === value);
}

function parseBooleanAttribute(value: string | undefined): boolean {
  return value === 'true' || value === 'True' || value === '1';
}

// ---------------------------------------------------------------------------
// Object (root of the hierarchy)
// ---------------------------------------------------------------------------

export function objectDefaults(kind: DidlObjectKind): Defaults<DidlObjectFields> {
  return {
    restricted: true,
    creator: '',
    writeStatus: 'NOT_WRITABLE',
    upnpClass: upnpClassFor(kind),
    resources: []
  };
}

/**
 * Base fields shared by every object. `res` children are normalized by the
 * quirks layer before they are validated.
 */
export function readObjectFields(element: XmlElement, kind: DidlObjectKind): DidlObjectFields {
  const name = className(kind);
  const expected = isItemKind(kind) ? 'item' : 'container';
  if (localName(element.tag) !== expected) {
    throw new DidlMetadataError(`${name} must be read from <${expected}>, got <${localName(element.tag)}>`);
  }
  const objectId = requireField(getAttribute(element, 'id'), 'id', name);
  const parentId = requireField(getAttribute(element, 'parentID'), 'parentID', name);
  const restricted = requireField(getAttribute(element, 'restricted'), 'restricted', name);

  let writeStatus: WriteStatus = 'NOT_WRITABLE';
  const rawWriteStatus = findChildText(element, nsTag('upnp', 'writeStatus'));
  if (rawWriteStatus) {
    if (isWriteStatus(rawWriteStatus)) {
      writeStatus = rawWriteStatus;
    } else {
      debugManager.debug('didl', `Unrecognized writeStatus '${rawWriteStatus}' on ${name} ${objectId}, using UNKNOWN`);
      writeStatus = 'UNKNOWN';
    }
  }

  return {
    objectId,
    parentId,
    title: readRequiredText(element, 'dc', 'title', name),
    restricted: parseBooleanAttribute(restricted),
    creator: findChildText(element, nsTag('dc', 'creator')) ?? '',
    writeStatus,
    upnpClass: readRequiredText(element, 'upnp', 'class', name),
    resources: findChildren(element, nsTag('', 'res')).map(res => resourceFromElement(res, { applyQuirks: true }))
  };
}

export function objectElement(
  obj: Kinded<DidlObjectFields>,
  elementName: 'item' | 'container'
): XmlElement {
  const name = className(obj.kind);
  if (!obj.title) {
    throw new MissingRequiredFieldError('dc:title', name);
  }
  if (!obj.upnpClass) {
    throw new MissingRequiredFieldError('upnp:class', name);
  }

  const element = createElement(nsTag('', elementName), {
    id: obj.objectId,
    parentID: obj.parentId,
    restricted: String(obj.restricted)
  });
  writeText(element, 'dc', 'title', obj.title);
  writeText(element, 'upnp', 'class', obj.upnpClass);
  writeText(element, 'dc', 'creator', obj.creator);
  writeText(element, 'upnp', 'writeStatus', obj.writeStatus);
  for (const resource of obj.resources) {
    element.children.push(resourceToElement(resource));
  }
  return element;
}

// ---------------------------------------------------------------------------
// Item
// ---------------------------------------------------------------------------

export function itemDefaults(kind: DidlObjectKind): Defaults<DidlItemFields> {
  return { ...objectDefaults(kind), refId: '' };
}

export function readItemFields(element: XmlElement, kind: DidlObjectKind): DidlItemFields {
  return {
    ...readObjectFields(element, kind),
    refId: getAttribute(element, 'refID') ?? ''
  };
}

export function itemElement(item: Kinded<DidlItemFields>): XmlElement {
  const element = objectElement(item, 'item');
  if (item.refId) {
    element.attributes.refID = item.refId;
  }
  return element;
}

/**
 * URI of the first resource, if the item has any
 */
export function getItemUri(item: DidlItemFields): string | undefined {
  return item.resources[0]?.uri;
}

// ---------------------------------------------------------------------------
// Container
// ---------------------------------------------------------------------------

export function containerDefaults(kind: DidlObjectKind): Defaults<DidlContainerFields> {
  return {
    ...objectDefaults(kind),
    searchable: true,
    searchClasses: [],
    createClasses: [],
    childCount: 0,
    items: [],
    containers: []
  };
}

/**
 * Owned children win over the explicit counter
 */
export function getChildCount(container: DidlContainerFields): number {
  const owned = container.items.length + container.containers.length;
  return owned > 0 ? owned : container.childCount;
}

function readSearchClass(element: XmlElement, local: 'searchClass' | 'createClass'): SearchClass {
  const includeDerived = getAttribute(element, 'includeDerived');
  if (includeDerived === undefined) {
    throw new MissingRequiredAttributeError('includeDerived', `upnp:${local}`);
  }
  return {
    className: element.text ?? '',
    includeDerived: parseBooleanAttribute(includeDerived),
    friendlyName: getAttribute(element, 'name') ?? ''
  };
}

function appendSearchClass(parent: XmlElement, local: 'searchClass' | 'createClass', searchClass: SearchClass): void {
  const attributes: Record<string, string> = { includeDerived: String(searchClass.includeDerived) };
  if (searchClass.friendlyName) {
    attributes.name = searchClass.friendlyName;
  }
  appendChild(parent, nsTag('upnp', local), searchClass.className, attributes);
}

function readChildCount(element: XmlElement): number {
  const count = parseInteger(getAttribute(element, 'childCount'));
  if (typeof count === 'string') {
    debugManager.debug('quirks', `Ignoring childCount '${count}'`);
    return 0;
  }
  return count ?? 0;
}

export function readContainerFields(element: XmlElement, kind: DidlObjectKind): DidlContainerFields {
  return {
    ...readObjectFields(element, kind),
    searchable: parseBooleanAttribute(getAttribute(element, 'searchable')),
    searchClasses: findChildren(element, nsTag('upnp', 'searchClass')).map(child => readSearchClass(child, 'searchClass')),
    createClasses: findChildren(element, nsTag('upnp', 'createClass')).map(child => readSearchClass(child, 'createClass')),
    childCount: readChildCount(element),
    items: [],
    containers: []
  };
}

export function containerElement(container: Kinded<DidlContainerFields>): XmlElement {
  const element = objectElement(container, 'container');
  element.attributes.childCount = String(getChildCount(container));
  element.attributes.searchable = String(container.searchable);
  for (const searchClass of container.searchClasses) {
    appendSearchClass(element, 'searchClass', searchClass);
  }
  for (const createClass of container.createClasses) {
    appendSearchClass(element, 'createClass', createClass);
  }
  return element;
}

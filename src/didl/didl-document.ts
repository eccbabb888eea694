import {
  createElement,
  localName,
  namespaceOf,
  NAMESPACES,
  nsTag,
  parseXml,
  serializeXml,
  type XmlElement
} from '../utils/xml.js';
import { debugManager } from '../utils/debug-manager.js';
import { DidlMetadataError } from '../errors/didl-errors.js';
import { didlObjectFromElement, didlObjectToElement } from './class-registry.js';
import type { DidlObject } from './types.js';

const ROOT_TAG = nsTag('', 'DIDL-Lite');
const OBJECT_ELEMENTS = new Set([nsTag('', 'item'), nsTag('', 'container')]);
const DESC_TAG = nsTag('', 'desc');

/**
 * A `DIDL-Lite` envelope around an ordered list of top-level objects.
 * Built from a device response or assembled to send as action metadata.
 */
export class DidlDocument {
  private readonly objects: DidlObject[] = [];

  constructor(objects: readonly DidlObject[] = []) {
    this.objects.push(...objects);
  }

  static fromElement(root: XmlElement): DidlDocument {
    if (root.tag !== ROOT_TAG) {
      throw new DidlMetadataError(`Expected <DIDL-Lite> root element, got <${localName(root.tag)}>`);
    }

    const document = new DidlDocument();
    for (const child of root.children) {
      if (OBJECT_ELEMENTS.has(child.tag)) {
        document.addItem(didlObjectFromElement(child));
      } else if (child.tag === DESC_TAG) {
        debugManager.debug('didl', 'Skipping <desc> element in DIDL-Lite document');
      } else {
        const namespace = namespaceOf(child.tag);
        throw new DidlMetadataError(
          namespace && namespace !== NAMESPACES['']
            ? `Illegal child <${localName(child.tag)}> (${namespace}) in DIDL-Lite document`
            : `Illegal child <${localName(child.tag)}> in DIDL-Lite document`
        );
      }
    }
    debugManager.debug('didl', `Parsed DIDL-Lite document with ${document.size} objects`);
    return document;
  }

  static fromXml(xml: string): DidlDocument {
    return DidlDocument.fromElement(parseXml(xml));
  }

  /**
   * Append a top-level item or container
   */
  addItem(obj: DidlObject): void {
    this.objects.push(obj);
  }

  get items(): readonly DidlObject[] {
    return this.objects;
  }

  get size(): number {
    return this.objects.length;
  }

  toElement(): XmlElement {
    const root = createElement(ROOT_TAG);
    for (const obj of this.objects) {
      root.children.push(didlObjectToElement(obj));
    }
    return root;
  }

  toXml(): string {
    return serializeXml(this.toElement());
  }
}

/**
 * Typed objects of a DIDL-Lite document string
 */
export function fromDidlString(xml: string): DidlObject[] {
  return [...DidlDocument.fromXml(xml).items];
}

/**
 * Wrap objects in a DIDL-Lite envelope, e.g. for CurrentURIMetaData
 */
export function toDidlString(...objects: DidlObject[]): string {
  return new DidlDocument(objects).toXml();
}

import {
  appendChild,
  findChildText,
  findChildren,
  nsTag,
  type NamespaceId,
  type XmlElement
} from '../utils/xml.js';
import { MissingRequiredFieldError } from '../errors/didl-errors.js';
import type { IntegerValue } from './types.js';

// Shared field-extraction idiom: a field lives in a namespaced child element.
// Absent children leave the constructor default in place.

const INTEGER_PATTERN = /^[+-]?\d+$/;

/**
 * Parse an integer-valued field. '' means absent; anything else that is not
 * an integer (`3/12`, `320.0`) comes back as the text itself.
 */
export function parseInteger(value: string | undefined): IntegerValue | undefined {
  if (value === undefined) {
    return undefined;
  }
  const trimmed = value.trim();
  if (trimmed === '') {
    return undefined;
  }
  return INTEGER_PATTERN.test(trimmed) ? Number.parseInt(trimmed, 10) : value;
}

export function readText(element: XmlElement, nsId: NamespaceId, name: string): string {
  return findChildText(element, nsTag(nsId, name)) ?? '';
}

/**
 * All matches in document order, for repeatable fields
 */
export function readTextList(element: XmlElement, nsId: NamespaceId, name: string): string[] {
  return findChildren(element, nsTag(nsId, name)).map(child => child.text ?? '');
}

export function readInteger(element: XmlElement, nsId: NamespaceId, name: string): IntegerValue | undefined {
  return parseInteger(findChildText(element, nsTag(nsId, name)));
}

export function readRequiredInteger(
  element: XmlElement,
  nsId: NamespaceId,
  name: string,
  className: string
): IntegerValue {
  return requireField(readInteger(element, nsId, name), `${nsId}:${name}`, className);
}

export function readRequiredText(element: XmlElement, nsId: NamespaceId, name: string, className: string): string {
  const value = findChildText(element, nsTag(nsId, name));
  return requireField(value === '' ? undefined : value, `${nsId}:${name}`, className);
}

export function requireField<T>(value: T | undefined, field: string, className: string): T {
  if (value === undefined) {
    throw new MissingRequiredFieldError(field, className);
  }
  return value;
}

export function writeText(
  element: XmlElement,
  nsId: NamespaceId,
  name: string,
  value: string | number | undefined
): void {
  if (value === undefined || value === '') {
    return;
  }
  appendChild(element, nsTag(nsId, name), String(value));
}

export function writeTextList(element: XmlElement, nsId: NamespaceId, name: string, values: readonly string[]): void {
  for (const value of values) {
    appendChild(element, nsTag(nsId, name), value);
  }
}

export function writeRequiredText(
  element: XmlElement,
  nsId: NamespaceId,
  name: string,
  value: string | number | undefined,
  className: string
): void {
  if (value === undefined || value === '') {
    throw new MissingRequiredFieldError(`${nsId}:${name}`, className);
  }
  appendChild(element, nsTag(nsId, name), String(value));
}

import type { ScimAttributeDefinition } from '../schemas/scim-schema-definitions';

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Plain string-keyed view of a model object. */
export function toRecord(value: object): Record<string, unknown> {
  return Object.fromEntries(Object.entries(value));
}

/**
 * Store `value` under `key` as an own enumerable property. Plain assignment
 * would hand a `__proto__` key to the prototype setter.
 */
export function setOwnProperty(target: Record<string, unknown>, key: string, value: unknown): void {
  Object.defineProperty(target, key, { value, enumerable: true, writable: true, configurable: true });
}

/** Absent, null, empty string and empty array all count as "not supplied" for requiredness. */
export function isEmptyValue(value: unknown): boolean {
  return value === undefined || value === null || value === '' || (Array.isArray(value) && value.length === 0);
}

export function isPresent(value: unknown): boolean {
  return value !== undefined && value !== null;
}

/**
 * Attribute lookup by name. RFC 7643 §2.1: "Attribute names are case insensitive".
 */
export function findAttribute(
  attributes: readonly ScimAttributeDefinition[],
  name: string,
): ScimAttributeDefinition | undefined {
  const lower = name.toLowerCase();
  return attributes.find((attr) => attr.name.toLowerCase() === lower);
}

/**
 * Join a parent path and a child segment. A parent ending in ':' is an
 * extension URN prefix, so its attributes join as `urn:...:User:manager`
 * (RFC 7644 §3.10).
 */
export function childPath(parent: string, child: string | number): string {
  if (typeof child === 'number') return `${parent}[${child}]`;
  if (!parent || parent.endsWith(':')) return `${parent}${child}`;
  return `${parent}.${child}`;
}

/** Path prefix under which an extension's attributes are reported. */
export function extensionPath(urn: string): string {
  return `${urn}:`;
}

/** `['emails', 1, 'type']` → `emails[1].type` */
export function formatPath(segments: ReadonlyArray<string | number>, base = ''): string {
  return segments.reduce<string>((acc, segment) => childPath(acc, segment), base);
}

/** Short JSON type name of a value, for messages. */
export function describeJsonType(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  return typeof value;
}

export interface ScimComplexElement {
  element: Record<string, unknown>;
  path: string;
}

/**
 * Elements of a complex attribute value with their paths: the value itself
 * when singular, every record element when multi-valued.
 */
export function complexElements(attr: ScimAttributeDefinition, value: unknown, path: string): ScimComplexElement[] {
  if (attr.multiValued) {
    if (!Array.isArray(value)) return [];
    return value.flatMap((element: unknown, index) =>
      isRecord(element) ? [{ element, path: childPath(path, index) }] : [],
    );
  }
  return isRecord(value) ? [{ element: value, path }] : [];
}

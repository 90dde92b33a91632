/**
 * Canonical text encoding of structured values.
 *
 * Items are separated by `", "` and keys by `": "`, non-ASCII characters are
 * written as-is, and mapping keys keep their insertion order (including
 * `Map` instances, which is how YAML mappings are loaded). With `indent`,
 * every item goes on its own line and item separators lose their trailing
 * space.
 */

import type { StructuredValue } from '../types/index.js';

export interface CanonicalJsonOptions {
  /** Spaces per nesting level; omit for single-line output */
  indent?: number;
}

/**
 * Whether a value is a plain object literal (not a class instance)
 */
export function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== 'object' || value === null) return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/**
 * Whether a value is a mapping or sequence
 */
export function isStructuredValue(value: unknown): value is StructuredValue {
  return Array.isArray(value) || value instanceof Map || isPlainObject(value);
}

/**
 * Serialize a value to its canonical text form
 */
export function canonicalJson(value: unknown, options: CanonicalJsonOptions = {}): string {
  return encode(value, options.indent, 0);
}

function encode(value: unknown, indent: number | undefined, depth: number): string {
  if (value === null || value === undefined) {
    return 'null';
  }

  if (Array.isArray(value)) {
    return encodeContainer(
      value.map((item: unknown) => encode(item, indent, depth + 1)),
      '[',
      ']',
      indent,
      depth
    );
  }

  if (value instanceof Map) {
    const items: string[] = [];
    for (const [key, item] of value) {
      if (item === undefined) continue;
      items.push(`${JSON.stringify(String(key))}: ${encode(item, indent, depth + 1)}`);
    }
    return encodeContainer(items, '{', '}', indent, depth);
  }

  if (isPlainObject(value)) {
    const items = Object.entries(value)
      .filter(([, item]) => item !== undefined)
      .map(([key, item]) => `${JSON.stringify(key)}: ${encode(item, indent, depth + 1)}`);
    return encodeContainer(items, '{', '}', indent, depth);
  }

  switch (typeof value) {
    case 'number':
      return Number.isFinite(value) ? JSON.stringify(value) : 'null';
    case 'bigint':
      return value.toString();
    case 'boolean':
    case 'string':
      return JSON.stringify(value);
    default:
      return JSON.stringify(String(value));
  }
}

function encodeContainer(
  items: string[],
  open: string,
  close: string,
  indent: number | undefined,
  depth: number
): string {
  if (items.length === 0) {
    return `${open}${close}`;
  }

  if (indent === undefined) {
    return `${open}${items.join(', ')}${close}`;
  }

  const inner = ' '.repeat(indent * (depth + 1));
  const outer = ' '.repeat(indent * depth);
  return `${open}\n${inner}${items.join(`,\n${inner}`)}\n${outer}${close}`;
}


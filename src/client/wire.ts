/**
 * Response shape helpers.
 *
 * REST responses arrive as `unknown`; these narrow them field by field and
 * raise ResponseShapeError with the offending path.
 */

import { ResponseShapeError } from '../errors.js';

export type JsonObject = Record<string, unknown>;

export function isObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function expectObject(value: unknown, path: string): JsonObject {
  if (!isObject(value)) {
    throw new ResponseShapeError(`Invalid response: expected object at ${path}`);
  }
  return value;
}

export function expectString(obj: JsonObject, key: string, path: string): string {
  const value = obj[key];
  if (typeof value !== 'string') {
    throw new ResponseShapeError(`Invalid response: missing string ${path}.${key}`);
  }
  return value;
}

export function optionalString(obj: JsonObject, key: string): string | null {
  const value = obj[key];
  return typeof value === 'string' && value !== '' ? value : null;
}

export function optionalNumber(obj: JsonObject, key: string): number | null {
  const value = obj[key];
  if (typeof value === 'number' && Number.isFinite(value)) return value;
  if (typeof value === 'string' && value.trim() !== '' && Number.isFinite(Number(value))) {
    return Number(value);
  }
  return null;
}

export function optionalObject(obj: JsonObject, key: string): JsonObject | null {
  const value = obj[key];
  return isObject(value) ? value : null;
}

/**
 * Unwrap the `{ users: { user: [...] } }` collection envelope. The server
 * sends `{}` (or omits the inner key) for an empty collection, and a bare
 * object instead of an array when there is exactly one item.
 */
export function collectionItems(body: JsonObject, collectionKey: string, itemKey: string): JsonObject[] {
  const collection = body[collectionKey];
  if (collection === undefined || collection === null) {
    return [];
  }
  const envelope = expectObject(collection, collectionKey);
  const items = envelope[itemKey];
  if (items === undefined || items === null) {
    return [];
  }
  const list: unknown[] = Array.isArray(items) ? items : [items];
  return list.map((item, index) => expectObject(item, `${collectionKey}.${itemKey}[${index}]`));
}

/**
 * Parse an ISO-8601 timestamp; anything unparseable is treated as absent.
 */
export function parseTimestamp(value: string | null): Date | null {
  if (value === null) return null;
  const ms = Date.parse(value);
  return Number.isNaN(ms) ? null : new Date(ms);
}

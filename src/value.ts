/**
 * JSON value types, type guards and accessors.
 * Values produced by the reader are never mutated after construction.
 */

import { JsonFatalError } from './errors.js';

export type JsonValue =
  | JsonObject
  | JsonArray
  | string
  | number
  | boolean
  | null;

export interface JsonObject {
  [key: string]: JsonValue;
}

export type JsonArray = JsonValue[];

/** Kind names as they appear in diagnostics. */
export type JsonValueKind = 'null' | 'Boolean' | 'string' | 'number' | 'object' | 'array';

export function valueKind(v: JsonValue): JsonValueKind {
  if (v === null) return 'null';
  if (typeof v === 'boolean') return 'Boolean';
  if (typeof v === 'string') return 'string';
  if (typeof v === 'number') return 'number';
  if (Array.isArray(v)) return 'array';
  return 'object';
}

/** Number value for an integer; JSON keeps no separate integer representation. */
export function int(i: number): JsonValue {
  return Math.trunc(i);
}

/** Type guard for object (and not array, which is also typeof 'object' in JSON) */
export function isObject(v: JsonValue): v is JsonObject {
  return typeof v === 'object' && v !== null && Array.isArray(v) === false;
}

export function isArray(v: JsonValue): v is JsonArray {
  return Array.isArray(v);
}

export function isString(v: JsonValue): v is string {
  return typeof v === 'string';
}

export function isNumber(v: JsonValue): v is number {
  return typeof v === 'number';
}

export function isBool(v: JsonValue): v is boolean {
  return typeof v === 'boolean';
}

export function isNull(v: JsonValue): v is null {
  return v === null;
}

export function hasMember(obj: JsonObject, name: string): boolean {
  return Object.prototype.hasOwnProperty.call(obj, name);
}

export function getMember(obj: JsonObject, name: string): JsonValue | undefined {
  return hasMember(obj, name) ? obj[name] : undefined;
}

/**
 * Store a member as an own property. Plain assignment would treat
 * `__proto__` as the prototype setter.
 */
export function setMember(obj: JsonObject, name: string, value: JsonValue): void {
  Object.defineProperty(obj, name, {
    value,
    enumerable: true,
    writable: true,
    configurable: true,
  });
}

// Accessors returning undefined when the value has another kind.

export function getBool(v: JsonValue): boolean | undefined {
  return isBool(v) ? v : undefined;
}

export function getString(v: JsonValue): string | undefined {
  return isString(v) ? v : undefined;
}

export function getNumber(v: JsonValue): number | undefined {
  return isNumber(v) ? v : undefined;
}

export function getObject(v: JsonValue): JsonObject | undefined {
  return isObject(v) ? v : undefined;
}

export function getArray(v: JsonValue): JsonArray | undefined {
  return isArray(v) ? v : undefined;
}

/** Number value truncated toward zero. */
export function getInt(v: JsonValue): number | undefined {
  return isNumber(v) ? Math.trunc(v) : undefined;
}

// As above, but the caller guarantees the kind; a mismatch is a program bug.

export function detGetBool(v: JsonValue): boolean {
  if (!isBool(v)) throw new JsonFatalError('detGetBool: not a JSON Boolean');
  return v;
}

export function detGetString(v: JsonValue): string {
  if (!isString(v)) throw new JsonFatalError('detGetString: not a JSON string');
  return v;
}

export function detGetNumber(v: JsonValue): number {
  if (!isNumber(v)) throw new JsonFatalError('detGetNumber: not a JSON number');
  return v;
}

export function detGetObject(v: JsonValue): JsonObject {
  if (!isObject(v)) throw new JsonFatalError('detGetObject: not a JSON object');
  return v;
}

export function detGetArray(v: JsonValue): JsonArray {
  if (!isArray(v)) throw new JsonFatalError('detGetArray: not a JSON array');
  return v;
}

export function detGetInt(v: JsonValue): number {
  if (!isNumber(v)) throw new JsonFatalError('detGetInt: not a JSON number');
  return Math.trunc(v);
}

function lookup(obj: JsonObject, name: string): JsonValue {
  const v = getMember(obj, name);
  if (v === undefined) {
    throw new JsonFatalError(`lookup: object has no member ${JSON.stringify(name)}`);
  }
  return v;
}

/**
 * lookup* fetch a member and return its underlying value; they throw
 * JsonFatalError when the member is missing or has another kind.
 */
export function lookupBool(obj: JsonObject, name: string): boolean {
  return detGetBool(lookup(obj, name));
}

export function lookupString(obj: JsonObject, name: string): string {
  return detGetString(lookup(obj, name));
}

export function lookupNumber(obj: JsonObject, name: string): number {
  return detGetNumber(lookup(obj, name));
}

export function lookupObject(obj: JsonObject, name: string): JsonObject {
  return detGetObject(lookup(obj, name));
}

export function lookupArray(obj: JsonObject, name: string): JsonArray {
  return detGetArray(lookup(obj, name));
}

export function lookupInt(obj: JsonObject, name: string): number {
  return detGetInt(lookup(obj, name));
}

/**
 * Explicit conversions between typed values and JSON values. Every mapping
 * is spelled out by composing codecs; nothing is inferred from runtime types.
 * A value that does not fit fails with a JsonCodecError naming where it is.
 */

import { JsonCodecError } from './errors.js';
import { escapeToken } from './pointer.js';
import {
  getMember,
  hasMember,
  isArray,
  isObject,
  setMember,
  valueKind,
  type JsonObject,
  type JsonValue,
} from './value.js';

export type CodecFailure = { readonly status: 'error'; readonly error: JsonCodecError };

export type CodecResult<T> = { readonly status: 'ok'; readonly value: T } | CodecFailure;

export interface Codec<T> {
  toJson(value: T): CodecResult<JsonValue>;
  fromJson(value: JsonValue): CodecResult<T>;
}

/** One codec per property of `T`. */
export type FieldCodecs<T> = { readonly [K in keyof T]: Codec<T[K]> };

/** Decoded field accessor handed to a record's constructor function. */
export type FieldGetter<T> = <K extends keyof T>(name: K) => T[K];

function ok<T>(value: T): CodecResult<T> {
  return { status: 'ok', value };
}

function fail(reason: string): CodecFailure {
  return { status: 'error', error: new JsonCodecError('', reason) };
}

function mismatch(expected: string, value: JsonValue): CodecFailure {
  return fail(`expected ${expected}, got ${valueKind(value)}`);
}

/** Re-root a nested failure one level down, under `token`. */
function within<T>(token: string | number, result: CodecResult<T>): CodecResult<T> {
  if (result.status === 'ok') return result;
  const { path, reason } = result.error;
  return {
    status: 'error',
    error: new JsonCodecError(`/${escapeToken(String(token))}${path}`, reason),
  };
}

function collect<A, B>(items: readonly A[], convert: (item: A) => CodecResult<B>): CodecResult<B[]> {
  const out: B[] = [];
  for (const [i, item] of items.entries()) {
    const result = within(i, convert(item));
    if (result.status === 'error') return result;
    out.push(result.value);
  }
  return ok(out);
}

/** Undefined when the object has exactly the members named. */
function checkMembers(obj: JsonObject, names: readonly string[]): CodecFailure | undefined {
  for (const name of names) {
    if (!hasMember(obj, name)) return fail(`missing member ${JSON.stringify(name)}`);
  }
  for (const name of Object.keys(obj)) {
    if (!names.includes(name)) return fail(`unexpected member ${JSON.stringify(name)}`);
  }
  return undefined;
}

function isChar(s: string): boolean {
  return [...s].length === 1;
}

export const bool: Codec<boolean> = {
  toJson: (value) => ok(value),
  fromJson: (value) => (typeof value === 'boolean' ? ok(value) : mismatch('Boolean', value)),
};

export const string: Codec<string> = {
  toJson: (value) => ok(value),
  fromJson: (value) => (typeof value === 'string' ? ok(value) : mismatch('string', value)),
};

/** Finite numbers only. */
export const number: Codec<number> = {
  toJson: (value) =>
    Number.isFinite(value) ? ok(value) : fail(`cannot convert non-finite number ${value}`),
  fromJson: (value) => (typeof value === 'number' ? ok(value) : mismatch('number', value)),
};

/** Numbers without a fractional part. */
export const integer: Codec<number> = {
  toJson: (value) => (Number.isInteger(value) ? ok(value) : fail(`${value} is not an integer`)),
  fromJson: (value) => {
    if (typeof value !== 'number') return mismatch('number', value);
    return Number.isInteger(value) ? ok(value) : fail(`${value} is not an integer`);
  },
};

/** A string holding exactly one code point. */
export const char: Codec<string> = {
  toJson: (value) =>
    isChar(value) ? ok(value) : fail(`${JSON.stringify(value)} is not a single character`),
  fromJson: (value) => {
    if (typeof value !== 'string') return mismatch('string', value);
    return isChar(value) ? ok(value) : fail(`${JSON.stringify(value)} is not a single character`);
  },
};

/** `null` stands for absence; any other value goes through `codec`. */
export function nullable<T>(codec: Codec<T>): Codec<T | null> {
  return {
    toJson: (value) => (value === null ? ok(null) : codec.toJson(value)),
    fromJson: (value) => (value === null ? ok(null) : codec.fromJson(value)),
  };
}

export function array<T>(codec: Codec<T>): Codec<T[]> {
  return {
    toJson: (values) => collect(values, (item) => codec.toJson(item)),
    fromJson: (value) =>
      isArray(value) ? collect(value, (item) => codec.fromJson(item)) : mismatch('array', value),
  };
}

/** A string-literal union, written as the name itself. */
export function enumeration<E extends string>(names: readonly E[]): Codec<E> {
  const expected = names.map((n) => JSON.stringify(n)).join(', ');
  return {
    toJson: (value) => ok(value),
    fromJson: (value) => {
      if (typeof value !== 'string') return mismatch('string', value);
      const name = names.find((n) => n === value);
      return name === undefined
        ? fail(`${JSON.stringify(value)} is not one of ${expected}`)
        : ok(name);
    },
  };
}

/** A pair as the object `{"fst": a, "snd": b}`. */
export function pair<A, B>(fst: Codec<A>, snd: Codec<B>): Codec<[A, B]> {
  return {
    toJson: ([a, b]) => {
      const first = within('fst', fst.toJson(a));
      if (first.status === 'error') return first;
      const second = within('snd', snd.toJson(b));
      if (second.status === 'error') return second;
      const obj: JsonObject = {};
      setMember(obj, 'fst', first.value);
      setMember(obj, 'snd', second.value);
      return ok(obj);
    },
    fromJson: (value) => {
      if (!isObject(value)) return mismatch('object', value);
      const shapeError = checkMembers(value, ['fst', 'snd']);
      if (shapeError) return shapeError;
      const first = within('fst', fst.fromJson(getMember(value, 'fst') ?? null));
      if (first.status === 'error') return first;
      const second = within('snd', snd.fromJson(getMember(value, 'snd') ?? null));
      if (second.status === 'error') return second;
      const decoded: [A, B] = [first.value, second.value];
      return ok(decoded);
    },
  };
}

/**
 * An object with one member per field of `T`. Decoding checks every field,
 * then builds the value with `make`, which reads the decoded fields through
 * its getter:
 *
 *   record<Point>({ x: integer, y: integer }, (get) => ({ x: get('x'), y: get('y') }))
 */
export function record<T extends object>(
  fields: FieldCodecs<T>,
  make: (get: FieldGetter<T>) => T
): Codec<T> {
  const names = Object.keys(fields);
  return {
    toJson: (value) => {
      const obj: JsonObject = {};
      for (const name in fields) {
        const result = within(name, fields[name].toJson(value[name]));
        if (result.status === 'error') return result;
        setMember(obj, name, result.value);
      }
      return ok(obj);
    },
    fromJson: (value) => {
      if (!isObject(value)) return mismatch('object', value);
      const obj = value;
      const shapeError = checkMembers(obj, names);
      if (shapeError) return shapeError;

      const decodeField = <K extends keyof T>(name: K): CodecResult<T[K]> => {
        const key = String(name);
        return within(key, fields[name].fromJson(getMember(obj, key) ?? null));
      };
      for (const name in fields) {
        const result = decodeField(name);
        if (result.status === 'error') return result;
      }
      const get: FieldGetter<T> = (name) => {
        const result = decodeField(name);
        if (result.status === 'error') throw result.error;
        return result.value;
      };
      try {
        return ok(make(get));
      } catch (err) {
        if (err instanceof JsonCodecError) return { status: 'error', error: err };
        throw err;
      }
    },
  };
}

/** As `codec.fromJson`, throwing the JsonCodecError instead of returning it. */
export function detFromJson<T>(codec: Codec<T>, value: JsonValue): T {
  const result = codec.fromJson(value);
  if (result.status === 'error') throw result.error;
  return result.value;
}

export function detToJson<T>(codec: Codec<T>, value: T): JsonValue {
  const result = codec.toJson(value);
  if (result.status === 'error') throw result.error;
  return result.value;
}

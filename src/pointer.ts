/**
 * JSON Pointer (RFC 6901) resolution against a value tree. Read-only: there
 * is no add, remove or replace.
 */

import { JsonFatalError, JsonPointerError } from './errors.js';
import { getMember, isArray, isObject, type JsonValue } from './value.js';

export type PointerResult =
  | { readonly status: 'ok'; readonly value: JsonValue }
  | { readonly status: 'error'; readonly error: JsonPointerError };

const ARRAY_INDEX = /^(0|[1-9][0-9]*)$/;

/** `~1` becomes `/`, then `~0` becomes `~`; `~01` is therefore `~1`. */
export function unescapeToken(token: string): string {
  return token.replace(/~1/g, '/').replace(/~0/g, '~');
}

export function escapeToken(token: string): string {
  return token.replace(/~/g, '~0').replace(/\//g, '~1');
}

/** Unescaped reference tokens, or undefined when the pointer is malformed. */
export function parsePointer(pointer: string): string[] | undefined {
  if (pointer === '') return [];
  if (!pointer.startsWith('/')) return undefined;
  return pointer.slice(1).split('/').map(unescapeToken);
}

export function formatPointer(tokens: readonly string[]): string {
  return tokens.map((t) => `/${escapeToken(t)}`).join('');
}

/**
 * Resolve `pointer` in `document`. Every failure (malformed pointer, missing
 * member, bad index, scalar in the path) is the same cannot_resolve error;
 * only the message says which it was.
 */
export function resolve(document: JsonValue, pointer: string): PointerResult {
  const tokens = parsePointer(pointer);
  if (tokens === undefined) {
    return unresolved(pointer, "pointer must be empty or start with '/'");
  }

  let current = document;
  for (const token of tokens) {
    if (isObject(current)) {
      const member = getMember(current, token);
      if (member === undefined) {
        return unresolved(pointer, `object has no member ${JSON.stringify(token)}`);
      }
      current = member;
    } else if (isArray(current)) {
      if (!ARRAY_INDEX.test(token)) {
        return unresolved(pointer, `${JSON.stringify(token)} is not an array index`);
      }
      const element = current[Number(token)];
      if (element === undefined) {
        return unresolved(pointer, `index ${token} is out of range`);
      }
      current = element;
    } else {
      return unresolved(pointer, `cannot index into a scalar with ${JSON.stringify(token)}`);
    }
  }
  return { status: 'ok', value: current };
}

/** As resolve, for pointers the caller knows are valid; throws JsonFatalError otherwise. */
export function detResolve(document: JsonValue, pointer: string): JsonValue {
  const result = resolve(document, pointer);
  if (result.status === 'error') {
    throw new JsonFatalError('detResolve: resolve failed', { cause: result.error });
  }
  return result.value;
}

function unresolved(pointer: string, message: string): PointerResult {
  return { status: 'error', error: new JsonPointerError(pointer, message) };
}

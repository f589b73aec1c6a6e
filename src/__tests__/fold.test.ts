import { describe, expect, it, vi } from 'vitest';
import { JsonParseError, type FoldResult } from '../errors.js';
import type { ReaderOptions } from '../options.js';
import { JsonReader, parse } from '../reader.js';
import { StringStream } from '../stream.js';
import { getNumber, getString, type JsonValue } from '../value.js';

function reader(text: string, options?: ReaderOptions): JsonReader {
  return new JsonReader(new StringStream(text, 'fold.json'), options);
}

const sum = (value: JsonValue, acc: number): number => acc + (getNumber(value) ?? 0);

function partial<A>(result: FoldResult<A>): { partial: A; error: JsonParseError } {
  if (result.status !== 'error') throw new Error(`expected error, got ${result.status}`);
  if (!(result.error instanceof JsonParseError)) throw result.error;
  return { partial: result.partial, error: result.error };
}

describe('arrayFold', () => {
  it('folds every element', () => {
    expect(reader('[1, 2, 3.5]').arrayFold(sum, 0)).toEqual({ status: 'ok', value: 6.5 });
  });

  it('returns the initial accumulator for an empty array', () => {
    expect(reader('[]').arrayFold(sum, 10)).toEqual({ status: 'ok', value: 10 });
  });

  it('passes nested values fully built', () => {
    const seen: JsonValue[] = [];
    const result = reader('[[1, 2], {"a": [3]}]').arrayFold((value, n: number) => {
      seen.push(value);
      return n + 1;
    }, 0);
    expect(result).toEqual({ status: 'ok', value: 2 });
    expect(seen).toEqual([[1, 2], { a: [3] }]);
  });

  it('keeps the partial result when an element is malformed', () => {
    const { partial: acc, error } = partial(reader('[1,2,bad]').arrayFold(sum, 0));
    expect(acc).toBe(3);
    expect(error.desc).toEqual({ kind: 'syntax_error', where: 'bad' });
    expect(error.context).toEqual({ streamName: 'fold.json', line: 1, column: 6 });
  });

  it('keeps the partial result when the input is truncated', () => {
    const { partial: acc, error } = partial(reader('[1, 2, 3').arrayFold(sum, 0));
    expect(acc).toBe(6);
    expect(error.desc).toEqual({ kind: 'unexpected_eof', message: "expected ',' or ']'" });
  });

  it('visits each element before reading the next delimiter', () => {
    const visitor = vi.fn(sum);
    const result = reader('[1 2]').arrayFold(visitor, 0);
    expect(visitor).toHaveBeenCalledTimes(1);
    expect(partial(result).partial).toBe(1);
  });

  it('honours trailing commas', () => {
    expect(partial(reader('[1,]').arrayFold(sum, 0)).partial).toBe(1);
    expect(reader('[1,]', { allowTrailingCommas: true }).arrayFold(sum, 0)).toEqual({
      status: 'ok',
      value: 1,
    });
  });

  it('consumes a value of the wrong shape and reports it', () => {
    const r = reader('{"a": 1} [5]');
    const { partial: acc, error } = partial(r.arrayFold(sum, 0));
    expect(acc).toBe(0);
    expect(error.desc).toEqual({
      kind: 'unexpected_value',
      valueKind: 'object',
      message: 'value must be an array',
    });
    expect(r.arrayFold(sum, 0)).toEqual({ status: 'ok', value: 5 });
  });

  it('returns eof at the end of the stream', () => {
    expect(reader('  ').arrayFold(sum, 0)).toEqual({ status: 'eof' });
  });

  it('lets visitor exceptions propagate', () => {
    const r = reader('[1, 2]');
    expect(() =>
      r.arrayFold(() => {
        throw new Error('stop');
      }, 0)
    ).toThrow('stop');
  });

  it('lets a parse error raised by the visitor propagate as thrown', () => {
    const r = reader('["[1]", "{bad", "[3]"]');
    let thrown: unknown;
    try {
      r.arrayFold((value, n: number) => {
        parse(getString(value) ?? '');
        return n + 1;
      }, 0);
    } catch (err) {
      thrown = err;
    }
    expect(thrown).toBeInstanceOf(JsonParseError);
    if (!(thrown instanceof JsonParseError)) return;
    expect(thrown.context).toEqual({ streamName: '<string>', line: 1, column: 2 });
    expect(thrown.desc).toEqual({ kind: 'syntax_error', where: 'bad' });
  });

  it('threads external state through a closure', () => {
    let maximum = -Infinity;
    const result = reader('[4, 9, 2]').arrayFold((value, count: number) => {
      maximum = Math.max(maximum, getNumber(value) ?? maximum);
      return count + 1;
    }, 0);
    expect(result).toEqual({ status: 'ok', value: 3 });
    expect(maximum).toBe(9);
  });
});

describe('objectFold', () => {
  type Pairs = Array<[string, JsonValue]>;
  const collect = (name: string, value: JsonValue, acc: Pairs): Pairs => [...acc, [name, value]];

  it('visits members in document order', () => {
    expect(reader('{"b": 1, "a": [2, 3]}').objectFold(collect, [])).toEqual({
      status: 'ok',
      value: [
        ['b', 1],
        ['a', [2, 3]],
      ],
    });
  });

  it('keeps the members read before an error', () => {
    const { partial: acc, error } = partial(reader('{"a": 1, "b": tru}').objectFold(collect, []));
    expect(acc).toEqual([['a', 1]]);
    expect(error.desc).toEqual({ kind: 'syntax_error', where: 'tru' });
  });

  it('applies the repeated-member policy', () => {
    const text = '{"a": 1, "a": 2}';
    const rejected = partial(reader(text).objectFold(collect, []));
    expect(rejected.partial).toEqual([['a', 1]]);
    expect(rejected.error.desc).toEqual({ kind: 'duplicate_object_member', name: 'a' });

    expect(reader(text, { repeatedMembers: 'keep-first' }).objectFold(collect, [])).toEqual({
      status: 'ok',
      value: [['a', 1]],
    });
    expect(reader(text, { repeatedMembers: 'keep-last' }).objectFold(collect, [])).toEqual({
      status: 'ok',
      value: [
        ['a', 1],
        ['a', 2],
      ],
    });
  });

  it('reports a value that is not an object', () => {
    const { partial: acc, error } = partial(reader('"str"').objectFold(collect, []));
    expect(acc).toEqual([]);
    expect(error.message).toBe('unexpected string value: value must be an object');
  });

  it('lets a parse error raised by the visitor propagate as thrown', () => {
    const r = reader('{"ok": "1", "bad": "[1,"}');
    const parseMember = (name: string, value: JsonValue, acc: Pairs): Pairs => [
      ...acc,
      [name, parse(getString(value) ?? '')],
    ];
    expect(() => r.objectFold(parseMember, [])).toThrow(JsonParseError);
  });

  it('folds an empty object', () => {
    expect(reader('{}').objectFold(collect, [])).toEqual({ status: 'ok', value: [] });
  });
});

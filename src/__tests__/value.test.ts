import { describe, expect, it } from 'vitest';
import { JsonFatalError } from '../errors.js';
import {
  detGetArray,
  detGetBool,
  detGetInt,
  detGetNumber,
  detGetObject,
  detGetString,
  getArray,
  getBool,
  getInt,
  getNumber,
  getObject,
  getString,
  int,
  isArray,
  isBool,
  isNull,
  isNumber,
  isObject,
  isString,
  lookupArray,
  lookupBool,
  lookupInt,
  lookupNumber,
  lookupObject,
  lookupString,
  setMember,
  valueKind,
  type JsonObject,
  type JsonValue,
} from '../value.js';

describe('type guards', () => {
  it('distinguish objects from arrays and null', () => {
    expect(isObject({})).toBe(true);
    expect(isObject([])).toBe(false);
    expect(isObject(null)).toBe(false);
    expect(isArray([])).toBe(true);
    expect(isNull(null)).toBe(true);
    expect(isBool(false)).toBe(true);
    expect(isString('')).toBe(true);
    expect(isNumber(0)).toBe(true);
  });

  it('name value kinds', () => {
    const values: JsonValue[] = [null, true, 's', 1, {}, []];
    expect(values.map(valueKind)).toEqual([
      'null',
      'Boolean',
      'string',
      'number',
      'object',
      'array',
    ]);
  });
});

describe('get accessors', () => {
  it('return the value or undefined', () => {
    expect(getBool(true)).toBe(true);
    expect(getBool(1)).toBeUndefined();
    expect(getString('x')).toBe('x');
    expect(getString(null)).toBeUndefined();
    expect(getNumber(2.5)).toBe(2.5);
    expect(getObject({ a: 1 })).toEqual({ a: 1 });
    expect(getObject([])).toBeUndefined();
    expect(getArray([1])).toEqual([1]);
    expect(getArray({})).toBeUndefined();
  });

  it('truncate numbers toward zero for getInt', () => {
    expect(getInt(2.9)).toBe(2);
    expect(getInt(-2.9)).toBe(-2);
    expect(getInt('2')).toBeUndefined();
    expect(int(7.5)).toBe(7);
  });
});

describe('det accessors', () => {
  it('return the underlying value', () => {
    expect(detGetBool(false)).toBe(false);
    expect(detGetString('s')).toBe('s');
    expect(detGetNumber(1.5)).toBe(1.5);
    expect(detGetObject({})).toEqual({});
    expect(detGetArray([])).toEqual([]);
    expect(detGetInt(-3.7)).toBe(-3);
  });

  it('throw a fatal error on the wrong kind', () => {
    expect(() => detGetBool(null)).toThrow(new JsonFatalError('detGetBool: not a JSON Boolean'));
    expect(() => detGetString(1)).toThrow('detGetString: not a JSON string');
    expect(() => detGetNumber('1')).toThrow('detGetNumber: not a JSON number');
    expect(() => detGetObject([])).toThrow('detGetObject: not a JSON object');
    expect(() => detGetArray({})).toThrow('detGetArray: not a JSON array');
    expect(() => detGetInt(true)).toThrow('detGetInt: not a JSON number');
  });
});

describe('lookup accessors', () => {
  const obj: JsonObject = { flag: true, name: 'n', size: 4.2, child: { x: 1 }, list: [1], nil: null };

  it('return typed members', () => {
    expect(lookupBool(obj, 'flag')).toBe(true);
    expect(lookupString(obj, 'name')).toBe('n');
    expect(lookupNumber(obj, 'size')).toBe(4.2);
    expect(lookupInt(obj, 'size')).toBe(4);
    expect(lookupObject(obj, 'child')).toEqual({ x: 1 });
    expect(lookupArray(obj, 'list')).toEqual([1]);
  });

  it('throw when the member is missing or has another kind', () => {
    expect(() => lookupString(obj, 'missing')).toThrow('lookup: object has no member "missing"');
    expect(() => lookupString(obj, 'toString')).toThrow(JsonFatalError);
    expect(() => lookupObject(obj, 'nil')).toThrow('detGetObject: not a JSON object');
  });
});

describe('setMember', () => {
  it('defines __proto__ as an own enumerable member', () => {
    const obj: JsonObject = {};
    setMember(obj, '__proto__', 1);
    expect(Object.keys(obj)).toEqual(['__proto__']);
    expect(Object.getPrototypeOf(obj)).toBe(Object.prototype);
  });
});

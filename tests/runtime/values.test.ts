/**
 * Quill Runtime Tests: Value Model
 * Rendering, truthiness, equality and constructors
 */

import { describe, expect, it } from 'vitest';
import {
  boolValue,
  builtinValue,
  codePointLength,
  compareCodePoints,
  compareRenderings,
  describeUnknown,
  createFuture,
  errorValue,
  floatValue,
  formatFloat,
  inspect,
  intValue,
  isNumeric,
  isTruthy,
  listValue,
  lookupBuiltin,
  mapFromRecord,
  mapValue,
  NULL_VALUE,
  stringValue,
  typeOf,
  valueEquals,
  type QuillValue,
} from '../../src/index.js';

function registered(name: string): QuillValue {
  const definition = lookupBuiltin(name);
  if (definition === undefined) throw new Error(`missing ${name}`);
  return builtinValue(definition);
}

describe('Quill Runtime: Value Model', () => {
  describe('intValue', () => {
    it('wraps to signed 64 bits', () => {
      expect(intValue(2n ** 63n).value).toBe(-(2n ** 63n));
      expect(intValue(-(2n ** 63n) - 1n).value).toBe(2n ** 63n - 1n);
    });

    it('accepts integral numbers', () => {
      expect(intValue(42).value).toBe(42n);
    });
  });

  describe('typeOf', () => {
    it('reports the discriminant of every variant', () => {
      expect(typeOf(intValue(1))).toBe('INTEGER');
      expect(typeOf(floatValue(1))).toBe('FLOAT');
      expect(typeOf(stringValue(''))).toBe('STRING');
      expect(typeOf(boolValue(true))).toBe('BOOL');
      expect(typeOf(NULL_VALUE)).toBe('NULL');
      expect(typeOf(listValue())).toBe('LIST');
      expect(typeOf(mapValue())).toBe('MAP');
      expect(typeOf(errorValue('x'))).toBe('ERROR');
      expect(typeOf(registered('len'))).toBe('BUILTIN');
      expect(typeOf(createFuture())).toBe('FUTURE');
    });
  });

  describe('formatFloat', () => {
    it('prints whole floats without a fraction', () => {
      expect(formatFloat(3)).toBe('3');
      expect(formatFloat(5.5)).toBe('5.5');
    });

    it('expands exponent notation', () => {
      expect(formatFloat(1.5e-7)).toBe('0.00000015');
      expect(formatFloat(1e21)).toBe('1000000000000000000000');
      expect(formatFloat(-2.5e-7)).toBe('-0.00000025');
    });

    it('names the special values', () => {
      expect(formatFloat(Infinity)).toBe('+Inf');
      expect(formatFloat(-Infinity)).toBe('-Inf');
      expect(formatFloat(NaN)).toBe('NaN');
      expect(formatFloat(-0)).toBe('-0');
    });
  });

  describe('inspect', () => {
    it('renders scalars', () => {
      expect(inspect(intValue(-7))).toBe('-7');
      expect(inspect(stringValue('hi'))).toBe('hi');
      expect(inspect(boolValue(false))).toBe('false');
      expect(inspect(NULL_VALUE)).toBe('null');
    });

    it('renders nested lists', () => {
      const value = listValue([
        intValue(1),
        listValue([stringValue('a'), floatValue(2.5)]),
      ]);
      expect(inspect(value)).toBe('[1, [a, 2.5]]');
    });

    it('renders maps with quoted keys', () => {
      const value = mapFromRecord({ name: stringValue('x'), n: intValue(2) });
      expect(inspect(value)).toBe('{"name": x, "n": 2}');
    });

    it('renders errors, builtins and futures', () => {
      expect(inspect(errorValue('boom'))).toBe('ERROR: boom');
      expect(inspect(registered('len'))).toBe('builtin function');
      expect(inspect(createFuture())).toBe('future');
    });
  });

  describe('isTruthy', () => {
    it('treats empty and zero values as false', () => {
      const falsy: QuillValue[] = [
        NULL_VALUE,
        boolValue(false),
        intValue(0),
        floatValue(0),
        stringValue(''),
        listValue(),
        mapValue(),
      ];
      for (const value of falsy) {
        expect(isTruthy(value)).toBe(false);
      }
    });

    it('treats errors, builtins and futures as true', () => {
      expect(isTruthy(errorValue('x'))).toBe(true);
      expect(isTruthy(registered('len'))).toBe(true);
      expect(isTruthy(createFuture())).toBe(true);
      expect(isTruthy(stringValue('0'))).toBe(true);
    });
  });

  describe('valueEquals', () => {
    it('compares scalar payloads', () => {
      expect(valueEquals(intValue(3), intValue(3))).toBe(true);
      expect(valueEquals(stringValue('a'), stringValue('b'))).toBe(false);
      expect(valueEquals(NULL_VALUE, NULL_VALUE)).toBe(true);
    });

    it('never promotes across numeric types', () => {
      expect(valueEquals(intValue(1), floatValue(1))).toBe(false);
    });

    it('treats NaN as unequal to itself', () => {
      const nan = floatValue(NaN);
      expect(valueEquals(nan, nan)).toBe(false);
    });

    it('never equates containers, even with themselves', () => {
      const list = listValue([intValue(1)]);
      const map = mapValue();
      expect(valueEquals(list, list)).toBe(false);
      expect(valueEquals(map, map)).toBe(false);
    });
  });

  describe('listValue', () => {
    it('copies and freezes the element array', () => {
      const source: QuillValue[] = [intValue(1)];
      const list = listValue(source);
      source.push(intValue(2));
      expect(list.elements).toHaveLength(1);
      expect(Object.isFrozen(list.elements)).toBe(true);
    });
  });

  describe('helpers', () => {
    it('orders values by rendering', () => {
      expect(compareRenderings(intValue(10), intValue(9))).toBe(-1);
      expect(compareRenderings(stringValue('b'), stringValue('a'))).toBe(1);
      expect(compareRenderings(stringValue('1'), intValue(1))).toBe(0);
    });

    it('compares strings by code point rather than UTF-16 unit', () => {
      expect(compareCodePoints('\uFF01', '\u{1F600}')).toBe(-1);
      expect(compareCodePoints('\u{1F600}', '\uFF01')).toBe(1);
      expect(compareCodePoints('ab', 'abc')).toBe(-1);
      expect(compareCodePoints('a\u{1F600}', 'a\u{1F600}')).toBe(0);
    });

    it('describes host values without throwing', () => {
      expect(describeUnknown(new Error('bad'))).toBe('bad');
      expect(describeUnknown(42)).toBe('42');
      expect(describeUnknown(Object.create(null))).toBe('[object Object]');
      const hostile = {
        toString(): string {
          throw new Error('no text');
        },
      };
      expect(describeUnknown(hostile)).toBe('[object Object]');
    });

    it('counts code points', () => {
      expect(codePointLength('héllo')).toBe(5);
      expect(codePointLength('a😀b')).toBe(3);
    });

    it('recognizes numeric variants', () => {
      expect(isNumeric(intValue(1))).toBe(true);
      expect(isNumeric(floatValue(1))).toBe(true);
      expect(isNumeric(stringValue('1'))).toBe(false);
    });
  });
});

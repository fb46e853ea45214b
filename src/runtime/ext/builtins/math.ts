/**
 * Math Builtins
 *
 * The binary arithmetic builtins take operands of any type and defer to
 * operators.ts, which coerces before dispatching on the operand pair.
 *
 * @internal - Not part of public API
 */

import { createErrorValue } from '../../../error-classes.js';
import {
  defineBuiltin,
  type BuiltinDefinition,
} from '../../core/callable.js';
import {
  add,
  divide,
  modulo,
  multiply,
  power,
  subtract,
} from '../../core/operators.js';
import {
  floatValue,
  intValue,
  type QuillFloat,
  type QuillInteger,
  type QuillValue,
} from '../../core/values.js';

type Numeric = QuillInteger | QuillFloat;

/** Round half away from zero */
function roundHalfAway(value: number): number {
  return Math.sign(value) * Math.round(Math.abs(value));
}

/** Apply a float operation; integers pass through unchanged */
function integral(
  value: Numeric,
  operation: (x: number) => number
): QuillValue {
  return value.type === 'INTEGER' ? value : floatValue(operation(value.value));
}

function pick(
  a: Numeric,
  b: Numeric,
  choose: (x: number, y: number) => number,
  preferLeft: (x: bigint, y: bigint) => boolean
): QuillValue {
  if (a.type === 'INTEGER' && b.type === 'INTEGER') {
    return preferLeft(a.value, b.value) ? a : b;
  }
  return floatValue(choose(Number(a.value), Number(b.value)));
}

const ANY_PAIR = [
  { name: 'left', type: 'ANY' },
  { name: 'right', type: 'ANY' },
] as const;

const NUMBER_PAIR = [
  { name: 'left', type: 'NUMBER' },
  { name: 'right', type: 'NUMBER' },
] as const;

const NUMBER_PARAM = [{ name: 'value', type: 'NUMBER' }] as const;

export const MATH_BUILTINS: readonly BuiltinDefinition[] = [
  defineBuiltin('Add', {
    description: 'Sum of numbers, or concatenation when a string is involved',
    params: ANY_PAIR,
    fn: ([left, right], ctx) => add(left, right, ctx),
  }),

  defineBuiltin('Subtract', {
    description: 'Difference of two numbers',
    params: ANY_PAIR,
    fn: ([left, right], ctx) => subtract(left, right, ctx),
  }),

  defineBuiltin('Multiply', {
    description: 'Product of two numbers',
    params: ANY_PAIR,
    fn: ([left, right], ctx) => multiply(left, right, ctx),
  }),

  defineBuiltin('Divide', {
    description: 'Quotient; integer operands truncate toward zero',
    params: ANY_PAIR,
    fn: ([left, right], ctx) => divide(left, right, ctx),
  }),

  defineBuiltin('mod', {
    description: 'Remainder with the sign of the dividend',
    params: ANY_PAIR,
    fn: ([left, right], ctx) => modulo(left, right, ctx),
  }),

  defineBuiltin('Power', {
    description: 'Base raised to an exponent',
    params: NUMBER_PAIR,
    fn: ([base, exponent], ctx) => power(base, exponent, ctx),
  }),

  defineBuiltin('Sqrt', {
    description: 'Square root as a float',
    params: NUMBER_PARAM,
    fn: ([value]) => {
      const x = Number(value.value);
      if (x < 0) {
        return createErrorValue('QUILL-R007', { functionName: 'Sqrt' });
      }
      return floatValue(Math.sqrt(x));
    },
  }),

  defineBuiltin('Abs', {
    description: 'Absolute value',
    params: NUMBER_PARAM,
    fn: ([value]) =>
      value.type === 'INTEGER'
        ? intValue(value.value < 0n ? -value.value : value.value)
        : floatValue(Math.abs(value.value)),
  }),

  defineBuiltin('Round', {
    description: 'Nearest whole number, halves away from zero',
    params: NUMBER_PARAM,
    fn: ([value]) => integral(value, roundHalfAway),
  }),

  defineBuiltin('floor', {
    description: 'Largest whole number not above the value',
    params: NUMBER_PARAM,
    fn: ([value]) => integral(value, Math.floor),
  }),

  defineBuiltin('ceil', {
    description: 'Smallest whole number not below the value',
    params: NUMBER_PARAM,
    fn: ([value]) => integral(value, Math.ceil),
  }),

  defineBuiltin('Min', {
    description: 'Smaller of two numbers',
    params: NUMBER_PAIR,
    fn: ([a, b]) => pick(a, b, Math.min, (x, y) => x < y),
  }),

  defineBuiltin('Max', {
    description: 'Larger of two numbers',
    params: NUMBER_PAIR,
    fn: ([a, b]) => pick(a, b, Math.max, (x, y) => x > y),
  }),
];

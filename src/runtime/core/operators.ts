/**
 * Binary Operators
 *
 * Arithmetic and equality entry points shared by the math builtins and the
 * interpreter's binary operators. Every operator coerces its operands first
 * (see coerce.ts) and reports failures as ERROR values.
 */

import { createErrorValue } from '../../error-classes.js';
import { emitRuntimeEvent } from '../ext/extensions.js';
import { coerce, type CoercionResult } from './coerce.js';
import type { RuntimeContext } from './types.js';
import {
  boolValue,
  floatValue,
  intValue,
  stringValue,
  valueEquals,
  type QuillBool,
  type QuillValue,
} from './values.js';

/** Context subset used to report coercions */
export type OperatorContext = Pick<RuntimeContext, 'callbacks'>;

/** Coerce an operand pair, reporting a value_coerced event on change */
export function coerceOperands(
  left: QuillValue,
  right: QuillValue,
  operator: string,
  ctx?: OperatorContext
): CoercionResult {
  const result = coerce(left, right, operator);
  if (result.changed && ctx !== undefined) {
    emitRuntimeEvent(ctx, {
      event: 'value_coerced',
      subsystem: 'coerce',
      operator,
      from: [left.type, right.type],
      to: [result.left.type, result.right.type],
    });
  }
  return result;
}

function unsupported(
  operator: string,
  left: QuillValue,
  right: QuillValue
): QuillValue {
  return createErrorValue('QUILL-R006', {
    operator,
    leftType: left.type,
    rightType: right.type,
  });
}

// ============================================================
// ARITHMETIC
// ============================================================

/** +: numeric sum or string concatenation */
export function add(
  left: QuillValue,
  right: QuillValue,
  ctx?: OperatorContext
): QuillValue {
  const { left: a, right: b } = coerceOperands(left, right, '+', ctx);
  if (a.type === 'INTEGER' && b.type === 'INTEGER') {
    return intValue(a.value + b.value);
  }
  if (a.type === 'FLOAT' && b.type === 'FLOAT') {
    return floatValue(a.value + b.value);
  }
  if (a.type === 'STRING' && b.type === 'STRING') {
    return stringValue(a.value + b.value);
  }
  return unsupported('+', left, right);
}

export function subtract(
  left: QuillValue,
  right: QuillValue,
  ctx?: OperatorContext
): QuillValue {
  const { left: a, right: b } = coerceOperands(left, right, '-', ctx);
  if (a.type === 'INTEGER' && b.type === 'INTEGER') {
    return intValue(a.value - b.value);
  }
  if (a.type === 'FLOAT' && b.type === 'FLOAT') {
    return floatValue(a.value - b.value);
  }
  return unsupported('-', left, right);
}

export function multiply(
  left: QuillValue,
  right: QuillValue,
  ctx?: OperatorContext
): QuillValue {
  const { left: a, right: b } = coerceOperands(left, right, '*', ctx);
  if (a.type === 'INTEGER' && b.type === 'INTEGER') {
    return intValue(a.value * b.value);
  }
  if (a.type === 'FLOAT' && b.type === 'FLOAT') {
    return floatValue(a.value * b.value);
  }
  return unsupported('*', left, right);
}

/**
 * /: integer operands divide with truncation toward zero; a float on either
 * side gives a float. A zero divisor is an ERROR value.
 */
export function divide(
  left: QuillValue,
  right: QuillValue,
  ctx?: OperatorContext
): QuillValue {
  const { left: a, right: b } = coerceOperands(left, right, '/', ctx);
  if (a.type === 'INTEGER' && b.type === 'INTEGER') {
    if (b.value === 0n) {
      return createErrorValue('QUILL-R004', { operation: 'division' });
    }
    return intValue(a.value / b.value);
  }
  if (a.type === 'FLOAT' && b.type === 'FLOAT') {
    if (b.value === 0) {
      return createErrorValue('QUILL-R004', { operation: 'division' });
    }
    return floatValue(a.value / b.value);
  }
  return unsupported('/', left, right);
}

/** %: remainder with the sign of the dividend */
export function modulo(
  left: QuillValue,
  right: QuillValue,
  ctx?: OperatorContext
): QuillValue {
  const { left: a, right: b } = coerceOperands(left, right, '%', ctx);
  if (a.type === 'INTEGER' && b.type === 'INTEGER') {
    if (b.value === 0n) {
      return createErrorValue('QUILL-R004', { operation: 'modulo' });
    }
    return intValue(a.value % b.value);
  }
  if (a.type === 'FLOAT' && b.type === 'FLOAT') {
    if (b.value === 0) {
      return createErrorValue('QUILL-R004', { operation: 'modulo' });
    }
    return floatValue(a.value % b.value);
  }
  return unsupported('%', left, right);
}

/** Exponentiation by squaring, wrapped to 64 bits at every step */
function wrappingPow(base: bigint, exponent: bigint): bigint {
  let result = 1n;
  let factor = BigInt.asIntN(64, base);
  let remaining = exponent;
  while (remaining > 0n) {
    if ((remaining & 1n) === 1n) {
      result = BigInt.asIntN(64, result * factor);
    }
    factor = BigInt.asIntN(64, factor * factor);
    remaining >>= 1n;
  }
  return result;
}

/**
 * **: an INTEGER base with a non-negative INTEGER exponent stays INTEGER
 * (wrapping on overflow); every other numeric pair gives a FLOAT.
 */
export function power(
  left: QuillValue,
  right: QuillValue,
  ctx?: OperatorContext
): QuillValue {
  if (left.type === 'INTEGER' && right.type === 'INTEGER') {
    if (right.value >= 0n) {
      return intValue(wrappingPow(left.value, right.value));
    }
    return floatValue(Number(left.value) ** Number(right.value));
  }
  const { left: a, right: b } = coerceOperands(left, right, '**', ctx);
  if (a.type === 'FLOAT' && b.type === 'FLOAT') {
    return floatValue(a.value ** b.value);
  }
  return unsupported('**', left, right);
}

// ============================================================
// EQUALITY
// ============================================================

/** ==: no numeric promotion; containers are never equal */
export function equals(left: QuillValue, right: QuillValue): QuillBool {
  return boolValue(valueEquals(left, right));
}

export function notEquals(left: QuillValue, right: QuillValue): QuillBool {
  return boolValue(!valueEquals(left, right));
}

/**
 * Numeric Coercion
 *
 * Operand normalization applied before binary arithmetic.
 */

import {
  floatValue,
  inspect,
  isNumeric,
  stringValue,
  type QuillValue,
} from './values.js';

/** Result of coercing an operand pair */
export interface CoercionResult {
  readonly left: QuillValue;
  readonly right: QuillValue;
  /** True when either operand was converted */
  readonly changed: boolean;
}

/** Types that concatenate with a string under + */
export function isDisplayable(value: QuillValue): boolean {
  switch (value.type) {
    case 'INTEGER':
    case 'FLOAT':
    case 'BOOL':
    case 'NULL':
    case 'STRING':
      return true;
    default:
      return false;
  }
}

function widen(value: QuillValue): QuillValue {
  return value.type === 'INTEGER' ? floatValue(Number(value.value)) : value;
}

/**
 * Normalize an operand pair for a binary operator.
 *
 * - INTEGER with FLOAT (either order): the integer is widened to FLOAT
 * - under '+', STRING with a displayable non-string: the other side is
 *   rendered to STRING
 * - anything else passes through unchanged
 *
 * Idempotent: coercing an already coerced pair reports changed = false.
 *
 * @example
 * coerce(intValue(2), floatValue(3.5), '+')
 * // { left: FLOAT 2, right: FLOAT 3.5, changed: true }
 */
export function coerce(
  left: QuillValue,
  right: QuillValue,
  operator: string
): CoercionResult {
  if (isNumeric(left) && isNumeric(right)) {
    if (left.type === right.type) {
      return { left, right, changed: false };
    }
    return { left: widen(left), right: widen(right), changed: true };
  }

  if (operator === '+') {
    if (
      left.type === 'STRING' &&
      right.type !== 'STRING' &&
      isDisplayable(right)
    ) {
      return { left, right: stringValue(inspect(right)), changed: true };
    }
    if (
      right.type === 'STRING' &&
      left.type !== 'STRING' &&
      isDisplayable(left)
    ) {
      return { left: stringValue(inspect(left)), right, changed: true };
    }
  }

  return { left, right, changed: false };
}

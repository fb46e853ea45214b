/**
 * Conversion Builtins
 *
 * @internal - Not part of public API
 */

import { createErrorValue } from '../../../error-classes.js';
import {
  defineBuiltin,
  type BuiltinDefinition,
} from '../../core/callable.js';
import { coerce } from '../../core/coerce.js';
import {
  assertNever,
  boolValue,
  FALSE_VALUE,
  floatValue,
  formatFloat,
  inspect,
  intValue,
  isTruthy,
  mapFromRecord,
  stringValue,
  TRUE_VALUE,
  type QuillValue,
} from '../../core/values.js';

const DECIMAL_PATTERN = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;
const INFINITY_PATTERN = /^([+-]?)inf(?:inity)?$/i;
const NAN_PATTERN = /^[+-]?nan$/i;
const INTEGER_PATTERN = /^[+-]?\d+$/;

const INT64_MIN = -(2n ** 63n);
const INT64_MAX = 2n ** 63n - 1n;
const TWO_POW_63 = 2 ** 63;

/**
 * Parse decimal float text; undefined when it is not a number or its
 * magnitude is beyond the float range. Infinity and NaN come only from
 * their spellings.
 */
export function parseDecimal(text: string): number | undefined {
  if (DECIMAL_PATTERN.test(text)) {
    const parsed = Number(text);
    return Number.isFinite(parsed) ? parsed : undefined;
  }
  const infinity = INFINITY_PATTERN.exec(text);
  if (infinity !== null) return infinity[1] === '-' ? -Infinity : Infinity;
  if (NAN_PATTERN.test(text)) return NaN;
  return undefined;
}

/** Parse base-10 signed 64-bit integer text; undefined when out of range */
export function parseInteger(text: string): bigint | undefined {
  if (!INTEGER_PATTERN.test(text)) return undefined;
  const value = BigInt(text);
  return value >= INT64_MIN && value <= INT64_MAX ? value : undefined;
}

function render(value: QuillValue): QuillValue {
  return stringValue(inspect(value));
}

export const CONVERSION_BUILTINS: readonly BuiltinDefinition[] = [
  defineBuiltin('ToString', {
    description: 'Rendered text of any value',
    params: [{ name: 'value', type: 'ANY' }],
    fn: ([value]) => render(value),
  }),

  defineBuiltin('string_list', {
    description: 'Rendered text of any value',
    params: [{ name: 'value', type: 'ANY' }],
    fn: ([value]) => render(value),
  }),

  defineBuiltin('string_map', {
    description: 'Rendered text of any value',
    params: [{ name: 'value', type: 'ANY' }],
    fn: ([value]) => render(value),
  }),

  defineBuiltin('ToNumber', {
    description: 'Float from a string or number',
    params: [{ name: 'value', type: ['STRING', 'INTEGER', 'FLOAT'] }],
    fn: ([value]) => {
      switch (value.type) {
        case 'FLOAT':
          return value;
        case 'INTEGER':
          return floatValue(Number(value.value));
        case 'STRING': {
          const parsed = parseDecimal(value.value);
          return parsed === undefined
            ? createErrorValue('QUILL-R005', {
                subject: `string '${value.value}'`,
                target: 'number',
              })
            : floatValue(parsed);
        }
        default:
          return assertNever(value);
      }
    },
  }),

  defineBuiltin('ToInt', {
    description: 'Integer from a string or number; floats truncate',
    params: [{ name: 'value', type: ['STRING', 'INTEGER', 'FLOAT'] }],
    fn: ([value]) => {
      switch (value.type) {
        case 'INTEGER':
          return value;
        case 'FLOAT': {
          const truncated = Math.trunc(value.value);
          if (
            !Number.isFinite(truncated) ||
            truncated < -TWO_POW_63 ||
            truncated >= TWO_POW_63
          ) {
            return createErrorValue('QUILL-R005', {
              subject: `float ${formatFloat(value.value)}`,
              target: 'int',
            });
          }
          return intValue(BigInt(truncated));
        }
        case 'STRING': {
          const parsed = parseInteger(value.value);
          return parsed === undefined
            ? createErrorValue('QUILL-R005', {
                subject: `string '${value.value}'`,
                target: 'int',
              })
            : intValue(parsed);
        }
        default:
          return assertNever(value);
      }
    },
  }),

  defineBuiltin('ToBool', {
    description: 'Truthiness of any value',
    params: [{ name: 'value', type: 'ANY' }],
    fn: ([value]) => boolValue(isTruthy(value)),
  }),

  defineBuiltin('auto_cast', {
    description:
      'Numeric promotion of a pair: {left_casted, right_casted, changed} or false',
    params: [
      { name: 'left', type: 'ANY' },
      { name: 'right', type: 'ANY' },
    ],
    fn: ([left, right]) => {
      const result = coerce(left, right, '');
      if (!result.changed) return FALSE_VALUE;
      return mapFromRecord({
        left_casted: result.left,
        right_casted: result.right,
        changed: TRUE_VALUE,
      });
    },
  }),
];

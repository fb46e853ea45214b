/**
 * Utility Builtins
 *
 * @internal - Not part of public API
 */

import {
  defineBuiltin,
  defineVariadicBuiltin,
  type BuiltinDefinition,
} from '../../core/callable.js';
import {
  boolValue,
  inspect,
  NULL_VALUE,
  stringValue,
  type QuillValue,
} from '../../core/values.js';

function isEmptyValue(value: QuillValue): boolean {
  switch (value.type) {
    case 'STRING':
      return value.value.length === 0;
    case 'LIST':
      return value.elements.length === 0;
    case 'MAP':
      return value.pairs.size === 0;
    default:
      return false;
  }
}

export const UTILITY_BUILTINS: readonly BuiltinDefinition[] = [
  defineBuiltin('TypeOf', {
    description: 'Type name of a value',
    params: [{ name: 'value', type: 'ANY' }],
    fn: ([value]) => stringValue(value.type),
  }),

  defineBuiltin('IsNull', {
    description: 'True for null',
    params: [{ name: 'value', type: 'ANY' }],
    fn: ([value]) => boolValue(value.type === 'NULL'),
  }),

  defineBuiltin('IsEmpty', {
    description: 'True for an empty string, list or map',
    params: [{ name: 'value', type: 'ANY' }],
    fn: ([value]) => boolValue(isEmptyValue(value)),
  }),

  defineVariadicBuiltin('print', {
    description: 'Write rendered arguments, space separated, as one line',
    fn: (args, ctx) => {
      ctx.callbacks.onLog(args.map(inspect).join(' '));
      return NULL_VALUE;
    },
  }),
];

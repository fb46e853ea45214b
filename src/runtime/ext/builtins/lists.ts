/**
 * List Builtins
 *
 * Every operation returns a new list; arguments are never mutated.
 *
 * @internal - Not part of public API
 */

import { createErrorValue } from '../../../error-classes.js';
import {
  defineBuiltin,
  type BuiltinDefinition,
} from '../../core/callable.js';
import {
  assertNever,
  boolValue,
  codePointLength,
  compareRenderings,
  intValue,
  listValue,
  NULL_VALUE,
  valueEquals,
  type QuillList,
  type QuillValue,
} from '../../core/values.js';

function indexOf(list: QuillList, needle: QuillValue): number {
  return list.elements.findIndex((element) => valueEquals(element, needle));
}

function sorted(list: QuillList): QuillList {
  return listValue([...list.elements].sort(compareRenderings));
}

function reversed(list: QuillList): QuillList {
  return listValue([...list.elements].reverse());
}

/** Clamp an optional bound to [0, length] */
function clampBound(
  bound: QuillValue,
  fallback: number,
  length: number
): number {
  if (bound.type !== 'INTEGER') return fallback;
  if (bound.value < 0n) return 0;
  if (bound.value > BigInt(length)) return length;
  return Number(bound.value);
}

export const LIST_BUILTINS: readonly BuiltinDefinition[] = [
  defineBuiltin('len', {
    description: 'Length of a string (code points), list or map',
    params: [{ name: 'value', type: ['STRING', 'LIST', 'MAP'] }],
    fn: ([value]) => {
      switch (value.type) {
        case 'STRING':
          return intValue(codePointLength(value.value));
        case 'LIST':
          return intValue(value.elements.length);
        case 'MAP':
          return intValue(value.pairs.size);
        default:
          return assertNever(value);
      }
    },
  }),

  defineBuiltin('append', {
    description: 'New list with an element added at the end',
    params: [
      { name: 'list', type: 'LIST' },
      { name: 'element', type: 'ANY' },
    ],
    fn: ([list, element]) => listValue([...list.elements, element]),
  }),

  defineBuiltin('prepend', {
    description: 'New list with an element added at the start',
    params: [
      { name: 'list', type: 'LIST' },
      { name: 'element', type: 'ANY' },
    ],
    fn: ([list, element]) => listValue([element, ...list.elements]),
  }),

  defineBuiltin('slice', {
    description: 'Elements from start (inclusive) to end (exclusive)',
    params: [
      { name: 'list', type: 'LIST' },
      { name: 'start', type: 'INTEGER' },
      { name: 'end', type: 'INTEGER' },
    ],
    fn: ([list, start, end]) => {
      const { length } = list.elements;
      if (
        start.value < 0n ||
        end.value > BigInt(length) ||
        start.value > end.value
      ) {
        return createErrorValue('QUILL-R003', {
          functionName: 'slice',
          start: start.value,
          end: end.value,
          subject: 'list',
          length,
        });
      }
      return listValue(
        list.elements.slice(Number(start.value), Number(end.value))
      );
    },
  }),

  defineBuiltin('sort', {
    description: 'Stable sort by rendered text',
    params: [{ name: 'list', type: 'LIST' }],
    fn: ([list]) => sorted(list),
  }),

  defineBuiltin('reverse', {
    description: 'Elements in reverse order',
    params: [{ name: 'list', type: 'LIST' }],
    fn: ([list]) => reversed(list),
  }),

  defineBuiltin('ListPush', {
    description: 'New list with an element added at the end',
    params: [
      { name: 'list', type: 'LIST' },
      { name: 'element', type: 'ANY' },
    ],
    fn: ([list, element]) => listValue([...list.elements, element]),
  }),

  defineBuiltin('ListUnshift', {
    description: 'New list with an element added at the start',
    params: [
      { name: 'list', type: 'LIST' },
      { name: 'element', type: 'ANY' },
    ],
    fn: ([list, element]) => listValue([element, ...list.elements]),
  }),

  defineBuiltin('ListPop', {
    description: 'Last element, or null when empty',
    params: [{ name: 'list', type: 'LIST' }],
    fn: ([list]) => list.elements.at(-1) ?? NULL_VALUE,
  }),

  defineBuiltin('ListShift', {
    description: 'First element, or null when empty',
    params: [{ name: 'list', type: 'LIST' }],
    fn: ([list]) => list.elements[0] ?? NULL_VALUE,
  }),

  defineBuiltin('ListIndexOf', {
    description: 'Index of the first equal element, or -1',
    params: [
      { name: 'list', type: 'LIST' },
      { name: 'needle', type: 'ANY' },
    ],
    fn: ([list, needle]) => intValue(indexOf(list, needle)),
  }),

  defineBuiltin('ListIncludes', {
    description: 'True when an element equals the needle',
    params: [
      { name: 'list', type: 'LIST' },
      { name: 'needle', type: 'ANY' },
    ],
    fn: ([list, needle]) => boolValue(indexOf(list, needle) >= 0),
  }),

  defineBuiltin('ListSlice', {
    description: 'Slice with clamped bounds; null means the list edge',
    params: [
      { name: 'list', type: 'LIST' },
      { name: 'start', type: ['INTEGER', 'NULL'] },
      { name: 'end', type: ['INTEGER', 'NULL'] },
    ],
    fn: ([list, start, end]) => {
      const { length } = list.elements;
      const from = clampBound(start, 0, length);
      const to = clampBound(end, length, length);
      return listValue(from > to ? [] : list.elements.slice(from, to));
    },
  }),

  defineBuiltin('ListReverse', {
    description: 'Elements in reverse order',
    params: [{ name: 'list', type: 'LIST' }],
    fn: ([list]) => reversed(list),
  }),

  defineBuiltin('ListSort', {
    description: 'Stable sort by rendered text',
    params: [{ name: 'list', type: 'LIST' }],
    fn: ([list]) => sorted(list),
  }),

  defineBuiltin('ListConcat', {
    description: 'Elements of the first list followed by the second',
    params: [
      { name: 'first', type: 'LIST' },
      { name: 'second', type: 'LIST' },
    ],
    fn: ([first, second]) =>
      listValue([...first.elements, ...second.elements]),
  }),

  defineBuiltin('ListAt', {
    description: 'Element at an index, bounds-checked',
    params: [
      { name: 'list', type: 'LIST' },
      { name: 'index', type: 'INTEGER' },
    ],
    fn: ([list, index]) => {
      const { length } = list.elements;
      if (index.value < 0n) {
        return createErrorValue('QUILL-R015', { index: index.value });
      }
      const element =
        index.value < BigInt(length)
          ? list.elements[Number(index.value)]
          : undefined;
      return (
        element ??
        createErrorValue('QUILL-R014', { index: index.value, length })
      );
    },
  }),
];

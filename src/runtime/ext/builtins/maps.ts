/**
 * Map Builtins
 *
 * Keys are strings. Updates copy the pair table; the argument map is
 * never modified. Key order of listings is unspecified.
 *
 * @internal - Not part of public API
 */

import {
  defineBuiltin,
  type BuiltinDefinition,
} from '../../core/callable.js';
import {
  boolValue,
  intValue,
  listValue,
  mapValue,
  NULL_VALUE,
  stringValue,
  type QuillMap,
  type QuillValue,
} from '../../core/values.js';

function withKey(map: QuillMap, key: string, value: QuillValue): QuillMap {
  const pairs = new Map(map.pairs);
  pairs.set(key, value);
  return { type: 'MAP', pairs };
}

function withoutKey(map: QuillMap, key: string): QuillMap {
  const pairs = new Map(map.pairs);
  pairs.delete(key);
  return { type: 'MAP', pairs };
}

const MAP_PARAM = { name: 'map', type: 'MAP' } as const;
const KEY_PARAM = { name: 'key', type: 'STRING' } as const;

/**
 * Register one operation under each of its names.
 * The lower-case and Pascal-case spellings behave identically.
 */
function aliased(
  names: readonly string[],
  build: (name: string) => BuiltinDefinition
): BuiltinDefinition[] {
  return names.map(build);
}

export const MAP_BUILTINS: readonly BuiltinDefinition[] = [
  ...aliased(['map_get', 'MapGet'], (name) =>
    defineBuiltin(name, {
      description: 'Value stored under a key, or null when missing',
      params: [MAP_PARAM, KEY_PARAM],
      fn: ([map, key]) => map.pairs.get(key.value) ?? NULL_VALUE,
    })
  ),

  ...aliased(['map_set', 'MapSet'], (name) =>
    defineBuiltin(name, {
      description: 'New map with the key inserted or overwritten',
      params: [MAP_PARAM, KEY_PARAM, { name: 'value', type: 'ANY' }],
      fn: ([map, key, value]) => withKey(map, key.value, value),
    })
  ),

  ...aliased(['map_has', 'MapHas'], (name) =>
    defineBuiltin(name, {
      description: 'True when the key is present',
      params: [MAP_PARAM, KEY_PARAM],
      fn: ([map, key]) => boolValue(map.pairs.has(key.value)),
    })
  ),

  ...aliased(['map_keys', 'MapKeys'], (name) =>
    defineBuiltin(name, {
      description: 'List of keys',
      params: [MAP_PARAM],
      fn: ([map]) => listValue(Array.from(map.pairs.keys(), stringValue)),
    })
  ),

  ...aliased(['map_values', 'MapValues'], (name) =>
    defineBuiltin(name, {
      description: 'List of values',
      params: [MAP_PARAM],
      fn: ([map]) => listValue(map.pairs.values()),
    })
  ),

  defineBuiltin('MapEntries', {
    description: 'List of [key, value] lists',
    params: [MAP_PARAM],
    fn: ([map]) =>
      listValue(
        Array.from(map.pairs, ([key, value]) =>
          listValue([stringValue(key), value])
        )
      ),
  }),

  defineBuiltin('MapDelete', {
    description: 'New map without the key',
    params: [MAP_PARAM, KEY_PARAM],
    fn: ([map, key]) => withoutKey(map, key.value),
  }),

  defineBuiltin('MapClear', {
    description: 'New empty map',
    params: [MAP_PARAM],
    fn: () => mapValue(),
  }),

  defineBuiltin('MapSize', {
    description: 'Number of keys',
    params: [MAP_PARAM],
    fn: ([map]) => intValue(map.pairs.size),
  }),
];

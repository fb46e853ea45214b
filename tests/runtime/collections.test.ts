/**
 * Quill Runtime Tests: Collection Builtins
 * List and map operations, including copy-on-write behavior
 */

import { describe, expect, it } from 'vitest';
import {
  floatValue,
  inspect,
  intValue,
  listValue,
  mapFromRecord,
  mapValue,
  NULL_VALUE,
  stringValue,
  type QuillValue,
} from '../../src/index.js';
import { call, render } from '../helpers/runtime.js';

function ints(...values: number[]): QuillValue {
  return listValue(values.map((value) => intValue(value)));
}

describe('Quill Runtime: List Builtins', () => {
  describe('len', () => {
    it('measures strings in code points, lists and maps', async () => {
      expect(await render('len', [stringValue('héllo')])).toBe('5');
      expect(await render('len', [ints(1, 2, 3)])).toBe('3');
      expect(
        await render('len', [mapFromRecord({ a: NULL_VALUE })])
      ).toBe('1');
    });
  });

  describe('append and prepend', () => {
    it('return new lists and leave the argument untouched', async () => {
      const list = ints(1, 2);
      expect(await render('append', [list, intValue(3)])).toBe('[1, 2, 3]');
      expect(await render('prepend', [list, intValue(0)])).toBe('[0, 1, 2]');
      expect(inspect(list)).toBe('[1, 2]');
    });
  });

  describe('slice', () => {
    it('returns the half-open range', async () => {
      expect(
        await render('slice', [ints(1, 2, 3, 4), intValue(1), intValue(3)])
      ).toBe('[2, 3]');
      expect(
        await render('slice', [ints(1, 2), intValue(2), intValue(2)])
      ).toBe('[]');
    });

    it('rejects out-of-range bounds', async () => {
      expect(
        await render('slice', [ints(1, 2, 3), intValue(1), intValue(5)])
      ).toBe(
        'ERROR: slice indices out of bounds: start 1, end 5 for list length 3'
      );
      expect(
        await render('slice', [ints(1, 2, 3), intValue(2), intValue(1)])
      ).toBe(
        'ERROR: slice indices out of bounds: start 2, end 1 for list length 3'
      );
    });

    it('rejects a negative start that ListSlice clamps', async () => {
      const list = ints(1, 2, 3);
      expect(
        await render('slice', [list, intValue(-1), intValue(2)])
      ).toBe(
        'ERROR: slice indices out of bounds: start -1, end 2 for list length 3'
      );
      expect(
        await render('ListSlice', [list, intValue(-1), intValue(2)])
      ).toBe('[1, 2]');
    });
  });

  describe('ListSlice', () => {
    it('clamps where slice fails', async () => {
      expect(
        await render('ListSlice', [ints(1, 2, 3), intValue(1), intValue(5)])
      ).toBe('[2, 3]');
      expect(
        await render('ListSlice', [ints(1, 2, 3), intValue(-4), intValue(2)])
      ).toBe('[1, 2]');
    });

    it('treats null bounds as the list edges', async () => {
      expect(
        await render('ListSlice', [ints(1, 2, 3), NULL_VALUE, NULL_VALUE])
      ).toBe('[1, 2, 3]');
      expect(
        await render('ListSlice', [ints(1, 2, 3), intValue(2), NULL_VALUE])
      ).toBe('[3]');
    });

    it('returns an empty list when start passes end', async () => {
      expect(
        await render('ListSlice', [ints(1, 2, 3), intValue(2), intValue(1)])
      ).toBe('[]');
    });
  });

  describe('sort and reverse', () => {
    it('sorts by rendering, stably', async () => {
      const list = listValue([
        intValue(10),
        intValue(9),
        stringValue('10'),
        floatValue(1.5),
      ]);
      const sorted = await call('sort', [list]);
      expect(inspect(sorted)).toBe('[1.5, 10, 10, 9]');
      expect(sorted.type === 'LIST' && sorted.elements[1]).toEqual(
        intValue(10)
      );
      expect(sorted.type === 'LIST' && sorted.elements[2]).toEqual(
        stringValue('10')
      );
      expect(inspect(list)).toBe('[10, 9, 10, 1.5]');
    });

    it('reverses without touching the argument', async () => {
      const list = ints(1, 2, 3);
      expect(await render('reverse', [list])).toBe('[3, 2, 1]');
      expect(await render('ListReverse', [list])).toBe('[3, 2, 1]');
      expect(await render('ListSort', [ints(3, 1, 2)])).toBe('[1, 2, 3]');
      expect(inspect(list)).toBe('[1, 2, 3]');
    });

    it('reversing twice restores the rendering', async () => {
      const list = listValue([intValue(1), stringValue('b'), NULL_VALUE]);
      const once = await call('reverse', [list]);
      expect(inspect(await call('reverse', [once]))).toBe(inspect(list));
    });

    it('sorting a sorted list changes nothing', async () => {
      const list = listValue([
        stringValue('pear'),
        intValue(7),
        stringValue('apple'),
        floatValue(0.5),
      ]);
      const once = await call('sort', [list]);
      expect(inspect(once)).toBe('[0.5, 7, apple, pear]');
      expect(inspect(await call('sort', [once]))).toBe(inspect(once));
    });

    it('orders renderings by code point', async () => {
      const list = listValue([stringValue('\u{1F600}'), stringValue('\uFF01')]);
      expect(await render('sort', [list])).toBe('[\uFF01, \u{1F600}]');
    });
  });

  describe('List* operations', () => {
    it('push and unshift', async () => {
      expect(await render('ListPush', [ints(1), intValue(2)])).toBe('[1, 2]');
      expect(await render('ListUnshift', [ints(1), intValue(0)])).toBe(
        '[0, 1]'
      );
    });

    it('pop and shift read the ends without changing the list', async () => {
      const list = ints(1, 2, 3);
      expect(await render('ListPop', [list])).toBe('3');
      expect(await render('ListShift', [list])).toBe('1');
      expect(await render('ListPop', [listValue()])).toBe('null');
      expect(inspect(list)).toBe('[1, 2, 3]');
    });

    it('find elements by value equality', async () => {
      const list = listValue([intValue(1), stringValue('a'), intValue(1)]);
      expect(await render('ListIndexOf', [list, intValue(1)])).toBe('0');
      expect(await render('ListIndexOf', [list, floatValue(1)])).toBe('-1');
      expect(await render('ListIncludes', [list, stringValue('a')])).toBe(
        'true'
      );
    });

    it('never find containers', async () => {
      const inner = ints(1);
      const list = listValue([inner]);
      expect(await render('ListIncludes', [list, inner])).toBe('false');
    });

    it('concatenate', async () => {
      expect(await render('ListConcat', [ints(1), ints(2, 3)])).toBe(
        '[1, 2, 3]'
      );
    });

    it('access by index with bounds checks', async () => {
      const list = ints(7, 8);
      expect(await render('ListAt', [list, intValue(1)])).toBe('8');
      expect(await render('ListAt', [list, intValue(2)])).toBe(
        'ERROR: array index out of bounds: 2 (length: 2)'
      );
      expect(await render('ListAt', [list, intValue(-1)])).toBe(
        'ERROR: array index cannot be negative: -1'
      );
    });
  });
});

describe('Quill Runtime: Map Builtins', () => {
  const base = mapFromRecord({ a: intValue(1) });

  it('map_set returns a new map and keeps the original', async () => {
    const updated = await call('map_set', [base, stringValue('b'), intValue(2)]);
    expect(await render('map_get', [updated, stringValue('b')])).toBe('2');
    expect(await render('map_has', [base, stringValue('b')])).toBe('false');
    expect(await render('MapSize', [base])).toBe('1');
  });

  it('overwrites existing keys', async () => {
    const updated = await call('MapSet', [base, stringValue('a'), intValue(9)]);
    expect(await render('MapGet', [updated, stringValue('a')])).toBe('9');
    expect(await render('MapGet', [base, stringValue('a')])).toBe('1');
  });

  it('keeps each version of a key set twice', async () => {
    const empty = mapFromRecord({});
    const first = await call('map_set', [empty, stringValue('x'), intValue(1)]);
    const second = await call('map_set', [first, stringValue('x'), intValue(2)]);
    expect(await render('map_get', [first, stringValue('x')])).toBe('1');
    expect(await render('map_get', [second, stringValue('x')])).toBe('2');
    expect(await render('MapSize', [second])).toBe('1');
    expect(await render('MapSize', [empty])).toBe('0');
  });

  it('returns null for missing keys', async () => {
    expect(await render('map_get', [base, stringValue('zz')])).toBe('null');
  });

  it('rejects non-string keys as values, not faults', async () => {
    expect(await render('map_get', [base, intValue(1)])).toBe(
      'ERROR: map_get expects STRING for argument 2, got INTEGER'
    );
  });

  it('lists keys, values and entries', async () => {
    const map = mapFromRecord({ x: intValue(1), y: intValue(2) });
    const keys = await call('map_keys', [map]);
    const values = await call('MapValues', [map]);
    const entries = await call('MapEntries', [map]);
    expect(keys.type === 'LIST' && keys.elements.map(inspect).sort()).toEqual([
      'x',
      'y',
    ]);
    expect(
      values.type === 'LIST' && values.elements.map(inspect).sort()
    ).toEqual(['1', '2']);
    expect(
      entries.type === 'LIST' && entries.elements.map(inspect).sort()
    ).toEqual(['[x, 1]', '[y, 2]']);
  });

  it('deletes and clears without touching the argument', async () => {
    const map = mapFromRecord({ x: intValue(1), y: intValue(2) });
    expect(await render('MapDelete', [map, stringValue('x')])).toBe(
      '{"y": 2}'
    );
    expect(await render('MapClear', [map])).toBe('{}');
    expect(await render('MapKeys', [mapValue()])).toBe('[]');
    expect(await render('MapSize', [map])).toBe('2');
  });
});

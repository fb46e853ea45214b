/**
 * Quill Runtime Tests: Context, Registry and Extensions
 * Host builtin registration, namespacing, events and description checks
 */

import { describe, expect, it } from 'vitest';
import {
  BUILTIN_REGISTRY,
  callBuiltin,
  createRuntimeContext,
  defineBuiltin,
  emitRuntimeEvent,
  hoistExtension,
  intValue,
  lookupBuiltin,
  prefixFunctions,
  QuillError,
  stringValue,
  type ExtensionFactory,
  type ExtensionResult,
  type RuntimeEvent,
  type RuntimeEventInput,
} from '../../src/index.js';

const createCounterExtension: ExtensionFactory<{ start: number }> = (
  config
) => {
  let count = config.start;
  return {
    next: defineBuiltin('next', {
      description: 'Increment and return the counter',
      params: [],
      fn: () => intValue(++count),
    }),
  };
};

describe('Quill Runtime: Builtin Registry', () => {
  it('registers every builtin group', () => {
    const expected = [
      'split',
      'join',
      'substring',
      'replace',
      'trim',
      'to_upper',
      'to_lower',
      'contains',
      'starts_with',
      'ends_with',
      'len',
      'append',
      'prepend',
      'slice',
      'sort',
      'reverse',
      'ListPush',
      'ListUnshift',
      'ListPop',
      'ListShift',
      'ListIndexOf',
      'ListIncludes',
      'ListSlice',
      'ListReverse',
      'ListSort',
      'ListConcat',
      'ListAt',
      'map_get',
      'map_set',
      'map_has',
      'map_keys',
      'map_values',
      'MapGet',
      'MapSet',
      'MapHas',
      'MapDelete',
      'MapClear',
      'MapSize',
      'MapKeys',
      'MapValues',
      'MapEntries',
      'ToString',
      'ToNumber',
      'ToInt',
      'ToBool',
      'string_list',
      'string_map',
      'auto_cast',
      'Add',
      'Subtract',
      'Multiply',
      'Divide',
      'Power',
      'Sqrt',
      'Abs',
      'Round',
      'Min',
      'Max',
      'floor',
      'ceil',
      'mod',
      'ReadLine',
      'ReadFile',
      'WriteFile',
      'TypeOf',
      'IsNull',
      'IsEmpty',
      'print',
      'Spawn',
      'Await',
    ];
    expect([...BUILTIN_REGISTRY.keys()].sort()).toEqual([...expected].sort());
  });

  it('gives every registry builtin a description', () => {
    for (const definition of BUILTIN_REGISTRY.values()) {
      expect(definition.description?.length ?? 0).toBeGreaterThan(0);
    }
  });

  it('returns undefined for unknown names', () => {
    expect(lookupBuiltin('nope')).toBeUndefined();
  });
});

describe('Quill Runtime: Runtime Context', () => {
  it('defaults to utf-8', () => {
    expect(createRuntimeContext().encoding).toBe('utf-8');
  });

  it('requires descriptions when configured', () => {
    const undocumented = defineBuiltin('undocumented', {
      params: [],
      fn: () => intValue(0),
    });
    expect(() =>
      createRuntimeContext({
        functions: { undocumented },
        requireDescriptions: true,
      })
    ).toThrow(
      "Function 'undocumented' requires description (requireDescriptions enabled)"
    );
  });

  it('requires parameter descriptions when configured', () => {
    const echo = defineBuiltin('echo', {
      description: 'Return the argument',
      params: [{ name: 'value', type: 'ANY' }],
      fn: ([value]) => value,
    });
    expect(() =>
      createRuntimeContext({ functions: { echo }, requireDescriptions: true })
    ).toThrow(
      "Parameter 'value' of function 'echo' requires description (requireDescriptions enabled)"
    );
  });

  it('reports argument errors under the registered key', async () => {
    const echo = defineBuiltin('echo', {
      params: [{ name: 'value', type: 'ANY' }],
      fn: ([value]) => value,
    });
    const ctx = createRuntimeContext({ functions: { shout: echo } });
    const shout = ctx.functions.get('shout');
    if (shout === undefined) throw new Error('shout not registered');

    expect(shout.name).toBe('shout');
    expect(await callBuiltin(shout, [], ctx)).toEqual({
      type: 'ERROR',
      message: 'shout expects 1 argument, got 0',
      errorId: 'QUILL-R001',
    });
  });
});

describe('Quill Runtime: Extensions', () => {
  it('prefixes names with a namespace', () => {
    const prefixed = prefixFunctions('counter', createCounterExtension({ start: 0 }));
    expect(Object.keys(prefixed)).toEqual(['counter::next']);
    expect(prefixed['counter::next']?.name).toBe('counter::next');
  });

  it('reports argument errors under the namespaced name', async () => {
    const { functions } = hoistExtension('counter', {
      add: defineBuiltin('add', {
        description: 'Add to the counter',
        params: [{ name: 'amount', type: 'INTEGER' }],
        fn: ([amount]) => amount,
      }),
    });
    const ctx = createRuntimeContext({ functions });
    const add = ctx.functions.get('counter::add');
    if (add === undefined) throw new Error('counter::add not registered');

    expect(await callBuiltin(add, [], ctx)).toEqual({
      type: 'ERROR',
      message: 'counter::add expects 1 argument, got 0',
      errorId: 'QUILL-R001',
    });
    expect(await callBuiltin(add, [stringValue('x')], ctx)).toEqual({
      type: 'ERROR',
      message: 'counter::add expects INTEGER for argument 1, got STRING',
      errorId: 'QUILL-R002',
    });
    expect(await callBuiltin(add, [intValue(4)], ctx)).toEqual(intValue(4));
  });

  it('rejects invalid namespaces', () => {
    const extension = createCounterExtension({ start: 0 });
    expect(() => prefixFunctions('bad name', extension)).toThrow(QuillError);
    expect(() => prefixFunctions('', extension)).toThrow(
      'Invalid namespace format: "" (must match /^[a-zA-Z0-9_-]+$/)'
    );
  });

  it('preserves dispose through hoisting', async () => {
    let disposed = false;
    const extension: ExtensionResult = {
      ...createCounterExtension({ start: 0 }),
      dispose: () => {
        disposed = true;
      },
    };
    const { functions, dispose } = hoistExtension('counter', extension);
    expect(Object.keys(functions)).toEqual(['counter::next']);
    await dispose?.();
    expect(disposed).toBe(true);
  });

  it('keeps state isolated per instance', async () => {
    const first = hoistExtension('a', createCounterExtension({ start: 0 }));
    const second = hoistExtension('b', createCounterExtension({ start: 10 }));
    const ctx = createRuntimeContext({
      functions: { ...first.functions, ...second.functions },
    });

    const nextA = ctx.functions.get('a::next');
    const nextB = ctx.functions.get('b::next');
    if (nextA === undefined || nextB === undefined) {
      throw new Error('extension builtins not registered');
    }

    await callBuiltin(nextA, [], ctx);
    expect(await callBuiltin(nextA, [], ctx)).toEqual(intValue(2));
    expect(await callBuiltin(nextB, [], ctx)).toEqual(intValue(11));
  });

  it('emits events with a timestamp', () => {
    const events: RuntimeEvent[] = [];
    const ctx = createRuntimeContext({
      callbacks: { onLogEvent: (event) => events.push(event) },
    });

    emitRuntimeEvent(ctx, {
      event: 'cache_miss',
      subsystem: 'extension:cache',
      key: stringValue('k').value,
    });
    emitRuntimeEvent(ctx, {
      event: 'fixed',
      subsystem: 'test',
      timestamp: '2024-01-01T00:00:00.000Z',
    });

    expect(events[0]).toMatchObject({
      event: 'cache_miss',
      subsystem: 'extension:cache',
      key: 'k',
    });
    expect(Number.isNaN(Date.parse(events[0]?.timestamp ?? ''))).toBe(false);
    expect(events[1]?.timestamp).toBe('2024-01-01T00:00:00.000Z');
  });

  it('passes extra event fields through unchanged', () => {
    const events: RuntimeEvent[] = [];
    const ctx = createRuntimeContext({
      callbacks: { onLogEvent: (event) => events.push(event) },
    });
    const input: RuntimeEventInput = {
      event: 'cache_hit',
      subsystem: 'extension:cache',
      timestamp: '2024-01-01T00:00:00.000Z',
      hits: 3,
    };

    emitRuntimeEvent(ctx, input);

    expect(events).toEqual([
      {
        hits: 3,
        event: 'cache_hit',
        subsystem: 'extension:cache',
        timestamp: '2024-01-01T00:00:00.000Z',
      },
    ]);
  });

  it('rejects events without a name', () => {
    const ctx = createRuntimeContext();
    expect(() => emitRuntimeEvent(ctx, { event: ' ', subsystem: 'x' })).toThrow(
      'Event must include non-empty event field'
    );
  });
});

/**
 * Quill Runtime Tests: Execution Guard
 */

import { describe, expect, it } from 'vitest';
import {
  errorValue,
  ExecutionGuard,
  intValue,
  RuntimeError,
  type ErrorEvent,
} from '../../src/index.js';
import { testContext } from '../helpers/runtime.js';

describe('Quill Runtime: Execution Guard', () => {
  it('passes results through', () => {
    const guard = new ExecutionGuard();
    expect(guard.run(() => intValue(5))).toEqual(intValue(5));
    expect(guard.succeeded).toBe(true);
    expect(guard.result).toEqual(intValue(5));
    expect(guard.error).toBeUndefined();
    expect(guard.diagnostic).toBe('');
  });

  it('treats a returned error value as a normal completion', () => {
    const guard = new ExecutionGuard();
    guard.run(() => errorValue('expected'));
    expect(guard.succeeded).toBe(true);
  });

  it('converts thrown errors into panic values', () => {
    const guard = new ExecutionGuard();
    const result = guard.run(() => {
      throw new Error('index 5 out of range');
    });

    expect(result).toEqual({
      type: 'ERROR',
      message: 'Runtime panic: index 5 out of range',
      errorId: 'QUILL-R011',
    });
    expect(guard.succeeded).toBe(false);
    expect(guard.error).toEqual(result);
    expect(guard.diagnostic).toContain('index 5 out of range');
  });

  it('keeps the id of a thrown RuntimeError', () => {
    const guard = new ExecutionGuard();
    const result = guard.run(() => {
      throw RuntimeError.fromRegistry('QUILL-R014', { index: 5, length: 2 });
    });
    expect(result).toEqual({
      type: 'ERROR',
      message: 'Runtime panic: array index out of bounds: 5 (length: 2)',
      errorId: 'QUILL-R014',
    });
  });

  it('wraps thrown non-errors', () => {
    const guard = new ExecutionGuard();
    const result = guard.run(() => {
      throw 'plain text';
    });
    expect(result.type === 'ERROR' && result.message).toBe(
      'Runtime panic: plain text'
    );
  });

  it('contains thrown values that cannot be converted to text', async () => {
    const guard = new ExecutionGuard();
    const result = guard.run(() => {
      throw Object.create(null);
    });
    expect(result).toEqual({
      type: 'ERROR',
      message: 'Runtime panic: [object Object]',
      errorId: 'QUILL-R011',
    });
    expect(guard.succeeded).toBe(false);

    const rejected = await guard.runAsync(() =>
      Promise.reject({
        toString(): string {
          throw new Error('no text');
        },
      })
    );
    expect(rejected.type === 'ERROR' && rejected.message).toBe(
      'Runtime panic: [object Object]'
    );
  });

  it('guards async operations', async () => {
    const guard = new ExecutionGuard();
    const result = await guard.runAsync(() =>
      Promise.reject(new Error('late failure'))
    );
    expect(result.type === 'ERROR' && result.message).toBe(
      'Runtime panic: late failure'
    );
    expect(await guard.runAsync(() => intValue(1))).toEqual(intValue(1));
    expect(guard.succeeded).toBe(true);
  });

  it('reports faults to onError', () => {
    const events: ErrorEvent[] = [];
    const { ctx } = testContext({
      observability: { onError: (event) => events.push(event) },
    });
    const guard = new ExecutionGuard(ctx);
    guard.run(() => {
      throw new Error('boom');
    });

    expect(events).toHaveLength(1);
    expect(events[0]?.error.message).toBe('boom');
    expect(events[0]?.diagnostic).toBe(guard.diagnostic);
  });
});

/**
 * Async Builtins
 *
 * @internal - Not part of public API
 */

import { createErrorValue } from '../../../error-classes.js';
import {
  defineBuiltin,
  type BuiltinDefinition,
} from '../../core/callable.js';
import { awaitFuture } from '../../core/future.js';

export const ASYNC_BUILTINS: readonly BuiltinDefinition[] = [
  // Work is started by the host (futureFrom); this layer owns no executor.
  defineBuiltin('Spawn', {
    description: 'Unavailable without an execution context',
    params: [{ name: 'task', type: 'ANY' }],
    fn: () => createErrorValue('QUILL-R010', { functionName: 'Spawn' }),
  }),

  defineBuiltin('Await', {
    description: 'Value delivered to a future',
    params: [{ name: 'future', type: 'FUTURE' }],
    fn: ([future]) => awaitFuture(future),
  }),
];

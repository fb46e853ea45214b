/**
 * Execution Guard
 *
 * Runs an operation and converts anything it throws into an ERROR value,
 * so faults in host code or malformed input never unwind past the
 * interpreter. A returned ERROR value is a normal completion.
 */

import { createErrorValue, QuillError } from '../../error-classes.js';
import { ERROR_REGISTRY } from '../../error-registry.js';
import type { RuntimeContext } from './types.js';
import {
  describeUnknown,
  errorValue,
  type QuillErrorValue,
  type QuillValue,
} from './values.js';

type GuardState =
  | { readonly status: 'idle' }
  | { readonly status: 'succeeded'; readonly result: QuillValue }
  | {
      readonly status: 'faulted';
      readonly error: QuillErrorValue;
      readonly diagnostic: string;
    };

function toError(thrown: unknown): Error {
  return thrown instanceof Error
    ? thrown
    : new Error(describeUnknown(thrown));
}

function faultValue(error: Error): QuillErrorValue {
  const panic = createErrorValue('QUILL-R011', { reason: error.message });
  if (
    error instanceof QuillError &&
    ERROR_REGISTRY.get(error.errorId)?.category === 'runtime'
  ) {
    return errorValue(panic.message, error.errorId);
  }
  return panic;
}

/**
 * Scoped fault boundary.
 *
 * @example
 * ```typescript
 * const guard = new ExecutionGuard(ctx);
 * const value = guard.run(() => riskyHostCall());
 * if (!guard.succeeded) console.error(guard.diagnostic);
 * ```
 */
export class ExecutionGuard {
  private state: GuardState = { status: 'idle' };

  constructor(
    private readonly ctx?: Pick<RuntimeContext, 'observability'> | undefined
  ) {}

  /** Run a synchronous operation. Returns its value or the fault's ERROR value. */
  run(operation: () => QuillValue): QuillValue {
    try {
      return this.complete(operation());
    } catch (thrown) {
      return this.fault(thrown);
    }
  }

  /** Run an operation that may return a promise */
  async runAsync(
    operation: () => QuillValue | Promise<QuillValue>
  ): Promise<QuillValue> {
    try {
      return this.complete(await operation());
    } catch (thrown) {
      return this.fault(thrown);
    }
  }

  /** True when the last run completed without a fault */
  get succeeded(): boolean {
    return this.state.status === 'succeeded';
  }

  /** Value returned by the last successful run */
  get result(): QuillValue | undefined {
    return this.state.status === 'succeeded' ? this.state.result : undefined;
  }

  /** ERROR value produced by the last fault */
  get error(): QuillErrorValue | undefined {
    return this.state.status === 'faulted' ? this.state.error : undefined;
  }

  /** Stack captured from the last fault; empty when there was none */
  get diagnostic(): string {
    return this.state.status === 'faulted' ? this.state.diagnostic : '';
  }

  private complete(result: QuillValue): QuillValue {
    this.state = { status: 'succeeded', result };
    return result;
  }

  private fault(thrown: unknown): QuillErrorValue {
    const error = toError(thrown);
    const diagnostic = error.stack ?? error.message;
    const value = faultValue(error);
    this.state = { status: 'faulted', error: value, diagnostic };
    this.ctx?.observability.onError?.({ error, diagnostic });
    return value;
  }
}

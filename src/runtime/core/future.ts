/**
 * Deferred Values
 *
 * A Future is a one-shot slot: it is created empty, receives exactly one
 * value, and hands that value to every awaiter. There is no cancellation
 * and no timeout; awaiting a Future that is never delivered never settles.
 */

import { createErrorValue } from '../../error-classes.js';
import { emitRuntimeEvent } from '../ext/extensions.js';
import type { RuntimeContext } from './types.js';
import {
  describeUnknown,
  errorValue,
  inspect,
  type FutureSlot,
  type QuillErrorValue,
  type QuillFuture,
  type QuillValue,
} from './values.js';

/** Create an empty Future */
export function createFuture(): QuillFuture {
  let resolve: (value: QuillValue) => void = () => undefined;
  const settled = new Promise<QuillValue>((res) => {
    resolve = res;
  });
  const slot: FutureSlot = {
    delivered: false,
    value: undefined,
    settled,
    resolve,
  };
  return { type: 'FUTURE', slot };
}

/**
 * Deliver a value to a Future.
 *
 * @returns null on the first delivery. Later deliveries keep the first
 * value and return a QUILL-R012 ERROR value; a future_redelivered event is
 * reported when a context is given.
 */
export function deliverFuture(
  future: QuillFuture,
  value: QuillValue,
  ctx?: Pick<RuntimeContext, 'callbacks'>
): QuillErrorValue | null {
  const { slot } = future;
  if (slot.delivered) {
    if (ctx !== undefined) {
      emitRuntimeEvent(ctx, {
        event: 'future_redelivered',
        subsystem: 'future',
        rejected: inspect(value),
      });
    }
    return createErrorValue('QUILL-R012', { rejected: inspect(value) });
  }
  slot.delivered = true;
  slot.value = value;
  slot.resolve(value);
  return null;
}

/** Report whether a value has been delivered */
export function isFutureResolved(future: QuillFuture): boolean {
  return future.slot.delivered;
}

/**
 * Wait for the delivered value.
 * Resolves immediately with the cached value once delivered.
 */
export function awaitFuture(future: QuillFuture): Promise<QuillValue> {
  const { slot } = future;
  if (slot.delivered && slot.value !== undefined) {
    return Promise.resolve(slot.value);
  }
  return slot.settled;
}

/**
 * Adapt a host promise to a Future.
 * A rejection is delivered as an ERROR value carrying the rejection message.
 */
export function futureFrom(producer: Promise<QuillValue>): QuillFuture {
  const future = createFuture();
  void producer.then(
    (value) => {
      deliverFuture(future, value);
    },
    (reason: unknown) => {
      deliverFuture(future, errorValue(describeUnknown(reason)));
    }
  );
  return future;
}

/**
 * Host Extensions
 * Namespaced host builtin sets and structured runtime events
 */

import { createErrorValue, QuillError } from '../../error-classes.js';
import { renameBuiltin, type BuiltinDefinition } from '../core/callable.js';
import type {
  RuntimeCallbacks,
  RuntimeEvent,
  RuntimeEventInput,
} from '../core/types.js';

/**
 * Minimal interface for event emission.
 * Allows emitRuntimeEvent to accept any context with callbacks.
 */
interface RuntimeContextLike {
  readonly callbacks?: RuntimeCallbacks | undefined;
}

/** Cleanup hook of an extension instance */
export type ExtensionDispose = () => void | Promise<void>;

/**
 * Result object returned by extension factories.
 * Contains host builtin definitions with optional cleanup.
 */
export type ExtensionResult = Record<
  string,
  BuiltinDefinition | ExtensionDispose
> & {
  dispose?: ExtensionDispose;
};

/**
 * Result object returned by hoistExtension.
 * Separates functions from dispose for safe createRuntimeContext usage.
 */
export interface HoistedExtension {
  functions: Record<string, BuiltinDefinition>;
  dispose?: ExtensionDispose;
}

/**
 * Factory function contract for creating extensions.
 * Accepts typed configuration and returns isolated instance.
 */
export type ExtensionFactory<TConfig> = (config: TConfig) => ExtensionResult;

const NAMESPACE_PATTERN = /^[a-zA-Z0-9_-]+$/;

function namespaceError(namespace: string): QuillError {
  const { message } = createErrorValue('QUILL-H002', {
    namespace: JSON.stringify(namespace),
  });
  return new QuillError({
    errorId: 'QUILL-H002',
    message,
    context: { namespace },
  });
}

function isDefinition(
  entry: BuiltinDefinition | ExtensionDispose | undefined
): entry is BuiltinDefinition {
  return typeof entry === 'object';
}

/**
 * Prefix all function names in an extension with a namespace.
 *
 * @param namespace - Alphanumeric string with underscores/hyphens (e.g., "fs", "text_tools")
 * @param functions - Extension result with builtin definitions
 * @returns New ExtensionResult with prefixed names (namespace::name)
 * @throws {QuillError} QUILL-H002 if namespace is invalid
 *
 * @example
 * ```typescript
 * const prefixed = prefixFunctions('db', dbExtension);
 * // { "db::query": ..., dispose: ... }
 * ```
 */
export function prefixFunctions(
  namespace: string,
  functions: ExtensionResult
): ExtensionResult {
  if (!NAMESPACE_PATTERN.test(namespace)) {
    throw namespaceError(namespace);
  }

  const result: ExtensionResult = {};

  for (const [name, entry] of Object.entries(functions)) {
    if (name === 'dispose' || !isDefinition(entry)) continue;

    const prefixedName = `${namespace}::${name}`;
    result[prefixedName] = renameBuiltin(entry, prefixedName);
  }

  if (functions.dispose !== undefined) {
    result.dispose = functions.dispose;
  }

  return result;
}

/**
 * Separate dispose from functions for safe createRuntimeContext usage.
 *
 * @example
 * ```typescript
 * const { functions, dispose } = hoistExtension('db', dbExtension);
 * const ctx = createRuntimeContext({ functions });
 * ```
 */
export function hoistExtension(
  namespace: string,
  extension: ExtensionResult
): HoistedExtension {
  const prefixed = prefixFunctions(namespace, extension);

  const functions: Record<string, BuiltinDefinition> = {};
  for (const [name, entry] of Object.entries(prefixed)) {
    if (name !== 'dispose' && isDefinition(entry)) {
      functions[name] = entry;
    }
  }

  const result: HoistedExtension = { functions };
  if (prefixed.dispose !== undefined) {
    result.dispose = prefixed.dispose;
  }
  return result;
}

/**
 * Emit a runtime event with auto-generated timestamp.
 * Adds an ISO timestamp if event.timestamp is undefined, then calls
 * onLogEvent. Contexts without onLogEvent drop the event.
 *
 * @throws {Error} If event.event is missing or empty
 *
 * @example
 * ```typescript
 * emitRuntimeEvent(ctx, {
 *   event: 'value_coerced',
 *   subsystem: 'coerce',
 *   operator: '+',
 * });
 * ```
 */
export function emitRuntimeEvent(
  ctx: RuntimeContextLike,
  input: RuntimeEventInput
): void {
  const { event, subsystem, timestamp, ...fields } = input;
  if (event.trim() === '') {
    throw new Error('Event must include non-empty event field');
  }

  const onLogEvent = ctx.callbacks?.onLogEvent;
  if (onLogEvent === undefined) return;

  const emitted: RuntimeEvent = {
    ...fields,
    event,
    subsystem,
    timestamp: timestamp ?? new Date().toISOString(),
  };
  onLogEvent(emitted);
}

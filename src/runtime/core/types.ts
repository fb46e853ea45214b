/**
 * Runtime Types
 *
 * Public types for runtime configuration and observability.
 * These types are the primary interface for host applications.
 */

import type { BuiltinDefinition } from './callable.js';
import type { QuillBuiltin, QuillErrorValue, QuillValue } from './values.js';

/** I/O callbacks for runtime operations */
export interface RuntimeCallbacks {
  /** Called with each line written by print */
  onLog: (line: string) => void;
  /** Line source for ReadLine. Resolves null when input is exhausted. */
  onReadLine: () => Promise<string | null>;
  /** Structured runtime events (coercions, redelivered futures, host events) */
  onLogEvent?: ((event: RuntimeEvent) => void) | undefined;
}

/** Structured diagnostic event */
export interface RuntimeEvent {
  /** Event name (e.g. 'value_coerced') */
  readonly event: string;
  /** Emitting subsystem (e.g. 'coerce', 'future', 'extension:db') */
  readonly subsystem: string;
  /** ISO 8601 timestamp, added by emitRuntimeEvent when omitted */
  readonly timestamp: string;
  readonly [key: string]: unknown;
}

/** Event passed to emitRuntimeEvent; the timestamp is filled in when absent */
export interface RuntimeEventInput {
  readonly event: string;
  readonly subsystem: string;
  readonly timestamp?: string | undefined;
  readonly [key: string]: unknown;
}

/** Observability callbacks for monitoring builtin calls */
export interface ObservabilityCallbacks {
  /** Called before a builtin is invoked */
  onHostCall?: ((event: HostCallEvent) => void) | undefined;
  /** Called after a builtin returns */
  onFunctionReturn?: ((event: FunctionReturnEvent) => void) | undefined;
  /** Called when a builtin returns an ERROR value */
  onErrorValue?: ((event: ErrorValueEvent) => void) | undefined;
  /** Called when ExecutionGuard catches a fault */
  onError?: ((event: ErrorEvent) => void) | undefined;
}

/** Event emitted before a builtin call */
export interface HostCallEvent {
  /** Builtin name */
  name: string;
  /** Arguments passed to the builtin */
  args: readonly QuillValue[];
}

/** Event emitted after a builtin returns */
export interface FunctionReturnEvent {
  name: string;
  /** Return value */
  value: QuillValue;
  /** Execution time in milliseconds */
  durationMs: number;
}

/** Event emitted when a builtin reports an ERROR value */
export interface ErrorValueEvent {
  name: string;
  error: QuillErrorValue;
}

/** Event emitted on a caught fault */
export interface ErrorEvent {
  /** The thrown error (non-Error throws are wrapped) */
  error: Error;
  /** Captured diagnostic text */
  diagnostic: string;
}

/** Text encodings accepted by ReadFile and WriteFile */
export type FileEncoding = 'utf-8' | 'utf8' | 'ascii' | 'latin1';

/** Runtime context shared by every builtin call */
export interface RuntimeContext {
  /** Registry builtins plus host builtins, keyed by name */
  readonly functions: ReadonlyMap<string, QuillBuiltin>;
  /** I/O callbacks */
  readonly callbacks: RuntimeCallbacks;
  /** Observability callbacks */
  readonly observability: ObservabilityCallbacks;
  /** Encoding used by ReadFile and WriteFile */
  readonly encoding: FileEncoding;
}

/** Options for creating a runtime context */
export interface RuntimeOptions {
  /** Host builtins (can override registry builtins) */
  functions?: Record<string, BuiltinDefinition> | undefined;
  /** I/O callbacks (merged over defaults) */
  callbacks?: Partial<RuntimeCallbacks> | undefined;
  /** Observability callbacks */
  observability?: ObservabilityCallbacks | undefined;
  /** File encoding (default: 'utf-8') */
  encoding?: FileEncoding | undefined;
  /** Reject host builtins that lack descriptions */
  requireDescriptions?: boolean | undefined;
}

/**
 * Quill Runtime
 *
 * Public API for the value model and builtin operations.
 *
 * Module Structure:
 * - core/: Value model and calling convention
 *   - values.ts: QuillValue variants, rendering, truthiness, equality
 *   - coerce.ts: Operand coercion for binary operators
 *   - operators.ts: Arithmetic and equality entry points
 *   - callable.ts: Builtin definition, validation and invocation
 *   - context.ts: Runtime context factory
 *   - future.ts: One-shot deferred values
 *   - guard.ts: Fault boundary (ExecutionGuard)
 *   - interop.ts: Native JavaScript conversion
 * - ext/: Builtin registry and host extension helpers
 */

// ============================================================
// PUBLIC TYPES
// ============================================================

export type {
  ErrorEvent,
  ErrorValueEvent,
  FileEncoding,
  FunctionReturnEvent,
  HostCallEvent,
  ObservabilityCallbacks,
  RuntimeCallbacks,
  RuntimeContext,
  RuntimeEvent,
  RuntimeEventInput,
  RuntimeOptions,
} from './core/types.js';

export type {
  FutureSlot,
  QuillBool,
  QuillBuiltin,
  QuillErrorValue,
  QuillFloat,
  QuillFuture,
  QuillInteger,
  QuillList,
  QuillMap,
  QuillNull,
  QuillString,
  QuillTypeName,
  QuillValue,
  ValueOfType,
} from './core/values.js';

export type {
  ArgsOf,
  BuiltinDefinition,
  BuiltinFn,
  BuiltinParam,
  BuiltinResult,
  BuiltinSpec,
  ParamType,
  ParamValue,
} from './core/callable.js';

export type { CoercionResult } from './core/coerce.js';
export type { OperatorContext } from './core/operators.js';
export type { NativeValue } from './core/interop.js';

export type {
  ExtensionFactory,
  ExtensionResult,
  ExtensionDispose,
  HoistedExtension,
} from './ext/extensions.js';

// ============================================================
// VALUES
// ============================================================

export {
  assertNever,
  boolValue,
  codePointLength,
  compareCodePoints,
  compareRenderings,
  describeUnknown,
  errorValue,
  FALSE_VALUE,
  floatValue,
  formatFloat,
  inspect,
  intValue,
  isBool,
  isBuiltin,
  isError,
  isFloat,
  isFuture,
  isInteger,
  isList,
  isMap,
  isNull,
  isNumeric,
  isString,
  isTruthy,
  listValue,
  mapFromRecord,
  mapValue,
  NULL_VALUE,
  nullValue,
  QUILL_TYPE_NAMES,
  stringValue,
  TRUE_VALUE,
  typeOf,
  valueEquals,
} from './core/values.js';

// ============================================================
// COERCION AND OPERATORS
// ============================================================

export { coerce, isDisplayable } from './core/coerce.js';
export {
  add,
  coerceOperands,
  divide,
  equals,
  modulo,
  multiply,
  notEquals,
  power,
  subtract,
} from './core/operators.js';

// ============================================================
// BUILTINS
// ============================================================

export {
  builtinValue,
  callBuiltin,
  defineBuiltin,
  defineVariadicBuiltin,
  describeParamType,
  matchesParamType,
  renameBuiltin,
  resolveBuiltin,
  validateBuiltinArgs,
} from './core/callable.js';
export { BUILTIN_REGISTRY, lookupBuiltin } from './ext/builtins/index.js';
export { parseDecimal, parseInteger } from './ext/builtins/conversions.js';

// ============================================================
// CONTEXT, FUTURES, GUARD, INTEROP
// ============================================================

export { createLineReader, createRuntimeContext } from './core/context.js';
export {
  awaitFuture,
  createFuture,
  deliverFuture,
  futureFrom,
  isFutureResolved,
} from './core/future.js';
export { ExecutionGuard } from './core/guard.js';
export { fromNative, toNative } from './core/interop.js';

// ============================================================
// EXTENSIONS
// ============================================================

export {
  emitRuntimeEvent,
  hoistExtension,
  prefixFunctions,
} from './ext/extensions.js';

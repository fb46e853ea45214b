/**
 * Builtin Calling Convention
 *
 * Every builtin, whether shipped with the runtime or supplied by the host,
 * is declared with defineBuiltin and obeys the same contract:
 * 1. exact arity check
 * 2. positional type check, left to right
 * 3. only then the operation itself
 *
 * Failures are returned as ERROR values, never thrown. An arity mismatch is
 * always reported before any type mismatch.
 *
 * Public API for host applications.
 */

import { createErrorValue } from '../../error-classes.js';
import type { RuntimeContext } from './types.js';
import {
  isError,
  isNumeric,
  type QuillBuiltin,
  type QuillFloat,
  type QuillErrorValue,
  type QuillInteger,
  type QuillTypeName,
  type QuillValue,
  type ValueOfType,
} from './values.js';

// ============================================================
// PARAMETER TYPES
// ============================================================

/**
 * Accepted type of a parameter.
 * - a type name: exactly that variant
 * - 'NUMBER': INTEGER or FLOAT
 * - 'ANY': every variant
 * - a list of type names: any of them
 */
export type ParamType =
  | QuillTypeName
  | 'NUMBER'
  | 'ANY'
  | readonly QuillTypeName[];

/** Parameter declaration for a builtin */
export interface BuiltinParam {
  /** Parameter name (for documentation and introspection) */
  readonly name: string;
  readonly type: ParamType;
  readonly description?: string | undefined;
}

/** Value type admitted by a parameter type */
export type ParamValue<T> = T extends 'ANY'
  ? QuillValue
  : T extends 'NUMBER'
    ? QuillInteger | QuillFloat
    : T extends QuillTypeName
      ? ValueOfType<T>
      : T extends readonly (infer U)[]
        ? U extends QuillTypeName
          ? ValueOfType<U>
          : never
        : never;

/** Argument tuple narrowed to the declared parameter types */
export type ArgsOf<P extends readonly BuiltinParam[]> = {
  readonly [K in keyof P]: P[K] extends BuiltinParam
    ? ParamValue<P[K]['type']>
    : never;
};

/** Builtins return one value; I/O and Await return it asynchronously */
export type BuiltinResult = QuillValue | Promise<QuillValue>;

/** Implementation signature receiving validated arguments */
export type BuiltinFn<P extends readonly BuiltinParam[]> = (
  args: ArgsOf<P>,
  ctx: RuntimeContext
) => BuiltinResult;

/** Declaration passed to defineBuiltin */
export interface BuiltinSpec<P extends readonly BuiltinParam[]> {
  readonly params: P;
  readonly fn: BuiltinFn<P>;
  readonly description?: string | undefined;
}

/**
 * A registered builtin.
 * invoke performs validation itself and may be called with raw arguments.
 */
export interface BuiltinDefinition {
  readonly name: string;
  readonly params: readonly BuiltinParam[];
  /** Variadic builtins skip the arity check */
  readonly variadic: boolean;
  readonly description?: string | undefined;
  readonly invoke: (
    args: readonly QuillValue[],
    ctx: RuntimeContext
  ) => BuiltinResult;
}

// ============================================================
// VALIDATION
// ============================================================

/** Check a single value against a parameter type */
export function matchesParamType(value: QuillValue, type: ParamType): boolean {
  if (type === 'ANY') return true;
  if (type === 'NUMBER') return isNumeric(value);
  if (typeof type === 'string') return value.type === type;
  return type.includes(value.type);
}

/** Human-readable name of a parameter type, as used in error messages */
export function describeParamType(type: ParamType): string {
  if (type === 'NUMBER') return 'INTEGER or FLOAT';
  if (typeof type === 'string') return type;
  return type.join(' or ');
}

function argsConform<const P extends readonly BuiltinParam[]>(
  args: readonly QuillValue[],
  params: P
): args is ArgsOf<P> & readonly QuillValue[] {
  if (args.length !== params.length) return false;
  return params.every((param, i) => {
    const arg = args[i];
    return arg !== undefined && matchesParamType(arg, param.type);
  });
}

/**
 * Validate arguments against parameter declarations.
 *
 * @returns ERROR value describing the first violation, or null when valid.
 * The arity check runs first, so a call that is wrong in both count and
 * type reports the count.
 *
 * @example
 * validateBuiltinArgs('append', [intValue(1)], appendParams)
 * // ERROR: append expects 2 arguments, got 1
 */
export function validateBuiltinArgs(
  functionName: string,
  args: readonly QuillValue[],
  params: readonly BuiltinParam[]
): QuillErrorValue | null {
  if (args.length !== params.length) {
    const noun = params.length === 1 ? 'argument' : 'arguments';
    return createErrorValue('QUILL-R001', {
      functionName,
      expected: `${params.length} ${noun}`,
      expectedCount: params.length,
      actualCount: args.length,
    });
  }

  for (let i = 0; i < params.length; i++) {
    const param = params[i];
    const arg = args[i];
    if (param === undefined || arg === undefined) continue;

    if (!matchesParamType(arg, param.type)) {
      return createErrorValue('QUILL-R002', {
        functionName,
        paramName: param.name,
        position: i + 1,
        expectedType: describeParamType(param.type),
        actualType: arg.type,
      });
    }
  }

  return null;
}

// ============================================================
// DEFINITION
// ============================================================

/**
 * Declare a builtin with typed parameters.
 * The implementation receives arguments already narrowed to the declared
 * types.
 *
 * @example
 * ```typescript
 * const upper = defineBuiltin('to_upper', {
 *   params: [{ name: 'text', type: 'STRING' }],
 *   fn: ([text]) => stringValue(text.value.toUpperCase()),
 * });
 * ```
 */
export function defineBuiltin<const P extends readonly BuiltinParam[]>(
  name: string,
  spec: BuiltinSpec<P>
): BuiltinDefinition {
  const { params, fn } = spec;
  return {
    name,
    params,
    variadic: false,
    description: spec.description,
    invoke: (args, ctx) => {
      if (argsConform(args, params)) {
        return fn(args, ctx);
      }
      return (
        validateBuiltinArgs(name, args, params) ??
        createErrorValue('QUILL-R011', {
          reason: `${name} rejected its arguments`,
        })
      );
    },
  };
}

/** Declare a builtin that accepts any number of arguments of any type */
export function defineVariadicBuiltin(
  name: string,
  spec: {
    readonly fn: (args: readonly QuillValue[], ctx: RuntimeContext) => BuiltinResult;
    readonly description?: string | undefined;
  }
): BuiltinDefinition {
  return {
    name,
    params: [],
    variadic: true,
    description: spec.description,
    invoke: spec.fn,
  };
}

/**
 * Copy of a definition registered under another name.
 * Argument errors of the copy report the new name.
 */
export function renameBuiltin(
  definition: BuiltinDefinition,
  name: string
): BuiltinDefinition {
  if (definition.name === name) return definition;
  const { invoke, params, variadic } = definition;
  return {
    ...definition,
    name,
    invoke: variadic
      ? invoke
      : (args, ctx) =>
          validateBuiltinArgs(name, args, params) ?? invoke(args, ctx),
  };
}

/** Wrap a definition as a BUILTIN value */
export function builtinValue(definition: BuiltinDefinition): QuillBuiltin {
  return { type: 'BUILTIN', name: definition.name, definition };
}

// ============================================================
// INVOCATION
// ============================================================

/**
 * Call a builtin value with raw arguments.
 *
 * Emits onHostCall before and onFunctionReturn after the call, plus
 * onErrorValue when the result is an ERROR value.
 */
export async function callBuiltin(
  builtin: QuillBuiltin,
  args: readonly QuillValue[],
  ctx: RuntimeContext
): Promise<QuillValue> {
  const { name } = builtin;
  ctx.observability.onHostCall?.({ name, args });

  const startTime = performance.now();
  const value = await builtin.definition.invoke(args, ctx);
  const durationMs = performance.now() - startTime;

  ctx.observability.onFunctionReturn?.({ name, value, durationMs });
  if (isError(value)) {
    ctx.observability.onErrorValue?.({ name, error: value });
  }
  return value;
}

/**
 * Resolve a builtin by name in the context.
 * Unknown names return undefined; reporting them is the interpreter's job.
 */
export function resolveBuiltin(
  ctx: RuntimeContext,
  name: string
): QuillBuiltin | undefined {
  return ctx.functions.get(name);
}

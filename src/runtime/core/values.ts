/**
 * Quill Value Types and Utilities
 *
 * The closed set of values that flow through Quill programs, plus the
 * rendering, truthiness and equality rules shared by every builtin.
 * Public API for host applications.
 */

import type { BuiltinDefinition } from './callable.js';

// ============================================================
// VALUE VARIANTS
// ============================================================

/** Discriminant of every Quill value, as reported by TypeOf */
export type QuillTypeName =
  | 'INTEGER'
  | 'FLOAT'
  | 'STRING'
  | 'BOOL'
  | 'NULL'
  | 'LIST'
  | 'MAP'
  | 'ERROR'
  | 'BUILTIN'
  | 'FUTURE';

/** All type names in declaration order */
export const QUILL_TYPE_NAMES: readonly QuillTypeName[] = [
  'INTEGER',
  'FLOAT',
  'STRING',
  'BOOL',
  'NULL',
  'LIST',
  'MAP',
  'ERROR',
  'BUILTIN',
  'FUTURE',
];

/** Signed 64-bit integer. Always stored wrapped to 64 bits. */
export interface QuillInteger {
  readonly type: 'INTEGER';
  readonly value: bigint;
}

export interface QuillFloat {
  readonly type: 'FLOAT';
  readonly value: number;
}

export interface QuillString {
  readonly type: 'STRING';
  readonly value: string;
}

export interface QuillBool {
  readonly type: 'BOOL';
  readonly value: boolean;
}

export interface QuillNull {
  readonly type: 'NULL';
}

export interface QuillList {
  readonly type: 'LIST';
  readonly elements: readonly QuillValue[];
}

/** String-keyed mapping. Key order carries no meaning. */
export interface QuillMap {
  readonly type: 'MAP';
  readonly pairs: ReadonlyMap<string, QuillValue>;
}

export interface QuillErrorValue {
  readonly type: 'ERROR';
  readonly message: string;
  /** Registry ID when the error came from a builtin (e.g. QUILL-R004) */
  readonly errorId?: string | undefined;
}

/** Opaque callable. Never equal to any value, itself included. */
export interface QuillBuiltin {
  readonly type: 'BUILTIN';
  readonly name: string;
  readonly definition: BuiltinDefinition;
}

/**
 * Internal slot of a Future.
 * Mutated only by deliverFuture; see future.ts.
 */
export interface FutureSlot {
  delivered: boolean;
  value: QuillValue | undefined;
  readonly settled: Promise<QuillValue>;
  readonly resolve: (value: QuillValue) => void;
}

export interface QuillFuture {
  readonly type: 'FUTURE';
  readonly slot: FutureSlot;
}

/** Any value that can flow through Quill */
export type QuillValue =
  | QuillInteger
  | QuillFloat
  | QuillString
  | QuillBool
  | QuillNull
  | QuillList
  | QuillMap
  | QuillErrorValue
  | QuillBuiltin
  | QuillFuture;

/** Value variant selected by its type name */
export type ValueOfType<T extends QuillTypeName> = Extract<
  QuillValue,
  { type: T }
>;

/** Exhaustiveness check for switches over QuillValue['type'] */
export function assertNever(value: never): never {
  throw new TypeError(`Unhandled value variant: ${JSON.stringify(value)}`);
}

// ============================================================
// CONSTRUCTORS
// ============================================================

/** Shared NULL instance */
export const NULL_VALUE: QuillNull = Object.freeze({ type: 'NULL' });

export const TRUE_VALUE: QuillBool = Object.freeze({
  type: 'BOOL',
  value: true,
});

export const FALSE_VALUE: QuillBool = Object.freeze({
  type: 'BOOL',
  value: false,
});

/**
 * Create an INTEGER, wrapping to signed 64 bits.
 * @throws RangeError when given a non-integral number
 */
export function intValue(value: bigint | number): QuillInteger {
  const big = typeof value === 'bigint' ? value : BigInt(value);
  return { type: 'INTEGER', value: BigInt.asIntN(64, big) };
}

export function floatValue(value: number): QuillFloat {
  return { type: 'FLOAT', value };
}

export function stringValue(value: string): QuillString {
  return { type: 'STRING', value };
}

export function boolValue(value: boolean): QuillBool {
  return value ? TRUE_VALUE : FALSE_VALUE;
}

export function nullValue(): QuillNull {
  return NULL_VALUE;
}

/** Create a LIST. The element array is copied. */
export function listValue(elements: Iterable<QuillValue> = []): QuillList {
  return { type: 'LIST', elements: Object.freeze([...elements]) };
}

/** Create a MAP from key/value entries. Later duplicates win. */
export function mapValue(
  entries: Iterable<readonly [string, QuillValue]> = []
): QuillMap {
  const pairs = new Map<string, QuillValue>();
  for (const [key, value] of entries) {
    pairs.set(key, value);
  }
  return { type: 'MAP', pairs };
}

/** Create a MAP from a plain record */
export function mapFromRecord(record: Record<string, QuillValue>): QuillMap {
  return mapValue(Object.entries(record));
}

export function errorValue(
  message: string,
  errorId?: string | undefined
): QuillErrorValue {
  return errorId === undefined
    ? { type: 'ERROR', message }
    : { type: 'ERROR', message, errorId };
}

// ============================================================
// TYPE GUARDS
// ============================================================

export function isInteger(value: QuillValue): value is QuillInteger {
  return value.type === 'INTEGER';
}

export function isFloat(value: QuillValue): value is QuillFloat {
  return value.type === 'FLOAT';
}

export function isNumeric(
  value: QuillValue
): value is QuillInteger | QuillFloat {
  return value.type === 'INTEGER' || value.type === 'FLOAT';
}

export function isString(value: QuillValue): value is QuillString {
  return value.type === 'STRING';
}

export function isBool(value: QuillValue): value is QuillBool {
  return value.type === 'BOOL';
}

export function isNull(value: QuillValue): value is QuillNull {
  return value.type === 'NULL';
}

export function isList(value: QuillValue): value is QuillList {
  return value.type === 'LIST';
}

export function isMap(value: QuillValue): value is QuillMap {
  return value.type === 'MAP';
}

export function isError(value: QuillValue): value is QuillErrorValue {
  return value.type === 'ERROR';
}

export function isBuiltin(value: QuillValue): value is QuillBuiltin {
  return value.type === 'BUILTIN';
}

export function isFuture(value: QuillValue): value is QuillFuture {
  return value.type === 'FUTURE';
}

// ============================================================
// RENDERING
// ============================================================

/** Return the discriminant of a value */
export function typeOf(value: QuillValue): QuillTypeName {
  return value.type;
}

/**
 * Render a float as the shortest decimal that round-trips, without
 * exponent notation.
 *
 * @example
 * formatFloat(1.5e-7) // "0.00000015"
 * formatFloat(3)      // "3"
 */
export function formatFloat(value: number): string {
  if (Number.isNaN(value)) return 'NaN';
  if (value === Infinity) return '+Inf';
  if (value === -Infinity) return '-Inf';
  if (Object.is(value, -0)) return '-0';

  const text = String(value);
  const match = /^(-?)(\d)(?:\.(\d+))?e([+-]\d+)$/.exec(text);
  if (match === null) return text;

  const sign = match[1] ?? '';
  const digits = `${match[2] ?? ''}${match[3] ?? ''}`;
  const point = 1 + Number(match[4]);

  if (point <= 0) {
    return `${sign}0.${'0'.repeat(-point)}${digits}`;
  }
  if (point >= digits.length) {
    return `${sign}${digits}${'0'.repeat(point - digits.length)}`;
  }
  return `${sign}${digits.slice(0, point)}.${digits.slice(point)}`;
}

/**
 * Canonical text of a value. Total: never throws.
 * Used for display, string coercion and sort order.
 */
export function inspect(value: QuillValue): string {
  switch (value.type) {
    case 'INTEGER':
      return value.value.toString();
    case 'FLOAT':
      return formatFloat(value.value);
    case 'STRING':
      return value.value;
    case 'BOOL':
      return value.value ? 'true' : 'false';
    case 'NULL':
      return 'null';
    case 'LIST':
      return `[${value.elements.map(inspect).join(', ')}]`;
    case 'MAP': {
      const parts: string[] = [];
      for (const [key, entry] of value.pairs) {
        parts.push(`${JSON.stringify(key)}: ${inspect(entry)}`);
      }
      return `{${parts.join(', ')}}`;
    }
    case 'ERROR':
      return `ERROR: ${value.message}`;
    case 'BUILTIN':
      return 'builtin function';
    case 'FUTURE':
      return 'future';
    default:
      return assertNever(value);
  }
}

// ============================================================
// TRUTHINESS AND EQUALITY
// ============================================================

/** Check if a value is truthy in Quill semantics */
export function isTruthy(value: QuillValue): boolean {
  switch (value.type) {
    case 'NULL':
      return false;
    case 'BOOL':
      return value.value;
    case 'INTEGER':
      return value.value !== 0n;
    case 'FLOAT':
      return value.value !== 0;
    case 'STRING':
      return value.value.length > 0;
    case 'LIST':
      return value.elements.length > 0;
    case 'MAP':
      return value.pairs.size > 0;
    case 'ERROR':
    case 'BUILTIN':
    case 'FUTURE':
      return true;
    default:
      return assertNever(value);
  }
}

/**
 * Scalar equality.
 * - Different types are never equal (no numeric promotion)
 * - INTEGER, FLOAT, STRING, BOOL compare payloads; NaN != NaN
 * - NULL equals NULL
 * - LIST, MAP, ERROR, BUILTIN, FUTURE are never equal, even to themselves
 */
export function valueEquals(a: QuillValue, b: QuillValue): boolean {
  switch (a.type) {
    case 'INTEGER':
      return b.type === 'INTEGER' && a.value === b.value;
    case 'FLOAT':
      return b.type === 'FLOAT' && a.value === b.value;
    case 'STRING':
      return b.type === 'STRING' && a.value === b.value;
    case 'BOOL':
      return b.type === 'BOOL' && a.value === b.value;
    case 'NULL':
      return b.type === 'NULL';
    case 'LIST':
    case 'MAP':
    case 'ERROR':
    case 'BUILTIN':
    case 'FUTURE':
      return false;
    default:
      return assertNever(a);
  }
}

/**
 * Order two strings by Unicode code point, the byte order of their UTF-8
 * encodings.
 */
export function compareCodePoints(left: string, right: string): number {
  let i = 0;
  while (i < left.length && i < right.length) {
    const a = left.codePointAt(i) ?? 0;
    const b = right.codePointAt(i) ?? 0;
    if (a !== b) return a < b ? -1 : 1;
    i += a > 0xffff ? 2 : 1;
  }
  if (left.length === right.length) return 0;
  return left.length < right.length ? -1 : 1;
}

/** Order two values by the code point order of their renderings */
export function compareRenderings(a: QuillValue, b: QuillValue): number {
  return compareCodePoints(inspect(a), inspect(b));
}

/** Text of an arbitrary host value, falling back to its object tag */
export function describeUnknown(value: unknown): string {
  if (value instanceof Error) return value.message;
  try {
    return String(value);
  } catch {
    return Object.prototype.toString.call(value);
  }
}

/** Length in Unicode code points */
export function codePointLength(text: string): number {
  return Array.from(text).length;
}

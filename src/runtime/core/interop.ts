/**
 * Host Interop
 *
 * Conversion between plain JavaScript values and Quill values, for hosts
 * that pass data in and read results out.
 */

import {
  assertNever,
  describeUnknown,
  errorValue,
  floatValue,
  inspect,
  intValue,
  listValue,
  mapValue,
  NULL_VALUE,
  stringValue,
  boolValue,
  type QuillValue,
} from './values.js';

/** JavaScript shape produced by toNative */
export type NativeValue =
  | number
  | bigint
  | string
  | boolean
  | null
  | Error
  | NativeValue[]
  | { [key: string]: NativeValue };

function isPlainObject(value: object): value is Record<string, unknown> {
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

const INT64_MIN = -(2n ** 63n);
const INT64_MAX = 2n ** 63n - 1n;

/**
 * Convert a JavaScript value to a Quill value.
 *
 * - integral numbers and bigints in the signed 64-bit range: INTEGER
 * - other numbers: FLOAT
 * - null and undefined: NULL
 * - arrays: LIST; plain objects and string-keyed Maps: MAP
 * - Error instances: ERROR
 * - anything else: STRING of String(value)
 */
export function fromNative(value: unknown): QuillValue {
  if (value === null || value === undefined) return NULL_VALUE;

  if (typeof value === 'bigint') {
    return value >= INT64_MIN && value <= INT64_MAX
      ? intValue(value)
      : floatValue(Number(value));
  }
  if (typeof value === 'number') {
    return Number.isSafeInteger(value) && !Object.is(value, -0)
      ? intValue(value)
      : floatValue(value);
  }
  if (typeof value === 'string') return stringValue(value);
  if (typeof value === 'boolean') return boolValue(value);
  if (typeof value !== 'object') return stringValue(describeUnknown(value));

  if (Array.isArray(value)) {
    return listValue(value.map((element: unknown) => fromNative(element)));
  }
  if (value instanceof Error) {
    return errorValue(value.message);
  }
  if (value instanceof Map) {
    const entries: [string, QuillValue][] = [];
    for (const [key, entry] of value) {
      if (typeof key !== 'string') return stringValue(describeUnknown(value));
      entries.push([key, fromNative(entry)]);
    }
    return mapValue(entries);
  }
  if (isPlainObject(value)) {
    return mapValue(
      Object.entries(value).map(([key, entry]) => [key, fromNative(entry)])
    );
  }
  return stringValue(describeUnknown(value));
}

/**
 * Convert a Quill value to plain JavaScript.
 * INTEGER becomes a number when it is a safe integer, else a bigint.
 * BUILTIN and FUTURE become their renderings.
 */
export function toNative(value: QuillValue): NativeValue {
  switch (value.type) {
    case 'INTEGER': {
      const asNumber = Number(value.value);
      return Number.isSafeInteger(asNumber) ? asNumber : value.value;
    }
    case 'FLOAT':
    case 'STRING':
    case 'BOOL':
      return value.value;
    case 'NULL':
      return null;
    case 'LIST':
      return value.elements.map(toNative);
    case 'MAP': {
      // own data properties, "__proto__" included
      return Object.fromEntries(
        [...value.pairs].map(([key, entry]): [string, NativeValue] => [
          key,
          toNative(entry),
        ])
      );
    }
    case 'ERROR':
      return new Error(value.message);
    case 'BUILTIN':
    case 'FUTURE':
      return inspect(value);
    default:
      return assertNever(value);
  }
}

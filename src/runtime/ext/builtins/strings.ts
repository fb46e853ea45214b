/**
 * String Builtins
 *
 * Positions and lengths count Unicode code points, not UTF-16 units.
 *
 * @internal - Not part of public API
 */

import { createErrorValue } from '../../../error-classes.js';
import {
  defineBuiltin,
  type BuiltinDefinition,
} from '../../core/callable.js';
import {
  boolValue,
  listValue,
  stringValue,
} from '../../core/values.js';

function codePoints(text: string): string[] {
  return Array.from(text);
}

function replaceAll(text: string, search: string, replacement: string): string {
  if (search === '') {
    // Insert between every code point and at both ends
    return (
      replacement +
      codePoints(text)
        .map((point) => point + replacement)
        .join('')
    );
  }
  return text.split(search).join(replacement);
}

export const STRING_BUILTINS: readonly BuiltinDefinition[] = [
  defineBuiltin('split', {
    description: 'Split text on every occurrence of a separator',
    params: [
      { name: 'text', type: 'STRING' },
      { name: 'separator', type: 'STRING' },
    ],
    fn: ([text, separator]) => {
      const parts =
        separator.value === ''
          ? codePoints(text.value)
          : text.value.split(separator.value);
      return listValue(parts.map(stringValue));
    },
  }),

  defineBuiltin('join', {
    description: 'Join a list of strings with a separator',
    params: [
      { name: 'parts', type: 'LIST' },
      { name: 'separator', type: 'STRING' },
    ],
    fn: ([parts, separator]) => {
      const texts: string[] = [];
      for (const element of parts.elements) {
        if (element.type !== 'STRING') {
          return createErrorValue('QUILL-R013', {
            functionName: 'join',
            expectedType: 'strings',
            actualType: element.type,
          });
        }
        texts.push(element.value);
      }
      return stringValue(texts.join(separator.value));
    },
  }),

  defineBuiltin('substring', {
    description: 'Code points from start (inclusive) to end (exclusive)',
    params: [
      { name: 'text', type: 'STRING' },
      { name: 'start', type: 'INTEGER' },
      { name: 'end', type: 'INTEGER' },
    ],
    fn: ([text, start, end]) => {
      const points = codePoints(text.value);
      const length = BigInt(points.length);
      if (start.value < 0n || end.value > length || start.value > end.value) {
        return createErrorValue('QUILL-R003', {
          functionName: 'substring',
          start: start.value,
          end: end.value,
          subject: 'string',
          length: points.length,
        });
      }
      return stringValue(
        points.slice(Number(start.value), Number(end.value)).join('')
      );
    },
  }),

  defineBuiltin('replace', {
    description: 'Replace every occurrence of a substring',
    params: [
      { name: 'text', type: 'STRING' },
      { name: 'search', type: 'STRING' },
      { name: 'replacement', type: 'STRING' },
    ],
    fn: ([text, search, replacement]) =>
      stringValue(replaceAll(text.value, search.value, replacement.value)),
  }),

  defineBuiltin('trim', {
    description: 'Remove leading and trailing whitespace',
    params: [{ name: 'text', type: 'STRING' }],
    fn: ([text]) => stringValue(text.value.trim()),
  }),

  defineBuiltin('to_upper', {
    description: 'Convert text to upper case',
    params: [{ name: 'text', type: 'STRING' }],
    fn: ([text]) => stringValue(text.value.toUpperCase()),
  }),

  defineBuiltin('to_lower', {
    description: 'Convert text to lower case',
    params: [{ name: 'text', type: 'STRING' }],
    fn: ([text]) => stringValue(text.value.toLowerCase()),
  }),

  defineBuiltin('contains', {
    description: 'True when text contains the substring',
    params: [
      { name: 'text', type: 'STRING' },
      { name: 'search', type: 'STRING' },
    ],
    fn: ([text, search]) => boolValue(text.value.includes(search.value)),
  }),

  defineBuiltin('starts_with', {
    description: 'True when text begins with the prefix',
    params: [
      { name: 'text', type: 'STRING' },
      { name: 'prefix', type: 'STRING' },
    ],
    fn: ([text, prefix]) => boolValue(text.value.startsWith(prefix.value)),
  }),

  defineBuiltin('ends_with', {
    description: 'True when text ends with the suffix',
    params: [
      { name: 'text', type: 'STRING' },
      { name: 'suffix', type: 'STRING' },
    ],
    fn: ([text, suffix]) => boolValue(text.value.endsWith(suffix.value)),
  }),
];


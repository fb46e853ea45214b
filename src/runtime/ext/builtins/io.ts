/**
 * I/O Builtins
 *
 * File access goes through node:fs/promises with the context encoding.
 * Line input comes from callbacks.onReadLine.
 *
 * @internal - Not part of public API
 */

import { readFile, writeFile } from 'node:fs/promises';
import { createErrorValue } from '../../../error-classes.js';
import {
  defineBuiltin,
  type BuiltinDefinition,
} from '../../core/callable.js';
import {
  describeUnknown,
  stringValue,
  TRUE_VALUE,
} from '../../core/values.js';

export const IO_BUILTINS: readonly BuiltinDefinition[] = [
  defineBuiltin('ReadLine', {
    description: 'Next input line with surrounding whitespace removed',
    params: [],
    fn: async (_args, ctx) => {
      try {
        const line = await ctx.callbacks.onReadLine();
        if (line === null) {
          return createErrorValue('QUILL-R009', { reason: 'EOF' });
        }
        return stringValue(line.trim());
      } catch (error) {
        return createErrorValue('QUILL-R009', { reason: describeUnknown(error) });
      }
    },
  }),

  defineBuiltin('ReadFile', {
    description: 'Whole file contents as a string',
    params: [{ name: 'path', type: 'STRING' }],
    fn: async ([path], ctx) => {
      try {
        const content = await readFile(path.value, { encoding: ctx.encoding });
        return stringValue(content);
      } catch (error) {
        return createErrorValue('QUILL-R008', {
          action: 'read',
          reason: describeUnknown(error),
        });
      }
    },
  }),

  defineBuiltin('WriteFile', {
    description: 'Replace file contents; true on success',
    params: [
      { name: 'path', type: 'STRING' },
      { name: 'content', type: 'STRING' },
    ],
    fn: async ([path, content], ctx) => {
      try {
        await writeFile(path.value, content.value, { encoding: ctx.encoding });
        return TRUE_VALUE;
      } catch (error) {
        return createErrorValue('QUILL-R008', {
          action: 'write',
          reason: describeUnknown(error),
        });
      }
    },
  }),
];

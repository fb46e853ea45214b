/**
 * Runtime Context Factory
 *
 * Creates and configures the runtime context shared by builtin calls.
 * Public API for host applications.
 */

import { createInterface, type Interface } from 'node:readline';
import { QuillError } from '../../error-classes.js';
import { ERROR_REGISTRY, renderMessage } from '../../error-registry.js';
import { BUILTIN_REGISTRY } from '../ext/builtins/index.js';
import {
  builtinValue,
  renameBuiltin,
  type BuiltinDefinition,
} from './callable.js';
import type {
  RuntimeCallbacks,
  RuntimeContext,
  RuntimeOptions,
} from './types.js';
import type { QuillBuiltin } from './values.js';

/**
 * Line source over a readable stream.
 *
 * The readline interface is opened on the first read. The stream flows only
 * while a read is pending; lines readline emits after a pause are queued for
 * the next read. End of input yields null.
 */
export function createLineReader(
  input: NodeJS.ReadableStream
): () => Promise<string | null> {
  const queued: string[] = [];
  const waiting: ((line: string | null) => void)[] = [];
  let rl: Interface | undefined;
  let ended = false;

  const open = (): Interface => {
    const created = createInterface({ input, terminal: false });
    created.on('line', (line) => {
      const deliver = waiting.shift();
      if (deliver === undefined) {
        queued.push(line);
      } else {
        deliver(line);
      }
      if (waiting.length === 0) created.pause();
    });
    created.on('close', () => {
      ended = true;
      for (const deliver of waiting.splice(0)) deliver(null);
    });
    return created;
  };

  return () => {
    const next = queued.shift();
    if (next !== undefined) return Promise.resolve(next);
    if (ended) return Promise.resolve(null);

    const reader = rl ?? open();
    rl = reader;
    return new Promise((resolve) => {
      waiting.push(resolve);
      reader.resume();
    });
  };
}

function defaultCallbacks(): RuntimeCallbacks {
  return {
    onLog: (line) => {
      console.log(line);
    },
    onReadLine: createLineReader(process.stdin),
  };
}

function isBlank(text: string | undefined): boolean {
  return text === undefined || text.trim().length === 0;
}

function missingDescription(subject: string): QuillError {
  const template = ERROR_REGISTRY.get('QUILL-H001')?.messageTemplate ?? '';
  return new QuillError({
    errorId: 'QUILL-H001',
    message: renderMessage(template, { subject }),
    context: { subject },
  });
}

/** @throws {QuillError} QUILL-H001 when a description is missing */
function assertDescribed(name: string, definition: BuiltinDefinition): void {
  if (isBlank(definition.description)) {
    throw missingDescription(`Function '${name}'`);
  }
  for (const param of definition.params) {
    if (isBlank(param.description)) {
      throw missingDescription(
        `Parameter '${param.name}' of function '${name}'`
      );
    }
  }
}

/**
 * Create a runtime context.
 * This is the main entry point for configuring the Quill runtime.
 *
 * Host builtins are registered under their record key and may override
 * registry builtins of the same name.
 *
 * @throws {QuillError} QUILL-H001 when requireDescriptions is set and a
 * host builtin or parameter lacks a description
 */
export function createRuntimeContext(
  options: RuntimeOptions = {}
): RuntimeContext {
  const functions = new Map<string, QuillBuiltin>();

  for (const [name, definition] of BUILTIN_REGISTRY) {
    functions.set(name, builtinValue(definition));
  }

  if (options.functions) {
    for (const [name, definition] of Object.entries(options.functions)) {
      if (options.requireDescriptions === true) {
        assertDescribed(name, definition);
      }
      functions.set(name, builtinValue(renameBuiltin(definition, name)));
    }
  }

  const callbacks: RuntimeCallbacks = { ...defaultCallbacks() };
  if (options.callbacks?.onLog !== undefined) {
    callbacks.onLog = options.callbacks.onLog;
  }
  if (options.callbacks?.onReadLine !== undefined) {
    callbacks.onReadLine = options.callbacks.onReadLine;
  }
  if (options.callbacks?.onLogEvent !== undefined) {
    callbacks.onLogEvent = options.callbacks.onLogEvent;
  }

  return {
    functions,
    callbacks,
    observability: options.observability ?? {},
    encoding: options.encoding ?? 'utf-8',
  };
}

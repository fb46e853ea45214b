/**
 * Quill Error Classes and Factory
 *
 * Two channels exist. Builtins report failures as ERROR values built by
 * createErrorValue. Faults that escape as exceptions are RuntimeError
 * instances (or anything else thrown) and are only caught by ExecutionGuard.
 */

import {
  ERROR_REGISTRY,
  renderMessage,
  type ErrorCategory,
  type ErrorDefinition,
} from './error-registry.js';
import { errorValue, type QuillErrorValue } from './runtime/core/values.js';

/** Plain-data form of a thrown QuillError */
export interface QuillErrorData {
  readonly errorId: string;
  readonly message: string;
  readonly context?: Record<string, unknown> | undefined;
}

/**
 * Registry entry for an ID.
 *
 * @throws TypeError for an unregistered ID, or one of another category
 */
function requireDefinition(
  errorId: string,
  category?: ErrorCategory
): ErrorDefinition {
  const definition = ERROR_REGISTRY.get(errorId);
  if (definition === undefined) {
    throw new TypeError(`Unknown error ID: ${errorId}`);
  }
  if (category !== undefined && definition.category !== category) {
    throw new TypeError(`Expected ${category} error ID, got: ${errorId}`);
  }
  return definition;
}

/**
 * Build an ERROR value from a registry entry.
 *
 * @throws TypeError if errorId is not in the registry
 *
 * @example
 * createErrorValue('QUILL-R004', { operation: 'division' })
 * // { type: 'ERROR', message: 'division by zero', errorId: 'QUILL-R004' }
 */
export function createErrorValue(
  errorId: string,
  context: Record<string, unknown>
): QuillErrorValue {
  const { messageTemplate } = requireDefinition(errorId);
  return errorValue(renderMessage(messageTemplate, context), errorId);
}

/** Thrown Quill error carrying a registry ID */
export class QuillError extends Error {
  readonly errorId: string;
  readonly context?: Record<string, unknown> | undefined;

  constructor(data: QuillErrorData) {
    if (data.errorId === '') {
      throw new TypeError('errorId is required');
    }
    requireDefinition(data.errorId);

    super(data.message);
    this.name = 'QuillError';
    this.errorId = data.errorId;
    this.context = data.context;
  }

  toData(): QuillErrorData {
    return {
      errorId: this.errorId,
      message: this.message,
      context: this.context,
    };
  }

  /** Message, or the formatter's rendering of toData() */
  format(formatter?: (data: QuillErrorData) => string): string {
    return formatter === undefined ? this.message : formatter(this.toData());
  }
}

/** Runtime faults thrown outside the Error-value channel */
export class RuntimeError extends QuillError {
  constructor(
    errorId: string,
    message: string,
    context?: Record<string, unknown>
  ) {
    requireDefinition(errorId, 'runtime');
    super({ errorId, message, context });
    this.name = 'RuntimeError';
  }

  /** Render the registry template for errorId from context */
  static fromRegistry(
    errorId: string,
    context: Record<string, unknown>
  ): RuntimeError {
    const { messageTemplate } = requireDefinition(errorId, 'runtime');
    return new RuntimeError(
      errorId,
      renderMessage(messageTemplate, context),
      context
    );
  }
}

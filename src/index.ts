/**
 * Quill Module
 * Exports the runtime value layer, builtins and error registry
 */

export * from './runtime/index.js';

export {
  ERROR_REGISTRY,
  renderMessage,
  type ErrorCategory,
  type ErrorDefinition,
  type ErrorRegistry,
} from './error-registry.js';

export {
  createErrorValue,
  QuillError,
  RuntimeError,
  type QuillErrorData,
} from './error-classes.js';

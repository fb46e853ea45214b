/**
 * Error Registry
 * Central error definition registry with template rendering.
 */

/** R for runtime faults, H for host configuration mistakes */
export type ErrorCategory = 'runtime' | 'host';

/** One error condition: ID, message template and guidance */
export interface ErrorDefinition {
  /** QUILL-R### or QUILL-H###, letter matching the category */
  readonly errorId: string;
  readonly category: ErrorCategory;
  /** Short label, at most 50 characters */
  readonly description: string;
  /** Rendered by renderMessage; placeholders are {name} */
  readonly messageTemplate: string;
  readonly cause?: string | undefined;
  readonly resolution?: string | undefined;
}

/** Lookup table from error ID to definition */
export type ErrorRegistry = ReadonlyMap<string, ErrorDefinition>;

const ERROR_ID_PATTERN = /^QUILL-([RH])\d{3}$/;

const CATEGORY_LETTER: Record<ErrorCategory, string> = {
  runtime: 'R',
  host: 'H',
};

function indexDefinitions(
  definitions: readonly ErrorDefinition[]
): ErrorRegistry {
  const byId = new Map<string, ErrorDefinition>();
  for (const definition of definitions) {
    const { errorId, category } = definition;
    const match = ERROR_ID_PATTERN.exec(errorId);
    if (match === null || match[1] !== CATEGORY_LETTER[category]) {
      throw new Error(`Malformed error ID for ${category} error: ${errorId}`);
    }
    if (byId.has(errorId)) {
      throw new Error(`Duplicate error ID: ${errorId}`);
    }
    byId.set(errorId, Object.freeze(definition));
  }
  return byId;
}

const ERROR_DEFINITIONS: readonly ErrorDefinition[] = [
  {
    errorId: 'QUILL-R001',
    category: 'runtime',
    description: 'Wrong argument count',
    messageTemplate: '{functionName} expects {expected}, got {actualCount}',
    cause: 'A builtin was called with more or fewer arguments than it declares.',
    resolution:
      'Pass exactly the declared number of arguments. Arity is checked before argument types.',
  },
  {
    errorId: 'QUILL-R002',
    category: 'runtime',
    description: 'Argument type mismatch',
    messageTemplate:
      '{functionName} expects {expectedType} for argument {position}, got {actualType}',
    cause: 'An argument does not match the type declared for its position.',
    resolution:
      'Convert the argument first (ToString, ToInt, ToNumber, ToBool) or pass a value of the declared type.',
  },
  {
    errorId: 'QUILL-R003',
    category: 'runtime',
    description: 'Range out of bounds',
    messageTemplate:
      '{functionName} indices out of bounds: start {start}, end {end} for {subject} length {length}',
    cause: 'A strict range did not satisfy 0 <= start <= end <= length.',
    resolution:
      'Check the bounds before calling, or use ListSlice which clamps instead of failing.',
  },
  {
    errorId: 'QUILL-R004',
    category: 'runtime',
    description: 'Division by zero',
    messageTemplate: '{operation} by zero',
    cause: 'The divisor of a division or modulo was integer 0 or float 0.0.',
    resolution: 'Guard the divisor before dividing.',
  },
  {
    errorId: 'QUILL-R005',
    category: 'runtime',
    description: 'Conversion failed',
    messageTemplate: 'could not convert {subject} to {target}',
    cause:
      'A string did not parse as a number, or a float had no integer counterpart.',
    resolution: 'Validate the input text or value range before converting.',
  },
  {
    errorId: 'QUILL-R006',
    category: 'runtime',
    description: 'Unsupported operand types',
    messageTemplate:
      'unsupported types for {operator}: {leftType} and {rightType}',
    cause: 'An operator was applied to operand types it does not define.',
    resolution:
      'Only + concatenates strings; other arithmetic operators take INTEGER or FLOAT operands.',
  },
  {
    errorId: 'QUILL-R007',
    category: 'runtime',
    description: 'Argument outside domain',
    messageTemplate: '{functionName} of negative number',
    cause: 'A math builtin received a value outside its domain.',
    resolution: 'Take Abs of the value first, or guard against negatives.',
  },
  {
    errorId: 'QUILL-R008',
    category: 'runtime',
    description: 'File operation failed',
    messageTemplate: 'could not {action} file: {reason}',
    cause: 'The host filesystem rejected a read or write.',
    resolution: 'Check that the path exists and is accessible.',
  },
  {
    errorId: 'QUILL-R009',
    category: 'runtime',
    description: 'Input read failed',
    messageTemplate: 'error reading input: {reason}',
    cause: 'The line source closed or failed before a line was read.',
    resolution: 'Make sure input is available before calling ReadLine.',
  },
  {
    errorId: 'QUILL-R010',
    category: 'runtime',
    description: 'No execution context',
    messageTemplate:
      '{functionName} requires an execution context; none is attached',
    cause: 'Spawning work needs an executor that this value layer does not own.',
    resolution:
      'Produce a Future from the host (futureFrom) and pass it to Await instead.',
  },
  {
    errorId: 'QUILL-R011',
    category: 'runtime',
    description: 'Execution fault',
    messageTemplate: 'Runtime panic: {reason}',
    cause: 'An operation threw instead of returning an Error value.',
    resolution:
      'This is a defect in the host integration; validate inputs before indexing or calling host code.',
  },
  {
    errorId: 'QUILL-R012',
    category: 'runtime',
    description: 'Future already resolved',
    messageTemplate: 'future already resolved; delivery of {rejected} dropped',
    cause: 'A second value was delivered to a Future.',
    resolution: 'Deliver each Future exactly once.',
  },
  {
    errorId: 'QUILL-R013',
    category: 'runtime',
    description: 'List element type mismatch',
    messageTemplate:
      '{functionName} expects a list of {expectedType}, but found element of type {actualType}',
    cause: 'A list argument contained an element of the wrong type.',
    resolution: 'Convert the elements first, for example with ToString.',
  },
  {
    errorId: 'QUILL-R014',
    category: 'runtime',
    description: 'Index out of bounds',
    messageTemplate: 'array index out of bounds: {index} (length: {length})',
    cause: 'An index was at or past the end of the list.',
    resolution: 'Compare the index against len(list) first.',
  },
  {
    errorId: 'QUILL-R015',
    category: 'runtime',
    description: 'Negative index',
    messageTemplate: 'array index cannot be negative: {index}',
    cause: 'A negative index was used for element access.',
    resolution: 'Indices start at 0.',
  },
  // Host configuration errors (QUILL-H0xx)
  {
    errorId: 'QUILL-H001',
    category: 'host',
    description: 'Missing builtin description',
    messageTemplate:
      '{subject} requires description (requireDescriptions enabled)',
    cause:
      'A host builtin or one of its parameters was registered without a description.',
    resolution: 'Add description fields, or disable requireDescriptions.',
  },
  {
    errorId: 'QUILL-H002',
    category: 'host',
    description: 'Invalid extension namespace',
    messageTemplate:
      'Invalid namespace format: {namespace} (must match /^[a-zA-Z0-9_-]+$/)',
    cause: 'A namespace passed to prefixFunctions was empty or had other characters.',
    resolution: 'Use letters, digits, underscores and hyphens only.',
  },
];

export const ERROR_REGISTRY: ErrorRegistry =
  indexDefinitions(ERROR_DEFINITIONS);

const PLACEHOLDER = /\{([A-Za-z_][A-Za-z0-9_]*)\}/g;

function renderContextValue(value: unknown): string {
  if (value === undefined) return '';
  try {
    return String(value);
  } catch {
    return Object.prototype.toString.call(value);
  }
}

/**
 * Fill {name} placeholders from context.
 * Missing values render empty; braces around anything other than an
 * identifier are left as written.
 *
 * @example
 * renderMessage('{operation} by zero', { operation: 'division' })
 * // 'division by zero'
 */
export function renderMessage(
  template: string,
  context: Record<string, unknown>
): string {
  return template.replace(PLACEHOLDER, (_placeholder, key: string) =>
    renderContextValue(context[key])
  );
}

/**
 * Builtin Registry
 *
 * Every builtin shipped with the runtime, keyed by name. Built once at
 * module load; host builtins are layered on top by createRuntimeContext.
 */

import type { BuiltinDefinition } from '../../core/callable.js';
import { ASYNC_BUILTINS } from './async.js';
import { CONVERSION_BUILTINS } from './conversions.js';
import { IO_BUILTINS } from './io.js';
import { LIST_BUILTINS } from './lists.js';
import { MAP_BUILTINS } from './maps.js';
import { MATH_BUILTINS } from './math.js';
import { STRING_BUILTINS } from './strings.js';
import { UTILITY_BUILTINS } from './utility.js';

function buildRegistry(
  groups: readonly (readonly BuiltinDefinition[])[]
): ReadonlyMap<string, BuiltinDefinition> {
  const registry = new Map<string, BuiltinDefinition>();
  for (const group of groups) {
    for (const definition of group) {
      if (registry.has(definition.name)) {
        throw new Error(`Duplicate builtin: ${definition.name}`);
      }
      registry.set(definition.name, Object.freeze(definition));
    }
  }
  return registry;
}

/** All registry builtins keyed by name */
export const BUILTIN_REGISTRY: ReadonlyMap<string, BuiltinDefinition> =
  buildRegistry([
    STRING_BUILTINS,
    LIST_BUILTINS,
    MAP_BUILTINS,
    CONVERSION_BUILTINS,
    MATH_BUILTINS,
    IO_BUILTINS,
    UTILITY_BUILTINS,
    ASYNC_BUILTINS,
  ]);

/** Look up a registry builtin; undefined for unknown names */
export function lookupBuiltin(name: string): BuiltinDefinition | undefined {
  return BUILTIN_REGISTRY.get(name);
}

/**
 * Validate-on-Construct Pattern
 *
 * Parameters are validated at construction time, so invalid params
 * never reach a solve. mergeParams() calls validate() internally.
 */

import type { DeepPartial, ValidationResult } from './types.js';
import { ConfigurationError } from './errors.js';

/**
 * Wraps a component's merge + validate into a single operation.
 * Throws ConfigurationError on validation errors, logs warnings to console.
 *
 * @param componentName - Component name for error messages
 * @param validateFn - Component's validate function
 * @param mergeFn - Function that merges partial params with defaults
 * @param partial - Partial params to merge
 * @returns Fully merged and validated params
 */
export function validatedMerge<TParams>(
  componentName: string,
  validateFn: (params: Partial<TParams>) => ValidationResult,
  mergeFn: (partial: Partial<TParams>) => TParams,
  partial: Partial<TParams>
): TParams {
  const merged = mergeFn(partial);

  const result = validateFn(merged);

  if (result.warnings.length > 0) {
    for (const warning of result.warnings) {
      console.warn(`[${componentName}] Warning: ${warning}`);
    }
  }

  if (!result.valid) {
    throw new ConfigurationError(componentName, result.errors);
  }

  return merged;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Deep merge two parameter objects (overrides win, nested objects merge)
 */
export function deepMerge<T extends object>(base: T, override: DeepPartial<T> | undefined): T {
  const result: Record<string, unknown> = Object.fromEntries(Object.entries(base));
  if (override === undefined) return result as T;

  for (const [key, value] of Object.entries(override)) {
    const overrideValue: unknown = value;
    const baseValue = result[key];

    if (isPlainObject(overrideValue) && isPlainObject(baseValue)) {
      result[key] = deepMerge(baseValue, overrideValue);
    } else if (overrideValue !== undefined) {
      result[key] = overrideValue;
    }
  }

  return result as T;
}

/**
 * Freeze an object and everything reachable from it
 */
export function deepFreeze<T extends object>(obj: T): T {
  for (const value of Object.values(obj)) {
    if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
      deepFreeze(value);
    }
  }
  return Object.freeze(obj);
}

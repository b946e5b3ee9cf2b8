/**
 * Result Helpers
 *
 * Convenience functions for extracting data from timestep outputs.
 */

import { elementKey, parseElementKey, type ElementId, type OrganType } from './domain-types.js';
import type { OrganOutputs } from './solver.js';
import type { ElementOutputs } from './simulation.js';

/**
 * Get the outputs of one element.
 *
 * @returns ElementOutputs or undefined if the element was not solved
 */
export function getElement(
  outputs: ReadonlyMap<string, ElementOutputs>,
  id: ElementId
): ElementOutputs | undefined {
  return outputs.get(elementKey(id));
}

/**
 * Extract one numeric output across elements.
 *
 * @param field - Output name (e.g., 'an', 'ts')
 * @returns Element keys and values, in map order
 */
export function extractField(
  outputs: ReadonlyMap<string, ElementOutputs>,
  field: keyof OrganOutputs
): { keys: string[]; values: number[] } {
  const keys: string[] = [];
  const values: number[] = [];

  for (const [key, out] of outputs) {
    keys.push(key);
    values.push(out[field]);
  }

  return { keys, values };
}

/**
 * Outputs of the elements of one organ type
 */
export function filterByOrgan(
  outputs: ReadonlyMap<string, ElementOutputs>,
  organ: OrganType
): Map<string, ElementOutputs> {
  const result = new Map<string, ElementOutputs>();
  for (const [key, out] of outputs) {
    if (parseElementKey(key)?.[3] === organ) {
      result.set(key, out);
    }
  }
  return result;
}

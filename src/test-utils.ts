/**
 * Shared Test Fixtures
 *
 * Organs, weather and timestep inputs reused across the test files.
 */

import { elementKey, type ElementId } from './domain-types.js';
import type { AmbientConditions, OrganInputs } from './organ.js';
import type { AxisInputs, ElementInputs, SimulationInputs } from './simulation.js';

/** Flag leaf in good light */
export const BLADE: OrganInputs = {
  width: 0.015,
  height: 0.6,
  canopyHeight: 0.7,
  par: 500,
  surfacicNitrogen: 2,
  organType: 'blade',
};

/** Sheath lower in the canopy */
export const SHEATH: OrganInputs = {
  width: 0.004,
  height: 0.45,
  canopyHeight: 0.7,
  par: 150,
  surfacicNitrogen: 1.2,
  organType: 'sheath',
};

export const AMBIENT: AmbientConditions = {
  airTemperature: 20,
  ambientCO2: 380,
  relativeHumidity: 0.7,
  windSpeed: 2,
};

export const MAIN_STEM: AxisInputs = { canopyHeight: 0.7, samTemperature: 18.5 };

export const FLAG_LEAF_ID: ElementId = [1, 'MS', 8, 'blade', 'visible'];
export const SHEATH_ID: ElementId = [1, 'MS', 8, 'sheath', 'visible'];
export const HIDDEN_ID: ElementId = [1, 'MS', 9, 'internode', 'hidden'];

/**
 * Timestep inputs on the main stem of plant 1
 */
export function mainStemInputs(elements: [ElementId, ElementInputs][]): SimulationInputs {
  return {
    elements: new Map(elements.map(([id, inputs]): [string, ElementInputs] => [elementKey(id), inputs])),
    axes: new Map([['1/MS', MAIN_STEM]]),
  };
}

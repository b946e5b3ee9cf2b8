/**
 * Temperature Module
 *
 * Temperature dependence of the photosynthetic parameters.
 *
 * Every parameter follows an Arrhenius activation normalised at 25 °C.
 * The capacity parameters (Vc_max, Jmax, TPU) have a temperature optimum
 * and additionally follow an entropy-based deactivation; the kinetic
 * constants (Kc, Ko), the CO2 compensation point and dark respiration do not.
 *
 * References:
 *   Braune et al. (2009) Ecological Modelling 220, 1599–1612
 *   Bernacchi et al. (2001) Plant, Cell & Environment 24, 253–259
 */

import { defineComponent, type Component } from '../framework/module.js';
import type { ValidationResult } from '../framework/types.js';
import { validatedMerge, deepMerge } from '../framework/validated-merge.js';
import { arrheniusActivation, entropyDeactivation } from '../primitives/math.js';
import { KELVIN_DEGREE } from '../primitives/constants.js';

// =============================================================================
// PARAMETERS
// =============================================================================

/** Parameters with an activation energy */
export type TemperatureParameter = 'vcMax' | 'jMax' | 'tpu' | 'kc' | 'ko' | 'gamma' | 'rDark';
export const TEMPERATURE_PARAMETERS: readonly TemperatureParameter[] = [
  'vcMax', 'jMax', 'tpu', 'kc', 'ko', 'gamma', 'rDark',
];

/** Capacity parameters, the only ones subject to deactivation */
export type CapacityParameter = 'vcMax' | 'jMax' | 'tpu';
export const CAPACITY_PARAMETERS: readonly CapacityParameter[] = ['vcMax', 'jMax', 'tpu'];

export function isCapacityParameter(name: TemperatureParameter): name is CapacityParameter {
  return CAPACITY_PARAMETERS.some((p) => p === name);
}

export interface DeactivationParams {
  deltaHd: number;   // Enthalpy of deactivation, kJ mol⁻¹
  deltaS: number;    // Entropy term, kJ mol⁻¹ K⁻¹
}

export interface TemperatureParams {
  tref: number;                                            // Reference temperature, K (298.15)
  deltaHa: Record<TemperatureParameter, number>;           // Enthalpy of activation, kJ mol⁻¹
  deactivation: Record<CapacityParameter, DeactivationParams>;
}

export const temperatureDefaults: TemperatureParams = {
  tref: 298.15,
  deltaHa: {
    vcMax: 89.7,
    jMax: 48.9,
    tpu: 47.0,
    kc: 79.43,    // Bernacchi et al. (2001)
    ko: 36.38,    // Bernacchi et al. (2001)
    gamma: 35.0,
    rDark: 46.39, // Bernacchi et al. (2001)
  },
  deactivation: {
    vcMax: { deltaHd: 149.3, deltaS: 0.486 },
    jMax: { deltaHd: 152.3, deltaS: 0.495 },
    tpu: { deltaHd: 152.3, deltaS: 0.495 },
  },
};

// =============================================================================
// FORMULAS
// =============================================================================

/**
 * Value of a photosynthetic parameter at organ temperature.
 *
 * @param name - Parameter name
 * @param value25 - Parameter value at 25 °C
 * @param temperature - Organ temperature (°C)
 * @param params - Temperature coefficients
 */
export function temperatureAdjust(
  name: TemperatureParameter,
  value25: number,
  temperature: number,
  params: TemperatureParams = temperatureDefaults
): number {
  const tk = temperature + KELVIN_DEGREE;
  const activation = arrheniusActivation(params.deltaHa[name], tk, params.tref);

  let deactivation = 1;
  if (isCapacityParameter(name)) {
    const { deltaHd, deltaS } = params.deactivation[name];
    deactivation = entropyDeactivation(deltaHd, deltaS, tk, params.tref);
  }

  return value25 * activation * deactivation;
}

// =============================================================================
// COMPONENT DEFINITION
// =============================================================================

export const temperatureComponent: Component<TemperatureParams> = defineComponent({
  name: 'temperature',
  description: 'Arrhenius activation and entropy deactivation of photosynthetic parameters',

  defaults: temperatureDefaults,

  paramMeta: {
    tref: {
      description: 'Reference temperature at which 25 °C parameter values are given.',
      unit: 'K',
      range: { min: 273.15, max: 323.15, default: 298.15 },
      tier: 3 as const,
    },
    deltaHa: {
      vcMax: {
        description: 'Enthalpy of activation of Vc_max.',
        unit: 'kJ mol⁻¹',
        range: { min: 0, max: 200, default: 89.7 },
        tier: 3 as const,
        source: 'Braune et al. (2009)',
      },
      jMax: {
        description: 'Enthalpy of activation of Jmax.',
        unit: 'kJ mol⁻¹',
        range: { min: 0, max: 200, default: 48.9 },
        tier: 3 as const,
        source: 'Braune et al. (2009)',
      },
      kc: {
        description: 'Enthalpy of activation of the RuBisCO affinity constant for CO2.',
        unit: 'kJ mol⁻¹',
        range: { min: 0, max: 200, default: 79.43 },
        tier: 3 as const,
        source: 'Bernacchi et al. (2001)',
      },
    },
  },

  validate(params: Partial<TemperatureParams>): ValidationResult {
    const errors: string[] = [];
    const warnings: string[] = [];

    const p = deepMerge(temperatureDefaults, params);

    if (p.tref <= 0) {
      errors.push(`tref ${p.tref} must be a positive absolute temperature`);
    }
    for (const name of TEMPERATURE_PARAMETERS) {
      if (!Number.isFinite(p.deltaHa[name])) {
        errors.push(`deltaHa.${name} must be a finite number`);
      } else if (p.deltaHa[name] < 0) {
        warnings.push(`deltaHa.${name} ${p.deltaHa[name]} is negative (rate falls with temperature)`);
      }
    }
    for (const name of CAPACITY_PARAMETERS) {
      const { deltaHd, deltaS } = p.deactivation[name];
      if (deltaHd <= 0) {
        errors.push(`deactivation.${name}.deltaHd must be positive`);
      }
      if (deltaS <= 0) {
        errors.push(`deactivation.${name}.deltaS must be positive`);
      }
    }

    return { valid: errors.length === 0, errors, warnings };
  },

  mergeParams(partial: Partial<TemperatureParams>): TemperatureParams {
    return validatedMerge('temperature', this.validate, (p) => deepMerge(temperatureDefaults, p), partial);
  },
});

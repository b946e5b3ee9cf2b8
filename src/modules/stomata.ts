/**
 * Stomata Module
 *
 * Ball, Woodrow and Berry (1987) stomatal conductance, using gross
 * assimilation and CO2 at the organ surface, with a nitrogen-dependent
 * scaling factor:
 *
 *   Cs  = Ca − An · 1.37 / gb
 *   m   = δ1 · N^δ2
 *   gsw = gsmin + m · Ag · RH / Cs
 *
 * and the diffusion balance giving internal CO2:
 *
 *   Ci = Ca − An · (1.6 / gsw + 1.37 / gb)
 *
 * 1.6 converts a conductance to water vapour into one to CO2;
 * 1.37 = 1.6^(2/3) does the same across the boundary layer.
 *
 * References:
 *   Ball, Woodrow and Berry (1987) Progress in Photosynthesis Research IV, 221–224
 *   Muller et al. (2005) Annals of Botany 95, 1125–1137
 *   Prieto et al. (2012) Annals of Botany 110, 1415–1428
 */

import { defineComponent, type Component } from '../framework/module.js';
import type { ValidationResult } from '../framework/types.js';
import { validatedMerge } from '../framework/validated-merge.js';

// =============================================================================
// PARAMETERS
// =============================================================================

export interface StomataParams {
  gsMin: number;        // Minimum gsw measured in the dark, mol m⁻² s⁻¹ (0.05)
  gb: number;           // Boundary-layer conductance to water vapour, mol m⁻² s⁻¹ (3.5)
  delta1: number;       // Scale of m against nitrogen, m² g⁻¹ (14.7)
  delta2: number;       // Exponent of m against nitrogen (-0.548)
}

export const stomataDefaults: StomataParams = {
  gsMin: 0.05,
  gb: 3.5,
  delta1: 14.7,
  delta2: -0.548,
};

/** Ratio of diffusivities of water vapour and CO2 in air */
const STOMATAL_CO2_RATIO = 1.6;
/** Same ratio across the boundary layer, 1.6^(2/3) */
const BOUNDARY_CO2_RATIO = 1.37;

// =============================================================================
// FORMULAS
// =============================================================================

/**
 * CO2 concentration at the organ surface (µmol mol⁻¹)
 */
export function surfaceCO2(ambientCO2: number, an: number, params: StomataParams = stomataDefaults): number {
  return ambientCO2 - an * (BOUNDARY_CO2_RATIO / params.gb);
}

/**
 * Stomatal conductance to water vapour (mol m⁻² s⁻¹).
 *
 * Without gross assimilation the conductance is gsMin; the slope term is
 * only formed for Ag > 0, where the nitrogen driver is positive.
 *
 * @param ag - Gross assimilation (µmol m⁻² s⁻¹)
 * @param an - Net assimilation (µmol m⁻² s⁻¹)
 * @param nitrogen - Surfacic nitrogen capacity driver (g N m⁻²)
 * @param ambientCO2 - µmol mol⁻¹
 * @param relativeHumidity - Fraction 0-1
 */
export function stomatalConductance(
  ag: number,
  an: number,
  nitrogen: number,
  ambientCO2: number,
  relativeHumidity: number,
  params: StomataParams = stomataDefaults
): number {
  if (ag <= 0) {
    return params.gsMin;
  }
  const cs = surfaceCO2(ambientCO2, an, params);
  const m = params.delta1 * Math.pow(nitrogen, params.delta2);
  return params.gsMin + m * ((ag * relativeHumidity) / cs);
}

/**
 * Internal CO2 concentration (µmol mol⁻¹)
 */
export function internalCO2(
  ambientCO2: number,
  an: number,
  gsw: number,
  params: StomataParams = stomataDefaults
): number {
  return ambientCO2 - an * (STOMATAL_CO2_RATIO / gsw + BOUNDARY_CO2_RATIO / params.gb);
}

// =============================================================================
// COMPONENT DEFINITION
// =============================================================================

export const stomataComponent: Component<StomataParams> = defineComponent({
  name: 'stomata',
  description: 'Ball-Woodrow-Berry stomatal conductance and CO2 diffusion balance',

  defaults: stomataDefaults,

  paramMeta: {
    gsMin: {
      paramName: 'gsMin',
      description: 'Minimum stomatal conductance to water vapour, measured in the dark.',
      unit: 'mol m⁻² s⁻¹',
      range: { min: 0, max: 0.5, default: 0.05 },
      tier: 1 as const,
      source: 'Braune et al. (2009)',
    },
    gb: {
      description: 'Boundary-layer conductance to water vapour.',
      unit: 'mol m⁻² s⁻¹',
      range: { min: 0.1, max: 10, default: 3.5 },
      tier: 3 as const,
      source: 'Muller et al. (2005)',
    },
    delta1: {
      description: 'Scale of the Ball-Berry slope m against surfacic nitrogen.',
      unit: 'm² g⁻¹',
      range: { min: 0, max: 50, default: 14.7 },
      tier: 3 as const,
    },
    delta2: {
      description: 'Exponent of the Ball-Berry slope m against surfacic nitrogen.',
      unit: 'dimensionless',
      range: { min: -2, max: 2, default: -0.548 },
      tier: 3 as const,
    },
  },

  validate(params: Partial<StomataParams>): ValidationResult {
    const errors: string[] = [];
    const warnings: string[] = [];

    const p = { ...stomataDefaults, ...params };

    if (p.gsMin < 0) {
      errors.push('gsMin cannot be negative');
    }
    if (p.gsMin > 0.5) {
      warnings.push(`gsMin ${p.gsMin} unusually high (default uses 0.05)`);
    }
    if (p.gb <= 0) {
      errors.push('gb must be positive');
    }
    if (p.delta1 < 0) {
      errors.push('delta1 cannot be negative');
    }

    return { valid: errors.length === 0, errors, warnings };
  },

  mergeParams(partial: Partial<StomataParams>): StomataParams {
    return validatedMerge('stomata', this.validate, (p) => ({ ...stomataDefaults, ...p }), partial);
  },
});

/**
 * Convergence Module
 *
 * Parameters of the (Ts, Ci) fixed-point iteration and of the terminal
 * conversions applied to its result.
 */

import { defineComponent, type Component } from '../framework/module.js';
import type { ValidationResult } from '../framework/types.js';
import { validatedMerge } from '../framework/validated-merge.js';

// =============================================================================
// PARAMETERS
// =============================================================================

export interface ConvergenceParams {
  maxIterations: number;       // Hard cap on substitutions (30)
  relativeTolerance: number;   // On both Ci and Ts (0.01)
  initialCiRatio: number;      // Ci₀ / Ca (0.7)
  stemEfficiency: number;      // Ag discount for non-lamina organs (0.78)
}

export const convergenceDefaults: ConvergenceParams = {
  maxIterations: 30,
  relativeTolerance: 0.01,
  initialCiRatio: 0.7,
  stemEfficiency: 0.78,
};

// =============================================================================
// COMPONENT DEFINITION
// =============================================================================

export const convergenceComponent: Component<ConvergenceParams> = defineComponent({
  name: 'convergence',
  description: 'Fixed-point iteration over organ temperature and internal CO2',

  defaults: convergenceDefaults,

  paramMeta: {
    maxIterations: {
      paramName: 'maxIterations',
      description: 'Maximum number of substitutions before the solve stops unconverged.',
      unit: 'count',
      range: { min: 1, max: 1000, default: 30 },
      tier: 2 as const,
    },
    relativeTolerance: {
      paramName: 'relativeTolerance',
      description: 'Relative change of Ci and Ts below which the solve has converged.',
      unit: 'fraction',
      range: { min: 1e-6, max: 0.5, default: 0.01 },
      tier: 2 as const,
    },
    initialCiRatio: {
      description: 'Initial internal CO2 as a fraction of ambient CO2.',
      unit: 'fraction',
      range: { min: 0.1, max: 1, default: 0.7 },
      tier: 3 as const,
    },
    stemEfficiency: {
      paramName: 'stemEfficiency',
      description: 'Photosynthetic efficiency of sheaths, internodes, peduncles and ears relative to laminae.',
      unit: 'fraction',
      range: { min: 0, max: 1, default: 0.78 },
      tier: 1 as const,
    },
  },

  validate(params: Partial<ConvergenceParams>): ValidationResult {
    const errors: string[] = [];
    const warnings: string[] = [];

    const p = { ...convergenceDefaults, ...params };

    if (!Number.isInteger(p.maxIterations) || p.maxIterations < 1) {
      errors.push('maxIterations must be a positive integer');
    }
    if (p.relativeTolerance <= 0) {
      errors.push('relativeTolerance must be positive');
    }
    if (p.relativeTolerance > 0.1) {
      warnings.push(`relativeTolerance ${p.relativeTolerance} is loose (default uses 0.01)`);
    }
    if (p.initialCiRatio <= 0 || p.initialCiRatio > 1) {
      errors.push('initialCiRatio must be in (0, 1]');
    }
    if (p.stemEfficiency < 0 || p.stemEfficiency > 1) {
      errors.push('stemEfficiency must be between 0 and 1');
    }

    return { valid: errors.length === 0, errors, warnings };
  },

  mergeParams(partial: Partial<ConvergenceParams>): ConvergenceParams {
    return validatedMerge('convergence', this.validate, (p) => ({ ...convergenceDefaults, ...p }), partial);
  },
});

/**
 * Organ Solver
 *
 * Drives the organ module to a fixed point on (Ts, Ci):
 *
 *   - Start from Ci = 0.7 · Ca and Ts = Ta
 *   - Substitute until both relative changes fall below the tolerance,
 *     or the iteration cap is reached
 *   - Convert transpiration to mmol m⁻² s⁻¹ and discount the gross
 *     assimilation of non-lamina organs
 *
 * Non-convergence is not an error. The solve returns the last iterate
 * together with diagnostics naming the quantity that was still moving.
 */

import { defineFixedPoint, init, solve, type FixedPointProblem, type IterationStep } from './framework/iterate.js';
import { relativeChange } from './primitives/math.js';
import { WATER_MOLAR_MASS } from './primitives/constants.js';
import { ORGAN_CAPABILITIES } from './domain-types.js';
import { defaultConfig, type OrganModelConfig, type OrganModelParams } from './config.js';
import {
  organModule,
  type AmbientConditions,
  type OrganInputs,
  type OrganSolveInputs,
  type OrganState,
} from './organ.js';

// =============================================================================
// TYPES
// =============================================================================

/** Final outputs of one organ */
export interface OrganOutputs {
  ag: number;       // Gross assimilation, µmol m⁻² s⁻¹ (stem efficiency applied)
  an: number;       // Net assimilation, µmol m⁻² s⁻¹
  rd: number;       // Respiration in the light, µmol m⁻² s⁻¹
  tr: number;       // Transpiration, mmol m⁻² s⁻¹
  ts: number;       // Organ temperature, °C
  gs: number;       // Stomatal conductance to water vapour, mol m⁻² s⁻¹
}

export type ConvergenceQuantity = 'Ci' | 'Ts';

export interface ConvergenceDiagnostic {
  quantity: ConvergenceQuantity;
  previous: number;
  current: number;
}

export interface SolveResult {
  outputs: OrganOutputs;
  iterations: number;
  converged: boolean;
  diagnostics: ConvergenceDiagnostic[];
}

export interface SolveOptions {
  /** Organ label used in diagnostic messages */
  label?: string;
  /** Log diagnostics with console.warn (default true) */
  log?: boolean;
}

// =============================================================================
// CONVERGENCE
// =============================================================================

/**
 * Convergence criterion between two successive states.
 *
 * An organ at exactly 0 °C counts as converged on Ts only if Ts did not
 * move at all, since no relative change can be formed.
 */
export function hasConverged(previous: OrganState, current: OrganState, tolerance: number): boolean {
  const ciSettled = relativeChange(previous.ci, current.ci) < tolerance;
  const tsSettled =
    (previous.ts === 0 && current.ts - previous.ts === 0) ||
    relativeChange(previous.ts, current.ts) < tolerance;
  return ciSettled && tsSettled;
}

/**
 * Quantities still moving when the iteration cap was reached: every
 * quantity that fails the convergence test, NaN iterates included.
 * Ts is not reported when its previous value is 0.
 */
export function convergenceDiagnostics(
  previous: OrganState,
  current: OrganState,
  tolerance: number
): ConvergenceDiagnostic[] {
  const diagnostics: ConvergenceDiagnostic[] = [];
  if (!(relativeChange(previous.ci, current.ci) < tolerance)) {
    diagnostics.push({ quantity: 'Ci', previous: previous.ci, current: current.ci });
  }
  if (previous.ts !== 0 && !(relativeChange(previous.ts, current.ts) < tolerance)) {
    diagnostics.push({ quantity: 'Ts', previous: previous.ts, current: current.ts });
  }
  return diagnostics;
}

// =============================================================================
// PROBLEM
// =============================================================================

/**
 * Inert fixed-point definition for one organ
 */
export function defineOrganProblem(
  organ: OrganInputs,
  ambient: AmbientConditions,
  config: OrganModelConfig = defaultConfig
): FixedPointProblem<OrganModelParams, OrganState, OrganSolveInputs, OrganState> {
  const { maxIterations, relativeTolerance } = config.convergence;
  return defineFixedPoint({
    module: organModule,
    params: config,
    inputs: { organ, ambient },
    maxIterations,
    converged: (previous, current) => hasConverged(previous, current, relativeTolerance),
  });
}

/**
 * Terminal conversions of the last iterate
 */
export function finalizeOutputs(
  state: OrganState,
  organ: OrganInputs,
  config: OrganModelConfig = defaultConfig
): OrganOutputs {
  const { stemDiscount } = ORGAN_CAPABILITIES[organ.organType];
  return {
    ag: stemDiscount ? state.ag * config.convergence.stemEfficiency : state.ag,
    an: state.an,
    rd: state.rd,
    tr: (state.tr * 1e6) / WATER_MOLAR_MASS,  // mm s⁻¹ = kg m⁻² s⁻¹ → mmol m⁻² s⁻¹
    ts: state.ts,
    gs: state.gsw,
  };
}

// =============================================================================
// SOLVE
// =============================================================================

/**
 * Solve one organ.
 *
 * Identical inputs give identical outputs; nothing outside the returned
 * result is modified.
 */
export function solveOrgan(
  organ: OrganInputs,
  ambient: AmbientConditions,
  config: OrganModelConfig = defaultConfig,
  options: SolveOptions = {}
): SolveResult {
  const result = solve(defineOrganProblem(organ, ambient, config));

  const diagnostics = result.converged
    ? []
    : convergenceDiagnostics(result.previous, result.state, config.convergence.relativeTolerance);

  if (options.log !== false) {
    const label = options.label ?? organ.organType;
    for (const d of diagnostics) {
      console.warn(`[solver] ${label}: ${d.quantity} did not converge after ${result.iterations} iterations (previous ${d.previous}, current ${d.current})`);
    }
  }

  return {
    outputs: finalizeOutputs(result.state, organ, config),
    iterations: result.iterations,
    converged: result.converged,
    diagnostics,
  };
}

/**
 * Every intermediate step of a solve, for inspection
 */
export function traceOrgan(
  organ: OrganInputs,
  ambient: AmbientConditions,
  config: OrganModelConfig = defaultConfig
): IterationStep<OrganState, OrganState>[] {
  const stepper = init(defineOrganProblem(organ, ambient, config));
  const steps: IterationStep<OrganState, OrganState>[] = [];
  while (!stepper.done()) {
    steps.push(stepper.step());
  }
  return steps;
}

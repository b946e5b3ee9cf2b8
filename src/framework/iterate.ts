/**
 * Problem-Solve Separation for fixed-point iteration
 *
 * Separates the definition of a successive-substitution problem from its
 * execution.
 *
 * Usage:
 *   // Define (inert - no computation)
 *   const problem = defineFixedPoint({ module, params, inputs, maxIterations, converged });
 *
 *   // Batch run
 *   const result = solve(problem);
 *
 *   // Interactive step-by-step
 *   const stepper = init(problem);
 *   while (!stepper.done()) {
 *     const { iteration, state } = stepper.step();
 *     console.log(iteration, state.ts);
 *   }
 *   const result = stepper.result();
 */

import type { Module } from './module.js';

// =============================================================================
// TYPES
// =============================================================================

/**
 * Inert fixed-point definition. Holds configuration but performs no computation.
 */
export interface FixedPointProblem<
  TParams extends object,
  TState extends object,
  TInputs extends object,
  TOutputs extends object
> {
  readonly module: Module<TParams, TState, TInputs, TOutputs>;
  readonly params: TParams;
  readonly inputs: TInputs;
  /** Hard ceiling on the number of steps, independent of convergence */
  readonly maxIterations: number;
  /** Convergence criterion between two successive states */
  converged(previous: TState, current: TState): boolean;
}

/**
 * Step result returned on each advance
 */
export interface IterationStep<TState, TOutputs> {
  /** Number of steps taken so far (1 after the first step) */
  iteration: number;
  previous: TState;
  state: TState;
  outputs: TOutputs;
  converged: boolean;
  done: boolean;
}

/**
 * Final outcome of a fixed-point solve
 */
export interface FixedPointResult<TState, TOutputs> {
  /** Last state reached */
  state: TState;
  /** State before the last step (for diagnostics) */
  previous: TState;
  /** Outputs of the last step */
  outputs: TOutputs;
  iterations: number;
  /** Whether the criterion held at the last step */
  converged: boolean;
}

/**
 * Interactive step-by-step runner
 */
export interface Stepper<TState, TOutputs> {
  /** Advance one substitution. */
  step(): IterationStep<TState, TOutputs>;
  /** Number of steps taken */
  iteration(): number;
  /** Whether the iteration has stopped (converged or hit the ceiling) */
  done(): boolean;
  /** Current state */
  state(): TState;
  /** Outcome so far; throws if no step has been taken */
  result(): FixedPointResult<TState, TOutputs>;
}

// =============================================================================
// DEFINE
// =============================================================================

/**
 * Define a fixed-point problem (no computation performed).
 */
export function defineFixedPoint<
  TParams extends object,
  TState extends object,
  TInputs extends object,
  TOutputs extends object
>(
  problem: FixedPointProblem<TParams, TState, TInputs, TOutputs>
): FixedPointProblem<TParams, TState, TInputs, TOutputs> {
  return problem;
}

// =============================================================================
// INIT (STEPPER)
// =============================================================================

/**
 * Initialize a step-by-step runner.
 */
export function init<
  TParams extends object,
  TState extends object,
  TInputs extends object,
  TOutputs extends object
>(
  problem: FixedPointProblem<TParams, TState, TInputs, TOutputs>
): Stepper<TState, TOutputs> {
  const { module, params, inputs, maxIterations } = problem;
  let current = module.init(inputs, params);
  let last: IterationStep<TState, TOutputs> | undefined;
  let count = 0;

  return {
    step(): IterationStep<TState, TOutputs> {
      if (last?.done) {
        throw new Error(`[${module.name}] step() called after the iteration stopped`);
      }
      const previous = current;
      const { state, outputs } = module.step(previous, inputs, params, count);
      count++;
      current = state;

      const converged = problem.converged(previous, state);
      last = {
        iteration: count,
        previous,
        state,
        outputs,
        converged,
        done: converged || count >= maxIterations,
      };
      return last;
    },

    iteration(): number {
      return count;
    },

    done(): boolean {
      return last?.done ?? false;
    },

    state(): TState {
      return current;
    },

    result(): FixedPointResult<TState, TOutputs> {
      if (!last) {
        throw new Error(`[${module.name}] result() called before the first step`);
      }
      return {
        state: last.state,
        previous: last.previous,
        outputs: last.outputs,
        iterations: last.iteration,
        converged: last.converged,
      };
    },
  };
}

// =============================================================================
// SOLVE
// =============================================================================

/**
 * Run a fixed-point problem until convergence or the iteration ceiling.
 */
export function solve<
  TParams extends object,
  TState extends object,
  TInputs extends object,
  TOutputs extends object
>(
  problem: FixedPointProblem<TParams, TState, TInputs, TOutputs>
): FixedPointResult<TState, TOutputs> {
  const stepper = init(problem);
  do {
    stepper.step();
  } while (!stepper.done());
  return stepper.result();
}

/**
 * Component and Module interfaces - the core abstractions
 *
 * A component is a parameterised set of pure functions:
 * - Typed parameters (validated at load time)
 * - Defaults and metadata co-located with the formulas
 *
 * A module is a component that also owns a working state and a pure
 * step function. The fixed-point driver calls `step` repeatedly until
 * the state stops changing.
 */

import type { ValidationResult, ParamMetaTree } from './types.js';

/**
 * Parameterised component definition
 *
 * @template TParams - Component's parameter type
 */
export interface Component<TParams extends object> {
  /** Unique component identifier */
  readonly name: string;

  /** Human-readable description */
  readonly description: string;

  /** Default parameters */
  readonly defaults: TParams;

  /**
   * Parameter metadata tree, mirroring the structure of `defaults`.
   * Leaf nodes are ParamMeta objects (have `description` + `unit` + `range`).
   * Used by generateParameterSchema() to auto-generate introspection data.
   */
  readonly paramMeta?: ParamMetaTree;

  /**
   * Validate parameters
   * Called once per configuration build, never per organ
   */
  validate(params: Partial<TParams>): ValidationResult;

  /**
   * Merge partial params with defaults (validate-on-construct)
   */
  mergeParams(partial: Partial<TParams>): TParams;
}

/**
 * Module definition interface
 *
 * @template TParams - Module's parameter type
 * @template TState - Working state mutated by the iteration
 * @template TInputs - Fixed inputs for the duration of one solve
 * @template TOutputs - What one step reports
 */
export interface Module<
  TParams extends object,
  TState extends object,
  TInputs extends object,
  TOutputs extends object
> extends Component<TParams> {
  /**
   * Initial working state for a fresh solve
   */
  init(inputs: TInputs, params: TParams): TState;

  /**
   * Step function - one substitution of the fixed-point iteration
   *
   * MUST be pure: no side effects, no mutations
   *
   * @param state - Current state (from previous step or init)
   * @param inputs - Inputs held constant for the whole solve
   * @param params - Module parameters (immutable)
   * @param iteration - Number of steps already taken (0 on the first call)
   */
  step(
    state: TState,
    inputs: TInputs,
    params: TParams,
    iteration: number
  ): StepResult<TState, TOutputs>;
}

/**
 * Result of a step function
 */
export interface StepResult<TState, TOutputs> {
  /** New state for the next step */
  state: TState;
  /** Outputs for this step */
  outputs: TOutputs;
}

/**
 * Helper to create a component with better type inference
 */
export function defineComponent<TParams extends object>(
  definition: Component<TParams>
): Component<TParams> {
  return definition;
}

/**
 * Helper to create a module with better type inference
 */
export function defineModule<
  TParams extends object,
  TState extends object,
  TInputs extends object,
  TOutputs extends object
>(
  definition: Module<TParams, TState, TInputs, TOutputs>
): Module<TParams, TState, TInputs, TOutputs> {
  return definition;
}

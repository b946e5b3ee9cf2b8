/**
 * organ-photosynthesis - Coupled photosynthesis, stomatal conductance and
 * energy balance of photosynthetic plant organs
 *
 * Main entry point for programmatic use.
 */

// Simulation
export { Simulation, runTimestep, absorbedPar, resolveOrgan, bypassOutputs, DEFAULT_AMBIENT } from './simulation.js';
export type { ElementInputs, AxisInputs, SimulationInputs, ElementOutputs, ElementFailure, TimestepResult } from './simulation.js';

// Solver
export { solveOrgan, traceOrgan, defineOrganProblem, finalizeOutputs, hasConverged, convergenceDiagnostics } from './solver.js';
export type { OrganOutputs, SolveResult, SolveOptions, ConvergenceDiagnostic, ConvergenceQuantity } from './solver.js';
export { organModule } from './organ.js';
export type { OrganInputs, AmbientConditions, OrganState, OrganSolveInputs } from './organ.js';

// Configuration
export { createConfig, updateConfig, validateConfig, parseModelVersion, organModelDefaults, defaultConfig } from './config.js';
export type { OrganModelParams, OrganModelConfig, OrganModelOverrides } from './config.js';

// Input loader
export { loadInputs, parseInputs, listInputs, getInputsPath, resolveInputsPath, toRows, fromRows } from './inputs.js';
export type { LoadedInputs, InputDocument, ElementLocation } from './inputs.js';

// Formula library
export { temperatureAdjust, temperatureComponent, temperatureDefaults } from './modules/temperature.js';
export { assimilation, limitations, capacitiesAt25, lightRespiration, photosynthesisComponent, photosynthesisDefaults } from './modules/photosynthesis.js';
export { stomatalConductance, internalCO2, surfaceCO2, stomataComponent, stomataDefaults } from './modules/stomata.js';
export { organEnergyBalance, windProfile, boundaryLayerResistance, netRadiation, vapourPressureSlope, energyBalanceComponent, energyBalanceDefaults } from './modules/energy-balance.js';
export {
  capacityDriver,
  surfacicNitrogen,
  surfacicNonstructuralNitrogen,
  surfacicPhotosyntheticProteins,
  nonstructuralNitrogenFromProteins,
  surfacicNonstructuralCarbohydrates,
  retroinhibitionFactor,
  NITROGEN_VARIANTS,
  nitrogenComponent,
  nitrogenDefaults,
} from './modules/nitrogen.js';
export type { NitrogenStatus, NitrogenVariant } from './modules/nitrogen.js';
export { convergenceComponent, convergenceDefaults } from './modules/convergence.js';

// Introspection
export { describeParameters, describeOutputs, listParameters } from './introspection.js';
export type { ParameterInfo, ParameterSchema, OutputInfo, OutputSchema } from './introspection.js';

// Result helpers
export { getElement, extractField, filterByOrgan } from './helpers.js';

// Domain types
export { ORGAN_TYPES, ORGAN_CAPABILITIES, MODEL_VERSIONS, elementKey, parseElementKey, axisKey, axisOf, isOrganType, isModelVersion } from './domain-types.js';
export type { OrganType, ModelVersion, ElementId, AxisId, ConvectionRegime } from './domain-types.js';

// Framework
export { ConfigurationError, InputError } from './framework/errors.js';
export type { ValidationResult } from './framework/types.js';

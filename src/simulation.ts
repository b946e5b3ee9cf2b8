/**
 * Simulation Runner
 *
 * Solves every photosynthetic element of a timestep independently:
 *
 *   element inputs ─┬─ height null ──────────────→ bypass (Ts = SAM temperature)
 *                   └─ PAR, nitrogen, geometry ──→ solveOrgan → outputs
 *
 * Elements are keyed by elementKey(); the canopy height and the apical
 * meristem temperature come from the element's axis. Nothing is carried
 * from one timestep to the next.
 */

import { InputError } from './framework/errors.js';
import { axisKey, axisOf, parseElementKey, type OrganType } from './domain-types.js';
import { createConfig, updateConfig, type OrganModelConfig, type OrganModelOverrides } from './config.js';
import { capacityDriver, type NitrogenStatus } from './modules/nitrogen.js';
import type { AmbientConditions, OrganInputs } from './organ.js';
import { solveOrgan, type OrganOutputs } from './solver.js';

// =============================================================================
// TYPES
// =============================================================================

/**
 * Inputs of one element, as supplied by the architecture collaborator.
 * Absorbed PAR is either given directly or as the fraction `star` of
 * the incident PAR of the timestep.
 */
export interface ElementInputs extends NitrogenStatus {
  width: number | null;       // m
  height: number | null;      // m, null for elements without resolved geometry
  par?: number;               // Absorbed PAR, µmol m⁻² s⁻¹
  star?: number;              // Fraction of incident PAR absorbed
}

export interface AxisInputs {
  canopyHeight: number;       // m
  samTemperature: number;     // Shoot apical meristem temperature, °C
}

export interface SimulationInputs {
  elements: Map<string, ElementInputs>;
  axes: Map<string, AxisInputs>;
}

export interface ElementOutputs extends OrganOutputs {
  width: number | null;
  height: number | null;
}

export interface ElementFailure {
  key: string;
  message: string;
}

export interface TimestepResult {
  outputs: Map<string, ElementOutputs>;
  /** Elements that could not be solved (skipped, reported) */
  failures: ElementFailure[];
  /** Keys of elements that hit the iteration cap */
  unconverged: string[];
}

/** Weather used by the CLI when neither the input file nor flags give one */
export const DEFAULT_AMBIENT: AmbientConditions = {
  airTemperature: 20,
  ambientCO2: 380,
  relativeHumidity: 0.7,
  windSpeed: 3,
  incidentPar: 1000,
};

// =============================================================================
// ELEMENT RESOLUTION
// =============================================================================

/**
 * Absorbed PAR of an element
 */
export function absorbedPar(element: ElementInputs, ambient: AmbientConditions): number {
  if (element.par !== undefined) {
    return element.par;
  }
  if (element.star !== undefined) {
    if (ambient.incidentPar === undefined) {
      throw new InputError('element gives star but the timestep has no incidentPar');
    }
    return element.star * ambient.incidentPar;
  }
  throw new InputError('element gives neither par nor star');
}

/**
 * Static organ description for the solver
 */
export function resolveOrgan(
  organType: OrganType,
  element: ElementInputs,
  axis: AxisInputs,
  ambient: AmbientConditions,
  config: OrganModelConfig
): OrganInputs {
  if (element.width === null || element.height === null) {
    throw new InputError('element has no resolved geometry', [
      `width ${element.width}`,
      `height ${element.height}`,
    ]);
  }
  return {
    width: element.width,
    height: element.height,
    canopyHeight: axis.canopyHeight,
    par: absorbedPar(element, ambient),
    surfacicNitrogen: capacityDriver(element, config.modelVersion, config.nitrogen),
    organType,
  };
}

/**
 * Outputs of an element without resolved geometry: no exchanges, and the
 * temperature of the shoot apical meristem of its axis.
 */
export function bypassOutputs(element: ElementInputs, axis: AxisInputs): ElementOutputs {
  return {
    ag: 0,
    an: 0,
    rd: 0,
    tr: 0,
    ts: axis.samTemperature,
    gs: 0,
    width: element.width,
    height: element.height,
  };
}

function solveElement(
  key: string,
  element: ElementInputs,
  axes: Map<string, AxisInputs>,
  ambient: AmbientConditions,
  config: OrganModelConfig
): { outputs: ElementOutputs; converged: boolean } {
  const id = parseElementKey(key);
  if (!id) {
    throw new InputError(`malformed element key '${key}'`);
  }
  const axisId = axisKey(axisOf(id));
  const axis = axes.get(axisId);
  if (!axis) {
    throw new InputError(`no inputs for axis '${axisId}'`);
  }

  if (element.height === null) {
    return { outputs: bypassOutputs(element, axis), converged: true };
  }

  const organ = resolveOrgan(id[3], element, axis, ambient, config);
  const { outputs, converged } = solveOrgan(organ, ambient, config, { label: key });
  return {
    outputs: { ...outputs, width: element.width, height: element.height },
    converged,
  };
}

// =============================================================================
// TIMESTEP
// =============================================================================

/**
 * Solve every element of a timestep.
 *
 * An element with invalid inputs is reported in `failures` and logged;
 * the other elements are still solved.
 */
export function runTimestep(
  inputs: SimulationInputs,
  ambient: AmbientConditions,
  config: OrganModelConfig = createConfig()
): TimestepResult {
  const outputs = new Map<string, ElementOutputs>();
  const failures: ElementFailure[] = [];
  const unconverged: string[] = [];

  for (const [key, element] of inputs.elements) {
    try {
      const solved = solveElement(key, element, inputs.axes, ambient, config);
      outputs.set(key, solved.outputs);
      if (!solved.converged) {
        unconverged.push(key);
      }
    } catch (err) {
      if (!(err instanceof InputError)) {
        throw err;
      }
      console.warn(`[simulation] Skipping ${key}: ${err.message}`);
      failures.push({ key, message: err.message });
    }
  }

  return { outputs, failures, unconverged };
}

// =============================================================================
// SIMULATION
// =============================================================================

/**
 * Stateful front end: holds a configuration, the inputs of the current
 * timestep and the outputs of the last run.
 */
export class Simulation {
  private config: OrganModelConfig;
  private inputs: SimulationInputs = { elements: new Map(), axes: new Map() };

  /** Outputs of the last run, keyed by element key */
  readonly outputs = new Map<string, ElementOutputs>();

  constructor(overrides: OrganModelOverrides = {}) {
    this.config = createConfig(overrides);
  }

  get parameters(): OrganModelConfig {
    return this.config;
  }

  /**
   * Replace the inputs of the current timestep
   */
  initialize(inputs: SimulationInputs): void {
    this.inputs = {
      elements: new Map(inputs.elements),
      axes: new Map(inputs.axes),
    };
  }

  /**
   * Solve every element and replace `outputs`
   */
  run(ambient: AmbientConditions): TimestepResult {
    const result = runTimestep(this.inputs, ambient, this.config);
    this.outputs.clear();
    for (const [key, value] of result.outputs) {
      this.outputs.set(key, value);
    }
    return result;
  }

  /**
   * Change parameters between timesteps
   */
  updateParameters(overrides: OrganModelOverrides): void {
    this.config = updateConfig(this.config, overrides);
  }
}

// =============================================================================
// CLI RUNNER
// =============================================================================

function fmt(value: number, digits: number, width: number): string {
  return value.toFixed(digits).padStart(width);
}

async function runCLI() {
  const args = process.argv.slice(2);

  const knownFlags = new Set([
    '--inputs', '--list', '--help', '-h',
    '--Ta', '--co2', '--rh', '--wind', '--parIncident', '--model',
  ]);

  let inputsName: string | undefined;
  let modelVersion: string | undefined;
  const ambientOverrides: Partial<AmbientConditions> = {};
  const unknownFlags: string[] = [];

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg.startsWith('--inputs=')) {
      inputsName = arg.split('=')[1];
    } else if (arg === '--inputs' && args[i + 1]) {
      inputsName = args[++i];
    } else if (arg === '--list') {
      const { listInputs } = await import('./inputs.js');
      const names = await listInputs();
      console.log('Available inputs:');
      for (const name of names) {
        console.log(`  ${name}`);
      }
      return;
    } else if (arg === '--help' || arg === '-h') {
      console.log('Usage: npx tsx src/simulation.ts [options]');
      console.log('');
      console.log('Options:');
      console.log('  --inputs=NAME|PATH        Input file (bundled name or path to JSON)');
      console.log('  --list                    List bundled input files');
      console.log('  --Ta=VALUE                Air temperature (°C)');
      console.log('  --co2=VALUE               Ambient CO2 (µmol mol⁻¹)');
      console.log('  --rh=VALUE                Relative humidity (0-1)');
      console.log('  --wind=VALUE              Wind speed at reference height (m s⁻¹)');
      console.log('  --parIncident=VALUE       Incident PAR (µmol m⁻² s⁻¹)');
      console.log('  --model=VERSION           Nitrogen formulation');
      console.log('  --help, -h                Show this help');
      return;
    } else if (arg.startsWith('--Ta=')) {
      const value = parseFloat(arg.split('=')[1]);
      if (!isNaN(value)) {
        ambientOverrides.airTemperature = value;
      }
    } else if (arg.startsWith('--co2=')) {
      const value = parseFloat(arg.split('=')[1]);
      if (!isNaN(value)) {
        ambientOverrides.ambientCO2 = value;
      }
    } else if (arg.startsWith('--rh=')) {
      const value = parseFloat(arg.split('=')[1]);
      if (!isNaN(value)) {
        ambientOverrides.relativeHumidity = value;
      }
    } else if (arg.startsWith('--wind=')) {
      const value = parseFloat(arg.split('=')[1]);
      if (!isNaN(value)) {
        ambientOverrides.windSpeed = value;
      }
    } else if (arg.startsWith('--parIncident=')) {
      const value = parseFloat(arg.split('=')[1]);
      if (!isNaN(value)) {
        ambientOverrides.incidentPar = value;
      }
    } else if (arg.startsWith('--model=')) {
      modelVersion = arg.split('=')[1];
    } else if (arg.startsWith('--') || arg.startsWith('-')) {
      const flagName = arg.split('=')[0];
      if (!knownFlags.has(flagName)) {
        unknownFlags.push(arg);
      }
    }
  }

  if (unknownFlags.length > 0) {
    console.warn(`Warning: Unknown flags ignored: ${unknownFlags.join(', ')}`);
    console.warn('Run with --help to see available options.');
    console.warn('');
  }

  const { loadInputs, resolveInputsPath } = await import('./inputs.js');
  const loaded = await loadInputs(resolveInputsPath(inputsName ?? 'main-stem'));

  const ambient: AmbientConditions = { ...DEFAULT_AMBIENT, ...loaded.ambient, ...ambientOverrides };

  const simulation = new Simulation(modelVersion === undefined ? {} : { modelVersion });
  simulation.initialize(loaded.inputs);
  const result = simulation.run(ambient);

  console.log(`=== ${loaded.name} ===`);
  if (loaded.description) {
    console.log(loaded.description);
  }
  console.log('');
  console.log(
    `Ta ${ambient.airTemperature} °C, CO2 ${ambient.ambientCO2} µmol mol⁻¹, ` +
    `RH ${ambient.relativeHumidity}, wind ${ambient.windSpeed} m s⁻¹, model ${simulation.parameters.modelVersion}`
  );
  console.log('');
  console.log('Element                          Ag      An      Rd      Tr      Ts      gs');
  console.log('-------                          --      --      --      --      --      --');

  for (const [key, out] of simulation.outputs) {
    console.log(
      `${key.padEnd(28)} ` +
      `${fmt(out.ag, 2, 7)} ${fmt(out.an, 2, 7)} ${fmt(out.rd, 2, 7)} ` +
      `${fmt(out.tr, 2, 7)} ${fmt(out.ts, 2, 7)} ${fmt(out.gs, 3, 7)}`
    );
  }

  if (result.unconverged.length > 0) {
    console.log(`\nNot converged: ${result.unconverged.join(', ')}`);
  }
  if (result.failures.length > 0) {
    console.log(`\nSkipped: ${result.failures.map((f) => f.key).join(', ')}`);
  }
}

if (process.argv[1]?.endsWith('simulation.ts') || process.argv[1]?.endsWith('simulation.js')) {
  runCLI().catch(err => {
    console.error(err);
    process.exit(1);
  });
}

/**
 * Parameter Introspection
 *
 * Structured metadata about model parameters and outputs, generated from
 * each component's paramMeta so it cannot drift from the defaults.
 *
 * Usage:
 *   import { describeParameters } from './introspection.js';
 *   const schema = describeParameters();
 *   console.log(schema.gsMin);
 *   // { type: 'number', default: 0.05, min: 0, max: 0.5, unit: 'mol m⁻² s⁻¹', path: 'stomata.gsMin', ... }
 */

import type { Component } from './framework/module.js';
import { generateParameterSchema, type GeneratedParameterInfo } from './framework/introspect.js';
import { temperatureComponent } from './modules/temperature.js';
import { photosynthesisComponent } from './modules/photosynthesis.js';
import { stomataComponent } from './modules/stomata.js';
import { energyBalanceComponent } from './modules/energy-balance.js';
import { nitrogenComponent } from './modules/nitrogen.js';
import { convergenceComponent } from './modules/convergence.js';
import type { ElementOutputs } from './simulation.js';

// =============================================================================
// TYPES
// =============================================================================

export type ParameterInfo = GeneratedParameterInfo;

export interface ParameterSchema {
  [key: string]: ParameterInfo;
}

export interface OutputInfo {
  unit: string;
  description: string;
}

export type OutputSchema = Record<keyof ElementOutputs, OutputInfo>;

// =============================================================================
// SCHEMA
// =============================================================================

const ALL_COMPONENTS: readonly Component<object>[] = [
  temperatureComponent,
  photosynthesisComponent,
  stomataComponent,
  energyBalanceComponent,
  nitrogenComponent,
  convergenceComponent,
];

/**
 * Metadata of every documented parameter, optionally limited to a tier
 * (1 = user-facing, 2 = scenario, 3 = calibration).
 */
export function describeParameters(tier?: 1 | 2 | 3): ParameterSchema {
  const generated = generateParameterSchema(ALL_COMPONENTS);
  const result: ParameterSchema = {};
  for (const [key, info] of Object.entries(generated)) {
    if (tier === undefined || info.tier === tier) {
      result[key] = info;
    }
  }
  return result;
}

/**
 * Lists all parameter names.
 */
export function listParameters(): string[] {
  return Object.keys(describeParameters());
}

const OUTPUTS: OutputSchema = {
  ag: { unit: 'µmol m⁻² s⁻¹', description: 'Gross assimilation, stem efficiency applied to non-lamina organs' },
  an: { unit: 'µmol m⁻² s⁻¹', description: 'Net assimilation' },
  rd: { unit: 'µmol m⁻² s⁻¹', description: 'Mitochondrial respiration in the light' },
  tr: { unit: 'mmol m⁻² s⁻¹', description: 'Transpiration' },
  ts: { unit: '°C', description: 'Organ temperature' },
  gs: { unit: 'mol m⁻² s⁻¹', description: 'Stomatal conductance to water vapour' },
  width: { unit: 'm', description: 'Width or diameter, passed through from the inputs' },
  height: { unit: 'm', description: 'Height above soil, passed through from the inputs' },
};

/**
 * Metadata of every per-element output
 */
export function describeOutputs(): OutputSchema {
  return { ...OUTPUTS };
}

// =============================================================================
// CLI
// =============================================================================

function parseTier(value: string | undefined): 1 | 2 | 3 | undefined {
  if (value === '1') return 1;
  if (value === '2') return 2;
  if (value === '3') return 3;
  return undefined;
}

function printParameter(name: string, info: ParameterInfo): void {
  console.log(`${name} (${info.path})`);
  console.log(`  ${info.description}`);
  console.log(`  Default: ${info.default} ${info.unit}`);
  console.log(`  Range:   [${info.min ?? '-inf'}, ${info.max ?? 'inf'}]`);
  console.log(`  Tier:    ${info.tier}`);
  if (info.source) {
    console.log(`  Source:  ${info.source}`);
  }
}

async function runCLI() {
  const args = process.argv.slice(2);
  const flag = (name: string) => args.find(a => a.startsWith(`--${name}=`))?.split('=')[1];

  if (args.includes('--help') || args.includes('-h')) {
    console.log('Usage: npx tsx src/introspection.ts [options]');
    console.log('');
    console.log('Options:');
    console.log('  --tier=1|2|3   Only parameters of one tier');
    console.log('  --param=NAME   Details of one parameter');
    console.log('  --outputs      Describe the per-element outputs');
    console.log('  --json         Print as JSON');
    console.log('  --help, -h     Show this help');
    return;
  }

  const json = args.includes('--json');

  if (args.includes('--outputs')) {
    const outputs = describeOutputs();
    if (json) {
      console.log(JSON.stringify(outputs, null, 2));
      return;
    }
    for (const [name, info] of Object.entries(outputs)) {
      console.log(`${name.padEnd(8)} ${info.unit.padEnd(16)} ${info.description}`);
    }
    return;
  }

  const tierArg = flag('tier');
  const tier = parseTier(tierArg);
  if (tierArg !== undefined && tier === undefined) {
    console.error(`Unknown tier: ${tierArg} (expected 1, 2 or 3)`);
    process.exit(1);
  }
  const schema = describeParameters(tier);

  const name = flag('param');
  if (name !== undefined) {
    const info = schema[name];
    if (!info) {
      console.error(`Unknown parameter: ${name}`);
      console.error(`Available: ${Object.keys(schema).join(', ')}`);
      process.exit(1);
    }
    if (json) {
      console.log(JSON.stringify(info, null, 2));
    } else {
      printParameter(name, info);
    }
    return;
  }

  if (json) {
    console.log(JSON.stringify(schema, null, 2));
    return;
  }

  // Grouped by component, in configuration order
  let component = '';
  for (const [key, info] of Object.entries(schema)) {
    const group = info.path.split('.')[0];
    if (group !== component) {
      component = group;
      console.log(`\n${component}`);
    }
    const value = String(info.default).padStart(9);
    console.log(`  ${key.padEnd(36)} ${value}  ${info.unit.padEnd(22)} tier ${info.tier}`);
  }
  console.log(`\n${Object.keys(schema).length} parameters. --param=NAME for details.`);
}

if (process.argv[1]?.endsWith('introspection.ts') || process.argv[1]?.endsWith('introspection.js')) {
  runCLI().catch(err => {
    console.error(err);
    process.exit(1);
  });
}

/**
 * Model Configuration
 *
 * The complete parameter table of the solver, assembled from each
 * component's defaults. A configuration is built once, validated once
 * and deep-frozen: solves only ever read it. The only way to change it
 * is updateConfig(), which returns a new configuration and is meant to
 * run between timesteps, never during a batch of solves.
 */

import type { DeepPartial, ValidationResult } from './framework/types.js';
import { ConfigurationError } from './framework/errors.js';
import { deepFreeze, deepMerge } from './framework/validated-merge.js';
import { isModelVersion, MODEL_VERSIONS, type ModelVersion } from './domain-types.js';
import { temperatureComponent, temperatureDefaults, type TemperatureParams } from './modules/temperature.js';
import { photosynthesisComponent, photosynthesisDefaults, type PhotosynthesisParams } from './modules/photosynthesis.js';
import { stomataComponent, stomataDefaults, type StomataParams } from './modules/stomata.js';
import { energyBalanceComponent, energyBalanceDefaults, type EnergyBalanceParams } from './modules/energy-balance.js';
import { nitrogenComponent, nitrogenDefaults, type NitrogenParams } from './modules/nitrogen.js';
import { convergenceComponent, convergenceDefaults, type ConvergenceParams } from './modules/convergence.js';

// =============================================================================
// TYPES
// =============================================================================

export interface OrganModelParams {
  modelVersion: ModelVersion;
  temperature: TemperatureParams;
  photosynthesis: PhotosynthesisParams;
  stomata: StomataParams;
  energyBalance: EnergyBalanceParams;
  nitrogen: NitrogenParams;
  convergence: ConvergenceParams;
}

/** Frozen configuration handed to solves */
export type OrganModelConfig = Readonly<OrganModelParams>;

/**
 * Overrides accepted by createConfig / updateConfig.
 * modelVersion is a plain string here: it usually comes from a file or a
 * command line and is checked at build time.
 */
export type OrganModelOverrides = DeepPartial<Omit<OrganModelParams, 'modelVersion'>> & {
  modelVersion?: string;
};

export const organModelDefaults: OrganModelParams = {
  modelVersion: 'Barillot2016',
  temperature: temperatureDefaults,
  photosynthesis: photosynthesisDefaults,
  stomata: stomataDefaults,
  energyBalance: energyBalanceDefaults,
  nitrogen: nitrogenDefaults,
  convergence: convergenceDefaults,
};

// =============================================================================
// VALIDATION
// =============================================================================

/**
 * Validate the model-variant selector.
 * Throws ConfigurationError naming the invalid selector.
 */
export function parseModelVersion(value: string): ModelVersion {
  if (!isModelVersion(value)) {
    throw new ConfigurationError('config', [
      `modelVersion '${value}' is not recognised; expected one of ${MODEL_VERSIONS.join(', ')}`,
    ]);
  }
  return value;
}

/**
 * Validate every component of a full parameter table.
 * Errors are prefixed with the component name.
 */
export function validateConfig(params: OrganModelParams): ValidationResult {
  const errors: string[] = [];
  const warnings: string[] = [];

  const checks: [string, ValidationResult][] = [
    [temperatureComponent.name, temperatureComponent.validate(params.temperature)],
    [photosynthesisComponent.name, photosynthesisComponent.validate(params.photosynthesis)],
    [stomataComponent.name, stomataComponent.validate(params.stomata)],
    [energyBalanceComponent.name, energyBalanceComponent.validate(params.energyBalance)],
    [nitrogenComponent.name, nitrogenComponent.validate(params.nitrogen)],
    [convergenceComponent.name, convergenceComponent.validate(params.convergence)],
  ];

  for (const [name, result] of checks) {
    errors.push(...result.errors.map((e) => `${name}: ${e}`));
    warnings.push(...result.warnings.map((w) => `${name}: ${w}`));
  }

  if (!isModelVersion(params.modelVersion)) {
    errors.push(`modelVersion '${params.modelVersion}' is not recognised; expected one of ${MODEL_VERSIONS.join(', ')}`);
  }

  return { valid: errors.length === 0, errors, warnings };
}

// =============================================================================
// BUILD / UPDATE
// =============================================================================

function build(base: OrganModelParams, overrides: OrganModelOverrides): OrganModelConfig {
  const { modelVersion, ...components } = overrides;
  const merged: OrganModelParams = {
    ...deepMerge(base, components),
    modelVersion: modelVersion === undefined ? base.modelVersion : parseModelVersion(modelVersion),
  };

  const result = validateConfig(merged);
  for (const warning of result.warnings) {
    console.warn(`[config] Warning: ${warning}`);
  }
  if (!result.valid) {
    throw new ConfigurationError('config', result.errors);
  }

  return deepFreeze(structuredClone(merged));
}

/**
 * Build a validated, frozen configuration from overrides on the defaults.
 */
export function createConfig(overrides: OrganModelOverrides = {}): OrganModelConfig {
  return build(organModelDefaults, overrides);
}

/**
 * Derive a new configuration from an existing one.
 * The given configuration is left untouched.
 */
export function updateConfig(config: OrganModelConfig, overrides: OrganModelOverrides): OrganModelConfig {
  return build(config, overrides);
}

/** Default configuration */
export const defaultConfig: OrganModelConfig = createConfig();

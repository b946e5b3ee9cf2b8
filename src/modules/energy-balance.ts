/**
 * Energy Balance Module
 *
 * Organ temperature and transpiration from the Penman-Monteith equation.
 *
 * Wind at organ height follows a log profile above the canopy
 * (displacement d = 0.7 h, roughness z0 = 0.1 h) and an exponential
 * attenuation inside it (Campbell and Norman 1998):
 *
 *   u*  = Ur K / ln((zr − d) / z0)
 *   uh  = u* / K · ln((h − d) / z0)
 *   u   = uh · exp(A (z / h − 1))
 *
 * Boundary-layer resistance to heat, forced convection:
 *   flat plate (blades):  rbh = 154 · (w / u)^0.5
 *   cylinder (others):    rbh = w / (1.2e-5 · (u w / 1.5e-5)^0.47)
 *
 * Net radiation accounts for absorbed shortwave only; longwave exchange
 * with the sky and neighbouring organs is not modelled.
 *
 * References:
 *   Campbell and Norman (1998) An Introduction to Environmental Biophysics, 2nd ed.
 *   Monteith (1973) Principles of Environmental Physics
 *   Finnigan and Raupach (1987) in Stomatal Function, 385–429
 *   Goudriaan and van Laar (1994) Modelling Potential Crop Growth Processes
 */

import { defineComponent, type Component } from '../framework/module.js';
import type { ValidationResult } from '../framework/types.js';
import { validatedMerge, deepMerge } from '../framework/validated-merge.js';
import { saturatedVapourPressure } from '../primitives/math.js';
import { ATMOSPHERIC_PRESSURE, GAS_CONSTANT, KELVIN_DEGREE } from '../primitives/constants.js';
import { ORGAN_CAPABILITIES, type ConvectionRegime, type OrganType } from '../domain-types.js';

// =============================================================================
// PARAMETERS
// =============================================================================

export interface EnergyBalanceParams {
  // Wind profile
  windAttenuation: number;      // A, attenuation of wind within a wheat canopy (2.5)
  vonKarman: number;            // K (0.40)
  referenceHeight: number;      // zr, height of the reference wind measurement, m (2)
  displacementRatio: number;    // d / canopy height (0.7)
  roughnessRatio: number;       // z0 / canopy height (0.1)
  minWindSpeed: number;         // Floor on the reference wind speed, m s⁻¹ (0.1)

  // Forced convection
  convection: {
    flatPlate: {
      coefficient: number;      // 154
      exponent: number;         // 0.5
    };
    cylinder: {
      conductance: number;      // 1.2e-5
      kinematicViscosity: number; // m² s⁻¹ (1.5e-5)
      exponent: number;         // 0.47
    };
  };
  waterToHeatResistance: number; // rbw / rbh (0.96)

  // Radiation
  parToGlobal: number;          // Absorbed PAR to absorbed global radiation ratio (1.53)
  parPerWatt: number;           // µmol PAR per J (4.55)

  // Air properties
  psychrometric: number;        // γ, kPa K⁻¹ (0.066)
  latentHeat: number;           // λ, J kg⁻¹ (2.26e6)
  rhoCp: number;                // Volumetric heat capacity of air, J m⁻³ K⁻¹ (1256)
}

export const energyBalanceDefaults: EnergyBalanceParams = {
  windAttenuation: 2.5,
  vonKarman: 0.40,
  referenceHeight: 2,
  displacementRatio: 0.7,
  roughnessRatio: 0.1,
  minWindSpeed: 0.1,
  convection: {
    flatPlate: { coefficient: 154, exponent: 0.5 },
    cylinder: { conductance: 1.2e-5, kinematicViscosity: 1.5e-5, exponent: 0.47 },
  },
  waterToHeatResistance: 0.96,
  parToGlobal: 1.53,
  parPerWatt: 4.55,
  psychrometric: 66e-3,
  latentHeat: 2260e3,
  rhoCp: 1256,
};

// =============================================================================
// TYPES
// =============================================================================

export interface EnergyBalanceInputs {
  width: number;              // Characteristic dimension (width or diameter), m
  height: number;             // Organ height above soil, m
  canopyHeight: number;       // m
  windSpeed: number;          // Wind at the reference height, m s⁻¹
  par: number;                // Absorbed PAR, µmol m⁻² s⁻¹
  gsw: number;                // Stomatal conductance to water vapour, mol m⁻² s⁻¹
  airTemperature: number;     // °C
  organTemperature: number;   // °C, equals airTemperature on the first iteration
  relativeHumidity: number;   // Fraction 0-1
  organType: OrganType;
}

export interface WindProfile {
  windSpeed: number;          // Reference wind after the floor, m s⁻¹
  frictionVelocity: number;   // u*, m s⁻¹
  canopyTopWind: number;      // uh, m s⁻¹
  organWind: number;          // u at organ height, m s⁻¹
  aerodynamicResistance: number; // ra, s m⁻¹
}

export interface EnergyBalance {
  ts: number;                 // New organ temperature, °C
  tr: number;                 // Transpiration, mm s⁻¹ (kg m⁻² s⁻¹)
}

// =============================================================================
// FORMULAS
// =============================================================================

/**
 * Wind speed at organ height and aerodynamic resistance from the
 * reference height down to z0 + d.
 */
export function windProfile(
  windSpeed: number,
  height: number,
  canopyHeight: number,
  params: EnergyBalanceParams = energyBalanceDefaults
): WindProfile {
  const k = params.vonKarman;
  const d = params.displacementRatio * canopyHeight;
  const z0 = params.roughnessRatio * canopyHeight;
  const ur = Math.max(windSpeed, params.minWindSpeed);

  const logAboveCanopy = Math.log((params.referenceHeight - d) / z0);
  const frictionVelocity = (ur * k) / logAboveCanopy;
  const canopyTopWind = (frictionVelocity / k) * Math.log((canopyHeight - d) / z0);
  const organWind = canopyTopWind * Math.exp(params.windAttenuation * (height / canopyHeight - 1));
  const aerodynamicResistance = (1 / (k * k * ur)) * logAboveCanopy * logAboveCanopy;

  return { windSpeed: ur, frictionVelocity, canopyTopWind, organWind, aerodynamicResistance };
}

/**
 * Boundary-layer resistance to heat (s m⁻¹) under forced convection.
 *
 * @param width - Characteristic dimension, m
 * @param wind - Wind speed at organ height, m s⁻¹
 */
export function boundaryLayerResistance(
  regime: ConvectionRegime,
  width: number,
  wind: number,
  params: EnergyBalanceParams = energyBalanceDefaults
): number {
  if (regime === 'flatPlate') {
    const { coefficient, exponent } = params.convection.flatPlate;
    return coefficient * Math.pow(width / wind, exponent);
  }
  const { conductance, kinematicViscosity, exponent } = params.convection.cylinder;
  return width / (conductance * Math.pow((wind * width) / kinematicViscosity, exponent));
}

/**
 * Net absorbed radiation (W m⁻²) from absorbed PAR, shortwave only.
 */
export function netRadiation(par: number, params: EnergyBalanceParams = energyBalanceDefaults): number {
  return (par * params.parToGlobal) / params.parPerWatt;
}

/**
 * Slope of the saturation vapour pressure curve (kPa K⁻¹).
 *
 * When organ and air temperatures differ, the chord between them is used.
 * When they are equal (always true on the first iteration), the analytic
 * form is evaluated with the air temperature in kelvin.
 */
export function vapourPressureSlope(airTemperature: number, organTemperature: number): number {
  const esAir = saturatedVapourPressure(airTemperature);
  const taK = airTemperature + KELVIN_DEGREE;
  if (organTemperature === airTemperature) {
    return ((17.4 * 239) / Math.pow(taK + 239, 2)) * esAir;
  }
  const esOrgan = saturatedVapourPressure(organTemperature);
  const tsK = organTemperature + KELVIN_DEGREE;
  return (esOrgan - esAir) / (tsK - taK);
}

/**
 * Energy balance of an organ: new organ temperature and transpiration.
 */
export function organEnergyBalance(
  inputs: EnergyBalanceInputs,
  params: EnergyBalanceParams = energyBalanceDefaults
): EnergyBalance {
  const {
    width, height, canopyHeight, windSpeed, par, gsw,
    airTemperature: ta, organTemperature: ts, relativeHumidity: rh, organType,
  } = inputs;

  const wind = windProfile(windSpeed, height, canopyHeight, params);
  const { convection } = ORGAN_CAPABILITIES[organType];
  const rbh = boundaryLayerResistance(convection, width, wind.organWind, params);
  const ra = wind.aerodynamicResistance;

  const rn = netRadiation(par, params);

  // Transpiration (mm s⁻¹), Penman-Monteith
  const esAir = saturatedVapourPressure(ta);
  const vpd = esAir - rh * esAir;
  const s = vapourPressureSlope(ta, ts);
  const rbw = params.waterToHeatResistance * rbh;
  const gswPhysical = (gsw * GAS_CONSTANT * (ts + KELVIN_DEGREE)) / ATMOSPHERIC_PRESSURE;  // m s⁻¹
  const rsw = 1 / gswPhysical;
  const rHeat = rbh + ra;

  const tr = Math.max(
    0,
    (s * rn + (params.rhoCp * vpd) / rHeat) /
      (params.latentHeat * (s + params.psychrometric * ((rbw + ra + rsw) / rHeat)))
  );

  const newTs = ta + (rHeat * (rn - params.latentHeat * tr)) / params.rhoCp;

  return { ts: newTs, tr };
}

// =============================================================================
// COMPONENT DEFINITION
// =============================================================================

export const energyBalanceComponent: Component<EnergyBalanceParams> = defineComponent({
  name: 'energyBalance',
  description: 'Penman-Monteith organ energy balance with in-canopy wind profile',

  defaults: energyBalanceDefaults,

  paramMeta: {
    windAttenuation: {
      description: 'Attenuation coefficient of wind within the canopy.',
      unit: 'dimensionless',
      range: { min: 0, max: 5, default: 2.5 },
      tier: 2 as const,
      source: 'Campbell and Norman (1998)',
    },
    referenceHeight: {
      description: 'Height above soil at which the reference wind speed is measured.',
      unit: 'm',
      range: { min: 0.5, max: 20, default: 2 },
      tier: 2 as const,
    },
    minWindSpeed: {
      description: 'Floor applied to the reference wind speed before the log profile.',
      unit: 'm s⁻¹',
      range: { min: 0.01, max: 1, default: 0.1 },
      tier: 3 as const,
    },
    parToGlobal: {
      description: 'Ratio of absorbed global radiation to absorbed PAR (energy units).',
      unit: 'dimensionless',
      range: { min: 1, max: 3, default: 1.53 },
      tier: 3 as const,
    },
    rhoCp: {
      description: 'Volumetric heat capacity of air.',
      unit: 'J m⁻³ K⁻¹',
      range: { min: 1000, max: 1400, default: 1256 },
      tier: 3 as const,
    },
  },

  validate(params: Partial<EnergyBalanceParams>): ValidationResult {
    const errors: string[] = [];
    const warnings: string[] = [];

    const p = deepMerge(energyBalanceDefaults, params);

    if (p.vonKarman <= 0) errors.push('vonKarman must be positive');
    if (p.referenceHeight <= 0) errors.push('referenceHeight must be positive');
    if (p.minWindSpeed <= 0) errors.push('minWindSpeed must be positive');
    if (p.roughnessRatio <= 0) errors.push('roughnessRatio must be positive');
    if (p.displacementRatio < 0 || p.displacementRatio >= 1) {
      errors.push(`displacementRatio ${p.displacementRatio} outside [0, 1)`);
    }
    if (p.displacementRatio + p.roughnessRatio >= 1) {
      errors.push('displacementRatio + roughnessRatio must be below 1 (wind at canopy top would be undefined)');
    }
    if (p.parPerWatt <= 0) errors.push('parPerWatt must be positive');
    if (p.latentHeat <= 0) errors.push('latentHeat must be positive');
    if (p.rhoCp <= 0) errors.push('rhoCp must be positive');
    if (p.psychrometric <= 0) errors.push('psychrometric must be positive');
    if (p.windAttenuation < 0) {
      errors.push('windAttenuation cannot be negative');
    }
    if (p.windAttenuation > 5) {
      warnings.push(`windAttenuation ${p.windAttenuation} unusually high (default uses 2.5)`);
    }

    return { valid: errors.length === 0, errors, warnings };
  },

  mergeParams(partial: Partial<EnergyBalanceParams>): EnergyBalanceParams {
    return validatedMerge('energyBalance', this.validate, (p) => deepMerge(energyBalanceDefaults, p), partial);
  },
});

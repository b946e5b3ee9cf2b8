/**
 * Photosynthesis Module
 *
 * Farquhar biochemical model (Farquhar et al. 1980) with organ temperature
 * and nitrogen regulation of the photosynthetic capacities.
 *
 * Gross assimilation is the minimum of three limitations:
 *   Ac = Vc_max (Ci − Γ) / (Ci + Kc (1 + O/Ko))          // RuBisCO
 *   Aj = J (Ci − Γ) / (4 Ci + 8 Γ)                        // electron transport
 *   Ap = (1 − Γ/Ci) (3 TPU + Vo)                          // triose phosphate use
 *
 * Capacities at 25 °C are linear in surfacic nitrogen:
 *   P25 = S_P · (N − N_min,P)
 * Below N_min the capacity is non-positive (no clamp).
 *
 * Mitochondrial respiration in the light decays from Rdark to 33 % of it
 * as absorbed PAR increases (Muller et al. 2005, eq. 19).
 *
 * References:
 *   Braune et al. (2009) Ecological Modelling 220, 1599–1612
 *   Evers et al. (2010) Journal of Experimental Botany 61, 2203–2216
 *   Muller et al. (2005) Annals of Botany 95, 1125–1137
 *   Bernacchi et al. (2001) Plant, Cell & Environment 24, 253–259
 */

import { defineComponent, type Component } from '../framework/module.js';
import type { ValidationResult } from '../framework/types.js';
import { validatedMerge, deepMerge } from '../framework/validated-merge.js';
import { halfDecay, nonRectangularHyperbola } from '../primitives/math.js';
import { temperatureAdjust, temperatureDefaults, type TemperatureParams } from './temperature.js';

// =============================================================================
// PARAMETERS
// =============================================================================

/** Capacities driven by nitrogen */
export type NitrogenCapacity = 'vcMax25' | 'jMax25' | 'tpu25' | 'rDark25';
export const NITROGEN_CAPACITIES: readonly NitrogenCapacity[] = ['vcMax25', 'jMax25', 'tpu25', 'rDark25'];

export interface PhotosynthesisParams {
  o2: number;                  // Intercellular O2, µmol mol⁻¹ (21000)
  kc25: number;                // RuBisCO affinity constant for CO2 at 25 °C, µmol mol⁻¹ (404)
  ko25: number;                // RuBisCO affinity constant for O2 at 25 °C, µmol mol⁻¹ (278400)
  gamma25: number;             // CO2 compensation point at 25 °C, µmol mol⁻¹ (39)
  theta: number;               // Curvature of the light response of J (0.72)

  // Nitrogen dependence (Braune et al. 2009, Evers et al. 2010)
  nitrogenSlope: Record<NitrogenCapacity, number> & {
    alpha: number;             // mol e⁻ m² mol⁻¹ photon g⁻¹ N
  };
  nitrogenMin: Record<NitrogenCapacity, number>;  // g N m⁻², capacity is zero at this nitrogen
  alphaIntercept: number;      // Intercept of α vs nitrogen, mol e⁻ mol⁻¹ photon

  // Light inhibition of respiration (Muller et al. 2005)
  respiration: {
    lightFloor: number;        // Fraction of Rdark remaining in full light (0.33)
    halfDecayPar: number;      // PAR halving the inhibitable part, µmol m⁻² s⁻¹ (15)
  };
}

export const photosynthesisDefaults: PhotosynthesisParams = {
  o2: 21000,
  kc25: 404,
  ko25: 278.4e3,
  gamma25: 39,
  theta: 0.72,
  nitrogenSlope: {
    vcMax25: 84.965,
    jMax25: 117.6,
    tpu25: 9.25,
    rDark25: 0.493,
    alpha: 0.0413,
  },
  nitrogenMin: {
    vcMax25: 0,
    jMax25: 0,
    tpu25: 0,
    rDark25: 0,
  },
  alphaIntercept: 0.2101 + 0.0083,
  respiration: {
    lightFloor: 0.33,
    halfDecayPar: 15,
  },
};

// =============================================================================
// TYPES
// =============================================================================

/** Capacities at 25 °C for a given nitrogen content */
export interface Capacities25 {
  vcMax25: number;   // µmol CO2 m⁻² s⁻¹
  jMax25: number;    // µmol e⁻ m⁻² s⁻¹
  tpu25: number;     // µmol CO2 m⁻² s⁻¹
  rDark25: number;   // µmol CO2 m⁻² s⁻¹
  alpha: number;     // mol e⁻ mol⁻¹ photon
}

/** Detail of the three competing limitations */
export interface Limitations {
  kc: number;
  ko: number;
  gamma: number;
  vcMax: number;
  jMax: number;
  tpu: number;
  j: number;         // Electron transport rate
  vo: number;        // Rate of RuBP oxygenation
  ac: number;        // RuBisCO-limited rate
  aj: number;        // Electron-transport-limited rate
  ap: number;        // TPU-limited rate
  rd: number;        // Respiration in the light
}

export interface Assimilation {
  ag: number;        // Gross assimilation, µmol m⁻² s⁻¹
  an: number;        // Net assimilation, µmol m⁻² s⁻¹
  rd: number;        // Respiration in the light, µmol m⁻² s⁻¹
}

// =============================================================================
// FORMULAS
// =============================================================================

/**
 * Linear nitrogen response of the photosynthetic capacities at 25 °C.
 */
export function capacitiesAt25(
  nitrogen: number,
  params: PhotosynthesisParams = photosynthesisDefaults
): Capacities25 {
  const { nitrogenSlope: s, nitrogenMin: min } = params;
  return {
    vcMax25: s.vcMax25 * (nitrogen - min.vcMax25),
    jMax25: s.jMax25 * (nitrogen - min.jMax25),
    tpu25: s.tpu25 * (nitrogen - min.tpu25),
    rDark25: s.rDark25 * (nitrogen - min.rDark25),
    alpha: s.alpha * nitrogen + params.alphaIntercept,
  };
}

/**
 * Respiration in the light from dark respiration and absorbed PAR.
 */
export function lightRespiration(
  rDark: number,
  par: number,
  params: PhotosynthesisParams = photosynthesisDefaults
): number {
  return rDark * halfDecay(par, params.respiration.lightFloor, params.respiration.halfDecayPar);
}

/**
 * The three limiting rates at organ temperature and internal CO2.
 *
 * @param par - Absorbed PAR (µmol m⁻² s⁻¹)
 * @param nitrogen - Surfacic nitrogen capacity driver (g N m⁻²)
 * @param ts - Organ temperature (°C)
 * @param ci - Internal CO2 (µmol mol⁻¹)
 */
export function limitations(
  par: number,
  nitrogen: number,
  ts: number,
  ci: number,
  params: PhotosynthesisParams = photosynthesisDefaults,
  temperature: TemperatureParams = temperatureDefaults
): Limitations {
  const o = params.o2;

  // RuBisCO kinetics
  const kc = temperatureAdjust('kc', params.kc25, ts, temperature);
  const ko = temperatureAdjust('ko', params.ko25, ts, temperature);
  const gamma = temperatureAdjust('gamma', params.gamma25, ts, temperature);

  const cap = capacitiesAt25(nitrogen, params);

  // RuBisCO-limited carboxylation
  const vcMax = temperatureAdjust('vcMax', cap.vcMax25, ts, temperature);
  const ac = (vcMax * (ci - gamma)) / (ci + kc * (1 + o / ko));

  // RuBP regeneration via electron transport
  const jMax = temperatureAdjust('jMax', cap.jMax25, ts, temperature);
  const j = nonRectangularHyperbola(cap.alpha * par, jMax, params.theta);
  const aj = (j * (ci - gamma)) / (4 * ci + 8 * gamma);

  // Triose phosphate utilisation
  const tpu = temperatureAdjust('tpu', cap.tpu25, ts, temperature);
  const voMax = (vcMax * ko * gamma) / (0.5 * kc * o);
  const vo = (voMax * o) / (o + ko * (1 + ci / kc));
  const ap = (1 - gamma / ci) * (3 * tpu + vo);

  // Mitochondrial respiration other than photorespiration
  const rDark = temperatureAdjust('rDark', cap.rDark25, ts, temperature);
  const rd = lightRespiration(rDark, par, params);

  return { kc, ko, gamma, vcMax, jMax, tpu, j, vo, ac, aj, ap, rd };
}

/**
 * Gross and net assimilation and respiration.
 *
 * Ag = min(Ac, Aj, Ap). When Ag ≤ 0 (Ci below Γ, or nitrogen below the
 * thresholds) there is no assimilation: Ag = An = 0.
 */
export function assimilation(
  par: number,
  nitrogen: number,
  ts: number,
  ci: number,
  params: PhotosynthesisParams = photosynthesisDefaults,
  temperature: TemperatureParams = temperatureDefaults
): Assimilation {
  const { ac, aj, ap, rd } = limitations(par, nitrogen, ts, ci, params, temperature);
  const ag = Math.min(ac, aj, ap);

  if (ag <= 0) {
    return { ag: 0, an: 0, rd };
  }
  return { ag, an: ag - rd, rd };
}

// =============================================================================
// COMPONENT DEFINITION
// =============================================================================

export const photosynthesisComponent: Component<PhotosynthesisParams> = defineComponent({
  name: 'photosynthesis',
  description: 'Farquhar assimilation with nitrogen- and temperature-scaled capacities',

  defaults: photosynthesisDefaults,

  paramMeta: {
    theta: {
      description: 'Curvature of the light response of electron transport.',
      unit: 'dimensionless',
      range: { min: 0.01, max: 1, default: 0.72 },
      tier: 2 as const,
    },
    gamma25: {
      description: 'CO2 compensation point at 25 °C.',
      unit: 'µmol mol⁻¹',
      range: { min: 0, max: 100, default: 39 },
      tier: 3 as const,
      source: 'Braune et al. (2009)',
    },
    nitrogenSlope: {
      vcMax25: {
        paramName: 'vcMaxPerNitrogen',
        description: 'Slope of Vc_max at 25 °C against surfacic nitrogen.',
        unit: 'µmol CO2 g⁻¹ N s⁻¹',
        range: { min: 0, max: 300, default: 84.965 },
        tier: 1 as const,
        source: 'Braune et al. (2009), Evers et al. (2010)',
      },
      jMax25: {
        paramName: 'jMaxPerNitrogen',
        description: 'Slope of Jmax at 25 °C against surfacic nitrogen.',
        unit: 'µmol e⁻ g⁻¹ N s⁻¹',
        range: { min: 0, max: 400, default: 117.6 },
        tier: 1 as const,
        source: 'Braune et al. (2009), Evers et al. (2010)',
      },
      tpu25: {
        paramName: 'tpuPerNitrogen',
        description: 'Slope of TPU at 25 °C against surfacic nitrogen.',
        unit: 'µmol CO2 g⁻¹ N s⁻¹',
        range: { min: 0, max: 50, default: 9.25 },
        tier: 1 as const,
      },
      rDark25: {
        paramName: 'rDarkPerNitrogen',
        description: 'Slope of dark respiration at 25 °C against surfacic nitrogen.',
        unit: 'µmol CO2 g⁻¹ N s⁻¹',
        range: { min: 0, max: 5, default: 0.493 },
        tier: 2 as const,
      },
    },
    respiration: {
      lightFloor: {
        description: 'Fraction of dark respiration remaining under saturating light.',
        unit: 'fraction',
        range: { min: 0, max: 1, default: 0.33 },
        tier: 3 as const,
        source: 'Muller et al. (2005)',
      },
    },
  },

  validate(params: Partial<PhotosynthesisParams>): ValidationResult {
    const errors: string[] = [];
    const warnings: string[] = [];

    const p = deepMerge(photosynthesisDefaults, params);

    if (p.theta <= 0 || p.theta > 1) {
      errors.push(`theta ${p.theta} outside valid range (0, 1]`);
    }
    if (p.o2 <= 0) errors.push('o2 must be positive');
    if (p.kc25 <= 0) errors.push('kc25 must be positive');
    if (p.ko25 <= 0) errors.push('ko25 must be positive');
    if (p.gamma25 < 0) errors.push('gamma25 cannot be negative');

    for (const name of NITROGEN_CAPACITIES) {
      if (p.nitrogenSlope[name] < 0) {
        errors.push(`nitrogenSlope.${name} cannot be negative`);
      }
      if (p.nitrogenMin[name] < 0) {
        warnings.push(`nitrogenMin.${name} ${p.nitrogenMin[name]} is negative`);
      }
    }

    if (p.respiration.lightFloor < 0 || p.respiration.lightFloor > 1) {
      errors.push(`respiration.lightFloor ${p.respiration.lightFloor} outside [0, 1]`);
    }
    if (p.respiration.halfDecayPar <= 0) {
      errors.push('respiration.halfDecayPar must be positive');
    }

    return { valid: errors.length === 0, errors, warnings };
  },

  mergeParams(partial: Partial<PhotosynthesisParams>): PhotosynthesisParams {
    return validatedMerge('photosynthesis', this.validate, (p) => deepMerge(photosynthesisDefaults, p), partial);
  },
});

/**
 * Organ Module
 *
 * One substitution of the coupled (Ts, Ci) iteration for a single organ:
 *
 *   assimilation(PAR, N, Ts, Ci)      → Ag, An, Rd
 *   stomatalConductance(Ag, An, N)    → gsw
 *   internalCO2(Ca, An, gsw)          → Ci'
 *   organEnergyBalance(gsw, Ts)       → Ts', Tr
 *
 * The step is pure: it reads the previous state and returns a new one.
 */

import { defineModule, type Module } from './framework/module.js';
import type { OrganType } from './domain-types.js';
import { createConfig, organModelDefaults, validateConfig, type OrganModelParams } from './config.js';
import { assimilation } from './modules/photosynthesis.js';
import { internalCO2, stomatalConductance } from './modules/stomata.js';
import { organEnergyBalance } from './modules/energy-balance.js';

// =============================================================================
// TYPES
// =============================================================================

/** Static description of one organ for the duration of a solve */
export interface OrganInputs {
  width: number;              // Width or diameter, m
  height: number;             // Height above soil, m
  canopyHeight: number;       // m
  par: number;                // Absorbed PAR, µmol m⁻² s⁻¹
  surfacicNitrogen: number;   // Capacity driver, g N m⁻²
  organType: OrganType;
}

/** Weather of the timestep */
export interface AmbientConditions {
  airTemperature: number;     // °C
  ambientCO2: number;         // µmol mol⁻¹
  relativeHumidity: number;   // Fraction 0-1
  windSpeed: number;          // At the reference height, m s⁻¹
  incidentPar?: number;       // Above the canopy, µmol m⁻² s⁻¹
}

export interface OrganSolveInputs {
  organ: OrganInputs;
  ambient: AmbientConditions;
}

/** Working state of the iteration */
export interface OrganState {
  ci: number;   // Internal CO2, µmol mol⁻¹
  ts: number;   // Organ temperature, °C
  gsw: number;  // Stomatal conductance to water vapour, mol m⁻² s⁻¹
  tr: number;   // Transpiration, mm s⁻¹
  ag: number;   // Gross assimilation, µmol m⁻² s⁻¹
  an: number;   // Net assimilation, µmol m⁻² s⁻¹
  rd: number;   // Respiration in the light, µmol m⁻² s⁻¹
}

// =============================================================================
// MODULE DEFINITION
// =============================================================================

export const organModule: Module<OrganModelParams, OrganState, OrganSolveInputs, OrganState> = defineModule({
  name: 'organ',
  description: 'Coupled photosynthesis, stomatal conductance and energy balance of one organ',

  defaults: organModelDefaults,

  validate: (params: Partial<OrganModelParams>) => validateConfig({ ...organModelDefaults, ...params }),

  mergeParams: (partial: Partial<OrganModelParams>) => createConfig(partial),

  init({ ambient }: OrganSolveInputs, params: OrganModelParams): OrganState {
    return {
      ci: params.convergence.initialCiRatio * ambient.ambientCO2,
      ts: ambient.airTemperature,
      gsw: params.stomata.gsMin,
      tr: 0,
      ag: 0,
      an: 0,
      rd: 0,
    };
  },

  step(state: OrganState, { organ, ambient }: OrganSolveInputs, params: OrganModelParams) {
    const { ag, an, rd } = assimilation(
      organ.par,
      organ.surfacicNitrogen,
      state.ts,
      state.ci,
      params.photosynthesis,
      params.temperature
    );

    const gsw = stomatalConductance(
      ag,
      an,
      organ.surfacicNitrogen,
      ambient.ambientCO2,
      ambient.relativeHumidity,
      params.stomata
    );

    const ci = internalCO2(ambient.ambientCO2, an, gsw, params.stomata);

    const { ts, tr } = organEnergyBalance(
      {
        width: organ.width,
        height: organ.height,
        canopyHeight: organ.canopyHeight,
        windSpeed: ambient.windSpeed,
        par: organ.par,
        gsw,
        airTemperature: ambient.airTemperature,
        organTemperature: state.ts,
        relativeHumidity: ambient.relativeHumidity,
        organType: organ.organType,
      },
      params.energyBalance
    );

    const next: OrganState = { ci, ts, gsw, tr, ag, an, rd };
    return { state: next, outputs: next };
  },
});

/**
 * Physical constants shared by the formula library.
 *
 * These are universal, not calibration parameters; the tunable
 * coefficients live with the component that uses them.
 */

/** Offset between degree Celsius and Kelvin */
export const KELVIN_DEGREE = 273.15;

/** Gas constant (J mol⁻¹ K⁻¹) */
export const GAS_CONSTANT = 8.3144;

/** Atmospheric pressure (Pa) */
export const ATMOSPHERIC_PRESSURE = 1.01325e5;

/** Molar mass of water (g mol⁻¹) */
export const WATER_MOLAR_MASS = 18;

/** Molar mass of nitrogen (g mol⁻¹) */
export const NITROGEN_MOLAR_MASS = 14;

/** Molar mass of carbon (g mol⁻¹) */
export const CARBON_MOLAR_MASS = 12;

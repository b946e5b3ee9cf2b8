/**
 * Primitive mathematical functions
 *
 * Pure functions with no dependencies - the foundation of the formula library.
 */

import { GAS_CONSTANT } from './constants.js';

/**
 * Arrhenius activation term, normalised to unity at the reference temperature:
 * exp(ΔHa · (Tk − Tref) / (R · Tref · Tk))
 *
 * @param deltaHa - Enthalpy of activation (kJ mol⁻¹)
 * @param tk - Temperature (K)
 * @param tref - Reference temperature (K)
 */
export function arrheniusActivation(deltaHa: number, tk: number, tref: number): number {
  return Math.exp((deltaHa * (tk - tref)) / (GAS_CONSTANT * 1e-3 * tref * tk));
}

/**
 * Entropy-based deactivation term (sigmoidal decay above the optimum),
 * normalised to unity at the reference temperature.
 *
 *   (1 + exp((Tref·ΔS − ΔHd) / (Tref·R))) / (1 + exp((Tk·ΔS − ΔHd) / (Tk·R)))
 *
 * @param deltaHd - Enthalpy of deactivation (kJ mol⁻¹)
 * @param deltaS - Entropy term (kJ mol⁻¹ K⁻¹)
 * @param tk - Temperature (K)
 * @param tref - Reference temperature (K)
 */
export function entropyDeactivation(
  deltaHd: number,
  deltaS: number,
  tk: number,
  tref: number
): number {
  const r = GAS_CONSTANT * 1e-3;
  return (
    (1 + Math.exp((tref * deltaS - deltaHd) / (tref * r))) /
    (1 + Math.exp((tk * deltaS - deltaHd) / (tk * r)))
  );
}

/**
 * Saturated vapour pressure (kPa) over water, Tetens-type form
 *
 * @param temperature - °C
 */
export function saturatedVapourPressure(temperature: number): number {
  return 0.611 * Math.exp((17.4 * temperature) / (239 + temperature));
}

/**
 * Smaller root of the non-rectangular hyperbola
 *   θ·y² − (x + ymax)·y + x·ymax = 0
 *
 * Used for the light response of electron transport: x = α·PAR, ymax = Jmax.
 * θ = 1 gives min(x, ymax); θ → 0 gives the rectangular hyperbola.
 *
 * @param x - Initial-slope term
 * @param yMax - Asymptote
 * @param theta - Curvature (0-1]
 */
export function nonRectangularHyperbola(x: number, yMax: number, theta: number): number {
  const sum = yMax + x;
  return (sum - Math.sqrt(sum * sum - 4 * theta * x * yMax)) / (2 * theta);
}

/**
 * Exponential decay from 1 towards a floor, halving the remaining
 * distance every `halfConstant` units of x:
 *   floor + (1 − floor) · 0.5^(x / halfConstant)
 */
export function halfDecay(x: number, floor: number, halfConstant: number): number {
  return floor + (1 - floor) * Math.pow(0.5, x / halfConstant);
}

/**
 * Relative change |(current − previous) / previous|
 *
 * previous = 0 gives Infinity (or NaN when current is also 0);
 * callers decide how to treat that case.
 */
export function relativeChange(previous: number, current: number): number {
  return Math.abs((current - previous) / previous);
}

/**
 * Organ Solver Tests
 *
 * Reference case: flag leaf, PAR 500, N 2 g m⁻², Ta 20 °C, CO2 380,
 * RH 0.7, wind 2 m s⁻¹.
 */

import { describe, expect, test, vi } from 'vitest';
import {
  convergenceDiagnostics,
  finalizeOutputs,
  hasConverged,
  solveOrgan,
  traceOrgan,
} from './solver.js';
import { createConfig, organModelDefaults } from './config.js';
import { ConfigurationError } from './framework/errors.js';
import { organModule, type OrganState } from './organ.js';
import { AMBIENT, BLADE, SHEATH } from './test-utils.js';

const state = (ci: number, ts: number): OrganState => ({ ci, ts, gsw: 0.1, tr: 0, ag: 0, an: 0, rd: 0 });

describe('organModule', () => {
  test('init starts from 0.7 Ca and air temperature', () => {
    const s = organModule.init({ organ: BLADE, ambient: AMBIENT }, createConfig());
    expect(s.ci).toBeCloseTo(266, 10);
    expect(s.ts).toBe(20);
    expect(s.gsw).toBe(0.05);
  });

  test('first step', () => {
    const config = createConfig();
    const s0 = organModule.init({ organ: BLADE, ambient: AMBIENT }, config);
    const { state: s1 } = organModule.step(s0, { organ: BLADE, ambient: AMBIENT }, config, 0);
    expect(s1.ag).toBeCloseTo(19.355349, 5);
    expect(s1.gsw).toBeCloseTo(0.415685, 5);
    expect(s1.ci).toBeCloseTo(298.926366, 4);
    expect(s1.ts).toBeCloseTo(23.080306, 4);
  });
});

describe('organModule parameters', () => {
  test('validate reports component errors by name', () => {
    const result = organModule.validate({ stomata: { ...organModelDefaults.stomata, gb: -1 } });
    expect(result.valid).toBe(false);
    expect(result.errors).toEqual(['stomata: gb must be positive']);
  });

  test('mergeParams builds a frozen configuration', () => {
    const params = organModule.mergeParams({ convergence: { ...organModelDefaults.convergence, maxIterations: 10 } });
    expect(params.convergence.maxIterations).toBe(10);
    expect(params.stomata).toEqual(organModelDefaults.stomata);
    expect(Object.isFrozen(params.convergence)).toBe(true);
  });

  test('mergeParams rejects invalid parameters', () => {
    expect(() =>
      organModule.mergeParams({ convergence: { ...organModelDefaults.convergence, maxIterations: 0 } })
    ).toThrow(ConfigurationError);
  });
});

describe('solveOrgan', () => {
  test('reference blade', () => {
    const result = solveOrgan(BLADE, AMBIENT);
    expect(result.converged).toBe(true);
    expect(result.iterations).toBe(3);
    expect(result.diagnostics).toEqual([]);
    expect(result.outputs.ag).toBeCloseTo(20.289643, 4);
    expect(result.outputs.an).toBeCloseTo(20.023101, 4);
    expect(result.outputs.rd).toBeCloseTo(0.266542, 5);
    expect(result.outputs.tr).toBeCloseTo(3.088761, 4);
    expect(result.outputs.ts).toBeCloseTo(21.89874, 4);
    expect(result.outputs.gs).toBeCloseTo(0.433701, 5);
  });

  test('sheath gross assimilation carries the stem efficiency', () => {
    const result = solveOrgan(SHEATH, AMBIENT);
    expect(result.iterations).toBe(2);
    expect(result.outputs.ag).toBeCloseTo(5.287806, 4);
    expect(result.outputs.an).toBeCloseTo(6.636534, 4);
    expect(result.outputs.ts).toBeCloseTo(19.979097, 4);
  });

  test('calm air behaves as 0.1 m/s wind', () => {
    const calm = solveOrgan(BLADE, { ...AMBIENT, windSpeed: 0 });
    const light = solveOrgan(BLADE, { ...AMBIENT, windSpeed: 0.1 });
    expect(calm).toEqual(light);
    expect(calm.iterations).toBe(6);
    expect(calm.outputs.ts).toBeCloseTo(40.058688, 3);
  });

  test('darkness gives no assimilation and gsMin', () => {
    const result = solveOrgan({ ...BLADE, par: 0 }, AMBIENT);
    expect(result.outputs.ag).toBe(0);
    expect(result.outputs.an).toBe(0);
    expect(result.outputs.gs).toBe(0.05);
    expect(result.outputs.rd).toBeCloseTo(0.686778, 5);
  });

  test('organ without nitrogen only loses water through gsMin', () => {
    const result = solveOrgan({ ...BLADE, surfacicNitrogen: 0 }, AMBIENT);
    expect(result.converged).toBe(true);
    expect(result.iterations).toBe(3);
    expect(result.diagnostics).toEqual([]);
    expect(result.outputs.ag).toBe(0);
    expect(result.outputs.an).toBe(0);
    expect(result.outputs.rd).toBe(0);
    expect(result.outputs.gs).toBe(0.05);
    expect(result.outputs.tr).toBeCloseTo(0.913601, 5);
    expect(result.outputs.ts).toBeCloseTo(25.8537, 4);
  });

  test('nitrogen exactly at a raised threshold behaves as no nitrogen', () => {
    const config = createConfig({
      photosynthesis: { nitrogenMin: { vcMax25: 1.5, jMax25: 1.5, tpu25: 1.5, rDark25: 1.5 } },
    });
    const atThreshold = solveOrgan({ ...BLADE, surfacicNitrogen: 1.5 }, AMBIENT, config);
    const without = solveOrgan({ ...BLADE, surfacicNitrogen: 0 }, AMBIENT);
    expect(atThreshold.outputs).toEqual(without.outputs);
    expect(Object.values(atThreshold.outputs).every(Number.isFinite)).toBe(true);
  });

  test('organ at 0 °C air temperature converges', () => {
    const result = solveOrgan(BLADE, { ...AMBIENT, airTemperature: 0 });
    expect(result.converged).toBe(true);
    expect(result.iterations).toBe(4);
    expect(result.outputs.ts).toBeCloseTo(5.551756, 4);
  });

  test('is idempotent', () => {
    expect(solveOrgan(BLADE, AMBIENT)).toEqual(solveOrgan(BLADE, AMBIENT));
  });

  test('never exceeds the iteration cap', () => {
    for (const windSpeed of [0, 1, 5]) {
      for (const par of [0, 100, 1500]) {
        expect(solveOrgan({ ...BLADE, par }, { ...AMBIENT, windSpeed }).iterations).toBeLessThanOrEqual(30);
      }
    }
  });

  test('reports quantities still moving at the cap', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const config = createConfig({ convergence: { maxIterations: 1 } });
    const result = solveOrgan(BLADE, AMBIENT, config, { label: '1/MS/8/blade/visible' });

    expect(result.converged).toBe(false);
    expect(result.iterations).toBe(1);
    expect(result.diagnostics).toHaveLength(2);
    expect(result.diagnostics[0].quantity).toBe('Ci');
    expect(result.diagnostics[0].previous).toBeCloseTo(266, 10);
    expect(result.diagnostics[1]).toMatchObject({ quantity: 'Ts', previous: 20 });
    expect(warn).toHaveBeenCalledTimes(2);
    expect(String(warn.mock.calls[0][0])).toMatch(/^\[solver\] 1\/MS\/8\/blade\/visible: Ci did not converge after 1 iterations/);
    warn.mockRestore();
  });

  test('returns the last iterate when capped', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const config = createConfig({ convergence: { maxIterations: 2 } });
    const result = solveOrgan(BLADE, AMBIENT, config);
    expect(result.converged).toBe(false);
    expect(result.diagnostics.map((d) => d.quantity)).toEqual(['Ts']);
    expect(result.outputs.ts).toBeCloseTo(21.855665, 4);
    warn.mockRestore();
  });

  test('a NaN iterate at the cap is reported for both quantities', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const config = createConfig({ convergence: { maxIterations: 3 } });
    const result = solveOrgan(BLADE, { ...AMBIENT, airTemperature: Number.NaN }, config);
    expect(result.converged).toBe(false);
    expect(result.iterations).toBe(3);
    expect(result.diagnostics.map((d) => d.quantity)).toEqual(['Ci', 'Ts']);
    expect(warn).toHaveBeenCalledTimes(2);
    warn.mockRestore();
  });

  test('logging can be turned off', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    solveOrgan(BLADE, AMBIENT, createConfig({ convergence: { maxIterations: 1 } }), { log: false });
    expect(warn).not.toHaveBeenCalled();
    warn.mockRestore();
  });
});

describe('hasConverged', () => {
  test('both relative changes below tolerance', () => {
    expect(hasConverged(state(300, 20), state(301, 20.1), 0.01)).toBe(true);
    expect(hasConverged(state(300, 20), state(310, 20.1), 0.01)).toBe(false);
    expect(hasConverged(state(300, 20), state(301, 21), 0.01)).toBe(false);
  });

  test('organ at exactly 0 °C converges on Ts only without change', () => {
    expect(hasConverged(state(300, 0), state(300, 0), 0.01)).toBe(true);
    expect(hasConverged(state(300, 0), state(300, 0.001), 0.01)).toBe(false);
  });
});

describe('convergenceDiagnostics', () => {
  test('names both quantities', () => {
    expect(convergenceDiagnostics(state(300, 20), state(330, 25), 0.01)).toEqual([
      { quantity: 'Ci', previous: 300, current: 330 },
      { quantity: 'Ts', previous: 20, current: 25 },
    ]);
  });

  test('reports NaN changes', () => {
    expect(convergenceDiagnostics(state(300, 20), state(Number.NaN, Number.NaN), 0.01)).toEqual([
      { quantity: 'Ci', previous: 300, current: Number.NaN },
      { quantity: 'Ts', previous: 20, current: Number.NaN },
    ]);
  });

  test('is empty exactly when the states have converged', () => {
    const pairs: [OrganState, OrganState][] = [
      [state(300, 20), state(301, 20.1)],
      [state(300, 20), state(310, 20.1)],
      [state(300, 20), state(301, 21)],
      [state(Number.NaN, 20), state(Number.NaN, 20)],
    ];
    for (const [previous, current] of pairs) {
      expect(convergenceDiagnostics(previous, current, 0.01).length === 0).toBe(hasConverged(previous, current, 0.01));
    }
  });

  test('skips Ts when the previous value is 0', () => {
    expect(convergenceDiagnostics(state(300, 0), state(300, 2), 0.01)).toEqual([]);
  });
});

describe('finalizeOutputs', () => {
  test('converts transpiration to mmol m⁻² s⁻¹', () => {
    const s: OrganState = { ci: 300, ts: 21, gsw: 0.3, tr: 1.8e-5, ag: 10, an: 9, rd: 1 };
    expect(finalizeOutputs(s, BLADE)).toEqual({ ag: 10, an: 9, rd: 1, tr: 1, ts: 21, gs: 0.3 });
  });

  test('discounts non-lamina gross assimilation', () => {
    const s: OrganState = { ci: 300, ts: 21, gsw: 0.3, tr: 0, ag: 10, an: 9, rd: 1 };
    expect(finalizeOutputs(s, SHEATH).ag).toBeCloseTo(7.8, 12);
  });
});

describe('traceOrgan', () => {
  test('one entry per iteration, last one converged', () => {
    const steps = traceOrgan(BLADE, AMBIENT);
    expect(steps).toHaveLength(3);
    expect(steps.map((s) => s.converged)).toEqual([false, false, true]);
    expect(steps[0].state.ts).toBeCloseTo(23.080306, 4);
    expect(steps[2].state.ts).toBeCloseTo(21.89874, 4);
  });
});

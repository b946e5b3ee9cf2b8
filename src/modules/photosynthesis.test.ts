/**
 * Photosynthesis Module Tests
 *
 * Farquhar limitations at 20 °C, Ci = 0.7 × 380, N = 2 g m⁻², PAR = 500.
 */

import { describe, expect, test } from 'vitest';
import {
  assimilation,
  capacitiesAt25,
  lightRespiration,
  limitations,
  photosynthesisComponent,
  photosynthesisDefaults,
} from './photosynthesis.js';
import { ConfigurationError } from '../framework/errors.js';

describe('capacitiesAt25', () => {
  test('linear in nitrogen', () => {
    const cap = capacitiesAt25(2);
    expect(cap.vcMax25).toBeCloseTo(169.93, 10);
    expect(cap.jMax25).toBeCloseTo(235.2, 10);
    expect(cap.tpu25).toBeCloseTo(18.5, 10);
    expect(cap.rDark25).toBeCloseTo(0.986, 10);
    expect(cap.alpha).toBeCloseTo(0.301, 10);
  });

  test('nitrogen below the threshold gives a negative capacity', () => {
    const params = {
      ...photosynthesisDefaults,
      nitrogenMin: { ...photosynthesisDefaults.nitrogenMin, vcMax25: 0.5 },
    };
    expect(capacitiesAt25(0.3, params).vcMax25).toBeCloseTo(-16.993, 10);
  });
});

describe('lightRespiration', () => {
  test('equals dark respiration in the dark', () => {
    expect(lightRespiration(1.5, 0)).toBe(1.5);
  });

  test('falls towards the floor in the light', () => {
    expect(lightRespiration(1, 15)).toBeCloseTo(0.665, 12);
  });
});

describe('limitations', () => {
  const l = limitations(500, 2, 20, 266);

  test('temperature-adjusted kinetics', () => {
    expect(l.kc).toBeCloseTo(233.902377, 5);
    expect(l.ko).toBeCloseTo(216751.075673, 3);
    expect(l.gamma).toBeCloseTo(30.653513, 5);
  });

  test('three competing rates', () => {
    expect(l.ac).toBeCloseTo(45.52305, 4);
    expect(l.aj).toBeCloseTo(19.355349, 5);
    expect(l.ap).toBeCloseTo(49.300771, 5);
  });

  test('respiration in the light', () => {
    expect(l.rd).toBeCloseTo(0.236468, 5);
  });
});

describe('assimilation', () => {
  test('gross assimilation is the minimum limitation', () => {
    const a = assimilation(500, 2, 20, 266);
    expect(a.ag).toBeCloseTo(19.355349, 5);
    expect(a.an).toBeCloseTo(19.118881, 5);
    expect(a.rd).toBeCloseTo(0.236468, 5);
  });

  test('no assimilation when Ci is below the compensation point', () => {
    const a = assimilation(500, 2, 20, 20);
    expect(a.ag).toBe(0);
    expect(a.an).toBe(0);
    expect(a.rd).toBeCloseTo(0.236468, 5);
  });

  test('no assimilation without nitrogen', () => {
    const a = assimilation(500, 0, 20, 266);
    expect(a.ag).toBe(0);
    expect(a.an).toBe(0);
    expect(a.rd).toBe(0);
  });

  test('net assimilation never exceeds gross', () => {
    for (const par of [0, 50, 200, 800, 1500]) {
      const a = assimilation(par, 1.5, 25, 250);
      expect(a.an).toBeLessThanOrEqual(a.ag);
      expect(a.ag).toBeGreaterThanOrEqual(0);
    }
  });
});

describe('nitrogen response', () => {
  const sweep = Array.from({ length: 40 }, (_, i) => 0.1 * (i + 1));

  test('each limitation rises strictly with nitrogen', () => {
    for (const [par, ts, ci] of [[500, 20, 266], [100, 10, 200], [1500, 30, 320]]) {
      const rates = sweep.map((n) => limitations(par, n, ts, ci));
      for (let i = 1; i < rates.length; i++) {
        expect(rates[i].ac).toBeGreaterThan(rates[i - 1].ac);
        expect(rates[i].aj).toBeGreaterThan(rates[i - 1].aj);
        expect(rates[i].ap).toBeGreaterThan(rates[i - 1].ap);
      }
    }
  });

  test('gross assimilation never falls as nitrogen rises', () => {
    for (const [par, ts, ci] of [[500, 20, 266], [100, 10, 200], [1500, 30, 320]]) {
      const ag = sweep.map((n) => assimilation(par, n, ts, ci).ag);
      for (let i = 1; i < ag.length; i++) {
        expect(ag[i]).toBeGreaterThanOrEqual(ag[i - 1]);
      }
    }
  });
});

describe('photosynthesisComponent', () => {
  test('defaults validate', () => {
    expect(photosynthesisComponent.validate(photosynthesisDefaults).valid).toBe(true);
  });

  test('mergeParams keeps the untouched defaults', () => {
    const params = photosynthesisComponent.mergeParams({ theta: 0.8 });
    expect(params.theta).toBe(0.8);
    expect(params.nitrogenSlope).toEqual(photosynthesisDefaults.nitrogenSlope);
  });

  test('mergeParams rejects an invalid curvature', () => {
    expect(() => photosynthesisComponent.mergeParams({ theta: 0 })).toThrow(ConfigurationError);
  });

  test('rejects theta outside (0, 1]', () => {
    const result = photosynthesisComponent.validate({ theta: 1.2 });
    expect(result.errors).toEqual(['theta 1.2 outside valid range (0, 1]']);
  });

  test('rejects a negative nitrogen slope', () => {
    const result = photosynthesisComponent.validate({
      nitrogenSlope: { ...photosynthesisDefaults.nitrogenSlope, tpu25: -1 },
    });
    expect(result.errors).toEqual(['nitrogenSlope.tpu25 cannot be negative']);
  });
});

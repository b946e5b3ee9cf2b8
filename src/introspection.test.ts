/**
 * Introspection Tests
 */

import { describe, expect, test } from 'vitest';
import { describeOutputs, describeParameters, listParameters } from './introspection.js';
import { organModelDefaults } from './config.js';

describe('describeParameters', () => {
  test('named parameters carry their config path and default', () => {
    const schema = describeParameters();
    expect(schema.gsMin).toMatchObject({
      type: 'number',
      default: 0.05,
      min: 0,
      max: 0.5,
      unit: 'mol m⁻² s⁻¹',
      tier: 1,
      path: 'stomata.gsMin',
    });
    expect(schema.vcMaxPerNitrogen.path).toBe('photosynthesis.nitrogenSlope.vcMax25');
  });

  test('unnamed parameters are keyed by path', () => {
    expect(describeParameters()['energyBalance.windAttenuation'].default).toBe(
      organModelDefaults.energyBalance.windAttenuation
    );
  });

  test('filters by tier', () => {
    expect(Object.keys(describeParameters(1))).toEqual([
      'vcMaxPerNitrogen',
      'jMaxPerNitrogen',
      'tpuPerNitrogen',
      'gsMin',
      'defaultSurfacicNitrogen',
      'stemEfficiency',
    ]);
  });

  test('every tier-3 entry is a calibration constant', () => {
    for (const info of Object.values(describeParameters(3))) {
      expect(info.tier).toBe(3);
    }
  });

  test('defaults lie within their documented range', () => {
    for (const info of Object.values(describeParameters())) {
      if (typeof info.default === 'number' && info.min !== undefined && info.max !== undefined) {
        expect(info.default).toBeGreaterThanOrEqual(info.min);
        expect(info.default).toBeLessThanOrEqual(info.max);
      }
    }
  });

  test('listParameters matches the schema', () => {
    expect(listParameters()).toEqual(Object.keys(describeParameters()));
  });
});

describe('describeOutputs', () => {
  test('covers every element output', () => {
    expect(Object.keys(describeOutputs())).toEqual(['ag', 'an', 'rd', 'tr', 'ts', 'gs', 'width', 'height']);
    expect(describeOutputs().tr.unit).toBe('mmol m⁻² s⁻¹');
  });
});

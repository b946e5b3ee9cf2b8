/**
 * Nitrogen Module Tests
 *
 * Element of 20 cm² green area holding 250 µmol of non-structural N
 * (20 nitrates, 30 amino acids, 200 proteins), 1 mg of structural N and
 * 1000 µmol C of non-structural carbohydrates.
 */

import { describe, expect, test } from 'vitest';
import {
  capacityDriver,
  nitrogenComponent,
  nitrogenDefaults,
  nonstructuralNitrogenFromProteins,
  retroinhibitionFactor,
  surfacicNitrogen,
  surfacicNonstructuralCarbohydrates,
  surfacicNonstructuralNitrogen,
  surfacicPhotosyntheticProteins,
  type NitrogenStatus,
} from './nitrogen.js';
import { InputError } from '../framework/errors.js';

const status: NitrogenStatus = {
  nitrates: 20,
  aminoAcids: 30,
  proteins: 200,
  nitrogenStructural: 0.001,
  greenArea: 0.002,
  sucrose: 500,
  starch: 200,
  fructan: 300,
};

describe('surfacic contents', () => {
  test('total surfacic nitrogen includes structural nitrogen', () => {
    expect(surfacicNitrogen(20, 30, 200, 0.001, 0.002)).toBeCloseTo(2.25, 10);
  });

  test('non-structural nitrogen', () => {
    expect(surfacicNonstructuralNitrogen(20, 30, 200, 0.002)).toBeCloseTo(1.75, 10);
  });

  test('photosynthetic proteins', () => {
    expect(surfacicPhotosyntheticProteins(200, 0.002)).toBeCloseTo(1.4, 10);
  });

  test('protein calibration', () => {
    expect(nonstructuralNitrogenFromProteins(1.4)).toBeCloseTo(1.85, 10);
  });

  test('non-structural carbohydrates in g C m⁻²', () => {
    expect(surfacicNonstructuralCarbohydrates(500, 200, 300, 0.002)).toBeCloseTo(6, 10);
  });
});

describe('retroinhibitionFactor', () => {
  test('1 without carbohydrates', () => {
    expect(retroinhibitionFactor(0)).toBe(1);
  });

  test('0.5 at the half-inhibition content', () => {
    expect(retroinhibitionFactor(25)).toBe(0.5);
  });

  test('negative contents are treated as zero', () => {
    expect(retroinhibitionFactor(-3)).toBe(1);
  });
});

describe('capacityDriver', () => {
  test('Barillot2016 uses total surfacic nitrogen', () => {
    expect(capacityDriver(status, 'Barillot2016')).toBeCloseTo(2.25, 10);
  });

  test('SurfacicProteins uses the protein calibration', () => {
    expect(capacityDriver(status, 'SurfacicProteins')).toBeCloseTo(1.85, 10);
  });

  test('SurfacicProteins_Retroinhibition down-regulates by carbohydrates', () => {
    expect(capacityDriver(status, 'SurfacicProteins_Retroinhibition')).toBeCloseTo((1.85 * 25) / 31, 10);
  });

  test('a pre-normalised driver is used as is', () => {
    expect(capacityDriver({ ...status, surfacicNitrogen: 1.3 }, 'Barillot2016')).toBe(1.3);
  });

  test('an element without nitrogen data gets the default', () => {
    expect(capacityDriver({}, 'SurfacicProteins')).toBe(2);
  });

  test('missing components are reported', () => {
    try {
      capacityDriver({ proteins: 200, greenArea: 0.002 }, 'Barillot2016');
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(InputError);
      if (err instanceof InputError) {
        expect(err.issues).toEqual(['missing nitrates', 'missing aminoAcids', 'missing nitrogenStructural']);
      }
    }
  });

  test('green area must be positive', () => {
    expect(() => capacityDriver({ proteins: 200, greenArea: 0 }, 'SurfacicProteins')).toThrow(
      'SurfacicProteins needs a positive greenArea'
    );
  });
});

describe('nitrogenComponent', () => {
  test('defaults validate', () => {
    expect(nitrogenComponent.validate(nitrogenDefaults).valid).toBe(true);
  });

  test('mergeParams overrides the default driver', () => {
    expect(nitrogenComponent.mergeParams({ defaultSurfacicNitrogen: 1.5 })).toEqual({
      ...nitrogenDefaults,
      defaultSurfacicNitrogen: 1.5,
    });
  });

  test('mergeParams throws on a non-positive half-inhibition content', () => {
    expect(() =>
      nitrogenComponent.mergeParams({ retroinhibition: { halfInhibitionNsc: 0 } })
    ).toThrow('[nitrogen] Invalid configuration:\n  retroinhibition.halfInhibitionNsc must be positive');
  });

  test('rejects a non-positive default driver', () => {
    expect(nitrogenComponent.validate({ defaultSurfacicNitrogen: 0 }).errors).toEqual([
      'defaultSurfacicNitrogen must be positive',
    ]);
  });
});

/**
 * Nitrogen Module
 *
 * Normalises the nitrogen status of an element into the single scalar
 * consumed by the photosynthesis and stomata formulas: the surfacic
 * nitrogen capacity driver (g N m⁻²).
 *
 * Three formulations, chosen once per configuration:
 *   Barillot2016                      total surfacic nitrogen
 *                                     ((nitrates + amino acids + proteins) · M_N + N_struct) / area
 *   SurfacicProteins                  non-structural nitrogen equivalent of the
 *                                     photosynthetic proteins (linear calibration)
 *   SurfacicProteins_Retroinhibition  as above, down-regulated by non-structural
 *                                     carbohydrate accumulation: K / (K + NSC)
 *
 * Amounts of nitrates, amino acids and proteins are in µmol N, structural
 * nitrogen in g, carbohydrates in µmol C and green area in m².
 *
 * References:
 *   Barillot et al. (2016) Annals of Botany 118, 997–1013
 */

import { defineComponent, type Component } from '../framework/module.js';
import type { ValidationResult } from '../framework/types.js';
import { validatedMerge, deepMerge } from '../framework/validated-merge.js';
import { InputError } from '../framework/errors.js';
import { CARBON_MOLAR_MASS, NITROGEN_MOLAR_MASS } from '../primitives/constants.js';
import { MODEL_VERSIONS, type ModelVersion } from '../domain-types.js';

// =============================================================================
// PARAMETERS
// =============================================================================

export interface NitrogenParams {
  defaultSurfacicNitrogen: number;  // Used when an element carries no nitrogen data, g N m⁻² (2)
  proteinsToNitrogen: {
    slope: number;                  // g N (non-structural) per g N (proteins)
    intercept: number;              // g N m⁻²
  };
  retroinhibition: {
    halfInhibitionNsc: number;      // NSC halving the capacity driver, g C m⁻²
  };
}

export const nitrogenDefaults: NitrogenParams = {
  defaultSurfacicNitrogen: 2,
  proteinsToNitrogen: {
    slope: 1.25,
    intercept: 0.1,
  },
  retroinhibition: {
    halfInhibitionNsc: 25,
  },
};

// =============================================================================
// TYPES
// =============================================================================

/**
 * Nitrogen and carbohydrate status of an element, as supplied by the
 * plant-level collaborator. Every field is optional; each formulation
 * reads the ones it needs.
 */
export interface NitrogenStatus {
  surfacicNitrogen?: number;    // Pre-normalised capacity driver, g N m⁻²
  nitrates?: number;            // µmol N
  aminoAcids?: number;          // µmol N
  proteins?: number;            // µmol N
  nitrogenStructural?: number;  // g N
  greenArea?: number;           // m²
  sucrose?: number;             // µmol C
  starch?: number;              // µmol C
  fructan?: number;             // µmol C
}

type StatusField = Exclude<keyof NitrogenStatus, 'surfacicNitrogen'>;

/**
 * One nitrogen formulation
 */
export interface NitrogenVariant {
  readonly version: ModelVersion;
  readonly description: string;
  /** Fields of NitrogenStatus the formulation reads */
  readonly requires: readonly StatusField[];
  /** Capacity driver (g N m⁻²) from a status carrying every required field */
  capacityDriver(status: Required<Pick<NitrogenStatus, StatusField>>, params: NitrogenParams): number;
}

// =============================================================================
// FORMULAS
// =============================================================================

/**
 * Surfacic content of nitrogen, structural included (g N m⁻²)
 */
export function surfacicNitrogen(
  nitrates: number,
  aminoAcids: number,
  proteins: number,
  nitrogenStructural: number,
  greenArea: number
): number {
  const massNitrogen = (nitrates + aminoAcids + proteins) * 1e-6 * NITROGEN_MOLAR_MASS + nitrogenStructural;
  return massNitrogen / greenArea;
}

/**
 * Surfacic content of non-structural nitrogen (g N m⁻²)
 */
export function surfacicNonstructuralNitrogen(
  nitrates: number,
  aminoAcids: number,
  proteins: number,
  greenArea: number
): number {
  const massNitrogen = (nitrates + aminoAcids + proteins) * 1e-6 * NITROGEN_MOLAR_MASS;
  return massNitrogen / greenArea;
}

/**
 * Surfacic content of photosynthetic proteins (g N m⁻²)
 */
export function surfacicPhotosyntheticProteins(proteins: number, greenArea: number): number {
  return (proteins * 1e-6 * NITROGEN_MOLAR_MASS) / greenArea;
}

/**
 * Non-structural nitrogen equivalent of the photosynthetic proteins,
 * the scale on which the photosynthetic parameters were calibrated.
 */
export function nonstructuralNitrogenFromProteins(
  surfacicProteins: number,
  params: NitrogenParams = nitrogenDefaults
): number {
  const { slope, intercept } = params.proteinsToNitrogen;
  return slope * surfacicProteins + intercept;
}

/**
 * Surfacic content of non-structural carbohydrates (g C m⁻²)
 */
export function surfacicNonstructuralCarbohydrates(
  sucrose: number,
  starch: number,
  fructan: number,
  greenArea: number
): number {
  return ((sucrose + starch + fructan) * 1e-6 * CARBON_MOLAR_MASS) / greenArea;
}

/**
 * Down-regulation of photosynthetic capacity by carbohydrate accumulation,
 * 1 without carbohydrates and 0.5 at the half-inhibition content.
 */
export function retroinhibitionFactor(
  surfacicNsc: number,
  params: NitrogenParams = nitrogenDefaults
): number {
  const k = params.retroinhibition.halfInhibitionNsc;
  return k / (k + Math.max(0, surfacicNsc));
}

// =============================================================================
// VARIANTS
// =============================================================================

export const NITROGEN_VARIANTS: Readonly<Record<ModelVersion, NitrogenVariant>> = {
  Barillot2016: {
    version: 'Barillot2016',
    description: 'Total surfacic nitrogen',
    requires: ['nitrates', 'aminoAcids', 'proteins', 'nitrogenStructural', 'greenArea'],
    capacityDriver: (s) =>
      surfacicNitrogen(s.nitrates, s.aminoAcids, s.proteins, s.nitrogenStructural, s.greenArea),
  },
  SurfacicProteins: {
    version: 'SurfacicProteins',
    description: 'Non-structural nitrogen equivalent of photosynthetic proteins',
    requires: ['proteins', 'greenArea'],
    capacityDriver: (s, params) =>
      nonstructuralNitrogenFromProteins(surfacicPhotosyntheticProteins(s.proteins, s.greenArea), params),
  },
  SurfacicProteins_Retroinhibition: {
    version: 'SurfacicProteins_Retroinhibition',
    description: 'Protein-derived nitrogen down-regulated by non-structural carbohydrates',
    requires: ['proteins', 'greenArea', 'sucrose', 'starch', 'fructan'],
    capacityDriver: (s, params) => {
      const nitrogen = nonstructuralNitrogenFromProteins(
        surfacicPhotosyntheticProteins(s.proteins, s.greenArea),
        params
      );
      const nsc = surfacicNonstructuralCarbohydrates(s.sucrose, s.starch, s.fructan, s.greenArea);
      return nitrogen * retroinhibitionFactor(nsc, params);
    },
  },
};

const STATUS_FIELDS: readonly StatusField[] = [
  'nitrates', 'aminoAcids', 'proteins', 'nitrogenStructural', 'greenArea', 'sucrose', 'starch', 'fructan',
];

function hasAnyComponent(status: NitrogenStatus): boolean {
  return STATUS_FIELDS.some((field) => status[field] !== undefined);
}

/**
 * Capacity driver of one element under a formulation.
 *
 * - A pre-normalised `surfacicNitrogen` is used as is.
 * - An element without any nitrogen data gets `defaultSurfacicNitrogen`.
 * - Otherwise every field the formulation requires must be present,
 *   and greenArea must be positive; InputError names what is missing.
 */
export function capacityDriver(
  status: NitrogenStatus,
  version: ModelVersion,
  params: NitrogenParams = nitrogenDefaults
): number {
  if (status.surfacicNitrogen !== undefined) {
    return status.surfacicNitrogen;
  }
  if (!hasAnyComponent(status)) {
    return params.defaultSurfacicNitrogen;
  }

  const variant = NITROGEN_VARIANTS[version];
  const missing = variant.requires.filter((field) => status[field] === undefined);
  if (missing.length > 0) {
    throw new InputError(`${version} needs ${variant.requires.join(', ')}`, missing.map((f) => `missing ${f}`));
  }
  const complete = {
    nitrates: status.nitrates ?? 0,
    aminoAcids: status.aminoAcids ?? 0,
    proteins: status.proteins ?? 0,
    nitrogenStructural: status.nitrogenStructural ?? 0,
    greenArea: status.greenArea ?? 0,
    sucrose: status.sucrose ?? 0,
    starch: status.starch ?? 0,
    fructan: status.fructan ?? 0,
  };
  if (complete.greenArea <= 0) {
    throw new InputError(`${version} needs a positive greenArea`, [`greenArea ${complete.greenArea}`]);
  }
  return variant.capacityDriver(complete, params);
}

// =============================================================================
// COMPONENT DEFINITION
// =============================================================================

export const nitrogenComponent: Component<NitrogenParams> = defineComponent({
  name: 'nitrogen',
  description: `Nitrogen normalisation (${MODEL_VERSIONS.join(', ')})`,

  defaults: nitrogenDefaults,

  paramMeta: {
    defaultSurfacicNitrogen: {
      paramName: 'defaultSurfacicNitrogen',
      description: 'Surfacic nitrogen used for elements supplied without nitrogen data.',
      unit: 'g N m⁻²',
      range: { min: 0, max: 10, default: 2 },
      tier: 1 as const,
    },
    proteinsToNitrogen: {
      slope: {
        description: 'Slope of non-structural nitrogen against surfacic photosynthetic proteins.',
        unit: 'g N g⁻¹ N',
        range: { min: 0, max: 5, default: 1.25 },
        tier: 3 as const,
      },
      intercept: {
        description: 'Intercept of non-structural nitrogen against surfacic photosynthetic proteins.',
        unit: 'g N m⁻²',
        range: { min: -1, max: 2, default: 0.1 },
        tier: 3 as const,
      },
    },
    retroinhibition: {
      halfInhibitionNsc: {
        paramName: 'halfInhibitionNsc',
        description: 'Surfacic non-structural carbohydrates halving the photosynthetic capacity.',
        unit: 'g C m⁻²',
        range: { min: 1, max: 200, default: 25 },
        tier: 2 as const,
      },
    },
  },

  validate(params: Partial<NitrogenParams>): ValidationResult {
    const errors: string[] = [];
    const warnings: string[] = [];

    const p = deepMerge(nitrogenDefaults, params);

    if (p.defaultSurfacicNitrogen <= 0) {
      errors.push('defaultSurfacicNitrogen must be positive');
    }
    if (p.proteinsToNitrogen.slope <= 0) {
      errors.push('proteinsToNitrogen.slope must be positive');
    }
    if (p.retroinhibition.halfInhibitionNsc <= 0) {
      errors.push('retroinhibition.halfInhibitionNsc must be positive');
    }
    if (p.defaultSurfacicNitrogen > 6) {
      warnings.push(`defaultSurfacicNitrogen ${p.defaultSurfacicNitrogen} unusually high for a leaf`);
    }

    return { valid: errors.length === 0, errors, warnings };
  },

  mergeParams(partial: Partial<NitrogenParams>): NitrogenParams {
    return validatedMerge('nitrogen', this.validate, (p) => deepMerge(nitrogenDefaults, p), partial);
  },
});

/**
 * Domain-specific types for the organ photosynthesis solver.
 *
 * These are separated from framework/types.ts to keep the framework
 * fully domain-independent and reusable.
 */

/** Photosynthetic organ types */
export type OrganType = 'blade' | 'internode' | 'sheath' | 'peduncle' | 'ear';
export const ORGAN_TYPES: readonly OrganType[] = ['blade', 'internode', 'sheath', 'peduncle', 'ear'];

/** Forced-convection regime used for the boundary-layer resistance */
export type ConvectionRegime = 'flatPlate' | 'cylinder';

export interface OrganCapabilities {
  /** Heat transfer geometry */
  convection: ConvectionRegime;
  /** Whether gross assimilation is discounted by the stem efficiency */
  stemDiscount: boolean;
}

/**
 * Capability table: laminae are flat plates at full efficiency,
 * every other organ is a cylinder with the stem efficiency discount.
 */
export const ORGAN_CAPABILITIES: Readonly<Record<OrganType, OrganCapabilities>> = {
  blade: { convection: 'flatPlate', stemDiscount: false },
  internode: { convection: 'cylinder', stemDiscount: true },
  sheath: { convection: 'cylinder', stemDiscount: true },
  peduncle: { convection: 'cylinder', stemDiscount: true },
  ear: { convection: 'cylinder', stemDiscount: true },
};

export function isOrganType(value: string): value is OrganType {
  return ORGAN_TYPES.some((t) => t === value);
}

/**
 * Nitrogen formulation variants.
 *
 * - Barillot2016: total surfacic nitrogen (non-structural + structural)
 * - SurfacicProteins: non-structural nitrogen derived from photosynthetic proteins
 * - SurfacicProteins_Retroinhibition: as above, down-regulated by carbohydrate accumulation
 */
export type ModelVersion = 'Barillot2016' | 'SurfacicProteins' | 'SurfacicProteins_Retroinhibition';
export const MODEL_VERSIONS: readonly ModelVersion[] = [
  'Barillot2016',
  'SurfacicProteins',
  'SurfacicProteins_Retroinhibition',
];

export function isModelVersion(value: string): value is ModelVersion {
  return MODEL_VERSIONS.some((v) => v === value);
}

/**
 * Location of a photosynthetic element in the plant hierarchy:
 * [plant index, axis label, metamer index, organ type, element label]
 */
export type ElementId = readonly [
  plant: number,
  axis: string,
  metamer: number,
  organ: OrganType,
  element: string,
];

/** Axis location: [plant index, axis label] */
export type AxisId = readonly [plant: number, axis: string];

/** Keys of an element location, in tabular column order */
export const ELEMENT_KEYS = ['plant', 'axis', 'metamer', 'organ', 'element'] as const;

const KEY_SEPARATOR = '/';

/** Stable string key for an element ("1/MS/9/blade/visible") */
export function elementKey(id: ElementId): string {
  return id.join(KEY_SEPARATOR);
}

/** Stable string key for an axis ("1/MS") */
export function axisKey(id: AxisId): string {
  return id.join(KEY_SEPARATOR);
}

/** Axis that carries an element */
export function axisOf(id: ElementId): AxisId {
  return [id[0], id[1]];
}

/**
 * Inverse of elementKey. Returns undefined for malformed keys.
 */
export function parseElementKey(key: string): ElementId | undefined {
  const parts = key.split(KEY_SEPARATOR);
  if (parts.length !== 5) return undefined;
  const [plant, axis, metamer, organ, element] = parts;
  const plantIndex = Number(plant);
  const metamerIndex = Number(metamer);
  if (!Number.isInteger(plantIndex) || !Number.isInteger(metamerIndex)) return undefined;
  if (!isOrganType(organ)) return undefined;
  return [plantIndex, axis, metamerIndex, organ, element];
}

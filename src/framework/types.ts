/**
 * Core types for the solver framework
 */

/**
 * Validation result
 */
export interface ValidationResult {
  valid: boolean;
  errors: string[];
  warnings: string[];
}

/**
 * Range constraint for numeric parameters
 */
export interface Range {
  min?: number;
  max?: number;
  default: number;
}

/**
 * Parameter metadata for documentation and validation
 */
export interface ParamMeta {
  description: string;
  unit: string;
  range: Range;
  tier: 1 | 2 | 3;  // 1 = user-facing, 2 = scenario, 3 = calibration
  source?: string;  // Literature source
  /** Friendly key for introspection (e.g., 'gsMin'). Defaults to leaf key name. */
  paramName?: string;
}

/**
 * Metadata tree mirroring the shape of a parameter object.
 * Leaves are ParamMeta, inner nodes are nested trees.
 */
export interface ParamMetaTree {
  [key: string]: ParamMeta | ParamMetaTree;
}

/**
 * Recursively optional view of a parameter object (for overrides)
 */
export type DeepPartial<T> = T extends object
  ? { [K in keyof T]?: DeepPartial<T[K]> }
  : T;

/**
 * Input Loader
 *
 * Loads timestep inputs from JSON documents and converts element-keyed
 * maps to and from flat rows.
 *
 * Document format:
 *   {
 *     "name": "...", "description": "...",
 *     "ambient": { "airTemperature": 20, "ambientCO2": 380, ... },   (optional)
 *     "axes":     [{ "plant": 1, "axis": "MS", "canopyHeight": 0.6, "samTemperature": 18 }],
 *     "elements": [{ "plant": 1, "axis": "MS", "metamer": 8, "organ": "blade",
 *                    "element": "visible", "width": 0.012, "height": 0.55, "par": 500, ... }]
 *   }
 */

import { readFile, readdir } from 'fs/promises';
import { join, dirname } from 'path';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import { InputError } from './framework/errors.js';
import { axisKey, elementKey, parseElementKey, type OrganType } from './domain-types.js';
import type { AmbientConditions } from './organ.js';
import type { AxisInputs, ElementInputs, SimulationInputs } from './simulation.js';

// =============================================================================
// SCHEMAS
// =============================================================================

const amount = z.number().nonnegative();

export const AmbientSchema = z.object({
  airTemperature: z.number(),
  ambientCO2: z.number().positive(),
  relativeHumidity: z.number().min(0).max(1),
  windSpeed: amount,
  incidentPar: amount.optional(),
});

export const AxisRowSchema = z.object({
  plant: z.number().int(),
  axis: z.string().min(1),
  canopyHeight: z.number().positive(),
  samTemperature: z.number(),
});

export const ElementRowSchema = z.object({
  plant: z.number().int(),
  axis: z.string().min(1),
  metamer: z.number().int(),
  organ: z.enum(['blade', 'internode', 'sheath', 'peduncle', 'ear']),
  element: z.string().min(1),
  width: z.number().positive().nullable(),
  height: z.number().nonnegative().nullable(),
  par: amount.optional(),
  star: z.number().min(0).max(1).optional(),
  surfacicNitrogen: amount.optional(),
  nitrates: amount.optional(),
  aminoAcids: amount.optional(),
  proteins: amount.optional(),
  nitrogenStructural: amount.optional(),
  greenArea: amount.optional(),
  sucrose: amount.optional(),
  starch: amount.optional(),
  fructan: amount.optional(),
});

export const InputDocumentSchema = z.object({
  name: z.string().min(1),
  description: z.string().default(''),
  ambient: AmbientSchema.optional(),
  axes: z.array(AxisRowSchema),
  elements: z.array(ElementRowSchema),
});

export type InputDocument = z.infer<typeof InputDocumentSchema>;

// =============================================================================
// ROWS
// =============================================================================

/** Location columns leading every row */
export interface ElementLocation {
  plant: number;
  axis: string;
  metamer: number;
  organ: OrganType;
  element: string;
}

/**
 * Flatten an element-keyed map into rows, location columns first
 */
export function toRows<T extends object>(values: ReadonlyMap<string, T>): (ElementLocation & T)[] {
  const rows: (ElementLocation & T)[] = [];
  for (const [key, value] of values) {
    const id = parseElementKey(key);
    if (!id) {
      throw new InputError(`malformed element key '${key}'`);
    }
    const [plant, axis, metamer, organ, element] = id;
    rows.push({ plant, axis, metamer, organ, element, ...value });
  }
  return rows;
}

/**
 * Group rows into an element-keyed map, dropping the location columns.
 * Throws InputError on a repeated element.
 */
export function fromRows<R extends ElementLocation>(
  rows: readonly R[]
): Map<string, Omit<R, keyof ElementLocation>> {
  const values = new Map<string, Omit<R, keyof ElementLocation>>();
  for (const row of rows) {
    const { plant, axis, metamer, organ, element, ...rest } = row;
    const key = elementKey([plant, axis, metamer, organ, element]);
    if (values.has(key)) {
      throw new InputError(`duplicate element '${key}'`);
    }
    values.set(key, rest);
  }
  return values;
}

// =============================================================================
// LOADER
// =============================================================================

export interface LoadedInputs {
  name: string;
  description: string;
  ambient?: AmbientConditions;
  inputs: SimulationInputs;
}

/**
 * Validate an already-parsed document
 *
 * @param source - Used in error messages (usually the file path)
 */
export function parseInputs(data: unknown, source = 'inputs'): LoadedInputs {
  const parsed = InputDocumentSchema.safeParse(data);
  if (!parsed.success) {
    throw new InputError(
      `Invalid input document ${source}`,
      parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    );
  }
  const doc = parsed.data;

  const axes = new Map<string, AxisInputs>();
  for (const { plant, axis, canopyHeight, samTemperature } of doc.axes) {
    const key = axisKey([plant, axis]);
    if (axes.has(key)) {
      throw new InputError(`Invalid input document ${source}`, [`duplicate axis '${key}'`]);
    }
    axes.set(key, { canopyHeight, samTemperature });
  }

  const elements: Map<string, ElementInputs> = fromRows(doc.elements);

  return {
    name: doc.name,
    description: doc.description,
    ambient: doc.ambient,
    inputs: { elements, axes },
  };
}

/**
 * Load and validate an input document from a JSON file
 */
export async function loadInputs(path: string): Promise<LoadedInputs> {
  const content = await readFile(path, 'utf-8');
  let data: unknown;
  try {
    data = JSON.parse(content);
  } catch (err) {
    throw new InputError(`Input file is not valid JSON: ${path}`, [err instanceof Error ? err.message : String(err)]);
  }
  return parseInputs(data, path);
}

// =============================================================================
// BUNDLED INPUTS
// =============================================================================

const INPUTS_DIR = join(dirname(fileURLToPath(import.meta.url)), '../inputs');

/**
 * List bundled input files
 */
export async function listInputs(inputsDir: string = INPUTS_DIR): Promise<string[]> {
  const files = await readdir(inputsDir);
  return files
    .filter(f => f.endsWith('.json'))
    .map(f => f.replace('.json', ''))
    .sort();
}

/**
 * Get the path of a bundled input file from its name
 */
export function getInputsPath(name: string, inputsDir: string = INPUTS_DIR): string {
  return join(inputsDir, `${name}.json`);
}

/**
 * Path of an input file given either a bundled name or a path to a JSON file
 */
export function resolveInputsPath(nameOrPath: string, inputsDir: string = INPUTS_DIR): string {
  return nameOrPath.endsWith('.json') ? nameOrPath : getInputsPath(nameOrPath, inputsDir);
}

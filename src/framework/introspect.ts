/**
 * Parameter schema generation
 *
 * Each component declares a `paramMeta` tree shaped like its defaults.
 * The leaves (objects with description, unit and range) become schema
 * entries; the default shown is the one actually in `defaults`.
 */

import type { Component } from './module.js';
import type { ParamMeta, ParamMetaTree } from './types.js';

export interface GeneratedParameterInfo {
  type: 'number' | 'boolean';
  default: number | boolean;
  min?: number;
  max?: number;
  unit: string;
  description: string;
  source?: string;
  tier: 1 | 2 | 3;
  /** Dotted location in the configuration, component name first */
  path: string;
}

interface MetaLeaf {
  keys: string[];
  meta: ParamMeta;
}

function isLeaf(node: ParamMeta | ParamMetaTree): node is ParamMeta {
  return typeof node.description === 'string' && typeof node.unit === 'string'
    && typeof node.range === 'object' && node.range !== null;
}

function* leaves(tree: ParamMetaTree, prefix: string[] = []): Generator<MetaLeaf> {
  for (const [key, node] of Object.entries(tree)) {
    if (isLeaf(node)) {
      yield { keys: [...prefix, key], meta: node };
    } else {
      yield* leaves(node, [...prefix, key]);
    }
  }
}

function valueAt(root: object, keys: string[]): unknown {
  let node: unknown = root;
  for (const key of keys) {
    if (typeof node !== 'object' || node === null) return undefined;
    node = Object.getOwnPropertyDescriptor(node, key)?.value;
  }
  return node;
}

function describeLeaf(component: Component<object>, { keys, meta }: MetaLeaf): GeneratedParameterInfo {
  const actual = valueAt(component.defaults, keys);
  return {
    type: typeof actual === 'boolean' ? 'boolean' : 'number',
    default: typeof actual === 'number' || typeof actual === 'boolean' ? actual : meta.range.default,
    min: meta.range.min,
    max: meta.range.max,
    unit: meta.unit,
    description: meta.description,
    source: meta.source,
    tier: meta.tier,
    path: [component.name, ...keys].join('.'),
  };
}

/**
 * Schema of every documented parameter, keyed by `paramName` when the
 * metadata gives one and by dotted path otherwise.
 */
export function generateParameterSchema(
  components: readonly Component<object>[]
): Record<string, GeneratedParameterInfo> {
  const schema: Record<string, GeneratedParameterInfo> = {};
  for (const component of components) {
    if (!component.paramMeta) continue;
    for (const leaf of leaves(component.paramMeta)) {
      const info = describeLeaf(component, leaf);
      schema[leaf.meta.paramName ?? info.path] = info;
    }
  }
  return schema;
}

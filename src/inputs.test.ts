/**
 * Input Loader Tests
 */

import { describe, expect, test } from 'vitest';
import { mkdtemp, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import {
  fromRows,
  getInputsPath,
  listInputs,
  loadInputs,
  parseInputs,
  resolveInputsPath,
  toRows,
} from './inputs.js';
import { InputError } from './framework/errors.js';

const document = {
  name: 'Two elements',
  axes: [{ plant: 1, axis: 'MS', canopyHeight: 0.7, samTemperature: 18.5 }],
  elements: [
    { plant: 1, axis: 'MS', metamer: 8, organ: 'blade', element: 'visible', width: 0.015, height: 0.6, par: 500 },
    { plant: 1, axis: 'MS', metamer: 9, organ: 'internode', element: 'hidden', width: null, height: null },
  ],
};

function issuesOf(fn: () => unknown): string[] {
  try {
    fn();
  } catch (err) {
    if (err instanceof InputError) {
      return err.issues;
    }
    throw err;
  }
  throw new Error('expected an InputError');
}

describe('parseInputs', () => {
  test('builds element and axis maps', () => {
    const loaded = parseInputs(document);
    expect(loaded.name).toBe('Two elements');
    expect(loaded.description).toBe('');
    expect(loaded.ambient).toBeUndefined();
    expect([...loaded.inputs.elements.keys()]).toEqual(['1/MS/8/blade/visible', '1/MS/9/internode/hidden']);
    expect(loaded.inputs.elements.get('1/MS/8/blade/visible')).toEqual({ width: 0.015, height: 0.6, par: 500 });
    expect(loaded.inputs.axes.get('1/MS')).toEqual({ canopyHeight: 0.7, samTemperature: 18.5 });
  });

  test('keeps the document weather', () => {
    const ambient = { airTemperature: 15, ambientCO2: 400, relativeHumidity: 0.6, windSpeed: 1 };
    expect(parseInputs({ ...document, ambient }).ambient).toEqual(ambient);
  });

  test('reports the path of each invalid field', () => {
    const bad = {
      ...document,
      elements: [{ ...document.elements[0], organ: 'leaf', width: -1 }],
    };
    const issues = issuesOf(() => parseInputs(bad, 'bad.json'));
    expect(issues.map((issue) => issue.split(':')[0])).toEqual(['elements.0.organ', 'elements.0.width']);
  });

  test('names the source in the message', () => {
    expect(() => parseInputs({ axes: [], elements: [] }, 'empty.json')).toThrow('Invalid input document empty.json');
  });

  test('rejects a repeated element', () => {
    const bad = { ...document, elements: [document.elements[0], document.elements[0]] };
    expect(() => parseInputs(bad)).toThrow("duplicate element '1/MS/8/blade/visible'");
  });

  test('rejects a repeated axis', () => {
    const bad = { ...document, axes: [document.axes[0], document.axes[0]] };
    expect(issuesOf(() => parseInputs(bad))).toEqual(["duplicate axis '1/MS'"]);
  });

  test('a non-object document is reported at the root', () => {
    expect(issuesOf(() => parseInputs(42))).toEqual(['(root): Expected object, received number']);
  });
});

describe('rows', () => {
  test('toRows puts the location columns first', () => {
    const rows = toRows(new Map([['1/MS/8/blade/visible', { an: 12 }]]));
    expect(rows).toEqual([{ plant: 1, axis: 'MS', metamer: 8, organ: 'blade', element: 'visible', an: 12 }]);
    expect(Object.keys(rows[0])).toEqual(['plant', 'axis', 'metamer', 'organ', 'element', 'an']);
  });

  test('toRows rejects a malformed key', () => {
    expect(() => toRows(new Map([['1/MS/8/leaf/visible', { an: 12 }]]))).toThrow(
      "malformed element key '1/MS/8/leaf/visible'"
    );
  });

  test('fromRows inverts toRows', () => {
    const values = new Map([
      ['1/MS/8/blade/visible', { an: 12 }],
      ['1/T1/6/sheath/visible', { an: 3 }],
    ]);
    expect(fromRows(toRows(values))).toEqual(values);
  });
});

describe('bundled inputs', () => {
  test('main-stem is listed', async () => {
    expect(await listInputs()).toContain('main-stem');
  });

  test('main-stem loads', async () => {
    const loaded = await loadInputs(getInputsPath('main-stem'));
    expect(loaded.name).toBe('Main stem at flowering');
    expect(loaded.inputs.elements.size).toBe(9);
    expect([...loaded.inputs.axes.keys()]).toEqual(['1/MS', '1/T1']);
    expect(loaded.ambient?.incidentPar).toBe(1200);
    expect(loaded.inputs.elements.get('1/MS/8/internode/hidden')).toEqual({ width: null, height: null });
  });

  test('resolveInputsPath', () => {
    expect(resolveInputsPath('runs/day1.json')).toBe('runs/day1.json');
    expect(resolveInputsPath('main-stem')).toBe(getInputsPath('main-stem'));
    expect(getInputsPath('main-stem', '/data')).toBe(join('/data', 'main-stem.json'));
  });
});

describe('loadInputs', () => {
  test('invalid JSON is an input error', async () => {
    const dir = await mkdtemp(join(tmpdir(), 'organ-inputs-'));
    const path = join(dir, 'broken.json');
    await writeFile(path, '{ "name": ');
    await expect(loadInputs(path)).rejects.toThrow(`Input file is not valid JSON: ${path}`);
  });

  test('listInputs ignores non-JSON files', async () => {
    const dir = await mkdtemp(join(tmpdir(), 'organ-inputs-'));
    await writeFile(join(dir, 'b.json'), '{}');
    await writeFile(join(dir, 'a.json'), '{}');
    await writeFile(join(dir, 'notes.txt'), '');
    expect(await listInputs(dir)).toEqual(['a', 'b']);
  });
});

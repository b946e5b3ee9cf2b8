/**
 * Fixed-Point Driver Tests
 *
 * Uses Heron's iteration for √a as a toy module.
 */

import { describe, expect, test } from 'vitest';
import { defineModule } from './module.js';
import { defineFixedPoint, init, solve } from './iterate.js';

interface HeronState {
  x: number;
}

const heron = defineModule<{ a: number }, HeronState, { start: number }, { error: number }>({
  name: 'heron',
  description: 'Square root by successive substitution',
  defaults: { a: 2 },
  validate: () => ({ valid: true, errors: [], warnings: [] }),
  mergeParams: (partial) => ({ a: 2, ...partial }),
  init: (inputs) => ({ x: inputs.start }),
  step: (state, _inputs, params) => {
    const x = (state.x + params.a / state.x) / 2;
    return { state: { x }, outputs: { error: Math.abs(x * x - params.a) } };
  },
});

const problem = (maxIterations: number) =>
  defineFixedPoint({
    module: heron,
    params: { a: 2 },
    inputs: { start: 1 },
    maxIterations,
    converged: (prev: HeronState, cur: HeronState) => Math.abs(cur.x - prev.x) < 1e-12,
  });

describe('solve', () => {
  test('runs until the criterion holds', () => {
    const result = solve(problem(50));
    expect(result.converged).toBe(true);
    expect(result.state.x).toBeCloseTo(Math.SQRT2, 12);
    expect(result.iterations).toBe(6);
  });

  test('stops at the iteration ceiling', () => {
    const result = solve(problem(2));
    expect(result.converged).toBe(false);
    expect(result.iterations).toBe(2);
    expect(result.previous.x).toBe(1.5);
    expect(result.state.x).toBeCloseTo(17 / 12, 15);
  });

  test('always takes at least one step', () => {
    const result = solve(problem(1));
    expect(result.iterations).toBe(1);
    expect(result.state.x).toBe(1.5);
    expect(result.outputs.error).toBe(0.25);
  });
});

describe('init (stepper)', () => {
  test('exposes each substitution', () => {
    const stepper = init(problem(50));
    expect(stepper.state().x).toBe(1);
    expect(stepper.done()).toBe(false);

    const first = stepper.step();
    expect(first.iteration).toBe(1);
    expect(first.previous.x).toBe(1);
    expect(first.state.x).toBe(1.5);
    expect(stepper.iteration()).toBe(1);
  });

  test('matches solve()', () => {
    const stepper = init(problem(50));
    while (!stepper.done()) {
      stepper.step();
    }
    expect(stepper.result()).toEqual(solve(problem(50)));
  });

  test('refuses to step past the end', () => {
    const stepper = init(problem(1));
    stepper.step();
    expect(stepper.done()).toBe(true);
    expect(() => stepper.step()).toThrow('[heron] step() called after the iteration stopped');
  });

  test('has no result before the first step', () => {
    expect(() => init(problem(5)).result()).toThrow('[heron] result() called before the first step');
  });
});

/**
 * Test helper utilities shared by the forward-mode specs
 */

import { expect } from 'vitest';
import type { Dual } from '../src/forward/Dual.js';
import { deriv } from '../src/forward/Derive.js';
import type { DifferentiableFunction } from '../src/forward/Derive.js';

/**
 * Points spread over a few periods, avoiding poles of tan and log
 */
export const samplePoints = [-2.5, -1, -0.3, 0.25, 0.7, 1.3, 2, 3.1];

/**
 * Assert both components exactly (toBe uses Object.is)
 */
export function expectDual(d: Dual, value: number, derivative: number): void {
  expect(d.value).toBe(value);
  expect(d.deriv).toBe(derivative);
}

/**
 * Assert that deriv(f) matches a hand-derived closed form at every point
 *
 * @example
 * expectDerivative(x => x.mul(x), x => 2 * x, [1, 2, 3]);
 */
export function expectDerivative(
  f: DifferentiableFunction,
  expected: (x: number) => number,
  points: number[] = samplePoints,
  precision: number = 9
): void {
  const df = deriv(f);
  for (const x of points) {
    expect(df(x)).toBeCloseTo(expected(x), precision);
  }
}

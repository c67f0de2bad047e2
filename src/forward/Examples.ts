/**
 * Sample functions with known closed-form derivatives
 */

import { Dual, add, mul, sub } from './Dual.js';
import { cos, sin } from './Elementary.js';
import type { DifferentiableFunction } from './Derive.js';
import { UnknownExampleError } from './Errors.js';

export interface Example {
  name: string;
  formula: string;
  derivativeFormula: string;
  f: DifferentiableFunction;
  /** Closed-form derivative, for comparison */
  expected: (x: number) => number;
  points: readonly number[];
}

export const examples: readonly Example[] = [
  {
    name: 'f1',
    formula: 'x*x',
    derivativeFormula: '2*x',
    f: (x: Dual) => x.mul(x),
    expected: x => 2 * x,
    points: [3, 5]
  },
  {
    name: 'f2',
    formula: 'sin(x)',
    derivativeFormula: 'cos(x)',
    f: (x: Dual) => sin(x),
    expected: x => Math.cos(x),
    points: [Math.PI / 2, 0]
  },
  {
    name: 'f3',
    formula: '3*cos(x) - x',
    derivativeFormula: '-3*sin(x) - 1',
    f: (x: Dual) => sub(mul(3, cos(x)), x),
    expected: x => -3 * Math.sin(x) - 1,
    points: [Math.PI, 0]
  },
  {
    name: 'f4',
    formula: 'x*x + 2*x + 1',
    derivativeFormula: '2*x + 2',
    f: (x: Dual) => add(add(mul(x, x), mul(2, x)), 1),
    expected: x => 2 * x + 2,
    points: [1, 5]
  }
];

export function findExample(name: string): Example {
  const example = examples.find(e => e.name === name);
  if (!example) {
    throw new UnknownExampleError(name, examples.map(e => e.name));
  }
  return example;
}

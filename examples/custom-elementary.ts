/**
 * Example: adding an elementary function
 *
 * A new function only needs its value and its derivative; the arithmetic
 * and the driver pick it up unchanged.
 */

import { Dual, add, deriv, elementary, evaluate, mul, sin } from '../src/index.js';

// Logistic sigmoid: s(x) = 1 / (1 + e^-x), s'(x) = s(x) * (1 - s(x))
const sigmoidValue = (x: number) => 1 / (1 + Math.exp(-x));
const sigmoid = elementary(sigmoidValue, x => {
  const s = sigmoidValue(x);
  return s * (1 - s);
});

const f = (x: Dual) => add(sigmoid(mul(2, x)), sin(x));
const df = deriv(f);

console.log('f(x) = sigmoid(2x) + sin(x)\n');
for (const x of [-1, 0, 1]) {
  console.log(`f(${x})  = ${evaluate(f, x)}`);
  console.log(`f'(${x}) = ${df(x)}`);
}

/**
 * Forward-mode derivative driver.
 * Turns a function over duals into ordinary real-valued functions.
 */

import { Dual, lift, variable } from './Dual.js';

/**
 * A function of one dual argument, built from the operations in Dual.ts
 * and Elementary.ts. Branching on the primal value is not supported.
 */
export type DifferentiableFunction = (x: Dual) => Dual;

export interface ValueAndDeriv {
  value: number;
  deriv: number;
}

/**
 * Derivative of f as a real function: seeds (x, 1) and reads the tangent.
 * Exact up to floating-point rounding; no finite differences.
 */
export function deriv(f: DifferentiableFunction): (x: number) => number {
  return (x: number) => f(variable(x)).deriv;
}

/**
 * Plain value of f at x, evaluated with a zero seed
 */
export function evaluate(f: DifferentiableFunction, x: number): number {
  return f(lift(x)).value;
}

/**
 * Value and derivative from a single seeded evaluation
 */
export function valueAndDeriv(f: DifferentiableFunction): (x: number) => ValueAndDeriv {
  return (x: number) => {
    const result = f(variable(x));
    return { value: result.value, deriv: result.deriv };
  };
}

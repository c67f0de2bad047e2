/**
 * Elementary functions over dual numbers.
 *
 * Each one is a single chain-rule entry: g(u) carries g'(u) * u'.
 * Arithmetic in Dual.ts never needs to know about them.
 */

import { Dual, toDual } from './Dual.js';
import type { Operand } from './Dual.js';
import { UnknownFunctionError } from './Errors.js';

export type RealFunction = (x: number) => number;
export type DualFunction = (x: Operand) => Dual;

/**
 * Build the dual-number version of a unary function from the function
 * and its derivative.
 */
export function elementary(fn: RealFunction, derivative: RealFunction): DualFunction {
  return (operand: Operand): Dual => {
    const d = toDual(operand);
    return new Dual(fn(d.value), derivative(d.value) * d.deriv);
  };
}

/**
 * Registry of elementary functions by name
 */
export class ElementaryRegistry {
  private entries: Map<string, DualFunction> = new Map();

  /**
   * Register a function and its derivative; replaces any entry of the same name
   */
  register(name: string, fn: RealFunction, derivative: RealFunction): DualFunction {
    const apply = elementary(fn, derivative);
    this.entries.set(name, apply);
    return apply;
  }

  has(name: string): boolean {
    return this.entries.has(name);
  }

  get(name: string): DualFunction {
    const apply = this.entries.get(name);
    if (!apply) {
      throw new UnknownFunctionError(name, this.names());
    }
    return apply;
  }

  names(): string[] {
    return Array.from(this.entries.keys());
  }
}

// Global elementary registry instance
export const elementaries = new ElementaryRegistry();

export const sin = elementaries.register('sin', Math.sin, Math.cos);
export const cos = elementaries.register('cos', Math.cos, x => -Math.sin(x));
export const exp = elementaries.register('exp', Math.exp, Math.exp);
export const log = elementaries.register('log', Math.log, x => 1 / x);
export const sqrt = elementaries.register('sqrt', Math.sqrt, x => 0.5 / Math.sqrt(x));
export const tan = elementaries.register('tan', Math.tan, x => {
  const c = Math.cos(x);
  return 1 / (c * c);
});

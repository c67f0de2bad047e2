/**
 * Numerical derivative checking.
 * Validates forward-mode derivatives against central finite differences.
 */

import { deriv, evaluate } from './Derive.js';
import type { DifferentiableFunction } from './Derive.js';
import { InvalidOptionError } from './Errors.js';

/**
 * Derivative checking result
 */
export interface DerivativeCheckResult {
  passed: boolean;
  errors: DerivativeCheckError[];
  /** Points where NaN on either side leaves nothing to compare */
  skipped: number[];
  maxError: number;
  meanError: number;
  /** Points actually compared; skipped points are not counted */
  totalChecks: number;
}

export interface DerivativeCheckError {
  point: number;
  analytical: number;
  numerical: number;
  error: number;
  relativeError: number;
}

/**
 * Format derivative check results as a human-readable string
 */
export function formatDerivativeCheckResult(result: DerivativeCheckResult, funcName: string): string {
  const skipped = result.skipped.length > 0
    ? `, ${result.skipped.length} not comparable`
    : '';

  if (result.passed) {
    return `✓ ${funcName}: ${result.totalChecks} derivatives verified${skipped}`;
  }

  const lines: string[] = [
    `✗ ${funcName}: ${result.errors.length}/${result.totalChecks} derivatives FAILED${skipped}`
  ];

  for (const e of result.errors) {
    lines.push(`  x=${e.point}: analytical=${e.analytical.toFixed(6)}, numerical=${e.numerical.toFixed(6)}, error=${e.error.toExponential(2)}`);
  }

  return lines.join('\n');
}

export class DerivativeChecker {
  private epsilon: number;
  private tolerance: number;

  constructor(epsilon: number = 1e-5, tolerance: number = 1e-4) {
    if (!Number.isFinite(epsilon) || epsilon <= 0) {
      throw new InvalidOptionError('epsilon', epsilon);
    }
    if (!Number.isFinite(tolerance) || tolerance <= 0) {
      throw new InvalidOptionError('tolerance', tolerance);
    }
    this.epsilon = epsilon;
    this.tolerance = tolerance;
  }

  /**
   * Check the derivative of f at each point
   */
  check(f: DifferentiableFunction, points: readonly number[]): DerivativeCheckResult {
    const errors: DerivativeCheckError[] = [];
    const skipped: number[] = [];
    const df = deriv(f);

    for (const point of points) {
      const analytical = df(point);
      const numerical = this.numericalDerivative(f, point);

      if (!Number.isFinite(analytical) || !Number.isFinite(numerical)) {
        // Same infinity on both sides agrees; NaN on either side cannot be compared
        if (Object.is(analytical, numerical)) continue;
        if (Number.isNaN(analytical) || Number.isNaN(numerical)) {
          skipped.push(point);
          continue;
        }
        errors.push({
          point,
          analytical,
          numerical,
          error: Infinity,
          relativeError: Infinity
        });
        continue;
      }

      const error = Math.abs(analytical - numerical);
      const relativeError = error / (Math.abs(numerical) + 1e-10);

      if (error > this.tolerance && relativeError > this.tolerance) {
        errors.push({ point, analytical, numerical, error, relativeError });
      }
    }

    const maxError = errors.length > 0 ? Math.max(...errors.map(e => e.error)) : 0;
    const meanError = errors.length > 0
      ? errors.reduce((sum, e) => sum + e.error, 0) / errors.length
      : 0;

    return {
      passed: errors.length === 0,
      errors,
      skipped,
      maxError,
      meanError,
      totalChecks: points.length - skipped.length
    };
  }

  /**
   * Central difference: (f(x+h) - f(x-h)) / (2h)
   */
  private numericalDerivative(f: DifferentiableFunction, x: number): number {
    const fPlus = evaluate(f, x + this.epsilon);
    const fMinus = evaluate(f, x - this.epsilon);
    return (fPlus - fMinus) / (2 * this.epsilon);
  }
}

/**
 * Text and JSON rendering of example evaluations
 */

import { evaluate, deriv } from './Derive.js';
import type { Example } from './Examples.js';
import { elementaries } from './Elementary.js';
import { DerivativeChecker, formatDerivativeCheckResult } from './DerivativeChecker.js';
import type { DerivativeCheckResult } from './DerivativeChecker.js';

export interface PointResult {
  x: number;
  value: number;
  deriv: number;
  expected: number;
}

export interface ExampleReport {
  name: string;
  formula: string;
  points: PointResult[];
}

const SEPARATOR = '-'.repeat(20);

export function formatNumber(n: number): string {
  if (n === Math.PI) return 'π';
  if (n === -Math.PI) return '-π';
  if (n === Math.PI / 2) return 'π/2';
  if (n === -Math.PI / 2) return '-π/2';
  return String(n);
}

/**
 * Evaluate each example at its sample points, or at the given points
 */
export function buildReport(examples: readonly Example[], points?: readonly number[]): ExampleReport[] {
  return examples.map(example => {
    const df = deriv(example.f);
    return {
      name: example.name,
      formula: example.formula,
      points: (points ?? example.points).map(x => ({
        x,
        value: evaluate(example.f, x),
        deriv: df(x),
        expected: example.expected(x)
      }))
    };
  });
}

export function renderText(reports: ExampleReport[], showExpected: boolean = false): string {
  const lines: string[] = [];

  for (const report of reports) {
    lines.push(`${report.name}(x) = ${report.formula}`);
    for (const p of report.points) {
      const x = formatNumber(p.x);
      const expected = showExpected ? `  (expected ${p.expected})` : '';
      lines.push(`${report.name}(${x})  = ${p.value}`);
      lines.push(`${report.name}'(${x}) = ${p.deriv}${expected}`);
    }
    lines.push(SEPARATOR);
  }

  return lines.join('\n');
}

/**
 * JSON has no literal for Infinity or NaN; write them as strings
 */
function nonFiniteReplacer(_key: string, value: unknown): unknown {
  return typeof value === 'number' && !Number.isFinite(value) ? String(value) : value;
}

export function renderJson(reports: ExampleReport[]): string {
  return JSON.stringify(reports, nonFiniteReplacer, 2);
}

export function renderList(examples: readonly Example[]): string {
  const lines: string[] = ['Examples:'];
  for (const e of examples) {
    lines.push(`  ${e.name}(x) = ${e.formula}    ${e.name}'(x) = ${e.derivativeFormula}`);
  }
  lines.push('');
  lines.push(`Elementary functions: ${elementaries.names().join(', ')}`);
  return lines.join('\n');
}

export interface CheckSummary {
  passed: boolean;
  results: Array<{ name: string; result: DerivativeCheckResult }>;
}

/**
 * Run the derivative checker over every example
 */
export function checkExamples(
  examples: readonly Example[],
  checker: DerivativeChecker,
  points?: readonly number[]
): CheckSummary {
  const results = examples.map(example => ({
    name: example.name,
    result: checker.check(example.f, points ?? example.points)
  }));
  return {
    passed: results.every(r => r.result.passed),
    results
  };
}

export function renderCheckText(summary: CheckSummary): string {
  return summary.results
    .map(r => formatDerivativeCheckResult(r.result, r.name))
    .join('\n');
}

export function renderCheckJson(summary: CheckSummary): string {
  return JSON.stringify(summary, nonFiniteReplacer, 2);
}

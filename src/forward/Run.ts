/**
 * Command execution, kept apart from process I/O so it can be tested
 */

import { examples, findExample } from './Examples.js';
import type { Example } from './Examples.js';
import { parseArgs } from './Options.js';
import type { CliOptions } from './Options.js';
import {
  buildReport,
  checkExamples,
  renderCheckJson,
  renderCheckText,
  renderJson,
  renderList,
  renderText
} from './Report.js';
import { DerivativeChecker } from './DerivativeChecker.js';
import { UsageError, formatError } from './Errors.js';

export const USAGE = `
forward-dual - Forward-mode automatic differentiation with dual numbers

Usage:
  forward-dual [example...] [options]

Options:
  --at <x,...>          Evaluate at these points (accepts pi, pi/2)
  --expected            Show the closed-form derivative next to each result
  --check               Verify derivatives against finite differences
  --epsilon <value>     Finite-difference step for --check (default: 1e-5)
  --tolerance <value>   Error tolerance for --check (default: 1e-4)
  --format <format>     Output format: text (default), json
  --list                List examples and elementary functions
  --verbose             Show stack traces on errors
  --help, -h            Show this help message

Examples:
  forward-dual
  forward-dual f3 --at 0,pi --expected
  forward-dual --check --format json
`.trim();

export interface RunResult {
  exitCode: number;
  stdout: string;
  stderr: string;
}

/**
 * Execute parsed options; --check exits 1 when any derivative fails
 */
export function run(options: CliOptions): RunResult {
  if (options.list) {
    return { exitCode: 0, stdout: renderList(examples), stderr: '' };
  }

  const selected: readonly Example[] = options.examples.length > 0
    ? options.examples.map(findExample)
    : examples;

  if (options.check) {
    const checker = new DerivativeChecker(options.epsilon, options.tolerance);
    const summary = checkExamples(selected, checker, options.points);
    return {
      exitCode: summary.passed ? 0 : 1,
      stdout: options.format === 'json' ? renderCheckJson(summary) : renderCheckText(summary),
      stderr: ''
    };
  }

  const reports = buildReport(selected, options.points);
  return {
    exitCode: 0,
    stdout: options.format === 'json'
      ? renderJson(reports)
      : renderText(reports, options.showExpected),
    stderr: ''
  };
}

/**
 * Parse and execute command-line arguments.
 * Usage is printed on --help and after argument errors.
 */
export function runArgs(args: string[]): RunResult {
  const verbose = args.includes('--verbose');

  let options: CliOptions;
  try {
    options = parseArgs(args);
  } catch (err) {
    const usage = err instanceof UsageError ? `\n\n${USAGE}` : '';
    return { exitCode: 1, stdout: '', stderr: formatError(err, verbose) + usage };
  }

  if (options.help) {
    return { exitCode: 0, stdout: USAGE, stderr: '' };
  }

  try {
    return run(options);
  } catch (err) {
    return { exitCode: 1, stdout: '', stderr: formatError(err, options.verbose) };
  }
}

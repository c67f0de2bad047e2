/**
 * Command-line options and their parser
 */

import { UsageError } from './Errors.js';

export type OutputFormat = 'text' | 'json';

export interface CliOptions {
  /** Example names to run; empty runs them all */
  examples: string[];
  /** Evaluation points overriding each example's sample points */
  points?: readonly number[];
  showExpected: boolean;
  check: boolean;
  epsilon: number;
  tolerance: number;
  format: OutputFormat;
  list: boolean;
  help: boolean;
  verbose: boolean;
}

export const DEFAULT_OPTIONS: CliOptions = {
  examples: [],
  showExpected: false,
  check: false,
  epsilon: 1e-5,
  tolerance: 1e-4,
  format: 'text',
  list: false,
  help: false,
  verbose: false
};

/**
 * Parse a point list such as "0,1.5,pi/2"
 */
export function parsePoints(text: string): number[] {
  const parts = text.split(',').map(p => p.trim());
  if (parts.some(p => p === '')) {
    throw new UsageError('Empty value in point list', text);
  }
  return parts.map(part => {
    const value = parsePoint(part);
    if (Number.isNaN(value)) {
      throw new UsageError(`Invalid point "${part}"`, text);
    }
    return value;
  });
}

function parsePoint(text: string): number {
  const lower = text.toLowerCase();
  const sign = lower.startsWith('-') ? -1 : 1;
  const unsigned = sign < 0 ? lower.slice(1) : lower;
  if (unsigned === 'pi') return sign * Math.PI;
  if (unsigned === 'pi/2') return sign * (Math.PI / 2);
  return Number(text);
}

function parsePositive(option: string, text: string | undefined): number {
  if (text === undefined) {
    throw new UsageError(`Missing value for ${option}`);
  }
  const value = Number(text);
  if (!Number.isFinite(value) || value <= 0) {
    throw new UsageError(`Invalid ${option} value "${text}". Must be a positive number.`);
  }
  return value;
}

export function parseArgs(args: string[]): CliOptions {
  const options: CliOptions = { ...DEFAULT_OPTIONS, examples: [] };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    if (arg === '--help' || arg === '-h') {
      options.help = true;
    } else if (arg === '--at') {
      const value: string | undefined = args[++i];
      if (value === undefined) {
        throw new UsageError('Missing value for --at');
      }
      options.points = parsePoints(value);
    } else if (arg === '--expected') {
      options.showExpected = true;
    } else if (arg === '--check') {
      options.check = true;
    } else if (arg === '--epsilon') {
      options.epsilon = parsePositive('--epsilon', args[++i]);
    } else if (arg === '--tolerance') {
      options.tolerance = parsePositive('--tolerance', args[++i]);
    } else if (arg === '--format') {
      const format: string | undefined = args[++i];
      if (format === undefined) {
        throw new UsageError('Missing value for --format');
      }
      if (format !== 'text' && format !== 'json') {
        throw new UsageError(`Invalid format "${format}". Must be: text or json`);
      }
      options.format = format;
    } else if (arg === '--list') {
      options.list = true;
    } else if (arg === '--verbose') {
      options.verbose = true;
    } else if (arg.startsWith('-')) {
      throw new UsageError(`Unknown option "${arg}"`);
    } else {
      options.examples.push(arg);
    }
  }

  return options;
}

export class UsageError extends Error {
  constructor(
    message: string,
    public argument?: string
  ) {
    const argInfo = argument ? ` (argument: ${argument})` : '';
    super(`${message}${argInfo}`);
    this.name = 'UsageError';
  }
}

export class InvalidOptionError extends Error {
  constructor(
    public option: string,
    public value: number
  ) {
    super(`Invalid ${option}: ${value}. Must be a positive finite number.`);
    this.name = 'InvalidOptionError';
  }
}

export class UnknownExampleError extends Error {
  constructor(
    public exampleName: string,
    public available: string[]
  ) {
    super(`Unknown example "${exampleName}". Available: ${available.join(', ')}`);
    this.name = 'UnknownExampleError';
  }
}

export class UnknownFunctionError extends Error {
  constructor(
    public functionName: string,
    public available: string[]
  ) {
    super(`Unknown elementary function "${functionName}". Available: ${available.join(', ')}`);
    this.name = 'UnknownFunctionError';
  }
}

/**
 * Format any thrown value for the command line.
 * The stack trace is only included in verbose mode.
 */
export function formatError(err: unknown, verbose: boolean = false): string {
  if (!(err instanceof Error)) {
    return `Error: ${String(err)}`;
  }

  let output = `Error: ${err.message}`;
  if (verbose && err.stack) {
    output += '\n\nStack trace:\n' + err.stack;
  }
  return output;
}

/**
 * Custom error classes
 */

/**
 * Sentinel exit value used when a process never produced one
 */
export const INVALID_EXIT_VALUE = 0xdeadbeef;

export class ProcwardError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'ProcwardError';
  }
}

export class ConfigurationError extends ProcwardError {
  constructor(
    message: string,
    public readonly issues: string[] = []
  ) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

/**
 * Raised before any process is created (e.g. missing working directory)
 */
export class SetupError extends ProcwardError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'SetupError';
  }
}

export class LaunchError extends ProcwardError {
  constructor(
    message: string,
    public readonly command?: string,
    options?: ErrorOptions
  ) {
    super(message, options);
    this.name = 'LaunchError';
  }
}

export class StreamError extends ProcwardError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'StreamError';
  }
}

export class WatchdogError extends ProcwardError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'WatchdogError';
  }
}

/**
 * Execution failure carrying the exit value of the process
 */
export class ExecuteError extends ProcwardError {
  constructor(
    message: string,
    public readonly exitValue: number = INVALID_EXIT_VALUE,
    options?: ErrorOptions
  ) {
    super(message, options);
    this.name = 'ExecuteError';
  }
}

export function isProcwardError(error: unknown): error is ProcwardError {
  return error instanceof ProcwardError;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

import type { ILogger } from './ILogger.js';
import { noopLogger } from './ILogger.js';
import { errorMessage } from './errors.js';

/**
 * Keeps the first error offered to it. Later errors are logged and dropped
 * so they cannot mask the original failure.
 */
export class FirstErrorSlot {
  private error: Error | null = null;

  constructor(private readonly logger: ILogger = noopLogger) {}

  offer(error: Error): boolean {
    if (this.error === null) {
      this.error = error;
      return true;
    }
    this.logger.warn('Dropping secondary cleanup error', {
      error: errorMessage(error),
      first: this.error.message,
    });
    return false;
  }

  get(): Error | null {
    return this.error;
  }

  isEmpty(): boolean {
    return this.error === null;
  }
}

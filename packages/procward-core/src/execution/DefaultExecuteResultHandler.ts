/**
 * Result handler that records the outcome of an asynchronous execution
 */

import type { IExecuteResultHandler } from './IExecutor.js';
import { ConfigurationError, INVALID_EXIT_VALUE } from '../shared/utils/errors.js';
import type { ExecuteError } from '../shared/utils/errors.js';
import { OneShotLatch } from '../shared/utils/OneShotLatch.js';

export class DefaultExecuteResultHandler implements IExecuteResultHandler {
  private exitValue = INVALID_EXIT_VALUE;
  private error: ExecuteError | null = null;
  private readonly done = new OneShotLatch();

  onProcessComplete(exitValue: number): void {
    this.exitValue = exitValue;
    this.error = null;
    this.done.signal();
  }

  onProcessFailed(error: ExecuteError): void {
    this.exitValue = error.exitValue;
    this.error = error;
    this.done.signal();
  }

  hasResult(): boolean {
    return this.done.isSignalled();
  }

  getExitValue(): number {
    if (!this.hasResult()) {
      throw new ConfigurationError('The process has not exited yet therefore no result is available');
    }
    return this.exitValue;
  }

  getError(): ExecuteError | null {
    if (!this.hasResult()) {
      throw new ConfigurationError('The process has not exited yet therefore no result is available');
    }
    return this.error;
  }

  /**
   * Resolve once a result exists, or after `timeoutMs` (whichever comes first)
   */
  async waitFor(timeoutMs?: number): Promise<void> {
    if (timeoutMs === undefined) {
      return this.done.wait();
    }

    let timer: NodeJS.Timeout | undefined;
    const elapsed = new Promise<void>((resolve) => {
      timer = setTimeout(resolve, timeoutMs);
    });

    try {
      await Promise.race([this.done.wait(), elapsed]);
    } finally {
      clearTimeout(timer);
    }
  }
}

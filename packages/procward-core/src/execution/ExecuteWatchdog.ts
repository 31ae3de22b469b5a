/**
 * ExecuteWatchdog - destroys a process that runs longer than a timeout
 */

import type { ProcessHandle } from '../shared/platform/IProcessLauncher.js';
import type { IWatchdog } from '../shared/platform/IWatchdog.js';
import type { ILogger } from '../shared/utils/ILogger.js';
import { noopLogger } from '../shared/utils/ILogger.js';
import { OneShotLatch } from '../shared/utils/OneShotLatch.js';
import { ConfigurationError, WatchdogError, errorMessage } from '../shared/utils/errors.js';

export class ExecuteWatchdog implements IWatchdog {
  /**
   * Never time out; the process can still be killed via destroyProcess()
   */
  static readonly INFINITE_TIMEOUT = -1;

  private process: ProcessHandle | null = null;
  private timer: NodeJS.Timeout | null = null;
  private watching = false;
  private killed = false;
  private caught: WatchdogError | null = null;
  private started = new OneShotLatch();

  constructor(
    private readonly timeoutMs: number,
    private readonly logger: ILogger = noopLogger
  ) {
    const infinite = timeoutMs === ExecuteWatchdog.INFINITE_TIMEOUT;
    if (!infinite && (!Number.isInteger(timeoutMs) || timeoutMs <= 0)) {
      throw new ConfigurationError(`Watchdog timeout must be a positive integer: ${timeoutMs}`);
    }
  }

  getTimeout(): number {
    return this.timeoutMs;
  }

  setProcessNotStarted(): void {
    if (this.started.isSignalled()) {
      this.started = new OneShotLatch();
    }
  }

  start(process: ProcessHandle): void {
    this.clearTimer();
    this.process = process;
    this.watching = true;
    this.killed = false;
    this.caught = null;
    this.started.signal();

    if (this.timeoutMs !== ExecuteWatchdog.INFINITE_TIMEOUT) {
      this.timer = setTimeout(() => this.timeoutOccurred(), this.timeoutMs);
      this.timer.unref();
    }
  }

  stop(): void {
    this.cleanUp();
  }

  checkException(): void {
    if (this.caught) {
      throw this.caught;
    }
  }

  /**
   * Kill the watched process now. Waits until a process has been started.
   */
  async destroyProcess(): Promise<void> {
    await this.started.wait();
    this.timeoutOccurred();
  }

  isWatching(): boolean {
    return this.watching;
  }

  /**
   * Whether the last watched process was killed by this watchdog
   */
  killedProcess(): boolean {
    return this.killed;
  }

  hasProcessStarted(): boolean {
    return this.started.isSignalled();
  }

  private timeoutOccurred(): void {
    this.clearTimer();
    const process = this.process;

    try {
      if (this.watching && process !== null && process.isAlive()) {
        this.logger.warn('Watchdog destroying process', {
          pid: process.pid,
          timeoutMs: this.timeoutMs,
        });
        process.destroy();
        this.killed = true;
      }
    } catch (error) {
      this.caught = new WatchdogError(
        `Watchdog failed to destroy process: ${errorMessage(error)}`,
        { cause: error }
      );
    } finally {
      this.cleanUp();
    }
  }

  private cleanUp(): void {
    this.clearTimer();
    this.watching = false;
    this.process = null;
  }

  private clearTimer(): void {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
  }
}

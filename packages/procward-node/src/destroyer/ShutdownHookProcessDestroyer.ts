/**
 * ShutdownHookProcessDestroyer - kills registered children when this process exits
 *
 * The hook is installed when the first process is added and removed with the
 * last one, so an idle destroyer leaves the host's signal handling untouched.
 */

import { errorMessage, noopLogger } from '@procward/core';
import type { ILogger, IProcessDestroyer, ProcessHandle } from '@procward/core';

const SHUTDOWN_SIGNALS: readonly NodeJS.Signals[] = ['SIGINT', 'SIGTERM', 'SIGHUP'];

export class ShutdownHookProcessDestroyer implements IProcessDestroyer {
  private readonly processes = new Set<ProcessHandle>();
  private hookInstalled = false;
  private running = false;

  private readonly onExit = (): void => {
    this.run();
  };

  private readonly onSignal = (signal: NodeJS.Signals): void => {
    this.logger.debug('Shutdown signal received', { signal, processes: this.processes.size });
    this.run();
    this.removeShutdownHook();

    // Re-raise so the default behaviour (terminate) still applies
    if (process.listenerCount(signal) === 0) {
      process.kill(process.pid, signal);
    }
  };

  constructor(private readonly logger: ILogger = noopLogger) {}

  add(handle: ProcessHandle): boolean {
    if (this.processes.has(handle)) {
      return false;
    }
    if (this.processes.size === 0) {
      this.addShutdownHook();
    }
    this.processes.add(handle);
    return true;
  }

  remove(handle: ProcessHandle): boolean {
    const removed = this.processes.delete(handle);
    if (removed && this.processes.size === 0) {
      this.removeShutdownHook();
    }
    return removed;
  }

  size(): number {
    return this.processes.size;
  }

  isAddedAsShutdownHook(): boolean {
    return this.hookInstalled;
  }

  /**
   * Destroy every registered process. One failure doesn't stop the others.
   */
  run(): void {
    if (this.running) {
      return;
    }
    this.running = true;
    try {
      for (const handle of this.processes) {
        try {
          handle.destroy();
        } catch (error) {
          this.logger.warn('Failed to destroy process on shutdown', {
            pid: handle.pid,
            error: errorMessage(error),
          });
        }
      }
    } finally {
      this.running = false;
    }
  }

  private addShutdownHook(): void {
    if (this.hookInstalled) {
      return;
    }
    process.on('exit', this.onExit);
    for (const signal of SHUTDOWN_SIGNALS) {
      process.on(signal, this.onSignal);
    }
    this.hookInstalled = true;
  }

  private removeShutdownHook(): void {
    if (!this.hookInstalled) {
      return;
    }
    process.removeListener('exit', this.onExit);
    for (const signal of SHUTDOWN_SIGNALS) {
      process.removeListener(signal, this.onSignal);
    }
    this.hookInstalled = false;
  }
}

let defaultDestroyer: ShutdownHookProcessDestroyer | null = null;

/**
 * Process-wide destroyer. Inject it into executors rather than reaching for it
 * implicitly, so tests can substitute their own.
 */
export function getDefaultProcessDestroyer(logger?: ILogger): ShutdownHookProcessDestroyer {
  if (!defaultDestroyer) {
    defaultDestroyer = new ShutdownHookProcessDestroyer(logger);
  }
  return defaultDestroyer;
}

import type { ProcessHandle } from './IProcessLauncher.js';

/**
 * Observes one process at a time and kills it after a timeout
 */
export interface IWatchdog {
  /**
   * Reset the "started" state before an asynchronous launch
   */
  setProcessNotStarted(): void;

  /**
   * Start the timeout clock for a process
   */
  start(process: ProcessHandle): void;

  /**
   * Stop watching. Safe to call after the watchdog fired.
   */
  stop(): void;

  /**
   * Throws when the watchdog's own kill path failed
   */
  checkException(): void;
}

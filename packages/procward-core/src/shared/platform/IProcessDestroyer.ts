import type { ProcessHandle } from './IProcessLauncher.js';

/**
 * Registry of in-flight processes destroyed when the supervising program
 * shuts down abnormally. Set-like, no ordering guarantee.
 */
export interface IProcessDestroyer {
  /**
   * Returns false when the process was already registered
   */
  add(process: ProcessHandle): boolean;

  /**
   * Returns false when the process was not registered
   */
  remove(process: ProcessHandle): boolean;

  size(): number;
}

/**
 * Executor interface - launches and supervises a single external process
 */

import type { CommandLine } from '../command/CommandLine.js';
import type { Environment } from '../shared/platform/IProcessLauncher.js';
import type { IStreamHandler } from '../shared/platform/IStreamHandler.js';
import type { IWatchdog } from '../shared/platform/IWatchdog.js';
import type { IProcessDestroyer } from '../shared/platform/IProcessDestroyer.js';
import type { ExecuteError } from '../shared/utils/errors.js';

/**
 * Execution options
 */
export interface ExecuteOptions {
  /**
   * Environment variables (null/absent inherits the caller's environment)
   */
  environment?: Environment | null;

  /**
   * Aborting while the process runs destroys it; evaluation then proceeds
   * with whatever exit value the kill produced
   */
  signal?: AbortSignal;
}

/**
 * Receives the outcome of an asynchronous execution. Exactly one method is
 * called, once, from the executor's worker task.
 */
export interface IExecuteResultHandler {
  onProcessComplete(exitValue: number): void;
  onProcessFailed(error: ExecuteError): void;
}

/**
 * Executor interface
 */
export interface IExecutor {
  getStreamHandler(): IStreamHandler;
  setStreamHandler(streamHandler: IStreamHandler): void;

  getWatchdog(): IWatchdog | null;
  setWatchdog(watchdog: IWatchdog | null): void;

  getProcessDestroyer(): IProcessDestroyer | null;
  setProcessDestroyer(processDestroyer: IProcessDestroyer | null): void;

  getWorkingDirectory(): string;
  setWorkingDirectory(dir: string): void;

  /**
   * Treat a single exit value as success
   */
  setExitValue(value: number): void;

  /**
   * Exit values considered successful. An empty list defers to the
   * launcher's convention; null disables failure detection.
   */
  setExitValues(values: readonly number[] | null): void;

  getExitValues(): number[] | null;

  isFailure(exitValue: number): boolean;

  /**
   * Run a command and resolve with its exit value
   */
  execute(command: CommandLine, options?: ExecuteOptions): Promise<number>;

  /**
   * Start a command; resolves once the process was launched (or failed to).
   * The outcome is reported to the handler.
   */
  executeAsync(
    command: CommandLine,
    handler: IExecuteResultHandler,
    options?: ExecuteOptions
  ): Promise<void>;
}

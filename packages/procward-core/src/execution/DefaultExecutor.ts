/**
 * Default executor - launches one process per call and supervises it
 *
 * Orchestration per call:
 * 1. Validate the working directory (nothing is touched when it is missing)
 * 2. Launch the process and wire its stdin/stdout/stderr to the stream handler
 * 3. Register with the process destroyer, then arm the watchdog
 * 4. Wait for termination (an aborted signal destroys the process)
 * 5. Stop the watchdog and the stream handler, close all three process streams
 * 6. Evaluate: stream error > watchdog fault > exit value policy
 * 7. Unregister from the process destroyer on every path
 */

import type { CommandLine } from '../command/CommandLine.js';
import type { IFileSystem } from '../shared/platform/IFileSystem.js';
import type {
  Environment,
  IProcessLauncher,
  ProcessHandle,
} from '../shared/platform/IProcessLauncher.js';
import type { IProcessDestroyer } from '../shared/platform/IProcessDestroyer.js';
import type { IStreamHandler } from '../shared/platform/IStreamHandler.js';
import type { IWatchdog } from '../shared/platform/IWatchdog.js';
import type { ILogger } from '../shared/utils/ILogger.js';
import { noopLogger } from '../shared/utils/ILogger.js';
import { FirstErrorSlot } from '../shared/utils/FirstErrorSlot.js';
import { OneShotLatch } from '../shared/utils/OneShotLatch.js';
import {
  ExecuteError,
  INVALID_EXIT_VALUE,
  LaunchError,
  ProcwardError,
  SetupError,
  StreamError,
  WatchdogError,
  errorMessage,
  isProcwardError,
} from '../shared/utils/errors.js';
import type { ExecuteOptions, IExecuteResultHandler, IExecutor } from './IExecutor.js';

/**
 * Default executor dependencies
 */
export interface DefaultExecutorDependencies {
  /**
   * Creates native processes
   */
  launcher: IProcessLauncher;

  /**
   * Used to validate the working directory
   */
  fs: IFileSystem;

  /**
   * Pumps the process streams
   */
  streamHandler: IStreamHandler;

  logger?: ILogger;
}

/**
 * Collaborators captured when a call starts, so setters used while a
 * process runs only affect later calls
 */
interface ExecutionContext {
  workingDirectory: string;
  streamHandler: IStreamHandler;
  watchdog: IWatchdog | null;
  processDestroyer: IProcessDestroyer | null;
}

type ExecutionOutcome =
  | { kind: 'complete'; exitValue: number }
  | { kind: 'failed'; error: ExecuteError };

export class DefaultExecutor implements IExecutor {
  private readonly launcher: IProcessLauncher;
  private readonly fs: IFileSystem;
  private readonly logger: ILogger;

  private streamHandler: IStreamHandler;
  private watchdog: IWatchdog | null = null;
  private processDestroyer: IProcessDestroyer | null = null;
  private workingDirectory = '.';
  private exitValues: number[] | null = [];
  private executorTask: Promise<void> | null = null;

  constructor(deps: DefaultExecutorDependencies) {
    this.launcher = deps.launcher;
    this.fs = deps.fs;
    this.streamHandler = deps.streamHandler;
    this.logger = deps.logger ?? noopLogger;
  }

  getStreamHandler(): IStreamHandler {
    return this.streamHandler;
  }

  setStreamHandler(streamHandler: IStreamHandler): void {
    this.streamHandler = streamHandler;
  }

  getWatchdog(): IWatchdog | null {
    return this.watchdog;
  }

  setWatchdog(watchdog: IWatchdog | null): void {
    this.watchdog = watchdog;
  }

  getProcessDestroyer(): IProcessDestroyer | null {
    return this.processDestroyer;
  }

  setProcessDestroyer(processDestroyer: IProcessDestroyer | null): void {
    this.processDestroyer = processDestroyer;
  }

  getWorkingDirectory(): string {
    return this.workingDirectory;
  }

  setWorkingDirectory(dir: string): void {
    this.workingDirectory = dir;
  }

  setExitValue(value: number): void {
    this.setExitValues([value]);
  }

  setExitValues(values: readonly number[] | null): void {
    this.exitValues = values === null ? null : [...values];
  }

  getExitValues(): number[] | null {
    return this.exitValues === null ? null : [...this.exitValues];
  }

  isFailure(exitValue: number): boolean {
    if (this.exitValues === null) {
      return false;
    }
    if (this.exitValues.length === 0) {
      return this.launcher.isFailure(exitValue);
    }
    return !this.exitValues.includes(exitValue);
  }

  async execute(command: CommandLine, options: ExecuteOptions = {}): Promise<number> {
    const context = this.captureContext();
    await this.assertWorkingDirectory(context.workingDirectory);
    return this.executeInternal(command, null, options, context);
  }

  async executeAsync(
    command: CommandLine,
    handler: IExecuteResultHandler,
    options: ExecuteOptions = {}
  ): Promise<void> {
    const context = this.captureContext();
    await this.assertWorkingDirectory(context.workingDirectory);

    context.watchdog?.setProcessNotStarted();

    const started = new OneShotLatch();
    this.executorTask = this.runWorker(command, started, handler, options, context);

    // Resolve once the worker attempted the launch, not when the process ends
    await started.wait();
  }

  /**
   * Worker task of the last asynchronous call. Never rejects.
   */
  protected getExecutorTask(): Promise<void> | null {
    return this.executorTask;
  }

  /**
   * Creates a process, re-checking the working directory first
   */
  protected async launch(
    command: CommandLine,
    environment: Environment | null,
    dir: string
  ): Promise<ProcessHandle> {
    if (!(await this.fs.exists(dir))) {
      throw new LaunchError(`${dir} doesn't exist.`, command.toString());
    }

    try {
      return await this.launcher.launch(command, environment, dir);
    } catch (error) {
      if (isProcwardError(error)) {
        throw error;
      }
      throw new LaunchError(
        `Failed to launch ${command.getExecutable()}: ${errorMessage(error)}`,
        command.toString(),
        { cause: error }
      );
    }
  }

  private captureContext(): ExecutionContext {
    return {
      workingDirectory: this.workingDirectory,
      streamHandler: this.streamHandler,
      watchdog: this.watchdog,
      processDestroyer: this.processDestroyer,
    };
  }

  private async assertWorkingDirectory(dir: string): Promise<void> {
    if (!(await this.fs.exists(dir))) {
      throw new SetupError(`${dir} doesn't exist.`);
    }
  }

  private async runWorker(
    command: CommandLine,
    started: OneShotLatch,
    handler: IExecuteResultHandler,
    options: ExecuteOptions,
    context: ExecutionContext
  ): Promise<void> {
    let outcome: ExecutionOutcome;
    try {
      const exitValue = await this.executeInternal(command, started, options, context);
      outcome = { kind: 'complete', exitValue };
    } catch (error) {
      outcome = {
        kind: 'failed',
        error:
          error instanceof ExecuteError
            ? error
            : new ExecuteError('Execution failed', INVALID_EXIT_VALUE, { cause: error }),
      };
    }

    // Report on a later macrotask so the caller's continuation always runs first
    await new Promise<void>((resolve) => setImmediate(resolve));

    try {
      if (outcome.kind === 'complete') {
        handler.onProcessComplete(outcome.exitValue);
      } else {
        handler.onProcessFailed(outcome.error);
      }
    } catch (error) {
      this.logger.error('Execute result handler threw', {
        outcome: outcome.kind,
        error: errorMessage(error),
      });
    }
  }

  private async executeInternal(
    command: CommandLine,
    started: OneShotLatch | null,
    options: ExecuteOptions,
    context: ExecutionContext
  ): Promise<number> {
    const errors = new FirstErrorSlot(this.logger);

    let process: ProcessHandle;
    try {
      process = await this.launch(
        command,
        options.environment ?? null,
        context.workingDirectory
      );
    } finally {
      started?.signal();
    }

    this.logger.debug('Process launched', { command: command.toString(), pid: process.pid });

    const { streamHandler, watchdog, processDestroyer } = context;

    try {
      streamHandler.setProcessInputStream(process.stdin);
      streamHandler.setProcessOutputStream(process.stdout);
      streamHandler.setProcessErrorStream(process.stderr);
      streamHandler.start();
    } catch (error) {
      process.destroy();
      throw toStreamError(error, 'Failed to connect process streams');
    }

    try {
      processDestroyer?.add(process);
      watchdog?.start(process);

      let exitValue = INVALID_EXIT_VALUE;
      try {
        exitValue = await this.waitFor(process, options.signal);
      } catch (error) {
        process.destroy();
        errors.offer(toProcwardError(error, 'Failed waiting for process'));
      }

      this.logger.debug('Process terminated', { pid: process.pid, exitValue });

      watchdog?.stop();

      try {
        await streamHandler.stop();
      } catch (error) {
        errors.offer(toStreamError(error, 'Failed to stop stream handler'));
      }

      this.closeProcessStreams(process, errors);

      const caught = errors.get();
      if (caught) {
        throw caught;
      }

      if (watchdog) {
        try {
          watchdog.checkException();
        } catch (error) {
          throw isProcwardError(error)
            ? error
            : new WatchdogError(errorMessage(error), { cause: error });
        }
      }

      if (this.isFailure(exitValue)) {
        throw new ExecuteError(`Process exited with an error: ${exitValue}`, exitValue);
      }

      return exitValue;
    } finally {
      processDestroyer?.remove(process);
    }
  }

  private async waitFor(process: ProcessHandle, signal?: AbortSignal): Promise<number> {
    if (!signal) {
      return process.waitFor();
    }

    const onAbort = (): void => {
      this.logger.debug('Execution aborted, destroying process', { pid: process.pid });
      process.destroy();
    };

    if (signal.aborted) {
      onAbort();
    } else {
      signal.addEventListener('abort', onAbort, { once: true });
    }

    try {
      return await process.waitFor();
    } finally {
      signal.removeEventListener('abort', onAbort);
    }
  }

  /**
   * Close all three streams; a failure never prevents the remaining closes
   */
  private closeProcessStreams(process: ProcessHandle, errors: FirstErrorSlot): void {
    const streams = [
      ['stdout', process.stdout],
      ['stdin', process.stdin],
      ['stderr', process.stderr],
    ] as const;

    for (const [name, stream] of streams) {
      try {
        stream.destroy();
      } catch (error) {
        errors.offer(toStreamError(error, `Failed to close process ${name}`));
      }
    }
  }
}

function toStreamError(error: unknown, message: string): ProcwardError {
  if (isProcwardError(error)) {
    return error;
  }
  return new StreamError(`${message}: ${errorMessage(error)}`, { cause: error });
}

function toProcwardError(error: unknown, message: string): ProcwardError {
  if (isProcwardError(error)) {
    return error;
  }
  return new ProcwardError(`${message}: ${errorMessage(error)}`, { cause: error });
}

/**
 * Executor factory - wires a DefaultExecutor from a parsed configuration
 */

import { DefaultExecutor, ExecuteWatchdog } from '@procward/core';
import type {
  ExecutorConfig,
  IFileSystem,
  ILogger,
  IProcessDestroyer,
  IProcessLauncher,
  IStreamHandler,
  IWatchdog,
} from '@procward/core';
import { ExecaProcessLauncher } from '../platform/ExecaProcessLauncher.js';
import { FileSystemAdapter } from '../platform/FileSystemAdapter.js';
import { PumpStreamHandler } from '../streams/PumpStreamHandler.js';
import { getDefaultProcessDestroyer } from '../destroyer/ShutdownHookProcessDestroyer.js';
import { Logger } from '../shared/utils/logger.js';

/**
 * Executor factory dependencies. Anything left out is built from the config.
 */
export interface ExecutorFactoryDependencies {
  launcher?: IProcessLauncher;
  fs?: IFileSystem;
  streamHandler?: IStreamHandler;

  /**
   * null disables the watchdog even when the config sets a timeout
   */
  watchdog?: IWatchdog | null;

  /**
   * null disables shutdown cleanup even when the config enables it
   */
  processDestroyer?: IProcessDestroyer | null;

  logger?: ILogger;
}

export class ExecutorFactory {
  constructor(private deps: ExecutorFactoryDependencies = {}) {}

  create(config: ExecutorConfig): DefaultExecutor {
    const logger = this.deps.logger ?? new Logger(config.logging);

    const executor = new DefaultExecutor({
      launcher: this.deps.launcher ?? new ExecaProcessLauncher(logger),
      fs: this.deps.fs ?? new FileSystemAdapter(),
      streamHandler:
        this.deps.streamHandler ??
        new PumpStreamHandler(process.stdout, process.stderr, null, {
          stopTimeoutMs: config.streams.stopTimeoutMs,
          logger,
        }),
      logger,
    });

    executor.setWorkingDirectory(config.workingDirectory);
    executor.setExitValues(config.exitValues);
    executor.setWatchdog(this.resolveWatchdog(config, logger));
    executor.setProcessDestroyer(this.resolveProcessDestroyer(config, logger));

    logger.debug('Executor created', {
      workingDirectory: config.workingDirectory,
      timeoutMs: config.watchdog?.timeoutMs,
      destroyOnShutdown: config.destroyOnShutdown,
    });

    return executor;
  }

  private resolveWatchdog(config: ExecutorConfig, logger: ILogger): IWatchdog | null {
    if (this.deps.watchdog !== undefined) {
      return this.deps.watchdog;
    }
    return config.watchdog ? new ExecuteWatchdog(config.watchdog.timeoutMs, logger) : null;
  }

  private resolveProcessDestroyer(
    config: ExecutorConfig,
    logger: ILogger
  ): IProcessDestroyer | null {
    if (this.deps.processDestroyer !== undefined) {
      return this.deps.processDestroyer;
    }
    return config.destroyOnShutdown ? getDefaultProcessDestroyer(logger) : null;
  }
}

/**
 * Convenience function to create executor
 */
export function createExecutor(
  config: ExecutorConfig,
  deps: ExecutorFactoryDependencies = {}
): DefaultExecutor {
  return new ExecutorFactory(deps).create(config);
}

/**
 * ExecutorFactory tests
 */

import { describe, it, expect, vi } from 'vitest';
import { DefaultExecutor, ExecuteWatchdog, ExecutorConfigSchema } from '@procward/core';
import type { ExecutorConfigInput, IStreamHandler, IWatchdog } from '@procward/core';
import { ExecutorFactory, createExecutor } from '../../../src/execution/ExecutorFactory.js';
import { PumpStreamHandler } from '../../../src/streams/PumpStreamHandler.js';
import {
  ShutdownHookProcessDestroyer,
  getDefaultProcessDestroyer,
} from '../../../src/destroyer/ShutdownHookProcessDestroyer.js';

function createLogger() {
  return { error: vi.fn(), warn: vi.fn(), info: vi.fn(), debug: vi.fn() };
}

function config(input: ExecutorConfigInput = {}) {
  return ExecutorConfigSchema.parse(input);
}

describe('ExecutorFactory', () => {
  it('should apply the configuration to a DefaultExecutor', () => {
    const factory = new ExecutorFactory({ logger: createLogger() });

    const executor = factory.create(
      config({
        workingDirectory: '/srv/app',
        exitValues: [0, 2],
        watchdog: { timeoutMs: 5000 },
        streams: { stopTimeoutMs: 1500 },
      })
    );

    expect(executor).toBeInstanceOf(DefaultExecutor);
    expect(executor.getWorkingDirectory()).toBe('/srv/app');
    expect(executor.getExitValues()).toEqual([0, 2]);

    const watchdog = executor.getWatchdog();
    expect(watchdog).toBeInstanceOf(ExecuteWatchdog);
    expect(watchdog instanceof ExecuteWatchdog && watchdog.getTimeout()).toBe(5000);

    const streamHandler = executor.getStreamHandler();
    expect(streamHandler).toBeInstanceOf(PumpStreamHandler);
    expect(streamHandler instanceof PumpStreamHandler && streamHandler.getStopTimeout()).toBe(1500);
  });

  it('should use the default destroyer when destroyOnShutdown is set', () => {
    const executor = createExecutor(config(), { logger: createLogger() });

    expect(executor.getProcessDestroyer()).toBe(getDefaultProcessDestroyer());
    expect(executor.getWatchdog()).toBeNull();
  });

  it('should skip the destroyer when destroyOnShutdown is off', () => {
    const executor = createExecutor(config({ destroyOnShutdown: false }), {
      logger: createLogger(),
    });

    expect(executor.getProcessDestroyer()).toBeNull();
  });

  it('should keep null exit values', () => {
    const executor = createExecutor(config({ exitValues: null }), { logger: createLogger() });

    expect(executor.getExitValues()).toBeNull();
    expect(executor.isFailure(1)).toBe(false);
  });

  it('should prefer injected dependencies over the configuration', () => {
    const streamHandler: IStreamHandler = {
      setProcessInputStream: vi.fn(),
      setProcessOutputStream: vi.fn(),
      setProcessErrorStream: vi.fn(),
      start: vi.fn(),
      stop: vi.fn(async () => undefined),
    };
    const watchdog: IWatchdog = {
      setProcessNotStarted: vi.fn(),
      start: vi.fn(),
      stop: vi.fn(),
      checkException: vi.fn(),
    };
    const processDestroyer = new ShutdownHookProcessDestroyer();

    const executor = createExecutor(config({ watchdog: { timeoutMs: 100 } }), {
      logger: createLogger(),
      streamHandler,
      watchdog,
      processDestroyer,
    });

    expect(executor.getStreamHandler()).toBe(streamHandler);
    expect(executor.getWatchdog()).toBe(watchdog);
    expect(executor.getProcessDestroyer()).toBe(processDestroyer);
  });

  it('should let null dependencies switch features off', () => {
    const executor = createExecutor(config({ watchdog: { timeoutMs: 100 } }), {
      logger: createLogger(),
      watchdog: null,
      processDestroyer: null,
    });

    expect(executor.getWatchdog()).toBeNull();
    expect(executor.getProcessDestroyer()).toBeNull();
  });

  it('should log the executor it created', () => {
    const logger = createLogger();

    createExecutor(config({ workingDirectory: '/srv/app', destroyOnShutdown: false }), { logger });

    expect(logger.debug).toHaveBeenCalledWith('Executor created', {
      workingDirectory: '/srv/app',
      timeoutMs: undefined,
      destroyOnShutdown: false,
    });
  });
});

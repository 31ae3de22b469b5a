/**
 * Execution module
 */

export { DefaultExecutor, type DefaultExecutorDependencies } from './DefaultExecutor.js';
export { DefaultExecuteResultHandler } from './DefaultExecuteResultHandler.js';
export { ExecuteWatchdog } from './ExecuteWatchdog.js';
export type { ExecuteOptions, IExecuteResultHandler, IExecutor } from './IExecutor.js';

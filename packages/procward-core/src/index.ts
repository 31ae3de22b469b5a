// Main entry point - re-export all modules

// Command
export { CommandLine, type SubstitutionMap } from './command/CommandLine.js';

// Execution
export {
  DefaultExecutor,
  DefaultExecuteResultHandler,
  ExecuteWatchdog,
} from './execution/index.js';
export type {
  DefaultExecutorDependencies,
  ExecuteOptions,
  IExecuteResultHandler,
  IExecutor,
} from './execution/index.js';

// Platform exports
export type {
  Environment,
  IFileSystem,
  IProcessDestroyer,
  IProcessLauncher,
  IStreamHandler,
  IWatchdog,
  ProcessHandle,
} from './shared/platform/index.js';

// Configuration
export {
  ExecutorConfigSchema,
  LogLevelSchema,
  LoggingConfigSchema,
  StreamsConfigSchema,
  WatchdogConfigSchema,
} from './config/schemas.js';
export type {
  ExecutorConfig,
  ExecutorConfigInput,
  LogLevel,
} from './config/schemas.js';

// Utilities
export { OneShotLatch } from './shared/utils/OneShotLatch.js';
export { FirstErrorSlot } from './shared/utils/FirstErrorSlot.js';
export { noopLogger, type ILogger } from './shared/utils/ILogger.js';

// Error types
export {
  INVALID_EXIT_VALUE,
  ConfigurationError,
  ExecuteError,
  LaunchError,
  ProcwardError,
  SetupError,
  StreamError,
  WatchdogError,
  errorMessage,
  isProcwardError,
} from './shared/utils/errors.js';

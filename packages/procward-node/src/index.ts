// Main entry point for the Node.js runtime

// Platform adapters
export * from './platform/index.js';

// Stream handling
export * from './streams/index.js';

// Execution
export * from './execution/index.js';

// Process destroyer
export {
  ShutdownHookProcessDestroyer,
  getDefaultProcessDestroyer,
} from './destroyer/ShutdownHookProcessDestroyer.js';

// Environment
export { addVariableToEnvironment, getProcEnvironment } from './environment/EnvironmentUtils.js';

// Configuration
export {
  ConfigLoader,
  ENV_FILE,
  PROJECT_CONFIG_FILE,
  type ConfigLoadOptions,
  type ConfigLoaderOptions,
  type ConfigOverrides,
} from './config/ConfigLoader.js';

// Logging
export { Logger, logger, type LoggerOptions } from './shared/utils/logger.js';

// Re-export core types and interfaces for convenience
export type {
  CommandLine,
  Environment,
  ExecutorConfig,
  IExecuteResultHandler,
  IExecutor,
  IFileSystem,
  IProcessDestroyer,
  IProcessLauncher,
  IStreamHandler,
  IWatchdog,
  ProcessHandle,
} from '@procward/core';

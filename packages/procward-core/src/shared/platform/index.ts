/**
 * Platform abstraction interfaces
 */

export type { IFileSystem } from './IFileSystem.js';
export type { Environment, ProcessHandle, IProcessLauncher } from './IProcessLauncher.js';
export type { IStreamHandler } from './IStreamHandler.js';
export type { IProcessDestroyer } from './IProcessDestroyer.js';
export type { IWatchdog } from './IWatchdog.js';

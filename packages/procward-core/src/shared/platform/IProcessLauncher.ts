/**
 * Process launcher interface (platform abstraction)
 * Creates native processes and owns the platform's notion of a failed exit
 */

import type { Readable, Writable } from 'node:stream';
import type { CommandLine } from '../../command/CommandLine.js';

/**
 * Environment passed to a child process. `null` inherits the caller's environment.
 */
export type Environment = Readonly<Record<string, string>>;

/**
 * A live child process
 */
export interface ProcessHandle {
  /**
   * OS process id (undefined once the spawn failed)
   */
  readonly pid: number | undefined;

  /**
   * Child's standard input (we write to it)
   */
  readonly stdin: Writable;

  /**
   * Child's standard output (we read from it)
   */
  readonly stdout: Readable;

  /**
   * Child's standard error (we read from it)
   */
  readonly stderr: Readable;

  /**
   * Resolve with the exit value once the process terminates
   */
  waitFor(): Promise<number>;

  /**
   * Forcibly terminate the process. Must be idempotent; the executor, the
   * watchdog and the destroyer may all call it.
   */
  destroy(): void;

  isAlive(): boolean;
}

/**
 * Process launcher interface
 */
export interface IProcessLauncher {
  /**
   * Launch a command. Rejects once the native spawn failed.
   */
  launch(
    command: CommandLine,
    environment: Environment | null,
    workingDirectory: string
  ): Promise<ProcessHandle>;

  /**
   * Platform convention for a failed exit value
   */
  isFailure(exitValue: number): boolean;
}

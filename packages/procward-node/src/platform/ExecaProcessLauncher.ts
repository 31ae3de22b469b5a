/**
 * ExecaProcessLauncher - cross-platform process creation
 * Uses execa for spawning; output is streamed, never buffered
 */

import { once } from 'events';
import { execa } from 'execa';
import { LaunchError, errorMessage, noopLogger } from '@procward/core';
import type {
  CommandLine,
  Environment,
  ILogger,
  IProcessLauncher,
  ProcessHandle,
} from '@procward/core';
import { ChildProcessHandle } from './ChildProcessHandle.js';

export class ExecaProcessLauncher implements IProcessLauncher {
  constructor(private readonly logger: ILogger = noopLogger) {}

  /**
   * Resolve once the child emitted `spawn`; reject with LaunchError otherwise
   */
  async launch(
    command: CommandLine,
    environment: Environment | null,
    workingDirectory: string
  ): Promise<ProcessHandle> {
    const subprocess = execa(command.getExecutable(), command.getArguments(), {
      cwd: workingDirectory,
      env: environment === null ? undefined : { ...environment },
      extendEnv: environment === null,
      stdin: 'pipe',
      stdout: 'pipe',
      stderr: 'pipe',
      buffer: false,
      reject: false,
      // Orphan cleanup belongs to the process destroyer
      cleanup: false,
      windowsHide: true,
    });

    let failure: unknown;
    try {
      failure = await Promise.race([
        once(subprocess, 'spawn').then(() => undefined),
        // Settles first only when the spawn failed synchronously
        subprocess.then(
          () => new Error(`${command.getExecutable()} terminated before it was spawned`),
          (error: unknown) => error
        ),
      ]);
    } catch (error) {
      failure = error;
    }

    if (failure !== undefined) {
      throw new LaunchError(
        `Failed to launch ${command.getExecutable()}: ${errorMessage(failure)}`,
        command.toString(),
        { cause: failure }
      );
    }

    this.logger.debug('Spawned process', {
      pid: subprocess.pid,
      command: command.toString(),
      cwd: workingDirectory,
    });

    return new ChildProcessHandle(subprocess, this.logger);
  }

  isFailure(exitValue: number): boolean {
    return exitValue !== 0;
  }
}

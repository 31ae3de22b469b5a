/**
 * ChildProcessHandle - ProcessHandle over an execa subprocess
 */

import os from 'os';
import type { Readable, Writable } from 'stream';
import type { ExecaChildProcess } from 'execa';
import { INVALID_EXIT_VALUE, LaunchError, errorMessage, noopLogger } from '@procward/core';
import type { ILogger, ProcessHandle } from '@procward/core';

const SIGNAL_NUMBERS = new Map<string, number>(Object.entries(os.constants.signals));

/**
 * Exit code, or 128 + signal number for a signalled process (shell convention)
 */
export function toExitValue(exitCode: number | null | undefined, signal: string | null | undefined): number {
  if (typeof exitCode === 'number') {
    return exitCode;
  }
  const signo = signal ? SIGNAL_NUMBERS.get(signal) : undefined;
  return signo === undefined ? INVALID_EXIT_VALUE : 128 + signo;
}

export class ChildProcessHandle implements ProcessHandle {
  readonly stdin: Writable;
  readonly stdout: Readable;
  readonly stderr: Readable;

  private readonly exit: Promise<number>;
  private destroyed = false;

  constructor(
    private readonly subprocess: ExecaChildProcess,
    private readonly logger: ILogger = noopLogger
  ) {
    const { stdin, stdout, stderr } = subprocess;
    if (!stdin || !stdout || !stderr) {
      throw new LaunchError('Process streams are not piped');
    }
    this.stdin = stdin;
    this.stdout = stdout;
    this.stderr = stderr;

    // Writing to a child that already exited raises EPIPE on stdin
    this.stdin.on('error', (error: Error) => {
      this.logger.debug('Process stdin closed', { pid: this.pid, error: error.message });
    });

    this.exit = subprocess.then(
      (result) => toExitValue(result.exitCode, result.signal),
      (error: unknown) => {
        this.logger.warn('Process terminated abnormally', {
          pid: this.pid,
          error: errorMessage(error),
        });
        return INVALID_EXIT_VALUE;
      }
    );
  }

  get pid(): number | undefined {
    return this.subprocess.pid;
  }

  waitFor(): Promise<number> {
    return this.exit;
  }

  /**
   * SIGTERM once; execa escalates to SIGKILL if the child ignores it
   */
  destroy(): void {
    if (this.destroyed || !this.isAlive()) {
      return;
    }
    this.destroyed = true;
    this.subprocess.kill('SIGTERM');
  }

  isAlive(): boolean {
    return this.subprocess.exitCode === null && this.subprocess.signalCode === null;
  }
}

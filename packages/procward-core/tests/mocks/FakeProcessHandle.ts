/**
 * In-process stand-in for a child process, backed by PassThrough streams
 */

import { PassThrough } from 'stream';
import type { ProcessHandle } from '../../src/shared/platform/IProcessLauncher.js';

export interface FakeProcessHandleOptions {
  pid?: number;

  /**
   * Exit value produced when destroy() kills a live process (default: 143)
   */
  killExitValue?: number;

  /**
   * Make destroy() throw instead of killing
   */
  destroyError?: Error;
}

export class FakeProcessHandle implements ProcessHandle {
  readonly pid: number;
  readonly stdin = new PassThrough();
  readonly stdout = new PassThrough();
  readonly stderr = new PassThrough();

  destroyCalls = 0;

  private alive = true;
  private settle: (result: { exitValue: number } | { error: Error }) => void = () => undefined;
  private readonly exit: Promise<number>;

  constructor(private readonly options: FakeProcessHandleOptions = {}) {
    this.pid = options.pid ?? 4242;
    this.exit = new Promise<number>((resolve, reject) => {
      this.settle = (result) => {
        if ('error' in result) {
          reject(result.error);
        } else {
          resolve(result.exitValue);
        }
      };
    });
  }

  waitFor(): Promise<number> {
    return this.exit;
  }

  destroy(): void {
    this.destroyCalls++;
    if (this.options.destroyError) {
      throw this.options.destroyError;
    }
    if (this.alive) {
      this.exitWith(this.options.killExitValue ?? 143);
    }
  }

  isAlive(): boolean {
    return this.alive;
  }

  /**
   * Terminate with an exit value; output streams end like a real child's
   */
  exitWith(exitValue: number): void {
    if (!this.alive) {
      return;
    }
    this.alive = false;
    this.stdout.end();
    this.stderr.end();
    this.settle({ exitValue });
  }

  /**
   * Make waitFor() reject, as if the wait itself broke
   */
  failWait(error: Error): void {
    this.alive = false;
    this.settle({ error });
  }
}

/**
 * Fake IProcessLauncher that hands out FakeProcessHandles
 */

import type { CommandLine } from '../../src/command/CommandLine.js';
import type {
  Environment,
  IProcessLauncher,
} from '../../src/shared/platform/IProcessLauncher.js';
import { FakeProcessHandle } from './FakeProcessHandle.js';

export interface LaunchCall {
  command: CommandLine;
  environment: Environment | null;
  workingDirectory: string;
}

export class FakeProcessLauncher implements IProcessLauncher {
  readonly calls: LaunchCall[] = [];
  readonly launched: FakeProcessHandle[] = [];

  private queue: FakeProcessHandle[] = [];
  private launchError: unknown = null;

  /**
   * Exit value for processes created on demand; null keeps them running
   */
  autoExitValue: number | null = 0;

  async launch(
    command: CommandLine,
    environment: Environment | null,
    workingDirectory: string
  ): Promise<FakeProcessHandle> {
    this.calls.push({ command, environment, workingDirectory });
    if (this.launchError !== null) {
      throw this.launchError;
    }

    const handle = this.queue.shift() ?? this.createHandle();
    this.launched.push(handle);
    return handle;
  }

  isFailure(exitValue: number): boolean {
    return exitValue !== 0;
  }

  // Test helpers

  enqueue(handle: FakeProcessHandle): FakeProcessHandle {
    this.queue.push(handle);
    return handle;
  }

  failWith(error: unknown): void {
    this.launchError = error;
  }

  private createHandle(): FakeProcessHandle {
    const handle = new FakeProcessHandle({ pid: 1000 + this.launched.length });
    const exitValue = this.autoExitValue;
    if (exitValue !== null) {
      setImmediate(() => handle.exitWith(exitValue));
    }
    return handle;
  }
}

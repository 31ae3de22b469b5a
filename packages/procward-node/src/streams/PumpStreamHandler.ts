/**
 * PumpStreamHandler - copies child output to the parent's streams
 *
 * Defaults to this process' stdout/stderr. Pumping keeps the child from
 * blocking on a full pipe buffer.
 */

import type { Readable, Writable } from 'stream';
import { StreamError, errorMessage, isProcwardError, noopLogger } from '@procward/core';
import type { ILogger, IStreamHandler } from '@procward/core';
import { StreamPumper } from './StreamPumper.js';

export interface PumpStreamHandlerOptions {
  /**
   * Max time stop() waits for the output pumps; 0 waits indefinitely
   */
  stopTimeoutMs?: number;

  logger?: ILogger;
}

const TIMED_OUT = Symbol('timed-out');

export class PumpStreamHandler implements IStreamHandler {
  private outputPump: StreamPumper | null = null;
  private errorPump: StreamPumper | null = null;
  private inputPump: StreamPumper | null = null;
  private active = false;
  private stopTimeoutMs: number;
  private readonly logger: ILogger;

  /**
   * @param out - sink for the child's stdout (null drains it)
   * @param err - sink for the child's stderr (null drains it)
   * @param input - source for the child's stdin (null closes it)
   */
  constructor(
    private readonly out: Writable | null = process.stdout,
    private readonly err: Writable | null = process.stderr,
    private readonly input: Readable | null = null,
    options: PumpStreamHandlerOptions = {}
  ) {
    this.stopTimeoutMs = options.stopTimeoutMs ?? 0;
    this.logger = options.logger ?? noopLogger;
  }

  getStopTimeout(): number {
    return this.stopTimeoutMs;
  }

  setStopTimeout(timeoutMs: number): void {
    this.stopTimeoutMs = timeoutMs;
  }

  /**
   * Wiring starts here. One handler pumps one process at a time, so an
   * overlapping execution is refused with a StreamError.
   */
  setProcessInputStream(stream: Writable): void {
    if (this.active) {
      throw new StreamError('PumpStreamHandler is already pumping another process');
    }
    this.active = true;

    if (this.input) {
      // The child closing stdin early is not a pump failure
      this.inputPump = new StreamPumper(this.input, stream, {
        closeWhenExhausted: true,
        tolerateSinkErrors: true,
      });
    } else {
      stream.end();
    }
  }

  setProcessOutputStream(stream: Readable): void {
    this.outputPump = new StreamPumper(stream, this.out);
  }

  setProcessErrorStream(stream: Readable): void {
    this.errorPump = new StreamPumper(stream, this.err);
  }

  start(): void {
    this.outputPump?.start();
    this.errorPump?.start();
    this.inputPump?.start();
  }

  /**
   * Wait for the output pumps to drain. An unfinished input pump is detached,
   * since its source may never end; a finished one reports its failure.
   */
  async stop(): Promise<void> {
    const inputPump = this.inputPump;
    const pumps = [this.outputPump, this.errorPump].filter(
      (pump): pump is StreamPumper => pump !== null
    );
    this.inputPump = null;
    this.outputPump = null;
    this.errorPump = null;
    this.active = false;

    const awaited = [...pumps];
    if (inputPump?.isFinished()) {
      awaited.push(inputPump);
    } else {
      inputPump?.detach();
    }

    const settled = Promise.allSettled(awaited.map((pump) => pump.waitFor()));
    const results = await this.withStopTimeout(settled);

    if (results === TIMED_OUT) {
      pumps.forEach((pump) => pump.abort());
      throw new StreamError(`The stop timeout of ${this.stopTimeoutMs} ms was exceeded`);
    }

    const failures = results.flatMap((result) =>
      result.status === 'rejected' ? [toStreamError(result.reason)] : []
    );
    failures.slice(1).forEach((failure) => {
      this.logger.warn('Dropping secondary stream pump error', { error: failure.message });
    });
    if (failures[0]) {
      throw failures[0];
    }
  }

  private async withStopTimeout<T>(work: Promise<T>): Promise<T | typeof TIMED_OUT> {
    if (this.stopTimeoutMs <= 0) {
      return work;
    }

    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<typeof TIMED_OUT>((resolve) => {
      timer = setTimeout(() => resolve(TIMED_OUT), this.stopTimeoutMs);
    });

    try {
      return await Promise.race([work, timeout]);
    } finally {
      clearTimeout(timer);
    }
  }
}

function toStreamError(reason: unknown): Error {
  if (isProcwardError(reason)) {
    return reason;
  }
  return new StreamError(errorMessage(reason), { cause: reason });
}

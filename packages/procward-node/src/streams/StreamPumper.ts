/**
 * StreamPumper - copies one readable into one writable and tracks completion
 */

import type { Readable, Writable } from 'stream';
import { finished } from 'stream/promises';
import { setImmediate as nextMacrotask } from 'timers/promises';
import { StreamError } from '@procward/core';

export interface StreamPumperOptions {
  /**
   * End the sink once the source is exhausted or fails (default: false)
   */
  closeWhenExhausted?: boolean;

  /**
   * Treat a sink error as the reader going away: stop forwarding and record
   * nothing (default: false)
   */
  tolerateSinkErrors?: boolean;
}

export class StreamPumper {
  private completion: Promise<StreamError | null> | null = null;
  private done = false;
  private sinkError: Error | null = null;

  /**
   * A null sink drains the source so the child never blocks on a full pipe
   */
  constructor(
    private readonly source: Readable,
    private readonly sink: Writable | null,
    private readonly options: StreamPumperOptions = {}
  ) {}

  start(): void {
    if (this.completion) {
      return;
    }

    const sink = this.sink;
    if (!sink) {
      this.completion = this.track(null);
      this.source.resume();
      return;
    }

    // Without a listener pipe() rethrows the sink error and leaves the source paused
    const onSinkError = (error: Error): void => {
      this.source.unpipe(sink);
      if (this.options.tolerateSinkErrors) {
        return;
      }
      this.sinkError ??= error;
      this.source.resume();
    };
    sink.on('error', onSinkError);

    // Failures are captured here and reported by waitFor()
    this.completion = this.track(sink).finally(() => {
      sink.off('error', onSinkError);
    });
    this.source.pipe(sink, { end: this.options.closeWhenExhausted ?? false });
  }

  isFinished(): boolean {
    return this.done;
  }

  /**
   * Resolve once the source ended; reject with StreamError if the source or
   * the sink failed
   */
  async waitFor(): Promise<void> {
    if (!this.completion) {
      return;
    }
    const error = await this.completion;
    if (error) {
      throw error;
    }
  }

  /**
   * Detach the sink without waiting for the source
   */
  detach(): void {
    if (this.sink) {
      this.source.unpipe(this.sink);
    }
  }

  /**
   * Tear down the source; used when pumps outlive their stop timeout
   */
  abort(): void {
    this.detach();
    this.source.destroy();
  }

  private async track(sink: Writable | null): Promise<StreamError | null> {
    let sourceError: Error | null = null;
    try {
      await finished(this.source);
    } catch (error) {
      sourceError = error instanceof Error ? error : new Error(String(error));
    }
    this.done = true;

    // pipe() only ends the sink when the source ends cleanly
    if (sink) {
      const open = !sink.writableEnded && !sink.destroyed;
      if (sourceError && this.options.closeWhenExhausted && open) {
        sink.end();
      }
      // Write errors for the last chunks arrive on later ticks
      await nextMacrotask();
    }

    if (sourceError) {
      return new StreamError(`Stream pump failed: ${sourceError.message}`, { cause: sourceError });
    }
    if (this.sinkError) {
      return new StreamError(`Stream sink failed: ${this.sinkError.message}`, {
        cause: this.sinkError,
      });
    }
    return null;
  }
}

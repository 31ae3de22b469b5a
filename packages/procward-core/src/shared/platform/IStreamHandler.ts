import type { Readable, Writable } from 'node:stream';

/**
 * Binds the three standard streams of a child process to sinks and sources.
 * All streams are set before start().
 */
export interface IStreamHandler {
  /**
   * Child's stdin
   */
  setProcessInputStream(stream: Writable): void;

  /**
   * Child's stdout
   */
  setProcessOutputStream(stream: Readable): void;

  /**
   * Child's stderr
   */
  setProcessErrorStream(stream: Readable): void;

  /**
   * Begin pumping (non-blocking)
   */
  start(): void;

  /**
   * Resolve once pumping has ended
   */
  stop(): Promise<void>;
}

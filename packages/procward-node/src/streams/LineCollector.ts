/**
 * LineCollector - Writable that splits child output into lines
 */

import { Writable } from 'stream';
import { StringDecoder } from 'string_decoder';

export type LineListener = (line: string, level: number) => void;

export interface LineCollectorOptions {
  /**
   * Called for every complete line (without its terminator)
   */
  onLine?: LineListener;

  /**
   * Passed through to the listener, e.g. to tell stdout from stderr
   */
  level?: number;

  /**
   * Keep lines for getLines() (default: true)
   */
  retain?: boolean;
}

export class LineCollector extends Writable {
  private readonly decoder = new StringDecoder('utf8');
  private readonly lines: string[] = [];
  private pending = '';

  constructor(private readonly collectorOptions: LineCollectorOptions = {}) {
    super({ decodeStrings: true });
  }

  getLines(): string[] {
    return [...this.lines];
  }

  override _write(
    chunk: Buffer,
    _encoding: BufferEncoding,
    callback: (error?: Error | null) => void
  ): void {
    this.pending += this.decoder.write(chunk);

    let newline = this.pending.indexOf('\n');
    while (newline !== -1) {
      this.processLine(this.pending.slice(0, newline));
      this.pending = this.pending.slice(newline + 1);
      newline = this.pending.indexOf('\n');
    }
    callback();
  }

  override _final(callback: (error?: Error | null) => void): void {
    this.pending += this.decoder.end();
    if (this.pending.length > 0) {
      this.processLine(this.pending);
      this.pending = '';
    }
    callback();
  }

  private processLine(raw: string): void {
    const line = raw.endsWith('\r') ? raw.slice(0, -1) : raw;
    if (this.collectorOptions.retain ?? true) {
      this.lines.push(line);
    }
    this.collectorOptions.onLine?.(line, this.collectorOptions.level ?? 0);
  }
}

/**
 * @fileoverview Line Channel
 *
 * Frames the engine's stdout into lines and writes newline-terminated
 * commands to its stdin. Reads take an optional absolute deadline; a read
 * whose deadline fires is withdrawn from the wait queue, so the next line
 * is delivered to the next reader and the stream stays usable.
 */

import type { Readable, Writable } from 'stream';
import { WriteError } from '../errors/index.js';
import type { UciLogger } from '../logging/index.js';

// =============================================================================
// Types
// =============================================================================

export type LineReadResult =
  | { readonly kind: 'line'; readonly line: string }
  | { readonly kind: 'timeout' }
  | { readonly kind: 'closed' };

/**
 * Anything lines can be read from (the channel, or a scripted source in tests)
 */
export interface LineSource {
  readLine(deadline?: number): Promise<LineReadResult>;
}

export interface LineChannelOptions {
  logger?: UciLogger;
}

interface PendingRead {
  resolve: (result: LineReadResult) => void;
  timer: ReturnType<typeof setTimeout> | null;
}

const TIMEOUT: LineReadResult = { kind: 'timeout' };
const CLOSED: LineReadResult = { kind: 'closed' };

const TRAILING_LINE_ENDING = /[\r\n]+$/;

// =============================================================================
// Line Channel
// =============================================================================

export class LineChannel implements LineSource {
  private readonly lines: string[] = [];
  private readonly waiters: PendingRead[] = [];
  private partial = '';
  private closed = false;
  private readonly logger: UciLogger | undefined;

  constructor(
    private readonly input: Readable,
    private readonly output: Writable,
    options: LineChannelOptions = {}
  ) {
    this.logger = options.logger;

    input.setEncoding('utf8');
    input.on('data', (chunk: string | Buffer) => {
      this.onData(typeof chunk === 'string' ? chunk : chunk.toString('utf8'));
    });
    input.on('end', () => this.onEnd());
    input.on('close', () => this.onEnd());
    input.on('error', (error: Error) => {
      this.logger?.warn('Engine output stream error', { error: error.message });
      this.onEnd();
    });
    output.on('error', (error: Error) => {
      this.logger?.warn('Engine input stream error', { error: error.message });
    });
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * Number of framed lines waiting for a reader
   */
  get buffered(): number {
    return this.lines.length;
  }

  /**
   * Read the next line.
   *
   * @param deadline - Absolute time (ms since epoch) after which the read
   *   resolves with `timeout`. Omit to wait until a line or end of stream.
   */
  readLine(deadline?: number): Promise<LineReadResult> {
    const queued = this.lines.shift();
    if (queued !== undefined) {
      return Promise.resolve({ kind: 'line', line: queued });
    }
    if (this.closed) {
      return Promise.resolve(CLOSED);
    }

    const remaining = deadline === undefined ? undefined : deadline - Date.now();
    if (remaining !== undefined && remaining <= 0) {
      return Promise.resolve(TIMEOUT);
    }

    return new Promise<LineReadResult>((resolve) => {
      const pending: PendingRead = { resolve, timer: null };
      if (remaining !== undefined) {
        pending.timer = setTimeout(() => {
          this.withdraw(pending);
          resolve(TIMEOUT);
        }, remaining);
      }
      this.waiters.push(pending);
    });
  }

  /**
   * Write one command followed by a newline. The whole line goes out in a
   * single write, so concurrent writers never interleave within a line.
   */
  async writeLine(text: string): Promise<void> {
    if (this.closed || this.output.destroyed || this.output.writableEnded || !this.output.writable) {
      throw new WriteError(text, 'engine input stream is closed');
    }

    this.logger?.trace('>> engine', { line: text });

    await new Promise<void>((resolve, reject) => {
      this.output.write(`${text}\n`, (error) => {
        if (error) {
          reject(new WriteError(text, error.message, { cause: error }));
        } else {
          resolve();
        }
      });
    });
  }

  /**
   * Mark the channel closed and resolve every pending read with `closed`.
   * Lines already framed remain readable.
   */
  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    for (const pending of this.waiters.splice(0)) {
      if (pending.timer) {
        clearTimeout(pending.timer);
      }
      pending.resolve(CLOSED);
    }
  }

  // ===========================================================================
  // Framing
  // ===========================================================================

  private onData(chunk: string): void {
    if (this.closed) {
      return;
    }
    this.partial += chunk;
    const pieces = this.partial.split('\n');
    this.partial = pieces.pop() ?? '';
    for (const piece of pieces) {
      this.deliver(piece.replace(TRAILING_LINE_ENDING, ''));
    }
  }

  private onEnd(): void {
    if (this.closed) {
      return;
    }
    const rest = this.partial.replace(TRAILING_LINE_ENDING, '');
    this.partial = '';
    if (rest.length > 0) {
      this.deliver(rest);
    }
    this.close();
  }

  private deliver(line: string): void {
    this.logger?.trace('<< engine', { line });

    const pending = this.waiters.shift();
    if (!pending) {
      this.lines.push(line);
      return;
    }
    if (pending.timer) {
      clearTimeout(pending.timer);
    }
    pending.resolve({ kind: 'line', line });
  }

  private withdraw(pending: PendingRead): void {
    const index = this.waiters.indexOf(pending);
    if (index !== -1) {
      this.waiters.splice(index, 1);
    }
  }
}

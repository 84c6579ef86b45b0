/**
 * @fileoverview In-process stand-in for a UCI engine child process
 *
 * Mirrors the parts of ChildProcess the supervisor touches: the three pipes,
 * `spawn`/`exit` events, `pid` and `kill`. Commands written to stdin are
 * recorded and handed to a responder that writes replies to stdout.
 */

import { EventEmitter } from 'events';
import { PassThrough } from 'stream';

export type FakeResponder = (command: string, engine: FakeEngine) => void;

export const TEST_ENGINE_OPTIONS = [
  'option name Hash type spin default 16 min 1 max 1024',
  'option name Threads type spin default 1 min 1 max 512',
  'option name Ponder type check default false',
  'option name Style type combo default Normal var Solid var Normal var Risky',
  'option name Debug Log File type string default <empty>',
  'option name Clear Hash type button',
];

/**
 * Replies the way a well-behaved engine does: identity and options for
 * `uci`, `readyok` for `isready`, a short search for `go`, exit on `quit`.
 */
export function standardResponder(command: string, engine: FakeEngine): void {
  if (command === 'uci') {
    engine.send('id name TestEngine', 'id author Test Author', ...TEST_ENGINE_OPTIONS, 'uciok');
  } else if (command === 'isready') {
    engine.send('readyok');
  } else if (command.startsWith('go')) {
    engine.send(
      'info depth 1 score cp 20 pv e2e4',
      'info depth 2 score cp 35 pv e2e4 e7e5',
      'info string search finished',
      'bestmove e2e4 ponder e7e5'
    );
  } else if (command === 'quit') {
    engine.exit(0);
  }
}

/**
 * Like standardResponder, but `go` produces no output at all
 */
export function silentSearchResponder(command: string, engine: FakeEngine): void {
  if (command.startsWith('go')) {
    return;
  }
  standardResponder(command, engine);
}

export class FakeEngine extends EventEmitter {
  readonly stdin = new PassThrough();
  readonly stdout = new PassThrough();
  readonly stderr = new PassThrough();
  readonly pid = 4242;

  /** Every command line received on stdin, in order */
  readonly received: string[] = [];
  /** Signals passed to kill() */
  readonly killSignals: string[] = [];

  private exited = false;
  private partial = '';

  constructor(private responder: FakeResponder = standardResponder) {
    super();
    this.stdin.setEncoding('utf8');
    this.stdin.on('data', (chunk: string) => this.onInput(chunk));
    setImmediate(() => this.emit('spawn'));
  }

  get hasExited(): boolean {
    return this.exited;
  }

  setResponder(responder: FakeResponder): void {
    this.responder = responder;
  }

  /** Write lines to stdout as the engine */
  send(...lines: string[]): void {
    if (this.exited) {
      return;
    }
    this.stdout.write(lines.map((line) => `${line}\n`).join(''));
  }

  kill(signal: NodeJS.Signals = 'SIGTERM'): boolean {
    this.killSignals.push(signal);
    this.exit(null, signal);
    return true;
  }

  /** Simulate process exit: stdout ends, then `exit` fires */
  exit(code: number | null, signal: NodeJS.Signals | null = null): void {
    if (this.exited) {
      return;
    }
    this.exited = true;
    this.stdout.end();
    setImmediate(() => this.emit('exit', code, signal));
  }

  private onInput(chunk: string): void {
    this.partial += chunk;
    const lines = this.partial.split('\n');
    this.partial = lines.pop() ?? '';
    for (const line of lines) {
      this.received.push(line);
      this.responder(line, this);
    }
  }
}

/**
 * @fileoverview UCI handshake
 *
 * The `uci` → `uciok` exchange is a fold over inbound lines: each line is
 * applied to an immutable accumulator until `uciok` completes it. The read
 * loop around the fold owns deadlines and stream closure.
 */

import { EngineTimeoutError, ProcessClosedError } from '../errors/index.js';
import type { LineSource } from '../process/line-channel.js';
import type { EngineId, OptionMetadata } from '../types/index.js';
import { isToken, parseIdLine, parseOptionLine } from './uci-parser.js';

export interface HandshakeAccumulator {
  readonly id: EngineId;
  readonly options: readonly OptionMetadata[];
  /** Lines that were neither identity, option nor `uciok` */
  readonly ignoredLines: number;
  readonly complete: boolean;
}

export const INITIAL_HANDSHAKE: HandshakeAccumulator = {
  id: {},
  options: [],
  ignoredLines: 0,
  complete: false,
};

/**
 * Apply one engine line to the handshake accumulator
 */
export function foldHandshakeLine(acc: HandshakeAccumulator, line: string): HandshakeAccumulator {
  if (acc.complete) {
    return acc;
  }
  if (isToken(line, 'uciok')) {
    return { ...acc, complete: true };
  }

  const id = parseIdLine(line);
  if (id) {
    return { ...acc, id: { ...acc.id, [id.field]: id.value } };
  }

  if (line.startsWith('option name ')) {
    const option = parseOptionLine(line);
    if (option) {
      return { ...acc, options: [...acc.options, option] };
    }
  }

  return { ...acc, ignoredLines: acc.ignoredLines + 1 };
}

/**
 * Read lines until `uciok`, folding each one.
 *
 * @param deadline - Absolute time (ms since epoch) for the whole exchange
 */
export async function performUciHandshake(
  source: LineSource,
  deadline: number,
  timeoutMs: number
): Promise<HandshakeAccumulator> {
  let acc = INITIAL_HANDSHAKE;
  while (!acc.complete) {
    const result = await source.readLine(deadline);
    if (result.kind === 'timeout') {
      throw new EngineTimeoutError('uciok', timeoutMs);
    }
    if (result.kind === 'closed') {
      throw new ProcessClosedError('Engine closed its output during the handshake');
    }
    acc = foldHandshakeLine(acc, result.line);
  }
  return acc;
}

/**
 * Read and discard lines until `readyok`. Returns the number of discarded
 * lines so callers can log stray output.
 */
export async function waitForReadyOk(source: LineSource, deadline: number, timeoutMs: number): Promise<number> {
  let discarded = 0;
  for (;;) {
    const result = await source.readLine(deadline);
    if (result.kind === 'timeout') {
      throw new EngineTimeoutError('readyok', timeoutMs);
    }
    if (result.kind === 'closed') {
      throw new ProcessClosedError('Engine closed its output while waiting for readyok');
    }
    if (isToken(result.line, 'readyok')) {
      return discarded;
    }
    discarded += 1;
  }
}

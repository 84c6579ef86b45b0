/**
 * @fileoverview Outbound UCI commands
 *
 * Formats the commands the bridge writes and screens caller-supplied text so
 * a position, move or option value can never smuggle a second command onto
 * the wire.
 */

import { InvalidArgumentError } from '../errors/index.js';
import type { OptionType, OptionValue, PositionSpec } from '../types/index.js';
import { EMPTY_STRING_TOKEN } from './uci-parser.js';

export const MAX_THINK_TIME_MS = 600_000;

// Coordinate move with optional promotion piece, or the null move
const MOVE_PATTERN = /^(?:[a-h][1-8][a-h][1-8][nbrq]?|0000)$/;
const CONTROL_CHARACTERS = /[\u0000-\u001f\u007f]/;

export const UciCommand = {
  UCI: 'uci',
  IS_READY: 'isready',
  NEW_GAME: 'ucinewgame',
  STOP: 'stop',
  QUIT: 'quit',
} as const;

/**
 * True when the text would break a command across lines
 */
export function hasControlCharacters(text: string): boolean {
  return CONTROL_CHARACTERS.test(text);
}

export function isMoveToken(move: string): boolean {
  return MOVE_PATTERN.test(move);
}

export function assertValidFen(fen: string): void {
  if (fen.trim().length === 0) {
    throw new InvalidArgumentError('FEN must not be empty');
  }
  if (hasControlCharacters(fen)) {
    throw new InvalidArgumentError('FEN must not contain control characters');
  }
}

export function assertValidMoves(moves: readonly string[]): void {
  const invalid = moves.filter((move) => !isMoveToken(move));
  if (invalid.length > 0) {
    throw new InvalidArgumentError(`Invalid UCI move(s): ${invalid.join(', ')}`);
  }
}

export function assertValidThinkTime(timeMs: number): void {
  if (!Number.isInteger(timeMs) || timeMs <= 0 || timeMs > MAX_THINK_TIME_MS) {
    throw new InvalidArgumentError(`Think time must be an integer between 1 and ${MAX_THINK_TIME_MS} ms, got ${timeMs}`);
  }
}

/**
 * `position fen <FEN> | startpos [moves <m1> <m2> ...]`
 */
export function formatPosition(position: PositionSpec): string {
  const base = position.fen ? `position fen ${position.fen.trim()}` : 'position startpos';
  const moves = position.moves ?? [];
  return moves.length > 0 ? `${base} moves ${moves.join(' ')}` : base;
}

export function formatGo(movetimeMs: number): string {
  return `go movetime ${movetimeMs}`;
}

/**
 * `setoption name <N> [value <V>]`; buttons carry no value and a null
 * string value is sent as the empty-string placeholder.
 */
export function formatSetOption(name: string, type: OptionType, value: OptionValue): string {
  if (type === 'button') {
    return `setoption name ${name}`;
  }
  const rendered = value === null || value === '' ? EMPTY_STRING_TOKEN : String(value);
  return `setoption name ${name} value ${rendered}`;
}

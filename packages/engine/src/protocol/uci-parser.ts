/**
 * @fileoverview UCI line parsing
 *
 * Pure parsers for the inbound lines the bridge cares about: `id`, `option`,
 * `info` and `bestmove`. Tokens are split on spaces only, so control
 * characters embedded in option strings survive.
 *
 * Example input:
 * "info depth 24 seldepth 32 multipv 1 score cp 35 nodes 12345678 time 4938 pv e2e4 e7e5 g1f3"
 */

import { OPTION_TYPES, type EngineScore, type OptionMetadata, type OptionType } from '../types/index.js';

// =============================================================================
// Types
// =============================================================================

export interface IdLine {
  field: 'name' | 'author';
  value: string;
}

export interface InfoUpdate {
  depth?: number;
  multipv?: number;
  score?: EngineScore;
  pv?: string[];
}

export interface BestMoveLine {
  /** null when the engine reports `(none)` */
  bestMove: string | null;
  ponder?: string;
}

// =============================================================================
// Helpers
// =============================================================================

const INTEGER_PATTERN = /^-?\d+$/;

const OPTION_KEYWORDS = ['name', 'type', 'default', 'min', 'max', 'var'] as const;
type OptionKeyword = (typeof OPTION_KEYWORDS)[number];

/** Keywords that end a `pv` token list */
const PV_TERMINATORS = new Set(['depth', 'score', 'time']);

/** Placeholder engines use for an empty string default */
export const EMPTY_STRING_TOKEN = '<empty>';

export function tokenize(line: string): string[] {
  return line.split(' ').filter((token) => token.length > 0);
}

export function parseInteger(raw: string | undefined): number | undefined {
  if (raw === undefined || !INTEGER_PATTERN.test(raw)) {
    return undefined;
  }
  const value = Number(raw);
  return Number.isSafeInteger(value) ? value : undefined;
}

function isOptionKeyword(token: string): token is OptionKeyword {
  return OPTION_KEYWORDS.some((keyword) => keyword === token);
}

export function isOptionType(token: string): token is OptionType {
  return OPTION_TYPES.some((type) => type === token);
}

// =============================================================================
// id / option
// =============================================================================

export function parseIdLine(line: string): IdLine | null {
  if (line.startsWith('id name ')) {
    return { field: 'name', value: line.slice('id name '.length).trim() };
  }
  if (line.startsWith('id author ')) {
    return { field: 'author', value: line.slice('id author '.length).trim() };
  }
  return null;
}

/**
 * Parse `option name <N> type <T> [default <D>] [min <m>] [max <M>] [var <V>]*`.
 *
 * Tokens are consumed left to right. The name runs until `type` (names may
 * contain spaces); after that every keyword opens a new field and each `var`
 * opens a new allowed value. Returns null for lines that are not options or
 * lack a name or a known type.
 */
export function parseOptionLine(line: string): OptionMetadata | null {
  const tokens = tokenize(line);
  if (tokens[0] !== 'option') {
    return null;
  }

  const fields = new Map<Exclude<OptionKeyword, 'var'>, string[]>();
  const vars: string[][] = [];
  let current: OptionKeyword | null = null;

  for (const token of tokens.slice(1)) {
    const opensField = isOptionKeyword(token) && (current !== 'name' || token === 'type');
    if (opensField) {
      current = token;
      if (token === 'var') {
        vars.push([]);
      } else {
        fields.set(token, []);
      }
      continue;
    }
    if (current === null) {
      continue;
    }
    if (current === 'var') {
      vars[vars.length - 1]?.push(token);
    } else {
      fields.get(current)?.push(token);
    }
  }

  const name = fields.get('name')?.join(' ') ?? '';
  const type = fields.get('type')?.join(' ') ?? '';
  if (name.length === 0 || !isOptionType(type)) {
    return null;
  }

  const rawDefault = fields.get('default')?.join(' ');

  switch (type) {
    case 'check':
      return {
        name,
        type,
        default: rawDefault === 'true' ? true : rawDefault === 'false' ? false : null,
      };
    case 'spin': {
      const min = parseInteger(fields.get('min')?.join(' '));
      const max = parseInteger(fields.get('max')?.join(' '));
      return {
        name,
        type,
        default: parseInteger(rawDefault) ?? null,
        ...(min !== undefined && { min }),
        ...(max !== undefined && { max }),
      };
    }
    case 'combo':
      return {
        name,
        type,
        default: rawDefault ?? null,
        vars: vars.map((parts) => parts.join(' ')).filter((value) => value.length > 0),
      };
    case 'string':
      return {
        name,
        type,
        default: rawDefault === undefined ? null : rawDefault === EMPTY_STRING_TOKEN ? '' : rawDefault,
      };
    case 'button':
      return { name, type, default: null };
  }
}

// =============================================================================
// info / bestmove
// =============================================================================

/**
 * Parse the fields of an `info` line the analysis collector folds.
 * Everything after `string` is free text and is not interpreted.
 */
export function parseInfoLine(line: string): InfoUpdate | null {
  const tokens = tokenize(line);
  if (tokens[0] !== 'info') {
    return null;
  }

  const update: InfoUpdate = {};
  let i = 1;

  while (i < tokens.length) {
    const token = tokens[i];

    switch (token) {
      case 'depth': {
        const depth = parseInteger(tokens[i + 1]);
        if (depth !== undefined) {
          update.depth = depth;
        }
        i += 2;
        break;
      }
      case 'multipv': {
        const multipv = parseInteger(tokens[i + 1]);
        if (multipv !== undefined) {
          update.multipv = multipv;
        }
        i += 2;
        break;
      }
      case 'score': {
        const kind = tokens[i + 1];
        const value = parseInteger(tokens[i + 2]);
        if (value !== undefined && kind === 'cp') {
          update.score = { type: 'cp', pawns: value / 100 };
        } else if (value !== undefined && kind === 'mate') {
          update.score = { type: 'mate', moves: value };
        }
        i += 3;
        break;
      }
      case 'pv': {
        const pv: string[] = [];
        i += 1;
        while (i < tokens.length) {
          const move = tokens[i];
          if (move === undefined || PV_TERMINATORS.has(move)) {
            break;
          }
          pv.push(move);
          i += 1;
        }
        if (pv.length > 0) {
          update.pv = pv;
        }
        break;
      }
      case 'string':
        return update;
      default:
        i += 1;
    }
  }

  return update;
}

export function parseBestMoveLine(line: string): BestMoveLine | null {
  const tokens = tokenize(line);
  if (tokens[0] !== 'bestmove') {
    return null;
  }

  const move = tokens[1];
  const result: BestMoveLine = {
    bestMove: move === undefined || move === '(none)' ? null : move,
  };
  if (tokens[2] === 'ponder' && tokens[3] !== undefined) {
    result.ponder = tokens[3];
  }
  return result;
}

/**
 * Compare a line against a bare protocol token such as `uciok`
 */
export function isToken(line: string, token: string): boolean {
  return line.trim() === token;
}

/**
 * @fileoverview Engine bridge types
 *
 * Data model shared by the protocol, option and analysis modules, plus the
 * caller-facing `ChessEngine` contract.
 */

// =============================================================================
// Handshake State
// =============================================================================

export const EngineHandshakeState = {
  UNINITIALIZED: 'uninitialized',
  AWAITING_UCI_OK: 'awaiting_uciok',
  AWAITING_READY_OK: 'awaiting_readyok',
  READY: 'ready',
  STOPPED: 'stopped',
} as const;

export type EngineHandshakeStateType = (typeof EngineHandshakeState)[keyof typeof EngineHandshakeState];

// =============================================================================
// Options
// =============================================================================

export const OPTION_TYPES = ['check', 'spin', 'combo', 'button', 'string'] as const;

export type OptionType = (typeof OPTION_TYPES)[number];

/** Value carried by a `setoption` command (null: no value / empty string) */
export type OptionValue = boolean | number | string | null;

/** Raw option value as it arrives from configuration (CLI strings, YAML scalars) */
export type ConfigValue = string | number | boolean | null;

export interface OptionMetadata {
  /** Option name, case-sensitive */
  readonly name: string;
  readonly type: OptionType;
  /** Advertised default (null for buttons or when the engine gave none) */
  readonly default: OptionValue;
  /** Lower bound (spin only) */
  readonly min?: number;
  /** Upper bound (spin only) */
  readonly max?: number;
  /** Allowed values (combo only) */
  readonly vars?: readonly string[];
}

export interface SetOptionsResult {
  /** Values that were validated and sent, keyed by option name */
  applied: Record<string, OptionValue>;
  /** Per-key rejection messages */
  errors: Record<string, string>;
}

// =============================================================================
// Analysis
// =============================================================================

export type EngineScore =
  | { readonly type: 'cp'; readonly pawns: number }
  | { readonly type: 'mate'; readonly moves: number };

export interface AnalysisResult {
  /** Highest depth reported during the search */
  depth: number;
  score: EngineScore | null;
  /** Principal variation from the most recent `pv` */
  pv: string[];
  bestMove: string | null;
  ponder: string | null;
  /** True when the deadline fired before `bestmove` */
  timedOut: boolean;
}

export interface EngineId {
  name?: string;
  author?: string;
}

export interface PositionSpec {
  /** FEN; omitted means the standard starting position */
  fen?: string;
  moves?: readonly string[];
}

// =============================================================================
// Caller Contract
// =============================================================================

/**
 * Operations the request handler drives. One logical caller per instance.
 */
export interface ChessEngine {
  start(): Promise<void>;
  stop(): Promise<void>;
  analyze(fen: string, timeMs?: number): Promise<AnalysisResult>;
  setPosition(fen?: string, moves?: readonly string[]): Promise<void>;
  getBestMove(timeMs?: number): Promise<string | null>;
  newGame(): Promise<void>;
  getEngineId(): EngineId;
  getAvailableOptions(): Record<string, OptionMetadata>;
  setOptions(values: Record<string, unknown>): Promise<SetOptionsResult>;
  getCurrentOptionValues(): Record<string, OptionValue>;
  getState(): EngineHandshakeStateType;
  isReady(): boolean;
}

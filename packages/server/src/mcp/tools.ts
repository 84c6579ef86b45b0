/**
 * @fileoverview Tool handlers
 *
 * Maps MCP tool calls onto a ChessEngine. Every handler resolves to a tool
 * result: engine failures are reported as `isError` results carrying the
 * bridge error code, never thrown to the transport.
 */

import { randomUUID } from 'crypto';
import {
  formatScore,
  isBridgeError,
  withLoggingContext,
  type ChessEngine,
  type UciLogger,
} from '@chess-uci/engine';
import type { AnalyzePositionArgs, GetBestMoveArgs, SetOptionsArgs, SetPositionArgs } from './schemas.js';

// =============================================================================
// Types
// =============================================================================

export type ToolResult = {
  content: Array<{ type: 'text'; text: string }>;
  isError?: boolean;
};

export interface EngineDescription {
  /** Name from configuration, or the executable's file name */
  configuredName: string;
  path: string;
}

export const INTERNAL_ERROR_CODE = 'INTERNAL_ERROR';

export const TOOL_NAMES = {
  ANALYZE_POSITION: 'analyze_position',
  GET_BEST_MOVE: 'get_best_move',
  SET_POSITION: 'set_position',
  NEW_GAME: 'new_game',
  ENGINE_INFO: 'engine_info',
  LIST_OPTIONS: 'list_options',
  SET_OPTIONS: 'set_options',
} as const;

export type ToolName = (typeof TOOL_NAMES)[keyof typeof TOOL_NAMES];

export interface ToolHandlers {
  analyzePosition(args: AnalyzePositionArgs): Promise<ToolResult>;
  getBestMove(args: GetBestMoveArgs): Promise<ToolResult>;
  setPosition(args: SetPositionArgs): Promise<ToolResult>;
  newGame(): Promise<ToolResult>;
  engineInfo(): Promise<ToolResult>;
  listOptions(): Promise<ToolResult>;
  setOptions(args: SetOptionsArgs): Promise<ToolResult>;
}

// =============================================================================
// Results
// =============================================================================

export function jsonResult(value: unknown): ToolResult {
  return {
    content: [{ type: 'text', text: JSON.stringify(value, null, 2) }],
  };
}

export function errorResult(error: unknown): ToolResult {
  const code = isBridgeError(error) ? error.code : INTERNAL_ERROR_CODE;
  const message = error instanceof Error ? error.message : String(error);
  return {
    content: [{ type: 'text', text: JSON.stringify({ error: { code, message } }, null, 2) }],
    isError: true,
  };
}

// =============================================================================
// Handlers
// =============================================================================

export function createToolHandlers(engine: ChessEngine, description: EngineDescription, logger: UciLogger): ToolHandlers {
  const run = (toolName: ToolName, fn: () => Promise<unknown>): Promise<ToolResult> =>
    withLoggingContext({ toolName, callId: randomUUID() }, async () => {
      const done = logger.startTimer(`Tool ${toolName}`);
      try {
        const value = await fn();
        done();
        return jsonResult(value);
      } catch (error) {
        logger.warn('Tool call failed', {
          code: isBridgeError(error) ? error.code : INTERNAL_ERROR_CODE,
          error: error instanceof Error ? error.message : String(error),
        });
        return errorResult(error);
      }
    });

  return {
    analyzePosition: (args) =>
      run(TOOL_NAMES.ANALYZE_POSITION, async () => {
        const result = await engine.analyze(args.fen, args.time_ms);
        return {
          depth: result.depth,
          score: formatScore(result.score),
          pv: result.pv,
          best_move: result.bestMove,
          ponder: result.ponder,
          timed_out: result.timedOut,
        };
      }),

    getBestMove: (args) =>
      run(TOOL_NAMES.GET_BEST_MOVE, async () => {
        if (args.fen !== undefined || args.moves !== undefined) {
          await engine.setPosition(args.fen, args.moves);
        }
        return { move: await engine.getBestMove(args.time_ms) };
      }),

    setPosition: (args) =>
      run(TOOL_NAMES.SET_POSITION, async () => {
        await engine.setPosition(args.fen, args.moves);
        return { success: true };
      }),

    newGame: () =>
      run(TOOL_NAMES.NEW_GAME, async () => {
        await engine.newGame();
        return { success: true };
      }),

    engineInfo: () =>
      run(TOOL_NAMES.ENGINE_INFO, async () => {
        const id = engine.getEngineId();
        return {
          name: id.name ?? null,
          author: id.author ?? null,
          configured_name: description.configuredName,
          path: description.path,
          state: engine.getState(),
          option_values: engine.getCurrentOptionValues(),
        };
      }),

    listOptions: () => run(TOOL_NAMES.LIST_OPTIONS, async () => engine.getAvailableOptions()),

    setOptions: (args) => run(TOOL_NAMES.SET_OPTIONS, () => engine.setOptions(args.options)),
  };
}

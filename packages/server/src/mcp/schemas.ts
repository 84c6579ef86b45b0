/**
 * @fileoverview Tool input schemas
 *
 * Raw zod shapes handed to the MCP server, plus object forms for the
 * handler argument types.
 */

import { z } from 'zod';
import { MAX_THINK_TIME_MS } from '@chess-uci/engine';

const fen = z.string().min(1).describe('Position in Forsyth-Edwards Notation');
const timeMs = z
  .number()
  .int()
  .positive()
  .max(MAX_THINK_TIME_MS)
  .describe('Think time in milliseconds; the configured default when omitted');
const moves = z.array(z.string()).describe('Moves in UCI coordinate notation, applied after the position');
const optionValue = z.union([z.string(), z.number(), z.boolean(), z.null()]);

export const analyzePositionShape = {
  fen,
  time_ms: timeMs.optional(),
};

export const getBestMoveShape = {
  fen: fen.optional(),
  moves: moves.optional(),
  time_ms: timeMs.optional(),
};

export const setPositionShape = {
  fen: fen.optional().describe('Position in Forsyth-Edwards Notation; the starting position when omitted'),
  moves: moves.optional(),
};

export const setOptionsShape = {
  options: z.record(optionValue).describe('UCI option values keyed by option name'),
};

export const analyzePositionSchema = z.object(analyzePositionShape);
export const getBestMoveSchema = z.object(getBestMoveShape);
export const setPositionSchema = z.object(setPositionShape);
export const setOptionsSchema = z.object(setOptionsShape);

export type AnalyzePositionArgs = z.infer<typeof analyzePositionSchema>;
export type GetBestMoveArgs = z.infer<typeof getBestMoveSchema>;
export type SetPositionArgs = z.infer<typeof setPositionSchema>;
export type SetOptionsArgs = z.infer<typeof setOptionsSchema>;

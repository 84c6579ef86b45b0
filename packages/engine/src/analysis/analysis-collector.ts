/**
 * @fileoverview Analysis collection
 *
 * Folds `info` lines into an AnalysisResult until `bestmove` or a deadline.
 * Depth only ratchets upward, the score is overwritten and the principal
 * variation is replaced wholesale by the latest `pv`.
 */

import { EngineTimeoutError, ProcessClosedError } from '../errors/index.js';
import type { LineSource } from '../process/line-channel.js';
import { parseBestMoveLine, parseInfoLine, type BestMoveLine, type InfoUpdate } from '../protocol/uci-parser.js';
import type { AnalysisResult, EngineScore } from '../types/index.js';

export const DEFAULT_ANALYSIS_SLACK_MS = 500;

export function createAnalysisResult(): AnalysisResult {
  return {
    depth: 0,
    score: null,
    pv: [],
    bestMove: null,
    ponder: null,
    timedOut: false,
  };
}

/**
 * Apply one parsed `info` line. Secondary lines (`multipv` above 1) only
 * contribute depth; score and pv follow the primary line.
 */
export function applyInfoUpdate(result: AnalysisResult, update: InfoUpdate): AnalysisResult {
  const depth = update.depth !== undefined ? Math.max(result.depth, update.depth) : result.depth;
  if (update.multipv !== undefined && update.multipv > 1) {
    return { ...result, depth };
  }
  return {
    ...result,
    depth,
    score: update.score ?? result.score,
    pv: update.pv ? [...update.pv] : result.pv,
  };
}

export function applyBestMove(result: AnalysisResult, line: BestMoveLine): AnalysisResult {
  return {
    ...result,
    bestMove: line.bestMove,
    ponder: line.ponder ?? null,
  };
}

/**
 * Read engine output until `bestmove` or the deadline.
 *
 * A deadline is not an error: the partial result comes back with
 * `timedOut: true` and the search is still running on the engine side.
 */
export async function collectAnalysis(source: LineSource, deadline: number): Promise<AnalysisResult> {
  let result = createAnalysisResult();

  for (;;) {
    const read = await source.readLine(deadline);
    if (read.kind === 'timeout') {
      return { ...result, timedOut: true };
    }
    if (read.kind === 'closed') {
      throw new ProcessClosedError('Engine closed its output during analysis');
    }

    const bestMove = parseBestMoveLine(read.line);
    if (bestMove) {
      return applyBestMove(result, bestMove);
    }

    const info = parseInfoLine(read.line);
    if (info) {
      result = applyInfoUpdate(result, info);
    }
  }
}

/**
 * Wait for `bestmove` only, discarding everything else
 */
export async function awaitBestMove(source: LineSource, deadline: number, timeoutMs: number): Promise<BestMoveLine> {
  for (;;) {
    const read = await source.readLine(deadline);
    if (read.kind === 'timeout') {
      throw new EngineTimeoutError('bestmove', timeoutMs);
    }
    if (read.kind === 'closed') {
      throw new ProcessClosedError('Engine closed its output while waiting for bestmove');
    }
    const bestMove = parseBestMoveLine(read.line);
    if (bestMove) {
      return bestMove;
    }
  }
}

/**
 * Render a score for callers: pawns as a number, mates as `mateN`
 */
export function formatScore(score: EngineScore | null): number | string | null {
  if (score === null) {
    return null;
  }
  return score.type === 'cp' ? score.pawns : `mate${score.moves}`;
}

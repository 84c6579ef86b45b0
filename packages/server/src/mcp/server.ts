/**
 * @fileoverview MCP server construction
 *
 * Registers the engine tools on an McpServer. The transport is chosen by
 * the caller (stdio in production, in-memory in tests).
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { ChessEngine, UciLogger } from '@chess-uci/engine';
import { SERVER_NAME, SERVER_VERSION } from '../version.js';
import { analyzePositionShape, getBestMoveShape, setOptionsShape, setPositionShape } from './schemas.js';
import { TOOL_NAMES, createToolHandlers, type EngineDescription } from './tools.js';

export function createMcpServer(engine: ChessEngine, description: EngineDescription, logger: UciLogger): McpServer {
  const server = new McpServer({ name: SERVER_NAME, version: SERVER_VERSION });
  const handlers = createToolHandlers(engine, description, logger);

  server.tool(
    TOOL_NAMES.ANALYZE_POSITION,
    'Analyze a position for a fixed time and return depth, score, principal variation and best move',
    analyzePositionShape,
    (args) => handlers.analyzePosition(args)
  );

  server.tool(
    TOOL_NAMES.GET_BEST_MOVE,
    'Return the best move for the current position, or for the given position and moves',
    getBestMoveShape,
    (args) => handlers.getBestMove(args)
  );

  server.tool(
    TOOL_NAMES.SET_POSITION,
    'Set the current position from a FEN (or the starting position) and a move list',
    setPositionShape,
    (args) => handlers.setPosition(args)
  );

  server.tool(TOOL_NAMES.NEW_GAME, 'Tell the engine a new game is starting', () => handlers.newGame());

  server.tool(
    TOOL_NAMES.ENGINE_INFO,
    'Describe the engine: identity, configured name, path, state and current option values',
    () => handlers.engineInfo()
  );

  server.tool(TOOL_NAMES.LIST_OPTIONS, 'List the options the engine advertised', () => handlers.listOptions());

  server.tool(
    TOOL_NAMES.SET_OPTIONS,
    'Validate and apply engine option values; each key is applied or reported as an error',
    setOptionsShape,
    (args) => handlers.setOptions(args)
  );

  return server;
}

/**
 * @fileoverview chess-uci MCP Server Entry Point
 *
 * Starts one engine bridge and exposes it as MCP tools over a transport
 * (stdio unless one is supplied).
 */
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import type { Transport } from '@modelcontextprotocol/sdk/shared/transport.js';
import { UciBridge, createLogger, type ChessEngine, type UciLogger } from '@chess-uci/engine';
import { createMcpServer } from './mcp/server.js';
import { getConfiguredEngineName } from './settings/loader.js';
import type { ChessUciSettings } from './settings/types.js';

// =============================================================================
// Types
// =============================================================================

export interface ChessUciServerConfig {
  settings: ChessUciSettings;
  logger?: UciLogger;
  /** Engine to expose; a UciBridge built from the settings when omitted */
  engine?: ChessEngine;
  /** MCP transport; stdio when omitted */
  transport?: Transport;
}

// =============================================================================
// Server
// =============================================================================

export class ChessUciServer {
  private config: ChessUciServerConfig;
  private logger: UciLogger;
  private engine: ChessEngine | null = null;
  private mcpServer: McpServer | null = null;
  private isRunning = false;
  private isStarting = false;
  private stopPromise: Promise<void> | null = null;
  private closeListeners: Array<() => void> = [];

  constructor(config: ChessUciServerConfig) {
    this.config = config;
    this.logger = config.logger ?? createLogger('server', config.settings.logging);
  }

  async start(): Promise<void> {
    if (this.isRunning || this.isStarting || this.stopPromise) {
      throw new Error('Server is already running');
    }
    this.isStarting = true;

    const { settings } = this.config;
    this.logger.info('Starting chess UCI server...', { enginePath: settings.engine.path });

    // Visible to stop() while the handshake is in flight
    const engine = this.config.engine ?? this.createBridge(settings);
    this.engine = engine;

    try {
      await engine.start();
    } catch (error) {
      this.isStarting = false;
      this.engine = null;
      throw error;
    }
    this.throwIfStopped();

    const mcpServer = createMcpServer(
      engine,
      { configuredName: getConfiguredEngineName(settings), path: settings.engine.path },
      this.logger.child({ component: 'mcp' })
    );
    mcpServer.server.onclose = () => {
      this.handleTransportClosed();
    };

    try {
      await mcpServer.connect(this.config.transport ?? new StdioServerTransport());
    } catch (error) {
      this.isStarting = false;
      await engine.stop();
      this.engine = null;
      throw error;
    }

    if (this.stopPromise) {
      await mcpServer.close();
      this.throwIfStopped();
    }

    this.mcpServer = mcpServer;
    this.isStarting = false;
    this.isRunning = true;

    const id = engine.getEngineId();
    this.logger.info('chess UCI server started', {
      engine: id.name ?? getConfiguredEngineName(settings),
      options: Object.keys(engine.getAvailableOptions()).length,
    });
  }

  /**
   * Close the transport, then stop the engine. Safe to call repeatedly.
   */
  stop(): Promise<void> {
    if (!this.isRunning && !this.isStarting) {
      return this.stopPromise ?? Promise.resolve();
    }
    this.isRunning = false;
    this.isStarting = false;
    this.stopPromise ??= this.shutdown();
    return this.stopPromise;
  }

  /**
   * Register a listener for the client side closing the transport
   */
  onClose(listener: () => void): () => void {
    this.closeListeners.push(listener);
    return () => {
      this.closeListeners = this.closeListeners.filter((l) => l !== listener);
    };
  }

  getIsRunning(): boolean {
    return this.isRunning;
  }

  getEngine(): ChessEngine | null {
    return this.engine;
  }

  private createBridge(settings: ChessUciSettings): UciBridge {
    return new UciBridge({
      enginePath: settings.engine.path,
      options: settings.engine.options,
      args: settings.engine.args,
      defaultThinkTimeMs: settings.defaultThinkTimeMs,
      timeouts: settings.timeouts,
      logger: this.logger.child({ component: 'uci-bridge' }),
    });
  }

  private handleTransportClosed(): void {
    if (!this.isRunning) {
      return;
    }
    this.logger.info('MCP transport closed');
    for (const listener of this.closeListeners) {
      listener();
    }
  }

  private throwIfStopped(): void {
    if (this.stopPromise) {
      throw new Error('Server was stopped during start');
    }
  }

  private async shutdown(): Promise<void> {
    this.logger.info('Stopping chess UCI server...');

    if (this.mcpServer) {
      try {
        await this.mcpServer.close();
      } catch (error) {
        this.logger.warn('Failed to close MCP transport', {
          error: error instanceof Error ? error.message : String(error),
        });
      }
      this.mcpServer = null;
    }

    if (this.engine) {
      await this.engine.stop();
      this.engine = null;
    }

    this.logger.info('chess UCI server stopped');
  }
}

// =============================================================================
// Exports
// =============================================================================

export { createMcpServer } from './mcp/server.js';
export {
  createToolHandlers,
  errorResult,
  jsonResult,
  INTERNAL_ERROR_CODE,
  TOOL_NAMES,
  type EngineDescription,
  type ToolHandlers,
  type ToolName,
  type ToolResult,
} from './mcp/tools.js';
export * from './mcp/schemas.js';
export * from './settings/index.js';
export { SERVER_NAME, SERVER_VERSION } from './version.js';

/**
 * @fileoverview Settings Type Definitions
 *
 * Resolved settings for the MCP server and the partial layers (file,
 * environment, command line) merged over the defaults.
 */

import type { BridgeTimeouts, ConfigValue, LogLevel } from '@chess-uci/engine';

export interface EngineSettings {
  /** Engine executable; `~` is expanded */
  path: string;
  /** Display name; defaults to the executable's file name */
  name?: string;
  /** UCI options applied after the handshake */
  options: Record<string, ConfigValue>;
  /** Extra command-line arguments for the engine */
  args: string[];
}

export interface LoggingSettings {
  level: LogLevel;
  /** Pretty output; unset means pretty unless NODE_ENV is production */
  pretty?: boolean;
}

export interface ChessUciSettings {
  engine: EngineSettings;
  /** Think time for calls that omit one */
  defaultThinkTimeMs: number;
  timeouts: BridgeTimeouts;
  logging: LoggingSettings;
}

/**
 * One settings layer. Present keys replace the layer below; the engine
 * option map is replaced as a whole.
 */
export interface UserSettings {
  engine?: Partial<EngineSettings>;
  defaultThinkTimeMs?: number;
  timeouts?: Partial<BridgeTimeouts>;
  logging?: Partial<LoggingSettings>;
}

export interface LoadedSettings {
  settings: ChessUciSettings;
  /** Configuration file the settings came from, if any */
  source: string | null;
}

/**
 * @fileoverview Default Settings
 *
 * Fallback values used when neither a configuration file, the environment
 * nor the command line sets a value.
 */

import { existsSync } from 'fs';
import { DEFAULT_BRIDGE_TIMEOUTS, DEFAULT_THINK_TIME_MS, type ConfigValue } from '@chess-uci/engine';
import type { ChessUciSettings } from './types.js';

export const DEFAULT_ENGINE_PATH = '/usr/local/bin/stockfish';

export const WINDOWS_ENGINE_PATHS = [
  'C:\\Program Files\\Stockfish\\stockfish.exe',
  'C:\\Program Files (x86)\\Stockfish\\stockfish.exe',
];

/** Options written to a freshly generated configuration file */
export const DEFAULT_ENGINE_OPTIONS: Record<string, ConfigValue> = {
  Threads: 4,
  Hash: 128,
};

/**
 * Platform default engine location; on Windows the first existing
 * install directory wins.
 */
export function getDefaultEnginePath(
  platform: NodeJS.Platform = process.platform,
  fileExists: (path: string) => boolean = existsSync
): string {
  if (platform !== 'win32') {
    return DEFAULT_ENGINE_PATH;
  }
  return WINDOWS_ENGINE_PATHS.find((path) => fileExists(path)) ?? WINDOWS_ENGINE_PATHS[0] ?? DEFAULT_ENGINE_PATH;
}

export function getDefaultSettings(platform: NodeJS.Platform = process.platform): ChessUciSettings {
  return {
    engine: {
      path: getDefaultEnginePath(platform),
      options: { ...DEFAULT_ENGINE_OPTIONS },
      args: [],
    },
    defaultThinkTimeMs: DEFAULT_THINK_TIME_MS,
    timeouts: { ...DEFAULT_BRIDGE_TIMEOUTS },
    logging: {
      level: 'info',
    },
  };
}

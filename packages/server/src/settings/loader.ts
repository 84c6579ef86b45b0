/**
 * @fileoverview Settings Loader
 *
 * Resolves settings in layers: built-in defaults, then the configuration
 * file, then the environment, then command-line overrides.
 *
 * The file is the explicit `--config` path when given (missing or invalid
 * is fatal), otherwise the first existing default location (invalid files
 * there are reported and skipped).
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import YAML from 'yaml';
import { getDefaultSettings } from './defaults.js';
import { readEnvOverrides, type EnvParseLogger } from './env-parsing.js';
import { formatIssues, fromSettingsFile, settingsFileSchema, toSettingsFile } from './schema.js';
import type { ChessUciSettings, LoadedSettings, UserSettings } from './types.js';

// =============================================================================
// Errors
// =============================================================================

export class ConfigError extends Error {
  override readonly name = 'ConfigError';
  readonly code = 'CONFIG_ERROR';

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

// =============================================================================
// Paths
// =============================================================================

export const CONFIG_DIR = 'chess-uci';
export const CONFIG_FILE = 'config.yaml';

/**
 * Expand a leading `~` to the home directory
 */
export function expandHome(filePath: string, homeDir: string = os.homedir()): string {
  if (filePath === '~') {
    return homeDir;
  }
  if (filePath.startsWith('~/') || filePath.startsWith('~\\')) {
    return path.join(homeDir, filePath.slice(2));
  }
  return filePath;
}

/**
 * Configuration files searched when no explicit path is given, in order
 */
export function getDefaultConfigLocations(cwd: string = process.cwd(), homeDir: string = os.homedir()): string[] {
  return [
    path.join(cwd, 'chess-uci.yaml'),
    path.join(cwd, 'config.yaml'),
    path.join(homeDir, '.config', CONFIG_DIR, CONFIG_FILE),
    path.join('/etc', CONFIG_DIR, CONFIG_FILE),
  ];
}

// =============================================================================
// Merge
// =============================================================================

/**
 * Apply one settings layer over another. The engine option map and the
 * argument list are replaced, not merged.
 */
export function mergeSettings(base: ChessUciSettings, layer: UserSettings): ChessUciSettings {
  return {
    engine: {
      path: layer.engine?.path ?? base.engine.path,
      name: layer.engine?.name ?? base.engine.name,
      options: { ...(layer.engine?.options ?? base.engine.options) },
      args: [...(layer.engine?.args ?? base.engine.args)],
    },
    defaultThinkTimeMs: layer.defaultThinkTimeMs ?? base.defaultThinkTimeMs,
    timeouts: {
      handshakeMs: layer.timeouts?.handshakeMs ?? base.timeouts.handshakeMs,
      readyMs: layer.timeouts?.readyMs ?? base.timeouts.readyMs,
      quitGraceMs: layer.timeouts?.quitGraceMs ?? base.timeouts.quitGraceMs,
      analysisSlackMs: layer.timeouts?.analysisSlackMs ?? base.timeouts.analysisSlackMs,
      bestMoveGraceMs: layer.timeouts?.bestMoveGraceMs ?? base.timeouts.bestMoveGraceMs,
    },
    logging: {
      level: layer.logging?.level ?? base.logging.level,
      pretty: layer.logging?.pretty ?? base.logging.pretty,
    },
  };
}

// =============================================================================
// Loading
// =============================================================================

/**
 * Parse and validate configuration file content
 */
export function parseSettingsFile(content: string, filePath: string): UserSettings {
  let raw: unknown;
  try {
    raw = YAML.parse(content);
  } catch (error) {
    throw new ConfigError(
      `Failed to parse configuration ${filePath}: ${error instanceof Error ? error.message : String(error)}`,
      { cause: error }
    );
  }

  const result = settingsFileSchema.safeParse(raw ?? {});
  if (!result.success) {
    throw new ConfigError(`Invalid configuration ${filePath}: ${formatIssues(result.error)}`, { cause: result.error });
  }
  return fromSettingsFile(result.data);
}

/**
 * Read and parse one configuration file
 */
export function loadSettingsFile(filePath: string): UserSettings {
  let content: string;
  try {
    content = fs.readFileSync(filePath, 'utf-8');
  } catch (error) {
    const code = error instanceof Error && 'code' in error ? error.code : undefined;
    if (code === 'ENOENT') {
      throw new ConfigError(`Configuration file not found: ${filePath}`, { cause: error });
    }
    throw new ConfigError(
      `Failed to read configuration ${filePath}: ${error instanceof Error ? error.message : String(error)}`,
      { cause: error }
    );
  }
  return parseSettingsFile(content, filePath);
}

export interface LoadSettingsOptions {
  /** Explicit configuration file; must exist */
  configPath?: string;
  /** Layer applied last (command-line flags) */
  overrides?: UserSettings;
  env?: NodeJS.ProcessEnv;
  cwd?: string;
  homeDir?: string;
  /** Search list used without an explicit path */
  locations?: string[];
  logger?: EnvParseLogger;
}

export function loadSettings(options: LoadSettingsOptions = {}): LoadedSettings {
  const homeDir = options.homeDir ?? os.homedir();
  const cwd = options.cwd ?? process.cwd();

  let fileLayer: UserSettings = {};
  let source: string | null = null;

  if (options.configPath) {
    source = path.resolve(cwd, expandHome(options.configPath, homeDir));
    fileLayer = loadSettingsFile(source);
  } else {
    for (const location of options.locations ?? getDefaultConfigLocations(cwd, homeDir)) {
      if (!fs.existsSync(location)) {
        continue;
      }
      try {
        fileLayer = loadSettingsFile(location);
        source = location;
        break;
      } catch (error) {
        options.logger?.warn('Skipping unreadable configuration', {
          path: location,
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }
  }

  const layers: UserSettings[] = [fileLayer, readEnvOverrides(options.env ?? process.env, options.logger)];
  if (options.overrides) {
    layers.push(options.overrides);
  }

  const merged = layers.reduce(mergeSettings, getDefaultSettings());
  const settings: ChessUciSettings = {
    ...merged,
    engine: { ...merged.engine, path: expandHome(merged.engine.path, homeDir) },
  };

  return { settings, source };
}

/**
 * Display name for the configured engine
 */
export function getConfiguredEngineName(settings: ChessUciSettings): string {
  return settings.engine.name ?? path.basename(settings.engine.path);
}

/**
 * Write a default configuration file, creating parent directories
 */
export function createDefaultConfigFile(filePath: string): void {
  const defaults = getDefaultSettings();
  const file = toSettingsFile({
    ...defaults,
    engine: { ...defaults.engine, name: 'Stockfish' },
  });

  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  fs.writeFileSync(filePath, YAML.stringify(file), 'utf-8');
}

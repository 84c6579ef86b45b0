/**
 * @fileoverview chess-uci-mcp CLI
 *
 * Argument parsing, settings resolution and process lifecycle for the
 * stdio MCP server.
 */
import * as path from 'path';
import { parseArgs } from 'util';
import { MAX_THINK_TIME_MS, createLogger, toError, type ConfigValue, type UciLogger } from '@chess-uci/engine';
import { ChessUciServer } from './index.js';
import type { EnvParseLogger } from './settings/env-parsing.js';
import { ConfigError, createDefaultConfigFile, getDefaultConfigLocations, loadSettings, mergeSettings } from './settings/loader.js';
import type { ChessUciSettings, UserSettings } from './settings/types.js';
import { SERVER_NAME, SERVER_VERSION } from './version.js';

// =============================================================================
// Argument Parsing
// =============================================================================

export type CliCommand = 'help' | 'version' | 'init-config' | 'serve';

export interface CliArgs {
  command: CliCommand;
  enginePath?: string;
  configPath?: string;
  /** `-o NAME=VALUE` pairs; values are coerced against the engine's metadata */
  options: Record<string, string>;
  thinkTimeMs?: number;
  debug: boolean;
  initConfigPath?: string;
}

export class CliError extends Error {
  override readonly name = 'CliError';
}

function parseOptionAssignment(raw: string): [string, string] {
  const separator = raw.indexOf('=');
  const name = separator === -1 ? '' : raw.slice(0, separator).trim();
  if (name.length === 0) {
    throw new CliError(`Invalid --option "${raw}": expected NAME=VALUE`);
  }
  return [name, raw.slice(separator + 1)];
}

function parseThinkTime(raw: string): number {
  const value = /^\d+$/.test(raw.trim()) ? Number(raw.trim()) : NaN;
  if (!Number.isSafeInteger(value) || value < 1 || value > MAX_THINK_TIME_MS) {
    throw new CliError(`Invalid --think-time "${raw}": expected an integer from 1 to ${MAX_THINK_TIME_MS}`);
  }
  return value;
}

export function parseCliArgs(argv: string[]): CliArgs {
  let parsed: ReturnType<typeof parseRaw>;
  try {
    parsed = parseRaw(argv);
  } catch (error) {
    throw new CliError(toError(error).message);
  }
  const { values, positionals } = parsed;

  if (positionals.length > 1) {
    throw new CliError(`Unexpected arguments: ${positionals.slice(1).join(' ')}`);
  }

  const options: Record<string, string> = {};
  for (const raw of values.option ?? []) {
    const [name, value] = parseOptionAssignment(raw);
    options[name] = value;
  }

  let command: CliCommand = 'serve';
  if (values.help) {
    command = 'help';
  } else if (values.version) {
    command = 'version';
  } else if (values['init-config'] !== undefined) {
    command = 'init-config';
  }

  return {
    command,
    enginePath: positionals[0],
    configPath: values.config,
    options,
    thinkTimeMs: values['think-time'] !== undefined ? parseThinkTime(values['think-time']) : undefined,
    debug: values.debug ?? false,
    initConfigPath: values['init-config'],
  };
}

function parseRaw(argv: string[]) {
  return parseArgs({
    args: argv,
    options: {
      config: { type: 'string', short: 'c' },
      option: { type: 'string', short: 'o', multiple: true },
      'think-time': { type: 'string', short: 't' },
      debug: { type: 'boolean', short: 'd' },
      'init-config': { type: 'string' },
      help: { type: 'boolean', short: 'h' },
      version: { type: 'boolean', short: 'v' },
    },
    allowPositionals: true,
    strict: true,
  });
}

/**
 * Settings layer for flags that replace configured values
 */
export function buildCliOverrides(args: CliArgs): UserSettings {
  const overrides: UserSettings = {};
  if (args.enginePath !== undefined) {
    overrides.engine = { path: args.enginePath };
  }
  if (args.thinkTimeMs !== undefined) {
    overrides.defaultThinkTimeMs = args.thinkTimeMs;
  }
  if (args.debug) {
    overrides.logging = { level: 'debug' };
  }
  return overrides;
}

/**
 * Add `-o` values to the configured option map, key by key
 */
export function applyCliOptions(settings: ChessUciSettings, options: Record<string, string>): ChessUciSettings {
  if (Object.keys(options).length === 0) {
    return settings;
  }
  const merged: Record<string, ConfigValue> = { ...settings.engine.options, ...options };
  return mergeSettings(settings, { engine: { options: merged } });
}

export function printHelp(): void {
  console.log(`
${SERVER_NAME} - MCP server for UCI chess engines

USAGE:
  ${SERVER_NAME} [ENGINE_PATH] [options]

ARGUMENTS:
  [ENGINE_PATH]              Engine executable (overrides the configuration file)

OPTIONS:
  -c, --config <file>        Configuration file (YAML)
  -o, --option <NAME=VALUE>  Set a UCI option; repeatable (e.g. -o Threads=4)
  -t, --think-time <ms>      Default thinking time in milliseconds (default: 1000)
  -d, --debug                Enable debug logging
  --init-config <file>       Write a default configuration file and exit
  -h, --help                 Show this help message
  -v, --version              Show version number

CONFIGURATION FILES (first found wins when --config is not given):
${getDefaultConfigLocations()
  .map((location) => `  ${location}`)
  .join('\n')}

ENVIRONMENT:
  CHESS_UCI_ENGINE_PATH      Engine executable
  CHESS_UCI_THINK_TIME_MS    Default thinking time in milliseconds
  CHESS_UCI_LOG_PRETTY       Pretty log output (true/false)
  LOG_LEVEL                  Log level (trace, debug, info, warn, error, fatal, silent)

Logs are written to stderr; stdout carries the MCP protocol.
`);
}

// =============================================================================
// Deferred warnings
// =============================================================================

/**
 * Collects settings warnings raised before the logger exists
 */
export class DeferredWarnings implements EnvParseLogger {
  private entries: Array<{ message: string; context?: Record<string, unknown> }> = [];

  get size(): number {
    return this.entries.length;
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.entries.push({ message, context });
  }

  replay(logger: Pick<UciLogger, 'warn'>): void {
    for (const entry of this.entries) {
      logger.warn(entry.message, entry.context);
    }
    this.entries = [];
  }
}

// =============================================================================
// Main
// =============================================================================

export async function main(argv: string[] = process.argv.slice(2)): Promise<void> {
  let args: CliArgs;
  try {
    args = parseCliArgs(argv);
  } catch (error) {
    if (error instanceof CliError) {
      console.error(`${error.message}\nRun ${SERVER_NAME} --help for usage.`);
      process.exit(2);
    }
    throw error;
  }

  switch (args.command) {
    case 'help':
      printHelp();
      return;
    case 'version':
      console.log(`${SERVER_NAME} v${SERVER_VERSION}`);
      return;
    case 'init-config': {
      const target = path.resolve(args.initConfigPath ?? '');
      createDefaultConfigFile(target);
      console.error(`Wrote default configuration to ${target}`);
      return;
    }
    case 'serve':
      break;
  }

  const warnings = new DeferredWarnings();
  let settings: ChessUciSettings;
  let source: string | null;
  try {
    const loaded = loadSettings({ configPath: args.configPath, overrides: buildCliOverrides(args), logger: warnings });
    settings = applyCliOptions(loaded.settings, args.options);
    source = loaded.source;
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error(error.message);
      process.exit(1);
    }
    throw error;
  }

  const logger = createLogger('server', settings.logging);
  warnings.replay(logger);

  logger.info('Starting chess UCI MCP bridge', {
    enginePath: settings.engine.path,
    thinkTimeMs: settings.defaultThinkTimeMs,
    configSource: source ?? 'defaults',
    options: settings.engine.options,
  });

  const server = new ChessUciServer({ settings, logger });

  let exiting = false;
  const shutdown = async (reason: string): Promise<void> => {
    if (exiting) {
      return;
    }
    exiting = true;
    logger.info(`Received ${reason}, shutting down...`);
    try {
      await server.stop();
      process.exit(0);
    } catch (error) {
      logger.error('Shutdown failed', toError(error));
      process.exit(1);
    }
  };

  process.on('SIGINT', () => void shutdown('SIGINT'));
  process.on('SIGTERM', () => void shutdown('SIGTERM'));
  server.onClose(() => void shutdown('transport close'));
  // The stdio transport does not report end of input itself
  process.stdin.once('end', () => void shutdown('end of input'));

  process.on('uncaughtException', (error) => {
    logger.error('Uncaught exception', error);
    process.exit(1);
  });

  process.on('unhandledRejection', (reason) => {
    logger.error('Unhandled rejection', { reason });
    process.exit(1);
  });

  try {
    await server.start();
  } catch (error) {
    logger.error('Failed to start server', toError(error));
    process.exit(1);
  }

  logger.info('Server ready, waiting for MCP requests on stdio');
}

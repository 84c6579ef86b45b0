/**
 * @fileoverview Environment parsing helpers
 *
 * Strict parsing for environment-driven settings. Invalid values are
 * reported through the supplied logger and ignored.
 */

import { MAX_THINK_TIME_MS, isLogLevel } from '@chess-uci/engine';
import type { UserSettings } from './types.js';

export interface EnvParseLogger {
  warn: (message: string, context?: Record<string, unknown>) => void;
}

export interface ParseOptionalIntegerOptions {
  name: string;
  min?: number;
  max?: number;
  logger?: EnvParseLogger;
}

export interface ParseOptionalBooleanOptions {
  name: string;
  logger?: EnvParseLogger;
}

export const ENV_ENGINE_PATH = 'CHESS_UCI_ENGINE_PATH';
export const ENV_THINK_TIME_MS = 'CHESS_UCI_THINK_TIME_MS';
export const ENV_LOG_PRETTY = 'CHESS_UCI_LOG_PRETTY';
export const ENV_LOG_LEVEL = 'LOG_LEVEL';

const TRUE_VALUES = new Set(['true', '1', 'yes', 'on']);
const FALSE_VALUES = new Set(['false', '0', 'no', 'off']);
const INTEGER_PATTERN = /^-?\d+$/;

function logInvalid(logger: EnvParseLogger | undefined, name: string, raw: string, reason: string): void {
  logger?.warn('Invalid environment value, ignoring', {
    variable: name,
    value: raw,
    reason,
  });
}

function parseStrictInteger(raw: string, options: { min?: number; max?: number }): { value?: number; reason?: string } {
  const normalized = raw.trim();
  if (normalized.length === 0 || !INTEGER_PATTERN.test(normalized)) {
    return { reason: 'not_an_integer' };
  }

  const value = Number(normalized);
  if (!Number.isSafeInteger(value)) {
    return { reason: 'not_a_safe_integer' };
  }

  if (options.min !== undefined && value < options.min) {
    return { reason: `below_min_${options.min}` };
  }

  if (options.max !== undefined && value > options.max) {
    return { reason: `above_max_${options.max}` };
  }

  return { value };
}

/**
 * Parse an optional integer environment value.
 * Returns undefined when value is missing or invalid.
 */
export function parseOptionalInteger(raw: string | undefined, options: ParseOptionalIntegerOptions): number | undefined {
  if (raw === undefined) {
    return undefined;
  }

  const parsed = parseStrictInteger(raw, options);
  if (parsed.value === undefined) {
    logInvalid(options.logger, options.name, raw, parsed.reason ?? 'invalid_integer');
  }
  return parsed.value;
}

/**
 * Parse an optional boolean environment value.
 * Returns undefined when value is missing or invalid.
 */
export function parseOptionalBoolean(raw: string | undefined, options: ParseOptionalBooleanOptions): boolean | undefined {
  if (raw === undefined) {
    return undefined;
  }

  const normalized = raw.trim().toLowerCase();
  if (TRUE_VALUES.has(normalized)) {
    return true;
  }
  if (FALSE_VALUES.has(normalized)) {
    return false;
  }

  logInvalid(options.logger, options.name, raw, 'invalid_boolean');
  return undefined;
}

/**
 * Settings layer read from the environment
 */
export function readEnvOverrides(env: NodeJS.ProcessEnv, logger?: EnvParseLogger): UserSettings {
  const overrides: UserSettings = {};

  const enginePath = env[ENV_ENGINE_PATH]?.trim();
  if (enginePath) {
    overrides.engine = { path: enginePath };
  }

  const thinkTime = parseOptionalInteger(env[ENV_THINK_TIME_MS], {
    name: ENV_THINK_TIME_MS,
    min: 1,
    max: MAX_THINK_TIME_MS,
    logger,
  });
  if (thinkTime !== undefined) {
    overrides.defaultThinkTimeMs = thinkTime;
  }

  const rawLevel = env[ENV_LOG_LEVEL];
  const pretty = parseOptionalBoolean(env[ENV_LOG_PRETTY], { name: ENV_LOG_PRETTY, logger });
  if (rawLevel !== undefined && !isLogLevel(rawLevel)) {
    logInvalid(logger, ENV_LOG_LEVEL, rawLevel, 'unknown_log_level');
  }
  if (isLogLevel(rawLevel) || pretty !== undefined) {
    overrides.logging = {
      ...(isLogLevel(rawLevel) && { level: rawLevel }),
      ...(pretty !== undefined && { pretty }),
    };
  }

  return overrides;
}

/**
 * @fileoverview Configuration file schema
 *
 * The YAML file uses snake_case keys; they are validated with zod and
 * mapped onto the camelCase settings layer.
 */

import { z } from 'zod';
import { LOG_LEVELS, MAX_THINK_TIME_MS } from '@chess-uci/engine';
import type { ChessUciSettings, UserSettings } from './types.js';

const configValueSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);
const timeoutSchema = z.number().int().positive();

export const settingsFileSchema = z.object({
  engine: z
    .object({
      path: z.string().min(1).optional(),
      name: z.string().min(1).optional(),
      options: z.record(configValueSchema).nullish(),
      args: z.array(z.string()).optional(),
    })
    .optional(),
  default_think_time: z.number().int().positive().max(MAX_THINK_TIME_MS).optional(),
  timeouts: z
    .object({
      handshake_ms: timeoutSchema.optional(),
      ready_ms: timeoutSchema.optional(),
      quit_grace_ms: timeoutSchema.optional(),
      analysis_slack_ms: timeoutSchema.optional(),
      best_move_grace_ms: timeoutSchema.optional(),
    })
    .optional(),
  logging: z
    .object({
      level: z.enum(LOG_LEVELS).optional(),
      pretty: z.boolean().optional(),
    })
    .optional(),
});

export type SettingsFile = z.infer<typeof settingsFileSchema>;

/**
 * Map a validated file onto a settings layer, keeping only keys the file set
 */
export function fromSettingsFile(file: SettingsFile): UserSettings {
  const settings: UserSettings = {};

  if (file.engine) {
    const { path, name, options, args } = file.engine;
    settings.engine = {
      ...(path !== undefined && { path }),
      ...(name !== undefined && { name }),
      ...(options !== undefined && { options: options ?? {} }),
      ...(args !== undefined && { args }),
    };
  }

  if (file.default_think_time !== undefined) {
    settings.defaultThinkTimeMs = file.default_think_time;
  }

  if (file.timeouts) {
    const timeouts = file.timeouts;
    settings.timeouts = {
      ...(timeouts.handshake_ms !== undefined && { handshakeMs: timeouts.handshake_ms }),
      ...(timeouts.ready_ms !== undefined && { readyMs: timeouts.ready_ms }),
      ...(timeouts.quit_grace_ms !== undefined && { quitGraceMs: timeouts.quit_grace_ms }),
      ...(timeouts.analysis_slack_ms !== undefined && { analysisSlackMs: timeouts.analysis_slack_ms }),
      ...(timeouts.best_move_grace_ms !== undefined && { bestMoveGraceMs: timeouts.best_move_grace_ms }),
    };
  }

  if (file.logging) {
    settings.logging = { ...file.logging };
  }

  return settings;
}

/**
 * Inverse of fromSettingsFile, used to write configuration files
 */
export function toSettingsFile(settings: ChessUciSettings): SettingsFile {
  return {
    engine: {
      path: settings.engine.path,
      ...(settings.engine.name !== undefined && { name: settings.engine.name }),
      options: { ...settings.engine.options },
      ...(settings.engine.args.length > 0 && { args: [...settings.engine.args] }),
    },
    default_think_time: settings.defaultThinkTimeMs,
    timeouts: {
      handshake_ms: settings.timeouts.handshakeMs,
      ready_ms: settings.timeouts.readyMs,
      quit_grace_ms: settings.timeouts.quitGraceMs,
      analysis_slack_ms: settings.timeouts.analysisSlackMs,
      best_move_grace_ms: settings.timeouts.bestMoveGraceMs,
    },
    logging: {
      level: settings.logging.level,
      ...(settings.logging.pretty !== undefined && { pretty: settings.logging.pretty }),
    },
  };
}

/**
 * Render zod issues as `path: message` lines
 */
export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
}

/**
 * @fileoverview Option registry
 *
 * Holds the option metadata an engine advertised during the handshake,
 * validates requested values against it and caches what was applied.
 */

import { InvalidOptionValueError, UnsupportedOptionError, isBridgeError } from '../errors/index.js';
import { formatSetOption, hasControlCharacters } from '../protocol/commands.js';
import type { ConfigValue, OptionMetadata, OptionValue, SetOptionsResult } from '../types/index.js';

// =============================================================================
// Types
// =============================================================================

export interface PreparedOption {
  name: string;
  value: OptionValue;
  /** The `setoption` line to send */
  command: string;
  /** Buttons are actions, not state, and are never cached */
  cacheable: boolean;
}

export interface PreparedOptions {
  commands: PreparedOption[];
  errors: Record<string, string>;
}

const INTEGER_STRING = /^-?\d+$/;
const CONTROL_CHARACTER_REASON = 'value must not contain control characters';

function describe(value: unknown): string {
  if (value === null) {
    return 'null';
  }
  if (Array.isArray(value)) {
    return 'array';
  }
  return typeof value;
}

// =============================================================================
// Registry
// =============================================================================

export class OptionRegistry {
  private readonly metadata = new Map<string, OptionMetadata>();
  private readonly current = new Map<string, OptionValue>();

  constructor(options: readonly OptionMetadata[] = []) {
    for (const option of options) {
      this.metadata.set(option.name, option);
    }
  }

  get size(): number {
    return this.metadata.size;
  }

  has(name: string): boolean {
    return this.metadata.has(name);
  }

  get(name: string): OptionMetadata | undefined {
    return this.metadata.get(name);
  }

  /**
   * Advertised metadata keyed by option name, in advertisement order
   */
  list(): Record<string, OptionMetadata> {
    return Object.fromEntries(this.metadata);
  }

  /**
   * Snapshot of the values applied so far
   */
  currentValues(): Record<string, OptionValue> {
    return Object.fromEntries(this.current);
  }

  /**
   * Check one value against the option's metadata and return the value to
   * send. Throws UnsupportedOptionError or InvalidOptionValueError.
   */
  validate(name: string, value: unknown): OptionValue {
    const option = this.metadata.get(name);
    if (!option) {
      throw new UnsupportedOptionError(name);
    }

    switch (option.type) {
      case 'check':
        if (typeof value !== 'boolean') {
          throw new InvalidOptionValueError(name, `expected boolean, got ${describe(value)}`);
        }
        return value;

      case 'spin':
        if (typeof value !== 'number' || !Number.isInteger(value)) {
          throw new InvalidOptionValueError(name, `expected integer, got ${describe(value)}`);
        }
        if (option.min !== undefined && value < option.min) {
          throw new InvalidOptionValueError(name, `${value} is below minimum ${option.min}`);
        }
        if (option.max !== undefined && value > option.max) {
          throw new InvalidOptionValueError(name, `${value} is above maximum ${option.max}`);
        }
        return value;

      case 'combo': {
        if (typeof value !== 'string') {
          throw new InvalidOptionValueError(name, `expected string, got ${describe(value)}`);
        }
        if (hasControlCharacters(value)) {
          throw new InvalidOptionValueError(name, CONTROL_CHARACTER_REASON);
        }
        const allowed = option.vars ?? [];
        const match = allowed.find((candidate) => candidate.toLowerCase() === value.toLowerCase());
        if (match === undefined) {
          throw new InvalidOptionValueError(name, `"${value}" is not one of: ${allowed.join(', ')}`);
        }
        return match;
      }

      case 'string':
        if (value !== null && typeof value !== 'string') {
          throw new InvalidOptionValueError(name, `expected string or null, got ${describe(value)}`);
        }
        if (value !== null && hasControlCharacters(value)) {
          throw new InvalidOptionValueError(name, CONTROL_CHARACTER_REASON);
        }
        return value;

      case 'button':
        if (value !== null && value !== undefined && value !== true) {
          throw new InvalidOptionValueError(name, 'buttons take no value');
        }
        return null;
    }
  }

  /**
   * Validate every entry independently. Each input key lands in exactly one
   * of the returned commands or errors.
   */
  prepare(values: Record<string, unknown>): PreparedOptions {
    const commands: PreparedOption[] = [];
    const errors: Record<string, string> = {};

    for (const [name, raw] of Object.entries(values)) {
      const option = this.metadata.get(name);
      if (!option) {
        errors[name] = new UnsupportedOptionError(name).message;
        continue;
      }
      try {
        const value = this.validate(name, raw);
        commands.push({
          name,
          value,
          command: formatSetOption(name, option.type, value),
          cacheable: option.type !== 'button',
        });
      } catch (error) {
        if (!isBridgeError(error)) {
          throw error;
        }
        errors[name] = error.message;
      }
    }

    return { commands, errors };
  }

  /**
   * Record values the engine has accepted
   */
  record(applied: readonly PreparedOption[]): void {
    for (const option of applied) {
      if (option.cacheable) {
        this.current.set(option.name, option.value);
      }
    }
  }

  /**
   * Result shape for callers: applied values keyed by name plus errors
   */
  static toResult(prepared: PreparedOptions): SetOptionsResult {
    const applied: Record<string, OptionValue> = {};
    for (const option of prepared.commands) {
      applied[option.name] = option.value;
    }
    return { applied, errors: { ...prepared.errors } };
  }

  /**
   * Coerce a configured value (CLI strings, YAML scalars) toward the
   * option's type. Values that cannot be coerced are returned unchanged so
   * validation reports them.
   */
  coerceConfigured(name: string, value: ConfigValue): unknown {
    const option = this.metadata.get(name);
    if (!option) {
      return value;
    }

    switch (option.type) {
      case 'spin':
        if (typeof value === 'string' && INTEGER_STRING.test(value.trim())) {
          return Number(value.trim());
        }
        return value;
      case 'check':
        if (typeof value === 'string') {
          const normalized = value.trim().toLowerCase();
          if (normalized === 'true') return true;
          if (normalized === 'false') return false;
        }
        return value;
      case 'string':
      case 'combo':
        return typeof value === 'number' || typeof value === 'boolean' ? String(value) : value;
      case 'button':
        return value;
    }
  }
}

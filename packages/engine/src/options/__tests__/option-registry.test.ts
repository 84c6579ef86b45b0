/**
 * @fileoverview Tests for option validation and caching
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { InvalidOptionValueError, UnsupportedOptionError } from '../../errors/index.js';
import { parseOptionLine } from '../../protocol/uci-parser.js';
import type { OptionMetadata } from '../../types/index.js';
import { OptionRegistry } from '../option-registry.js';

const OPTION_LINES = [
  'option name Hash type spin default 16 min 1 max 33554432',
  'option name Ponder type check default false',
  'option name Style type combo default Normal var Solid var Normal var Risky',
  'option name Debug Log File type string default <empty>',
  'option name Clear Hash type button',
];

function advertised(): OptionMetadata[] {
  return OPTION_LINES.map((line) => parseOptionLine(line)).filter(
    (option): option is OptionMetadata => option !== null
  );
}

describe('OptionRegistry', () => {
  let registry: OptionRegistry;

  beforeEach(() => {
    registry = new OptionRegistry(advertised());
  });

  describe('validate', () => {
    it('should reject unknown options', () => {
      expect(() => registry.validate('Contempt', 10)).toThrow(UnsupportedOptionError);
      expect(() => registry.validate('hash', 10)).toThrow('Unsupported option: hash');
    });

    it('should bound spin values', () => {
      expect(registry.validate('Hash', 64)).toBe(64);
      expect(() => registry.validate('Hash', 0)).toThrow('Invalid value for option Hash: 0 is below minimum 1');
      expect(() => registry.validate('Hash', 33554432 + 1000000)).toThrow('above maximum');
      expect(() => registry.validate('Hash', 1.5)).toThrow(InvalidOptionValueError);
      expect(() => registry.validate('Hash', '64')).toThrow('expected integer, got string');
    });

    it('should require booleans for check options', () => {
      expect(registry.validate('Ponder', true)).toBe(true);
      expect(() => registry.validate('Ponder', 'true')).toThrow('expected boolean, got string');
    });

    it('should match combo values against the advertised set', () => {
      expect(registry.validate('Style', 'Risky')).toBe('Risky');
      expect(registry.validate('Style', 'solid')).toBe('Solid');
      expect(() => registry.validate('Style', 'Wild')).toThrow('"Wild" is not one of: Solid, Normal, Risky');
    });

    it('should accept strings and null for string options', () => {
      expect(registry.validate('Debug Log File', '/tmp/engine.log')).toBe('/tmp/engine.log');
      expect(registry.validate('Debug Log File', null)).toBeNull();
      expect(() => registry.validate('Debug Log File', 5)).toThrow('expected string or null, got number');
    });

    it('should reject line breaks in string and combo values', () => {
      expect(() => registry.validate('Debug Log File', 'x.log\ngo movetime 10')).toThrow(
        'Invalid value for option Debug Log File: value must not contain control characters'
      );
      expect(() => registry.validate('Style', 'Solid\rquit')).toThrow(InvalidOptionValueError);
      expect(() => registry.validate('Debug Log File', 'tab\tseparated')).toThrow(InvalidOptionValueError);
    });

    it('should take no value for buttons', () => {
      expect(registry.validate('Clear Hash', null)).toBeNull();
      expect(() => registry.validate('Clear Hash', 'now')).toThrow('buttons take no value');
    });
  });

  describe('prepare', () => {
    it('should split input keys into disjoint applied and error sets', () => {
      const input = { Hash: 64, Ponder: 'yes', Contempt: 10, Style: 'Solid', 'Clear Hash': null };

      const result = OptionRegistry.toResult(registry.prepare(input));

      expect(result.applied).toEqual({ Hash: 64, Style: 'Solid', 'Clear Hash': null });
      expect(Object.keys(result.errors).sort()).toEqual(['Contempt', 'Ponder']);
      expect([...Object.keys(result.applied), ...Object.keys(result.errors)].sort()).toEqual(
        Object.keys(input).sort()
      );
    });

    it('should build setoption commands in input order', () => {
      const prepared = registry.prepare({ 'Debug Log File': null, Hash: 128, 'Clear Hash': null });

      expect(prepared.commands.map((option) => option.command)).toEqual([
        'setoption name Debug Log File value <empty>',
        'setoption name Hash value 128',
        'setoption name Clear Hash',
      ]);
    });

    it('should report a value with a line break as an error without a command', () => {
      const prepared = registry.prepare({ 'Debug Log File': 'x.log\nquit', Hash: 32 });

      expect(prepared.commands.map((option) => option.command)).toEqual(['setoption name Hash value 32']);
      expect(prepared.errors).toEqual({
        'Debug Log File': 'Invalid value for option Debug Log File: value must not contain control characters',
      });
    });

    it('should apply Hash 64 and reject a value above the maximum', () => {
      const prepared = registry.prepare({ Hash: 33554432 + 1000000 });
      expect(prepared.errors.Hash).toContain('above maximum');

      const accepted = registry.prepare({ Hash: 64 });
      registry.record(accepted.commands);

      expect(registry.currentValues()).toEqual({ Hash: 64 });
    });
  });

  describe('record', () => {
    it('should cache values but not buttons', () => {
      registry.record(registry.prepare({ Ponder: true, 'Clear Hash': null }).commands);

      expect(registry.currentValues()).toEqual({ Ponder: true });
    });
  });

  describe('list', () => {
    it('should key metadata by name', () => {
      const options = registry.list();

      expect(Object.keys(options)).toEqual(['Hash', 'Ponder', 'Style', 'Debug Log File', 'Clear Hash']);
      expect(options.Hash).toEqual({ name: 'Hash', type: 'spin', default: 16, min: 1, max: 33554432 });
    });
  });

  describe('coerceConfigured', () => {
    it('should coerce strings using the option type', () => {
      expect(registry.coerceConfigured('Hash', '256')).toBe(256);
      expect(registry.coerceConfigured('Hash', 'lots')).toBe('lots');
      expect(registry.coerceConfigured('Ponder', 'TRUE')).toBe(true);
      expect(registry.coerceConfigured('Ponder', 'false')).toBe(false);
      expect(registry.coerceConfigured('Style', 7)).toBe('7');
      expect(registry.coerceConfigured('Debug Log File', true)).toBe('true');
    });

    it('should leave unknown options untouched', () => {
      expect(registry.coerceConfigured('Contempt', '10')).toBe('10');
    });
  });
});

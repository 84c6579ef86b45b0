import { describe, expect, it, vi } from 'vitest';
import { getDefaultSettings } from '../settings/defaults.js';
import { CliError, DeferredWarnings, applyCliOptions, buildCliOverrides, parseCliArgs } from '../cli.js';

describe('parseCliArgs', () => {
  it('should default to serving with no flags', () => {
    expect(parseCliArgs([])).toEqual({
      command: 'serve',
      enginePath: undefined,
      configPath: undefined,
      options: {},
      thinkTimeMs: undefined,
      debug: false,
      initConfigPath: undefined,
    });
  });

  it('should read the engine path and flags', () => {
    const args = parseCliArgs(['/opt/sf', '-c', 'conf.yaml', '-o', 'Threads=4', '--option', 'Hash=256', '-t', '750', '-d']);

    expect(args).toEqual({
      command: 'serve',
      enginePath: '/opt/sf',
      configPath: 'conf.yaml',
      options: { Threads: '4', Hash: '256' },
      thinkTimeMs: 750,
      debug: true,
      initConfigPath: undefined,
    });
  });

  it('should keep everything after the first equals sign in an option value', () => {
    expect(parseCliArgs(['-o', 'Debug Log File=/tmp/a=b.log']).options).toEqual({ 'Debug Log File': '/tmp/a=b.log' });
  });

  it('should pick help over other commands', () => {
    expect(parseCliArgs(['--version', '-h']).command).toBe('help');
    expect(parseCliArgs(['-v']).command).toBe('version');
    expect(parseCliArgs(['--init-config', 'out.yaml'])).toMatchObject({
      command: 'init-config',
      initConfigPath: 'out.yaml',
    });
  });

  it('should reject malformed options', () => {
    expect(() => parseCliArgs(['-o', 'Threads'])).toThrow(new CliError('Invalid --option "Threads": expected NAME=VALUE'));
    expect(() => parseCliArgs(['-o', '=4'])).toThrow(CliError);
  });

  it('should reject think times outside the allowed range', () => {
    expect(() => parseCliArgs(['-t', '0'])).toThrow(CliError);
    expect(() => parseCliArgs(['-t', '600001'])).toThrow(CliError);
    expect(() => parseCliArgs(['-t', 'soon'])).toThrow(CliError);
  });

  it('should reject unknown flags and extra positionals', () => {
    expect(() => parseCliArgs(['--port', '80'])).toThrow(CliError);
    expect(() => parseCliArgs(['/opt/a', '/opt/b'])).toThrow(new CliError('Unexpected arguments: /opt/b'));
  });
});

describe('buildCliOverrides', () => {
  it('should only include flags that were given', () => {
    expect(buildCliOverrides(parseCliArgs([]))).toEqual({});
    expect(buildCliOverrides(parseCliArgs(['/opt/sf', '-t', '500', '-d']))).toEqual({
      engine: { path: '/opt/sf' },
      defaultThinkTimeMs: 500,
      logging: { level: 'debug' },
    });
  });
});

describe('applyCliOptions', () => {
  it('should add command-line options over configured ones', () => {
    const settings = getDefaultSettings('linux');

    const applied = applyCliOptions(settings, { Hash: '512', Ponder: 'true' });

    expect(applied.engine.options).toEqual({ Threads: 4, Hash: '512', Ponder: 'true' });
    expect(settings.engine.options).toEqual({ Threads: 4, Hash: 128 });
  });

  it('should return the settings untouched without options', () => {
    const settings = getDefaultSettings('linux');

    expect(applyCliOptions(settings, {})).toBe(settings);
  });
});

describe('DeferredWarnings', () => {
  it('should replay collected warnings once', () => {
    const warnings = new DeferredWarnings();
    const logger = { warn: vi.fn() };

    warnings.warn('first', { variable: 'LOG_LEVEL' });
    warnings.warn('second');
    warnings.replay(logger);
    warnings.replay(logger);

    expect(logger.warn).toHaveBeenCalledTimes(2);
    expect(logger.warn).toHaveBeenNthCalledWith(1, 'first', { variable: 'LOG_LEVEL' });
    expect(logger.warn).toHaveBeenNthCalledWith(2, 'second', undefined);
    expect(warnings.size).toBe(0);
  });
});

import { describe, expect, it } from 'vitest';
import {
  BridgeError,
  BridgeErrorCode,
  EngineTimeoutError,
  InvalidOptionValueError,
  SpawnError,
  UnsupportedOptionError,
  isBridgeError,
  toError,
} from '../index.js';

describe('bridge errors', () => {
  it('should carry a code and a readable message', () => {
    const error = new EngineTimeoutError('readyok', 5000);

    expect(error).toBeInstanceOf(BridgeError);
    expect(error.code).toBe(BridgeErrorCode.TIMEOUT);
    expect(error.name).toBe('EngineTimeoutError');
    expect(error.message).toBe('Timed out after 5000ms waiting for readyok');
    expect(error.awaiting).toBe('readyok');
  });

  it('should keep the cause of a spawn failure', () => {
    const cause = new Error('ENOENT');
    const error = new SpawnError('/opt/missing', 'executable not found', { cause });

    expect(error.message).toBe('Failed to spawn engine /opt/missing: executable not found');
    expect(error.executablePath).toBe('/opt/missing');
    expect(error.cause).toBe(cause);
  });

  it('should name the option in option errors', () => {
    expect(new UnsupportedOptionError('Bogus').message).toBe('Unsupported option: Bogus');
    expect(new InvalidOptionValueError('Hash', '0 is below minimum 1').message).toBe(
      'Invalid value for option Hash: 0 is below minimum 1'
    );
  });

  it('should recognise bridge errors only', () => {
    expect(isBridgeError(new UnsupportedOptionError('X'))).toBe(true);
    expect(isBridgeError(new Error('plain'))).toBe(false);
    expect(isBridgeError('text')).toBe(false);
  });

  it('should normalize thrown values', () => {
    const error = new Error('kept');

    expect(toError(error)).toBe(error);
    expect(toError('text').message).toBe('text');
  });
});

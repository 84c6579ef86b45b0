/**
 * @fileoverview Bridge Error Types
 *
 * Typed error hierarchy for the engine bridge. Callers branch on `code`
 * (or `instanceof`) instead of matching message text.
 */

/**
 * Centralized bridge error codes
 */
export const BridgeErrorCode = {
  // Process
  SPAWN_FAILED: 'SPAWN_FAILED',
  PROCESS_CLOSED: 'PROCESS_CLOSED',
  WRITE_FAILED: 'WRITE_FAILED',
  TIMEOUT: 'TIMEOUT',
  // Protocol
  ENGINE_NOT_READY: 'ENGINE_NOT_READY',
  HANDSHAKE_FAILED: 'HANDSHAKE_FAILED',
  ILLEGAL_TRANSITION: 'ILLEGAL_TRANSITION',
  // Options
  UNSUPPORTED_OPTION: 'UNSUPPORTED_OPTION',
  INVALID_OPTION_VALUE: 'INVALID_OPTION_VALUE',
  // Caller input
  INVALID_ARGUMENT: 'INVALID_ARGUMENT',
} as const;

export type BridgeErrorCodeType = (typeof BridgeErrorCode)[keyof typeof BridgeErrorCode];

/**
 * Base bridge error class
 */
export class BridgeError extends Error {
  override readonly name: string = 'BridgeError';

  constructor(
    public readonly code: BridgeErrorCodeType,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

/**
 * Engine executable missing, not runnable, or rejected by the OS
 */
export class SpawnError extends BridgeError {
  override readonly name = 'SpawnError';

  constructor(
    public readonly executablePath: string,
    reason: string,
    options?: { cause?: unknown }
  ) {
    super(BridgeErrorCode.SPAWN_FAILED, `Failed to spawn engine ${executablePath}: ${reason}`, options);
  }
}

/**
 * The engine process exited or its output stream closed
 */
export class ProcessClosedError extends BridgeError {
  override readonly name = 'ProcessClosedError';

  constructor(message = 'Engine process is closed') {
    super(BridgeErrorCode.PROCESS_CLOSED, message);
  }
}

/**
 * Writing a command to the engine failed
 */
export class WriteError extends BridgeError {
  override readonly name = 'WriteError';

  constructor(command: string, reason: string, options?: { cause?: unknown }) {
    super(BridgeErrorCode.WRITE_FAILED, `Failed to write "${command}": ${reason}`, options);
  }
}

/**
 * A read deadline elapsed while waiting for an expected reply
 */
export class EngineTimeoutError extends BridgeError {
  override readonly name = 'EngineTimeoutError';

  constructor(
    public readonly awaiting: string,
    public readonly timeoutMs: number
  ) {
    super(BridgeErrorCode.TIMEOUT, `Timed out after ${timeoutMs}ms waiting for ${awaiting}`);
  }
}

/**
 * A protocol operation was attempted outside the Ready state
 */
export class EngineNotReadyError extends BridgeError {
  override readonly name = 'EngineNotReadyError';

  constructor(operation: string, state: string) {
    super(BridgeErrorCode.ENGINE_NOT_READY, `Cannot ${operation}: engine is not ready (state: ${state})`);
  }
}

/**
 * The UCI handshake did not complete; the bridge must be discarded
 */
export class HandshakeError extends BridgeError {
  override readonly name = 'HandshakeError';

  constructor(reason: string, options?: { cause?: unknown }) {
    super(BridgeErrorCode.HANDSHAKE_FAILED, `Engine handshake failed: ${reason}`, options);
  }
}

/**
 * The state machine was asked for a transition it does not allow
 */
export class IllegalTransitionError extends BridgeError {
  override readonly name = 'IllegalTransitionError';

  constructor(from: string, to: string) {
    super(BridgeErrorCode.ILLEGAL_TRANSITION, `Illegal engine state transition: ${from} -> ${to}`);
  }
}

/**
 * The engine did not advertise an option with this name
 */
export class UnsupportedOptionError extends BridgeError {
  override readonly name = 'UnsupportedOptionError';

  constructor(public readonly optionName: string) {
    super(BridgeErrorCode.UNSUPPORTED_OPTION, `Unsupported option: ${optionName}`);
  }
}

/**
 * The value does not satisfy the advertised option metadata
 */
export class InvalidOptionValueError extends BridgeError {
  override readonly name = 'InvalidOptionValueError';

  constructor(
    public readonly optionName: string,
    reason: string
  ) {
    super(BridgeErrorCode.INVALID_OPTION_VALUE, `Invalid value for option ${optionName}: ${reason}`);
  }
}

/**
 * Caller input rejected before anything was sent to the engine
 */
export class InvalidArgumentError extends BridgeError {
  override readonly name = 'InvalidArgumentError';

  constructor(message: string) {
    super(BridgeErrorCode.INVALID_ARGUMENT, message);
  }
}

/**
 * Type guard for bridge errors
 */
export function isBridgeError(error: unknown): error is BridgeError {
  return error instanceof BridgeError;
}

/**
 * Normalize anything thrown into an Error instance
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

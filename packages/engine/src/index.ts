/**
 * @fileoverview Main entry point for @chess-uci/engine
 *
 * Async bridge to a UCI chess engine process: process supervision, line
 * framing, the handshake state machine, option validation and analysis.
 */

// Re-export all types
export * from './types/index.js';

// Re-export errors
export * from './errors/index.js';

// Re-export logging
export * from './logging/index.js';

// Protocol
export * from './protocol/uci-parser.js';
export * from './protocol/commands.js';
export * from './protocol/handshake.js';
export { EngineStateMachine, type StateListener } from './protocol/state-machine.js';

// Process
export * from './process/line-channel.js';
export * from './process/process-supervisor.js';

// Analysis and options
export * from './analysis/analysis-collector.js';
export * from './options/option-registry.js';

// Bridge
export { SerialExecutor } from './bridge/serial-executor.js';
export {
  UciBridge,
  DEFAULT_BRIDGE_TIMEOUTS,
  DEFAULT_THINK_TIME_MS,
  type BridgeTimeouts,
  type UciBridgeConfig,
} from './bridge/uci-bridge.js';

// Version info
export const VERSION = '0.1.0';

/**
 * @fileoverview UciBridge - typed async interface over one UCI engine process
 *
 * Owns the process supervisor, the line channel, the handshake state machine
 * and the option cache. Protocol operations are serialized through a
 * SerialExecutor; `stop()` bypasses the queue and interrupts whatever is in
 * flight by closing the channel.
 *
 * ## Resynchronization
 *
 * A search that hits its deadline keeps running on the engine side. The
 * bridge sends `stop` at once and flags the channel; the next operation
 * first sends `isready` and discards everything up to `readyok`, including
 * the late `bestmove`.
 *
 * @example
 * ```typescript
 * const bridge = new UciBridge({ enginePath: '/usr/local/bin/stockfish', options: { Threads: 2 } });
 * await bridge.start();
 * const result = await bridge.analyze('rnbqkbnr/pppppppp/8/8/8/8/PPPPPPPP/RNBQKBNR w KQkq - 0 1', 500);
 * await bridge.stop();
 * ```
 */

import { collectAnalysis, awaitBestMove, DEFAULT_ANALYSIS_SLACK_MS } from '../analysis/analysis-collector.js';
import {
  EngineTimeoutError,
  HandshakeError,
  IllegalTransitionError,
  ProcessClosedError,
  toError,
} from '../errors/index.js';
import { createLogger, type UciLogger } from '../logging/index.js';
import { OptionRegistry } from '../options/option-registry.js';
import { LineChannel } from '../process/line-channel.js';
import { DEFAULT_QUIT_GRACE_MS, ProcessSupervisor } from '../process/process-supervisor.js';
import {
  UciCommand,
  assertValidFen,
  assertValidMoves,
  assertValidThinkTime,
  formatGo,
  formatPosition,
} from '../protocol/commands.js';
import { performUciHandshake, waitForReadyOk } from '../protocol/handshake.js';
import { EngineStateMachine } from '../protocol/state-machine.js';
import {
  EngineHandshakeState,
  type AnalysisResult,
  type ChessEngine,
  type ConfigValue,
  type EngineHandshakeStateType,
  type EngineId,
  type OptionMetadata,
  type OptionValue,
  type SetOptionsResult,
} from '../types/index.js';
import { SerialExecutor } from './serial-executor.js';

// =============================================================================
// Configuration
// =============================================================================

export interface BridgeTimeouts {
  /** Deadline for `uci` through `uciok` */
  handshakeMs: number;
  /** Deadline for each `isready` round trip */
  readyMs: number;
  /** Wait after `quit` before SIGKILL */
  quitGraceMs: number;
  /** Extra time past the think time before an analysis returns partial */
  analysisSlackMs: number;
  /** Extra time past the think time before getBestMove fails */
  bestMoveGraceMs: number;
}

export const DEFAULT_BRIDGE_TIMEOUTS: BridgeTimeouts = {
  handshakeMs: 10_000,
  readyMs: 5_000,
  quitGraceMs: DEFAULT_QUIT_GRACE_MS,
  analysisSlackMs: DEFAULT_ANALYSIS_SLACK_MS,
  bestMoveGraceMs: 5_000,
};

export const DEFAULT_THINK_TIME_MS = 1_000;

export interface UciBridgeConfig {
  /** Path to the engine executable */
  enginePath: string;
  /** Options applied after the handshake, in insertion order */
  options?: Record<string, ConfigValue>;
  /** Think time used when an operation omits one */
  defaultThinkTimeMs?: number;
  timeouts?: Partial<BridgeTimeouts>;
  /** Extra command-line arguments for the engine */
  args?: readonly string[];
  logger?: UciLogger;
}

// =============================================================================
// Bridge
// =============================================================================

export class UciBridge implements ChessEngine {
  private readonly enginePath: string;
  private readonly configuredOptions: Record<string, ConfigValue>;
  private readonly defaultThinkTimeMs: number;
  private readonly timeouts: BridgeTimeouts;
  private readonly logger: UciLogger;

  private readonly supervisor: ProcessSupervisor;
  private readonly machine = new EngineStateMachine();
  private readonly executor = new SerialExecutor();

  private channel: LineChannel | null = null;
  private registry = new OptionRegistry();
  private engineId: EngineId = {};
  private needsResync = false;
  private stopPromise: Promise<void> | null = null;

  constructor(config: UciBridgeConfig) {
    this.enginePath = config.enginePath;
    this.configuredOptions = { ...(config.options ?? {}) };
    this.defaultThinkTimeMs = config.defaultThinkTimeMs ?? DEFAULT_THINK_TIME_MS;
    this.timeouts = { ...DEFAULT_BRIDGE_TIMEOUTS, ...config.timeouts };
    this.logger = (config.logger ?? createLogger('uci-bridge')).child({ enginePath: config.enginePath });

    assertValidThinkTime(this.defaultThinkTimeMs);

    this.supervisor = new ProcessSupervisor({
      quitGraceMs: this.timeouts.quitGraceMs,
      args: config.args,
      logger: this.logger.child({ component: 'process-supervisor' }),
    });

    this.machine.onTransition((from, to) => {
      this.logger.debug('Engine state changed', { from, to });
    });
  }

  // ===========================================================================
  // Lifecycle
  // ===========================================================================

  /**
   * Spawn the engine, run the handshake and apply configured options.
   * Rejects with SpawnError or HandshakeError; after a failed start the
   * bridge is stopped and must be discarded.
   */
  start(): Promise<void> {
    return this.executor.run(async () => {
      const state = this.machine.current;
      if (state !== EngineHandshakeState.UNINITIALIZED) {
        throw new IllegalTransitionError(state, EngineHandshakeState.AWAITING_UCI_OK);
      }

      let channel: LineChannel;
      try {
        const streams = await this.supervisor.start(this.enginePath);
        if (this.machine.isStopped()) {
          await this.supervisor.stop();
          throw new ProcessClosedError('Engine was stopped during start');
        }
        channel = new LineChannel(streams.stdout, streams.stdin, {
          logger: this.logger.child({ component: 'line-channel' }),
        });
      } catch (error) {
        this.machine.stop();
        throw error;
      }

      this.channel = channel;
      this.supervisor.onExit((info) => {
        if (!this.machine.isStopped()) {
          this.logger.warn('Engine exited unexpectedly', { code: info.code, signal: info.signal });
          this.machine.stop();
        }
        channel.close();
      });

      try {
        await this.logger.timed('Engine handshake', () => this.handshake(channel), 'info');
      } catch (error) {
        this.machine.stop();
        channel.close();
        await this.supervisor.stop();
        throw new HandshakeError(toError(error).message, { cause: error });
      }
    });
  }

  /**
   * Stop the engine. Safe to call at any time and more than once; an
   * operation in flight fails with ProcessClosedError.
   */
  stop(): Promise<void> {
    if (!this.stopPromise) {
      this.stopPromise = this.shutdown();
    }
    return this.stopPromise;
  }

  private async shutdown(): Promise<void> {
    this.logger.info('Stopping engine');
    this.machine.stop();
    this.channel?.close();
    await this.supervisor.stop();
  }

  private async handshake(channel: LineChannel): Promise<void> {
    this.machine.transition(EngineHandshakeState.AWAITING_UCI_OK);
    await channel.writeLine(UciCommand.UCI);

    const result = await performUciHandshake(channel, Date.now() + this.timeouts.handshakeMs, this.timeouts.handshakeMs);
    this.engineId = result.id;
    this.registry = new OptionRegistry(result.options);
    this.logger.info('Engine identified', {
      name: result.id.name,
      author: result.id.author,
      options: result.options.length,
      ignoredLines: result.ignoredLines,
    });

    this.machine.transition(EngineHandshakeState.AWAITING_READY_OK);
    await this.applyConfiguredOptions(channel);

    await this.syncReady(channel);
    this.machine.transition(EngineHandshakeState.READY);
  }

  private async applyConfiguredOptions(channel: LineChannel): Promise<void> {
    const coerced: Record<string, unknown> = {};
    for (const [name, value] of Object.entries(this.configuredOptions)) {
      coerced[name] = this.registry.coerceConfigured(name, value);
    }

    const prepared = this.registry.prepare(coerced);
    for (const [name, message] of Object.entries(prepared.errors)) {
      this.logger.warn('Skipping configured option', { option: name, reason: message });
    }
    for (const option of prepared.commands) {
      await channel.writeLine(option.command);
    }
    this.registry.record(prepared.commands);
  }

  // ===========================================================================
  // Protocol Operations
  // ===========================================================================

  async analyze(fen: string, timeMs?: number): Promise<AnalysisResult> {
    const thinkTime = timeMs ?? this.defaultThinkTimeMs;
    assertValidFen(fen);
    assertValidThinkTime(thinkTime);

    return this.runReady('analyze', async (channel) => {
      await channel.writeLine(formatPosition({ fen }));
      await channel.writeLine(formatGo(thinkTime));

      const result = await collectAnalysis(channel, Date.now() + thinkTime + this.timeouts.analysisSlackMs);
      if (result.timedOut) {
        this.logger.warn('Analysis deadline reached before bestmove', { thinkTime, depth: result.depth });
        await this.interruptSearch(channel);
      }
      return result;
    });
  }

  async getBestMove(timeMs?: number): Promise<string | null> {
    const thinkTime = timeMs ?? this.defaultThinkTimeMs;
    assertValidThinkTime(thinkTime);

    return this.runReady('get best move', async (channel) => {
      await channel.writeLine(formatGo(thinkTime));

      const timeoutMs = thinkTime + this.timeouts.bestMoveGraceMs;
      try {
        const line = await awaitBestMove(channel, Date.now() + timeoutMs, timeoutMs);
        return line.bestMove;
      } catch (error) {
        if (error instanceof EngineTimeoutError) {
          await this.interruptSearch(channel);
        }
        throw error;
      }
    });
  }

  async setPosition(fen?: string, moves?: readonly string[]): Promise<void> {
    if (fen !== undefined) {
      assertValidFen(fen);
    }
    if (moves !== undefined) {
      assertValidMoves(moves);
    }

    await this.runReady('set position', (channel) => channel.writeLine(formatPosition({ fen, moves })));
  }

  async newGame(): Promise<void> {
    await this.runReady('start a new game', async (channel) => {
      await channel.writeLine(UciCommand.NEW_GAME);
      await this.syncReady(channel);
    });
  }

  /**
   * Validate and apply option values. Per-key failures are reported in
   * `errors`; only channel failures reject.
   */
  async setOptions(values: Record<string, unknown>): Promise<SetOptionsResult> {
    return this.runReady('set options', async (channel) => {
      const prepared = this.registry.prepare(values);

      if (prepared.commands.length > 0) {
        for (const option of prepared.commands) {
          await channel.writeLine(option.command);
        }
        await this.syncReady(channel);
        this.registry.record(prepared.commands);
      }

      const result = OptionRegistry.toResult(prepared);
      this.logger.info('Options updated', {
        applied: Object.keys(result.applied),
        rejected: Object.keys(result.errors),
      });
      return result;
    });
  }

  // ===========================================================================
  // Queries
  // ===========================================================================

  getEngineId(): EngineId {
    return { ...this.engineId };
  }

  getAvailableOptions(): Record<string, OptionMetadata> {
    return this.registry.list();
  }

  getCurrentOptionValues(): Record<string, OptionValue> {
    return this.registry.currentValues();
  }

  getState(): EngineHandshakeStateType {
    return this.machine.current;
  }

  isReady(): boolean {
    return this.machine.isReady();
  }

  // ===========================================================================
  // Internals
  // ===========================================================================

  private runReady<T>(operation: string, fn: (channel: LineChannel) => Promise<T>): Promise<T> {
    return this.executor.run(async () => {
      this.machine.assertReady(operation);
      const channel = this.requireChannel();
      await this.resync(channel);
      return fn(channel);
    });
  }

  private requireChannel(): LineChannel {
    if (!this.channel || this.channel.isClosed) {
      throw new ProcessClosedError();
    }
    return this.channel;
  }

  private async syncReady(channel: LineChannel): Promise<void> {
    await channel.writeLine(UciCommand.IS_READY);
    const discarded = await waitForReadyOk(channel, Date.now() + this.timeouts.readyMs, this.timeouts.readyMs);
    if (discarded > 0) {
      this.logger.debug('Discarded lines before readyok', { discarded });
    }
  }

  private async resync(channel: LineChannel): Promise<void> {
    if (!this.needsResync) {
      return;
    }
    this.logger.debug('Resynchronizing engine output');
    await this.syncReady(channel);
    this.needsResync = false;
  }

  /**
   * Halt a search whose deadline passed; its late output is dropped by the
   * next resync.
   */
  private async interruptSearch(channel: LineChannel): Promise<void> {
    this.needsResync = true;
    try {
      await channel.writeLine(UciCommand.STOP);
    } catch (error) {
      this.logger.warn('Failed to send stop after deadline', { error: toError(error).message });
    }
  }
}

/**
 * @fileoverview Engine process supervisor
 *
 * Owns the engine child process and its three pipes. Spawning is confirmed
 * by the OS `spawn` event; stopping asks politely with `quit`, then falls
 * back to SIGKILL after a grace period and always waits for the exit.
 *
 * @example
 * ```typescript
 * const supervisor = new ProcessSupervisor({ quitGraceMs: 2000 });
 * const { stdin, stdout } = await supervisor.start('/usr/local/bin/stockfish');
 * // ...
 * await supervisor.stop();
 * ```
 */

import { spawn, type ChildProcessWithoutNullStreams } from 'child_process';
import { accessSync, constants, statSync } from 'fs';
import type { Readable, Writable } from 'stream';
import { SpawnError } from '../errors/index.js';
import type { UciLogger } from '../logging/index.js';

// =============================================================================
// Types
// =============================================================================

export const DEFAULT_QUIT_GRACE_MS = 2_000;

export interface ProcessSupervisorOptions {
  /** How long to wait for a voluntary exit after `quit` (default: 2000) */
  quitGraceMs?: number;
  /** Extra arguments passed to the engine executable */
  args?: readonly string[];
  logger?: UciLogger;
}

export interface EngineStreams {
  stdin: Writable;
  stdout: Readable;
  stderr: Readable;
}

export interface ExitInfo {
  code: number | null;
  signal: NodeJS.Signals | null;
}

export type ExitListener = (info: ExitInfo) => void;

// =============================================================================
// Helpers
// =============================================================================

function errorCode(error: unknown): string | undefined {
  return error instanceof Error && 'code' in error && typeof error.code === 'string' ? error.code : undefined;
}

/**
 * Fail with SpawnError unless the path is an existing, executable file
 */
export function assertExecutable(executablePath: string): void {
  try {
    if (!statSync(executablePath).isFile()) {
      throw new SpawnError(executablePath, 'not a regular file');
    }
    accessSync(executablePath, constants.X_OK);
  } catch (error) {
    if (error instanceof SpawnError) {
      throw error;
    }
    const code = errorCode(error);
    const reason =
      code === 'ENOENT' ? 'executable not found' : code === 'EACCES' ? 'not executable' : `cannot access (${code ?? 'unknown'})`;
    throw new SpawnError(executablePath, reason, { cause: error });
  }
}

function waitForSpawn(child: ChildProcessWithoutNullStreams, executablePath: string): Promise<void> {
  return new Promise((resolve, reject) => {
    const onSpawn = (): void => {
      child.off('error', onError);
      resolve();
    };
    const onError = (error: Error): void => {
      child.off('spawn', onSpawn);
      reject(new SpawnError(executablePath, error.message, { cause: error }));
    };
    child.once('spawn', onSpawn);
    child.once('error', onError);
  });
}

// =============================================================================
// Supervisor
// =============================================================================

export class ProcessSupervisor {
  private readonly quitGraceMs: number;
  private readonly args: readonly string[];
  private readonly logger: UciLogger | undefined;
  private readonly exitListeners = new Set<ExitListener>();

  private child: ChildProcessWithoutNullStreams | null = null;
  private exitPromise: Promise<ExitInfo> | null = null;
  private exitInfo: ExitInfo | null = null;
  private stopPromise: Promise<void> | null = null;
  /** Resolves true once spawned, false if the spawn failed */
  private spawnSettled: Promise<boolean> | null = null;
  private started = false;

  constructor(options: ProcessSupervisorOptions = {}) {
    this.quitGraceMs = options.quitGraceMs ?? DEFAULT_QUIT_GRACE_MS;
    this.args = options.args ?? [];
    this.logger = options.logger;
  }

  get pid(): number | undefined {
    return this.child?.pid;
  }

  isRunning(): boolean {
    return this.child !== null && this.exitInfo === null;
  }

  getExitInfo(): ExitInfo | null {
    return this.exitInfo;
  }

  onExit(listener: ExitListener): () => void {
    this.exitListeners.add(listener);
    return () => this.exitListeners.delete(listener);
  }

  /**
   * Spawn the engine with piped stdio. A supervisor runs at most one
   * process over its lifetime.
   */
  async start(executablePath: string): Promise<EngineStreams> {
    if (this.started) {
      throw new SpawnError(executablePath, 'supervisor already started a process');
    }
    if (this.stopPromise) {
      throw new SpawnError(executablePath, 'supervisor was stopped');
    }
    this.started = true;

    assertExecutable(executablePath);

    this.logger?.info('Starting engine process', { executablePath });

    const child = spawn(executablePath, [...this.args], {
      stdio: ['pipe', 'pipe', 'pipe'],
      windowsHide: true,
    });

    this.exitPromise = new Promise<ExitInfo>((resolve) => {
      child.once('exit', (code, signal) => {
        const info: ExitInfo = { code, signal };
        this.exitInfo = info;
        this.logger?.info('Engine process exited', { code, signal });
        for (const listener of this.exitListeners) {
          listener(info);
        }
        resolve(info);
      });
    });

    // Visible to stop() while the spawn is pending
    this.child = child;
    const spawned = waitForSpawn(child, executablePath);
    this.spawnSettled = spawned.then(
      () => true,
      () => false
    );
    try {
      await spawned;
    } catch (error) {
      this.child = null;
      throw error;
    }

    this.logger?.debug('Engine process spawned', { pid: child.pid });

    child.on('error', (error) => {
      this.logger?.error('Engine process error', error);
    });
    child.stdin.on('error', (error) => {
      this.logger?.debug('Engine stdin error', { error: error.message });
    });
    child.stderr.on('data', (chunk: Buffer) => this.logStderr(chunk));

    return { stdin: child.stdin, stdout: child.stdout, stderr: child.stderr };
  }

  /**
   * Stop the engine: `quit`, grace period, then SIGKILL. Idempotent; later
   * calls share the first call's completion.
   */
  stop(): Promise<void> {
    if (!this.stopPromise) {
      this.stopPromise = this.shutdown();
    }
    return this.stopPromise;
  }

  private async shutdown(): Promise<void> {
    if (this.spawnSettled) {
      await this.spawnSettled;
    }
    const child = this.child;
    const exitPromise = this.exitPromise;
    if (!child || !exitPromise) {
      return;
    }

    if (this.exitInfo === null) {
      try {
        if (child.stdin.writable) {
          child.stdin.write('quit\n');
        }
      } catch (error) {
        this.logger?.warn('Failed to send quit, forcing termination', {
          error: error instanceof Error ? error.message : String(error),
        });
      }

      const exited = await this.waitForExit(exitPromise, this.quitGraceMs);
      if (!exited) {
        this.logger?.warn('Engine did not exit after quit, killing', {
          pid: child.pid,
          graceMs: this.quitGraceMs,
        });
        child.kill('SIGKILL');
        await exitPromise;
      }
    }

    child.stdin.destroy();
    child.stdout.destroy();
    child.stderr.destroy();
  }

  private waitForExit(exitPromise: Promise<ExitInfo>, timeoutMs: number): Promise<boolean> {
    return new Promise((resolve) => {
      const timer = setTimeout(() => resolve(false), timeoutMs);
      void exitPromise.then(() => {
        clearTimeout(timer);
        resolve(true);
      });
    });
  }

  private logStderr(chunk: Buffer): void {
    const lines = chunk.toString('utf-8').split(/\r?\n/).filter(Boolean);
    for (const line of lines) {
      this.logger?.debug('engine stderr', { line });
    }
  }
}

/**
 * @fileoverview Tests for engine process supervision
 *
 * The child process is replaced by an in-process FakeEngine.
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { spawn, type ChildProcess } from 'child_process';
import { SpawnError } from '../../errors/index.js';
import { FakeEngine, standardResponder } from '../../__fixtures__/fake-engine.js';
import { ProcessSupervisor, assertExecutable } from '../process-supervisor.js';

vi.mock('child_process', () => ({ spawn: vi.fn() }));

const EXECUTABLE = process.execPath;

function useFakeEngine(engine: FakeEngine): void {
  vi.mocked(spawn).mockReturnValue(engine as unknown as ChildProcess);
}

describe('assertExecutable', () => {
  it('should accept an executable file', () => {
    expect(() => assertExecutable(EXECUTABLE)).not.toThrow();
  });

  it('should report a missing path', () => {
    expect(() => assertExecutable('/nonexistent/engine')).toThrow(
      'Failed to spawn engine /nonexistent/engine: executable not found'
    );
  });

  it('should reject directories', () => {
    expect(() => assertExecutable(process.cwd())).toThrow(SpawnError);
  });
});

describe('ProcessSupervisor', () => {
  beforeEach(() => {
    vi.mocked(spawn).mockReset();
  });

  describe('start', () => {
    it('should spawn with piped stdio and return the streams', async () => {
      const engine = new FakeEngine();
      useFakeEngine(engine);
      const supervisor = new ProcessSupervisor({ args: ['--uci'] });

      const streams = await supervisor.start(EXECUTABLE);

      expect(spawn).toHaveBeenCalledWith(EXECUTABLE, ['--uci'], {
        stdio: ['pipe', 'pipe', 'pipe'],
        windowsHide: true,
      });
      expect(streams.stdout).toBe(engine.stdout);
      expect(supervisor.isRunning()).toBe(true);
      expect(supervisor.pid).toBe(4242);
    });

    it('should not spawn when the executable is missing', async () => {
      const supervisor = new ProcessSupervisor();

      await expect(supervisor.start('/nonexistent/engine')).rejects.toThrow(SpawnError);
      expect(spawn).not.toHaveBeenCalled();
    });

    it('should fail when the OS rejects the spawn', async () => {
      const engine = new FakeEngine();
      useFakeEngine(engine);
      const supervisor = new ProcessSupervisor();

      const starting = supervisor.start(EXECUTABLE);
      engine.emit('error', new Error('spawn EACCES'));

      await expect(starting).rejects.toThrow(`Failed to spawn engine ${EXECUTABLE}: spawn EACCES`);
    });

    it('should refuse a second start', async () => {
      useFakeEngine(new FakeEngine());
      const supervisor = new ProcessSupervisor();
      await supervisor.start(EXECUTABLE);

      await expect(supervisor.start(EXECUTABLE)).rejects.toThrow('supervisor already started a process');
    });
  });

  describe('stop', () => {
    it('should send quit and wait for a voluntary exit', async () => {
      const engine = new FakeEngine(standardResponder);
      useFakeEngine(engine);
      const supervisor = new ProcessSupervisor({ quitGraceMs: 1000 });
      await supervisor.start(EXECUTABLE);

      await supervisor.stop();

      expect(engine.received).toEqual(['quit']);
      expect(engine.killSignals).toEqual([]);
      expect(supervisor.getExitInfo()).toEqual({ code: 0, signal: null });
      expect(supervisor.isRunning()).toBe(false);
    });

    it('should kill an engine that ignores quit after the grace period', async () => {
      const engine = new FakeEngine(() => undefined);
      useFakeEngine(engine);
      const supervisor = new ProcessSupervisor({ quitGraceMs: 20 });
      await supervisor.start(EXECUTABLE);

      await supervisor.stop();

      expect(engine.received).toEqual(['quit']);
      expect(engine.killSignals).toEqual(['SIGKILL']);
      expect(supervisor.getExitInfo()).toEqual({ code: null, signal: 'SIGKILL' });
    });

    it('should be idempotent and never signal twice', async () => {
      const engine = new FakeEngine(() => undefined);
      useFakeEngine(engine);
      const supervisor = new ProcessSupervisor({ quitGraceMs: 20 });
      await supervisor.start(EXECUTABLE);

      const first = supervisor.stop();
      const second = supervisor.stop();

      expect(second).toBe(first);
      await expect(Promise.all([first, second, supervisor.stop()])).resolves.toBeDefined();
      expect(engine.killSignals).toEqual(['SIGKILL']);
    });

    it('should only clean up after the process already exited', async () => {
      const engine = new FakeEngine();
      useFakeEngine(engine);
      const supervisor = new ProcessSupervisor({ quitGraceMs: 20 });
      const onExit = vi.fn();
      supervisor.onExit(onExit);
      await supervisor.start(EXECUTABLE);

      engine.exit(3);
      await vi.waitFor(() => expect(onExit).toHaveBeenCalledWith({ code: 3, signal: null }));
      await supervisor.stop();

      expect(engine.received).toEqual([]);
      expect(engine.killSignals).toEqual([]);
      expect(engine.stdin.destroyed).toBe(true);
    });

    it('should resolve without a started process', async () => {
      await expect(new ProcessSupervisor().stop()).resolves.toBeUndefined();
    });
  });
});

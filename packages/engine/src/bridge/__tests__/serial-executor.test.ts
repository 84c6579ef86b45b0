/**
 * @fileoverview Tests for serialized operation execution
 */

import { describe, it, expect } from 'vitest';
import { SerialExecutor } from '../serial-executor.js';

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

describe('SerialExecutor', () => {
  it('should run operations one at a time in submission order', async () => {
    const executor = new SerialExecutor();
    const events: string[] = [];

    const slow = executor.run(async () => {
      events.push('slow:start');
      await delay(20);
      events.push('slow:end');
      return 'slow';
    });
    const fast = executor.run(async () => {
      events.push('fast:start');
      events.push('fast:end');
      return 'fast';
    });

    expect(await Promise.all([slow, fast])).toEqual(['slow', 'fast']);
    expect(events).toEqual(['slow:start', 'slow:end', 'fast:start', 'fast:end']);
  });

  it('should keep running after a failure', async () => {
    const executor = new SerialExecutor();

    const failing = executor.run(async () => {
      throw new Error('boom');
    });
    const next = executor.run(async () => 42);

    await expect(failing).rejects.toThrow('boom');
    expect(await next).toBe(42);
  });

  it('should track pending operations until idle', async () => {
    const executor = new SerialExecutor();

    void executor.run(() => delay(10));
    void executor.run(() => delay(10));
    expect(executor.size).toBe(2);

    await executor.idle();
    expect(executor.size).toBe(0);
  });
});

/**
 * @fileoverview SerialExecutor - one protocol operation at a time
 *
 * Every operation that writes to the engine and reads its replies runs on a
 * promise chain, so replies are never split between two callers.
 *
 * ## Key Invariants
 *
 * 1. Operations run in submission order, never overlapping
 * 2. A failed operation rejects its own caller only; the chain continues
 *
 * ```typescript
 * const executor = new SerialExecutor();
 * const result = await executor.run(() => collectAnalysis(channel, deadline));
 * await executor.idle();
 * ```
 */

export class SerialExecutor {
  private chain: Promise<void> = Promise.resolve();
  private pending = 0;

  /**
   * Number of operations queued or running
   */
  get size(): number {
    return this.pending;
  }

  /**
   * Queue an operation behind everything submitted before it
   */
  run<T>(operation: () => Promise<T>): Promise<T> {
    this.pending += 1;
    const result = this.chain.then(operation);
    this.chain = result.then(
      () => this.settle(),
      () => this.settle()
    );
    return result;
  }

  /**
   * Resolve once every operation submitted so far has settled
   */
  idle(): Promise<void> {
    return this.chain;
  }

  private settle(): void {
    this.pending -= 1;
  }
}

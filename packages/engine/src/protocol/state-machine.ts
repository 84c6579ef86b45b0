/**
 * @fileoverview Engine handshake state machine
 *
 * ```
 * uninitialized --uci--> awaiting_uciok --uciok--> awaiting_readyok --readyok--> ready
 *       any state --quit / exit / stream closed--> stopped
 * ```
 */

import { EngineNotReadyError, IllegalTransitionError } from '../errors/index.js';
import { EngineHandshakeState, type EngineHandshakeStateType } from '../types/index.js';

const TRANSITIONS: Record<EngineHandshakeStateType, readonly EngineHandshakeStateType[]> = {
  [EngineHandshakeState.UNINITIALIZED]: [EngineHandshakeState.AWAITING_UCI_OK],
  [EngineHandshakeState.AWAITING_UCI_OK]: [EngineHandshakeState.AWAITING_READY_OK],
  [EngineHandshakeState.AWAITING_READY_OK]: [EngineHandshakeState.READY],
  [EngineHandshakeState.READY]: [],
  [EngineHandshakeState.STOPPED]: [],
};

export type StateListener = (from: EngineHandshakeStateType, to: EngineHandshakeStateType) => void;

export class EngineStateMachine {
  private state: EngineHandshakeStateType = EngineHandshakeState.UNINITIALIZED;
  private readonly listeners = new Set<StateListener>();

  get current(): EngineHandshakeStateType {
    return this.state;
  }

  /**
   * Move forward along the handshake. Stopping goes through `stop()`.
   */
  transition(next: EngineHandshakeStateType): void {
    if (!TRANSITIONS[this.state].includes(next)) {
      throw new IllegalTransitionError(this.state, next);
    }
    this.set(next);
  }

  /**
   * Enter `stopped` from any state. Returns false if already stopped.
   */
  stop(): boolean {
    if (this.state === EngineHandshakeState.STOPPED) {
      return false;
    }
    this.set(EngineHandshakeState.STOPPED);
    return true;
  }

  isReady(): boolean {
    return this.state === EngineHandshakeState.READY;
  }

  isStopped(): boolean {
    return this.state === EngineHandshakeState.STOPPED;
  }

  /**
   * True once the engine has advertised its options (`uciok` seen)
   */
  hasAdvertisedOptions(): boolean {
    return this.state === EngineHandshakeState.AWAITING_READY_OK || this.state === EngineHandshakeState.READY;
  }

  assertReady(operation: string): void {
    if (!this.isReady()) {
      throw new EngineNotReadyError(operation, this.state);
    }
  }

  onTransition(listener: StateListener): () => void {
    this.listeners.add(listener);
    return () => this.listeners.delete(listener);
  }

  private set(next: EngineHandshakeStateType): void {
    const previous = this.state;
    this.state = next;
    for (const listener of this.listeners) {
      listener(previous, next);
    }
  }
}

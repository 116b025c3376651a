/**
 * State machine contracts
 */

import type { CaptureIntentEvent } from "../events";

export interface State {
  readonly name: string;
  /** A terminal state accepts no further events */
  readonly isTerminal: boolean;

  /**
   * Called once after the state becomes current. May return a further
   * state to move to immediately; returns itself otherwise.
   */
  onEnter(): State;

  /**
   * Handle one event. Returns the next state, or itself to stay.
   */
  processEvent(event: CaptureIntentEvent): State;

  /**
   * Release everything the state acquired. Safe to call more than once.
   */
  onLeave(): void;

  isTornDown(): boolean;
}

export interface StateMachine {
  /**
   * Install the first state. Allowed once, before any event is processed.
   */
  setInitialState(state: State): void;

  /**
   * Queue an event for the dispatch lane. Never throws.
   */
  processEvent(event: CaptureIntentEvent): void;

  getCurrentState(): State | null;

  /**
   * Record that the current state had no handler for an event
   */
  notifyEventIgnored(stateName: string, event: CaptureIntentEvent): void;
}

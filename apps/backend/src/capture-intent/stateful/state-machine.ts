/**
 * State Machine
 *
 * Single dispatch lane for every event. Events are queued and processed one
 * at a time, including the resulting swap, so state logic never sees a
 * concurrent event. Errors never cross processEvent(): they go to the error
 * sink and, unless they are InvalidTransitionErrors, move the machine into
 * the failure state.
 */

import {
  CaptureIntentError,
  InvalidTransitionError,
  toCaptureIntentError,
} from "../errors";
import type { ErrorSink } from "../error-sink";
import type { CaptureIntentEvent } from "../events";
import { intentLogger } from "../logger";
import type { State, StateMachine } from "./state";

export interface StateChange {
  from: string | null;
  to: string;
  trigger: string;
  timestamp: number;
}

export type StateChangeHandler = (change: StateChange) => void;

export interface StateMachineOptions {
  errorSink: ErrorSink;
  /** Builds the state entered when a transition or entry throws */
  createFailureState?: (error: CaptureIntentError, from: State) => State;
  /** Upper bound on onEnter() chains per event */
  maxChainedTransitions?: number;
}

export class StateMachineImpl implements StateMachine {
  private currentState: State | null = null;
  private readonly queue: CaptureIntentEvent[] = [];
  private dispatching = false;
  private stopped = false;
  private processedCount = 0;
  private ignoredCount = 0;
  private stateHistory: { state: string; timestamp: number }[] = [];
  private changeHandlers: StateChangeHandler[] = [];
  private readonly maxChainedTransitions: number;

  constructor(private readonly options: StateMachineOptions) {
    this.maxChainedTransitions = options.maxChainedTransitions ?? 16;
  }

  // ============================================================================
  // Public API
  // ============================================================================

  setInitialState(state: State): void {
    if (this.currentState !== null || this.processedCount > 0) {
      this.report(
        new InvalidTransitionError("initial state may only be set once", {
          operation: "setInitialState",
          state: this.currentState?.name,
        }),
      );
      return;
    }

    this.currentState = state;
    this.recordHistory(state);
    intentLogger.info(`StateMachine: Initial state ${state.name}`);
    this.emit({
      from: null,
      to: state.name,
      trigger: "setInitialState",
      timestamp: Date.now(),
    });

    const next = this.enter(state);
    if (next !== state) {
      this.transition(state, next, "onEnter");
    }
  }

  processEvent(event: CaptureIntentEvent): void {
    if (this.stopped) {
      intentLogger.debug(
        `StateMachine: Dropping ${event.type} after shutdown`,
      );
      return;
    }

    if (this.currentState === null) {
      this.report(
        new InvalidTransitionError(
          `event ${event.type} arrived before the initial state was set`,
          { operation: "processEvent" },
        ),
      );
      return;
    }

    this.queue.push(event);

    // Re-entrant call from inside a transition: runs after the current event
    if (this.dispatching) {
      return;
    }

    this.dispatching = true;
    try {
      let next = this.queue.shift();
      while (next !== undefined) {
        this.dispatch(next);
        next = this.queue.shift();
      }
    } finally {
      this.dispatching = false;
    }
  }

  getCurrentState(): State | null {
    return this.currentState;
  }

  notifyEventIgnored(stateName: string, event: CaptureIntentEvent): void {
    this.ignoredCount++;
    intentLogger.debug(
      `StateMachine: ${stateName} ignored ${event.type}`,
    );
  }

  onStateChanged(handler: StateChangeHandler): () => void {
    this.changeHandlers.push(handler);
    return () => {
      const index = this.changeHandlers.indexOf(handler);
      if (index !== -1) {
        this.changeHandlers.splice(index, 1);
      }
    };
  }

  getStateHistory(): { state: string; timestamp: number }[] {
    return [...this.stateHistory];
  }

  getProcessedEventCount(): number {
    return this.processedCount;
  }

  getIgnoredEventCount(): number {
    return this.ignoredCount;
  }

  isStopped(): boolean {
    return this.stopped;
  }

  /**
   * Tear down the current state and stop accepting events
   */
  shutdown(): void {
    if (this.stopped) {
      return;
    }
    this.stopped = true;
    this.queue.length = 0;

    if (this.currentState) {
      intentLogger.info(
        `StateMachine: Shutting down in ${this.currentState.name}`,
      );
      this.teardown(this.currentState);
    }
  }

  // ============================================================================
  // Dispatch
  // ============================================================================

  private dispatch(event: CaptureIntentEvent): void {
    const current = this.currentState;
    if (current === null || this.stopped) {
      return;
    }

    if (current.isTerminal) {
      intentLogger.debug(
        `StateMachine: ${current.name} is terminal, ignoring ${event.type}`,
      );
      return;
    }

    this.processedCount++;

    let next: State;
    try {
      next = current.processEvent(event);
    } catch (error) {
      this.fail(
        toCaptureIntentError(error, `processEvent:${event.type}`, current.name),
        current,
        event.type,
      );
      return;
    }

    if (next !== current) {
      this.transition(current, next, event.type);
    }
  }

  /**
   * Swap states: install the new state, tear down the old one, then enter
   * the new one. onEnter() may chain into further states.
   */
  private transition(from: State, to: State, trigger: string): void {
    let previous = from;
    let target = to;
    let cause = trigger;
    let hops = 0;

    while (target !== previous) {
      if (target.isTornDown()) {
        this.report(
          new InvalidTransitionError(
            `${previous.name} returned torn-down state ${target.name}`,
            { operation: "transition", state: previous.name },
          ),
        );
        return;
      }

      hops++;
      if (hops > this.maxChainedTransitions) {
        this.report(
          new InvalidTransitionError(
            `more than ${this.maxChainedTransitions} chained transitions`,
            { operation: "transition", state: previous.name },
          ),
        );
        // Never entered; give back what its constructor acquired
        this.teardown(target);
        return;
      }

      this.currentState = target;
      this.recordHistory(target);
      intentLogger.info(
        `StateMachine: ${previous.name} -> ${target.name} (${cause})`,
      );

      this.teardown(previous);
      this.emit({
        from: previous.name,
        to: target.name,
        trigger: cause,
        timestamp: Date.now(),
      });

      const following = this.enter(target);
      previous = target;
      target = following;
      cause = "onEnter";
    }
  }

  private enter(state: State): State {
    try {
      return state.onEnter();
    } catch (error) {
      const wrapped = toCaptureIntentError(error, "onEnter", state.name);
      this.report(wrapped);
      if (wrapped instanceof InvalidTransitionError) {
        return state;
      }
      return this.createFailureState(wrapped, state) ?? state;
    }
  }

  private fail(error: CaptureIntentError, state: State, trigger: string): void {
    this.report(error);

    // Programming errors leave the machine in its last valid state
    if (error instanceof InvalidTransitionError) {
      return;
    }

    const failure = this.createFailureState(error, state);
    if (failure) {
      this.transition(state, failure, trigger);
    }
  }

  private createFailureState(
    error: CaptureIntentError,
    from: State,
  ): State | null {
    if (!this.options.createFailureState || from.isTerminal) {
      return null;
    }

    try {
      return this.options.createFailureState(error, from);
    } catch (factoryError) {
      this.report(toCaptureIntentError(factoryError, "createFailureState"));
      return null;
    }
  }

  private teardown(state: State): void {
    try {
      state.onLeave();
    } catch (error) {
      this.report(toCaptureIntentError(error, "onLeave", state.name));
    }
  }

  // ============================================================================
  // Utility Methods
  // ============================================================================

  private recordHistory(state: State): void {
    this.stateHistory.push({ state: state.name, timestamp: Date.now() });
  }

  private emit(change: StateChange): void {
    for (const handler of this.changeHandlers) {
      try {
        handler(change);
      } catch (error) {
        intentLogger.error("StateMachine: State change handler error", {
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }
  }

  private report(error: CaptureIntentError): void {
    try {
      this.options.errorSink.report(error);
    } catch (sinkError) {
      intentLogger.error("StateMachine: Error sink threw", {
        error: sinkError instanceof Error ? sinkError.message : String(sinkError),
        original: error.toJSON(),
      });
    }
  }
}

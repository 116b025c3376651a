/**
 * State Base
 *
 * Common plumbing for every workflow state:
 * - borrows the module resources for as long as the state exists
 * - dispatches events through an explicit per-state handler map; kinds a
 *   state does not list go to ignore()
 * - issues generation tokens for async hardware requests and timers, and
 *   drops completions whose token is no longer current
 * - idempotent teardown that invalidates tokens, clears timers and returns
 *   every borrow the state took
 */

import {
  InvalidTransitionError,
  toCaptureIntentError,
} from "../errors";
import {
  isHardwareEvent,
  type CaptureIntentEvent,
  type CaptureIntentEventType,
  type EventOfType,
  type HardwareEvent,
} from "../events";
import { intentLogger } from "../logger";
import type { ResourceConstructed } from "../resource/resource-constructed";
import { GenerationToken } from "./generation-token";
import type { Borrow, RefCountBase } from "./ref-count";
import type { State, StateMachine } from "./state";

export type EventHandlerMap = {
  [K in CaptureIntentEventType]?: (event: EventOfType<K>) => State;
};

function dispatchToHandler<K extends CaptureIntentEventType>(
  handlers: EventHandlerMap,
  type: K,
  event: EventOfType<K>,
): State | null {
  const handler = handlers[type];
  return handler ? handler(event) : null;
}

export abstract class StateBase implements State {
  abstract readonly name: string;
  readonly isTerminal: boolean = false;

  protected abstract readonly handlers: EventHandlerMap;
  protected readonly resources: ResourceConstructed;

  private readonly tokens = new Map<string, GenerationToken>();
  private readonly timers = new Map<string, ReturnType<typeof setTimeout>>();
  private readonly borrows: Borrow<unknown>[] = [];
  private readonly resourceBorrow: Borrow<ResourceConstructed>;
  private tornDown = false;

  constructor(
    protected readonly stateMachine: StateMachine,
    protected readonly resourceHandle: RefCountBase<ResourceConstructed>,
  ) {
    this.resourceBorrow = resourceHandle.acquire();
    this.resources = this.resourceBorrow.get();
  }

  onEnter(): State {
    return this;
  }

  processEvent(event: CaptureIntentEvent): State {
    if (this.tornDown) {
      throw new InvalidTransitionError(
        `${this.name} received ${event.type} after teardown`,
        { operation: "processEvent", state: this.name },
      );
    }

    if (isHardwareEvent(event) && !this.ownsToken(event.token)) {
      this.dropStale(event);
      return this;
    }

    const next = dispatchToHandler(this.handlers, event.type, event);
    if (next === null) {
      this.ignore(event);
      return this;
    }
    return next;
  }

  onLeave(): void {
    if (this.tornDown) {
      return;
    }
    this.tornDown = true;

    for (const token of this.tokens.values()) {
      token.invalidate();
    }
    this.tokens.clear();

    for (const timer of this.timers.values()) {
      clearTimeout(timer);
    }
    this.timers.clear();

    try {
      this.releaseResources();
    } finally {
      // Newest borrow first
      for (const borrow of this.borrows.splice(0).reverse()) {
        borrow.release();
      }
      this.resourceBorrow.release();
    }
  }

  isTornDown(): boolean {
    return this.tornDown;
  }

  /**
   * Event kinds this state handles explicitly
   */
  acceptedEvents(): string[] {
    return Object.keys(this.handlers);
  }

  toString(): string {
    return this.name;
  }

  // ============================================================================
  // Hooks
  // ============================================================================

  /**
   * Undo side effects of the state (UI, hardware). Borrows registered with
   * hold() are released afterwards by onLeave().
   */
  protected releaseResources(): void {}

  // ============================================================================
  // Helpers for subclasses
  // ============================================================================

  /**
   * Keep a borrow until teardown
   */
  protected hold<T>(borrow: Borrow<T>): Borrow<T> {
    this.borrows.push(borrow);
    return borrow;
  }

  protected ignore(event: CaptureIntentEvent): void {
    this.stateMachine.notifyEventIgnored(this.name, event);
  }

  /**
   * Issue a token for an operation, invalidating the previous one
   */
  protected issueToken(operation: string): GenerationToken {
    this.tokens.get(operation)?.invalidate();
    const token = new GenerationToken(operation, this.name);
    this.tokens.set(operation, token);
    return token;
  }

  /**
   * Start an async hardware request. Its completion is posted to the
   * machine as an event carrying the request's token. A completion that
   * resolves after the token was invalidated is passed to discard instead.
   */
  protected request<T>(
    operation: string,
    work: () => Promise<T>,
    onResolved: (token: GenerationToken, value: T) => CaptureIntentEvent,
    onRejected: (token: GenerationToken, error: unknown) => CaptureIntentEvent,
    discard?: (value: T) => Promise<void>,
  ): GenerationToken {
    const token = this.issueToken(operation);
    intentLogger.debug(`${this.name}: Requesting ${token.toString()}`);

    let pending: Promise<T>;
    try {
      pending = work();
    } catch (error) {
      pending = Promise.reject(error);
    }

    pending
      .then(
        (value) => {
          if (!token.isValid()) {
            intentLogger.debug(
              `${this.name}: Stale completion of ${token.toString()}`,
            );
            if (discard) {
              discard(value).catch((error: unknown) =>
                this.reportBackgroundError(error, operation),
              );
            }
            return;
          }
          this.stateMachine.processEvent(onResolved(token, value));
        },
        (error: unknown) => {
          if (!token.isValid()) {
            intentLogger.debug(
              `${this.name}: Stale failure of ${token.toString()}`,
            );
            return;
          }
          this.stateMachine.processEvent(onRejected(token, error));
        },
      )
      .catch((error: unknown) => this.reportBackgroundError(error, operation));

    return token;
  }

  /**
   * Post an event after a delay unless the state is left first
   */
  protected schedule(
    operation: string,
    delayMs: number,
    toEvent: (token: GenerationToken) => CaptureIntentEvent,
  ): GenerationToken {
    this.cancel(operation);
    const token = this.issueToken(operation);

    const timer = setTimeout(() => {
      this.timers.delete(operation);
      if (token.isValid()) {
        this.stateMachine.processEvent(toEvent(token));
      }
    }, delayMs);
    this.timers.set(operation, timer);

    return token;
  }

  /**
   * Invalidate the pending request or timer for an operation
   */
  protected cancel(operation: string): void {
    const timer = this.timers.get(operation);
    if (timer !== undefined) {
      clearTimeout(timer);
      this.timers.delete(operation);
    }
    this.tokens.get(operation)?.invalidate();
  }

  // ============================================================================
  // Internals
  // ============================================================================

  private ownsToken(token: GenerationToken): boolean {
    return token.isValid() && this.tokens.get(token.operation) === token;
  }

  private dropStale(event: HardwareEvent): void {
    intentLogger.debug(
      `${this.name}: Dropping stale ${event.type} (${event.token.toString()})`,
    );

    // Nobody owns this camera any more
    if (event.type === "CameraOpened") {
      event.camera
        .close()
        .catch((error: unknown) =>
          this.reportBackgroundError(error, "closeStaleCamera"),
        );
    }
  }

  private reportBackgroundError(error: unknown, operation: string): void {
    this.resources.errorSink.report(
      toCaptureIntentError(error, operation, this.name),
    );
  }
}

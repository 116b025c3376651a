import type { CaptureIntentError } from "../errors";
import { intentLogger } from "../logger";
import type { ResourceConstructed } from "../resource/resource-constructed";
import type { RefCountBase } from "../stateful/ref-count";
import type { State, StateMachine } from "../stateful/state";
import { StateBase, type EventHandlerMap } from "../stateful/state-base";
import { FinishingState } from "./state-finishing";

export interface FailureStateOptions {
  /** The error already went to the error sink */
  reported?: boolean;
}

/**
 * Transient: shows the user-facing message for an unrecoverable error and
 * moves straight on to Finishing with a Failed outcome.
 */
export class FailureState extends StateBase {
  readonly name = "Failure";

  protected readonly handlers: EventHandlerMap = {};

  constructor(
    stateMachine: StateMachine,
    resourceHandle: RefCountBase<ResourceConstructed>,
    readonly error: CaptureIntentError,
    private readonly options: FailureStateOptions = {},
  ) {
    super(stateMachine, resourceHandle);
  }

  onEnter(): State {
    intentLogger.warn(`Failure: ${this.error.message}`);

    if (!this.options.reported) {
      this.resources.errorSink.report(this.error);
    }
    this.resources.errorSink.showError(this.error.userMessage);

    return new FinishingState(this.stateMachine, this.resourceHandle, {
      type: "Failed",
      reason: this.error.message,
    });
  }
}

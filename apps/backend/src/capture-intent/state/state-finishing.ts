import type { IntentOutcome } from "@intentcam/types";
import { intentLogger } from "../logger";
import type { ResourceConstructed } from "../resource/resource-constructed";
import type { RefCountBase } from "../stateful/ref-count";
import type { State, StateMachine } from "../stateful/state";
import { StateBase, type EventHandlerMap } from "../stateful/state-base";

/**
 * Terminal state. Delivers the outcome once on entry and accepts nothing.
 */
export class FinishingState extends StateBase {
  readonly name = "Finishing";
  readonly isTerminal = true;

  protected readonly handlers: EventHandlerMap = {};

  constructor(
    stateMachine: StateMachine,
    resourceHandle: RefCountBase<ResourceConstructed>,
    readonly outcome: IntentOutcome,
  ) {
    super(stateMachine, resourceHandle);
  }

  onEnter(): State {
    this.resources.moduleUI.setShutterButtonEnabled(false);
    if (!this.resources.outcomeSink.deliver(this.outcome)) {
      intentLogger.warn(
        `Finishing: Outcome ${this.outcome.type} was not delivered, one already exists`,
      );
    }
    return this;
  }
}

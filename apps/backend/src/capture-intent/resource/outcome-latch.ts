import type { IntentOutcome } from "@intentcam/types";
import { intentLogger } from "../logger";

/**
 * Receives the single result of a capture intent
 */
export interface OutcomeSink {
  /** Returns false when an outcome was already delivered */
  deliver(outcome: IntentOutcome): boolean;
}

/**
 * Outcome sink that accepts exactly one outcome and lets callers await it.
 */
export class OutcomeLatch implements OutcomeSink {
  private outcome: IntentOutcome | null = null;
  private readonly waiters: ((outcome: IntentOutcome) => void)[] = [];

  deliver(outcome: IntentOutcome): boolean {
    if (this.outcome !== null) {
      intentLogger.warn(
        `OutcomeLatch: Ignoring second outcome ${outcome.type}, already ${this.outcome.type}`,
      );
      return false;
    }

    this.outcome = outcome;
    intentLogger.info(`OutcomeLatch: Delivered ${outcome.type}`);

    const waiters = this.waiters.splice(0);
    for (const resolve of waiters) {
      resolve(outcome);
    }
    return true;
  }

  getOutcome(): IntentOutcome | null {
    return this.outcome;
  }

  isDelivered(): boolean {
    return this.outcome !== null;
  }

  whenDelivered(): Promise<IntentOutcome> {
    if (this.outcome !== null) {
      return Promise.resolve(this.outcome);
    }
    return new Promise((resolve) => {
      this.waiters.push(resolve);
    });
  }
}

/**
 * Error sink
 *
 * Receives every error the workflow reports. Errors that end the workflow
 * also produce a user-visible message through showError().
 */

import type { CaptureIntentError } from "./errors";
import { intentLogger } from "./logger";

export interface ErrorSink {
  /** Log/telemetry channel; never shown to the user */
  report(error: CaptureIntentError): void;
  /** Human-readable message for an unrecoverable failure */
  showError(message: string): void;
}

export class LoggingErrorSink implements ErrorSink {
  private lastMessage: string | null = null;
  private reported: CaptureIntentError[] = [];
  private readonly maxRetained: number;

  constructor(maxRetained = 50) {
    this.maxRetained = maxRetained;
  }

  report(error: CaptureIntentError): void {
    intentLogger.error(`${error.name}: ${error.message}`, {
      error: error.toJSON(),
    });
    this.reported.push(error);
    if (this.reported.length > this.maxRetained) {
      this.reported = this.reported.slice(-this.maxRetained);
    }
  }

  showError(message: string): void {
    intentLogger.warn(`User-visible error: ${message}`);
    this.lastMessage = message;
  }

  getLastMessage(): string | null {
    return this.lastMessage;
  }

  getReported(): readonly CaptureIntentError[] {
    return this.reported;
  }
}

/**
 * Capture Intent Error Types
 *
 * Typed error hierarchy for the capture-intent workflow.
 * All errors carry structured context for logs and telemetry.
 */

import { ERROR_MESSAGES } from "@intentcam/config";

// ============================================================================
// Error Context Types
// ============================================================================

export interface CaptureIntentErrorContext {
  /** Operation being performed when the error occurred */
  operation: string;
  /** Name of the active state, if known */
  state?: string;
  /** Error timestamp (ISO string) */
  timestamp: string;
  /** Additional metadata */
  metadata?: Record<string, unknown>;
}

export type ErrorContextInput = Partial<
  Omit<CaptureIntentErrorContext, "timestamp">
>;

// ============================================================================
// Base Error
// ============================================================================

export class CaptureIntentError extends Error {
  public readonly context: CaptureIntentErrorContext;
  public readonly timestamp: string;
  /** Message safe to show to the end user */
  public readonly userMessage: string;

  constructor(
    message: string,
    context: ErrorContextInput & { operation: string },
    userMessage: string = ERROR_MESSAGES.UNEXPECTED,
  ) {
    super(message);
    this.name = "CaptureIntentError";
    this.timestamp = new Date().toISOString();
    this.userMessage = userMessage;
    this.context = {
      operation: context.operation,
      state: context.state,
      metadata: context.metadata,
      timestamp: this.timestamp,
    };

    // Ensure prototype chain is correct
    Object.setPrototypeOf(this, CaptureIntentError.prototype);
  }

  /**
   * Get formatted error details for logging
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      timestamp: this.timestamp,
      context: this.context,
    };
  }
}

// ============================================================================
// Hardware Acquisition Errors
// ============================================================================

/**
 * A single failed call into the camera driver (open, characteristics).
 */
export class CameraAccessError extends CaptureIntentError {
  public readonly reason: string;

  constructor(reason: string, context?: ErrorContextInput) {
    super(
      `Camera access failed: ${reason}`,
      {
        ...context,
        operation: context?.operation || "openCamera",
      },
      reason === "disabled"
        ? ERROR_MESSAGES.CAMERA_DISABLED
        : ERROR_MESSAGES.CANNOT_CONNECT_CAMERA,
    );
    this.name = "CameraAccessError";
    this.reason = reason;
    Object.setPrototypeOf(this, CameraAccessError.prototype);
  }
}

/**
 * The camera could not be acquired within the allowed attempts.
 */
export class ResourceAcquisitionError extends CaptureIntentError {
  public readonly attempts: number;
  public readonly lastError: Error | null;

  constructor(
    attempts: number,
    lastError: Error | null,
    context?: ErrorContextInput,
  ) {
    super(
      `Camera could not be acquired after ${attempts} attempt${attempts === 1 ? "" : "s"}`,
      {
        ...context,
        operation: context?.operation || "openCamera",
      },
      lastError instanceof CameraAccessError
        ? lastError.userMessage
        : ERROR_MESSAGES.CANNOT_CONNECT_CAMERA,
    );
    this.name = "ResourceAcquisitionError";
    this.attempts = attempts;
    this.lastError = lastError;
    Object.setPrototypeOf(this, ResourceAcquisitionError.prototype);
  }
}

export class PreviewError extends CaptureIntentError {
  constructor(message: string, context?: ErrorContextInput) {
    super(
      `Preview error: ${message}`,
      {
        ...context,
        operation: context?.operation || "startPreview",
      },
      ERROR_MESSAGES.PREVIEW_FAILED,
    );
    this.name = "PreviewError";
    Object.setPrototypeOf(this, PreviewError.prototype);
  }
}

// ============================================================================
// Capture Errors
// ============================================================================

export class CaptureTimeoutError extends CaptureIntentError {
  public readonly timeoutMs: number;

  constructor(timeoutMs: number, context?: ErrorContextInput) {
    super(
      `Capture timed out after ${timeoutMs}ms`,
      {
        ...context,
        operation: context?.operation || "capture",
      },
      ERROR_MESSAGES.CAPTURE_FAILED,
    );
    this.name = "CaptureTimeoutError";
    this.timeoutMs = timeoutMs;
    Object.setPrototypeOf(this, CaptureTimeoutError.prototype);
  }
}

export class CaptureFailedError extends CaptureIntentError {
  constructor(message: string, context?: ErrorContextInput) {
    super(
      `Capture failed: ${message}`,
      {
        ...context,
        operation: context?.operation || "capture",
      },
      ERROR_MESSAGES.CAPTURE_FAILED,
    );
    this.name = "CaptureFailedError";
    Object.setPrototypeOf(this, CaptureFailedError.prototype);
  }
}

export class CardFullError extends CaptureIntentError {
  constructor(context?: ErrorContextInput) {
    super(
      "Photo storage is full",
      {
        ...context,
        operation: context?.operation || "capture",
      },
      ERROR_MESSAGES.STORAGE_FULL,
    );
    this.name = "CardFullError";
    Object.setPrototypeOf(this, CardFullError.prototype);
  }
}

export class FocusFailedError extends CaptureIntentError {
  constructor(message: string, context?: ErrorContextInput) {
    super(`Focus failed: ${message}`, {
      ...context,
      operation: context?.operation || "focus",
    });
    this.name = "FocusFailedError";
    Object.setPrototypeOf(this, FocusFailedError.prototype);
  }
}

// ============================================================================
// Programming Errors
// ============================================================================

/**
 * API misuse or a transition the machine refuses to perform.
 * The machine stays in its last valid state.
 */
export class InvalidTransitionError extends CaptureIntentError {
  constructor(message: string, context?: ErrorContextInput) {
    super(`Invalid transition: ${message}`, {
      ...context,
      operation: context?.operation || "stateTransition",
    });
    this.name = "InvalidTransitionError";
    Object.setPrototypeOf(this, InvalidTransitionError.prototype);
  }
}

/**
 * Reference count mismatch on a shared resource handle.
 */
export class ResourceLeakDetectedError extends CaptureIntentError {
  public readonly resourceName: string;

  constructor(
    resourceName: string,
    message: string,
    context?: ErrorContextInput,
  ) {
    super(`Resource leak detected on ${resourceName}: ${message}`, {
      ...context,
      operation: context?.operation || "release",
    });
    this.name = "ResourceLeakDetectedError";
    this.resourceName = resourceName;
    Object.setPrototypeOf(this, ResourceLeakDetectedError.prototype);
  }
}

// ============================================================================
// Helpers
// ============================================================================

/**
 * Normalize anything thrown into a CaptureIntentError
 */
export function toCaptureIntentError(
  error: unknown,
  operation: string,
  state?: string,
): CaptureIntentError {
  if (error instanceof CaptureIntentError) {
    return error;
  }
  const message = error instanceof Error ? error.message : String(error);
  return new CaptureIntentError(message, {
    operation,
    state,
    metadata: error instanceof Error ? { cause: error.name } : undefined,
  });
}

/**
 * Check if an error should end the workflow instead of returning to preview
 */
export function isFatalError(error: Error): boolean {
  if (error instanceof ResourceAcquisitionError) return true;
  if (error instanceof CameraAccessError) return true;
  if (error instanceof PreviewError) return true;
  if (error instanceof CardFullError) return true;
  if (error instanceof CaptureTimeoutError) return false; // Back to preview
  if (error instanceof CaptureFailedError) return false;

  return false;
}

/**
 * Check if a camera open failure is worth another attempt
 */
export function isRetryableError(error: Error): boolean {
  if (error instanceof CameraAccessError) {
    return error.reason !== "disabled";
  }
  return !(error instanceof CaptureIntentError);
}

/**
 * Extract a message from anything thrown
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Reference-counted resource handle
 *
 * acquire() hands out a Borrow and increments the count; releasing the
 * last borrow closes the underlying object exactly once. Releasing more
 * often than acquired is reported as a ResourceLeakDetectedError: thrown
 * in strict mode, logged otherwise.
 */

import {
  CaptureIntentError,
  ResourceLeakDetectedError,
  toCaptureIntentError,
} from "../errors";
import { intentLogger } from "../logger";
import type { ResourceTracker, TrackedHandle } from "./resource-tracker";

export interface RefCountOptions<T> {
  name: string;
  closer: (object: T) => void | Promise<void>;
  /** Throw on count mismatches instead of logging */
  strict?: boolean;
  tracker?: ResourceTracker;
  onError?: (error: CaptureIntentError) => void;
}

export interface Borrow<T> {
  readonly released: boolean;
  get(): T;
  /** Idempotent */
  release(): void;
}

class RefCountBorrow<T> implements Borrow<T> {
  private isReleased = false;

  constructor(private readonly handle: RefCountBase<T>) {}

  get released(): boolean {
    return this.isReleased;
  }

  get(): T {
    if (this.isReleased) {
      throw new CaptureIntentError(
        `Borrow of ${this.handle.name} used after release`,
        { operation: "borrow" },
      );
    }
    return this.handle.get();
  }

  release(): void {
    if (this.isReleased) {
      return;
    }
    this.isReleased = true;
    this.handle.release();
  }
}

export class RefCountBase<T> implements TrackedHandle {
  private refCount = 0;
  private closed = false;

  constructor(
    private readonly object: T,
    private readonly options: RefCountOptions<T>,
  ) {
    options.tracker?.track(this);
  }

  get name(): string {
    return this.options.name;
  }

  acquire(): Borrow<T> {
    if (this.closed) {
      throw new CaptureIntentError(`${this.name} acquired after close`, {
        operation: "acquire",
      });
    }
    this.refCount++;
    return new RefCountBorrow(this);
  }

  release(): void {
    if (this.refCount <= 0) {
      this.reportMismatch();
      return;
    }

    this.refCount--;
    if (this.refCount === 0) {
      this.close();
    }
  }

  get(): T {
    if (this.closed) {
      throw new CaptureIntentError(`${this.name} used after close`, {
        operation: "get",
      });
    }
    return this.object;
  }

  getRefCount(): number {
    return this.refCount;
  }

  isClosed(): boolean {
    return this.closed;
  }

  forceClose(): void {
    if (this.closed) {
      return;
    }
    intentLogger.warn(
      `RefCount: Force closing ${this.name} with ${this.refCount} reference(s)`,
    );
    this.refCount = 0;
    this.close();
  }

  private close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.options.tracker?.untrack(this);

    try {
      const result = this.options.closer(this.object);
      if (result instanceof Promise) {
        result.catch((error: unknown) => this.reportCloseError(error));
      }
    } catch (error) {
      this.reportCloseError(error);
    }
  }

  private reportCloseError(error: unknown): void {
    const wrapped = toCaptureIntentError(error, `close:${this.name}`);
    intentLogger.error(`RefCount: Failed to close ${this.name}`, {
      error: wrapped.toJSON(),
    });
    this.options.onError?.(wrapped);
  }

  private reportMismatch(): void {
    const error = new ResourceLeakDetectedError(
      this.name,
      "released more times than acquired",
    );

    if (this.options.strict) {
      throw error;
    }

    intentLogger.error("RefCount: Release count mismatch", {
      error: error.toJSON(),
    });
    this.options.onError?.(error);
  }
}

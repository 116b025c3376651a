/**
 * Resource Tracker
 *
 * Records every exclusive resource handle that is still open so module
 * teardown can detect (and force-close) anything a state failed to release.
 */

import { ResourceLeakDetectedError } from "../errors";
import { intentLogger } from "../logger";

export interface TrackedHandle {
  readonly name: string;
  getRefCount(): number;
  isClosed(): boolean;
  forceClose(): void;
}

export interface TrackedResource {
  name: string;
  refCount: number;
  trackedAt: number;
}

export class ResourceTracker {
  private readonly handles = new Map<TrackedHandle, number>();

  track(handle: TrackedHandle): void {
    this.handles.set(handle, Date.now());
    intentLogger.debug(`ResourceTracker: Tracking ${handle.name}`);
  }

  untrack(handle: TrackedHandle): void {
    if (this.handles.delete(handle)) {
      intentLogger.debug(`ResourceTracker: Released ${handle.name}`);
    }
  }

  getOpenResources(): TrackedResource[] {
    return Array.from(this.handles.entries()).map(([handle, trackedAt]) => ({
      name: handle.name,
      refCount: handle.getRefCount(),
      trackedAt,
    }));
  }

  get openCount(): number {
    return this.handles.size;
  }

  /**
   * Force-close every handle still open (newest first) and return one
   * leak error per handle.
   */
  closeLeaked(): ResourceLeakDetectedError[] {
    const leaked = Array.from(this.handles.keys()).reverse();
    const errors: ResourceLeakDetectedError[] = [];

    for (const handle of leaked) {
      errors.push(
        new ResourceLeakDetectedError(
          handle.name,
          `still held with ${handle.getRefCount()} reference(s) at teardown`,
          { operation: "teardown" },
        ),
      );
      handle.forceClose();
      this.handles.delete(handle);
    }

    return errors;
  }
}

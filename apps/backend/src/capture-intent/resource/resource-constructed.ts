/**
 * Module-lifetime resources
 *
 * Everything a state needs that outlives any single state: the request,
 * the UI, the camera manager, settings and the outcome sink. Held through
 * a ref-counted handle; the module and every live state each hold one
 * borrow, and the last release runs the leak check and disposes the camera
 * manager.
 */

import type { CaptureIntentRequest } from "@intentcam/types";
import type { CameraAccessPoint } from "../camera/types";
import type { CaptureIntentConfig } from "../config";
import type { ErrorSink } from "../error-sink";
import { toCaptureIntentError } from "../errors";
import { intentLogger } from "../logger";
import { RefCountBase } from "../stateful/ref-count";
import { ResourceTracker } from "../stateful/resource-tracker";
import type { CaptureIntentSettings } from "./capture-intent-settings";
import type { CaptureIntentModuleUI } from "./module-ui";
import type { OutcomeSink } from "./outcome-latch";
import type { LocationProvider, OrientationProvider } from "./providers";

export interface ResourceConstructed {
  readonly request: CaptureIntentRequest;
  readonly moduleUI: CaptureIntentModuleUI;
  readonly cameraAccess: CameraAccessPoint;
  readonly settings: CaptureIntentSettings;
  readonly errorSink: ErrorSink;
  readonly orientation: OrientationProvider;
  readonly location: LocationProvider;
  readonly outcomeSink: OutcomeSink;
  readonly config: CaptureIntentConfig;
  /** Tracks exclusive per-state resources such as the opened camera */
  readonly tracker: ResourceTracker;
}

export type ResourceConstructedDeps = Omit<ResourceConstructed, "tracker"> & {
  tracker?: ResourceTracker;
};

export class ResourceConstructedImpl implements ResourceConstructed {
  readonly request: CaptureIntentRequest;
  readonly moduleUI: CaptureIntentModuleUI;
  readonly cameraAccess: CameraAccessPoint;
  readonly settings: CaptureIntentSettings;
  readonly errorSink: ErrorSink;
  readonly orientation: OrientationProvider;
  readonly location: LocationProvider;
  readonly outcomeSink: OutcomeSink;
  readonly config: CaptureIntentConfig;
  readonly tracker: ResourceTracker;

  private constructor(deps: ResourceConstructedDeps) {
    this.request = deps.request;
    this.moduleUI = deps.moduleUI;
    this.cameraAccess = deps.cameraAccess;
    this.settings = deps.settings;
    this.errorSink = deps.errorSink;
    this.orientation = deps.orientation;
    this.location = deps.location;
    this.outcomeSink = deps.outcomeSink;
    this.config = deps.config;
    this.tracker = deps.tracker ?? new ResourceTracker();
  }

  static create(
    deps: ResourceConstructedDeps,
  ): RefCountBase<ResourceConstructed> {
    const resources = new ResourceConstructedImpl(deps);
    return new RefCountBase<ResourceConstructed>(resources, {
      name: `ResourceConstructed:${deps.request.requestId}`,
      strict: deps.config.strictResourceChecks,
      closer: (held) => ResourceConstructedImpl.close(held),
      onError: (error) => deps.errorSink.report(error),
    });
  }

  private static async close(resources: ResourceConstructed): Promise<void> {
    const leaks = resources.tracker.closeLeaked();
    for (const leak of leaks) {
      resources.errorSink.report(leak);
    }

    intentLogger.info(
      `ResourceConstructed: Closed for ${resources.request.requestId}` +
        (leaks.length > 0 ? ` (${leaks.length} leaked resource(s))` : ""),
    );

    if (resources.cameraAccess.dispose) {
      try {
        await resources.cameraAccess.dispose();
      } catch (error) {
        resources.errorSink.report(
          toCaptureIntentError(error, "disposeCameraAccess"),
        );
      }
    }
  }
}

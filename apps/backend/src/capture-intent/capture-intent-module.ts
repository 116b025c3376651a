/**
 * Capture Intent Module
 *
 * Boundary adapter between a host (UI toolkit, HTTP service, tests) and the
 * capture-intent state machine. Every host callback becomes one Event;
 * capability queries are answered from the module resources, never from
 * the current state.
 */

import { ERROR_MESSAGES, UI_STRINGS } from "@intentcam/config";
import type {
  BottomBarAction,
  BottomBarUISpec,
  CaptureIntentRequest,
  HardwareSpec,
  IntentOutcome,
  SurfaceHandle,
} from "@intentcam/types";
import type { CameraAccessPoint } from "./camera/types";
import { resolveConfig, type CaptureIntentConfig } from "./config";
import { LoggingErrorSink, type ErrorSink } from "./error-sink";
import { CameraAccessError } from "./errors";
import { Events, type CaptureIntentEvent } from "./events";
import { intentLogger } from "./logger";
import { CaptureIntentSettings } from "./resource/capture-intent-settings";
import type { CaptureIntentModuleUI } from "./resource/module-ui";
import { OutcomeLatch } from "./resource/outcome-latch";
import {
  FixedLocationProvider,
  FixedOrientationProvider,
  type LocationProvider,
  type OrientationProvider,
} from "./resource/providers";
import {
  ResourceConstructedImpl,
  type ResourceConstructed,
} from "./resource/resource-constructed";
import { BackgroundState } from "./state/state-background";
import { FailureState } from "./state/state-failure";
import type { Borrow, RefCountBase } from "./stateful/ref-count";
import type { TrackedResource } from "./stateful/resource-tracker";
import { StateMachineImpl } from "./stateful/state-machine";

export interface CaptureIntentModuleOptions {
  request: CaptureIntentRequest;
  moduleUI: CaptureIntentModuleUI;
  cameraAccess: CameraAccessPoint;
  errorSink?: ErrorSink;
  settings?: CaptureIntentSettings;
  orientation?: OrientationProvider;
  location?: LocationProvider;
  config?: Partial<CaptureIntentConfig>;
}

const BOTTOM_BAR_EVENTS: Record<BottomBarAction, () => CaptureIntentEvent> = {
  camera: Events.switchCameraTap,
  cancel: Events.cancelIntentTap,
  done: Events.confirmPhotoTap,
  retake: Events.retakePhotoTap,
};

export class CaptureIntentModule {
  private readonly resourceHandle: RefCountBase<ResourceConstructed>;
  private readonly resourceBorrow: Borrow<ResourceConstructed>;
  private readonly resources: ResourceConstructed;
  private readonly outcome = new OutcomeLatch();
  private readonly stateMachine: StateMachineImpl;
  private destroyed = false;

  constructor(options: CaptureIntentModuleOptions) {
    const config = resolveConfig(options.config);
    const settings = options.settings ?? new CaptureIntentSettings();
    const errorSink = options.errorSink ?? new LoggingErrorSink();

    const preferred = options.request.preferredFacing;
    if (preferred && options.cameraAccess.hasCameraFacing(preferred)) {
      settings.setCameraFacing(preferred);
    }

    const handle = ResourceConstructedImpl.create({
      request: options.request,
      moduleUI: options.moduleUI,
      cameraAccess: options.cameraAccess,
      settings,
      errorSink,
      orientation: options.orientation ?? new FixedOrientationProvider(),
      location: options.location ?? new FixedLocationProvider(),
      outcomeSink: this.outcome,
      config,
    });
    this.resourceHandle = handle;
    this.resourceBorrow = handle.acquire();
    this.resources = this.resourceBorrow.get();

    const stateMachine: StateMachineImpl = new StateMachineImpl({
      errorSink,
      createFailureState: (error) =>
        new FailureState(stateMachine, handle, error, { reported: true }),
    });
    this.stateMachine = stateMachine;
    stateMachine.setInitialState(new BackgroundState(stateMachine, handle));

    intentLogger.info(
      `CaptureIntentModule: Created for request ${options.request.requestId}`,
      { settings: settings.toJSON() },
    );
  }

  // ============================================================================
  // Lifecycle
  // ============================================================================

  resume(): void {
    if (this.isDestroyed("resume")) return;
    this.resources.moduleUI.onModuleResumed();
    this.post(Events.resume());
  }

  pause(): void {
    if (this.isDestroyed("pause")) return;
    this.post(Events.pause());
    this.resources.moduleUI.onModulePaused();
  }

  /**
   * Stop the machine and release module resources. An intent destroyed
   * before it finished resolves as Cancelled.
   */
  destroy(): void {
    if (this.destroyed) {
      return;
    }
    this.destroyed = true;

    this.stateMachine.shutdown();
    if (!this.outcome.isDelivered()) {
      this.outcome.deliver({ type: "Cancelled" });
    }
    this.resourceBorrow.release();

    intentLogger.info(
      `CaptureIntentModule: Destroyed request ${this.resources.request.requestId}`,
    );
  }

  // ============================================================================
  // UI input
  // ============================================================================

  onShutterButtonClick(): void {
    this.post(Events.shutterTap());
  }

  onCancelShutterButtonClick(): void {
    this.post(Events.cancelShutterTap());
  }

  onZoomRatioChanged(ratio: number): void {
    this.post(Events.zoomChanged(ratio));
  }

  onBottomBarAction(action: BottomBarAction): void {
    this.post(BOTTOM_BAR_EVENTS[action]());
  }

  // ============================================================================
  // Preview status
  // ============================================================================

  onPreviewLayoutChanged(
    left: number,
    top: number,
    right: number,
    bottom: number,
  ): void {
    this.post(
      Events.previewLayoutChanged({ width: right - left, height: bottom - top }),
    );
  }

  onSurfaceTextureAvailable(surface: SurfaceHandle): void {
    this.post(Events.surfaceAvailable(surface));
  }

  /**
   * Returns true: the surface may be released by the host right away
   */
  onSurfaceTextureDestroyed(): boolean {
    this.post(Events.surfaceDestroyed());
    return true;
  }

  onSurfaceTextureUpdated(): void {
    this.post(Events.surfaceUpdated());
  }

  onSingleTapUp(x: number, y: number): void {
    this.post(Events.previewTap({ x: Math.trunc(x), y: Math.trunc(y) }));
  }

  // ============================================================================
  // Capability queries
  // ============================================================================

  getHardwareSpec(): HardwareSpec | null {
    const { cameraAccess, settings, errorSink } = this.resources;
    try {
      const characteristics = cameraAccess.getCameraCharacteristics(
        settings.getCameraFacing(),
      );
      return {
        isFrontCameraSupported: cameraAccess.hasCameraFacing("front"),
        isHdrSupported: false,
        isHdrPlusSupported: false,
        isFlashSupported: characteristics.isFlashSupported,
      };
    } catch (error) {
      if (error instanceof CameraAccessError) {
        errorSink.report(error);
        errorSink.showError(ERROR_MESSAGES.CANNOT_CONNECT_CAMERA);
        return null;
      }
      throw error;
    }
  }

  getBottomBarSpec(): BottomBarUISpec {
    return {
      enableCamera: true,
      enableGridLines: true,
      enableHdr: false,
      hideHdr: true,
      enableSelfTimer: true,
      showSelfTimer: true,
      enableFlash: true,
      hideFlash: false,
      showCancel: true,
      showDone: true,
      showRetake: true,
      actions: ["camera", "cancel", "done", "retake"],
    };
  }

  isUsingBottomBar(): boolean {
    return true;
  }

  getPeekAccessibilityString(): string {
    return UI_STRINGS.PHOTO_ACCESSIBILITY_PEEK;
  }

  // ============================================================================
  // Outcome & introspection
  // ============================================================================

  whenFinished(): Promise<IntentOutcome> {
    return this.outcome.whenDelivered();
  }

  getOutcome(): IntentOutcome | null {
    return this.outcome.getOutcome();
  }

  getRequest(): CaptureIntentRequest {
    return this.resources.request;
  }

  getSettings(): CaptureIntentSettings {
    return this.resources.settings;
  }

  getCurrentStateName(): string {
    return this.stateMachine.getCurrentState()?.name ?? "None";
  }

  getStateMachine(): StateMachineImpl {
    return this.stateMachine;
  }

  getOpenResources(): TrackedResource[] {
    return this.resources.tracker.getOpenResources();
  }

  /**
   * Borrows currently held on the module resources
   */
  getResourceRefCount(): number {
    return this.resourceHandle.getRefCount();
  }

  isFinished(): boolean {
    return this.outcome.isDelivered();
  }

  private post(event: CaptureIntentEvent): void {
    if (this.isDestroyed(event.type)) return;
    this.stateMachine.processEvent(event);
  }

  private isDestroyed(operation: string): boolean {
    if (this.destroyed) {
      intentLogger.debug(
        `CaptureIntentModule: ${operation} after destroy ignored`,
      );
    }
    return this.destroyed;
  }
}

import type { Point } from "@intentcam/types";
import type { OpenedCamera } from "../camera/types";
import { FocusFailedError, errorMessage } from "../errors";
import { Events } from "../events";
import { intentLogger } from "../logger";
import type { ResourceConstructed } from "../resource/resource-constructed";
import type { RefCountBase } from "../stateful/ref-count";
import type { State, StateMachine } from "../stateful/state";
import type { EventHandlerMap } from "../stateful/state-base";
import { CameraHoldingState } from "./camera-holding-state";
import type { PreviewContext } from "./preview-context";
import { stateForShutter } from "./shutter";
import { BackgroundState } from "./state-background";
import { FinishingState } from "./state-finishing";
import { PreviewReadyState } from "./state-preview-ready";
import { PreviewSetupState } from "./state-preview-setup";

/**
 * Tap-to-focus sweep in progress. The shutter stays live; a new tap
 * restarts the sweep at the new point.
 */
export class FocusLockState extends CameraHoldingState {
  readonly name = "FocusLock";

  readonly point: Readonly<Point>;

  protected readonly handlers: EventHandlerMap = {
    FocusCompleted: (event) => {
      intentLogger.debug(
        `FocusLock: Focus ${event.locked ? "locked" : "not locked"}`,
      );
      return new PreviewReadyState(
        this.stateMachine,
        this.resourceHandle,
        this.cameraHandle,
        this.nextPreview(),
      );
    },
    ShutterTap: () =>
      stateForShutter(
        this.stateMachine,
        this.resourceHandle,
        this.cameraHandle,
        this.nextPreview(),
        this.resources.settings.getTimerSeconds(),
      ),
    PreviewTap: (event) =>
      new FocusLockState(
        this.stateMachine,
        this.resourceHandle,
        this.cameraHandle,
        this.nextPreview(),
        event.point,
      ),
    ZoomChanged: (event) => this.applyZoom(event.ratio),
    SurfaceDestroyed: () =>
      new PreviewSetupState(this.stateMachine, this.resourceHandle, {
        preview: { ...this.restartPreview(), surface: null },
        cameraHandle: this.cameraHandle,
      }),
    SurfaceUpdated: () => this,
    PreviewLayoutChanged: (event) => this.applyLayout(event.size),
    Pause: () =>
      new BackgroundState(
        this.stateMachine,
        this.resourceHandle,
        this.restartPreview(),
      ),
    CancelIntentTap: () =>
      new FinishingState(this.stateMachine, this.resourceHandle, {
        type: "Cancelled",
      }),
  };

  constructor(
    stateMachine: StateMachine,
    resourceHandle: RefCountBase<ResourceConstructed>,
    cameraHandle: RefCountBase<OpenedCamera>,
    preview: PreviewContext,
    point: Point,
  ) {
    super(stateMachine, resourceHandle, cameraHandle, preview);
    this.point = { x: point.x, y: point.y };
  }

  onEnter(): State {
    const point = this.point;
    this.resources.moduleUI.showFocusIndicator(point);

    this.request(
      "focus",
      () => this.camera.triggerFocus(point),
      (token, locked) => Events.focusCompleted(token, locked),
      (token, error) => {
        this.resources.errorSink.report(
          new FocusFailedError(errorMessage(error), { state: this.name }),
        );
        return Events.focusCompleted(token, false);
      },
    );
    return this;
  }

  protected releaseResources(): void {
    this.resources.moduleUI.clearFocusIndicator();
  }
}

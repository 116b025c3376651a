import type { CameraFacing } from "@intentcam/types";
import { formatPoint } from "@intentcam/utils";
import { intentLogger } from "../logger";
import type { State } from "../stateful/state";
import type { EventHandlerMap } from "../stateful/state-base";
import { CameraHoldingState } from "./camera-holding-state";
import { emptyPreviewContext } from "./preview-context";
import { stateForShutter } from "./shutter";
import { BackgroundState } from "./state-background";
import { FinishingState } from "./state-finishing";
import { FocusLockState } from "./state-focus-lock";
import { PreviewSetupState } from "./state-preview-setup";

/**
 * Preview is streaming and the shutter is live.
 */
export class PreviewReadyState extends CameraHoldingState {
  readonly name = "PreviewReady";

  protected readonly handlers: EventHandlerMap = {
    ShutterTap: () =>
      stateForShutter(
        this.stateMachine,
        this.resourceHandle,
        this.cameraHandle,
        this.nextPreview(),
        this.resources.settings.getTimerSeconds(),
      ),
    PreviewTap: (event) => {
      intentLogger.debug(`PreviewReady: Focus tap at ${formatPoint(event.point)}`);
      return new FocusLockState(
        this.stateMachine,
        this.resourceHandle,
        this.cameraHandle,
        this.nextPreview(),
        event.point,
      );
    },
    ZoomChanged: (event) => this.applyZoom(event.ratio),
    SwitchCameraTap: (event) => {
      const target: CameraFacing =
        this.camera.facing === "back" ? "front" : "back";
      if (!this.resources.cameraAccess.hasCameraFacing(target)) {
        intentLogger.info(`PreviewReady: No ${target} camera to switch to`);
        this.ignore(event);
        return this;
      }

      this.resources.settings.setCameraFacing(target);
      return new PreviewSetupState(this.stateMachine, this.resourceHandle, {
        preview: {
          ...emptyPreviewContext(),
          surface: this.preview.surface,
          layoutSize: this.preview.layoutSize,
        },
      });
    },
    SurfaceDestroyed: () =>
      new PreviewSetupState(this.stateMachine, this.resourceHandle, {
        preview: { ...this.restartPreview(), surface: null },
        cameraHandle: this.cameraHandle,
      }),
    SurfaceUpdated: () => {
      if (!this.preview.firstFrameShown) {
        this.preview.firstFrameShown = true;
        this.resources.moduleUI.onPreviewStarted();
      }
      return this;
    },
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

  onEnter(): State {
    const { moduleUI } = this.resources;
    if (this.preview.layoutSize && this.preview.previewSize) {
      moduleUI.updatePreviewTransform(
        this.preview.layoutSize,
        this.preview.previewSize,
      );
    }
    moduleUI.setShutterButtonEnabled(true);
    return this;
  }
}

/**
 * CapturingPhoto
 *
 * One takePicture() request, bounded by the capture timeout. Surface
 * changes are only recorded here; they decide where a failed capture
 * returns to.
 */

import { formatDuration } from "@intentcam/utils";
import {
  CaptureFailedError,
  CaptureIntentError,
  CaptureTimeoutError,
  errorMessage,
  isFatalError,
} from "../errors";
import { Events, type CaptureFailedEvent } from "../events";
import { intentLogger } from "../logger";
import type { State } from "../stateful/state";
import type { EventHandlerMap } from "../stateful/state-base";
import { CameraHoldingState } from "./camera-holding-state";
import { BackgroundState } from "./state-background";
import { FailureState } from "./state-failure";
import { FinishingState } from "./state-finishing";
import { PhotoReviewingState } from "./state-photo-reviewing";
import { PreviewReadyState } from "./state-preview-ready";
import { PreviewSetupState } from "./state-preview-setup";

export class CapturingPhotoState extends CameraHoldingState {
  readonly name = "CapturingPhoto";

  private surfaceChanged = false;

  protected readonly handlers: EventHandlerMap = {
    CaptureSucceeded: (event) => {
      intentLogger.info(`CapturingPhoto: Captured ${event.photo.uri}`);
      return new PhotoReviewingState(
        this.stateMachine,
        this.resourceHandle,
        this.cameraHandle,
        this.nextPreview(),
        event.photo,
      );
    },
    CaptureFailed: (event) => this.onCaptureFailed(event),
    SurfaceAvailable: (event) => {
      this.preview.surface = { ...event.surface };
      this.surfaceChanged = true;
      return this;
    },
    SurfaceDestroyed: () => {
      this.preview.surface = null;
      this.surfaceChanged = true;
      return this;
    },
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
    const { moduleUI, settings, orientation, location, config } = this.resources;
    moduleUI.setShutterButtonEnabled(false);

    const params = {
      flashMode: settings.getFlashMode(),
      orientation: orientation.getOrientation(),
      location: location.getLocation(),
    };

    this.request(
      "capture",
      () => this.camera.takePicture(params),
      (token, photo) => Events.captureSucceeded(token, photo),
      (token, error) =>
        Events.captureFailed(
          token,
          error instanceof CaptureIntentError
            ? error
            : new CaptureFailedError(errorMessage(error), { state: this.name }),
        ),
    );

    const timeoutMs = config.captureTimeoutMs;
    this.schedule("captureTimeout", timeoutMs, (token) =>
      Events.captureFailed(
        token,
        new CaptureTimeoutError(timeoutMs, { state: this.name }),
      ),
    );

    intentLogger.info(
      `CapturingPhoto: Capture started (timeout ${formatDuration(timeoutMs)})`,
    );
    return this;
  }

  private onCaptureFailed(event: CaptureFailedEvent): State {
    if (isFatalError(event.error)) {
      return new FailureState(this.stateMachine, this.resourceHandle, event.error);
    }

    this.resources.errorSink.report(event.error);

    if (this.surfaceChanged || this.preview.surface === null) {
      return new PreviewSetupState(this.stateMachine, this.resourceHandle, {
        preview: this.restartPreview(),
        cameraHandle: this.cameraHandle,
      });
    }

    return new PreviewReadyState(
      this.stateMachine,
      this.resourceHandle,
      this.cameraHandle,
      this.nextPreview(),
    );
  }
}

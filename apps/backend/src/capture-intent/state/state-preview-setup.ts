/**
 * PreviewSetup
 *
 * Gets the camera into a streaming state. Opens the camera unless one is
 * handed over, then starts the preview as soon as a surface is known.
 * Open failures are retried a bounded number of times.
 */

import type { CameraFacing } from "@intentcam/types";
import { formatSize } from "@intentcam/utils";
import type { OpenedCamera } from "../camera/types";
import {
  CameraAccessError,
  CaptureIntentError,
  PreviewError,
  ResourceAcquisitionError,
  errorMessage,
  isRetryableError,
} from "../errors";
import { Events, type CameraOpenFailedEvent, type CameraOpenedEvent } from "../events";
import { intentLogger } from "../logger";
import type { ResourceConstructed } from "../resource/resource-constructed";
import { RefCountBase } from "../stateful/ref-count";
import type { State, StateMachine } from "../stateful/state";
import { StateBase, type EventHandlerMap } from "../stateful/state-base";
import type { PreviewContext } from "./preview-context";
import { BackgroundState } from "./state-background";
import { FailureState } from "./state-failure";
import { FinishingState } from "./state-finishing";
import { PreviewReadyState } from "./state-preview-ready";

export interface PreviewSetupOptions {
  preview: PreviewContext;
  /** Already opened camera to reuse instead of opening one */
  cameraHandle?: RefCountBase<OpenedCamera>;
}

export class PreviewSetupState extends StateBase {
  readonly name = "PreviewSetup";

  private readonly preview: PreviewContext;
  private readonly facing: CameraFacing;
  private cameraHandle: RefCountBase<OpenedCamera> | null = null;
  private camera: OpenedCamera | null = null;
  private openAttempts = 0;
  private previewRequested = false;

  protected readonly handlers: EventHandlerMap = {
    CameraOpened: (event) => this.onCameraOpened(event),
    CameraOpenFailed: (event) => this.onCameraOpenFailed(event),
    SurfaceAvailable: (event) => {
      this.preview.surface = { ...event.surface };
      this.previewRequested = false;
      this.startPreviewIfReady();
      return this;
    },
    SurfaceDestroyed: () => {
      this.preview.surface = null;
      this.previewRequested = false;
      this.cancel("startPreview");
      return this;
    },
    PreviewLayoutChanged: (event) => {
      this.preview.layoutSize = { ...event.size };
      return this;
    },
    PreviewStarted: (event) => {
      if (!this.cameraHandle) {
        this.ignore(event);
        return this;
      }
      intentLogger.info(
        `PreviewSetup: Preview running at ${formatSize(event.previewSize)}`,
      );
      return new PreviewReadyState(
        this.stateMachine,
        this.resourceHandle,
        this.cameraHandle,
        { ...this.preview, previewSize: { ...event.previewSize } },
      );
    },
    PreviewFailed: (event) =>
      new FailureState(this.stateMachine, this.resourceHandle, event.error),
    Pause: () =>
      new BackgroundState(this.stateMachine, this.resourceHandle, this.preview),
    CancelIntentTap: () =>
      new FinishingState(this.stateMachine, this.resourceHandle, {
        type: "Cancelled",
      }),
  };

  constructor(
    stateMachine: StateMachine,
    resourceHandle: RefCountBase<ResourceConstructed>,
    options: PreviewSetupOptions,
  ) {
    super(stateMachine, resourceHandle);
    this.preview = {
      ...options.preview,
      previewSize: null,
      firstFrameShown: false,
    };

    if (options.cameraHandle) {
      this.adopt(options.cameraHandle);
    }
    this.facing = this.camera?.facing ?? this.resources.settings.getCameraFacing();
  }

  onEnter(): State {
    this.resources.moduleUI.setShutterButtonEnabled(false);

    if (this.camera) {
      this.startPreviewIfReady();
    } else {
      this.openCamera();
    }
    return this;
  }

  getOpenAttempts(): number {
    return this.openAttempts;
  }

  private openCamera(): void {
    this.openAttempts++;
    const { cameraAccess } = this.resources;
    const facing = this.facing;

    intentLogger.info(
      `PreviewSetup: Opening ${facing} camera (attempt ${this.openAttempts}/${this.resources.config.openCameraMaxAttempts})`,
    );

    this.request(
      "openCamera",
      () => cameraAccess.open(facing),
      (token, camera) => Events.cameraOpened(token, camera),
      (token, error) =>
        Events.cameraOpenFailed(
          token,
          error instanceof CaptureIntentError
            ? error
            : new CameraAccessError(errorMessage(error), { state: this.name }),
        ),
      (camera) => camera.close(),
    );
  }

  private onCameraOpened(event: CameraOpenedEvent): State {
    const { config, tracker, errorSink } = this.resources;
    const handle = new RefCountBase<OpenedCamera>(event.camera, {
      name: `OpenedCamera:${event.camera.facing}`,
      closer: (camera) => camera.close(),
      strict: config.strictResourceChecks,
      tracker,
      onError: (error) => errorSink.report(error),
    });

    this.adopt(handle);
    intentLogger.info(`PreviewSetup: ${event.camera.facing} camera opened`);
    this.startPreviewIfReady();
    return this;
  }

  private onCameraOpenFailed(event: CameraOpenFailedEvent): State {
    const maxAttempts = this.resources.config.openCameraMaxAttempts;
    intentLogger.warn(
      `PreviewSetup: Camera open attempt ${this.openAttempts} failed: ${event.error.message}`,
    );

    if (isRetryableError(event.error) && this.openAttempts < maxAttempts) {
      this.openCamera();
      return this;
    }

    return new FailureState(
      this.stateMachine,
      this.resourceHandle,
      new ResourceAcquisitionError(this.openAttempts, event.error, {
        state: this.name,
        metadata: { facing: this.facing },
      }),
    );
  }

  private adopt(handle: RefCountBase<OpenedCamera>): void {
    this.camera = this.hold(handle.acquire()).get();
    this.cameraHandle = handle;
  }

  private startPreviewIfReady(): void {
    const camera = this.camera;
    const surface = this.preview.surface;
    if (!camera || !surface || this.previewRequested) {
      return;
    }

    this.previewRequested = true;
    const layout = this.preview.layoutSize;

    this.request(
      "startPreview",
      () => camera.startPreview(surface, layout),
      (token, previewSize) => Events.previewStarted(token, previewSize),
      (token, error) =>
        Events.previewFailed(
          token,
          error instanceof CaptureIntentError
            ? error
            : new PreviewError(errorMessage(error), { state: this.name }),
        ),
    );
  }
}

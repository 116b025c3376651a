import type { OpenedCamera } from "../camera/types";
import { Events } from "../events";
import { intentLogger } from "../logger";
import type { ResourceConstructed } from "../resource/resource-constructed";
import type { RefCountBase } from "../stateful/ref-count";
import type { State, StateMachine } from "../stateful/state";
import type { EventHandlerMap } from "../stateful/state-base";
import { CameraHoldingState } from "./camera-holding-state";
import type { PreviewContext } from "./preview-context";
import { BackgroundState } from "./state-background";
import { CapturingPhotoState } from "./state-capturing-photo";
import { FinishingState } from "./state-finishing";
import { PreviewReadyState } from "./state-preview-ready";
import { PreviewSetupState } from "./state-preview-setup";

/**
 * Self-timer running. Leaving the state for any reason stops the timer.
 */
export class CountdownState extends CameraHoldingState {
  readonly name = "Countdown";

  protected readonly handlers: EventHandlerMap = {
    CountdownFinished: () =>
      new CapturingPhotoState(
        this.stateMachine,
        this.resourceHandle,
        this.cameraHandle,
        this.nextPreview(),
      ),
    CancelShutterTap: () => {
      intentLogger.info("Countdown: Cancelled by user");
      return new PreviewReadyState(
        this.stateMachine,
        this.resourceHandle,
        this.cameraHandle,
        this.nextPreview(),
      );
    },
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
    readonly seconds: number,
  ) {
    super(stateMachine, resourceHandle, cameraHandle, preview);
  }

  onEnter(): State {
    const { moduleUI } = this.resources;
    moduleUI.setShutterButtonEnabled(false);
    moduleUI.startCountdown(this.seconds);

    this.schedule("countdown", this.seconds * 1000, (token) =>
      Events.countdownFinished(token),
    );
    return this;
  }

  protected releaseResources(): void {
    this.resources.moduleUI.cancelCountdown();
  }
}

import type { PhotoReference } from "@intentcam/types";
import type { OpenedCamera } from "../camera/types";
import type { ResourceConstructed } from "../resource/resource-constructed";
import type { RefCountBase } from "../stateful/ref-count";
import type { State, StateMachine } from "../stateful/state";
import type { EventHandlerMap } from "../stateful/state-base";
import { CameraHoldingState } from "./camera-holding-state";
import type { PreviewContext } from "./preview-context";
import { BackgroundState } from "./state-background";
import { FinishingState } from "./state-finishing";
import { PreviewSetupState } from "./state-preview-setup";

/**
 * Shows the captured photo for confirm or retake. Keeps the camera so a
 * retake does not have to reopen it.
 */
export class PhotoReviewingState extends CameraHoldingState {
  readonly name = "PhotoReviewing";

  readonly photo: Readonly<PhotoReference>;

  protected readonly handlers: EventHandlerMap = {
    ConfirmPhotoTap: () =>
      new FinishingState(this.stateMachine, this.resourceHandle, {
        type: "Confirmed",
        photo: { ...this.photo },
      }),
    RetakePhotoTap: () =>
      new PreviewSetupState(this.stateMachine, this.resourceHandle, {
        preview: this.restartPreview(),
        cameraHandle: this.cameraHandle,
      }),
    SurfaceAvailable: (event) => {
      this.preview.surface = { ...event.surface };
      return this;
    },
    SurfaceDestroyed: () => {
      this.preview.surface = null;
      return this;
    },
    PreviewLayoutChanged: (event) => {
      this.preview.layoutSize = { ...event.size };
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

  constructor(
    stateMachine: StateMachine,
    resourceHandle: RefCountBase<ResourceConstructed>,
    cameraHandle: RefCountBase<OpenedCamera>,
    preview: PreviewContext,
    photo: Readonly<PhotoReference>,
  ) {
    super(stateMachine, resourceHandle, cameraHandle, preview);
    this.photo = photo;
  }

  onEnter(): State {
    const { moduleUI } = this.resources;
    moduleUI.setShutterButtonEnabled(false);
    moduleUI.showPictureReview(this.photo);
    return this;
  }

  protected releaseResources(): void {
    this.resources.moduleUI.hidePictureReview();
  }
}

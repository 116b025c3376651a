/**
 * Base for every state that holds the opened camera.
 *
 * The camera handle is acquired in the constructor, before the previous
 * holder is torn down, and released by onLeave().
 */

import { CAPTURE_INTENT_DEFAULTS } from "@intentcam/config";
import type { Size } from "@intentcam/types";
import { formatZoomRatio } from "@intentcam/utils";
import type { OpenedCamera } from "../camera/types";
import { intentLogger } from "../logger";
import type { ResourceConstructed } from "../resource/resource-constructed";
import type { Borrow, RefCountBase } from "../stateful/ref-count";
import type { State, StateMachine } from "../stateful/state";
import { StateBase } from "../stateful/state-base";
import type { PreviewContext } from "./preview-context";

export abstract class CameraHoldingState extends StateBase {
  protected readonly cameraHandle: RefCountBase<OpenedCamera>;
  protected readonly camera: OpenedCamera;
  protected readonly preview: PreviewContext;

  constructor(
    stateMachine: StateMachine,
    resourceHandle: RefCountBase<ResourceConstructed>,
    cameraHandle: RefCountBase<OpenedCamera>,
    preview: PreviewContext,
  ) {
    super(stateMachine, resourceHandle);

    let borrow: Borrow<OpenedCamera>;
    try {
      borrow = cameraHandle.acquire();
    } catch (error) {
      this.onLeave();
      throw error;
    }

    this.cameraHandle = cameraHandle;
    this.camera = this.hold(borrow).get();
    this.preview = { ...preview };
  }

  /**
   * Clamp and apply a zoom ratio
   */
  protected applyZoom(ratio: number): State {
    if (!Number.isFinite(ratio)) {
      intentLogger.debug(`${this.name}: Ignoring zoom ratio ${ratio}`);
      return this;
    }

    const max = Math.min(
      this.resources.config.maxZoomRatio,
      this.camera.characteristics.maxZoomRatio,
    );
    const clamped = Math.min(
      Math.max(ratio, CAPTURE_INTENT_DEFAULTS.MIN_ZOOM_RATIO),
      max,
    );

    this.preview.zoomRatio = clamped;
    this.camera.setZoom(clamped);
    this.resources.moduleUI.setZoomRatio(clamped);
    intentLogger.debug(`${this.name}: Zoom ${formatZoomRatio(clamped)}`);
    return this;
  }

  protected applyLayout(size: Size): State {
    this.preview.layoutSize = { ...size };
    if (this.preview.previewSize) {
      this.resources.moduleUI.updatePreviewTransform(
        this.preview.layoutSize,
        this.preview.previewSize,
      );
    }
    return this;
  }

  /**
   * Context for the next state; the running preview is kept
   */
  protected nextPreview(): PreviewContext {
    return { ...this.preview };
  }

  /**
   * Context for a state that has to start the preview again
   */
  protected restartPreview(): PreviewContext {
    return { ...this.preview, previewSize: null, firstFrameShown: false };
  }
}

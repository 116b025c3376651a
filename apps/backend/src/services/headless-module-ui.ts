/**
 * Headless Module UI
 *
 * UI adapter for hosts without a screen. Records what the states ask the
 * UI to show so the HTTP status endpoint can report it.
 */

import type {
  ModuleUISnapshot,
  PhotoReference,
  Point,
  Size,
} from "@intentcam/types";
import { createLogger, formatSize } from "@intentcam/utils";
import type { CaptureIntentModuleUI } from "../capture-intent/resource/module-ui";

const logger = createLogger("headless-ui");

export class HeadlessModuleUI implements CaptureIntentModuleUI {
  private snapshot: ModuleUISnapshot = {
    resumed: false,
    shutterEnabled: false,
    reviewPhoto: null,
    countdownSeconds: null,
    focusPoint: null,
    zoomRatio: 1,
    previewLayout: null,
    previewSize: null,
    previewStarted: false,
  };

  onModuleResumed(): void {
    this.snapshot.resumed = true;
  }

  onModulePaused(): void {
    this.snapshot.resumed = false;
    this.snapshot.previewStarted = false;
  }

  setShutterButtonEnabled(enabled: boolean): void {
    this.snapshot.shutterEnabled = enabled;
  }

  updatePreviewTransform(layout: Size, previewSize: Size): void {
    this.snapshot.previewLayout = { ...layout };
    this.snapshot.previewSize = { ...previewSize };
    logger.debug(
      `Preview transform ${formatSize(previewSize)} into ${formatSize(layout)}`,
    );
  }

  onPreviewStarted(): void {
    this.snapshot.previewStarted = true;
  }

  showPictureReview(photo: PhotoReference): void {
    this.snapshot.reviewPhoto = { ...photo };
  }

  hidePictureReview(): void {
    this.snapshot.reviewPhoto = null;
  }

  startCountdown(seconds: number): void {
    this.snapshot.countdownSeconds = seconds;
  }

  cancelCountdown(): void {
    this.snapshot.countdownSeconds = null;
  }

  showFocusIndicator(point: Point): void {
    this.snapshot.focusPoint = { ...point };
  }

  clearFocusIndicator(): void {
    this.snapshot.focusPoint = null;
  }

  setZoomRatio(ratio: number): void {
    this.snapshot.zoomRatio = ratio;
  }

  getSnapshot(): ModuleUISnapshot {
    return {
      ...this.snapshot,
      reviewPhoto: this.snapshot.reviewPhoto
        ? { ...this.snapshot.reviewPhoto }
        : null,
      focusPoint: this.snapshot.focusPoint ? { ...this.snapshot.focusPoint } : null,
      previewLayout: this.snapshot.previewLayout
        ? { ...this.snapshot.previewLayout }
        : null,
      previewSize: this.snapshot.previewSize
        ? { ...this.snapshot.previewSize }
        : null,
    };
  }
}

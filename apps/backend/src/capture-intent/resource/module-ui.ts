import type { PhotoReference, Point, Size } from "@intentcam/types";

/**
 * Presentation surface driven by the states. Every call is a command;
 * nothing is read back from the UI.
 */
export interface CaptureIntentModuleUI {
  onModuleResumed(): void;
  onModulePaused(): void;

  setShutterButtonEnabled(enabled: boolean): void;

  /** Fit the negotiated preview size into the laid-out view */
  updatePreviewTransform(layout: Size, previewSize: Size): void;
  /** First preview frame has been drawn */
  onPreviewStarted(): void;

  showPictureReview(photo: PhotoReference): void;
  hidePictureReview(): void;

  startCountdown(seconds: number): void;
  cancelCountdown(): void;

  showFocusIndicator(point: Point): void;
  clearFocusIndicator(): void;

  setZoomRatio(ratio: number): void;
}

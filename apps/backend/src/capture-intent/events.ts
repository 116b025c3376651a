/**
 * Capture Intent Events
 *
 * Every input to the state machine is one of these values: UI taps,
 * lifecycle signals, preview surface notifications and hardware completions.
 * Values are frozen on creation and consumed once.
 */

import type {
  PhotoReference,
  Point,
  Size,
  SurfaceHandle,
} from "@intentcam/types";
import type { OpenedCamera } from "./camera/types";
import type { CaptureIntentError } from "./errors";
import type { GenerationToken } from "./stateful/generation-token";

// ============================================================================
// UI Events
// ============================================================================

export interface ShutterTapEvent {
  readonly type: "ShutterTap";
}

export interface CancelShutterTapEvent {
  readonly type: "CancelShutterTap";
}

export interface CancelIntentTapEvent {
  readonly type: "CancelIntentTap";
}

export interface ConfirmPhotoTapEvent {
  readonly type: "ConfirmPhotoTap";
}

export interface RetakePhotoTapEvent {
  readonly type: "RetakePhotoTap";
}

export interface SwitchCameraTapEvent {
  readonly type: "SwitchCameraTap";
}

export interface ZoomChangedEvent {
  readonly type: "ZoomChanged";
  readonly ratio: number;
}

export interface PreviewTapEvent {
  readonly type: "PreviewTap";
  readonly point: Readonly<Point>;
}

// ============================================================================
// Preview Surface Events
// ============================================================================

export interface PreviewLayoutChangedEvent {
  readonly type: "PreviewLayoutChanged";
  readonly size: Readonly<Size>;
}

export interface SurfaceAvailableEvent {
  readonly type: "SurfaceAvailable";
  readonly surface: Readonly<SurfaceHandle>;
}

export interface SurfaceDestroyedEvent {
  readonly type: "SurfaceDestroyed";
}

export interface SurfaceUpdatedEvent {
  readonly type: "SurfaceUpdated";
}

// ============================================================================
// Lifecycle Events
// ============================================================================

export interface ResumeEvent {
  readonly type: "Resume";
}

export interface PauseEvent {
  readonly type: "Pause";
}

// ============================================================================
// Hardware Completion Events
// ============================================================================

export interface CameraOpenedEvent {
  readonly type: "CameraOpened";
  readonly token: GenerationToken;
  readonly camera: OpenedCamera;
}

export interface CameraOpenFailedEvent {
  readonly type: "CameraOpenFailed";
  readonly token: GenerationToken;
  readonly error: CaptureIntentError;
}

export interface PreviewStartedEvent {
  readonly type: "PreviewStarted";
  readonly token: GenerationToken;
  readonly previewSize: Readonly<Size>;
}

export interface PreviewFailedEvent {
  readonly type: "PreviewFailed";
  readonly token: GenerationToken;
  readonly error: CaptureIntentError;
}

export interface FocusCompletedEvent {
  readonly type: "FocusCompleted";
  readonly token: GenerationToken;
  readonly locked: boolean;
}

export interface CountdownFinishedEvent {
  readonly type: "CountdownFinished";
  readonly token: GenerationToken;
}

export interface CaptureSucceededEvent {
  readonly type: "CaptureSucceeded";
  readonly token: GenerationToken;
  readonly photo: Readonly<PhotoReference>;
}

export interface CaptureFailedEvent {
  readonly type: "CaptureFailed";
  readonly token: GenerationToken;
  readonly error: CaptureIntentError;
}

export type CaptureIntentEvent =
  | ShutterTapEvent
  | CancelShutterTapEvent
  | CancelIntentTapEvent
  | ConfirmPhotoTapEvent
  | RetakePhotoTapEvent
  | SwitchCameraTapEvent
  | ZoomChangedEvent
  | PreviewTapEvent
  | PreviewLayoutChangedEvent
  | SurfaceAvailableEvent
  | SurfaceDestroyedEvent
  | SurfaceUpdatedEvent
  | ResumeEvent
  | PauseEvent
  | CameraOpenedEvent
  | CameraOpenFailedEvent
  | PreviewStartedEvent
  | PreviewFailedEvent
  | FocusCompletedEvent
  | CountdownFinishedEvent
  | CaptureSucceededEvent
  | CaptureFailedEvent;

export type CaptureIntentEventType = CaptureIntentEvent["type"];

export type EventOfType<K extends CaptureIntentEventType> = Extract<
  CaptureIntentEvent,
  { type: K }
>;

/**
 * Events produced by hardware completions. They carry the token of the
 * request that issued them.
 */
export type HardwareEvent = Extract<
  CaptureIntentEvent,
  { token: GenerationToken }
>;

export function isHardwareEvent(
  event: CaptureIntentEvent,
): event is HardwareEvent {
  return "token" in event;
}

// ============================================================================
// Factories
// ============================================================================

function freeze<T extends CaptureIntentEvent>(event: T): T {
  Object.freeze(event);
  return event;
}

export const Events = {
  shutterTap: (): ShutterTapEvent => freeze({ type: "ShutterTap" }),
  cancelShutterTap: (): CancelShutterTapEvent =>
    freeze({ type: "CancelShutterTap" }),
  cancelIntentTap: (): CancelIntentTapEvent =>
    freeze({ type: "CancelIntentTap" }),
  confirmPhotoTap: (): ConfirmPhotoTapEvent =>
    freeze({ type: "ConfirmPhotoTap" }),
  retakePhotoTap: (): RetakePhotoTapEvent =>
    freeze({ type: "RetakePhotoTap" }),
  switchCameraTap: (): SwitchCameraTapEvent =>
    freeze({ type: "SwitchCameraTap" }),
  zoomChanged: (ratio: number): ZoomChangedEvent =>
    freeze({ type: "ZoomChanged", ratio }),
  previewTap: (point: Point): PreviewTapEvent =>
    freeze({ type: "PreviewTap", point: Object.freeze({ ...point }) }),
  previewLayoutChanged: (size: Size): PreviewLayoutChangedEvent =>
    freeze({ type: "PreviewLayoutChanged", size: Object.freeze({ ...size }) }),
  surfaceAvailable: (surface: SurfaceHandle): SurfaceAvailableEvent =>
    freeze({
      type: "SurfaceAvailable",
      surface: Object.freeze({ ...surface }),
    }),
  surfaceDestroyed: (): SurfaceDestroyedEvent =>
    freeze({ type: "SurfaceDestroyed" }),
  surfaceUpdated: (): SurfaceUpdatedEvent => freeze({ type: "SurfaceUpdated" }),
  resume: (): ResumeEvent => freeze({ type: "Resume" }),
  pause: (): PauseEvent => freeze({ type: "Pause" }),

  cameraOpened: (
    token: GenerationToken,
    camera: OpenedCamera,
  ): CameraOpenedEvent => freeze({ type: "CameraOpened", token, camera }),
  cameraOpenFailed: (
    token: GenerationToken,
    error: CaptureIntentError,
  ): CameraOpenFailedEvent =>
    freeze({ type: "CameraOpenFailed", token, error }),
  previewStarted: (
    token: GenerationToken,
    previewSize: Size,
  ): PreviewStartedEvent =>
    freeze({
      type: "PreviewStarted",
      token,
      previewSize: Object.freeze({ ...previewSize }),
    }),
  previewFailed: (
    token: GenerationToken,
    error: CaptureIntentError,
  ): PreviewFailedEvent => freeze({ type: "PreviewFailed", token, error }),
  focusCompleted: (
    token: GenerationToken,
    locked: boolean,
  ): FocusCompletedEvent => freeze({ type: "FocusCompleted", token, locked }),
  countdownFinished: (token: GenerationToken): CountdownFinishedEvent =>
    freeze({ type: "CountdownFinished", token }),
  captureSucceeded: (
    token: GenerationToken,
    photo: PhotoReference,
  ): CaptureSucceededEvent =>
    freeze({
      type: "CaptureSucceeded",
      token,
      photo: Object.freeze({ ...photo }),
    }),
  captureFailed: (
    token: GenerationToken,
    error: CaptureIntentError,
  ): CaptureFailedEvent => freeze({ type: "CaptureFailed", token, error }),
} as const;

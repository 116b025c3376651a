/**
 * Capture Intent
 * Event-driven state machine for a single-photo capture request
 */

export {
  CaptureIntentModule,
  type CaptureIntentModuleOptions,
} from "./capture-intent-module";
export { resolveConfig, type CaptureIntentConfig } from "./config";
export { LoggingErrorSink, type ErrorSink } from "./error-sink";
export * from "./errors";
export { Events, type CaptureIntentEvent } from "./events";
export type {
  CameraAccessPoint,
  CameraCharacteristics,
  OpenedCamera,
  TakePictureParams,
} from "./camera/types";
export { MockCameraAccess, type MockCameraOptions } from "./camera/mock-camera";
export { CaptureIntentSettings } from "./resource/capture-intent-settings";
export type { CaptureIntentModuleUI } from "./resource/module-ui";
export { OutcomeLatch, type OutcomeSink } from "./resource/outcome-latch";
export {
  FixedLocationProvider,
  FixedOrientationProvider,
  type LocationProvider,
  type OrientationProvider,
} from "./resource/providers";
export { StateMachineImpl, type StateChange } from "./stateful/state-machine";
export type { State, StateMachine } from "./stateful/state";

// ============================================================================
// Geometry Types
// ============================================================================

export interface Size {
  width: number;
  height: number;
}

/**
 * Integer pixel coordinate on the preview surface
 */
export interface Point {
  x: number;
  y: number;
}

// ============================================================================
// Camera Types
// ============================================================================

export type CameraFacing = 'front' | 'back';

export type FlashMode = 'auto' | 'on' | 'off';

/**
 * Opaque reference to a host preview surface.
 * The core never draws into it; it only hands it to the camera driver.
 */
export interface SurfaceHandle {
  surfaceId: string;
  width: number;
  height: number;
}

export interface GeoLocation {
  latitude: number;
  longitude: number;
  accuracyMeters?: number;
}

/**
 * Reference to a stored photo. Encoding and storage belong to the driver.
 */
export interface PhotoReference {
  id: string;
  uri: string;
  width: number;
  height: number;
  /** Degrees clockwise: 0, 90, 180 or 270 */
  orientation: number;
  takenAt: string;
  location?: GeoLocation;
}

// ============================================================================
// Intent Types
// ============================================================================

export interface CaptureIntentRequest {
  requestId: string;
  /** Where the caller wants the photo delivered, if anywhere specific */
  outputUri?: string;
  /** Facing requested by the caller; falls back to the settings */
  preferredFacing?: CameraFacing;
}

export type IntentOutcome =
  | { type: 'Confirmed'; photo: PhotoReference }
  | { type: 'Cancelled' }
  | { type: 'Failed'; reason: string };

// ============================================================================
// Capability Query Types
// ============================================================================

export interface HardwareSpec {
  isFrontCameraSupported: boolean;
  isHdrSupported: boolean;
  isHdrPlusSupported: boolean;
  isFlashSupported: boolean;
}

export type BottomBarAction = 'camera' | 'cancel' | 'done' | 'retake';

export interface BottomBarUISpec {
  /** Camera switch button */
  enableCamera: boolean;
  enableGridLines: boolean;
  enableHdr: boolean;
  hideHdr: boolean;
  enableSelfTimer: boolean;
  showSelfTimer: boolean;
  enableFlash: boolean;
  hideFlash: boolean;
  /** Intent review buttons */
  showCancel: boolean;
  showDone: boolean;
  showRetake: boolean;
  /** Actions the host reports back through onBottomBarAction */
  actions: BottomBarAction[];
}

// ============================================================================
// API Types
// ============================================================================

export interface ApiResponse<T> {
  success: boolean;
  data?: T;
  error?: string;
  message?: string;
}

export interface ModuleUISnapshot {
  resumed: boolean;
  shutterEnabled: boolean;
  reviewPhoto: PhotoReference | null;
  countdownSeconds: number | null;
  focusPoint: Point | null;
  zoomRatio: number;
  previewLayout: Size | null;
  previewSize: Size | null;
  previewStarted: boolean;
}

export interface CaptureIntentStatusResponse {
  requestId: string;
  state: string;
  finished: boolean;
  outcome: IntentOutcome | null;
  lastError: string | null;
  ui: ModuleUISnapshot;
  hardware: HardwareSpec | null;
  bottomBar: BottomBarUISpec;
}

/**
 * Host input forwarded to a running capture intent
 */
export type HostSignal =
  | { type: 'shutter' }
  | { type: 'cancelShutter' }
  | { type: 'zoom'; ratio: number }
  | { type: 'bottomBar'; action: BottomBarAction }
  | { type: 'layout'; left: number; top: number; right: number; bottom: number }
  | { type: 'surfaceAvailable'; surface: SurfaceHandle }
  | { type: 'surfaceDestroyed' }
  | { type: 'surfaceUpdated' }
  | { type: 'tap'; x: number; y: number }
  | { type: 'settings'; timerSeconds?: number; flashMode?: FlashMode; gridLines?: boolean };

export type LifecycleSignal = 'resume' | 'pause';

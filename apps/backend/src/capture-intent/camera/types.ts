/**
 * Camera access point type definitions
 *
 * The core never talks to hardware directly. It calls these capabilities
 * and reacts to the promises they return.
 */

import type {
  CameraFacing,
  FlashMode,
  GeoLocation,
  PhotoReference,
  Point,
  Size,
  SurfaceHandle,
} from "@intentcam/types";

/**
 * Static properties of one camera
 */
export interface CameraCharacteristics {
  facing: CameraFacing;
  isFlashSupported: boolean;
  maxZoomRatio: number;
  /** Sensor orientation in degrees clockwise */
  sensorOrientation: number;
  /** Largest preview size the sensor offers */
  previewSize: Size;
  pictureSize: Size;
}

export interface TakePictureParams {
  flashMode: FlashMode;
  /** Device orientation in degrees clockwise */
  orientation: number;
  location: GeoLocation | null;
}

/**
 * An exclusively held, opened camera device
 */
export interface OpenedCamera {
  readonly facing: CameraFacing;
  readonly characteristics: CameraCharacteristics;

  /**
   * Configure the session and stream preview into the surface.
   * Resolves with the negotiated preview size.
   */
  startPreview(surface: SurfaceHandle, layout: Size | null): Promise<Size>;

  /**
   * Run an auto-focus sweep at the given preview coordinate.
   * Resolves true when focus locked.
   */
  triggerFocus(point: Point): Promise<boolean>;

  /**
   * Apply a zoom ratio; fire-and-forget
   */
  setZoom(ratio: number): void;

  /**
   * Capture and store one photo
   */
  takePicture(params: TakePictureParams): Promise<PhotoReference>;

  /**
   * Release the device
   */
  close(): Promise<void>;
}

/**
 * Camera manager capability
 */
export interface CameraAccessPoint {
  /**
   * Open the camera with the given facing
   */
  open(facing: CameraFacing): Promise<OpenedCamera>;

  hasCameraFacing(facing: CameraFacing): boolean;

  /**
   * Throws CameraAccessError when the camera cannot be queried
   */
  getCameraCharacteristics(facing: CameraFacing): CameraCharacteristics;

  /**
   * Release driver-wide resources; called once on module teardown
   */
  dispose?(): Promise<void>;
}

/**
 * Mock Camera
 * Simulated camera driver for development and tests.
 * Supports failure simulation modes via MOCK_FAILURE_MODE env var
 */

import { nanoid } from "nanoid";
import type {
  CameraFacing,
  PhotoReference,
  Point,
  Size,
  SurfaceHandle,
} from "@intentcam/types";
import { formatSize } from "@intentcam/utils";
import { env, type MockFailureMode } from "../../config/env";
import {
  CameraAccessError,
  CaptureFailedError,
  CardFullError,
  FocusFailedError,
  PreviewError,
} from "../errors";
import { intentLogger } from "../logger";
import type {
  CameraAccessPoint,
  CameraCharacteristics,
  OpenedCamera,
  TakePictureParams,
} from "./types";

export interface MockCameraOptions {
  failureMode?: MockFailureMode;
  latencyMs?: number;
  facings?: CameraFacing[];
  /** Source of randomness for the flaky mode */
  random?: () => number;
}

const CHARACTERISTICS: Record<CameraFacing, CameraCharacteristics> = {
  back: {
    facing: "back",
    isFlashSupported: true,
    maxZoomRatio: 8,
    sensorOrientation: 90,
    previewSize: { width: 1920, height: 1080 },
    pictureSize: { width: 4032, height: 3024 },
  },
  front: {
    facing: "front",
    isFlashSupported: false,
    maxZoomRatio: 2,
    sensorOrientation: 270,
    previewSize: { width: 1280, height: 720 },
    pictureSize: { width: 2592, height: 1944 },
  },
};

export class MockCameraAccess implements CameraAccessPoint {
  private readonly failureMode: MockFailureMode;
  private readonly latencyMs: number;
  private readonly facings: CameraFacing[];
  private readonly random: () => number;
  private readonly openCameras = new Set<MockOpenedCamera>();
  private openCount = 0;

  constructor(options: MockCameraOptions = {}) {
    this.failureMode = options.failureMode ?? env.mockFailureMode;
    this.latencyMs = options.latencyMs ?? env.mockLatencyMs;
    this.facings = options.facings ?? ["back", "front"];
    this.random = options.random ?? Math.random;

    intentLogger.info(
      `MockCamera: Initialized with failure mode: ${this.failureMode}`,
      { latencyMs: this.latencyMs, facings: this.facings },
    );
  }

  async open(facing: CameraFacing): Promise<OpenedCamera> {
    this.openCount++;
    await this.delay();

    if (!this.hasCameraFacing(facing)) {
      throw new CameraAccessError(`no ${facing} camera`);
    }

    if (this.failureMode === "open_denied") {
      throw new CameraAccessError("permission denied");
    }

    // 30% random failure
    if (this.failureMode === "flaky" && this.random() < 0.3) {
      throw new CameraAccessError("camera in use by another client");
    }

    // One client per device
    for (const camera of this.openCameras) {
      if (camera.facing === facing) {
        throw new CameraAccessError(`${facing} camera is already open`);
      }
    }

    const camera = new MockOpenedCamera(
      this.getCameraCharacteristics(facing),
      this.failureMode,
      () => this.delay(),
      () => this.openCameras.delete(camera),
    );
    this.openCameras.add(camera);

    intentLogger.info(`MockCamera: Opened ${facing} camera`);
    return camera;
  }

  hasCameraFacing(facing: CameraFacing): boolean {
    return this.facings.includes(facing);
  }

  getCameraCharacteristics(facing: CameraFacing): CameraCharacteristics {
    if (!this.hasCameraFacing(facing)) {
      throw new CameraAccessError(`no ${facing} camera`, {
        operation: "getCameraCharacteristics",
      });
    }
    if (this.failureMode === "open_denied") {
      throw new CameraAccessError("permission denied", {
        operation: "getCameraCharacteristics",
      });
    }

    const characteristics = CHARACTERISTICS[facing];
    return {
      ...characteristics,
      previewSize: { ...characteristics.previewSize },
      pictureSize: { ...characteristics.pictureSize },
    };
  }

  async dispose(): Promise<void> {
    const cameras = Array.from(this.openCameras);
    if (cameras.length > 0) {
      intentLogger.warn(
        `MockCamera: Closing ${cameras.length} camera(s) left open`,
      );
    }
    await Promise.all(cameras.map((camera) => camera.close()));
  }

  /**
   * Cameras currently open
   */
  getOpenCameraCount(): number {
    return this.openCameras.size;
  }

  /**
   * Number of open() calls so far
   */
  getOpenAttempts(): number {
    return this.openCount;
  }

  private delay(): Promise<void> {
    const ms = this.latencyMs;
    if (ms <= 0) {
      return Promise.resolve();
    }
    return new Promise((resolve) => setTimeout(resolve, ms));
  }
}

class MockOpenedCamera implements OpenedCamera {
  readonly facing: CameraFacing;
  private closed = false;
  private previewing = false;
  private zoomRatio = 1;
  private captureCount = 0;
  private readonly hangingCaptures = new Set<(error: Error) => void>();

  constructor(
    readonly characteristics: CameraCharacteristics,
    private readonly failureMode: MockFailureMode,
    private readonly delay: () => Promise<void>,
    private readonly onClosed: () => void,
  ) {
    this.facing = characteristics.facing;
  }

  async startPreview(surface: SurfaceHandle, layout: Size | null): Promise<Size> {
    this.assertOpen("startPreview");
    await this.delay();
    this.assertOpen("startPreview");

    if (surface.width <= 0 || surface.height <= 0) {
      throw new PreviewError(`surface ${surface.surfaceId} has no area`);
    }

    const previewSize = { ...this.characteristics.previewSize };
    this.previewing = true;

    intentLogger.info(
      `MockCamera: Preview ${formatSize(previewSize)} on ${surface.surfaceId}`,
      { layout: formatSize(layout) },
    );
    return previewSize;
  }

  async triggerFocus(point: Point): Promise<boolean> {
    this.assertOpen("triggerFocus");
    intentLogger.debug(`MockCamera: Trigger focus at (${point.x}, ${point.y})`);

    // Simulate AF failure
    if (this.failureMode === "no_af") {
      throw new FocusFailedError("AF failed to acquire lock");
    }

    await this.delay();
    return true;
  }

  setZoom(ratio: number): void {
    this.zoomRatio = ratio;
    intentLogger.debug(`MockCamera: Zoom ${ratio}`);
  }

  async takePicture(params: TakePictureParams): Promise<PhotoReference> {
    this.assertOpen("takePicture");
    if (!this.previewing) {
      throw new CaptureFailedError("preview is not running");
    }

    intentLogger.info("MockCamera: Capturing photo", {
      flashMode: params.flashMode,
      orientation: params.orientation,
      failureMode: this.failureMode,
    });

    switch (this.failureMode) {
      case "timeout":
        // Never completes; the caller's timeout has to fire
        return new Promise<PhotoReference>((_resolve, reject) => {
          this.hangingCaptures.add(reject);
        });

      case "card_full":
        throw new CardFullError();

      default:
        break;
    }

    await this.delay();
    this.assertOpen("takePicture");
    this.captureCount++;

    const id = nanoid();
    const { width, height } = this.characteristics.pictureSize;
    const photo: PhotoReference = {
      id,
      uri: `mock://photos/${id}.jpg`,
      width,
      height,
      orientation: params.orientation,
      takenAt: new Date().toISOString(),
    };
    if (params.location) {
      photo.location = { ...params.location };
    }

    intentLogger.info("MockCamera: Photo captured successfully", {
      uri: photo.uri,
      zoomRatio: this.zoomRatio,
      captureCount: this.captureCount,
    });
    return photo;
  }

  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.previewing = false;

    for (const reject of this.hangingCaptures) {
      reject(new CaptureFailedError("camera closed"));
    }
    this.hangingCaptures.clear();

    this.onClosed();
    intentLogger.info(`MockCamera: Closed ${this.facing} camera`);
  }

  private assertOpen(operation: string): void {
    if (this.closed) {
      throw new CameraAccessError("camera is closed", { operation });
    }
  }
}

/**
 * Capture Intent Settings
 *
 * Per-intent camera preferences. Lives as long as the module and survives
 * state changes, so a camera switch or timer choice is kept across retakes.
 */

import { CAPTURE_INTENT_DEFAULTS } from "@intentcam/config";
import type { CameraFacing, FlashMode } from "@intentcam/types";

export interface CaptureIntentSettingsSnapshot {
  cameraFacing: CameraFacing;
  flashMode: FlashMode;
  timerSeconds: number;
  gridLines: boolean;
}

const FLASH_MODES: readonly FlashMode[] = ["auto", "on", "off"];

export class CaptureIntentSettings {
  private cameraFacing: CameraFacing;
  private flashMode: FlashMode;
  private timerSeconds: number;
  private gridLines = false;

  constructor(initial: Partial<CaptureIntentSettingsSnapshot> = {}) {
    this.cameraFacing =
      initial.cameraFacing ?? CAPTURE_INTENT_DEFAULTS.DEFAULT_CAMERA_FACING;
    this.flashMode =
      initial.flashMode ?? CAPTURE_INTENT_DEFAULTS.DEFAULT_FLASH_MODE;
    this.timerSeconds = CAPTURE_INTENT_DEFAULTS.DEFAULT_TIMER_SECONDS;

    if (initial.timerSeconds !== undefined) {
      this.setTimerSeconds(initial.timerSeconds);
    }
    if (initial.gridLines !== undefined) {
      this.gridLines = initial.gridLines;
    }
  }

  getCameraFacing(): CameraFacing {
    return this.cameraFacing;
  }

  setCameraFacing(facing: CameraFacing): void {
    this.cameraFacing = facing;
  }

  /**
   * Flip between front and back; returns the new facing
   */
  toggleCameraFacing(): CameraFacing {
    this.cameraFacing = this.cameraFacing === "back" ? "front" : "back";
    return this.cameraFacing;
  }

  getFlashMode(): FlashMode {
    return this.flashMode;
  }

  setFlashMode(mode: FlashMode): void {
    if (!FLASH_MODES.includes(mode)) {
      throw new RangeError(`Unsupported flash mode: ${String(mode)}`);
    }
    this.flashMode = mode;
  }

  getTimerSeconds(): number {
    return this.timerSeconds;
  }

  setTimerSeconds(seconds: number): void {
    const allowed: readonly number[] =
      CAPTURE_INTENT_DEFAULTS.TIMER_DURATIONS_SECONDS;
    if (!allowed.includes(seconds)) {
      throw new RangeError(
        `Timer must be one of ${allowed.join(", ")} seconds, got ${seconds}`,
      );
    }
    this.timerSeconds = seconds;
  }

  isGridLinesEnabled(): boolean {
    return this.gridLines;
  }

  setGridLines(enabled: boolean): void {
    this.gridLines = enabled;
  }

  toJSON(): CaptureIntentSettingsSnapshot {
    return {
      cameraFacing: this.cameraFacing,
      flashMode: this.flashMode,
      timerSeconds: this.timerSeconds,
      gridLines: this.gridLines,
    };
  }
}

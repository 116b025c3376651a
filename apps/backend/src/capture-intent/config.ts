import { CAPTURE_INTENT_DEFAULTS } from "@intentcam/config";

/**
 * Tunables for one capture-intent module instance
 */
export interface CaptureIntentConfig {
  openCameraMaxAttempts: number;
  captureTimeoutMs: number;
  maxZoomRatio: number;
  /** Throw on ref-count mismatches instead of logging them */
  strictResourceChecks: boolean;
}

export function resolveConfig(
  partial: Partial<CaptureIntentConfig> = {},
): CaptureIntentConfig {
  const config: CaptureIntentConfig = {
    openCameraMaxAttempts:
      partial.openCameraMaxAttempts ??
      CAPTURE_INTENT_DEFAULTS.OPEN_CAMERA_MAX_ATTEMPTS,
    captureTimeoutMs:
      partial.captureTimeoutMs ?? CAPTURE_INTENT_DEFAULTS.CAPTURE_TIMEOUT_MS,
    maxZoomRatio: partial.maxZoomRatio ?? CAPTURE_INTENT_DEFAULTS.MAX_ZOOM_RATIO,
    strictResourceChecks: partial.strictResourceChecks ?? false,
  };

  if (!Number.isInteger(config.openCameraMaxAttempts) || config.openCameraMaxAttempts < 1) {
    throw new RangeError(
      `openCameraMaxAttempts must be a positive integer, got ${config.openCameraMaxAttempts}`,
    );
  }
  if (!(config.captureTimeoutMs > 0)) {
    throw new RangeError(
      `captureTimeoutMs must be positive, got ${config.captureTimeoutMs}`,
    );
  }
  if (!(config.maxZoomRatio >= CAPTURE_INTENT_DEFAULTS.MIN_ZOOM_RATIO)) {
    throw new RangeError(
      `maxZoomRatio must be at least ${CAPTURE_INTENT_DEFAULTS.MIN_ZOOM_RATIO}, got ${config.maxZoomRatio}`,
    );
  }

  return config;
}

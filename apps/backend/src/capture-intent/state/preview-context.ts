import type { Size, SurfaceHandle } from "@intentcam/types";
import { CAPTURE_INTENT_DEFAULTS } from "@intentcam/config";

/**
 * What the host has told us about the preview view. Copied from state to
 * state so a new state starts from the latest layout and surface.
 */
export interface PreviewContext {
  surface: SurfaceHandle | null;
  layoutSize: Size | null;
  /** Size negotiated by the running preview, null until it starts */
  previewSize: Size | null;
  zoomRatio: number;
  firstFrameShown: boolean;
}

export function emptyPreviewContext(): PreviewContext {
  return {
    surface: null,
    layoutSize: null,
    previewSize: null,
    zoomRatio: CAPTURE_INTENT_DEFAULTS.MIN_ZOOM_RATIO,
    firstFrameShown: false,
  };
}

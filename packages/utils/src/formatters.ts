/**
 * Formatting helpers shared by log lines and status responses
 */

import type { Point, Size } from "@intentcam/types";

/**
 * Format a size as WxH
 */
export function formatSize(size: Size | null | undefined): string {
  if (!size) {
    return "unknown";
  }
  return `${size.width}x${size.height}`;
}

/**
 * Format a point as (x, y)
 */
export function formatPoint(point: Point): string {
  return `(${point.x}, ${point.y})`;
}

/**
 * Format a zoom ratio with one decimal, e.g. 2.5x
 */
export function formatZoomRatio(ratio: number): string {
  return `${ratio.toFixed(1)}x`;
}

/**
 * Format milliseconds into a human-readable duration
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  }
  const seconds = ms / 1000;
  if (seconds < 60) {
    return `${Number.isInteger(seconds) ? seconds : seconds.toFixed(1)}s`;
  }
  const minutes = Math.floor(seconds / 60);
  const remaining = Math.round(seconds % 60);
  return `${minutes}m ${remaining}s`;
}

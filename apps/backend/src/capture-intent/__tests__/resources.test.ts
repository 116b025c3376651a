/**
 * Module Resource Tests
 *
 * Tests the per-intent settings, the outcome latch, the config resolver
 * and the fixed sensor providers.
 *
 * Source: apps/backend/src/capture-intent/resource/
 *
 * Critical Invariants:
 * - Settings reject values outside their allowed sets
 * - The outcome latch accepts exactly one outcome and wakes every waiter
 * - Config defaults fill gaps; invalid values throw RangeError
 * - Orientation snaps to a right angle in [0, 360)
 */

import { describe, it, expect, vi } from "vitest";
import { resolveConfig } from "../config";
import { CaptureIntentSettings } from "../resource/capture-intent-settings";
import { OutcomeLatch } from "../resource/outcome-latch";
import {
  FixedLocationProvider,
  FixedOrientationProvider,
} from "../resource/providers";

vi.mock("../logger", () => ({
  intentLogger: {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  },
}));

describe("CaptureIntentSettings", () => {
  it("should start from the defaults", () => {
    expect(new CaptureIntentSettings().toJSON()).toEqual({
      cameraFacing: "back",
      flashMode: "auto",
      timerSeconds: 0,
      gridLines: false,
    });
  });

  it("should toggle the camera facing", () => {
    const settings = new CaptureIntentSettings();

    expect(settings.toggleCameraFacing()).toBe("front");
    expect(settings.toggleCameraFacing()).toBe("back");
  });

  it("should accept only the offered timer durations", () => {
    const settings = new CaptureIntentSettings();
    settings.setTimerSeconds(10);

    expect(settings.getTimerSeconds()).toBe(10);
    expect(() => settings.setTimerSeconds(5)).toThrow(
      "Timer must be one of 0, 3, 10 seconds, got 5",
    );
    expect(() => new CaptureIntentSettings({ timerSeconds: 7 })).toThrow(
      RangeError,
    );
  });

  it("should keep flash and grid line choices", () => {
    const settings = new CaptureIntentSettings({ gridLines: true });
    settings.setFlashMode("off");

    expect(settings.getFlashMode()).toBe("off");
    expect(settings.isGridLinesEnabled()).toBe(true);
  });
});

describe("OutcomeLatch", () => {
  it("should deliver once and resolve every waiter", async () => {
    const latch = new OutcomeLatch();
    const first = latch.whenDelivered();
    const second = latch.whenDelivered();

    expect(latch.deliver({ type: "Cancelled" })).toBe(true);
    expect(latch.deliver({ type: "Failed", reason: "late" })).toBe(false);

    await expect(first).resolves.toEqual({ type: "Cancelled" });
    await expect(second).resolves.toEqual({ type: "Cancelled" });
    expect(latch.getOutcome()).toEqual({ type: "Cancelled" });
  });

  it("should resolve immediately once delivered", async () => {
    const latch = new OutcomeLatch();
    latch.deliver({ type: "Failed", reason: "no camera" });

    expect(latch.isDelivered()).toBe(true);
    await expect(latch.whenDelivered()).resolves.toEqual({
      type: "Failed",
      reason: "no camera",
    });
  });
});

describe("resolveConfig", () => {
  it("should fill in defaults", () => {
    expect(resolveConfig()).toEqual({
      openCameraMaxAttempts: 3,
      captureTimeoutMs: 30000,
      maxZoomRatio: 4,
      strictResourceChecks: false,
    });
  });

  it("should reject out-of-range values", () => {
    expect(() => resolveConfig({ openCameraMaxAttempts: 0 })).toThrow(
      "openCameraMaxAttempts must be a positive integer, got 0",
    );
    expect(() => resolveConfig({ captureTimeoutMs: -1 })).toThrow(RangeError);
    expect(() => resolveConfig({ maxZoomRatio: 0.5 })).toThrow(RangeError);
  });
});

describe("providers", () => {
  it("should snap orientation to a right angle", () => {
    expect(new FixedOrientationProvider(95).getOrientation()).toBe(90);
    expect(new FixedOrientationProvider(-90).getOrientation()).toBe(270);
    expect(new FixedOrientationProvider(360).getOrientation()).toBe(0);
  });

  it("should hand back the configured location", () => {
    const provider = new FixedLocationProvider();
    expect(provider.getLocation()).toBeNull();

    provider.setLocation({ latitude: 1, longitude: 2 });
    expect(provider.getLocation()).toEqual({ latitude: 1, longitude: 2 });
  });
});

/**
 * Capture Intent Service Tests
 *
 * Tests the single-intent host used by the HTTP routes, driven entirely
 * through host signals against an in-process camera.
 *
 * Source: apps/backend/src/services/capture-intent-service.ts
 *
 * Critical Invariants:
 * - At most one unfinished intent at a time; a finished one is replaced
 * - Every host signal maps to exactly one module callback
 * - Status reflects the state, the headless UI and the outcome
 * - Invalid settings surface as RangeError without touching the machine
 * - destroy() settles an unfinished intent as Cancelled
 */

import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { ERROR_MESSAGES } from "@intentcam/config";
import { CameraAccessError } from "../../capture-intent";
import {
  FakeCameraAccess,
  PREVIEW_SIZE,
  flush,
  testPhoto,
  testSurface,
} from "../../capture-intent/__tests__/helpers/fake-camera";
import {
  CaptureIntentService,
  IntentActiveError,
  NoActiveIntentError,
} from "../capture-intent-service";

vi.mock("../../capture-intent/logger", () => ({
  intentLogger: {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  },
}));

describe("CaptureIntentService", () => {
  let cameras: FakeCameraAccess[];
  let service: CaptureIntentService;

  function lastCameraAccess(): FakeCameraAccess {
    const access = cameras[cameras.length - 1];
    if (!access) {
      throw new Error("No camera access created");
    }
    return access;
  }

  async function toPreviewReady(): Promise<void> {
    service.signal({
      type: "layout",
      left: 0,
      top: 0,
      right: 1080,
      bottom: 1920,
    });
    service.signal({ type: "surfaceAvailable", surface: testSurface() });
    service.lifecycle("resume");
    await flush();
    expect(service.getStatus().state).toBe("PreviewReady");
  }

  beforeEach(() => {
    cameras = [];
    service = new CaptureIntentService({
      cameraFactory: () => {
        const access = new FakeCameraAccess();
        cameras.push(access);
        return access;
      },
      config: { strictResourceChecks: true },
    });
  });

  afterEach(() => {
    service.destroy();
  });

  describe("start", () => {
    it("should start an intent in Background", () => {
      const status = service.start({ requestId: "req-1" });

      expect(status).toMatchObject({
        requestId: "req-1",
        state: "Background",
        finished: false,
        outcome: null,
        lastError: null,
        hardware: {
          isFrontCameraSupported: true,
          isFlashSupported: true,
        },
      });
      expect(status.ui.resumed).toBe(false);
      expect(service.hasActiveIntent()).toBe(true);
    });

    it("should generate a request id when none is given", () => {
      const status = service.start();

      expect(status.requestId).toMatch(/^[A-Za-z0-9_-]{21}$/);
    });

    it("should refuse a second intent while one is running", () => {
      service.start({ requestId: "req-1" });

      expect(() => service.start({ requestId: "req-2" })).toThrow(
        IntentActiveError,
      );
      expect(service.getStatus().requestId).toBe("req-1");
    });

    it("should replace an intent that has finished", () => {
      service.start({ requestId: "req-1" });
      service.signal({ type: "bottomBar", action: "cancel" });

      const status = service.start({ requestId: "req-2" });

      expect(status.requestId).toBe("req-2");
      expect(cameras).toHaveLength(2);
    });

    it("should report a camera that cannot be queried", () => {
      service = new CaptureIntentService({
        cameraFactory: () => {
          const access = new FakeCameraAccess();
          access.characteristicsError = new CameraAccessError("disabled");
          cameras.push(access);
          return access;
        },
      });

      const status = service.start({ requestId: "req-1" });

      expect(status.hardware).toBeNull();
      expect(status.lastError).toBe(ERROR_MESSAGES.CANNOT_CONNECT_CAMERA);
    });
  });

  describe("signals", () => {
    beforeEach(() => {
      service.start({ requestId: "req-1" });
    });

    it("should run a capture to a confirmed outcome", async () => {
      await toPreviewReady();
      const ready = service.getStatus();
      expect(ready.ui).toMatchObject({
        resumed: true,
        shutterEnabled: true,
        previewLayout: { width: 1080, height: 1920 },
        previewSize: PREVIEW_SIZE,
      });

      expect(service.signal({ type: "shutter" }).state).toBe("CapturingPhoto");
      lastCameraAccess().lastCamera.resolvePicture(testPhoto());
      await flush();

      const reviewing = service.getStatus();
      expect(reviewing.state).toBe("PhotoReviewing");
      expect(reviewing.ui.reviewPhoto).toEqual(testPhoto());

      const done = service.signal({ type: "bottomBar", action: "done" });
      expect(done.finished).toBe(true);
      expect(done.outcome).toEqual({ type: "Confirmed", photo: testPhoto() });
      await expect(service.whenFinished()).resolves.toEqual({
        type: "Confirmed",
        photo: testPhoto(),
      });
    });

    it("should start the self timer from the settings signal", async () => {
      await toPreviewReady();

      service.signal({ type: "settings", timerSeconds: 3, flashMode: "on" });
      const status = service.signal({ type: "shutter" });

      expect(status.state).toBe("Countdown");
      expect(status.ui.countdownSeconds).toBe(3);

      const cancelled = service.signal({ type: "cancelShutter" });
      expect(cancelled.state).toBe("PreviewReady");
      expect(cancelled.ui.countdownSeconds).toBeNull();
    });

    it("should reject an unsupported timer", () => {
      expect(() =>
        service.signal({ type: "settings", timerSeconds: 5 }),
      ).toThrow(RangeError);
      expect(service.getStatus().state).toBe("Background");
    });

    it("should focus where the host taps", async () => {
      await toPreviewReady();

      const status = service.signal({ type: "tap", x: 10, y: 20 });

      expect(status.state).toBe("FocusLock");
      expect(status.ui.focusPoint).toEqual({ x: 10, y: 20 });
    });

    it("should apply zoom through the UI snapshot", async () => {
      await toPreviewReady();

      expect(service.signal({ type: "zoom", ratio: 2 }).ui.zoomRatio).toBe(2);
    });

    it("should go back to setup when the surface goes away", async () => {
      await toPreviewReady();

      service.signal({ type: "surfaceUpdated" });
      expect(service.getStatus().ui.previewStarted).toBe(true);

      const status = service.signal({ type: "surfaceDestroyed" });
      expect(status.state).toBe("PreviewSetup");
      expect(status.ui.shutterEnabled).toBe(false);
    });

    it("should pause into Background", async () => {
      await toPreviewReady();

      const status = service.lifecycle("pause");

      expect(status.state).toBe("Background");
      expect(status.ui.resumed).toBe(false);
      expect(lastCameraAccess().lastCamera.closeCount).toBe(1);
    });
  });

  describe("without an intent", () => {
    it("should throw NoActiveIntentError", () => {
      expect(() => service.getStatus()).toThrow(NoActiveIntentError);
      expect(() => service.lifecycle("resume")).toThrow(NoActiveIntentError);
      expect(() => service.signal({ type: "shutter" })).toThrow(
        ERROR_MESSAGES.NO_ACTIVE_INTENT,
      );
      expect(service.destroy()).toBeNull();
    });
  });

  describe("destroy", () => {
    it("should cancel an unfinished intent", async () => {
      service.start({ requestId: "req-1" });
      await toPreviewReady();

      const status = service.destroy();

      expect(status).toMatchObject({
        requestId: "req-1",
        finished: true,
        outcome: { type: "Cancelled" },
      });
      expect(service.hasActiveIntent()).toBe(false);
      expect(lastCameraAccess().lastCamera.closeCount).toBe(1);
    });
  });
});

/**
 * Capture Intent Flow Tests
 *
 * Drives the full state graph (Background -> PreviewSetup -> PreviewReady
 * -> Countdown/FocusLock -> CapturingPhoto -> PhotoReviewing -> Finishing)
 * against an in-process camera whose every async call is completed by the
 * test.
 *
 * Source: apps/backend/src/capture-intent/state/
 *
 * Critical Invariants:
 * - Exactly one outcome is delivered per intent
 * - The camera is opened once per PreviewSetup without a handed-over
 *   camera, and closed exactly once when its last holder leaves
 * - Completions that arrive after their state was left have no effect
 * - A camera switch closes the old camera before the new one is opened
 * - Fatal errors end in Finishing(Failed) with the user-facing message shown
 * - Non-fatal capture errors return to preview without reopening the camera
 * - Teardown is idempotent and borrow counts return to their baseline
 */

import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { ERROR_MESSAGES } from "@intentcam/config";
import {
  CameraAccessError,
  CaptureFailedError,
  CaptureTimeoutError,
  CardFullError,
  InvalidTransitionError,
  ResourceAcquisitionError,
} from "../errors";
import { Events } from "../events";
import { CaptureIntentSettings } from "../resource/capture-intent-settings";
import { GenerationToken } from "../stateful/generation-token";
import type { State } from "../stateful/state";
import { StateBase } from "../stateful/state-base";
import {
  FakeCameraAccess,
  FakeOpenedCamera,
  PREVIEW_SIZE,
  flush,
  testPhoto,
  testSurface,
} from "./helpers/fake-camera";
import { createHarness, type Harness } from "./helpers/harness";

vi.mock("../logger", () => ({
  intentLogger: {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  },
}));

const LAYOUT = { width: 1080, height: 1920 };

async function toPreviewReady(h: Harness): Promise<void> {
  h.start();
  h.machine.processEvent(Events.surfaceAvailable(testSurface()));
  h.machine.processEvent(Events.previewLayoutChanged(LAYOUT));
  h.machine.processEvent(Events.resume());
  await flush();
  expect(h.stateName()).toBe("PreviewReady");
}

async function toPhotoReviewing(h: Harness): Promise<void> {
  await toPreviewReady(h);
  h.machine.processEvent(Events.shutterTap());
  expect(h.stateName()).toBe("CapturingPhoto");
  h.cameraAccess.lastCamera.resolvePicture(testPhoto());
  await flush();
  expect(h.stateName()).toBe("PhotoReviewing");
}

function acceptedBy(h: Harness): string[] {
  const state = h.machine.getCurrentState();
  if (!(state instanceof StateBase)) {
    throw new Error("Current state has no handler map");
  }
  return [...state.acceptedEvents()].sort();
}

function currentState(h: Harness): State {
  const state = h.machine.getCurrentState();
  if (!state) {
    throw new Error("No current state");
  }
  return state;
}

describe("Capture intent flow", () => {
  let h: Harness;

  afterEach(() => {
    h.teardown();
    vi.useRealTimers();
  });

  describe("happy path", () => {
    beforeEach(() => {
      h = createHarness();
    });

    it("should confirm a photo and deliver it exactly once", async () => {
      await toPhotoReviewing(h);

      expect(h.ui.showPictureReview).toHaveBeenCalledWith(testPhoto());

      h.machine.processEvent(Events.confirmPhotoTap());

      expect(h.stateName()).toBe("Finishing");
      expect(h.outcome.getOutcome()).toEqual({
        type: "Confirmed",
        photo: testPhoto(),
      });
      expect(h.ui.hidePictureReview).toHaveBeenCalledTimes(1);
      expect(h.cameraAccess.openCalls).toEqual(["back"]);
      expect(h.cameraAccess.lastCamera.closeCount).toBe(1);
      expect(h.resources.tracker.openCount).toBe(0);
    });

    it("should ignore every event after Finishing", async () => {
      await toPhotoReviewing(h);
      h.machine.processEvent(Events.confirmPhotoTap());
      const processed = h.machine.getProcessedEventCount();

      h.machine.processEvent(Events.retakePhotoTap());
      h.machine.processEvent(Events.cancelIntentTap());

      expect(h.stateName()).toBe("Finishing");
      expect(h.outcome.getOutcome()?.type).toBe("Confirmed");
      expect(h.machine.getProcessedEventCount()).toBe(processed);
    });

    it("should wire the preview to the layout once it is running", async () => {
      await toPreviewReady(h);

      const camera = h.cameraAccess.lastCamera;
      expect(camera.previewCalls).toEqual([
        { surface: testSurface(), layout: LAYOUT },
      ]);
      expect(h.ui.updatePreviewTransform).toHaveBeenLastCalledWith(
        LAYOUT,
        PREVIEW_SIZE,
      );
      expect(h.ui.setShutterButtonEnabled).toHaveBeenLastCalledWith(true);
    });

    it("should report the first preview frame once", async () => {
      await toPreviewReady(h);

      h.machine.processEvent(Events.surfaceUpdated());
      h.machine.processEvent(Events.surfaceUpdated());

      expect(h.ui.onPreviewStarted).toHaveBeenCalledTimes(1);
    });

    it("should open the camera only after a resume", () => {
      h.start();
      h.machine.processEvent(Events.surfaceAvailable(testSurface()));

      expect(h.stateName()).toBe("Background");
      expect(h.cameraAccess.openCalls).toEqual([]);
    });

    it("should wait for a surface before starting the preview", async () => {
      h.start();
      h.machine.processEvent(Events.resume());
      await flush();

      expect(h.stateName()).toBe("PreviewSetup");
      expect(h.cameraAccess.lastCamera.previewCalls).toHaveLength(0);

      h.machine.processEvent(Events.surfaceAvailable(testSurface()));
      await flush();

      expect(h.stateName()).toBe("PreviewReady");
    });
  });

  describe("cancellation", () => {
    beforeEach(() => {
      h = createHarness();
    });

    it("should cancel from Background without touching the camera", () => {
      h.start();
      h.machine.processEvent(Events.cancelIntentTap());

      expect(h.outcome.getOutcome()).toEqual({ type: "Cancelled" });
      expect(h.cameraAccess.openCalls).toEqual([]);
    });

    it("should close the camera when cancelled from preview", async () => {
      await toPreviewReady(h);

      h.machine.processEvent(Events.cancelIntentTap());

      expect(h.outcome.getOutcome()).toEqual({ type: "Cancelled" });
      expect(h.cameraAccess.lastCamera.closeCount).toBe(1);
    });

    it("should drop a capture that completes after a cancel", async () => {
      await toPreviewReady(h);
      h.machine.processEvent(Events.shutterTap());
      h.machine.processEvent(Events.cancelIntentTap());

      h.cameraAccess.lastCamera.resolvePicture(testPhoto());
      await flush();

      expect(h.outcome.getOutcome()).toEqual({ type: "Cancelled" });
      expect(h.ui.showPictureReview).not.toHaveBeenCalled();
    });
  });

  describe("opening the camera", () => {
    it("should give up after the configured number of attempts", async () => {
      h = createHarness({ camera: new FakeCameraAccess({ autoOpen: false }) });
      h.start();
      h.machine.processEvent(Events.resume());

      for (let attempt = 0; attempt < 3; attempt++) {
        h.cameraAccess.rejectOpen(new CameraAccessError("camera in use"));
        await flush();
      }

      expect(h.cameraAccess.openCalls).toEqual(["back", "back", "back"]);
      expect(h.outcome.getOutcome()).toEqual({
        type: "Failed",
        reason: "Camera could not be acquired after 3 attempts",
      });
      expect(h.showError).toHaveBeenCalledWith(
        ERROR_MESSAGES.CANNOT_CONNECT_CAMERA,
      );
      expect(h.report).toHaveBeenCalledWith(
        expect.any(ResourceAcquisitionError),
      );
    });

    it("should recover when a retry succeeds", async () => {
      h = createHarness({ camera: new FakeCameraAccess({ autoOpen: false }) });
      h.start();
      h.machine.processEvent(Events.surfaceAvailable(testSurface()));
      h.machine.processEvent(Events.resume());

      h.cameraAccess.rejectOpen(new Error("transient"));
      await flush();
      h.cameraAccess.resolveOpen();
      await flush();

      expect(h.stateName()).toBe("PreviewReady");
      expect(h.cameraAccess.openCalls).toHaveLength(2);
      expect(h.outcome.isDelivered()).toBe(false);
    });

    it("should not retry a disabled camera", async () => {
      h = createHarness({ camera: new FakeCameraAccess({ autoOpen: false }) });
      h.start();
      h.machine.processEvent(Events.resume());

      h.cameraAccess.rejectOpen(new CameraAccessError("disabled"));
      await flush();

      expect(h.cameraAccess.openCalls).toHaveLength(1);
      expect(h.outcome.getOutcome()).toEqual({
        type: "Failed",
        reason: "Camera could not be acquired after 1 attempt",
      });
    });

    it("should close a camera that opens after the state was left", async () => {
      h = createHarness({ camera: new FakeCameraAccess({ autoOpen: false }) });
      h.start();
      h.machine.processEvent(Events.resume());
      h.machine.processEvent(Events.pause());
      expect(h.stateName()).toBe("Background");

      const late = h.cameraAccess.resolveOpen();
      await flush();

      expect(late.closeCount).toBe(1);
      expect(h.stateName()).toBe("Background");
      expect(h.resources.tracker.openCount).toBe(0);
    });

    it("should end in Failed when the preview cannot start", async () => {
      h = createHarness({
        camera: new FakeCameraAccess({ autoPreview: false }),
      });
      h.start();
      h.machine.processEvent(Events.surfaceAvailable(testSurface()));
      h.machine.processEvent(Events.resume());
      await flush();

      const camera = h.cameraAccess.lastCamera;
      camera.rejectPreview(new Error("surface lost"));
      await flush();

      expect(h.outcome.getOutcome()).toEqual({
        type: "Failed",
        reason: "Preview error: surface lost",
      });
      expect(h.showError).toHaveBeenCalledWith(ERROR_MESSAGES.PREVIEW_FAILED);
      expect(camera.closeCount).toBe(1);
    });
  });

  describe("stale completions", () => {
    beforeEach(() => {
      h = createHarness();
    });

    it("should drop a completion carrying another state's token", async () => {
      await toPreviewReady(h);
      const foreign = new GenerationToken("capture", "Elsewhere");

      h.machine.processEvent(Events.captureSucceeded(foreign, testPhoto()));

      expect(h.stateName()).toBe("PreviewReady");
      expect(h.ui.showPictureReview).not.toHaveBeenCalled();
    });

    it("should close a stray opened camera", async () => {
      await toPreviewReady(h);
      const stray = new FakeOpenedCamera("front", true, []);

      h.machine.processEvent(
        Events.cameraOpened(new GenerationToken("openCamera", "Elsewhere"), stray),
      );

      expect(stray.closeCount).toBe(1);
      expect(h.stateName()).toBe("PreviewReady");
    });

    it("should drop the first focus result after a re-tap", async () => {
      await toPreviewReady(h);
      const camera = h.cameraAccess.lastCamera;

      h.machine.processEvent(Events.previewTap({ x: 10, y: 20 }));
      h.machine.processEvent(Events.previewTap({ x: 30, y: 40 }));
      expect(camera.focusCalls).toEqual([
        { x: 10, y: 20 },
        { x: 30, y: 40 },
      ]);

      camera.resolveFocus(true, 0);
      await flush();
      expect(h.stateName()).toBe("FocusLock");

      camera.resolveFocus(true, 1);
      await flush();
      expect(h.stateName()).toBe("PreviewReady");
      expect(h.ui.clearFocusIndicator).toHaveBeenCalledTimes(2);
    });

    it("should ignore a capture that completes after a pause", async () => {
      await toPreviewReady(h);
      const camera = h.cameraAccess.lastCamera;
      h.machine.processEvent(Events.shutterTap());
      expect(h.stateName()).toBe("CapturingPhoto");

      h.machine.processEvent(Events.pause());
      expect(h.stateName()).toBe("Background");

      camera.resolvePicture(testPhoto());
      await flush();

      expect(h.stateName()).toBe("Background");
      expect(h.ui.showPictureReview).not.toHaveBeenCalled();
      expect(camera.closeCount).toBe(1);
      expect(h.resources.tracker.openCount).toBe(0);
      expect(h.outcome.isDelivered()).toBe(false);
    });
  });

  describe("switching cameras", () => {
    it("should close the old camera before opening the new one", async () => {
      h = createHarness();
      await toPreviewReady(h);

      h.machine.processEvent(Events.switchCameraTap());
      await flush();

      expect(h.cameraAccess.log).toEqual([
        "open:back",
        "close:back",
        "open:front",
      ]);
      expect(h.stateName()).toBe("PreviewReady");
      expect(h.settings.getCameraFacing()).toBe("front");
      expect(h.cameraAccess.lastCamera.previewCalls).toEqual([
        { surface: testSurface(), layout: LAYOUT },
      ]);
    });

    it("should ignore the switch when there is no other camera", async () => {
      h = createHarness({ camera: new FakeCameraAccess({ facings: ["back"] }) });
      await toPreviewReady(h);
      const ignored = h.machine.getIgnoredEventCount();

      h.machine.processEvent(Events.switchCameraTap());

      expect(h.stateName()).toBe("PreviewReady");
      expect(h.cameraAccess.openCalls).toEqual(["back"]);
      expect(h.machine.getIgnoredEventCount()).toBe(ignored + 1);
    });
  });

  describe("self timer", () => {
    beforeEach(() => {
      vi.useFakeTimers();
      h = createHarness({
        settings: new CaptureIntentSettings({ timerSeconds: 3 }),
      });
    });

    it("should capture when the countdown runs out", async () => {
      await toPreviewReady(h);

      h.machine.processEvent(Events.shutterTap());
      expect(h.stateName()).toBe("Countdown");
      expect(h.ui.startCountdown).toHaveBeenCalledWith(3);

      vi.advanceTimersByTime(2999);
      expect(h.stateName()).toBe("Countdown");

      vi.advanceTimersByTime(1);
      expect(h.stateName()).toBe("CapturingPhoto");
      expect(h.ui.cancelCountdown).toHaveBeenCalledTimes(1);
      expect(h.cameraAccess.lastCamera.pictureCalls).toEqual([
        { flashMode: "auto", orientation: 90, location: null },
      ]);
    });

    it("should return to preview when the countdown is cancelled", async () => {
      await toPreviewReady(h);

      h.machine.processEvent(Events.shutterTap());
      h.machine.processEvent(Events.cancelShutterTap());
      vi.advanceTimersByTime(3000);

      expect(h.stateName()).toBe("PreviewReady");
      expect(h.cameraAccess.lastCamera.pictureCalls).toHaveLength(0);
    });
  });

  describe("capture errors", () => {
    it("should return to preview when the capture times out", async () => {
      vi.useFakeTimers();
      h = createHarness({ config: { captureTimeoutMs: 1000 } });
      await toPreviewReady(h);

      h.machine.processEvent(Events.shutterTap());
      vi.advanceTimersByTime(1000);

      expect(h.stateName()).toBe("PreviewReady");
      expect(h.report).toHaveBeenCalledWith(expect.any(CaptureTimeoutError));
      expect(h.cameraAccess.openCalls).toHaveLength(1);

      h.cameraAccess.lastCamera.resolvePicture(testPhoto());
      await flush();
      expect(h.stateName()).toBe("PreviewReady");
    });

    it("should end in Failed when storage is full", async () => {
      h = createHarness();
      await toPreviewReady(h);
      h.machine.processEvent(Events.shutterTap());

      h.cameraAccess.lastCamera.rejectPicture(new CardFullError());
      await flush();

      expect(h.outcome.getOutcome()).toEqual({
        type: "Failed",
        reason: "Photo storage is full",
      });
      expect(h.showError).toHaveBeenCalledWith(ERROR_MESSAGES.STORAGE_FULL);
      expect(h.cameraAccess.lastCamera.closeCount).toBe(1);
    });

    it("should wrap a driver error and return to preview", async () => {
      h = createHarness();
      await toPreviewReady(h);
      h.machine.processEvent(Events.shutterTap());

      h.cameraAccess.lastCamera.rejectPicture(new Error("driver crashed"));
      await flush();

      expect(h.stateName()).toBe("PreviewReady");
      const reported = h.errorSink.getReported();
      const last = reported[reported.length - 1];
      expect(last).toBeInstanceOf(CaptureFailedError);
      expect(last.message).toBe("Capture failed: driver crashed");
    });

    it("should restart the preview when the surface changed during capture", async () => {
      h = createHarness();
      await toPreviewReady(h);
      h.machine.processEvent(Events.shutterTap());
      h.machine.processEvent(Events.surfaceDestroyed());

      h.cameraAccess.lastCamera.rejectPicture(
        new CaptureFailedError("shutter jammed"),
      );
      await flush();
      expect(h.stateName()).toBe("PreviewSetup");

      h.machine.processEvent(Events.surfaceAvailable(testSurface("surface-2")));
      await flush();

      expect(h.stateName()).toBe("PreviewReady");
      expect(h.cameraAccess.openCalls).toHaveLength(1);
      expect(h.cameraAccess.lastCamera.previewCalls).toHaveLength(2);
    });
  });

  describe("focus", () => {
    beforeEach(() => {
      h = createHarness();
    });

    it("should return to preview once focus settles", async () => {
      await toPreviewReady(h);

      h.machine.processEvent(Events.previewTap({ x: 10, y: 20 }));
      expect(h.stateName()).toBe("FocusLock");
      expect(h.ui.showFocusIndicator).toHaveBeenCalledWith({ x: 10, y: 20 });

      h.cameraAccess.lastCamera.resolveFocus(true);
      await flush();

      expect(h.stateName()).toBe("PreviewReady");
      expect(h.ui.clearFocusIndicator).toHaveBeenCalledTimes(1);
    });

    it("should let the shutter fire during a focus sweep", async () => {
      await toPreviewReady(h);

      h.machine.processEvent(Events.previewTap({ x: 10, y: 20 }));
      h.machine.processEvent(Events.shutterTap());

      expect(h.stateName()).toBe("CapturingPhoto");
      expect(h.cameraAccess.lastCamera.pictureCalls).toHaveLength(1);
    });
  });

  describe("zoom", () => {
    beforeEach(() => {
      h = createHarness();
    });

    it("should clamp the ratio to what the camera and config allow", async () => {
      await toPreviewReady(h);
      const camera = h.cameraAccess.lastCamera;

      h.machine.processEvent(Events.zoomChanged(10));
      h.machine.processEvent(Events.zoomChanged(0.5));
      h.machine.processEvent(Events.zoomChanged(Number.NaN));
      h.machine.processEvent(Events.zoomChanged(2.5));

      expect(camera.zoomCalls).toEqual([4, 1, 2.5]);
      expect(h.ui.setZoomRatio).toHaveBeenLastCalledWith(2.5);
    });
  });

  describe("surface and lifecycle", () => {
    beforeEach(() => {
      h = createHarness();
    });

    it("should keep the camera open across a surface loss", async () => {
      await toPreviewReady(h);
      const camera = h.cameraAccess.lastCamera;

      h.machine.processEvent(Events.surfaceDestroyed());
      expect(h.stateName()).toBe("PreviewSetup");
      expect(camera.closeCount).toBe(0);

      h.machine.processEvent(Events.surfaceAvailable(testSurface("surface-2")));
      await flush();

      expect(h.stateName()).toBe("PreviewReady");
      expect(h.cameraAccess.openCalls).toHaveLength(1);
      expect(camera.previewCalls[1].surface).toEqual(testSurface("surface-2"));
    });

    it("should restart the preview on retake without reopening", async () => {
      await toPhotoReviewing(h);

      h.machine.processEvent(Events.retakePhotoTap());
      await flush();

      expect(h.stateName()).toBe("PreviewReady");
      expect(h.ui.hidePictureReview).toHaveBeenCalledTimes(1);
      expect(h.cameraAccess.openCalls).toHaveLength(1);
      expect(h.cameraAccess.lastCamera.previewCalls).toHaveLength(2);
    });

    it("should discard the photo on pause during review and reopen on resume", async () => {
      await toPhotoReviewing(h);
      const first = h.cameraAccess.lastCamera;

      h.machine.processEvent(Events.pause());

      expect(h.stateName()).toBe("Background");
      expect(first.closeCount).toBe(1);
      expect(h.outcome.isDelivered()).toBe(false);

      h.machine.processEvent(Events.resume());
      await flush();

      expect(h.stateName()).toBe("PreviewReady");
      expect(h.cameraAccess.openCalls).toHaveLength(2);
    });
  });

  describe("resource invariants", () => {
    beforeEach(() => {
      h = createHarness();
    });

    it("should keep one borrow per live state plus the module", async () => {
      h.start();
      expect(h.handle.getRefCount()).toBe(2);

      await toPreviewReadyFromBackground(h);
      expect(h.handle.getRefCount()).toBe(2);
      expect(h.resources.tracker.getOpenResources()).toMatchObject([
        { name: "OpenedCamera:back", refCount: 1 },
      ]);

      h.machine.processEvent(Events.previewTap({ x: 1, y: 1 }));
      expect(h.handle.getRefCount()).toBe(2);
      expect(h.resources.tracker.getOpenResources()).toMatchObject([
        { name: "OpenedCamera:back", refCount: 1 },
      ]);

      h.teardown();
      expect(h.handle.getRefCount()).toBe(0);
      expect(h.handle.isClosed()).toBe(true);
      expect(h.cameraAccess.lastCamera.closeCount).toBe(1);
    });

    it("should leave counts unchanged when a state is torn down twice", async () => {
      await toPreviewReady(h);
      const ready = currentState(h);

      h.machine.processEvent(Events.previewTap({ x: 1, y: 1 }));
      const count = h.handle.getRefCount();
      ready.onLeave();

      expect(ready.isTornDown()).toBe(true);
      expect(h.handle.getRefCount()).toBe(count);
      expect(h.report).not.toHaveBeenCalled();
    });

    it("should refuse events on a torn-down state", async () => {
      await toPreviewReady(h);
      const ready = currentState(h);
      h.machine.processEvent(Events.previewTap({ x: 1, y: 1 }));

      expect(() => ready.processEvent(Events.shutterTap())).toThrow(
        InvalidTransitionError,
      );
      expect(() => ready.processEvent(Events.shutterTap())).toThrow(
        "Invalid transition: PreviewReady received ShutterTap after teardown",
      );
    });

    it("should list exactly the events each state handles", async () => {
      h.start();
      expect(acceptedBy(h)).toEqual(
        [
          "Resume",
          "SurfaceAvailable",
          "SurfaceDestroyed",
          "PreviewLayoutChanged",
          "CancelIntentTap",
        ].sort(),
      );

      h.machine.processEvent(Events.surfaceAvailable(testSurface()));
      h.machine.processEvent(Events.resume());
      expect(h.stateName()).toBe("PreviewSetup");
      expect(acceptedBy(h)).toEqual(
        [
          "CameraOpened",
          "CameraOpenFailed",
          "SurfaceAvailable",
          "SurfaceDestroyed",
          "PreviewLayoutChanged",
          "PreviewStarted",
          "PreviewFailed",
          "Pause",
          "CancelIntentTap",
        ].sort(),
      );

      await flush();
      expect(h.stateName()).toBe("PreviewReady");
      expect(acceptedBy(h)).toEqual(
        [
          "ShutterTap",
          "PreviewTap",
          "ZoomChanged",
          "SwitchCameraTap",
          "SurfaceDestroyed",
          "SurfaceUpdated",
          "PreviewLayoutChanged",
          "Pause",
          "CancelIntentTap",
        ].sort(),
      );

      h.machine.processEvent(Events.previewTap({ x: 5, y: 5 }));
      expect(h.stateName()).toBe("FocusLock");
      expect(acceptedBy(h)).toEqual(
        [
          "FocusCompleted",
          "ShutterTap",
          "PreviewTap",
          "ZoomChanged",
          "SurfaceDestroyed",
          "SurfaceUpdated",
          "PreviewLayoutChanged",
          "Pause",
          "CancelIntentTap",
        ].sort(),
      );

      h.machine.processEvent(Events.shutterTap());
      expect(h.stateName()).toBe("CapturingPhoto");
      expect(acceptedBy(h)).toEqual(
        [
          "CaptureSucceeded",
          "CaptureFailed",
          "SurfaceAvailable",
          "SurfaceDestroyed",
          "Pause",
          "CancelIntentTap",
        ].sort(),
      );

      h.cameraAccess.lastCamera.resolvePicture(testPhoto());
      await flush();
      expect(h.stateName()).toBe("PhotoReviewing");
      expect(acceptedBy(h)).toEqual(
        [
          "ConfirmPhotoTap",
          "RetakePhotoTap",
          "SurfaceAvailable",
          "SurfaceDestroyed",
          "PreviewLayoutChanged",
          "Pause",
          "CancelIntentTap",
        ].sort(),
      );

      h.machine.processEvent(Events.confirmPhotoTap());
      expect(h.stateName()).toBe("Finishing");
      expect(acceptedBy(h)).toEqual([]);
    });

    it("should count events a state has no handler for", async () => {
      await toPreviewReady(h);
      const ignored = h.machine.getIgnoredEventCount();

      h.machine.processEvent(Events.confirmPhotoTap());
      h.machine.processEvent(Events.retakePhotoTap());

      expect(h.stateName()).toBe("PreviewReady");
      expect(h.machine.getIgnoredEventCount()).toBe(ignored + 2);
    });

    it("should tear down every state it leaves", async () => {
      const seen: State[] = [];
      h.start();
      seen.push(currentState(h));
      h.machine.processEvent(Events.surfaceAvailable(testSurface()));
      h.machine.processEvent(Events.resume());
      seen.push(currentState(h));
      await flush();
      seen.push(currentState(h));
      h.machine.processEvent(Events.shutterTap());
      seen.push(currentState(h));

      const current = currentState(h);
      expect(seen.map((state) => state.name)).toEqual([
        "Background",
        "PreviewSetup",
        "PreviewReady",
        "CapturingPhoto",
      ]);
      for (const state of seen) {
        expect(state.isTornDown()).toBe(state !== current);
      }
    });
  });
});

async function toPreviewReadyFromBackground(h: Harness): Promise<void> {
  h.machine.processEvent(Events.surfaceAvailable(testSurface()));
  h.machine.processEvent(Events.resume());
  await flush();
  expect(h.stateName()).toBe("PreviewReady");
}

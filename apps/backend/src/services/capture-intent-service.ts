/**
 * Capture Intent Service
 *
 * Runs one capture intent at a time for the HTTP host. Owns the module,
 * its headless UI and its error sink, and turns host signals into module
 * calls.
 */

import { nanoid } from "nanoid";
import { ERROR_MESSAGES } from "@intentcam/config";
import type {
  CameraFacing,
  CaptureIntentStatusResponse,
  HardwareSpec,
  HostSignal,
  IntentOutcome,
  LifecycleSignal,
} from "@intentcam/types";
import { createLogger } from "@intentcam/utils";
import {
  CaptureIntentModule,
  LoggingErrorSink,
  MockCameraAccess,
  type CameraAccessPoint,
  type CaptureIntentConfig,
} from "../capture-intent";
import { env } from "../config/env";
import { HeadlessModuleUI } from "./headless-module-ui";

const logger = createLogger("capture-intent-service");

export class IntentActiveError extends Error {
  constructor(readonly requestId: string) {
    super(ERROR_MESSAGES.INTENT_ACTIVE);
    this.name = "IntentActiveError";
    Object.setPrototypeOf(this, IntentActiveError.prototype);
  }
}

export class NoActiveIntentError extends Error {
  constructor() {
    super(ERROR_MESSAGES.NO_ACTIVE_INTENT);
    this.name = "NoActiveIntentError";
    Object.setPrototypeOf(this, NoActiveIntentError.prototype);
  }
}

export interface StartIntentInput {
  requestId?: string;
  outputUri?: string;
  preferredFacing?: CameraFacing;
}

export interface CaptureIntentServiceOptions {
  cameraFactory?: () => CameraAccessPoint;
  config?: Partial<CaptureIntentConfig>;
}

interface ActiveIntent {
  module: CaptureIntentModule;
  ui: HeadlessModuleUI;
  errorSink: LoggingErrorSink;
  hardware: HardwareSpec | null;
}

export class CaptureIntentService {
  private active: ActiveIntent | null = null;
  private readonly cameraFactory: () => CameraAccessPoint;
  private readonly config: Partial<CaptureIntentConfig>;

  constructor(options: CaptureIntentServiceOptions = {}) {
    this.cameraFactory = options.cameraFactory ?? (() => new MockCameraAccess());
    this.config = options.config ?? {
      openCameraMaxAttempts: env.openCameraMaxAttempts,
      captureTimeoutMs: env.captureTimeoutMs,
      strictResourceChecks: env.strictResourceChecks,
    };
  }

  /**
   * Start a new intent. A finished intent is replaced; an unfinished one
   * is a conflict.
   */
  start(input: StartIntentInput = {}): CaptureIntentStatusResponse {
    if (this.active) {
      if (!this.active.module.isFinished()) {
        throw new IntentActiveError(this.active.module.getRequest().requestId);
      }
      this.active.module.destroy();
      this.active = null;
    }

    const ui = new HeadlessModuleUI();
    const errorSink = new LoggingErrorSink();
    const module = new CaptureIntentModule({
      request: {
        requestId: input.requestId ?? nanoid(),
        outputUri: input.outputUri,
        preferredFacing: input.preferredFacing,
      },
      moduleUI: ui,
      cameraAccess: this.cameraFactory(),
      errorSink,
      config: this.config,
    });

    const hardware = module.getHardwareSpec();
    this.active = { module, ui, errorSink, hardware };

    module
      .whenFinished()
      .then((outcome) => this.onFinished(module, outcome))
      .catch((error: unknown) => {
        logger.error("Failed to handle intent outcome", {
          error: error instanceof Error ? error.message : String(error),
        });
      });

    logger.info(`Capture intent started: ${module.getRequest().requestId}`);
    return this.buildStatus(this.active);
  }

  lifecycle(signal: LifecycleSignal): CaptureIntentStatusResponse {
    const active = this.requireActive();
    if (signal === "resume") {
      active.module.resume();
    } else {
      active.module.pause();
    }
    return this.buildStatus(active);
  }

  signal(signal: HostSignal): CaptureIntentStatusResponse {
    const active = this.requireActive();
    const { module } = active;

    switch (signal.type) {
      case "shutter":
        module.onShutterButtonClick();
        break;
      case "cancelShutter":
        module.onCancelShutterButtonClick();
        break;
      case "zoom":
        module.onZoomRatioChanged(signal.ratio);
        break;
      case "bottomBar":
        module.onBottomBarAction(signal.action);
        break;
      case "layout":
        module.onPreviewLayoutChanged(
          signal.left,
          signal.top,
          signal.right,
          signal.bottom,
        );
        break;
      case "surfaceAvailable":
        module.onSurfaceTextureAvailable(signal.surface);
        break;
      case "surfaceDestroyed":
        module.onSurfaceTextureDestroyed();
        break;
      case "surfaceUpdated":
        module.onSurfaceTextureUpdated();
        break;
      case "tap":
        module.onSingleTapUp(signal.x, signal.y);
        break;
      case "settings": {
        const settings = module.getSettings();
        if (signal.timerSeconds !== undefined) {
          settings.setTimerSeconds(signal.timerSeconds);
        }
        if (signal.flashMode !== undefined) {
          settings.setFlashMode(signal.flashMode);
        }
        if (signal.gridLines !== undefined) {
          settings.setGridLines(signal.gridLines);
        }
        break;
      }
    }

    return this.buildStatus(active);
  }

  getStatus(): CaptureIntentStatusResponse {
    return this.buildStatus(this.requireActive());
  }

  hasActiveIntent(): boolean {
    return this.active !== null;
  }

  whenFinished(): Promise<IntentOutcome> {
    return this.requireActive().module.whenFinished();
  }

  /**
   * Tear down the current intent; an unfinished one ends as Cancelled
   */
  destroy(): CaptureIntentStatusResponse | null {
    const active = this.active;
    if (!active) {
      return null;
    }

    active.module.destroy();
    this.active = null;
    logger.info(
      `Capture intent destroyed: ${active.module.getRequest().requestId}`,
    );
    return this.buildStatus(active);
  }

  private onFinished(module: CaptureIntentModule, outcome: IntentOutcome): void {
    logger.info(
      `Capture intent ${module.getRequest().requestId} finished: ${outcome.type}`,
    );
  }

  private requireActive(): ActiveIntent {
    if (!this.active) {
      throw new NoActiveIntentError();
    }
    return this.active;
  }

  private buildStatus(active: ActiveIntent): CaptureIntentStatusResponse {
    const { module, ui, errorSink, hardware } = active;
    return {
      requestId: module.getRequest().requestId,
      state: module.getCurrentStateName(),
      finished: module.isFinished(),
      outcome: module.getOutcome(),
      lastError: errorSink.getLastMessage(),
      ui: ui.getSnapshot(),
      hardware,
      bottomBar: module.getBottomBarSpec(),
    };
  }
}

let captureIntentServiceInstance: CaptureIntentService | null = null;

export function getCaptureIntentService(): CaptureIntentService {
  if (!captureIntentServiceInstance) {
    captureIntentServiceInstance = new CaptureIntentService();
  }
  return captureIntentServiceInstance;
}

export function resetCaptureIntentService(): void {
  captureIntentServiceInstance?.destroy();
  captureIntentServiceInstance = null;
}

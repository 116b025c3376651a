export { createLogger, logger, type Logger } from "./logger";
export {
  formatSize,
  formatPoint,
  formatZoomRatio,
  formatDuration,
} from "./formatters";
export {
  cameraFacingSchema,
  flashModeSchema,
  bottomBarActionSchema,
  lifecycleSignalSchema,
  surfaceHandleSchema,
  startIntentSchema,
  hostSignalSchema,
  type StartIntentBody,
  type HostSignalBody,
} from "./validation";

import { z } from "zod";

// ============================================================================
// Shared Fields
// ============================================================================

export const cameraFacingSchema = z.enum(["front", "back"]);
export const flashModeSchema = z.enum(["auto", "on", "off"]);
export const bottomBarActionSchema = z.enum(["camera", "cancel", "done", "retake"]);
export const lifecycleSignalSchema = z.enum(["resume", "pause"]);

const coordinate = z.number().finite();

export const surfaceHandleSchema = z.object({
  surfaceId: z.string().min(1),
  width: coordinate,
  height: coordinate,
});

// ============================================================================
// Capture Intent Schemas
// ============================================================================

export const startIntentSchema = z.object({
  requestId: z.string().min(1).optional(),
  outputUri: z.string().optional(),
  preferredFacing: cameraFacingSchema.optional(),
});

export const hostSignalSchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("shutter") }),
  z.object({ type: z.literal("cancelShutter") }),
  z.object({ type: z.literal("surfaceDestroyed") }),
  z.object({ type: z.literal("surfaceUpdated") }),
  z.object({ type: z.literal("zoom"), ratio: coordinate }),
  z.object({ type: z.literal("bottomBar"), action: bottomBarActionSchema }),
  z.object({
    type: z.literal("layout"),
    left: coordinate,
    top: coordinate,
    right: coordinate,
    bottom: coordinate,
  }),
  z.object({ type: z.literal("surfaceAvailable"), surface: surfaceHandleSchema }),
  z.object({ type: z.literal("tap"), x: coordinate, y: coordinate }),
  z.object({
    type: z.literal("settings"),
    timerSeconds: coordinate.optional(),
    flashMode: flashModeSchema.optional(),
    gridLines: z.boolean().optional(),
  }),
]);

export type StartIntentBody = z.infer<typeof startIntentSchema>;
export type HostSignalBody = z.infer<typeof hostSignalSchema>;

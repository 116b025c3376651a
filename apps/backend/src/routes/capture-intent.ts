import { FastifyInstance, FastifyReply, FastifyRequest } from "fastify";
import { API_ENDPOINTS, ERROR_MESSAGES, HTTP_STATUS } from "@intentcam/config";
import type {
  ApiResponse,
  CaptureIntentStatusResponse,
  HostSignal,
} from "@intentcam/types";
import {
  createLogger,
  hostSignalSchema,
  lifecycleSignalSchema,
  startIntentSchema,
} from "@intentcam/utils";
import {
  CaptureIntentService,
  IntentActiveError,
  NoActiveIntentError,
  getCaptureIntentService,
  type StartIntentInput,
} from "../services/capture-intent-service";

const logger = createLogger("capture-intent-routes");

type StatusReply = ApiResponse<CaptureIntentStatusResponse>;

// ============================================================================
// Body validation
// ============================================================================

/**
 * Parse a start request body; an absent body starts with defaults.
 * Returns null when it is malformed.
 */
export function parseStartInput(body: unknown): StartIntentInput | null {
  const result = startIntentSchema.safeParse(body ?? {});
  return result.success ? result.data : null;
}

/**
 * Parse a host signal body; returns null when it is malformed
 */
export function parseHostSignal(body: unknown): HostSignal | null {
  const result = hostSignalSchema.safeParse(body);
  return result.success ? result.data : null;
}

// ============================================================================
// Routes
// ============================================================================

export interface CaptureIntentRouteOptions {
  intentService?: CaptureIntentService;
}

/**
 * Capture Intent Routes
 * Start, drive and inspect the active capture intent
 */
export async function captureIntentRoutes(
  fastify: FastifyInstance,
  options: CaptureIntentRouteOptions = {},
) {
  const service = () => options.intentService ?? getCaptureIntentService();

  function sendError(reply: FastifyReply, error: unknown): FastifyReply {
    if (error instanceof IntentActiveError) {
      return reply.code(HTTP_STATUS.CONFLICT).send({
        success: false,
        error: error.message,
        message: `Request ${error.requestId} has not finished`,
      });
    }
    if (error instanceof NoActiveIntentError) {
      return reply.code(HTTP_STATUS.NOT_FOUND).send({
        success: false,
        error: error.message,
      });
    }
    if (error instanceof RangeError) {
      return reply.code(HTTP_STATUS.UNPROCESSABLE_ENTITY).send({
        success: false,
        error: error.message,
      });
    }

    logger.error("Capture intent request failed", {
      error: error instanceof Error ? error.message : String(error),
    });
    return reply.code(HTTP_STATUS.INTERNAL_SERVER_ERROR).send({
      success: false,
      error: error instanceof Error ? error.message : "Unknown error",
    });
  }

  /**
   * POST /api/intent
   * Start a new capture intent
   */
  fastify.post(
    API_ENDPOINTS.INTENT,
    async (request: FastifyRequest<{ Body: unknown }>, reply: FastifyReply) => {
      const input = parseStartInput(request.body);
      if (!input) {
        return reply.code(HTTP_STATUS.BAD_REQUEST).send({
          success: false,
          error: "Invalid capture intent request",
        });
      }

      try {
        const data = service().start(input);
        const body: StatusReply = { success: true, data };
        return reply.code(HTTP_STATUS.CREATED).send(body);
      } catch (error) {
        return sendError(reply, error);
      }
    },
  );

  /**
   * GET /api/intent
   * Status of the current capture intent
   */
  fastify.get(API_ENDPOINTS.INTENT, async (_request, reply: FastifyReply) => {
    try {
      const body: StatusReply = { success: true, data: service().getStatus() };
      return reply.send(body);
    } catch (error) {
      return sendError(reply, error);
    }
  });

  /**
   * DELETE /api/intent
   * Destroy the current capture intent
   */
  fastify.delete(API_ENDPOINTS.INTENT, async (_request, reply: FastifyReply) => {
    const data = service().destroy();
    if (!data) {
      return reply.code(HTTP_STATUS.NOT_FOUND).send({
        success: false,
        error: ERROR_MESSAGES.NO_ACTIVE_INTENT,
      });
    }
    const body: StatusReply = { success: true, data };
    return reply.send(body);
  });

  /**
   * POST /api/intent/lifecycle/:signal
   * Resume or pause the module
   */
  fastify.post(
    API_ENDPOINTS.INTENT_LIFECYCLE,
    async (
      request: FastifyRequest<{ Params: { signal: string } }>,
      reply: FastifyReply,
    ) => {
      const parsed = lifecycleSignalSchema.safeParse(request.params.signal);
      if (!parsed.success) {
        return reply.code(HTTP_STATUS.BAD_REQUEST).send({
          success: false,
          error: ERROR_MESSAGES.INVALID_SIGNAL,
          message: `Expected one of: ${lifecycleSignalSchema.options.join(", ")}`,
        });
      }

      try {
        const body: StatusReply = {
          success: true,
          data: service().lifecycle(parsed.data),
        };
        return reply.send(body);
      } catch (error) {
        return sendError(reply, error);
      }
    },
  );

  /**
   * POST /api/intent/signals
   * Forward one host signal (tap, surface, layout, ...) to the module
   */
  fastify.post(
    API_ENDPOINTS.INTENT_SIGNALS,
    async (request: FastifyRequest<{ Body: unknown }>, reply: FastifyReply) => {
      const signal = parseHostSignal(request.body);
      if (!signal) {
        return reply.code(HTTP_STATUS.BAD_REQUEST).send({
          success: false,
          error: ERROR_MESSAGES.INVALID_SIGNAL,
        });
      }

      try {
        const body: StatusReply = { success: true, data: service().signal(signal) };
        return reply.send(body);
      } catch (error) {
        return sendError(reply, error);
      }
    },
  );
}

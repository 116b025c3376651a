import Fastify from "fastify";
import cors from "@fastify/cors";
import { API_ENDPOINTS, HTTP_STATUS } from "@intentcam/config";
import { createLogger } from "@intentcam/utils";
import { env } from "./config/env";
import { captureIntentRoutes } from "./routes/capture-intent";
import type { CaptureIntentService } from "./services/capture-intent-service";

const logger = createLogger("app");

export interface AppOptions {
  /** Service to serve; the process-wide singleton when omitted */
  intentService?: CaptureIntentService;
}

/**
 * Create and configure the Fastify application
 *
 * ROUTES MANIFEST:
 * =================
 *   GET    /health                          - Service health check
 *
 * Capture Intent:
 *   POST   /api/intent                      - Start a capture intent
 *   GET    /api/intent                      - Current intent status
 *   DELETE /api/intent                      - Destroy the current intent
 *   POST   /api/intent/lifecycle/:signal    - resume | pause
 *   POST   /api/intent/signals              - Host signal (tap, surface, layout, ...)
 */
export async function createApp(options: AppOptions = {}) {
  const app = Fastify({
    logger: false, // We use Winston instead
  });

  await app.register(cors, {
    origin: true,
    credentials: true,
  });

  await app.register(captureIntentRoutes, {
    intentService: options.intentService,
  });

  // Health check endpoint
  app.get(API_ENDPOINTS.HEALTH, async () => {
    return {
      status: "ok",
      timestamp: new Date().toISOString(),
      environment: env.nodeEnv,
      uptime: process.uptime(),
    };
  });

  // Error handler
  app.setErrorHandler((error, request, reply) => {
    logger.error("Request error:", {
      error: error.message,
      stack: error.stack,
      url: request.url,
      method: request.method,
    });

    const statusCode = error.statusCode ?? HTTP_STATUS.INTERNAL_SERVER_ERROR;
    reply.status(statusCode).send({
      success: false,
      error: error.name || "Internal Server Error",
      message: error.message || "An unexpected error occurred",
    });
  });

  app.setNotFoundHandler((request, reply) => {
    reply.status(HTTP_STATUS.NOT_FOUND).send({
      success: false,
      error: "Not Found",
      message: `Route ${request.method} ${request.url} not found`,
    });
  });

  return app;
}

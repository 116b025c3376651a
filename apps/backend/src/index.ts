/**
 * Backend Index - Server Entry Point
 *
 * Serves the capture-intent host API. See app.ts for the routes manifest.
 */

import type { FastifyInstance } from "fastify";
import { createLogger } from "@intentcam/utils";
import { createApp } from "./app";
import { env, validateEnv } from "./config/env";
import { getCaptureIntentService } from "./services/capture-intent-service";

const logger = createLogger("server");

let app: FastifyInstance | null = null;
let serverStarted = false;

export interface ServerOptions {
  port?: number;
  host?: string;
}

export async function startServer(options: ServerOptions = {}): Promise<void> {
  if (serverStarted) {
    logger.warn("Server already started");
    return;
  }

  try {
    logger.info("Starting capture intent server...");

    // Validate environment variables
    validateEnv();

    app = await createApp({ intentService: getCaptureIntentService() });

    const port = options.port || env.port;
    const host = options.host || env.host;

    await app.listen({
      port,
      host,
    });

    serverStarted = true;

    logger.info(`Server listening on http://${host}:${port}`);
    logger.info(`Environment: ${env.nodeEnv}`);
    logger.info(`Simulated camera failure mode: ${env.mockFailureMode}`);
  } catch (error) {
    logger.error("Failed to start server:", error);
    throw error;
  }
}

export async function stopServer(): Promise<void> {
  if (!serverStarted || !app) {
    logger.warn("Server not started");
    return;
  }

  try {
    logger.info("Stopping capture intent server...");

    // Ends any running intent as Cancelled and closes the camera
    getCaptureIntentService().destroy();
    logger.info("Capture intent service stopped");

    await app.close();
    logger.info("Fastify app closed");

    serverStarted = false;
    app = null;

    logger.info("Server stopped successfully");
  } catch (error) {
    logger.error("Error during shutdown:", error);
    throw error;
  }
}

// Handle graceful shutdown
const gracefulShutdown = async (signal: string) => {
  logger.info(`Received ${signal}, starting graceful shutdown...`);
  try {
    await stopServer();
    process.exit(0);
  } catch (error) {
    logger.error("Error during shutdown:", error);
    process.exit(1);
  }
};

process.on("SIGTERM", () => void gracefulShutdown("SIGTERM"));
process.on("SIGINT", () => void gracefulShutdown("SIGINT"));

// Handle unhandled rejections
process.on("unhandledRejection", (reason) => {
  logger.error("Unhandled Rejection:", { reason });
});

// Start server
startServer().catch((error: unknown) => {
  logger.error("Failed to start server:", error);
  process.exit(1);
});

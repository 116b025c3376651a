import dotenv from "dotenv";
import { CAPTURE_INTENT_DEFAULTS, ENV_KEYS, PORTS } from "@intentcam/config";

// Load environment variables
dotenv.config();

export type MockFailureMode =
  | "none"
  | "open_denied"
  | "timeout"
  | "card_full"
  | "flaky"
  | "no_af";

const MOCK_FAILURE_MODES: readonly MockFailureMode[] = [
  "none",
  "open_denied",
  "timeout",
  "card_full",
  "flaky",
  "no_af",
];

function parseFailureMode(value: string | undefined): MockFailureMode {
  const mode = MOCK_FAILURE_MODES.find((candidate) => candidate === value);
  return mode ?? "none";
}

function parseBoolean(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined || value === "") {
    return fallback;
  }
  return value === "true" || value === "1";
}

const nodeEnv = process.env[ENV_KEYS.NODE_ENV] || "development";

export const env: {
  nodeEnv: string;
  port: number;
  host: string;
  logLevel: string | undefined;
  mockFailureMode: MockFailureMode;
  mockLatencyMs: number;
  captureTimeoutMs: number;
  openCameraMaxAttempts: number;
  strictResourceChecks: boolean;
  isDevelopment: boolean;
  isProduction: boolean;
} = {
  nodeEnv,
  port: parseInt(
    process.env[ENV_KEYS.BACKEND_PORT] || String(PORTS.BACKEND),
    10,
  ),
  host: process.env[ENV_KEYS.BACKEND_HOST] || "0.0.0.0",
  logLevel: process.env[ENV_KEYS.LOG_LEVEL],

  // Simulated camera driver
  mockFailureMode: parseFailureMode(process.env[ENV_KEYS.MOCK_FAILURE_MODE]),
  mockLatencyMs: parseInt(process.env[ENV_KEYS.MOCK_LATENCY_MS] || "150", 10),

  // Capture settings
  captureTimeoutMs: parseInt(
    process.env[ENV_KEYS.CAPTURE_TIMEOUT_MS] ||
      String(CAPTURE_INTENT_DEFAULTS.CAPTURE_TIMEOUT_MS),
    10,
  ),
  openCameraMaxAttempts: parseInt(
    process.env[ENV_KEYS.OPEN_CAMERA_MAX_ATTEMPTS] ||
      String(CAPTURE_INTENT_DEFAULTS.OPEN_CAMERA_MAX_ATTEMPTS),
    10,
  ),

  // Ref-count mismatches throw in development builds, log elsewhere
  strictResourceChecks: parseBoolean(
    process.env[ENV_KEYS.STRICT_RESOURCE_CHECKS],
    nodeEnv === "development",
  ),

  isDevelopment: nodeEnv === "development",
  isProduction: nodeEnv === "production",
};

/**
 * Validate environment values, warning about anything out of range
 */
export function validateEnv(): boolean {
  const warnings: string[] = [];

  if (!Number.isFinite(env.port) || env.port <= 0) {
    warnings.push(`${ENV_KEYS.BACKEND_PORT} must be a positive integer`);
  }

  if (!Number.isFinite(env.captureTimeoutMs) || env.captureTimeoutMs <= 0) {
    warnings.push(`${ENV_KEYS.CAPTURE_TIMEOUT_MS} must be a positive integer`);
  }

  if (
    !Number.isFinite(env.openCameraMaxAttempts) ||
    env.openCameraMaxAttempts < 1
  ) {
    warnings.push(`${ENV_KEYS.OPEN_CAMERA_MAX_ATTEMPTS} must be at least 1`);
  }

  if (env.isProduction && env.mockFailureMode !== "none") {
    warnings.push(
      `Simulated camera failure mode "${env.mockFailureMode}" is active in production`,
    );
  }

  if (warnings.length > 0) {
    console.warn("Warnings:");
    warnings.forEach((w) => console.warn(`  - ${w}`));
  }

  return warnings.length === 0;
}

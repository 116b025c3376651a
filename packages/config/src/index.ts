/**
 * Shared configuration constants for the capture-intent system
 */

// ============================================================================
// Service Ports
// ============================================================================

export const PORTS = {
  BACKEND: 4100,
} as const;

// ============================================================================
// API Endpoints
// ============================================================================

export const API_ENDPOINTS = {
  HEALTH: "/health",
  INTENT: "/api/intent",
  INTENT_LIFECYCLE: "/api/intent/lifecycle/:signal",
  INTENT_SIGNALS: "/api/intent/signals",
} as const;

// ============================================================================
// Capture Intent Defaults
// ============================================================================

export const CAPTURE_INTENT_DEFAULTS = {
  /** Camera open attempts before the workflow fails */
  OPEN_CAMERA_MAX_ATTEMPTS: 3,
  /** Time allowed between shutter and capture completion */
  CAPTURE_TIMEOUT_MS: 30000,
  /** Upper zoom bound when the driver reports none */
  MAX_ZOOM_RATIO: 4,
  MIN_ZOOM_RATIO: 1,
  /** Self-timer choices offered by the bottom bar */
  TIMER_DURATIONS_SECONDS: [0, 3, 10],
  DEFAULT_TIMER_SECONDS: 0,
  DEFAULT_CAMERA_FACING: "back",
  DEFAULT_FLASH_MODE: "auto",
} as const;

// ============================================================================
// Environment Variable Keys
// ============================================================================

export const ENV_KEYS = {
  NODE_ENV: "NODE_ENV",
  BACKEND_PORT: "PORT",
  BACKEND_HOST: "HOST",
  LOG_LEVEL: "LOG_LEVEL",
  MOCK_FAILURE_MODE: "MOCK_FAILURE_MODE",
  MOCK_LATENCY_MS: "MOCK_LATENCY_MS",
  CAPTURE_TIMEOUT_MS: "CAPTURE_TIMEOUT_MS",
  OPEN_CAMERA_MAX_ATTEMPTS: "OPEN_CAMERA_MAX_ATTEMPTS",
  STRICT_RESOURCE_CHECKS: "STRICT_RESOURCE_CHECKS",
} as const;

// ============================================================================
// HTTP Status Codes
// ============================================================================

export const HTTP_STATUS = {
  CREATED: 201,
  BAD_REQUEST: 400,
  NOT_FOUND: 404,
  CONFLICT: 409,
  UNPROCESSABLE_ENTITY: 422,
  INTERNAL_SERVER_ERROR: 500,
} as const;

// ============================================================================
// Error Messages
// ============================================================================

export const ERROR_MESSAGES = {
  CANNOT_CONNECT_CAMERA: "Can't connect to the camera.",
  CAMERA_DISABLED: "Camera has been disabled because of security policies.",
  CAPTURE_FAILED: "Couldn't take the photo. Try again.",
  STORAGE_FULL: "Storage is full. Free up space and try again.",
  PREVIEW_FAILED: "Camera preview could not be started.",
  UNEXPECTED: "Something went wrong with the camera.",
  INTENT_ACTIVE: "A capture intent is already in progress",
  NO_ACTIVE_INTENT: "No capture intent has been started",
  INVALID_SIGNAL: "Invalid host signal",
} as const;

// ============================================================================
// UI Strings
// ============================================================================

export const UI_STRINGS = {
  PHOTO_ACCESSIBILITY_PEEK: "Photo taken",
} as const;

/**
 * Node.js-specific configuration helpers
 * These read process.env directly
 */

// ============================================================================
// Environment Detection
// ============================================================================

export function isDevelopment(): boolean {
  return process.env.NODE_ENV === "development";
}

export function isTest(): boolean {
  return process.env.NODE_ENV === "test";
}

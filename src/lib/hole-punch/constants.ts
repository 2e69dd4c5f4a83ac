/**
 * Hole Punching Constants
 */

export const HOLE_PUNCH_CONSTANTS = {
  // Retry cadence never drops below this (ms)
  MIN_RETRY_INTERVAL: 10,

  // Only the leading candidates take part in a race
  MAX_CANDIDATE_ENDPOINTS: 2,

  // Protocol limits
  MAX_MESSAGE_SIZE: 1500,

  // Default timings (ms)
  DEFAULT_CONFIG: {
    deadlineMs: 10000,
    retryIntervalMs: 100,
    connectTimeoutMs: 2000,
    authTimeoutMs: 2000,
    controlTimeoutMs: 10000,
    bindOutbound: true
  }
} as const;

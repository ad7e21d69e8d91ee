/**
 * Central Timeout Configuration
 *
 * All timeout and delay values should be imported from this module to ensure
 * consistent behavior across the codebase.
 *
 * Timeout categories:
 * - REQUEST: control API calls
 * - PROBE: CDP liveness checks
 * - POLL / SETTLE: waits inside endpoint resolution
 */

/**
 * Default timeout values in milliseconds
 */
export const TIMEOUTS = {
  /**
   * Per-call timeout for the control API
   */
  REQUEST: 30000,

  /**
   * Backoff ceiling for network and 5xx retries
   */
  REQUEST_BACKOFF_MAX: 8000,

  /**
   * Wait after a 429 without a usable Retry-After header
   */
  RATE_LIMIT_DEFAULT: 1000,

  /**
   * Lower bound for a Retry-After wait
   */
  RATE_LIMIT_MIN: 500,

  /**
   * TCP connect attempt against a candidate debug port
   */
  PROBE_CONNECT: 500,

  /**
   * `/json/version` discovery request
   */
  PROBE_HTTP: 2000,

  /**
   * Per-port budget while scanning a range
   */
  SCAN_PER_PORT: 300,

  /**
   * Base step of the polling wait; round i waits POLL_STEP * i
   */
  POLL_STEP: 2000,

  /**
   * Settle time after a zombie force-stop; grows by ZOMBIE_SETTLE_STEP per attempt
   */
  ZOMBIE_SETTLE_BASE: 12000,
  ZOMBIE_SETTLE_STEP: 3000,

  /**
   * Delay between start retries while a fresh profile propagates
   */
  SYNC_LAG: 2000,

  /**
   * First wait between force-stop attempts
   */
  FORCE_STOP_INITIAL: 2000,

  /**
   * First wait between force-stop attempts during zombie recovery
   */
  ZOMBIE_FORCE_STOP_INITIAL: 3000,

  /**
   * Timeout handed to the service in the start payload (seconds)
   */
  SERVICE_START_SECONDS: 120,

  /**
   * CDP websocket connection
   */
  CDP_CONNECT: 30000,
} as const;

/**
 * Default Configuration Constants
 *
 * All magic numbers and hardcoded values centralized here for easy tuning.
 * Used when no serving.yaml is available and as the base the YAML merges over.
 */

/**
 * Readiness wait for background triggers
 */
export const READINESS = {
  /** Poll attempts before giving up */
  WAIT_RETRIES: 50,

  /** Delay between polls (ms) */
  WAIT_INTERVAL_MS: 5_000, // 5 seconds
} as const;

/**
 * Telemetry push configuration
 */
export const TELEMETRY = {
  /** Push 1 of every N served requests */
  SAMPLE_RATE: 1,

  /** Rows accumulated per tabular record (1 = flat records) */
  BATCH_SIZE: 1,

  /** Partition sink writes by endpoint uid */
  SHARD_BY_ENDPOINT: true,

  /** Append stack traces to error records */
  VERBOSE: false,
} as const;

/**
 * Serving protocol and naming
 */
export const SERVING = {
  /** Default inference protocol */
  PROTOCOL: 'v2',

  /** Version reported when neither an explicit version nor an artifact tag exists */
  DEFAULT_VERSION: 'latest',

  /** Function tag used for endpoint lookups */
  DEFAULT_FUNCTION_TAG: 'latest',
} as const;

/**
 * Context param keys that override telemetry config per server
 */
export const CONTEXT_PARAMS = {
  STREAM_BATCH: 'log_stream_batch',
  STREAM_SAMPLE: 'log_stream_sample',
} as const;

/**
 * OpenTelemetry metrics
 */
export const METRICS = {
  ENABLED: false,
  SERVICE_NAME: 'model-dispatcher',
  PROMETHEUS_PORT: 9464,
  PREVENT_SERVER_START: false,
} as const;

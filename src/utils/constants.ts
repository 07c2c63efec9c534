/**
 * Centralized constants for limits, timeouts and defaults.
 * Consolidates magic numbers from across the engine.
 */

/** Timeout values in milliseconds */
export const TIMEOUTS = {
  /** Default base delay for retry backoff */
  DEFAULT_RETRY_BASE_DELAY_MS: 1000,
  /** Default upper bound for a single backoff sleep */
  DEFAULT_MAX_BACKOFF_MS: 60_000,
  /** Default timeout for builtin HTTP requests */
  DEFAULT_HTTP_TIMEOUT_MS: 30_000,
  /** Default timeout for builtin shell commands */
  DEFAULT_SHELL_TIMEOUT_MS: 5 * 60 * 1000,
  /** Minimum interval between trigger polls */
  MIN_POLL_INTERVAL_MS: 10_000,
  /** Maximum backfill window for poll triggers */
  MAX_POLL_BACKFILL_MS: 24 * 60 * 60 * 1000,
} as const;

/** Limit values for various operations */
export const LIMITS = {
  /** Maximum size of JSON produced or consumed by template functions */
  MAX_JSON_SIZE: 1024 * 1024,
  /** Maximum array length accepted by template functions and foreach */
  MAX_ARRAY_LENGTH: 10_000,
  /** Maximum rendered template size */
  MAX_TEMPLATE_OUTPUT: 1024 * 1024,
  /** Maximum value for max_concurrency on parallel and foreach steps */
  MAX_CONCURRENCY: 100,
  /** Maximum nesting of parallel blocks */
  MAX_PARALLEL_DEPTH: 3,
  /** Hard cap for loop iterations */
  MAX_LOOP_ITERATIONS: 100,
  /** Serialized size above which the oldest loop history entries are dropped */
  MAX_LOOP_HISTORY_BYTES: 1024 * 1024,
  /** Maximum depth of nested subworkflow invocations */
  MAX_SUBWORKFLOW_DEPTH: 10,
  /** Maximum bytes to read from a file in file.read */
  MAX_FILE_READ_BYTES: 5 * 1024 * 1024,
  /** Maximum bytes to read from HTTP responses */
  MAX_HTTP_RESPONSE_BYTES: 2 * 1024 * 1024,
  /** Maximum bytes to capture from process stdout/stderr */
  MAX_PROCESS_OUTPUT_BYTES: 2 * 1024 * 1024,
  /** Maximum string length for CLI input values */
  MAX_INPUT_STRING_LENGTH: 100_000,
  /** Standard length for error message truncation in logs */
  ERROR_MESSAGE_TRUNCATE_LENGTH: 500,
} as const;

/** Default retry policy values */
export const RETRY_DEFAULTS = {
  MAX_ATTEMPTS: 1,
  BACKOFF_MULTIPLIER: 2,
} as const;

/** Placeholder used when masking sensitive values in logs and loop history */
export const MASKED_VALUE = '***MASKED***';

/** Rendered text for a missing template reference */
export const NO_VALUE = '<no value>';

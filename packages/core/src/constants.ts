/**
 * Constants for apiprobe
 */

/**
 * Default timeout values in milliseconds
 */
export const DEFAULT_TIMEOUTS = {
  /** Per-case HTTP request timeout */
  HTTP_REQUEST: 10_000, // 10 seconds

  /** Connectivity pre-check timeout */
  CONNECTIVITY_CHECK: 5_000, // 5 seconds
} as const;

/**
 * Status expected from a quest case that names none
 */
export const DEFAULT_EXPECTED_STATUS = 200;

/**
 * Form field names consumed by the target service
 */
export const FORM_FIELDS = {
  IDENTITY: 'uid',
  DATA: 'data',
} as const;

/**
 * Suffix marking a category key in the quest document (`normal_cases`)
 */
export const CATEGORY_KEY_SUFFIX = '_cases';

/**
 * Category that collects every case of an endpoints document
 */
export const ENDPOINTS_CATEGORY = 'endpoints';

/**
 * Display labels for well-known categories
 */
export const CATEGORY_LABELS: Readonly<Record<string, string>> = {
  normal: 'Normal cases',
  abnormal: 'Abnormal cases',
  [ENDPOINTS_CATEGORY]: 'Endpoint cases',
};

/**
 * Environment variables that override document values
 */
export const ENV_VARS = {
  BASE_URL: 'APIPROBE_BASE_URL',
  TIMEOUT_MS: 'APIPROBE_TIMEOUT_MS',
} as const;

/**
 * Result log layout
 */
export const RESULT_LOG = {
  /** Line that closes every block */
  SEPARATOR: '-'.repeat(50),
  /** Indentation used for JSON payloads */
  PAYLOAD_INDENT: 2,
} as const;

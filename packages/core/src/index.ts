/**
 * @apiprobe/core
 *
 * Data model, errors, canonical encoding and configuration loading for the
 * apiprobe HTTP test harness.
 */

// Types
export * from './types/index.js';

// Schemas (config document validation)
export * from './schemas/index.js';

// Errors
export {
  HarnessError,
  Errors,
  isHarnessError,
  isConfigError,
  isTransportError,
  toHarnessError,
  ERROR_EXIT_CODE,
} from './errors.js';
export type { ErrorCode } from './errors.js';

// Utilities
export * from './utils/index.js';

// Constants
export {
  DEFAULT_TIMEOUTS,
  DEFAULT_EXPECTED_STATUS,
  FORM_FIELDS,
  CATEGORY_KEY_SUFFIX,
  CATEGORY_LABELS,
  ENDPOINTS_CATEGORY,
  ENV_VARS,
  RESULT_LOG,
} from './constants.js';

// Config loading
export { loadConfig, parseConfig, detectShape } from './config/loader.js';
export type { LoadConfigOptions, ConfigOverrides } from './config/loader.js';
export {
  adaptQuestDocument,
  adaptEndpointsDocument,
  categoryNameFromKey,
} from './config/adapters.js';
export type { AdaptedDocument } from './config/adapters.js';

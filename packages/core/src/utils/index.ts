/**
 * Utility exports for @apiprobe/core
 */

// Canonical encoding
export { canonicalJson, isStructuredValue, isPlainObject } from './canonical-json.js';
export type { CanonicalJsonOptions } from './canonical-json.js';

// Schema validation utilities
export {
  validateSchema,
  formatValidationErrors,
  fromMapping,
  mapping,
  orderedMapping,
  z,
  nonEmptyString,
  positiveInt,
  httpStatus,
  httpUrl,
} from './schema.js';
export type { ValidationResult, ValidationError } from './schema.js';

// Error utilities
export {
  formatError,
  describeTransportFailure,
} from './error-helpers.js';

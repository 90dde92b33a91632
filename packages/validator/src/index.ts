/**
 * @apiprobe/validator
 *
 * Result validation for apiprobe.
 */

// Types
export type {
  CheckName,
  ValidationCheck,
  ResultValidation,
} from './types.js';

// Validator
export {
  validateResult,
  renderResponse,
  hasExpectation,
} from './validator.js';

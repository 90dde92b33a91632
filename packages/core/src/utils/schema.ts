/**
 * Schema validation utilities using Zod
 */

import { z, ZodError } from 'zod';
import { isPlainObject } from './canonical-json.js';

/**
 * Result of schema validation
 */
export interface ValidationResult<T> {
  /** Whether validation passed */
  success: boolean;
  /** Validated data (if success) */
  data?: T;
  /** Validation errors (if failure) */
  errors?: ValidationError[];
}

/**
 * Individual validation error
 */
export interface ValidationError {
  /** Path to the invalid field */
  path: (string | number)[];
  /** Error message */
  message: string;
  /** Error code */
  code: string;
}

/**
 * Validate data against a Zod schema
 * @param schema - The Zod schema to validate against
 * @param data - The data to validate
 * @returns Validation result with data or errors
 */
export function validateSchema<S extends z.ZodTypeAny>(
  schema: S,
  data: unknown
): ValidationResult<z.output<S>> {
  try {
    const validData: z.output<S> = schema.parse(data);
    return {
      success: true,
      data: validData,
    };
  } catch (error) {
    if (error instanceof ZodError) {
      return {
        success: false,
        errors: error.errors.map((e) => ({
          path: e.path,
          message: e.message,
          code: e.code,
        })),
      };
    }
    throw error;
  }
}

/**
 * Render validation errors as `path: message` lines
 */
export function formatValidationErrors(errors: ValidationError[]): string[] {
  return errors.map((e) => (e.path.length > 0 ? `${e.path.join('.')}: ${e.message}` : e.message));
}

// Re-export Zod for convenience
export { z };

/**
 * YAML mappings load as `Map`; turn one into a plain object so `z.object`
 * can check it. Keys are stringified.
 */
export function fromMapping(value: unknown): unknown {
  if (value instanceof Map) {
    const result: Record<string, unknown> = {};
    for (const [key, item] of value) {
      result[String(key)] = item;
    }
    return result;
  }
  return value;
}

/**
 * Wrap an object schema so it also accepts a YAML-loaded `Map`
 */
export function mapping<T extends z.ZodTypeAny>(schema: T) {
  return z.preprocess(fromMapping, schema);
}

/**
 * Ordered name → value mapping. Keys are coerced to strings, and the
 * output `Map` keeps document order.
 */
export function orderedMapping<T extends z.ZodTypeAny>(schema: T) {
  return z.preprocess(
    (value) => (isPlainObject(value) ? new Map(Object.entries(value)) : value),
    z.map(z.coerce.string(), schema)
  );
}

/**
 * Schema for a non-empty string
 */
export const nonEmptyString = z.string().min(1);

/**
 * Schema for a positive integer
 */
export const positiveInt = z.number().int().positive();

/**
 * Schema for an HTTP status code
 */
export const httpStatus = z.number().int().min(100).max(599);

/**
 * Schema for an http(s) URL
 */
export const httpUrl = z
  .string()
  .url()
  .refine((value) => /^https?:\/\//i.test(value), { message: 'URL must use http or https' });

/**
 * Config loader
 *
 * Reads a YAML document, detects its shape, validates it and adapts it into
 * a `RunConfig`. Every failure surfaces as a configuration `HarnessError`
 * so callers can stop before any case runs.
 */

import * as fs from 'fs';
import { parseDocument } from 'yaml';
import { DEFAULT_TIMEOUTS, ENV_VARS } from '../constants.js';
import { Errors } from '../errors.js';
import { EndpointsDocumentSchema, QuestDocumentSchema } from '../schemas/index.js';
import type { ConfigShape, RunConfig } from '../types/index.js';
import {
  formatValidationErrors,
  validateSchema,
  httpUrl,
  type ValidationError,
} from '../utils/schema.js';
import {
  adaptEndpointsDocument,
  adaptQuestDocument,
  type AdaptedDocument,
} from './adapters.js';

/**
 * Values that take precedence over the document
 */
export interface ConfigOverrides {
  baseUrl?: string;
  timeoutMs?: number;
}

export interface LoadConfigOptions {
  /** Explicit overrides, applied after environment overrides */
  overrides?: ConfigOverrides;
  /** Environment to read `APIPROBE_*` variables from (defaults to process.env) */
  env?: Record<string, string | undefined>;
}

/**
 * Load and validate a configuration file
 */
export function loadConfig(filePath: string, options: LoadConfigOptions = {}): RunConfig {
  let text: string;
  try {
    text = fs.readFileSync(filePath, 'utf-8');
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      throw Errors.configNotFound(filePath);
    }
    throw Errors.configParseError(
      filePath,
      error instanceof Error ? error.message : String(error),
      error instanceof Error ? error : undefined
    );
  }

  return parseConfig(text, filePath, options);
}

/**
 * Parse configuration text. `source` labels the document in errors.
 */
export function parseConfig(
  text: string,
  source: string,
  options: LoadConfigOptions = {}
): RunConfig {
  const doc = parseDocument(text, { intAsBigInt: true });
  if (doc.errors.length > 0) {
    const [first] = doc.errors;
    throw Errors.configParseError(source, first.message, first);
  }

  const raw = narrowSafeIntegers(doc.toJS({ mapAsMap: true }));
  if (raw == null) {
    throw Errors.configInvalid(`Configuration document is empty: ${source}`, { path: source });
  }

  const shape = detectShape(raw, source);
  const adapted = shape === 'quest' ? validateQuest(raw, source) : validateEndpoints(raw, source);

  assertUniqueCategoryNames(adapted, source);
  assertUniqueCaseNames(adapted, source);

  const env = options.env ?? process.env;
  const baseUrl = options.overrides?.baseUrl ?? env[ENV_VARS.BASE_URL] ?? adapted.baseUrl;
  const timeoutMs =
    options.overrides?.timeoutMs ??
    parseTimeout(env[ENV_VARS.TIMEOUT_MS]) ??
    adapted.timeoutMs ??
    DEFAULT_TIMEOUTS.HTTP_REQUEST;

  if (!httpUrl.safeParse(baseUrl).success) {
    throw Errors.configInvalid(`Invalid base URL: ${baseUrl}`, { path: source, baseUrl });
  }
  if (!Number.isInteger(timeoutMs) || timeoutMs <= 0) {
    throw Errors.configInvalid(`Timeout must be a positive integer, got ${timeoutMs}`, {
      path: source,
    });
  }

  return Object.freeze({
    source,
    shape,
    baseUrl,
    timeoutMs,
    headers: Object.freeze({ ...adapted.headers }),
    categories: Object.freeze(adapted.categories),
  });
}

/**
 * Decide which document shape a parsed document uses
 */
export function detectShape(raw: unknown, source: string): ConfigShape {
  if (!(raw instanceof Map)) {
    throw Errors.configInvalid(`Configuration root must be a mapping: ${source}`, { path: source });
  }

  const hasCases = raw.has('test_cases');
  const hasEndpoints = raw.has('endpoints');

  if (hasCases && hasEndpoints) {
    throw Errors.configInvalid(
      `Configuration must define either "test_cases" or "endpoints", not both: ${source}`,
      { path: source }
    );
  }
  if (hasCases) return 'quest';
  if (hasEndpoints) return 'endpoints';

  throw Errors.configInvalid(
    `Configuration defines neither "test_cases" nor "endpoints": ${source}`,
    { path: source }
  );
}

function validateQuest(raw: unknown, source: string): AdaptedDocument {
  const result = validateSchema(QuestDocumentSchema, raw);
  if (!result.success || !result.data) {
    throw invalidDocument(source, result.errors ?? []);
  }
  return adaptQuestDocument(result.data);
}

function validateEndpoints(raw: unknown, source: string): AdaptedDocument {
  const result = validateSchema(EndpointsDocumentSchema, raw);
  if (!result.success || !result.data) {
    throw invalidDocument(source, result.errors ?? []);
  }
  return adaptEndpointsDocument(result.data);
}

function invalidDocument(source: string, errors: ValidationError[]) {
  const lines = formatValidationErrors(errors);
  return Errors.configInvalid(`Invalid configuration ${source}:\n  ${lines.join('\n  ')}`, {
    path: source,
    errors,
  });
}

function assertUniqueCategoryNames(doc: AdaptedDocument, source: string): void {
  const seen = new Set<string>();
  for (const category of doc.categories) {
    if (seen.has(category.name)) {
      throw Errors.configInvalid(
        `Duplicate category "${category.name}" in ${source}`,
        { path: source, category: category.name }
      );
    }
    seen.add(category.name);
  }
}

function assertUniqueCaseNames(doc: AdaptedDocument, source: string): void {
  const seen = new Map<string, string>();
  for (const category of doc.categories) {
    for (const testCase of category.cases) {
      const previous = seen.get(testCase.name);
      if (previous !== undefined) {
        throw Errors.configInvalid(
          `Duplicate case name "${testCase.name}" in categories "${previous}" and "${category.name}"`,
          { path: source, name: testCase.name }
        );
      }
      seen.set(testCase.name, category.name);
    }
  }
}

/**
 * Integers load as `bigint`; bring the ones a number holds exactly back to
 * `number`, keys included, and keep the rest as `bigint`.
 */
function narrowSafeIntegers(value: unknown): unknown {
  if (typeof value === 'bigint') {
    return value >= BigInt(Number.MIN_SAFE_INTEGER) && value <= BigInt(Number.MAX_SAFE_INTEGER)
      ? Number(value)
      : value;
  }
  if (value instanceof Map) {
    const narrowed = new Map<unknown, unknown>();
    for (const [key, item] of value) {
      narrowed.set(narrowSafeIntegers(key), narrowSafeIntegers(item));
    }
    return narrowed;
  }
  if (Array.isArray(value)) {
    return value.map((item: unknown) => narrowSafeIntegers(item));
  }
  return value;
}

function parseTimeout(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === '') return undefined;
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw Errors.configInvalid(`${ENV_VARS.TIMEOUT_MS} must be a positive integer, got "${value}"`);
  }
  return parsed;
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

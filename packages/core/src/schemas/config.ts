/**
 * Configuration document schemas using Zod
 *
 * Two document shapes are accepted. Both are adapted into the canonical
 * `RunConfig` by the config loader; nothing downstream sees the raw shapes.
 *
 * Quest shape:
 *
 *   base_url: http://host/api/Quest
 *   test_cases:
 *     normal_cases:
 *       FetchQuestList: { endpoint, uid, data, expected_status }
 *     abnormal_cases: ...
 *
 * Endpoints shape:
 *
 *   base_url: http://host
 *   headers: { ... }
 *   endpoints:
 *     users: { route, method, payloads: [ { ..., expected_result } ] }
 */

import { z } from 'zod';
import { DEFAULT_EXPECTED_STATUS } from '../constants.js';
import type { Payload } from '../types/index.js';
import { isStructuredValue, isPlainObject } from '../utils/canonical-json.js';
import {
  mapping,
  orderedMapping,
  nonEmptyString,
  positiveInt,
  httpStatus,
  httpUrl,
} from '../utils/schema.js';

function isPayload(value: unknown): value is Payload {
  return (
    isStructuredValue(value) ||
    typeof value === 'string' ||
    typeof value === 'number' ||
    typeof value === 'bigint' ||
    typeof value === 'boolean'
  );
}

/**
 * Case payload: mapping, sequence or scalar
 */
export const PayloadSchema = z.custom<Payload>(isPayload, {
  message: 'Payload must be a mapping, a sequence or a scalar',
});

/**
 * Global request headers
 */
export const HeadersSchema = mapping(z.record(z.coerce.string()));

// Quest shape

/**
 * One entry of a `*_cases` mapping
 */
export const QuestCaseSchema = mapping(
  z.object({
    endpoint: nonEmptyString,
    uid: z.union([z.string(), z.number(), z.bigint()]).nullish(),
    data: PayloadSchema.nullish(),
    expected_status: httpStatus.default(DEFAULT_EXPECTED_STATUS),
    expected_contains: z.string().nullish(),
    description: z.string().nullish(),
  })
);

export const QuestDocumentSchema = mapping(
  z.object({
    base_url: httpUrl,
    timeout_ms: positiveInt.nullish(),
    headers: HeadersSchema.nullish(),
    test_cases: orderedMapping(orderedMapping(QuestCaseSchema).nullable()).refine(
      (categories) => categories.size > 0,
      { message: 'At least one case category is required' }
    ),
  })
);

// Endpoints shape

export const ExpectedResultSchema = mapping(
  z.object({
    status_code: httpStatus.nullish(),
    response_contains: z.string().nullish(),
  })
);

const EXPECTED_RESULT_KEY = 'expected_result';

/**
 * Split a payload entry into the body that is sent and its expectation,
 * which travels in the same mapping but is not part of the request.
 */
function splitExpectedResult(value: unknown): unknown {
  const entries = value instanceof Map
    ? Array.from(value.entries())
    : isPlainObject(value)
      ? Object.entries(value)
      : undefined;

  if (!entries) return value;

  const body = new Map<unknown, unknown>();
  let expected: unknown;
  for (const [key, item] of entries) {
    if (key === EXPECTED_RESULT_KEY) {
      expected = item;
    } else {
      body.set(key, item);
    }
  }
  return { body, expected_result: expected };
}

export const EndpointPayloadSchema = z.preprocess(
  splitExpectedResult,
  z.object({
    body: z.custom<ReadonlyMap<unknown, unknown>>((value) => value instanceof Map, {
      message: 'Each payload must be a mapping',
    }),
    expected_result: ExpectedResultSchema.nullish(),
  })
);

export const EndpointSchema = mapping(
  z.object({
    route: z.string(),
    method: z.preprocess(
      (value) => (typeof value === 'string' ? value.toUpperCase() : value),
      z.enum(['GET', 'POST'])
    ),
    payloads: z.array(EndpointPayloadSchema).nullish(),
    expected_result: ExpectedResultSchema.nullish(),
    description: z.string().nullish(),
  })
);

export const EndpointsDocumentSchema = mapping(
  z.object({
    base_url: httpUrl,
    timeout_ms: positiveInt.nullish(),
    headers: HeadersSchema.nullish(),
    endpoints: orderedMapping(EndpointSchema).refine(
      (endpoints) => endpoints.size > 0,
      { message: 'At least one endpoint is required' }
    ),
  })
);

export type QuestCase = z.infer<typeof QuestCaseSchema>;
export type QuestDocument = z.infer<typeof QuestDocumentSchema>;
export type ExpectedResult = z.infer<typeof ExpectedResultSchema>;
export type EndpointDefinition = z.infer<typeof EndpointSchema>;
export type EndpointsDocument = z.infer<typeof EndpointsDocumentSchema>;

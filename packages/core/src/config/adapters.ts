/**
 * Adapters from validated config documents to the canonical case model
 */

import { CATEGORY_KEY_SUFFIX, CATEGORY_LABELS, ENDPOINTS_CATEGORY } from '../constants.js';
import type {
  QuestCase,
  QuestDocument,
  EndpointDefinition,
  EndpointsDocument,
  ExpectedResult,
} from '../schemas/index.js';
import type { Category, Expectation, TestCase } from '../types/index.js';

/**
 * Document-level settings shared by both shapes
 */
export interface AdaptedDocument {
  baseUrl: string;
  timeoutMs?: number;
  headers: Record<string, string>;
  categories: Category[];
}

/**
 * `normal_cases` → `normal`
 */
export function categoryNameFromKey(key: string): string {
  return key.endsWith(CATEGORY_KEY_SUFFIX) && key.length > CATEGORY_KEY_SUFFIX.length
    ? key.slice(0, -CATEGORY_KEY_SUFFIX.length)
    : key;
}

function makeCategory(name: string, cases: TestCase[]): Category {
  return Object.freeze({
    name,
    label: CATEGORY_LABELS[name],
    cases: Object.freeze(cases),
  });
}

function questCaseToTestCase(name: string, entry: QuestCase): TestCase {
  const expectation: Expectation = { status: entry.expected_status };
  if (entry.expected_contains != null) {
    expectation.contains = entry.expected_contains;
  }

  return Object.freeze({
    name,
    endpoint: entry.endpoint,
    method: 'POST',
    encoding: 'form',
    identity: entry.uid == null ? undefined : String(entry.uid),
    payload: entry.data ?? undefined,
    expectation: Object.freeze(expectation),
    description: entry.description ?? undefined,
  });
}

/**
 * Quest shape: one category per `*_cases` key, in document order
 */
export function adaptQuestDocument(doc: QuestDocument): AdaptedDocument {
  const categories: Category[] = [];

  for (const [key, entries] of doc.test_cases) {
    const cases: TestCase[] = [];
    for (const [name, entry] of entries ?? new Map<string, QuestCase>()) {
      cases.push(questCaseToTestCase(name, entry));
    }
    categories.push(makeCategory(categoryNameFromKey(key), cases));
  }

  return {
    baseUrl: doc.base_url,
    timeoutMs: doc.timeout_ms ?? undefined,
    headers: doc.headers ?? {},
    categories,
  };
}

function toExpectation(expected: ExpectedResult | null | undefined): Expectation | undefined {
  if (expected == null) return undefined;

  const expectation: Expectation = {};
  if (expected.status_code != null) {
    expectation.status = expected.status_code;
  }
  if (expected.response_contains != null) {
    expectation.contains = expected.response_contains;
  }
  return Object.freeze(expectation);
}

function endpointToTestCases(name: string, endpoint: EndpointDefinition): TestCase[] {
  const base = {
    endpoint: endpoint.route,
    method: endpoint.method,
    encoding: 'json' as const,
    description: endpoint.description ?? undefined,
  };

  if (endpoint.payloads == null) {
    return [
      Object.freeze({
        ...base,
        name: `${name} - Normal`,
        expectation: toExpectation(endpoint.expected_result),
      }),
    ];
  }

  return endpoint.payloads.map((payload, index) =>
    Object.freeze({
      ...base,
      name: `${name} - Test Case ${index + 1}`,
      payload: payload.body,
      expectation: toExpectation(payload.expected_result),
    })
  );
}

/**
 * Endpoints shape: every payload of every endpoint becomes a case in a
 * single category
 */
export function adaptEndpointsDocument(doc: EndpointsDocument): AdaptedDocument {
  const cases: TestCase[] = [];
  for (const [name, endpoint] of doc.endpoints) {
    cases.push(...endpointToTestCases(name, endpoint));
  }

  return {
    baseUrl: doc.base_url,
    timeoutMs: doc.timeout_ms ?? undefined,
    headers: doc.headers ?? {},
    categories: [makeCategory(ENDPOINTS_CATEGORY, cases)],
  };
}

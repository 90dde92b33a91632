/**
 * Request Builder
 *
 * Pure functions turning a test case into a request body. Absent identity or
 * payload means the field is not sent at all; there are no null or empty
 * placeholders. A payload that is not a mapping or sequence is sent
 * unchanged, which is how malformed-input cases put invalid JSON on the wire.
 */

import {
  FORM_FIELDS,
  canonicalJson,
  isStructuredValue,
  type RequestBody,
  type TestCase,
} from '@apiprobe/core';
import type { PreparedRequest, WireBody } from './types.js';

/**
 * Build the `uid` / `data` form fields
 */
export function buildFormFields(
  identity?: string | number | bigint | null,
  payload?: unknown
): Record<string, string> {
  const fields: Record<string, string> = {};

  if (identity !== undefined && identity !== null) {
    fields[FORM_FIELDS.IDENTITY] = String(identity);
  }

  if (payload !== undefined && payload !== null) {
    fields[FORM_FIELDS.DATA] = isStructuredValue(payload)
      ? canonicalJson(payload)
      : String(payload);
  }

  return fields;
}

/**
 * Join a base URL and an endpoint with exactly one slash between them
 */
export function joinUrl(baseUrl: string, endpoint: string): string {
  if (endpoint === '') return baseUrl;

  const baseHasSlash = baseUrl.endsWith('/');
  const endpointHasSlash = endpoint.startsWith('/');

  if (baseHasSlash && endpointHasSlash) return baseUrl + endpoint.slice(1);
  if (baseHasSlash || endpointHasSlash) return baseUrl + endpoint;
  return `${baseUrl}/${endpoint}`;
}

/**
 * Build the request for a test case. GET requests never carry a body.
 */
export function buildRequest(baseUrl: string, testCase: TestCase): PreparedRequest {
  const url = joinUrl(baseUrl, testCase.endpoint);

  if (testCase.method === 'GET') {
    return { url, method: testCase.method };
  }

  if (testCase.encoding === 'form') {
    return {
      url,
      method: testCase.method,
      body: {
        kind: 'form',
        fields: buildFormFields(testCase.identity, testCase.payload),
      },
    };
  }

  if (testCase.payload === undefined) {
    return { url, method: testCase.method };
  }

  return {
    url,
    method: testCase.method,
    body: { kind: 'json', text: canonicalJson(testCase.payload) },
  };
}

/**
 * Encode a body for the wire. An empty form has nothing to send.
 */
export function encodeBody(body: RequestBody): WireBody | undefined {
  if (body.kind === 'json') {
    return { contentType: 'application/json', text: body.text };
  }

  const params = new URLSearchParams(Object.entries(body.fields));
  const text = params.toString();
  if (text === '') return undefined;

  return { contentType: 'application/x-www-form-urlencoded', text };
}

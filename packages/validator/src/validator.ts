/**
 * Validator Implementation
 *
 * Judges a request result against an expectation. Rules, in order:
 * a transport error fails; no expectation passes; the status code must match
 * exactly; an expected substring must appear in the rendered response.
 */

import {
  canonicalJson,
  type Expectation,
  type FailureReason,
  type RequestResult,
} from '@apiprobe/core';
import type { ResultValidation, ValidationCheck } from './types.js';

/**
 * Whether an expectation asks for anything
 */
export function hasExpectation(expectation?: Readonly<Expectation>): boolean {
  return expectation !== undefined &&
    (expectation.status !== undefined || expectation.contains !== undefined);
}

/**
 * Text the `contains` check searches: the parsed body re-serialized when the
 * response was JSON, otherwise the raw text
 */
export function renderResponse(result: RequestResult): string {
  if (result.responseParsed !== undefined) {
    return canonicalJson(result.responseParsed);
  }
  return result.responseText ?? '';
}

function fail(
  checks: ValidationCheck[],
  check: ValidationCheck,
  reason: FailureReason
): ResultValidation {
  checks.push(check);
  return { passed: false, checks, reason, message: check.message };
}

/**
 * Validate a request result against an expectation
 */
export function validateResult(
  result: RequestResult,
  expectation?: Readonly<Expectation>
): ResultValidation {
  const checks: ValidationCheck[] = [];

  if (result.transportError !== undefined) {
    return fail(checks, {
      name: 'transport',
      passed: false,
      message: result.transportError,
    }, 'transport');
  }

  checks.push({
    name: 'transport',
    passed: true,
    message: 'Exchange completed',
  });

  if (!expectation || !hasExpectation(expectation)) {
    checks.push({
      name: 'expectation',
      passed: true,
      message: 'No expectation specified',
    });
    return { passed: true, checks };
  }

  if (expectation.status !== undefined) {
    if (result.statusCode !== expectation.status) {
      return fail(checks, {
        name: 'status',
        passed: false,
        message: `Expected status ${expectation.status}, got ${result.statusCode ?? 'none'}`,
        details: { expected: expectation.status, actual: result.statusCode },
      }, 'status');
    }

    checks.push({
      name: 'status',
      passed: true,
      message: `Status ${expectation.status}`,
    });
  }

  if (expectation.contains !== undefined) {
    const rendered = renderResponse(result);
    if (!rendered.includes(expectation.contains)) {
      return fail(checks, {
        name: 'content',
        passed: false,
        message: `Response does not contain "${expectation.contains}"`,
        details: { expected: expectation.contains },
      }, 'content');
    }

    checks.push({
      name: 'content',
      passed: true,
      message: `Response contains "${expectation.contains}"`,
    });
  }

  return { passed: true, checks };
}

/**
 * Helpers for callers implementing their own retry policy around GitHub's
 * primary and secondary rate limits.
 * @module rate-limit
 */

import type { Headers, Response } from 'undici';
import { GitHubError, GitHubErrorKind, GraphQLQueryError } from './errors.js';

/** Minimum wait, in seconds, when GitHub gives no hint. */
export const DEFAULT_RATE_LIMIT_WAIT = 60;

/** Extra seconds added per attempt when GitHub gives no hint. */
export const RATE_LIMIT_WAIT_STEP = 20;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Reads a JSON body from a clone so the caller can still consume the original.
 * A body the caller already consumed reads as undefined.
 */
async function peekJson(response: Response): Promise<unknown> {
  if (response.bodyUsed) {
    return undefined;
  }
  const text = await response.clone().text();
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

function isRateLimitedGraphQLError(error: unknown): boolean {
  if (!isRecord(error)) {
    return false;
  }
  if (error.type === 'RATE_LIMITED') {
    return true;
  }
  if (isRecord(error.extensions) && error.extensions.code === 'RATE_LIMITED') {
    return true;
  }
  return typeof error.message === 'string' && error.message.toLowerCase().includes('rate limit');
}

function hasRateLimitHeaders(headers: Headers): boolean {
  return headers.get('x-ratelimit-remaining') === '0' || headers.get('retry-after') !== null;
}

/**
 * Returns true when a REST or GraphQL response, or an error thrown by
 * `execute`, indicates a rate limit.
 *
 * GraphQL reports rate limits in the `errors` array of a 200 or 403; REST
 * uses 403 or 429 with headers or a message. When the caller has already
 * read the body, only status and headers are checked.
 */
export async function isRateLimited(subject: Response | GitHubError): Promise<boolean> {
  if (subject instanceof GraphQLQueryError) {
    return subject.errors.some(isRateLimitedGraphQLError);
  }
  if (subject instanceof GitHubError) {
    if (subject.kind === GitHubErrorKind.RateLimited) {
      return true;
    }
    return (
      subject.statusCode === 403 &&
      subject.headers !== undefined &&
      hasRateLimitHeaders(subject.headers)
    );
  }

  const response = subject;
  const resource = response.headers.get('x-ratelimit-resource');

  if (resource === 'graphql') {
    if (response.status !== 200 && response.status !== 403) {
      return false;
    }
    const body = await peekJson(response);
    const errors = isRecord(body) ? body.errors : undefined;
    return Array.isArray(errors) && errors.some(isRateLimitedGraphQLError);
  }

  if (response.status !== 403 && response.status !== 429) {
    return false;
  }

  if (hasRateLimitHeaders(response.headers)) {
    return true;
  }

  const body = await peekJson(response);
  const message = isRecord(body) && typeof body.message === 'string' ? body.message.toLowerCase() : '';
  return message.includes('rate limit exceeded') || message.includes('too many requests');
}

/**
 * Seconds to wait before retrying a rate limited request.
 *
 * Accepts a response or an error thrown by `execute`. Uses
 * `x-ratelimit-reset` when the limit is exhausted, then `retry-after`,
 * and otherwise waits a minute plus {@link RATE_LIMIT_WAIT_STEP} seconds per
 * extra attempt.
 *
 * @param attempt - 1-based retry attempt.
 * @param now - Current time in milliseconds.
 */
export function getWaitTime(
  subject: { readonly headers?: Headers },
  attempt = 1,
  now: number = Date.now()
): number {
  const tries = Math.max(attempt, 1);
  const headers = subject.headers;
  const remaining = headers?.get('x-ratelimit-remaining');
  const reset = Number.parseInt(headers?.get('x-ratelimit-reset') ?? '', 10);
  const retryAfter = Number.parseInt(headers?.get('retry-after') ?? '', 10);

  if (remaining === '0' && !Number.isNaN(reset)) {
    return Math.max(0, reset - Math.floor(now / 1000));
  }
  if (!Number.isNaN(retryAfter)) {
    return retryAfter;
  }
  return DEFAULT_RATE_LIMIT_WAIT + RATE_LIMIT_WAIT_STEP * (tries - 1);
}

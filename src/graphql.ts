/**
 * GitHub GraphQL API v4 request and response shapes.
 * @module graphql
 */

import type { Response } from 'undici';
import { GitHubError, GitHubErrorKind, GraphQLQueryError, type GraphQLErrorEntry } from './errors.js';

/**
 * GraphQL variables.
 */
export type GraphQLVariables = Record<string, unknown>;

/**
 * GraphQL request
 */
export interface GraphQLRequest {
  query: string;
  variables?: GraphQLVariables;
  operationName?: string;
}

/**
 * GraphQL response
 */
export interface GraphQLResponse<T = unknown> {
  data?: T | null;
  errors?: GraphQLErrorEntry[];
  extensions?: Record<string, unknown>;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Reads a GraphQL HTTP response and returns its `data`.
 *
 * Errors thrown here keep the response status and headers, so
 * `isRateLimited` and `getWaitTime` can be applied to them.
 *
 * @throws {GitHubError} For a non-2xx status or a body that is not a JSON object.
 * @throws {GraphQLQueryError} When the body carries a non-empty `errors` array.
 */
export async function decodeGraphQLResponse<T>(response: Response): Promise<T> {
  const { status, headers } = response;
  const text = await response.text();

  if (!response.ok) {
    throw GitHubError.fromResponse(
      status,
      `GraphQL request failed with HTTP ${status}: ${text.slice(0, 200)}`,
      headers
    );
  }

  let body: unknown;
  try {
    body = JSON.parse(text);
  } catch (error) {
    throw new GitHubError(GitHubErrorKind.InvalidJson, 'GraphQL response was not valid JSON', {
      statusCode: status,
      headers,
      cause: error,
    });
  }

  if (!isRecord(body)) {
    throw new GitHubError(GitHubErrorKind.InvalidJson, 'GraphQL response was not a JSON object', {
      statusCode: status,
      headers,
    });
  }

  const result: GraphQLResponse<T> = {
    // The shape of `data` is the caller's query contract.
    data: body.data as T | null | undefined,
    errors: Array.isArray(body.errors) ? body.errors.map(toErrorEntry) : undefined,
    extensions: isRecord(body.extensions) ? body.extensions : undefined,
  };

  if (result.errors && result.errors.length > 0) {
    throw new GraphQLQueryError(result.errors, result.data, { status, headers });
  }

  return result.data as T;
}

function toErrorEntry(value: unknown): GraphQLErrorEntry {
  if (!isRecord(value)) {
    return { message: String(value) };
  }
  const entry: GraphQLErrorEntry = {
    message: typeof value.message === 'string' ? value.message : 'Unknown GraphQL error',
  };
  if (typeof value.type === 'string') {
    entry.type = value.type;
  }
  if (Array.isArray(value.path)) {
    entry.path = value.path.filter(
      (segment): segment is string | number => typeof segment === 'string' || typeof segment === 'number'
    );
  }
  if (isRecord(value.extensions)) {
    entry.extensions = value.extensions;
  }
  return entry;
}

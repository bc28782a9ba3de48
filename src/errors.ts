/**
 * Error types for the GitHub client.
 * @module errors
 */

import type { Headers } from 'undici';

/**
 * Error kinds for categorizing GitHub errors.
 */
export enum GitHubErrorKind {
  // Configuration errors
  /** Invalid base URL. */
  InvalidBaseUrl = 'invalid_base_url',
  /** Invalid configuration. */
  InvalidConfiguration = 'invalid_configuration',

  // Authentication errors
  /** The App private key could not be loaded or used for signing. */
  InvalidAppCredentials = 'invalid_app_credentials',
  /** The installation token exchange was rejected. */
  AppAuthenticationFailed = 'app_auth_failed',
  /** The App is not installed for the requested owner. */
  InstallationNotFound = 'installation_not_found',
  /** The token endpoint returned a body we could not read. */
  InvalidTokenResponse = 'invalid_token_response',

  // Client lifecycle
  /** The client was used after close(). */
  ClientClosed = 'client_closed',

  // Response errors
  /** Bad credentials (401). */
  BadCredentials = 'bad_credentials',
  /** Access forbidden (403). */
  Forbidden = 'forbidden',
  /** Resource not found (404). */
  NotFound = 'not_found',
  /** Rate limited (429). */
  RateLimited = 'rate_limited',
  /** Server side failure (5xx). */
  ServerError = 'server_error',
  /** Response body was not valid JSON. */
  InvalidJson = 'invalid_json',

  // GraphQL errors
  /** GraphQL query error. */
  QueryError = 'query_error',

  // Generic
  /** Unknown error. */
  Unknown = 'unknown',
}

/**
 * Base error for everything the client raises itself.
 */
export class GitHubError extends Error {
  /** Error kind. */
  public readonly kind: GitHubErrorKind;
  /** HTTP status code. */
  public readonly statusCode?: number;
  /** Headers of the response the error was read from. */
  public readonly headers?: Headers;

  constructor(
    kind: GitHubErrorKind,
    message: string,
    options?: {
      statusCode?: number;
      headers?: Headers;
      cause?: unknown;
    }
  ) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = 'GitHubError';
    this.kind = kind;
    this.statusCode = options?.statusCode;
    this.headers = options?.headers;

    // Maintains proper stack trace for where error was thrown (only available on V8)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }

  /**
   * Creates an error from an HTTP status code.
   */
  static fromResponse(status: number, message: string, headers?: Headers): GitHubError {
    return new GitHubError(GitHubError.kindFromStatus(status), message, {
      statusCode: status,
      headers,
    });
  }

  /**
   * Maps HTTP status code to error kind.
   */
  private static kindFromStatus(status: number): GitHubErrorKind {
    if (status >= 500) {
      return GitHubErrorKind.ServerError;
    }
    switch (status) {
      case 401:
        return GitHubErrorKind.BadCredentials;
      case 403:
        return GitHubErrorKind.Forbidden;
      case 404:
        return GitHubErrorKind.NotFound;
      case 429:
        return GitHubErrorKind.RateLimited;
      default:
        return GitHubErrorKind.Unknown;
    }
  }

  /**
   * Creates a configuration error.
   */
  static configuration(message: string): GitHubError {
    return new GitHubError(GitHubErrorKind.InvalidConfiguration, message);
  }

  /**
   * Creates the error raised when a closed client is used.
   */
  static closed(): GitHubError {
    return new GitHubError(GitHubErrorKind.ClientClosed, 'Client has been closed');
  }

  /**
   * Formats the error for display.
   */
  toString(): string {
    let result = `[${this.kind}] ${this.message}`;
    if (this.statusCode) {
      result += ` (HTTP ${this.statusCode})`;
    }
    return result;
  }
}

/**
 * Raised when an App JWT cannot be produced, almost always because the
 * private key is malformed. Never retried.
 */
export class SigningError extends GitHubError {
  constructor(message: string, cause?: unknown) {
    super(GitHubErrorKind.InvalidAppCredentials, message, { cause });
    this.name = 'SigningError';
  }
}

/**
 * Raised when acquiring an installation token fails.
 */
export class AuthError extends GitHubError {
  /** Raw response body returned by the token endpoint, if any. */
  public readonly body?: string;

  constructor(
    kind: GitHubErrorKind,
    message: string,
    options?: { statusCode?: number; body?: string; cause?: unknown }
  ) {
    super(kind, message, { statusCode: options?.statusCode, cause: options?.cause });
    this.name = 'AuthError';
    this.body = options?.body;
  }
}

/**
 * A single entry of a GraphQL `errors` array.
 */
export interface GraphQLErrorEntry {
  message: string;
  type?: string;
  path?: Array<string | number>;
  locations?: Array<{ line: number; column: number }>;
  extensions?: Record<string, unknown>;
}

/**
 * Raised by `execute` when the GraphQL response carries errors.
 */
export class GraphQLQueryError extends GitHubError {
  public readonly errors: GraphQLErrorEntry[];
  /** Partial data returned alongside the errors. */
  public readonly data?: unknown;

  /**
   * @param response - Status and headers of the HTTP response, kept so rate
   *   limits can be inspected after the body is consumed.
   */
  constructor(
    errors: GraphQLErrorEntry[],
    data?: unknown,
    response?: { status: number; headers: Headers }
  ) {
    const first = errors[0]?.message ?? 'GraphQL query failed';
    const suffix = errors.length > 1 ? ` (and ${errors.length - 1} more)` : '';
    super(GitHubErrorKind.QueryError, `${first}${suffix}`, {
      statusCode: response?.status,
      headers: response?.headers,
    });
    this.name = 'GraphQLQueryError';
    this.errors = errors;
    this.data = data;
  }
}

/**
 * Type guard for GitHubError.
 */
export function isGitHubError(error: unknown): error is GitHubError {
  return error instanceof GitHubError;
}

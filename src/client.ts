/**
 * GitHub API Client
 *
 * Sends REST and GraphQL requests through one shared connection pool,
 * attaching whatever credential the configured token source provides.
 * Responses are returned as-is; checking status is up to the caller.
 *
 * @module client
 */

import type { Response } from 'undici';
import type { FetchContext, TokenSource } from './auth.js';
import { withBearer } from './auth.js';
import { Authenticator } from './authenticator.js';
import { resolveConfig, type GitHubConfig } from './config.js';
import { GitHubError } from './errors.js';
import { decodeGraphQLResponse, type GraphQLRequest, type GraphQLVariables } from './graphql.js';
import type { Logger } from './logging.js';
import { UndiciTransport, type HttpMethod, type Transport } from './transport.js';

/**
 * Query parameters; `undefined` values are skipped.
 */
export type QueryParams = Record<string, string | number | boolean | undefined>;

/**
 * Per-call options.
 */
export interface CallOptions {
  /** Extra headers, applied over the defaults. */
  headers?: Record<string, string>;
  /** Cancels the call, including any wait for a credential. */
  signal?: AbortSignal;
}

/**
 * Per-call options for `execute`.
 */
export interface ExecuteOptions extends CallOptions {
  /** Operation to run when the document defines several. */
  operationName?: string;
}

/**
 * Options for `request`.
 */
export interface RestRequestInit extends CallOptions {
  query?: QueryParams;
  /** Serialized as JSON. */
  data?: unknown;
}

/**
 * Client for GitHub's REST and GraphQL APIs.
 *
 * @example
 * ```typescript
 * const client = new TokenClient('test-token');
 * try {
 *   const response = await client.get('/repos/octo-org/octo-repo');
 *   console.log(response.status, await response.json());
 * } finally {
 *   await client.close();
 * }
 * ```
 */
export class GitHubClient {
  readonly config: Readonly<GitHubConfig>;
  readonly authenticator: Authenticator;
  private readonly transport: Transport;
  private readonly logger: Logger;

  constructor(source: TokenSource, config: Partial<GitHubConfig> = {}, transport?: Transport) {
    this.config = resolveConfig(config);
    this.logger = this.config.logger.child({ component: 'client' });
    this.transport =
      transport ??
      new UndiciTransport({
        pool: this.config.pool,
        timeout: this.config.timeout,
        connectTimeout: this.config.connectTimeout,
        dispatcher: this.config.dispatcher,
      });

    const context: FetchContext = {
      transport: this.transport,
      baseUrl: this.config.baseUrl,
      headers: this.defaultHeaders(),
      logger: this.config.logger,
    };
    this.authenticator = new Authenticator(source, context, {
      refreshMargin: this.config.refreshMargin,
    });
  }

  get closed(): boolean {
    return this.transport.closed;
  }

  /**
   * Make a GET request
   */
  async get(path: string, params?: QueryParams, options?: CallOptions): Promise<Response> {
    return this.request('GET', path, { ...options, query: params });
  }

  /**
   * Make a POST request
   */
  async post(path: string, data?: unknown, options?: CallOptions): Promise<Response> {
    return this.request('POST', path, { ...options, data });
  }

  /**
   * Make a PUT request
   */
  async put(path: string, data?: unknown, options?: CallOptions): Promise<Response> {
    return this.request('PUT', path, { ...options, data });
  }

  /**
   * Make a PATCH request
   */
  async patch(path: string, data?: unknown, options?: CallOptions): Promise<Response> {
    return this.request('PATCH', path, { ...options, data });
  }

  /**
   * Make a DELETE request
   */
  async delete(path: string, data?: unknown, options?: CallOptions): Promise<Response> {
    return this.request('DELETE', path, { ...options, data });
  }

  /**
   * Make a request to the REST API.
   *
   * @param path - Path relative to the base URL, e.g. `/octocat`.
   */
  async request(method: HttpMethod, path: string, init: RestRequestInit = {}): Promise<Response> {
    this.ensureOpen();

    const headers = await this.authorizedHeaders(init);
    let body: string | undefined;
    if (init.data !== undefined) {
      body = JSON.stringify(init.data);
      headers['Content-Type'] = 'application/json';
    }

    return this.transport.send({
      method,
      url: this.buildUrl(path, init.query),
      headers,
      body,
      signal: init.signal,
    });
  }

  /**
   * Execute a query against the GraphQL endpoint.
   *
   * @returns The `data` member of the response.
   * @throws {GraphQLQueryError} If the response carries errors.
   */
  async execute<T = Record<string, unknown>>(
    query: string,
    variables?: GraphQLVariables,
    options?: ExecuteOptions
  ): Promise<T> {
    this.ensureOpen();

    const headers = await this.authorizedHeaders(options ?? {});
    headers['Content-Type'] = 'application/json';

    const request: GraphQLRequest = { query };
    if (variables) {
      request.variables = variables;
    }
    if (options?.operationName) {
      request.operationName = options.operationName;
    }

    const response = await this.transport.send({
      method: 'POST',
      url: this.config.graphqlUrl,
      headers,
      body: JSON.stringify(request),
      signal: options?.signal,
    });
    return decodeGraphQLResponse<T>(response);
  }

  /**
   * Releases the connection pool. Safe to call more than once.
   */
  async close(): Promise<void> {
    if (this.transport.closed) {
      return;
    }
    await this.transport.close();
    this.logger.debug('Client closed');
  }

  private ensureOpen(): void {
    if (this.transport.closed) {
      throw GitHubError.closed();
    }
  }

  private async authorizedHeaders(options: CallOptions): Promise<Record<string, string>> {
    const credential = await this.authenticator.getCredential(options.signal);
    return { ...withBearer(this.defaultHeaders(), credential), ...options.headers };
  }

  private defaultHeaders(): Record<string, string> {
    return {
      Accept: 'application/vnd.github+json',
      'X-GitHub-Api-Version': this.config.apiVersion,
      'User-Agent': this.config.userAgent,
    };
  }

  private buildUrl(path: string, query?: QueryParams): string {
    const url = new URL(`${this.config.baseUrl}/${path.replace(/^\/+/, '')}`);
    if (query) {
      for (const [key, value] of Object.entries(query)) {
        if (value !== undefined) {
          url.searchParams.append(key, String(value));
        }
      }
    }
    return url.toString();
  }
}

/**
 * Runs `fn` with `client` and closes the client afterwards, whether `fn`
 * resolves, throws or is aborted.
 */
export async function withClient<C extends GitHubClient, T>(
  client: C,
  fn: (client: C) => Promise<T>
): Promise<T> {
  try {
    return await fn(client);
  } finally {
    await client.close();
  }
}

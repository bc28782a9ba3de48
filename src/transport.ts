/**
 * HTTP transport shared by the REST, GraphQL and token-exchange paths.
 *
 * The client opens one undici `Agent` (a keep-alive connection pool per
 * origin) when it is constructed and closes it in `close()`.
 *
 * @module transport
 */

import { Agent, fetch, type Dispatcher, type Response } from 'undici';
import type { PoolConfig } from './config.js';
import { GitHubError } from './errors.js';

/**
 * HTTP method types
 */
export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';

/**
 * A fully resolved outgoing request.
 */
export interface TransportRequest {
  method: HttpMethod;
  url: string;
  headers: Record<string, string>;
  body?: string;
  signal?: AbortSignal;
}

/**
 * I/O strategy every token source and the client send requests through.
 */
export interface Transport {
  send(request: TransportRequest): Promise<Response>;
  close(): Promise<void>;
  readonly closed: boolean;
}

export interface UndiciTransportOptions {
  pool: PoolConfig;
  timeout: number;
  connectTimeout: number;
  /**
   * Externally owned dispatcher. When set no pool is created or closed, and
   * `pool`, `timeout` and `connectTimeout` are not applied.
   */
  dispatcher?: Dispatcher;
}

/**
 * Transport backed by undici's `fetch` and connection pool.
 */
export class UndiciTransport implements Transport {
  private readonly dispatcher: Dispatcher;
  private readonly ownsDispatcher: boolean;
  private isClosed = false;

  constructor(options: UndiciTransportOptions) {
    if (options.dispatcher) {
      this.dispatcher = options.dispatcher;
      this.ownsDispatcher = false;
    } else {
      this.dispatcher = new Agent({
        connections: options.pool.connections,
        keepAliveTimeout: options.pool.keepAliveTimeout,
        headersTimeout: options.timeout,
        bodyTimeout: options.timeout,
        connect: { timeout: options.connectTimeout },
      });
      this.ownsDispatcher = true;
    }
  }

  get closed(): boolean {
    return this.isClosed;
  }

  async send(request: TransportRequest): Promise<Response> {
    if (this.isClosed) {
      throw GitHubError.closed();
    }

    return fetch(request.url, {
      method: request.method,
      headers: request.headers,
      body: request.body,
      signal: request.signal,
      dispatcher: this.dispatcher,
    });
  }

  /**
   * Releases the connection pool. Safe to call more than once.
   */
  async close(): Promise<void> {
    if (this.isClosed) {
      return;
    }
    this.isClosed = true;
    if (this.ownsDispatcher) {
      await this.dispatcher.close();
    }
  }
}

/**
 * Shared test fixtures.
 */

import { generateKeyPairSync } from 'node:crypto';
import { Response } from 'undici';
import type { FetchContext } from '../auth.js';
import { GitHubError } from '../errors.js';
import { NoopLogger } from '../logging.js';
import type { Transport, TransportRequest } from '../transport.js';

export const API = 'https://api.github.com';

export const DEFAULT_HEADERS = {
  Accept: 'application/vnd.github+json',
  'X-GitHub-Api-Version': '2022-11-28',
  'User-Agent': 'simple-github/1.0.0',
};

const rsa = generateKeyPairSync('rsa', {
  modulusLength: 2048,
  privateKeyEncoding: { type: 'pkcs1', format: 'pem' },
  publicKeyEncoding: { type: 'spki', format: 'pem' },
});

/** PKCS#1 PEM, the format GitHub hands out for App keys. */
export const PRIVATE_KEY = rsa.privateKey;
export const PUBLIC_KEY = rsa.publicKey;

export type Handler = (request: TransportRequest) => Response | Promise<Response>;

/**
 * In-process transport that records requests and answers them from a queue.
 */
export class FakeTransport implements Transport {
  readonly requests: TransportRequest[] = [];
  closed = false;
  private readonly handlers: Handler[] = [];

  reply(handler: Handler): this {
    this.handlers.push(handler);
    return this;
  }

  replyJson(body: unknown, status = 200, headers: Record<string, string> = {}): this {
    return this.reply(() => json(body, status, headers));
  }

  async send(request: TransportRequest): Promise<Response> {
    if (this.closed) {
      throw GitHubError.closed();
    }
    this.requests.push(request);
    const handler = this.handlers.shift();
    if (!handler) {
      throw new Error(`Unexpected request: ${request.method} ${request.url}`);
    }
    return handler(request);
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}

export function json(body: unknown, status = 200, headers: Record<string, string> = {}): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'content-type': 'application/json', ...headers },
  });
}

export function fetchContext(transport: Transport): FetchContext {
  return {
    transport,
    baseUrl: API,
    headers: { ...DEFAULT_HEADERS },
    logger: new NoopLogger(),
  };
}

/**
 * A promise whose settlement the test controls.
 */
export function deferred<T>(): {
  promise: Promise<T>;
  resolve: (value: T) => void;
  reject: (error: unknown) => void;
} {
  let resolve: (value: T) => void = () => {};
  let reject: (error: unknown) => void = () => {};
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

/**
 * Credential caching and refresh.
 * @module authenticator
 */

import type { Credential, FetchContext, TokenSource } from './auth.js';
import { DEFAULT_REFRESH_MARGIN } from './config.js';
import type { Logger } from './logging.js';

export type CredentialState = 'absent' | 'valid' | 'expired';

export interface AuthenticatorOptions {
  /** Milliseconds before expiry at which a credential counts as expired. */
  refreshMargin?: number;
}

/**
 * Wraps a TokenSource and hands out a non-expired credential, fetching a new
 * one when the cached one is absent or within `refreshMargin` of expiry.
 *
 * At most one fetch runs at a time: callers arriving during a refresh await
 * the same pending promise. A failed fetch leaves the previous credential in
 * place and the next caller starts a new fetch.
 *
 * @example
 * ```typescript
 * const authenticator = new Authenticator(source, context);
 * const credential = await authenticator.getCredential();
 * ```
 */
export class Authenticator {
  private current?: Credential;
  private pending?: Promise<Credential>;
  private readonly refreshMargin: number;
  private readonly logger: Logger;

  constructor(
    readonly source: TokenSource,
    private readonly context: FetchContext,
    options: AuthenticatorOptions = {}
  ) {
    this.refreshMargin = options.refreshMargin ?? DEFAULT_REFRESH_MARGIN;
    this.logger = context.logger.child({ component: 'authenticator', source: source.kind });
  }

  /**
   * Returns a valid credential, refreshing it first if needed.
   *
   * @param signal - Aborts this caller's wait only. A refresh other callers
   *   depend on keeps running and its result is still cached.
   */
  async getCredential(signal?: AbortSignal): Promise<Credential> {
    signal?.throwIfAborted();

    const cached = this.current;
    if (cached && !this.isExpired(cached)) {
      return cached;
    }

    if (!this.pending) {
      this.pending = this.refresh().finally(() => {
        this.pending = undefined;
      });
    }

    return signal ? abortable(this.pending, signal) : this.pending;
  }

  /**
   * Current state of the cached credential.
   */
  state(): CredentialState {
    if (!this.current) {
      return 'absent';
    }
    return this.isExpired(this.current) ? 'expired' : 'valid';
  }

  /**
   * Drops the cached credential so the next call fetches a new one.
   */
  invalidate(): void {
    this.current = undefined;
  }

  private isExpired(credential: Credential): boolean {
    if (!credential.expiresAt) {
      return false;
    }
    return Date.now() >= credential.expiresAt.getTime() - this.refreshMargin;
  }

  private async refresh(): Promise<Credential> {
    const previous = this.state();
    this.logger.debug('Fetching credential', { previous });

    try {
      const credential = await this.source.fetch(this.context);
      this.current = credential;
      this.logger.debug('Credential refreshed', {
        expiresAt: credential.expiresAt?.toISOString(),
      });
      return credential;
    } catch (error) {
      this.logger.warn('Credential fetch failed', {
        previous,
        error: error instanceof Error ? error.message : String(error),
      });
      throw error;
    }
  }
}

/**
 * Settles with `promise` unless `signal` aborts first. The promise is always
 * observed, so a later rejection is never unhandled.
 */
function abortable<T>(promise: Promise<T>, signal: AbortSignal): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => reject(signal.reason);
    signal.addEventListener('abort', onAbort, { once: true });
    promise.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      }
    );
  });
}

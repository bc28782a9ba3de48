/**
 * Token sources: the ways this client can obtain a bearer credential.
 * @module auth
 */

import { z } from 'zod';
import { AuthError, GitHubErrorKind } from './errors.js';
import type { Logger } from './logging.js';
import { nextPageUrl } from './pagination.js';
import { SecretString } from './secret.js';
import { AppJwtSigner, type AppIdentity } from './signer.js';
import type { Transport } from './transport.js';

/** Lifetime assumed for an installation token whose response omits `expires_at`. */
export const INSTALLATION_TOKEN_LIFETIME = 60 * 60 * 1000;

/**
 * A bearer credential. No token means anonymous access; no expiry means it
 * never expires.
 */
export interface Credential {
  token?: SecretString;
  expiresAt?: Date;
}

/**
 * Everything a token source needs to talk to GitHub.
 */
export interface FetchContext {
  transport: Transport;
  /** REST base URL without trailing slash. */
  baseUrl: string;
  /** Headers every GitHub request carries (Accept, API version, User-Agent). */
  headers: Record<string, string>;
  logger: Logger;
}

export type TokenSourceKind = 'static' | 'app' | 'installation' | 'public';

/**
 * Produces a fresh credential on demand. Caching belongs to the Authenticator.
 */
export interface TokenSource {
  readonly kind: TokenSourceKind;
  fetch(context: FetchContext): Promise<Credential>;
}

/**
 * Fixed personal access token (or any other caller-managed token).
 */
export class StaticTokenSource implements TokenSource {
  readonly kind = 'static';
  private readonly token: SecretString;

  constructor(token: string) {
    this.token = new SecretString(token);
  }

  async fetch(): Promise<Credential> {
    return { token: this.token };
  }
}

/**
 * Unauthenticated access.
 */
export class PublicTokenSource implements TokenSource {
  readonly kind = 'public';

  async fetch(): Promise<Credential> {
    return {};
  }
}

/**
 * Authenticates as the App itself with a freshly signed JWT.
 */
export class AppTokenSource implements TokenSource {
  readonly kind = 'app';
  readonly signer: AppJwtSigner;

  constructor(identity: AppIdentity) {
    this.signer = new AppJwtSigner(identity);
  }

  async fetch(): Promise<Credential> {
    const jwt = await this.signer.sign();
    return { token: new SecretString(jwt.token), expiresAt: jwt.expiresAt };
  }
}

/**
 * Installation access token response.
 */
export interface InstallationToken {
  token: SecretString;
  expiresAt: Date;
  permissions?: Record<string, string>;
  repositorySelection?: string;
}

const installationsSchema = z.array(
  z.object({
    id: z.number().int(),
    account: z.object({ login: z.string() }).nullable().optional(),
  })
);

const accessTokenSchema = z.object({
  token: z.string().min(1),
  expires_at: z.string().optional(),
  permissions: z.record(z.string()).optional(),
  repository_selection: z.string().optional(),
});

export interface InstallationTokenSourceOptions {
  /** Org or user the App is installed on. */
  owner: string;
  /** Repositories under `owner` to restrict the token to. */
  repositories?: string[];
  /** Skips the installation lookup when already known. */
  installationId?: number;
}

/**
 * Exchanges an App JWT for an installation access token scoped to an owner
 * and, optionally, a set of repositories.
 */
export class InstallationTokenSource implements TokenSource {
  readonly kind = 'installation';
  readonly owner: string;
  readonly repositories?: string[];
  private installationId?: number;

  constructor(
    private readonly app: AppTokenSource,
    options: InstallationTokenSourceOptions
  ) {
    this.owner = options.owner;
    this.repositories =
      options.repositories && options.repositories.length > 0 ? [...options.repositories] : undefined;
    this.installationId = options.installationId;
  }

  async fetch(context: FetchContext): Promise<Credential> {
    const result = await this.createToken(context);
    return { token: result.token, expiresAt: result.expiresAt };
  }

  /**
   * Requests a new installation token.
   * @throws {AuthError} If the App is not installed for `owner` or GitHub rejects the exchange.
   */
  async createToken(context: FetchContext): Promise<InstallationToken> {
    const jwt = await this.app.fetch();
    const installationId = await this.resolveInstallationId(context, jwt);

    const body = this.repositories ? { repositories: this.repositories } : {};
    const response = await context.transport.send({
      method: 'POST',
      url: `${context.baseUrl}/app/installations/${installationId}/access_tokens`,
      headers: { ...withBearer(context.headers, jwt), 'Content-Type': 'application/json' },
      body: JSON.stringify(body),
    });
    const text = await response.text();

    if (!response.ok) {
      throw new AuthError(
        GitHubErrorKind.AppAuthenticationFailed,
        `Installation token exchange for '${this.owner}' failed with HTTP ${response.status}`,
        { statusCode: response.status, body: text }
      );
    }

    const parsed = accessTokenSchema.safeParse(parseJson(text));
    if (!parsed.success) {
      throw new AuthError(
        GitHubErrorKind.InvalidTokenResponse,
        'Installation token response did not contain a token',
        { statusCode: response.status, body: text, cause: parsed.error }
      );
    }

    const issuedAt = Date.now();
    const expiresAt = parsed.data.expires_at ? Date.parse(parsed.data.expires_at) : NaN;

    context.logger.debug('Created installation token', {
      owner: this.owner,
      installationId,
      expiresAt: parsed.data.expires_at,
    });

    return {
      token: new SecretString(parsed.data.token),
      expiresAt: new Date(Number.isNaN(expiresAt) ? issuedAt + INSTALLATION_TOKEN_LIFETIME : expiresAt),
      permissions: parsed.data.permissions,
      repositorySelection: parsed.data.repository_selection,
    };
  }

  /**
   * Finds the installation whose account login matches `owner`, walking
   * every page of `/app/installations`. The id is remembered afterwards.
   */
  private async resolveInstallationId(context: FetchContext, jwt: Credential): Promise<number> {
    if (this.installationId !== undefined) {
      return this.installationId;
    }

    let url: string | undefined = `${context.baseUrl}/app/installations?per_page=100`;
    while (url) {
      const response = await context.transport.send({
        method: 'GET',
        url,
        headers: withBearer(context.headers, jwt),
      });
      const text = await response.text();

      if (!response.ok) {
        throw new AuthError(
          GitHubErrorKind.AppAuthenticationFailed,
          `Listing installations failed with HTTP ${response.status}`,
          { statusCode: response.status, body: text }
        );
      }

      const parsed = installationsSchema.safeParse(parseJson(text));
      if (!parsed.success) {
        throw new AuthError(
          GitHubErrorKind.InvalidTokenResponse,
          'Unexpected response when listing installations',
          { statusCode: response.status, body: text, cause: parsed.error }
        );
      }

      const match = parsed.data.find((installation) => installation.account?.login === this.owner);
      if (match) {
        this.installationId = match.id;
        context.logger.debug('Resolved installation', { owner: this.owner, installationId: match.id });
        return match.id;
      }

      url = nextPageUrl(response.headers);
    }

    throw new AuthError(
      GitHubErrorKind.InstallationNotFound,
      `GitHub App '${this.app.signer.appId}' is not installed with owner '${this.owner}'`
    );
  }
}

/**
 * Returns `headers` plus an Authorization header when the credential has a token.
 */
export function withBearer(
  headers: Record<string, string>,
  credential: Credential
): Record<string, string> {
  if (!credential.token) {
    return { ...headers };
  }
  return { ...headers, Authorization: `Bearer ${credential.token.expose()}` };
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

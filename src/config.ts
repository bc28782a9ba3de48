/**
 * Configuration types for the GitHub client.
 * @module config
 */

import type { Dispatcher } from 'undici';
import { z } from 'zod';
import { GitHubError, GitHubErrorKind } from './errors.js';
import { ConsoleLogger, NoopLogger, parseLogLevel, type Logger } from './logging.js';

/** Default GitHub REST API base URL. */
export const DEFAULT_BASE_URL = 'https://api.github.com';

/** Default GitHub GraphQL endpoint. */
export const DEFAULT_GRAPHQL_URL = 'https://api.github.com/graphql';

/** Default GitHub API version (date-based). */
export const DEFAULT_API_VERSION = '2022-11-28';

/** Default request timeout in milliseconds. */
export const DEFAULT_TIMEOUT = 30000;

/** Default connect timeout in milliseconds. */
export const DEFAULT_CONNECT_TIMEOUT = 10000;

/** Default User-Agent header. */
export const DEFAULT_USER_AGENT = 'simple-github/1.0.0';

/**
 * How long before its literal expiry a credential is treated as expired,
 * in milliseconds.
 */
export const DEFAULT_REFRESH_MARGIN = 60 * 1000;

/**
 * Connection pool configuration.
 */
export interface PoolConfig {
  /** Maximum sockets per origin. */
  connections: number;
  /** Idle keep-alive timeout in milliseconds. */
  keepAliveTimeout: number;
}

export const DEFAULT_POOL_CONFIG: PoolConfig = {
  connections: 10,
  keepAliveTimeout: 60000,
};

/**
 * GitHub client configuration.
 */
export interface GitHubConfig {
  /** REST API base URL. */
  baseUrl: string;
  /** GraphQL endpoint. */
  graphqlUrl: string;
  /** Value of the `X-GitHub-Api-Version` header. */
  apiVersion: string;
  /** User-Agent header. */
  userAgent: string;
  /**
   * Headers and body timeout in milliseconds. Applies to the client-owned
   * pool only; an injected `dispatcher` keeps its own timeouts.
   */
  timeout: number;
  /** Connect timeout in milliseconds. Ignored with an injected `dispatcher`. */
  connectTimeout: number;
  /** Credential refresh margin in milliseconds. */
  refreshMargin: number;
  /** Connection pool configuration. Ignored with an injected `dispatcher`. */
  pool: PoolConfig;
  /** Logger for authentication and lifecycle events. */
  logger: Logger;
  /**
   * Dispatcher to send requests through instead of a client-owned pool,
   * e.g. a `ProxyAgent`. The client never closes a dispatcher it did not create,
   * and `timeout`, `connectTimeout` and `pool` are left to the dispatcher.
   */
  dispatcher?: Dispatcher;
}

const httpUrl = z
  .string()
  .url()
  .refine((value) => value.startsWith('http://') || value.startsWith('https://'), {
    message: 'must start with http:// or https://',
  });

const configSchema = z.object({
  baseUrl: httpUrl,
  graphqlUrl: httpUrl,
  apiVersion: z.string().trim().min(1),
  userAgent: z.string().trim().min(1, 'User-Agent is required by GitHub API'),
  timeout: z.number().int().positive(),
  connectTimeout: z.number().int().positive(),
  refreshMargin: z.number().int().nonnegative(),
  pool: z.object({
    connections: z.number().int().positive(),
    keepAliveTimeout: z.number().int().positive(),
  }),
});

/**
 * Derives the GraphQL endpoint that belongs to a REST base URL.
 * GitHub Enterprise serves REST under `/api/v3` and GraphQL under `/api/graphql`.
 */
export function graphqlUrlFor(baseUrl: string): string {
  const trimmed = baseUrl.replace(/\/+$/, '');
  if (trimmed.endsWith('/api/v3')) {
    return `${trimmed.slice(0, -'/v3'.length)}/graphql`;
  }
  return `${trimmed}/graphql`;
}

/**
 * Creates a default GitHub configuration.
 */
export function createDefaultConfig(): GitHubConfig {
  return {
    baseUrl: DEFAULT_BASE_URL,
    graphqlUrl: DEFAULT_GRAPHQL_URL,
    apiVersion: DEFAULT_API_VERSION,
    userAgent: DEFAULT_USER_AGENT,
    timeout: DEFAULT_TIMEOUT,
    connectTimeout: DEFAULT_CONNECT_TIMEOUT,
    refreshMargin: DEFAULT_REFRESH_MARGIN,
    pool: { ...DEFAULT_POOL_CONFIG },
    logger: new NoopLogger(),
  };
}

/**
 * Validates a GitHub configuration.
 * @throws {GitHubError} If the configuration is invalid.
 */
export function validateConfig(config: GitHubConfig): void {
  const result = configSchema.safeParse(config);
  if (result.success) {
    return;
  }

  const issue = result.error.issues[0];
  const field = issue?.path.join('.') ?? 'config';
  const kind =
    field === 'baseUrl' || field === 'graphqlUrl'
      ? GitHubErrorKind.InvalidBaseUrl
      : GitHubErrorKind.InvalidConfiguration;
  throw new GitHubError(kind, `Invalid ${field}: ${issue?.message ?? 'invalid value'}`);
}

/**
 * Merges partial settings over the defaults and validates the result.
 * When only `baseUrl` is given, the GraphQL endpoint is derived from it.
 */
export function resolveConfig(overrides: Partial<GitHubConfig> = {}): GitHubConfig {
  const defaults = createDefaultConfig();
  const baseUrl = (overrides.baseUrl ?? defaults.baseUrl).replace(/\/+$/, '');
  const config: GitHubConfig = {
    baseUrl,
    graphqlUrl:
      overrides.graphqlUrl ??
      (overrides.baseUrl !== undefined ? graphqlUrlFor(baseUrl) : defaults.graphqlUrl),
    apiVersion: overrides.apiVersion ?? defaults.apiVersion,
    userAgent: overrides.userAgent ?? defaults.userAgent,
    timeout: overrides.timeout ?? defaults.timeout,
    connectTimeout: overrides.connectTimeout ?? defaults.connectTimeout,
    refreshMargin: overrides.refreshMargin ?? defaults.refreshMargin,
    pool: overrides.pool ?? defaults.pool,
    logger: overrides.logger ?? defaults.logger,
    dispatcher: overrides.dispatcher,
  };
  validateConfig(config);
  return config;
}

const envNumber = z.coerce.number().int().positive();

function readEnvNumber(env: NodeJS.ProcessEnv, name: string): number | undefined {
  const raw = env[name];
  if (raw === undefined || raw === '') {
    return undefined;
  }
  const parsed = envNumber.safeParse(raw);
  if (!parsed.success) {
    throw GitHubError.configuration(`${name} must be a positive integer, got "${raw}"`);
  }
  return parsed.data;
}

/**
 * Reads configuration overrides from environment variables.
 *
 * - `GITHUB_API_URL`, `GITHUB_GRAPHQL_URL`, `GITHUB_API_VERSION`
 * - `GITHUB_TIMEOUT` (ms)
 * - `GITHUB_LOG_LEVEL` enables a console logger at that level
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): Partial<GitHubConfig> {
  const overrides: Partial<GitHubConfig> = {};

  if (env.GITHUB_API_URL) {
    overrides.baseUrl = env.GITHUB_API_URL;
  }
  if (env.GITHUB_GRAPHQL_URL) {
    overrides.graphqlUrl = env.GITHUB_GRAPHQL_URL;
  }
  if (env.GITHUB_API_VERSION) {
    overrides.apiVersion = env.GITHUB_API_VERSION;
  }

  const timeout = readEnvNumber(env, 'GITHUB_TIMEOUT');
  if (timeout !== undefined) {
    overrides.timeout = timeout;
  }

  const level = parseLogLevel(env.GITHUB_LOG_LEVEL);
  if (level) {
    overrides.logger = new ConsoleLogger({ level });
  }

  return overrides;
}

/**
 * Builder for GitHubConfig.
 */
export class GitHubConfigBuilder {
  private overrides: Partial<GitHubConfig> = {};

  baseUrl(url: string): this {
    this.overrides.baseUrl = url;
    return this;
  }

  graphqlUrl(url: string): this {
    this.overrides.graphqlUrl = url;
    return this;
  }

  apiVersion(version: string): this {
    this.overrides.apiVersion = version;
    return this;
  }

  userAgent(userAgent: string): this {
    this.overrides.userAgent = userAgent;
    return this;
  }

  /**
   * @param timeout - Headers and body timeout in milliseconds.
   */
  timeout(timeout: number): this {
    this.overrides.timeout = timeout;
    return this;
  }

  connectTimeout(timeout: number): this {
    this.overrides.connectTimeout = timeout;
    return this;
  }

  /**
   * @param margin - Milliseconds before expiry at which a credential is refreshed.
   */
  refreshMargin(margin: number): this {
    this.overrides.refreshMargin = margin;
    return this;
  }

  pool(config: PoolConfig): this {
    this.overrides.pool = config;
    return this;
  }

  logger(logger: Logger): this {
    this.overrides.logger = logger;
    return this;
  }

  dispatcher(dispatcher: Dispatcher): this {
    this.overrides.dispatcher = dispatcher;
    return this;
  }

  /**
   * Builds and validates the configuration.
   * @throws {GitHubError} If the configuration is invalid.
   */
  build(): GitHubConfig {
    return resolveConfig(this.overrides);
  }
}

/**
 * Namespace for GitHubConfig-related utilities.
 */
export namespace GitHubConfig {
  export function builder(): GitHubConfigBuilder {
    return new GitHubConfigBuilder();
  }

  export function defaultConfig(): GitHubConfig {
    return createDefaultConfig();
  }

  export function fromEnv(env: NodeJS.ProcessEnv = process.env): GitHubConfig {
    return resolveConfig(configFromEnv(env));
  }
}

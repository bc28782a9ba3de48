/**
 * Ready-made clients for each way of authenticating.
 * @module clients
 */

import {
  AppTokenSource,
  InstallationTokenSource,
  PublicTokenSource,
  StaticTokenSource,
  type TokenSource,
} from './auth.js';
import { GitHubClient } from './client.js';
import { configFromEnv, type GitHubConfig } from './config.js';
import { GitHubError } from './errors.js';
import { SecretString } from './secret.js';
import type { Transport } from './transport.js';

/**
 * Client authenticated with an access token.
 */
export class TokenClient extends GitHubClient {
  constructor(token: string, config?: Partial<GitHubConfig>, transport?: Transport) {
    super(new StaticTokenSource(token), config, transport);
  }
}

/**
 * Client making unauthenticated requests.
 */
export class PublicClient extends GitHubClient {
  constructor(config?: Partial<GitHubConfig>, transport?: Transport) {
    super(new PublicTokenSource(), config, transport);
  }
}

export interface AppClientOptions {
  /** The id of the GitHub App. */
  appId: number;
  /** A PEM encoded private key configured for the App. */
  privateKey: string;
  /**
   * The org or user where the App is installed. Without it the client is
   * authenticated as the App itself rather than as an installation.
   */
  owner?: string;
  /**
   * Repositories to limit the installation token to. Defaults to every
   * repository the installation can access.
   */
  repositories?: string[] | string;
  /** Installation id, when already known, to skip looking it up. */
  installationId?: number;
}

function appTokenSource(options: AppClientOptions): TokenSource {
  if (!Number.isInteger(options.appId) || options.appId <= 0) {
    throw GitHubError.configuration(`App id must be a positive integer, got ${options.appId}`);
  }
  if (
    options.installationId !== undefined &&
    (!Number.isInteger(options.installationId) || options.installationId <= 0)
  ) {
    throw GitHubError.configuration(
      `Installation id must be a positive integer, got ${options.installationId}`
    );
  }

  const app = new AppTokenSource({
    appId: options.appId,
    privateKey: new SecretString(options.privateKey),
  });
  if (!options.owner) {
    return app;
  }

  const repositories =
    typeof options.repositories === 'string' ? [options.repositories] : options.repositories;
  return new InstallationTokenSource(app, {
    owner: options.owner,
    repositories,
    installationId: options.installationId,
  });
}

/**
 * Client authenticated as a GitHub App, or as one of its installations when
 * `owner` is given.
 */
export class AppClient extends GitHubClient {
  constructor(options: AppClientOptions, config?: Partial<GitHubConfig>, transport?: Transport) {
    super(appTokenSource(options), config, transport);
  }
}

/**
 * Builds a client from environment variables, in order of preference:
 *
 * 1. `GITHUB_APP_ID` + `GITHUB_APP_PRIVATE_KEY` (with optional
 *    `GITHUB_APP_OWNER`, `GITHUB_APP_INSTALLATION_ID` and comma-separated
 *    `GITHUB_APP_REPOSITORIES`) give an {@link AppClient}
 * 2. `GITHUB_TOKEN` or `GH_TOKEN` give a {@link TokenClient}
 * 3. otherwise a {@link PublicClient}
 *
 * Connection settings come from {@link configFromEnv}.
 */
export function clientFromEnv(env: NodeJS.ProcessEnv = process.env): GitHubClient {
  const config = configFromEnv(env);

  const appId = env.GITHUB_APP_ID;
  const privateKey = env.GITHUB_APP_PRIVATE_KEY;
  if (appId && privateKey) {
    const installationId = env.GITHUB_APP_INSTALLATION_ID;
    return new AppClient(
      {
        appId: Number(appId),
        privateKey: privateKey.replace(/\\n/g, '\n'),
        owner: env.GITHUB_APP_OWNER || undefined,
        repositories: env.GITHUB_APP_REPOSITORIES?.split(',')
          .map((repository) => repository.trim())
          .filter((repository) => repository.length > 0),
        installationId: installationId ? Number(installationId) : undefined,
      },
      config
    );
  }

  const token = env.GITHUB_TOKEN || env.GH_TOKEN;
  if (token) {
    return new TokenClient(token, config);
  }

  return new PublicClient(config);
}

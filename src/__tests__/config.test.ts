/**
 * Tests for configuration
 */

import { Agent } from 'undici';
import { describe, it, expect } from 'vitest';
import {
  DEFAULT_BASE_URL,
  DEFAULT_GRAPHQL_URL,
  DEFAULT_REFRESH_MARGIN,
  GitHubConfig,
  configFromEnv,
  createDefaultConfig,
  graphqlUrlFor,
  resolveConfig,
  validateConfig,
} from '../config.js';
import { GitHubError, GitHubErrorKind } from '../errors.js';
import { ConsoleLogger, NoopLogger } from '../logging.js';

describe('GitHubConfig', () => {
  it('should create default config', () => {
    const config = createDefaultConfig();

    expect(config.baseUrl).toBe(DEFAULT_BASE_URL);
    expect(config.graphqlUrl).toBe(DEFAULT_GRAPHQL_URL);
    expect(config.apiVersion).toBe('2022-11-28');
    expect(config.refreshMargin).toBe(DEFAULT_REFRESH_MARGIN);
    expect(config.pool).toEqual({ connections: 10, keepAliveTimeout: 60000 });
    expect(config.logger).toBeInstanceOf(NoopLogger);
  });

  it('should build config with builder', () => {
    const config = GitHubConfig.builder()
      .baseUrl('https://github.example.com/api/v3')
      .timeout(5000)
      .refreshMargin(0)
      .userAgent('test-agent')
      .build();

    expect(config.baseUrl).toBe('https://github.example.com/api/v3');
    expect(config.graphqlUrl).toBe('https://github.example.com/api/graphql');
    expect(config.timeout).toBe(5000);
    expect(config.refreshMargin).toBe(0);
    expect(config.userAgent).toBe('test-agent');
  });

  it('should keep an explicit GraphQL URL', () => {
    const config = GitHubConfig.builder()
      .baseUrl('https://ghe.example.com/api/v3')
      .graphqlUrl('https://graphql.example.com/')
      .build();

    expect(config.graphqlUrl).toBe('https://graphql.example.com/');
  });

  it('should carry an injected dispatcher', async () => {
    const agent = new Agent();
    const config = GitHubConfig.builder().dispatcher(agent).build();

    expect(config.dispatcher).toBe(agent);
    await agent.close();
  });

  it('should strip trailing slashes from the base URL', () => {
    expect(resolveConfig({ baseUrl: 'https://api.github.com///' }).baseUrl).toBe(
      'https://api.github.com'
    );
  });

  it('should ignore undefined overrides', () => {
    expect(resolveConfig({ timeout: undefined }).timeout).toBe(30000);
  });

  it('should reject a non-HTTP base URL', () => {
    const error = (() => {
      try {
        resolveConfig({ baseUrl: 'ftp://example.com' });
      } catch (e) {
        return e;
      }
      return undefined;
    })();

    expect(error).toBeInstanceOf(GitHubError);
    expect(error).toMatchObject({
      kind: GitHubErrorKind.InvalidBaseUrl,
      message: 'Invalid baseUrl: must start with http:// or https://',
    });
  });

  it('should reject a non-positive timeout', () => {
    expect(() => resolveConfig({ timeout: 0 })).toThrow(/^Invalid timeout: /);
  });

  it('should reject an empty user agent', () => {
    const config = { ...createDefaultConfig(), userAgent: '  ' };

    expect(() => validateConfig(config)).toThrow('Invalid userAgent: User-Agent is required by GitHub API');
  });
});

describe('graphqlUrlFor', () => {
  it('maps GitHub Enterprise REST URLs to their GraphQL endpoint', () => {
    expect(graphqlUrlFor('https://ghe.example.com/api/v3/')).toBe('https://ghe.example.com/api/graphql');
  });

  it('appends /graphql otherwise', () => {
    expect(graphqlUrlFor('https://api.github.com')).toBe('https://api.github.com/graphql');
  });
});

describe('configFromEnv', () => {
  it('returns no overrides for an empty environment', () => {
    expect(configFromEnv({})).toEqual({});
  });

  it('reads URLs, version and timeout', () => {
    expect(
      configFromEnv({
        GITHUB_API_URL: 'https://ghe.example.com/api/v3',
        GITHUB_GRAPHQL_URL: 'https://ghe.example.com/api/graphql',
        GITHUB_API_VERSION: '2024-01-01',
        GITHUB_TIMEOUT: '1500',
      })
    ).toEqual({
      baseUrl: 'https://ghe.example.com/api/v3',
      graphqlUrl: 'https://ghe.example.com/api/graphql',
      apiVersion: '2024-01-01',
      timeout: 1500,
    });
  });

  it('rejects a timeout that is not a positive integer', () => {
    expect(() => configFromEnv({ GITHUB_TIMEOUT: 'soon' })).toThrow(
      'GITHUB_TIMEOUT must be a positive integer, got "soon"'
    );
  });

  it('creates a console logger for a known log level', () => {
    expect(configFromEnv({ GITHUB_LOG_LEVEL: 'DEBUG' }).logger).toBeInstanceOf(ConsoleLogger);
    expect(configFromEnv({ GITHUB_LOG_LEVEL: 'verbose' }).logger).toBeUndefined();
  });

  it('resolves through GitHubConfig.fromEnv', () => {
    const config = GitHubConfig.fromEnv({ GITHUB_API_URL: 'https://ghe.example.com/api/v3' });

    expect(config.graphqlUrl).toBe('https://ghe.example.com/api/graphql');
  });
});

import { Headers, Response } from 'undici';
import { describe, it, expect } from 'vitest';
import { GitHubError, GraphQLQueryError } from '../errors.js';
import { getWaitTime, isRateLimited } from '../rate-limit.js';
import { json } from './helpers.js';

describe('isRateLimited', () => {
  it('detects an exhausted primary limit', async () => {
    const response = json({ message: 'API rate limit exceeded for installation' }, 403, {
      'x-ratelimit-remaining': '0',
    });

    expect(await isRateLimited(response)).toBe(true);
  });

  it('detects a secondary limit with retry-after', async () => {
    const response = json({ message: 'You have exceeded a secondary rate limit' }, 403, {
      'retry-after': '30',
    });

    expect(await isRateLimited(response)).toBe(true);
  });

  it('detects a rate limit from the message alone', async () => {
    const response = json({ message: 'API rate limit exceeded for 203.0.113.1.' }, 403);

    expect(await isRateLimited(response)).toBe(true);
  });

  it('detects 429 Too Many Requests', async () => {
    expect(await isRateLimited(json({ message: 'Too Many Requests' }, 429))).toBe(true);
  });

  it('ignores a permission 403', async () => {
    const response = json({ message: 'Resource not accessible by integration' }, 403, {
      'x-ratelimit-remaining': '4999',
    });

    expect(await isRateLimited(response)).toBe(false);
  });

  it('ignores successful responses', async () => {
    expect(await isRateLimited(json({ message: 'rate limit exceeded' }, 200))).toBe(false);
  });

  it('ignores a body that is not JSON', async () => {
    expect(await isRateLimited(new Response('<html>Forbidden</html>', { status: 403 }))).toBe(false);
  });

  it('detects GraphQL rate limit errors', async () => {
    const response = json(
      { errors: [{ type: 'RATE_LIMITED', message: 'API rate limit exceeded for user ID 1.' }] },
      200,
      { 'x-ratelimit-resource': 'graphql' }
    );

    expect(await isRateLimited(response)).toBe(true);
  });

  it('detects GraphQL rate limits reported in extensions', async () => {
    const response = json(
      { errors: [{ message: 'Slow down', extensions: { code: 'RATE_LIMITED' } }] },
      403,
      { 'x-ratelimit-resource': 'graphql' }
    );

    expect(await isRateLimited(response)).toBe(true);
  });

  it('ignores other GraphQL errors', async () => {
    const response = json({ errors: [{ type: 'NOT_FOUND', message: 'Could not resolve' }] }, 200, {
      'x-ratelimit-resource': 'graphql',
    });

    expect(await isRateLimited(response)).toBe(false);
  });

  it('checks only status and headers once the body has been read', async () => {
    const limited = json({ message: 'API rate limit exceeded for installation' }, 403, {
      'x-ratelimit-remaining': '0',
    });
    const unknown = json({ message: 'API rate limit exceeded for installation' }, 403);

    await limited.json();
    await unknown.json();

    expect(await isRateLimited(limited)).toBe(true);
    expect(await isRateLimited(unknown)).toBe(false);
  });

  it('leaves the body readable', async () => {
    const response = json({ message: 'API rate limit exceeded' }, 403);

    await isRateLimited(response);

    expect(await response.json()).toEqual({ message: 'API rate limit exceeded' });
  });
});

describe('isRateLimited with errors', () => {
  it('detects a rate limited GraphQL query error', async () => {
    const error = new GraphQLQueryError([{ message: 'API rate limit exceeded', type: 'RATE_LIMITED' }]);

    expect(await isRateLimited(error)).toBe(true);
  });

  it('ignores other GraphQL query errors', async () => {
    const error = new GraphQLQueryError([{ message: 'Could not resolve', type: 'NOT_FOUND' }]);

    expect(await isRateLimited(error)).toBe(false);
  });

  it('detects an HTTP 429 error', async () => {
    expect(await isRateLimited(GitHubError.fromResponse(429, 'Too Many Requests'))).toBe(true);
  });

  it('detects a 403 error from its headers', async () => {
    const limited = GitHubError.fromResponse(
      403,
      'Forbidden',
      new Headers({ 'x-ratelimit-remaining': '0' })
    );
    const forbidden = GitHubError.fromResponse(
      403,
      'Forbidden',
      new Headers({ 'x-ratelimit-remaining': '10' })
    );

    expect(await isRateLimited(limited)).toBe(true);
    expect(await isRateLimited(forbidden)).toBe(false);
  });
});

describe('getWaitTime', () => {
  const NOW = 1_767_225_600_000;

  it('waits until the reset time when the limit is exhausted', () => {
    const headers = new Headers({
      'x-ratelimit-remaining': '0',
      'x-ratelimit-reset': String(NOW / 1000 + 42),
    });

    expect(getWaitTime({ headers }, 1, NOW)).toBe(42);
  });

  it('never returns a negative wait', () => {
    const headers = new Headers({
      'x-ratelimit-remaining': '0',
      'x-ratelimit-reset': String(NOW / 1000 - 5),
    });

    expect(getWaitTime({ headers }, 1, NOW)).toBe(0);
  });

  it('uses retry-after', () => {
    expect(getWaitTime({ headers: new Headers({ 'retry-after': '17' }) }, 3, NOW)).toBe(17);
  });

  it('backs off by attempt without hints', () => {
    const headers = new Headers();

    expect(getWaitTime({ headers }, 1, NOW)).toBe(60);
    expect(getWaitTime({ headers }, 2, NOW)).toBe(80);
    expect(getWaitTime({ headers }, 4, NOW)).toBe(120);
    expect(getWaitTime({ headers }, 0, NOW)).toBe(60);
  });

  it('reads the headers kept on an error', () => {
    const error = GitHubError.fromResponse(403, 'Forbidden', new Headers({ 'retry-after': '9' }));

    expect(getWaitTime(error, 1, NOW)).toBe(9);
  });

  it('backs off by attempt for an error without headers', () => {
    expect(getWaitTime(new GraphQLQueryError([{ message: 'limited' }]), 2, NOW)).toBe(80);
  });
});

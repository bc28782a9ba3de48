/**
 * Tests for error types and secret handling
 */

import { describe, it, expect } from 'vitest';
import {
  AuthError,
  GitHubError,
  GitHubErrorKind,
  GraphQLQueryError,
  SigningError,
  isGitHubError,
} from '../errors.js';
import { SecretString } from '../secret.js';

describe('GitHubError', () => {
  it.each([
    [401, GitHubErrorKind.BadCredentials],
    [403, GitHubErrorKind.Forbidden],
    [404, GitHubErrorKind.NotFound],
    [429, GitHubErrorKind.RateLimited],
    [502, GitHubErrorKind.ServerError],
    [418, GitHubErrorKind.Unknown],
  ])('should map status %i to %s', (status, kind) => {
    const error = GitHubError.fromResponse(status, 'failed');

    expect(error.kind).toBe(kind);
    expect(error.statusCode).toBe(status);
  });

  it('should format with kind and status', () => {
    expect(GitHubError.fromResponse(404, 'Not Found').toString()).toBe('[not_found] Not Found (HTTP 404)');
    expect(GitHubError.closed().toString()).toBe('[client_closed] Client has been closed');
  });

  it('should keep the cause', () => {
    const cause = new Error('root');
    const error = new SigningError('Failed to sign', cause);

    expect(error.cause).toBe(cause);
    expect(error.kind).toBe(GitHubErrorKind.InvalidAppCredentials);
    expect(error.name).toBe('SigningError');
  });

  it('should carry the response body on AuthError', () => {
    const error = new AuthError(GitHubErrorKind.AppAuthenticationFailed, 'rejected', {
      statusCode: 401,
      body: '{"message":"Bad credentials"}',
    });

    expect(isGitHubError(error)).toBe(true);
    expect(error.body).toBe('{"message":"Bad credentials"}');
    expect(error.statusCode).toBe(401);
  });

  it('should not treat plain errors as GitHubError', () => {
    expect(isGitHubError(new Error('plain'))).toBe(false);
  });
});

describe('GraphQLQueryError', () => {
  it('should summarize multiple errors', () => {
    const error = new GraphQLQueryError([{ message: 'first' }, { message: 'second' }, { message: 'third' }], {
      viewer: null,
    });

    expect(error.message).toBe('first (and 2 more)');
    expect(error.data).toEqual({ viewer: null });
  });
});

describe('SecretString', () => {
  it('should hide the value from string and JSON conversion', () => {
    const secret = new SecretString('test-secret');

    expect(String(secret)).toBe('***');
    expect(JSON.stringify({ token: secret })).toBe('{"token":"***"}');
    expect(secret.expose()).toBe('test-secret');
  });
});

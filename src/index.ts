/**
 * A small GitHub client that only provides auth and access to the REST and
 * GraphQL APIs:
 * - Personal token, GitHub App, App installation or anonymous access
 * - Installation tokens refreshed before they expire, one refresh at a time
 * - One connection pool shared by REST and GraphQL calls
 *
 * @example
 * ```typescript
 * import { AppClient, withClient } from 'simple-github';
 *
 * const issues = await withClient(
 *   new AppClient({ appId: 123, privateKey, owner: 'octo-org' }),
 *   async (client) => {
 *     const response = await client.get('/repos/octo-org/octo-repo/issues', { state: 'open' });
 *     return response.json();
 *   }
 * );
 * ```
 *
 * @module simple-github
 */

export * from './errors.js';
export * from './logging.js';
export * from './config.js';
export * from './secret.js';
export * from './signer.js';
export * from './transport.js';
export * from './pagination.js';
export * from './auth.js';
export * from './authenticator.js';
export * from './graphql.js';
export * from './rate-limit.js';
export * from './client.js';
export * from './clients.js';

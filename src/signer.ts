/**
 * JSON Web Tokens for authenticating as a GitHub App.
 * @module signer
 */

import { createPrivateKey, type KeyObject } from 'node:crypto';
import * as jose from 'jose';
import { SigningError } from './errors.js';
import type { SecretString } from './secret.js';

/** Seconds the `iat` claim is backdated to tolerate clock drift. */
export const JWT_CLOCK_DRIFT = 60;

/** Seconds from now until the JWT expires. GitHub allows at most ten minutes. */
export const JWT_LIFETIME = 9 * 60;

/**
 * Identity of a GitHub App.
 */
export interface AppIdentity {
  /** GitHub App ID. */
  appId: number;
  /** Private key in PEM format (PKCS#1 or PKCS#8). */
  privateKey: SecretString;
}

/**
 * A signed App JWT and its validity window.
 */
export interface SignedJwt {
  token: string;
  issuedAt: Date;
  expiresAt: Date;
}

/**
 * Signs App JWTs with RS256. The PEM is parsed once, on first use.
 *
 * `iss` carries the app id in its decimal string form, as RFC 7519 types the
 * claim; GitHub accepts it either way and `Number(payload.iss)` recovers the id.
 */
export class AppJwtSigner {
  private key?: KeyObject;

  constructor(private readonly identity: AppIdentity) {}

  get appId(): number {
    return this.identity.appId;
  }

  /**
   * @param now - Signing time, defaults to the current time.
   * @throws {SigningError} If the key is malformed or signing fails.
   */
  async sign(now: Date = new Date()): Promise<SignedJwt> {
    const seconds = Math.floor(now.getTime() / 1000);
    const iat = seconds - JWT_CLOCK_DRIFT;
    const exp = seconds + JWT_LIFETIME;

    try {
      const token = await new jose.SignJWT({})
        .setProtectedHeader({ alg: 'RS256', typ: 'JWT' })
        .setIssuedAt(iat)
        .setExpirationTime(exp)
        .setIssuer(this.identity.appId.toString())
        .sign(this.loadKey());

      return {
        token,
        issuedAt: new Date(iat * 1000),
        expiresAt: new Date(exp * 1000),
      };
    } catch (error) {
      if (error instanceof SigningError) {
        throw error;
      }
      const reason = error instanceof Error ? error.message : String(error);
      throw new SigningError(`Failed to sign JWT for app ${this.identity.appId}: ${reason}`, error);
    }
  }

  private loadKey(): KeyObject {
    if (this.key) {
      return this.key;
    }
    let key: KeyObject;
    try {
      key = createPrivateKey(this.identity.privateKey.expose());
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new SigningError(`Invalid private key for app ${this.identity.appId}: ${reason}`, error);
    }
    if (key.asymmetricKeyType !== 'rsa') {
      throw new SigningError(
        `Private key for app ${this.identity.appId} must be an RSA key, got ${key.asymmetricKeyType ?? 'unknown'}`
      );
    }
    this.key = key;
    return key;
  }
}

/**
 * Signs a single App JWT.
 */
export async function signAppJwt(identity: AppIdentity, now?: Date): Promise<SignedJwt> {
  return new AppJwtSigner(identity).sign(now);
}

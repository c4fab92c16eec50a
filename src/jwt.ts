/**
 * Compact Signed Credentials.
 *
 * A generic "sign and verify a compact, expiring, tamper-evident credential"
 * primitive on top of JWT, shared by login tokens and exam session tokens.
 *
 * Security notes:
 * - Tokens are signed with HS256 (HMAC-SHA256); no other algorithm is accepted
 * - Signature comparison is done by jsonwebtoken/jwa in constant time
 * - Expiry is a signed claim, so it cannot be removed or extended
 * - Each token family has its own audience, so one family never passes as another
 */

import jwt, { type JwtPayload } from 'jsonwebtoken';
import { z } from 'zod';
import type { Config } from './config.js';

// =============================================================================
// Types
// =============================================================================

/** Claims every credential carries (Unix seconds) */
export interface TimedClaims {
  iat: number;
  exp: number;
}

export type CredentialFailure = 'malformed' | 'invalid' | 'expired';

/** Result of credential verification */
export type CredentialResult =
  | { valid: true; payload: JwtPayload }
  | { valid: false; reason: Exclude<CredentialFailure, 'expired'>; error: string }
  | { valid: false; reason: 'expired'; error: string; expiresAt: number };

export interface VerifyCredentialOptions {
  /** Expected `aud` claim; omit for tokens issued without one */
  audience?: string;
  /** Current time (Unix seconds) */
  nowSeconds: number;
}

/** Claims of a login token issued by the platform's auth service */
export interface AuthClaims {
  /** User ID */
  sub: string;
  /** User role ('user' | 'admin') */
  role: string;
}

const ALGORITHM = 'HS256';

// =============================================================================
// Signing and verification
// =============================================================================

/**
 * Sign a claim set.
 *
 * @param claims - Claims to encode; `iat` and `exp` are taken as given
 * @param secret - HMAC secret
 * @param audience - Optional `aud` claim
 * @returns Compact JWT string
 */
export function signCredential(
  claims: TimedClaims & Record<string, unknown>,
  secret: string,
  audience?: string
): string {
  return jwt.sign(claims, secret, {
    algorithm: ALGORITHM,
    ...(audience ? { audience } : {}),
  });
}

/**
 * Verify a credential.
 *
 * Failures are reported in order: structure (`malformed`), then signature,
 * algorithm and audience (`invalid`), then expiry (`expired`). An expired
 * verdict therefore always refers to an authentic token.
 *
 * Only an empty value or one without any segment separator is `malformed`.
 * Anything shaped like a token that fails to verify, including a character
 * altered into one outside the base64url alphabet, is `invalid`.
 */
export function verifyCredential(
  token: string,
  secret: string,
  options: VerifyCredentialOptions
): CredentialResult {
  if (!token.includes('.')) {
    return { valid: false, reason: 'malformed', error: 'Token is not a compact JWS' };
  }

  let decoded: JwtPayload | string;
  try {
    decoded = jwt.verify(token, secret, {
      algorithms: [ALGORITHM],
      // Expiry is checked below, after the signature, against the caller's clock
      ignoreExpiration: true,
      clockTimestamp: options.nowSeconds,
      ...(options.audience ? { audience: options.audience } : {}),
    });
  } catch (err) {
    // Any header or payload alteration lands here, whether the signature check
    // or the JSON decoding failed first
    return {
      valid: false,
      reason: 'invalid',
      error: err instanceof Error ? err.message : 'Token validation failed',
    };
  }

  if (typeof decoded === 'string') {
    return { valid: false, reason: 'invalid', error: 'Token payload is not a claim set' };
  }

  if (typeof decoded.exp !== 'number') {
    return { valid: false, reason: 'invalid', error: 'Token has no expiry' };
  }

  if (options.nowSeconds > decoded.exp) {
    return { valid: false, reason: 'expired', error: 'Token expired', expiresAt: decoded.exp };
  }

  return { valid: true, payload: decoded };
}

// =============================================================================
// Login tokens
// =============================================================================

const authClaimsSchema = z.object({
  sub: z.string().min(1),
  role: z.string().min(1),
});

/**
 * Generate a login token.
 * Login tokens are issued by the platform's auth service; this exists for
 * tooling and tests that need a token the exam routes accept.
 */
export function generateAuthToken(
  claims: AuthClaims,
  config: Pick<Config, 'jwtSecret'>,
  expirySeconds: number = 3600,
  now: number = Date.now()
): string {
  const iat = Math.floor(now / 1000);
  return signCredential({ ...claims, iat, exp: iat + expirySeconds }, config.jwtSecret);
}

/**
 * Verify a login token and return its claims, or null if it is not usable.
 */
export function verifyAuthToken(
  token: string,
  config: Pick<Config, 'jwtSecret'>,
  now: number = Date.now()
): AuthClaims | null {
  const result = verifyCredential(token, config.jwtSecret, {
    nowSeconds: Math.floor(now / 1000),
  });

  if (!result.valid) {
    return null;
  }

  const claims = authClaimsSchema.safeParse(result.payload);
  return claims.success ? claims.data : null;
}

// =============================================================================
// Token Extraction
// =============================================================================

/**
 * Extract token from Authorization header.
 * Supports "Bearer <token>" format.
 *
 * @param authHeader - Authorization header value
 * @returns Token string or null if not found/invalid format
 */
export function extractTokenFromHeader(authHeader: string | null | undefined): string | null {
  if (!authHeader) {
    return null;
  }

  if (authHeader.startsWith('Bearer ')) {
    const token = authHeader.slice(7).trim();
    return token || null;
  }

  return null;
}

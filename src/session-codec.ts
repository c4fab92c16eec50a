/**
 * Session Codec - stateless exam sessions.
 *
 * The whole session (subject, purpose, answer key, issue and expiry time)
 * lives in a signed token handed to the client; the server keeps no copy.
 * Any instance holding the signing key can verify a token, so the only
 * shared secret is the key itself. Whoever holds the key can forge sessions:
 * keep it server-side and rotate it like any other signing secret.
 *
 * The answer key travels encrypted: the client can carry it but not read it.
 * It is sealed with AES-256-GCM under a key derived from the signing key
 * (HKDF-SHA256), with a fresh 12-byte IV per token.
 *
 * Token layout (JWT, HS256, audience "exam-session"):
 *   uid      subject id or null
 *   purpose  "qualification" | "practice"
 *   key      base64url(iv | ciphertext | tag); the plaintext is the JSON of
 *            [[questionId, kind, answer], ...] in the order shown
 *   iat/exp  Unix seconds
 */

import { createCipheriv, createDecipheriv, hkdfSync, randomBytes } from 'crypto';
import { z } from 'zod';
import { ExpiredTokenError, InvalidSignatureError, MalformedTokenError, toError } from './errors.js';
import { signCredential, verifyCredential } from './jwt.js';
import type { AnswerKey, CanonicalAnswer, ExamPurpose, ExamSession } from './types.js';

export const SESSION_AUDIENCE = 'exam-session';

export interface SessionCodecOptions {
  /** HMAC key; loaded once at startup and passed in */
  signingKey: string;
}

/** What the caller provides to open a session */
export interface SessionInput {
  subjectId: string | null;
  purpose: ExamPurpose;
  answerKey: AnswerKey;
}

export interface EncodedSession {
  token: string;
  session: ExamSession;
}

export type KeyEntry = [number, 'single', string] | [number, 'multiple', string[]];

const keyEntrySchema = z.union([
  z.tuple([z.number().int(), z.literal('single'), z.string()]),
  z.tuple([z.number().int(), z.literal('multiple'), z.array(z.string()).min(1)]),
]);

const keyEntriesSchema = z.array(keyEntrySchema).min(1);

const sessionClaimsSchema = z.object({
  uid: z.string().min(1).nullable(),
  purpose: z.enum(['qualification', 'practice']),
  key: z.string().min(1),
  iat: z.number().int(),
  exp: z.number().int(),
});

// =============================================================================
// Answer key encryption
// =============================================================================

const CIPHER = 'aes-256-gcm';
const IV_BYTES = 12;
const TAG_BYTES = 16;

function deriveSealKey(signingKey: string): Buffer {
  return Buffer.from(hkdfSync('sha256', signingKey, SESSION_AUDIENCE, 'answer-key', 32));
}

function seal(entries: readonly KeyEntry[], sealKey: Buffer): string {
  const iv = randomBytes(IV_BYTES);
  const cipher = createCipheriv(CIPHER, sealKey, iv);
  const ciphertext = Buffer.concat([cipher.update(JSON.stringify(entries), 'utf8'), cipher.final()]);
  return Buffer.concat([iv, ciphertext, cipher.getAuthTag()]).toString('base64url');
}

function unseal(sealed: string, sealKey: Buffer): KeyEntry[] {
  const combined = Buffer.from(sealed, 'base64url');
  if (combined.length <= IV_BYTES + TAG_BYTES) {
    throw new Error('Sealed answer key is too short');
  }

  const decipher = createDecipheriv(CIPHER, sealKey, combined.subarray(0, IV_BYTES));
  decipher.setAuthTag(combined.subarray(combined.length - TAG_BYTES));
  const plaintext = Buffer.concat([
    decipher.update(combined.subarray(IV_BYTES, combined.length - TAG_BYTES)),
    decipher.final(),
  ]).toString('utf8');

  const parsed: unknown = JSON.parse(plaintext);
  return keyEntriesSchema.parse(parsed);
}

/**
 * Encrypt answer-key entries the way session tokens carry them.
 * Exposed for tooling that has to build session claims by hand.
 */
export function sealKeyEntries(entries: readonly KeyEntry[], signingKey: string): string {
  return seal(entries, deriveSealKey(signingKey));
}

function toKeyEntry(id: number, answer: CanonicalAnswer): KeyEntry {
  return answer.kind === 'single'
    ? [id, 'single', answer.value]
    : [id, 'multiple', [...answer.values]];
}

// The schema pairs the kind tag with the answer shape, so the shape decides
function fromKeyEntry(entry: KeyEntry): CanonicalAnswer {
  const answer = entry[2];
  return typeof answer === 'string'
    ? { kind: 'single', value: answer }
    : { kind: 'multiple', values: [...answer] };
}

export class SessionCodec {
  private readonly signingKey: string;
  private readonly sealKey: Buffer;

  constructor(options: SessionCodecOptions) {
    if (!options.signingKey) {
      throw new Error('SessionCodec requires a non-empty signing key');
    }
    this.signingKey = options.signingKey;
    this.sealKey = deriveSealKey(options.signingKey);
  }

  /**
   * Seal a session into a token.
   *
   * @param input - Subject, purpose and answer key
   * @param ttlSeconds - Lifetime; should be generous relative to clock skew between instances
   * @param now - Current time in milliseconds
   */
  encode(input: SessionInput, ttlSeconds: number, now: number = Date.now()): EncodedSession {
    if (input.answerKey.size === 0) {
      throw new Error('Cannot encode a session without questions');
    }
    if (!Number.isInteger(ttlSeconds) || ttlSeconds <= 0) {
      throw new Error(`Session TTL must be a positive integer, got ${ttlSeconds}`);
    }

    const issuedAt = Math.floor(now / 1000);
    const expiresAt = issuedAt + ttlSeconds;
    const key = Array.from(input.answerKey, ([id, answer]) => toKeyEntry(id, answer));

    const token = signCredential(
      {
        uid: input.subjectId,
        purpose: input.purpose,
        key: seal(key, this.sealKey),
        iat: issuedAt,
        exp: expiresAt,
      },
      this.signingKey,
      SESSION_AUDIENCE
    );

    return {
      token,
      session: {
        subjectId: input.subjectId,
        purpose: input.purpose,
        answerKey: new Map(input.answerKey),
        issuedAt,
        expiresAt,
      },
    };
  }

  /**
   * Verify a token and rebuild its session.
   *
   * @param token - Token as returned by the client
   * @param now - Current time in milliseconds
   * @throws MalformedTokenError if the token cannot be parsed
   * @throws InvalidSignatureError if the signature, claims or sealed key do not verify
   * @throws ExpiredTokenError if the token is authentic but past its expiry
   */
  decode(token: string, now: number = Date.now()): ExamSession {
    const result = verifyCredential(token, this.signingKey, {
      audience: SESSION_AUDIENCE,
      nowSeconds: Math.floor(now / 1000),
    });

    if (!result.valid) {
      switch (result.reason) {
        case 'malformed':
          throw new MalformedTokenError();
        case 'expired':
          throw new ExpiredTokenError(result.expiresAt);
        default:
          throw new InvalidSignatureError(`Exam token rejected: ${result.error}`);
      }
    }

    const claims = sessionClaimsSchema.safeParse(result.payload);
    if (!claims.success) {
      throw new InvalidSignatureError('Exam token claims do not describe a session');
    }

    let entries: KeyEntry[];
    try {
      entries = unseal(claims.data.key, this.sealKey);
    } catch (err) {
      throw new InvalidSignatureError('Exam token answer key could not be opened', toError(err));
    }

    const answerKey: AnswerKey = new Map();
    for (const entry of entries) {
      if (answerKey.has(entry[0])) {
        throw new InvalidSignatureError(`Exam token lists question ${entry[0]} twice`);
      }
      answerKey.set(entry[0], fromKeyEntry(entry));
    }

    return {
      subjectId: claims.data.uid,
      purpose: claims.data.purpose,
      answerKey,
      issuedAt: claims.data.iat,
      expiresAt: claims.data.exp,
    };
  }
}

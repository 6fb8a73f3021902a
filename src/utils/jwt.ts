import jwt from 'jsonwebtoken';
import type { JwtPayload } from 'jsonwebtoken';
import type { TokenClaims } from '../types/auth-types.js';

const ALGORITHM = 'HS256';

export type TokenRejection = 'missing' | 'malformed' | 'signature' | 'algorithm' | 'expired' | 'claims';

export type DecodeResult = { ok: true; claims: TokenClaims } | { ok: false; reason: TokenRejection };

export interface TokenCodec {
  encode(claims: TokenClaims): string;
  /** Verifies the signature before returning claims; never throws */
  decode(token: string | undefined): DecodeResult;
}

export interface TokenCodecOptions {
  secret: string;
  /** Omit for tokens that stay valid until the secret changes */
  ttlSeconds?: number;
}

const invalid = (reason: TokenRejection): DecodeResult => ({ ok: false, reason });

/**
 * Rebuild claims from a verified payload, keeping only the identity fields
 */
const toClaims = (payload: string | JwtPayload): TokenClaims | undefined => {
  if (typeof payload === 'string') return undefined;

  const record: Record<string, unknown> = payload;
  const { user_id, name, email } = record;
  if (typeof user_id !== 'string' || typeof name !== 'string' || typeof email !== 'string') {
    return undefined;
  }
  return { user_id, name, email };
};

/**
 * Algorithm named in the token header, read without verifying anything
 */
const declaredAlgorithm = (token: string): string | undefined => {
  try {
    return jwt.decode(token, { complete: true })?.header.alg;
  } catch {
    // Unparseable payload: the header alone cannot be trusted either
    return undefined;
  }
};

const classify = (token: string, error: unknown): TokenRejection => {
  const alg = declaredAlgorithm(token);
  if (alg !== undefined && alg !== ALGORITHM) {
    return 'algorithm';
  }
  if (error instanceof jwt.TokenExpiredError) {
    return 'expired';
  }
  if (error instanceof jwt.JsonWebTokenError) {
    if (error.message === 'invalid algorithm') return 'algorithm';
    if (error.message === 'invalid signature') return 'signature';
  }
  return 'malformed';
};

/**
 * HS256 JWT codec bound to a single process-wide secret
 */
export const createTokenCodec = ({ secret, ttlSeconds }: TokenCodecOptions): TokenCodec => {
  if (!secret) {
    throw new Error('Token signing secret must not be empty');
  }

  return {
    encode: ({ user_id, name, email }) =>
      jwt.sign({ user_id, name, email }, secret, {
        algorithm: ALGORITHM,
        noTimestamp: true,
        ...(ttlSeconds === undefined ? {} : { expiresIn: ttlSeconds }),
      }),

    decode: (token) => {
      if (!token) {
        return invalid('missing');
      }

      let payload: string | JwtPayload;
      try {
        payload = jwt.verify(token, secret, { algorithms: [ALGORITHM] });
      } catch (error) {
        return invalid(classify(token, error));
      }

      const claims = toClaims(payload);
      return claims ? { ok: true, claims } : invalid('claims');
    },
  };
};

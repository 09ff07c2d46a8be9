import jwt, { type JwtPayload } from 'jsonwebtoken';
import { z } from 'zod';

export type TokenKind = 'access' | 'refresh' | 'email-verification';

export interface TokenClaims {
  sub: string;
  type: TokenKind;
  /** Seconds since the epoch. */
  iat: number;
  /** Seconds since the epoch. */
  exp: number;
  jti: string;
}

export type DecodeFailure = 'Malformed' | 'SignatureInvalid' | 'Expired';

export type DecodeResult =
  | { ok: true; claims: TokenClaims }
  | { ok: false; reason: DecodeFailure; detail: string };

export interface Clock {
  now(): Date;
}

export const systemClock: Clock = {
  now: () => new Date(),
};

export interface TokenCodecOptions {
  secret: string;
  issuer: string;
  clock?: Clock;
}

const ClaimsSchema = z.object({
  sub: z.string().min(1),
  type: z.enum(['access', 'refresh', 'email-verification']),
  iat: z.number().int(),
  exp: z.number().int(),
  jti: z.string().min(1),
});

/**
 * HS256 signing and verification of token claims. Stateless: kind checks and
 * revocation belong to the caller.
 */
export class TokenCodec {
  private readonly secret: string;

  private readonly issuer: string;

  private readonly clock: Clock;

  constructor(options: TokenCodecOptions) {
    this.secret = options.secret;
    this.issuer = options.issuer;
    this.clock = options.clock ?? systemClock;
  }

  encode(claims: TokenClaims): string {
    return jwt.sign({ ...claims }, this.secret, {
      algorithm: 'HS256',
      issuer: this.issuer,
    });
  }

  decode(token: string): DecodeResult {
    let payload: string | JwtPayload;

    try {
      payload = jwt.verify(token, this.secret, {
        algorithms: ['HS256'],
        issuer: this.issuer,
        clockTimestamp: Math.floor(this.clock.now().getTime() / 1000),
      });
    } catch (error) {
      return { ok: false, ...classifyFailure(error) };
    }

    const parsed = ClaimsSchema.safeParse(payload);
    if (!parsed.success) {
      return { ok: false, reason: 'Malformed', detail: 'claims do not match the token schema' };
    }

    return { ok: true, claims: parsed.data };
  }
}

function classifyFailure(error: unknown): { reason: DecodeFailure; detail: string } {
  if (error instanceof jwt.TokenExpiredError) {
    return { reason: 'Expired', detail: error.message };
  }

  if (error instanceof jwt.JsonWebTokenError) {
    if (error.message === 'invalid signature') {
      return { reason: 'SignatureInvalid', detail: error.message };
    }
    return { reason: 'Malformed', detail: error.message };
  }

  throw error;
}

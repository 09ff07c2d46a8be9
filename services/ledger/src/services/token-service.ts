import crypto from 'node:crypto';
import type { FastifyBaseLogger } from 'fastify';

import { invalidInput, notFound, unauthorized } from '../errors';
import type { UserRepository } from '../repositories/user-repository';
import type { Clock, DecodeFailure, TokenCodec, TokenKind } from '../lib/token-codec';

export interface TokenPair {
  accessToken: string;
  accessTokenExpiresAt: Date;
  refreshToken: string;
  refreshTokenExpiresAt: Date;
}

export interface RotatedTokenPair extends TokenPair {
  userId: number;
}

export interface IssuedToken {
  token: string;
  expiresAt: Date;
}

export interface TokenServiceOptions {
  accessTokenTtlSeconds: number;
  refreshTokenTtlSeconds: number;
  emailVerificationTtlSeconds: number;
}

export interface TokenServiceDependencies {
  codec: TokenCodec;
  repository: UserRepository;
  clock: Clock;
  logger: FastifyBaseLogger;
  options: TokenServiceOptions;
}

type RejectionReason = DecodeFailure | 'WrongKind' | 'BadSubject' | 'Stale';

type SubjectResult =
  | { ok: true; userId: number }
  | { ok: false; reason: RejectionReason; detail: string };

const NONCE_BYTES = 16;

/**
 * Access/refresh token lifecycle. Each user holds at most one live refresh
 * token, persisted as a SHA-256 digest; issuing a pair overwrites it and a
 * refresh only succeeds while the presented token is still the stored one.
 * Access tokens are verified without touching storage.
 */
export class TokenService {
  private readonly codec: TokenCodec;

  private readonly repository: UserRepository;

  private readonly clock: Clock;

  private readonly logger: FastifyBaseLogger;

  private readonly options: TokenServiceOptions;

  constructor(dependencies: TokenServiceDependencies) {
    this.codec = dependencies.codec;
    this.repository = dependencies.repository;
    this.clock = dependencies.clock;
    this.logger = dependencies.logger;
    this.options = dependencies.options;
  }

  async issuePair(userId: number): Promise<TokenPair> {
    const pair = this.mintPair(userId);
    const stored = await this.repository.setRefreshTokenHash(
      userId,
      digestToken(pair.refreshToken),
    );

    if (!stored) {
      throw notFound('AUTH_USER_NOT_FOUND', 'User not found.');
    }

    return pair;
  }

  /** Returns the subject user id of a valid, unexpired access token. */
  verifyAccess(token: string): number {
    const result = this.resolveSubject(token, 'access');
    if (!result.ok) {
      return this.reject('access', result.reason, result.detail);
    }

    return result.userId;
  }

  async refresh(token: string): Promise<RotatedTokenPair> {
    const result = this.resolveSubject(token, 'refresh');
    if (!result.ok) {
      return this.reject('refresh', result.reason, result.detail);
    }

    const next = this.mintPair(result.userId);
    const swapped = await this.repository.swapRefreshTokenHash(
      result.userId,
      digestToken(token),
      digestToken(next.refreshToken),
    );

    if (!swapped) {
      return this.reject(
        'refresh',
        'Stale',
        `refresh token for user ${result.userId} was rotated or revoked`,
      );
    }

    return { ...next, userId: result.userId };
  }

  async revoke(userId: number): Promise<void> {
    const cleared = await this.repository.setRefreshTokenHash(userId, null);

    if (!cleared) {
      throw notFound('AUTH_USER_NOT_FOUND', 'User not found.');
    }
  }

  issueEmailVerificationToken(userId: number): IssuedToken {
    return this.mint(userId, 'email-verification', this.options.emailVerificationTtlSeconds);
  }

  verifyEmailVerificationToken(token: string): number {
    const result = this.resolveSubject(token, 'email-verification');
    if (!result.ok) {
      this.logger.debug(
        { kind: 'email-verification', reason: result.reason, detail: result.detail },
        'token rejected',
      );
      throw invalidInput(
        'AUTH_EMAIL_VERIFICATION_INVALID',
        'Verification token is invalid or expired.',
      );
    }

    return result.userId;
  }

  private mintPair(userId: number): TokenPair {
    const access = this.mint(userId, 'access', this.options.accessTokenTtlSeconds);
    const refresh = this.mint(userId, 'refresh', this.options.refreshTokenTtlSeconds);

    return {
      accessToken: access.token,
      accessTokenExpiresAt: access.expiresAt,
      refreshToken: refresh.token,
      refreshTokenExpiresAt: refresh.expiresAt,
    };
  }

  private mint(userId: number, kind: TokenKind, ttlSeconds: number): IssuedToken {
    const issuedAt = Math.floor(this.clock.now().getTime() / 1000);
    const expiresAt = issuedAt + ttlSeconds;

    const token = this.codec.encode({
      sub: String(userId),
      type: kind,
      iat: issuedAt,
      exp: expiresAt,
      jti: crypto.randomBytes(NONCE_BYTES).toString('base64url'),
    });

    return { token, expiresAt: new Date(expiresAt * 1000) };
  }

  private resolveSubject(token: string, kind: TokenKind): SubjectResult {
    const decoded = this.codec.decode(token);
    if (!decoded.ok) {
      return decoded;
    }

    if (decoded.claims.type !== kind) {
      return {
        ok: false,
        reason: 'WrongKind',
        detail: `expected ${kind} token, got ${decoded.claims.type}`,
      };
    }

    const userId = Number(decoded.claims.sub);
    if (!Number.isSafeInteger(userId) || userId <= 0) {
      return { ok: false, reason: 'BadSubject', detail: `subject ${decoded.claims.sub}` };
    }

    return { ok: true, userId };
  }

  private reject(kind: TokenKind, reason: RejectionReason, detail: string): never {
    this.logger.debug({ kind, reason, detail }, 'token rejected');
    throw unauthorized('AUTH_UNAUTHORIZED', 'Token is invalid or expired.');
  }
}

export function digestToken(token: string) {
  return crypto.createHash('sha256').update(token).digest('hex');
}

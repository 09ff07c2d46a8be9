import argon2 from 'argon2';

import type { Env } from '../env';
import type { User, UserWithSecrets } from '../domain/models';
import { conflict, forbidden, notFound, unauthorized } from '../errors';
import { UniqueConstraintError, type UserRepository } from '../repositories/user-repository';
import type { TokenPair, TokenService } from './token-service';

const ARGON2_OPTIONS: argon2.Options = {
  type: argon2.argon2id,
  memoryCost: 19456,
  timeCost: 2,
  parallelism: 1,
};

export type AuthEnv = Pick<
  Env,
  | 'REQUIRE_EMAIL_VERIFICATION'
  | 'DEFAULT_MILK_PRICE_PER_LITRE'
  | 'DEFAULT_CURRENCY'
  | 'DEFAULT_CURRENCY_SYMBOL'
  | 'isProduction'
>;

export interface RegisterInput {
  email: string;
  username?: string | null;
  password: string;
}

export interface LoginInput {
  email: string;
  password: string;
}

export interface RegisterResult {
  user: User;
  tokens: TokenPair;
  requiresEmailVerification: boolean;
  debug?: {
    emailVerificationToken: string;
  };
}

export interface LoginResult {
  user: User;
  tokens: TokenPair;
}

export interface AuthServiceDependencies {
  repository: UserRepository;
  tokens: TokenService;
  env: AuthEnv;
}

export class AuthService {
  private readonly repository: UserRepository;

  private readonly tokens: TokenService;

  private readonly env: AuthEnv;

  constructor(dependencies: AuthServiceDependencies) {
    this.repository = dependencies.repository;
    this.tokens = dependencies.tokens;
    this.env = dependencies.env;
  }

  async register(input: RegisterInput): Promise<RegisterResult> {
    const email = this.normalizeEmail(input.email);
    const existing = await this.repository.findUserByEmail(email);

    if (existing) {
      throw conflict('AUTH_EMAIL_EXISTS', 'An account already exists for this email.');
    }

    const passwordHash = await argon2.hash(input.password, ARGON2_OPTIONS);
    const requiresEmailVerification = this.env.REQUIRE_EMAIL_VERIFICATION;

    let user: User;
    try {
      user = await this.repository.createUser({
        email,
        username: this.normalizeOptionalString(input.username),
        passwordHash,
        emailVerified: !requiresEmailVerification,
        milkPricePerLitre: this.env.DEFAULT_MILK_PRICE_PER_LITRE,
        currency: this.env.DEFAULT_CURRENCY,
        currencySymbol: this.env.DEFAULT_CURRENCY_SYMBOL,
      });
    } catch (error) {
      // Lost a race with a concurrent registration for the same address.
      if (error instanceof UniqueConstraintError) {
        throw conflict('AUTH_EMAIL_EXISTS', 'An account already exists for this email.');
      }
      throw error;
    }

    const tokens = await this.tokens.issuePair(user.id);

    if (!requiresEmailVerification) {
      return { user, tokens, requiresEmailVerification };
    }

    const verification = this.tokens.issueEmailVerificationToken(user.id);

    return {
      user,
      tokens,
      requiresEmailVerification,
      debug: this.env.isProduction
        ? undefined
        : {
            emailVerificationToken: verification.token,
          },
    };
  }

  async login(input: LoginInput): Promise<LoginResult> {
    const record = await this.repository.findUserByEmail(this.normalizeEmail(input.email));

    if (!record) {
      throw unauthorized('AUTH_INVALID_CREDENTIALS', 'Email or password is incorrect.');
    }

    const passwordValid = await argon2.verify(record.passwordHash, input.password);

    if (!passwordValid) {
      throw unauthorized('AUTH_INVALID_CREDENTIALS', 'Email or password is incorrect.');
    }

    if (this.env.REQUIRE_EMAIL_VERIFICATION && !record.emailVerified) {
      throw forbidden('AUTH_EMAIL_NOT_VERIFIED', 'Please verify your email before logging in.');
    }

    const tokens = await this.tokens.issuePair(record.id);

    return { user: this.stripSecrets(record), tokens };
  }

  async refresh(refreshToken: string): Promise<TokenPair> {
    const { userId, ...tokens } = await this.tokens.refresh(refreshToken);
    return tokens;
  }

  async logout(userId: number): Promise<void> {
    await this.tokens.revoke(userId);
  }

  async verifyEmail(token: string): Promise<User> {
    const userId = this.tokens.verifyEmailVerificationToken(token);
    const user = await this.repository.markEmailVerified(userId);

    if (!user) {
      throw notFound('AUTH_USER_NOT_FOUND', 'User not found.');
    }

    return user;
  }

  async getUserById(id: number): Promise<User | null> {
    return this.repository.findUserById(id);
  }

  private normalizeEmail(value: string) {
    return value.trim().toLowerCase();
  }

  private normalizeOptionalString(value?: string | null) {
    if (!value) {
      return null;
    }

    const trimmed = value.trim();
    return trimmed.length > 0 ? trimmed : null;
  }

  private stripSecrets(record: UserWithSecrets): User {
    const { passwordHash, refreshTokenHash, ...rest } = record;
    return rest;
  }
}

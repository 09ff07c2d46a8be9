import pino from 'pino';

import type { Env } from '../src/env';
import type { Clock } from '../src/lib/token-codec';
import { TokenCodec } from '../src/lib/token-codec';
import { AuthService } from '../src/services/auth-service';
import { MilkRecordsService } from '../src/services/milk-records-service';
import { TokenService } from '../src/services/token-service';
import { InMemoryMilkRecordRepository } from './in-memory-milk-record-repository';
import { InMemoryUserRepository } from './in-memory-user-repository';

export const TEST_SECRET = 'test-secret-test-secret-test-secret';

export function buildTestEnv(overrides: Partial<Env> = {}): Env {
  return {
    NODE_ENV: 'test',
    PORT: 5001,
    HOST: '127.0.0.1',
    DATABASE_URL: 'postgresql://localhost:5432/milk_ledger_test',
    DATABASE_POOL_MAX: 2,
    JWT_SECRET: TEST_SECRET,
    JWT_ISSUER: 'milk-ledger-test',
    ACCESS_TOKEN_TTL_SECONDS: 60 * 60,
    REFRESH_TOKEN_TTL_SECONDS: 60 * 60 * 24 * 30,
    EMAIL_VERIFICATION_TOKEN_TTL_SECONDS: 60 * 60,
    REQUIRE_EMAIL_VERIFICATION: false,
    DEFAULT_MILK_PRICE_PER_LITRE: 50,
    DEFAULT_CURRENCY: 'INR',
    DEFAULT_CURRENCY_SYMBOL: '₹',
    RATE_LIMIT_MAX: 1000,
    RATE_LIMIT_WINDOW_MINUTES: 1,
    LOG_LEVEL: 'silent',
    isProduction: false,
    ...overrides,
  };
}

/** A clock that only moves when told to. */
export class ManualClock implements Clock {
  private current: Date;

  constructor(start: Date | string = '2025-03-15T08:00:00.000Z') {
    this.current = new Date(start);
  }

  now() {
    return new Date(this.current.getTime());
  }

  advanceSeconds(seconds: number) {
    this.current = new Date(this.current.getTime() + seconds * 1000);
  }
}

/** Collects pino output so tests can inspect what was logged. */
export function createCapturingLogger() {
  const lines: Array<Record<string, unknown>> = [];
  const logger = pino(
    { level: 'debug' },
    {
      write(message: string) {
        lines.push(JSON.parse(message));
      },
    },
  );

  return { logger, lines };
}

export interface LedgerTestOptions {
  env?: Partial<Env>;
  clock?: ManualClock;
  secret?: string;
}

export function createLedgerForTest(options: LedgerTestOptions = {}) {
  const env = buildTestEnv(options.env);
  const clock = options.clock ?? new ManualClock();
  const users = new InMemoryUserRepository();
  const records = new InMemoryMilkRecordRepository();
  const { logger, lines } = createCapturingLogger();

  const codec = new TokenCodec({
    secret: options.secret ?? env.JWT_SECRET,
    issuer: env.JWT_ISSUER,
    clock,
  });

  const tokens = new TokenService({
    codec,
    repository: users,
    clock,
    logger,
    options: {
      accessTokenTtlSeconds: env.ACCESS_TOKEN_TTL_SECONDS,
      refreshTokenTtlSeconds: env.REFRESH_TOKEN_TTL_SECONDS,
      emailVerificationTtlSeconds: env.EMAIL_VERIFICATION_TOKEN_TTL_SECONDS,
    },
  });

  const auth = new AuthService({ repository: users, tokens, env });
  const milk = new MilkRecordsService({ records, users, clock });

  return { env, clock, users, records, codec, tokens, auth, milk, logLines: lines };
}

export async function seedUser(users: InMemoryUserRepository, email = 'asha@example.com') {
  return users.createUser({
    email,
    username: 'asha',
    passwordHash: 'not-a-real-hash',
    emailVerified: true,
    milkPricePerLitre: 50,
    currency: 'INR',
    currencySymbol: '₹',
  });
}

export function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }

  throw new Error('Expected the call to throw');
}

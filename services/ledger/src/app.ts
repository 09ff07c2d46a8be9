import fastify, { type FastifyServerOptions } from 'fastify';
import sensible from '@fastify/sensible';
import cors from '@fastify/cors';
import helmet from '@fastify/helmet';
import rateLimit from '@fastify/rate-limit';
import cookie from '@fastify/cookie';
import type { Pool } from 'pg';

import { env as defaultEnv, type Env } from './env';
import { STATUS_BY_KIND, ServiceError } from './errors';
import { createPool } from './db/pool';
import { TokenCodec, systemClock, type Clock } from './lib/token-codec';
import databasePlugin from './plugins/database';
import validationPlugin from './plugins/validation';
import authzPlugin from './plugins/authz';
import type { MilkRecordRepository } from './repositories/milk-record-repository';
import { PgMilkRecordRepository } from './repositories/pg-milk-record-repository';
import { PgUserRepository } from './repositories/pg-user-repository';
import type { UserRepository } from './repositories/user-repository';
import { AuthService } from './services/auth-service';
import { MilkRecordsService } from './services/milk-records-service';
import { SettingsService } from './services/settings-service';
import { TokenService } from './services/token-service';
import { authRoutes } from './routes/auth-routes';
import { healthRoutes } from './routes/health-routes';
import { milkRecordRoutes } from './routes/milk-record-routes';
import { settingsRoutes } from './routes/settings-routes';

export interface BuildAppOptions {
  env?: Env;
  pool?: Pool;
  userRepository?: UserRepository;
  recordRepository?: MilkRecordRepository;
  clock?: Clock;
  logger?: FastifyServerOptions['logger'];
}

export async function buildApp(options: BuildAppOptions = {}) {
  const resolvedEnv = options.env ?? defaultEnv;
  const clock = options.clock ?? systemClock;

  const app = fastify({
    logger: options.logger ?? { level: resolvedEnv.LOG_LEVEL },
  });

  await app.register(sensible);
  await app.register(cors, {
    origin: true,
    credentials: true,
  });
  await app.register(helmet);
  await app.register(rateLimit, {
    max: resolvedEnv.RATE_LIMIT_MAX,
    timeWindow: `${resolvedEnv.RATE_LIMIT_WINDOW_MINUTES} minutes`,
  });
  await app.register(cookie);

  let userRepository = options.userRepository;
  let recordRepository = options.recordRepository;

  if (!userRepository || !recordRepository) {
    const pool = options.pool ?? createPool(resolvedEnv);
    await app.register(databasePlugin, { pool });
    userRepository = userRepository ?? new PgUserRepository(pool);
    recordRepository = recordRepository ?? new PgMilkRecordRepository(pool);
  }

  const tokenService = new TokenService({
    codec: new TokenCodec({
      secret: resolvedEnv.JWT_SECRET,
      issuer: resolvedEnv.JWT_ISSUER,
      clock,
    }),
    repository: userRepository,
    clock,
    logger: app.log,
    options: {
      accessTokenTtlSeconds: resolvedEnv.ACCESS_TOKEN_TTL_SECONDS,
      refreshTokenTtlSeconds: resolvedEnv.REFRESH_TOKEN_TTL_SECONDS,
      emailVerificationTtlSeconds: resolvedEnv.EMAIL_VERIFICATION_TOKEN_TTL_SECONDS,
    },
  });

  app.decorate('tokenService', tokenService);
  app.decorate(
    'authService',
    new AuthService({ repository: userRepository, tokens: tokenService, env: resolvedEnv }),
  );
  app.decorate(
    'milkRecordsService',
    new MilkRecordsService({ records: recordRepository, users: userRepository, clock }),
  );
  app.decorate('settingsService', new SettingsService(userRepository));

  await app.register(validationPlugin);
  await app.register(authzPlugin);
  await app.register(healthRoutes);
  await app.register(authRoutes, { env: resolvedEnv, clock });
  await app.register(milkRecordRoutes);
  await app.register(settingsRoutes);

  app.setErrorHandler((error, request, reply) => {
    if (error instanceof ServiceError) {
      request.log.warn({ err: error }, 'Handled service error');
      return reply.code(STATUS_BY_KIND[error.kind]).send({
        error: {
          code: error.code,
          message: error.message,
          details: error.details,
        },
        correlationId: request.id,
      });
    }

    if (error.statusCode !== undefined && error.statusCode < 500) {
      request.log.warn({ err: error }, 'Rejected request');
      return reply.code(error.statusCode).send({
        error: {
          code: error.code,
          message: error.message,
        },
        correlationId: request.id,
      });
    }

    request.log.error({ err: error }, 'Unhandled error');
    return reply.code(500).send({
      error: {
        code: 'INTERNAL_SERVER_ERROR',
        message: 'An unexpected error occurred.',
      },
      correlationId: request.id,
    });
  });

  return app;
}

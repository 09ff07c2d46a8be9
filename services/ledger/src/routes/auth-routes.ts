import type { FastifyPluginAsync, FastifyReply } from 'fastify';
import { z } from 'zod';

import type { User } from '../domain/models';
import type { Env } from '../env';
import type { Clock } from '../lib/token-codec';
import { ACCESS_TOKEN_COOKIE, requireAuthUser } from '../plugins/authz';
import type { TokenPair } from '../services/token-service';

const RegisterSchema = z
  .object({
    email: z.string().trim().email().max(254),
    username: z.string().trim().min(1).max(80).optional(),
    password: z
      .string()
      .min(8, 'Password must be at least 8 characters')
      .max(128, 'Password must be at most 128 characters'),
  })
  .strict();

const LoginSchema = z
  .object({
    email: z.string().trim().email().max(254),
    password: z.string().min(1).max(128),
  })
  .strict();

const RefreshSchema = z
  .object({
    refresh_token: z.string().min(1),
  })
  .strict();

const VerifyEmailSchema = z
  .object({
    token: z.string().min(10),
  })
  .strict();

export interface AuthRoutesOptions {
  env: Env;
  clock: Clock;
}

export const authRoutes: FastifyPluginAsync<AuthRoutesOptions> = async (fastify, opts) => {
  const { env, clock } = opts;

  fastify.post(
    '/api/auth/register',
    fastify.withValidation({ body: RegisterSchema }, async (request, reply) => {
      const { body } = request.validated;
      const result = await fastify.authService.register(body);
      setAccessCookie(reply, env, clock, result.tokens);

      return reply.code(201).send({
        message: result.requiresEmailVerification
          ? 'Registration successful. Please verify your email.'
          : 'Registration successful.',
        access_token: result.tokens.accessToken,
        refresh_token: result.tokens.refreshToken,
        user: {
          id: result.user.id,
          email: result.user.email,
          username: result.user.username,
        },
        requires_email_verification: result.requiresEmailVerification,
        debug: result.debug
          ? { email_verification_token: result.debug.emailVerificationToken }
          : undefined,
      });
    }),
  );

  fastify.post(
    '/api/auth/login',
    fastify.withValidation({ body: LoginSchema }, async (request, reply) => {
      const { body } = request.validated;
      const result = await fastify.authService.login(body);
      setAccessCookie(reply, env, clock, result.tokens);

      return reply.code(200).send({
        message: 'Login successful.',
        access_token: result.tokens.accessToken,
        refresh_token: result.tokens.refreshToken,
        user: serializeUser(result.user),
      });
    }),
  );

  fastify.post(
    '/api/auth/refresh',
    fastify.withValidation({ body: RefreshSchema }, async (request, reply) => {
      const { body } = request.validated;
      const tokens = await fastify.authService.refresh(body.refresh_token);
      setAccessCookie(reply, env, clock, tokens);

      return reply.code(200).send({
        access_token: tokens.accessToken,
        refresh_token: tokens.refreshToken,
      });
    }),
  );

  fastify.post(
    '/api/auth/logout',
    fastify.withAuth(async (request, reply) => {
      const user = requireAuthUser(request);
      await fastify.authService.logout(user.id);
      reply.clearCookie(ACCESS_TOKEN_COOKIE, { path: '/' });

      return reply.code(200).send({ message: 'Logged out.' });
    }),
  );

  fastify.get(
    '/api/auth/me',
    fastify.withAuth(async (request) => ({
      user: serializeUser(requireAuthUser(request)),
    })),
  );

  fastify.post(
    '/api/auth/verify-email',
    fastify.withValidation({ body: VerifyEmailSchema }, async (request, reply) => {
      const { body } = request.validated;
      const user = await fastify.authService.verifyEmail(body.token);

      return reply.code(200).send({
        message: 'Email verified.',
        user: serializeUser(user),
      });
    }),
  );
};

export function serializeUser(user: User) {
  return {
    id: user.id,
    email: user.email,
    username: user.username,
    currency: user.currency,
    currency_symbol: user.currencySymbol,
    milk_price_per_litre: user.milkPricePerLitre,
  };
}

function setAccessCookie(reply: FastifyReply, env: Env, clock: Clock, tokens: TokenPair) {
  const maxAge = Math.max(
    1,
    Math.floor((tokens.accessTokenExpiresAt.getTime() - clock.now().getTime()) / 1000),
  );

  reply.setCookie(ACCESS_TOKEN_COOKIE, tokens.accessToken, {
    httpOnly: true,
    sameSite: 'lax',
    secure: env.isProduction,
    path: '/',
    maxAge,
  });
}

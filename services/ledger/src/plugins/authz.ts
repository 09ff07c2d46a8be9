import fp from 'fastify-plugin';
import type { FastifyPluginAsync, FastifyRequest, RouteHandlerMethod } from 'fastify';

import type { User } from '../domain/models';
import { unauthorized } from '../errors';

export const ACCESS_TOKEN_COOKIE = 'access_token';

function extractAccessToken(request: FastifyRequest) {
  const header = request.headers.authorization;
  if (typeof header === 'string') {
    const match = /^Bearer\s+(.+)$/i.exec(header);
    if (match) {
      return match[1].trim();
    }
  }

  const cookieToken = request.cookies?.[ACCESS_TOKEN_COOKIE];
  return typeof cookieToken === 'string' && cookieToken.length > 0 ? cookieToken : null;
}

export function requireAuthUser(request: FastifyRequest): User {
  if (!request.authUser) {
    throw unauthorized('AUTH_UNAUTHORIZED', 'Authentication required.');
  }

  return request.authUser;
}

const authzPlugin: FastifyPluginAsync = async (fastify) => {
  fastify.decorateRequest('authUser', null);

  fastify.decorate('authenticate', async function authenticate(request: FastifyRequest) {
    const token = extractAccessToken(request);

    if (!token) {
      throw unauthorized('AUTH_UNAUTHORIZED', 'Authentication required.');
    }

    const userId = fastify.tokenService.verifyAccess(token);
    const user = await fastify.authService.getUserById(userId);

    if (!user) {
      throw unauthorized('AUTH_UNAUTHORIZED', 'Authentication required.');
    }

    request.authUser = user;
    return user;
  });

  // Wraps a handler so it only runs once the access token checks out.
  fastify.decorate('withAuth', function withAuth(handler: RouteHandlerMethod): RouteHandlerMethod {
    return async function authenticatedHandler(request, reply) {
      await fastify.authenticate(request);
      return handler.call(this, request, reply);
    };
  });
};

export default fp(authzPlugin, {
  name: 'authz-plugin',
});

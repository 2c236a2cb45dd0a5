import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { UnauthorizedError } from '../lib/errors.js';
import { verifyAccessToken, type AccessTokenClaims } from '../lib/auth.js';

export const ACCESS_TOKEN_COOKIE = 'access_token';

export type AuthUser = AccessTokenClaims;

export interface AuthPluginOptions {
  jwtSecret: string;
}

declare module 'fastify' {
  interface FastifyInstance {
    authenticate: (
      request: FastifyRequest,
      reply: FastifyReply
    ) => Promise<void>;
  }
  interface FastifyRequest {
    user: AuthUser;
  }
}

function extractToken(request: FastifyRequest): string | undefined {
  const authHeader = request.headers.authorization;
  if (authHeader?.startsWith('Bearer ')) {
    return authHeader.slice(7);
  }
  return request.cookies?.[ACCESS_TOKEN_COOKIE];
}

async function authPlugin(fastify: FastifyInstance, options: AuthPluginOptions): Promise<void> {
  if (!options.jwtSecret) {
    throw new Error('auth plugin requires a jwtSecret');
  }

  /**
   * Decorator to authenticate requests.
   * Verifies the HS256 token from the Authorization: Bearer header, falling
   * back to the access_token cookie set at login.
   */
  fastify.decorate(
    'authenticate',
    async function (request: FastifyRequest, _reply: FastifyReply) {
      const token = extractToken(request);
      if (!token) {
        throw new UnauthorizedError('Access token required');
      }

      try {
        request.user = await verifyAccessToken(token, options.jwtSecret);
      } catch (err) {
        request.log.warn({ err }, 'Rejected access token');
        throw new UnauthorizedError('Invalid or expired access token');
      }
    }
  );
}

export default fp(authPlugin, {
  name: 'auth',
  dependencies: ['@fastify/cookie'],
});

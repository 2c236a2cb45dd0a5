import type { FastifyInstance, FastifyReply } from 'fastify';
import { LoginSchema, RegisterSchema, type AuthResponse } from '../schemas/auth.schema.js';
import { AuthService } from '../services/auth.service.js';
import { UnauthorizedError } from '../lib/errors.js';
import { ACCESS_TOKEN_COOKIE } from '../plugins/auth.plugin.js';

export interface AuthRoutesOptions {
  jwtSecret: string;
  jwtExpiresIn: string;
  secureCookies: boolean;
}

export async function authRoutes(fastify: FastifyInstance, options: AuthRoutesOptions): Promise<void> {
  const authService = new AuthService(fastify.db, {
    secret: options.jwtSecret,
    expiresIn: options.jwtExpiresIn,
  });

  const cookieOptions = {
    httpOnly: true,
    secure: options.secureCookies,
    sameSite: 'lax' as const,
    path: '/',
  };

  function sendWithCookie(reply: FastifyReply, statusCode: number, auth: AuthResponse) {
    reply.setCookie(ACCESS_TOKEN_COOKIE, auth.token, {
      ...cookieOptions,
      expires: auth.expiresAt,
    });
    return reply.status(statusCode).send(auth);
  }

  /**
   * POST /api/auth/register
   * Create an account and sign in
   */
  fastify.post('/api/auth/register', async (request, reply) => {
    const input = RegisterSchema.parse(request.body);
    const auth = await authService.register(input);
    request.log.info({ userId: auth.user.id }, 'User registered');
    return sendWithCookie(reply, 201, auth);
  });

  /**
   * POST /api/auth/login
   * Login with username or email and password
   */
  fastify.post('/api/auth/login', async (request, reply) => {
    const input = LoginSchema.parse(request.body);
    try {
      const auth = await authService.login(input);
      return sendWithCookie(reply, 200, auth);
    } catch (err) {
      if (err instanceof UnauthorizedError) {
        request.log.warn({ usernameOrEmail: input.usernameOrEmail }, 'Login failed');
      }
      throw err;
    }
  });

  /**
   * POST /api/auth/logout
   * Clear the access token cookie
   */
  fastify.post('/api/auth/logout', async (_request, reply) => {
    reply.clearCookie(ACCESS_TOKEN_COOKIE, cookieOptions);
    return reply.send({ message: 'Logged out successfully' });
  });

  /**
   * GET /api/auth/me
   * Get current authenticated user
   */
  fastify.get(
    '/api/auth/me',
    { onRequest: [fastify.authenticate] },
    async (request, reply) => {
      const user = await authService.getUserById(request.user.sub);
      return reply.send({ user });
    }
  );
}

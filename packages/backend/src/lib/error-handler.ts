import type { FastifyInstance, FastifyError } from 'fastify';
import { ZodError } from 'zod';
import { AppError, type ErrorResponse } from './errors.js';

export function registerErrorHandler(fastify: FastifyInstance): void {
  fastify.setErrorHandler((error: FastifyError | Error, request, reply) => {
    const response: ErrorResponse = {
      error: 'Internal Server Error',
      message: 'An unexpected error occurred',
      statusCode: 500,
    };

    if (error instanceof ZodError) {
      response.error = 'Validation Error';
      response.message = 'Request validation failed';
      response.statusCode = 400;
      response.details = error.issues.map((issue) => ({
        path: issue.path.join('.'),
        message: issue.message,
      }));
      return reply.status(400).send(response);
    }

    if (error instanceof AppError) {
      return reply.status(error.statusCode).send(error.toResponse());
    }

    // Fastify's own errors (malformed JSON, unsupported media type, ...)
    if ('statusCode' in error && typeof error.statusCode === 'number' && error.statusCode < 500) {
      response.statusCode = error.statusCode;
      response.message = error.message;
      if (error.statusCode === 400) {
        response.error = 'Bad Request';
      } else if (error.statusCode === 404) {
        response.error = 'Not Found';
      } else if (error.statusCode === 415) {
        response.error = 'Unsupported Media Type';
      } else {
        response.error = 'Client Error';
      }
      return reply.status(error.statusCode).send(response);
    }

    request.log.error({ err: error }, 'Unhandled error');

    return reply.status(500).send(response);
  });
}

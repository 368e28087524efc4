import { FastifyReply, FastifyRequest } from 'fastify';
import { ZodError, ZodType, ZodTypeDef } from 'zod';
import { errorResponse } from '../errors.js';
import { msg } from '../lib/error-messages.js';

type Schema<T> = ZodType<T, ZodTypeDef, unknown>;

function details(error: ZodError): Record<string, unknown> {
  return {
    issues: error.errors.map(issue => ({
      path: issue.path.join('.'),
      message: issue.message,
    })),
  };
}

/**
 * Parses the body in place, so route handlers typed with `{ Body: T }`
 * receive the parsed value (defaults applied, methods upper-cased).
 */
export function validateBody<T>(schema: Schema<T>) {
  return async (request: FastifyRequest, reply: FastifyReply) => {
    const result = schema.safeParse(request.body);
    if (!result.success) {
      reply.code(400).send(errorResponse('BAD_INPUT', 'VALIDATION_ERROR', msg('BAD_INPUT_SCHEMA'), undefined, details(result.error)));
      return reply;
    }
    request.body = result.data;
  };
}

export function validateParams<T>(schema: Schema<T>) {
  return async (request: FastifyRequest, reply: FastifyReply) => {
    const result = schema.safeParse(request.params);
    if (!result.success) {
      reply.code(400).send(errorResponse('BAD_INPUT', 'VALIDATION_ERROR', msg('BAD_PATH_PARAMS'), undefined, details(result.error)));
      return reply;
    }
    request.params = result.data;
  };
}

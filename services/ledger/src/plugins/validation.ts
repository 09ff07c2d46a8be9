import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import { z, type ZodError, type ZodTypeAny } from 'zod';

import { invalidInput } from '../errors';

const SEGMENTS = ['params', 'query', 'body'] as const;

type ValidationSegment = (typeof SEGMENTS)[number];

// Credentials are checked and hashed exactly as typed.
const VERBATIM_FIELDS = new Set(['password']);

export type ValidationSchemas = Partial<Record<ValidationSegment, ZodTypeAny>>;

export type ValidatedData<T extends ValidationSchemas> = {
  readonly [K in keyof T]: T[K] extends ZodTypeAny ? z.infer<T[K]> : never;
};

export type ValidationHandler<T extends ValidationSchemas> = (
  request: FastifyRequest & { readonly validated: ValidatedData<T> },
  reply: FastifyReply,
) => unknown | Promise<unknown>;

/**
 * A number sent either as a JSON number or as a numeric string. Blank
 * strings, null, booleans and arrays are rejected rather than read as zero.
 */
export const numericField = z.union([
  z.number().finite(),
  z.string().trim().min(1).pipe(z.coerce.number().finite()),
]);

const validationPlugin = async (fastify: FastifyInstance) => {
  fastify.decorateRequest('validated', null);

  fastify.decorate('withValidation', function withValidation<
    T extends ValidationSchemas,
  >(schemas: T, handler: ValidationHandler<T>) {
    return async function wrappedHandler(request: FastifyRequest, reply: FastifyReply) {
      const validated: Partial<Record<ValidationSegment, unknown>> = {};

      for (const segment of SEGMENTS) {
        const schema = schemas[segment];
        if (!schema) {
          continue;
        }

        const result = schema.safeParse(sanitize(request[segment] ?? {}));
        if (!result.success) {
          throw toValidationError(result.error);
        }

        validated[segment] = result.data;
      }

      request.validated = validated;

      return handler(request as FastifyRequest & { readonly validated: ValidatedData<T> }, reply);
    };
  });
};

function toValidationError(error: ZodError) {
  return invalidInput(
    'VALIDATION_ERROR',
    'Request validation failed.',
    error.issues.map((issue) => ({
      path: issue.path.length ? issue.path.join('.') : 'root',
      message: issue.message,
      code: issue.code,
    })),
  );
}

/** Strips control characters and trims strings, except verbatim fields. */
export function sanitize(value: unknown, key?: string): unknown {
  if (typeof value === 'string') {
    if (key !== undefined && VERBATIM_FIELDS.has(key)) {
      return value;
    }
    return value.replace(/[\u0000-\u0008\u000B\u000C\u000E-\u001F\u007F]/g, '').trim();
  }

  if (Array.isArray(value)) {
    return value.map((item) => sanitize(item));
  }

  if (value !== null && typeof value === 'object') {
    return Object.fromEntries(
      Object.entries(value).map(([field, item]) => [field, sanitize(item, field)]),
    );
  }

  return value;
}

export default fp(validationPlugin, {
  name: 'validation-plugin',
});

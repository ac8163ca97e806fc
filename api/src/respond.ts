import fp from 'fastify-plugin';
import type { FastifyError, FastifyPluginAsync, FastifyReply } from 'fastify';
import type { ZodType, ZodTypeDef } from 'zod';
import { AppError, statusFor, statusText, type ErrorKind } from './errors.js';

export type SuccessEnvelope<T> = {
  success: true;
  message: string;
  data: T | null;
};

export type ErrorEnvelope = {
  error: string;
  message: string;
  code: number;
};

export function successBody<T>(message: string, data?: T): SuccessEnvelope<T> {
  return { success: true, message, data: data ?? null };
}

export function errorBody(kind: ErrorKind, message: string): ErrorEnvelope {
  const status = statusFor(kind);
  return { error: statusText(status), message, code: status };
}

export function sendError(reply: FastifyReply, err: AppError) {
  return reply.code(err.status).send(errorBody(err.kind, err.message));
}

export function sendSuccess<T>(reply: FastifyReply, message: string, data?: T, status = 200) {
  return reply.code(status).send(successBody(message, data));
}

function isFastifyError(err: unknown): err is FastifyError {
  return err instanceof Error && 'code' in err && typeof err.code === 'string' && err.code.startsWith('FST_');
}

/** Maps anything thrown past a handler onto the error taxonomy. Unknown faults become `Internal`. */
export function toAppError(err: unknown): AppError {
  if (err instanceof AppError) return err;
  if (isFastifyError(err) && (err.validation || (err.statusCode ?? 500) < 500)) {
    if (err.statusCode === 429) return new AppError('RateLimited', err.message);
    if (err.statusCode === 404) return new AppError('NotFound', err.message);
    return new AppError('InvalidRequest', err.message);
  }
  if (err instanceof SyntaxError) return new AppError('InvalidRequest', 'Request body is not valid JSON');
  return new AppError('Internal', 'Internal server error', { cause: err });
}

export function parseInput<T>(schema: ZodType<T, ZodTypeDef, unknown>, input: unknown): T {
  const parsed = schema.safeParse(input ?? {});
  if (!parsed.success) {
    throw new AppError('InvalidRequest', parsed.error.issues.map((i) => i.message).join('; '));
  }
  return parsed.data;
}

export const responsePlugin: FastifyPluginAsync = fp(
  async (app) => {
    app.setErrorHandler((error, req, reply) => {
      const appError = toAppError(error);
      if (appError.kind === 'Internal') {
        req.log.error({ err: error, method: req.method, url: req.url }, 'unhandled error');
      }
      return sendError(reply, appError);
    });

    app.setNotFoundHandler((req, reply) => {
      return sendError(reply, new AppError('NotFound', `Route ${req.method} ${req.url} not found`));
    });
  },
  { name: 'response' }
);

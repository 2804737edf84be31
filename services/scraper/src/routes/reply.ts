import type { FastifyReply, FastifyRequest } from 'fastify';
import type { ZodError } from 'zod';
import { AppError, errorMessage } from '../errors';

export function badRequest(reply: FastifyReply, error: ZodError) {
  return reply.code(400).send({ error: 'validation_failed', details: error.flatten() });
}

/** Maps known errors to their status; anything else is a 500. */
export function sendError(req: FastifyRequest, reply: FastifyReply, err: unknown) {
  if (err instanceof AppError) {
    return reply.code(err.statusCode).send({ error: err.code, message: err.message });
  }
  req.log.error({ err }, 'Unhandled route error');
  return reply.code(500).send({ error: 'internal_error', detail: errorMessage(err) });
}

export function statusFor(err: unknown): number {
  return err instanceof AppError ? err.statusCode : 502;
}

export function summarizeIssues(error: ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

// accept numeric strings from query params
export function toNumber(value: unknown): unknown {
  if (typeof value === 'string' && value.trim() !== '') return Number(value);
  return value;
}

export function toBoolean(value: unknown): unknown {
  if (value === 'true' || value === '1') return true;
  if (value === 'false' || value === '0') return false;
  return value;
}

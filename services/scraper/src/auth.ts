import { timingSafeEqual } from 'crypto';
import type { FastifyReply, FastifyRequest } from 'fastify';
import { AuthError } from './errors';

export const API_KEY_HEADER = 'x-api-key';

export function apiKeyMatches(expected: string, provided: string | string[] | undefined): boolean {
  if (typeof provided !== 'string') return false;
  const a = Buffer.from(provided);
  const b = Buffer.from(expected);
  return a.length === b.length && timingSafeEqual(a, b);
}

/**
 * preHandler that rejects requests whose `x-api-key` does not match.
 * An empty key disables the check.
 */
export function requireApiKey(apiKey: string) {
  return async function verifyApiKey(req: FastifyRequest, reply: FastifyReply) {
    if (!apiKey) return;
    if (apiKeyMatches(apiKey, req.headers[API_KEY_HEADER])) return;

    const err = new AuthError();
    req.log.info({ url: req.url }, 'Rejected request with invalid API key');
    return reply.code(err.statusCode).send({ error: err.code, message: err.message });
  };
}

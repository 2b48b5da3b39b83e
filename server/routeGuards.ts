import type { FastifyRequest, FastifyReply } from 'fastify';
import { z } from 'zod';
import { timingSafeStringEqual } from './middleware.js';

const SecretQuerySchema = z.object({ secret: z.string().optional() }).passthrough();

/**
 * Check a shared secret from the `secret` query param or a header.
 * Returns true if the caller is authorized (or no secret is configured).
 */
export function checkSharedSecret(
  req: FastifyRequest,
  configuredSecret: string | undefined,
  headerName = 'x-scan-secret',
): boolean {
  const trimmed = String(configuredSecret || '').trim();
  if (!trimmed) return true; // no secret configured → open
  const query = SecretQuerySchema.safeParse(req.query ?? {});
  const header = req.headers[headerName];
  const provided = String(
    (query.success ? query.data.secret : undefined) || (typeof header === 'string' ? header : '') || '',
  ).trim();
  return timingSafeStringEqual(provided, trimmed);
}

/**
 * Guard helper: sends 401/403 and returns true if unauthorized.
 * Usage:  if (rejectUnauthorized(req, res, secret)) return;
 */
export function rejectUnauthorized(
  req: FastifyRequest,
  res: FastifyReply,
  configuredSecret: string | undefined,
  options?: { headerName?: string; statusCode?: 401 | 403 },
): boolean {
  if (checkSharedSecret(req, configuredSecret, options?.headerName)) return false;
  const code = options?.statusCode ?? 401;
  res.code(code).send({ error: code === 403 ? 'Forbidden' : 'Unauthorized' });
  return true;
}

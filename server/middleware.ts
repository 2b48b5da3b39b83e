import crypto from 'crypto';
import type { FastifyInstance, FastifyRequest } from 'fastify';

/** The slice of a pino logger the request hooks write to. */
export interface StructuredLogger {
  info(obj: Record<string, unknown>): void;
  warn(obj: Record<string, unknown>): void;
  error(obj: Record<string, unknown>): void;
}

export function logStructured(
  log: StructuredLogger,
  level: string,
  event: string,
  fields: Record<string, unknown> = {},
) {
  const pinoLevel = level === 'error' ? 'error' : level === 'warn' ? 'warn' : 'info';
  log[pinoLevel]({ event, ...fields });
}


export function createRequestId() {
  if (typeof crypto.randomUUID === 'function') {
    return crypto.randomUUID();
  }
  return crypto.randomBytes(8).toString('hex');
}


export function shouldLogRequestPath(pathname: string) {
  const path = String(pathname || '');
  if (path.startsWith('/api/')) return true;
  return path === '/healthz';
}


export function extractSafeRequestMeta(req: FastifyRequest) {
  return {
    method: req.method,
    path: String(req.url?.split('?')[0] || ''),
  };
}


export function timingSafeStringEqual(left: string, right: string) {
  const leftBuffer = Buffer.from(String(left));
  const rightBuffer = Buffer.from(String(right));
  if (leftBuffer.length !== rightBuffer.length) return false;
  return crypto.timingSafeEqual(leftBuffer, rightBuffer);
}


/**
 * request_start / request_end lines with an x-request-id echoed to the client.
 * Without a logger only the request id is set.
 */
export function registerRequestLogging(app: FastifyInstance, log: StructuredLogger | null): void {
  const startedAt = new WeakMap<FastifyRequest, bigint>();

  app.addHook('onRequest', async (req, reply) => {
    const header = req.headers['x-request-id'];
    const requestId = (typeof header === 'string' ? header.trim() : '') || createRequestId();
    reply.header('x-request-id', requestId);
    if (!log || !shouldLogRequestPath(req.url.split('?')[0])) return;
    startedAt.set(req, process.hrtime.bigint());
    logStructured(log, 'info', 'request_start', { requestId, ...extractSafeRequestMeta(req) });
  });

  app.addHook('onResponse', async (req, reply) => {
    const startedNs = startedAt.get(req);
    if (!log || startedNs === undefined) return;
    const durationMs = Number(process.hrtime.bigint() - startedNs) / 1e6;
    logStructured(log, 'info', 'request_end', {
      requestId: reply.getHeader('x-request-id'),
      statusCode: reply.statusCode,
      durationMs: Number(durationMs.toFixed(1)),
      ...extractSafeRequestMeta(req),
    });
  });
}

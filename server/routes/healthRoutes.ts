import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import type { Registry } from 'prom-client';
import { errorMessage } from '../lib/errors.js';

interface HealthRoutesOptions {
  app: FastifyInstance;
  metricsRegistry: Registry;
  getHealthPayload: () => Record<string, unknown>;
}

function registerHealthRoutes(options: HealthRoutesOptions): void {
  const { app, metricsRegistry, getHealthPayload } = options;

  if (!app) {
    throw new Error('registerHealthRoutes requires app');
  }

  app.get('/healthz', (_req: FastifyRequest, res: FastifyReply) => {
    return res.code(200).send(getHealthPayload());
  });

  app.get('/metrics', async (_req: FastifyRequest, res: FastifyReply) => {
    try {
      const body = await metricsRegistry.metrics();
      return res.code(200).header('Content-Type', metricsRegistry.contentType).send(body);
    } catch (err: unknown) {
      console.error(`Metrics collection failed: ${errorMessage(err)}`);
      return res.code(500).send({ error: 'Metrics collection failed' });
    }
  });
}

export { registerHealthRoutes };

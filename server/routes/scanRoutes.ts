import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { z } from 'zod';
import type { ScanSnapshot } from '../data/schemas.js';
import { AlreadyRunningError, ScanStoppedError, errorMessage } from '../lib/errors.js';
import type { ScanStatusPayload } from '../lib/ScanState.js';
import { rejectUnauthorized } from '../routeGuards.js';
import type { RunScanOptions } from '../services/scanCoordinator.js';

const ScanTriggerBodySchema = z
  .object({
    refreshSymbols: z.boolean().optional(),
  })
  .passthrough();

interface ScanRoutesOptions {
  app: FastifyInstance;
  scanSecret?: string;
  runScan: (options: RunScanOptions) => Promise<ScanSnapshot>;
  isScanRunning: () => boolean;
  getScanStatus: () => ScanStatusPayload;
  getLatestResults: () => ScanSnapshot | null;
  getCachedSymbolCount: () => Promise<number>;
  readLogTail: () => Promise<string[]>;
}

/** Body served by /api/results before the first scan has been published. */
export function emptyResultsPayload() {
  return {
    scanId: null,
    scanDate: null,
    scanTime: null,
    totalSymbols: 0,
    athCount: 0,
    athRecords: [],
    records: null,
  };
}

function registerScanRoutes(options: ScanRoutesOptions): void {
  const { app, scanSecret, runScan, isScanRunning, getScanStatus, getLatestResults, getCachedSymbolCount, readLogTail } =
    options;

  if (!app) {
    throw new Error('registerScanRoutes requires app');
  }

  app.get('/api/results', (_req: FastifyRequest, res: FastifyReply) => {
    return res.code(200).send(getLatestResults() ?? emptyResultsPayload());
  });

  app.get('/api/status', (_req: FastifyRequest, res: FastifyReply) => {
    return res.code(200).send(getScanStatus());
  });

  app.post('/api/scan', (req: FastifyRequest, res: FastifyReply) => {
    if (rejectUnauthorized(req, res, scanSecret)) return res;

    const body = ScanTriggerBodySchema.safeParse(req.body ?? {});
    if (!body.success) {
      const issue = body.error.issues[0];
      return res.code(400).send({ error: `Invalid body: ${issue.path.join('.') || '(root)'} ${issue.message}` });
    }
    if (isScanRunning()) {
      return res.code(409).send({ error: new AlreadyRunningError().message });
    }

    runScan({ refreshSymbols: body.data.refreshSymbols === true, trigger: 'api' }).catch((err: unknown) => {
      if (err instanceof AlreadyRunningError || err instanceof ScanStoppedError) {
        console.warn(`[api] Scan did not complete: ${err.message}`);
        return;
      }
      console.error(`[api] Background scan failed: ${errorMessage(err)}`);
    });

    return res.code(202).send({ message: 'Scan started', scanId: getScanStatus().scan_id });
  });

  app.get('/api/symbols/count', async (_req: FastifyRequest, res: FastifyReply) => {
    const count = await getCachedSymbolCount();
    return res.code(200).send({ count, cached: count > 0 });
  });

  app.get('/api/log', async (_req: FastifyRequest, res: FastifyReply) => {
    try {
      const lines = await readLogTail();
      return res.code(200).send({ lines });
    } catch (err: unknown) {
      console.error(`[api] Failed to read scan log: ${errorMessage(err)}`);
      return res.code(500).send({ error: 'Failed to read scan log' });
    }
  });
}

export { registerScanRoutes };

import Fastify, { type FastifyInstance } from 'fastify';
import type { Registry } from 'prom-client';
import type { ScanSnapshot } from './data/schemas.js';
import type { ScanStatusPayload } from './lib/ScanState.js';
import { registerRequestLogging, type StructuredLogger } from './middleware.js';
import { registerHealthRoutes } from './routes/healthRoutes.js';
import { registerScanRoutes } from './routes/scanRoutes.js';
import { buildHealthPayload } from './services/healthService.js';
import type { RunScanOptions } from './services/scanCoordinator.js';

export interface AppDeps {
  scanner: {
    runScan(options: RunScanOptions): Promise<ScanSnapshot>;
    isRunning(): boolean;
    getStatus(): ScanStatusPayload;
  };
  store: { latest(): ScanSnapshot | null };
  directory: { cachedCount(): Promise<number> };
  metricsRegistry: Registry;
  readLogTail: () => Promise<string[]>;
  getSchedulerStatus: () => { enabled: boolean; nextRunUtc: string | null };
  isShuttingDown?: () => boolean;
  scanSecret?: string;
  /** Receives request_start / request_end lines; omit to skip request logs. */
  requestLogger?: StructuredLogger | null;
}

export function buildApp(deps: AppDeps): FastifyInstance {
  const startedAtMs = Date.now();
  const app = Fastify({ logger: false });
  registerRequestLogging(app, deps.requestLogger ?? null);

  registerScanRoutes({
    app,
    scanSecret: deps.scanSecret,
    runScan: (options) => deps.scanner.runScan(options),
    isScanRunning: () => deps.scanner.isRunning(),
    getScanStatus: () => deps.scanner.getStatus(),
    getLatestResults: () => deps.store.latest(),
    getCachedSymbolCount: () => deps.directory.cachedCount(),
    readLogTail: deps.readLogTail,
  });

  registerHealthRoutes({
    app,
    metricsRegistry: deps.metricsRegistry,
    getHealthPayload: () =>
      buildHealthPayload({
        isShuttingDown: deps.isShuttingDown?.() ?? false,
        nowIso: new Date().toISOString(),
        uptimeSeconds: Math.floor((Date.now() - startedAtMs) / 1000),
        scanRunning: deps.scanner.isRunning(),
        latest: deps.store.latest(),
        scheduler: deps.getSchedulerStatus(),
      }),
  });

  return app;
}

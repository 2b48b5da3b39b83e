import test from 'node:test';
import assert from 'node:assert/strict';
import client from 'prom-client';

import { buildApp, type AppDeps } from '../server/app.js';
import type { StructuredLogger } from '../server/middleware.js';
import { emptyResultsPayload } from '../server/routes/scanRoutes.js';
import { ScanState, type ScanStatusPayload } from '../server/lib/ScanState.js';
import type { RunScanOptions } from '../server/services/scanCoordinator.js';
import type { ScanSnapshot } from '../server/data/schemas.js';
import { okRecord, snapshot } from './fixtures.js';

interface HealthBody {
  status: string;
  degraded: boolean;
  warnings: string[];
  lastScanId: string | null;
  scheduler: { enabled: boolean; nextRunUtc: string | null };
}

interface Harness {
  deps: AppDeps;
  runCalls: RunScanOptions[];
}

function statusPayload(overrides: Partial<ScanStatusPayload> = {}): ScanStatusPayload {
  return { ...new ScanState('test').getStatus(), ...overrides };
}

function harness(overrides: Partial<AppDeps> = {}, state: { running?: boolean; latest?: ScanSnapshot | null } = {}): Harness {
  const runCalls: RunScanOptions[] = [];
  const registry = new client.Registry();
  new client.Counter({ name: 'test_scans_total', help: 'test counter', registers: [registry] });
  const deps: AppDeps = {
    scanner: {
      runScan: async (options) => {
        runCalls.push(options);
        return snapshot('scan-1');
      },
      isRunning: () => state.running ?? false,
      getStatus: () => statusPayload({ scan_id: 'scan-1', status: 'running', running: true }),
    },
    store: { latest: () => state.latest ?? null },
    directory: { cachedCount: async () => 2 },
    metricsRegistry: registry,
    readLogTail: async () => ['line one', 'line two'],
    getSchedulerStatus: () => ({ enabled: true, nextRunUtc: '2026-10-19T10:01:00.000Z' }),
    ...overrides,
  };
  return { deps, runCalls };
}

test('GET /api/results serves an empty payload before the first scan', async () => {
  const app = buildApp(harness().deps);
  const res = await app.inject({ method: 'GET', url: '/api/results' });
  assert.equal(res.statusCode, 200);
  assert.deepEqual(res.json(), emptyResultsPayload());
  await app.close();
});

test('GET /api/results serves the latest snapshot', async () => {
  const latest = snapshot('scan-7', [okRecord('AAA.NS', true), okRecord('BBB.NS', false)]);
  const app = buildApp(harness({}, { latest }).deps);
  const res = await app.inject({ method: 'GET', url: '/api/results' });
  const body = res.json<ScanSnapshot>();
  assert.equal(body.scanId, 'scan-7');
  assert.equal(body.athCount, 1);
  assert.deepEqual(
    body.athRecords.map((r) => r.ticker),
    ['AAA.NS'],
  );
  await app.close();
});

test('GET /api/status returns the scanner status', async () => {
  const app = buildApp(harness().deps);
  const res = await app.inject({ method: 'GET', url: '/api/status' });
  assert.equal(res.statusCode, 200);
  const status = res.json<ScanStatusPayload>();
  assert.equal(status.scan_id, 'scan-1');
  assert.equal(status.running, true);
  await app.close();
});

test('POST /api/scan starts a scan and answers 202', async () => {
  const h = harness();
  const app = buildApp(h.deps);
  const res = await app.inject({ method: 'POST', url: '/api/scan', payload: { refreshSymbols: true } });
  assert.equal(res.statusCode, 202);
  assert.deepEqual(res.json(), { message: 'Scan started', scanId: 'scan-1' });
  assert.deepEqual(h.runCalls, [{ refreshSymbols: true, trigger: 'api' }]);
  await app.close();
});

test('POST /api/scan without a body defaults to the cached universe', async () => {
  const h = harness();
  const app = buildApp(h.deps);
  const res = await app.inject({ method: 'POST', url: '/api/scan' });
  assert.equal(res.statusCode, 202);
  assert.deepEqual(h.runCalls, [{ refreshSymbols: false, trigger: 'api' }]);
  await app.close();
});

test('POST /api/scan answers 409 while a scan is running', async () => {
  const h = harness({}, { running: true });
  const app = buildApp(h.deps);
  const res = await app.inject({ method: 'POST', url: '/api/scan' });
  assert.equal(res.statusCode, 409);
  assert.deepEqual(res.json(), { error: 'Scan already running' });
  assert.equal(h.runCalls.length, 0);
  await app.close();
});

test('POST /api/scan rejects a malformed body', async () => {
  const h = harness();
  const app = buildApp(h.deps);
  const res = await app.inject({ method: 'POST', url: '/api/scan', payload: { refreshSymbols: 'yes' } });
  assert.equal(res.statusCode, 400);
  assert.deepEqual(res.json(), { error: 'Invalid body: refreshSymbols Expected boolean, received string' });
  assert.equal(h.runCalls.length, 0);
  await app.close();
});

test('POST /api/scan requires the shared secret when one is configured', async () => {
  const h = harness({ scanSecret: 'test-secret' });
  const app = buildApp(h.deps);

  const missing = await app.inject({ method: 'POST', url: '/api/scan' });
  assert.equal(missing.statusCode, 401);
  assert.deepEqual(missing.json(), { error: 'Unauthorized' });

  const wrong = await app.inject({ method: 'POST', url: '/api/scan', headers: { 'x-scan-secret': 'nope' } });
  assert.equal(wrong.statusCode, 401);

  const viaHeader = await app.inject({ method: 'POST', url: '/api/scan', headers: { 'x-scan-secret': 'test-secret' } });
  assert.equal(viaHeader.statusCode, 202);

  const viaQuery = await app.inject({ method: 'POST', url: '/api/scan?secret=test-secret' });
  assert.equal(viaQuery.statusCode, 202);
  assert.equal(h.runCalls.length, 2);
  await app.close();
});

test('GET /api/symbols/count reports the cached universe size', async () => {
  const app = buildApp(harness().deps);
  const res = await app.inject({ method: 'GET', url: '/api/symbols/count' });
  assert.deepEqual(res.json(), { count: 2, cached: true });
  await app.close();

  const empty = buildApp(harness({ directory: { cachedCount: async () => 0 } }).deps);
  const none = await empty.inject({ method: 'GET', url: '/api/symbols/count' });
  assert.deepEqual(none.json(), { count: 0, cached: false });
  await empty.close();
});

test('GET /api/log returns the log tail and 500 when it cannot be read', async () => {
  const app = buildApp(harness().deps);
  const res = await app.inject({ method: 'GET', url: '/api/log' });
  assert.deepEqual(res.json(), { lines: ['line one', 'line two'] });
  await app.close();

  const broken = buildApp(
    harness({
      readLogTail: async () => {
        throw new Error('EACCES');
      },
    }).deps,
  );
  const failed = await broken.inject({ method: 'GET', url: '/api/log' });
  assert.equal(failed.statusCode, 500);
  assert.deepEqual(failed.json(), { error: 'Failed to read scan log' });
  await broken.close();
});

test('GET /healthz reports a degraded state before the first scan', async () => {
  const app = buildApp(harness().deps);
  const res = await app.inject({ method: 'GET', url: '/healthz' });
  assert.equal(res.statusCode, 200);
  const body = res.json<HealthBody>();
  assert.equal(body.status, 'ok');
  assert.equal(body.degraded, true);
  assert.deepEqual(body.warnings, ['no scan results published yet']);
  assert.equal(body.lastScanId, null);
  assert.deepEqual(body.scheduler, { enabled: true, nextRunUtc: '2026-10-19T10:01:00.000Z' });
  await app.close();
});

test('GET /metrics serves the registry in text format', async () => {
  const app = buildApp(harness().deps);
  const res = await app.inject({ method: 'GET', url: '/metrics' });
  assert.equal(res.statusCode, 200);
  assert.equal(res.headers['content-type'], client.Registry.PROMETHEUS_CONTENT_TYPE);
  assert.ok(res.body.split('\n').includes('test_scans_total 0'));
  await app.close();
});

test('every response carries an x-request-id, echoing the caller value', async () => {
  const app = buildApp(harness().deps);
  const echoed = await app.inject({ method: 'GET', url: '/api/status', headers: { 'x-request-id': 'req-42' } });
  assert.equal(echoed.headers['x-request-id'], 'req-42');
  const generated = await app.inject({ method: 'GET', url: '/api/status' });
  assert.equal(typeof generated.headers['x-request-id'], 'string');
  assert.notEqual(generated.headers['x-request-id'], '');
  await app.close();
});

test('request logs go to the injected logger for API paths only', async () => {
  const lines: Array<Record<string, unknown>> = [];
  const capture = (obj: Record<string, unknown>) => {
    lines.push(obj);
  };
  const requestLogger: StructuredLogger = { info: capture, warn: capture, error: capture };
  const app = buildApp(harness({ requestLogger }).deps);

  await app.inject({ method: 'GET', url: '/api/status?verbose=1', headers: { 'x-request-id': 'req-7' } });
  await app.inject({ method: 'GET', url: '/metrics' });

  assert.deepEqual(
    lines.map((line) => line.event),
    ['request_start', 'request_end'],
  );
  assert.deepEqual(lines[0], { event: 'request_start', requestId: 'req-7', method: 'GET', path: '/api/status' });
  assert.equal(lines[1].requestId, 'req-7');
  assert.equal(lines[1].statusCode, 200);
  assert.equal(lines[1].path, '/api/status');
  assert.equal(typeof lines[1].durationMs, 'number');
  await app.close();
});

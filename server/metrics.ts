import client from 'prom-client';

// Collect default metrics (memory, CPU, event loop, etc.)
client.collectDefaultMetrics({
  labels: { app: 'ath-scanner' },
});

export const scansTotal = new client.Counter({
  name: 'ath_scans_total',
  help: 'Scans finished, by outcome',
  labelNames: ['outcome'],
});

export const scanSymbolsTotal = new client.Counter({
  name: 'ath_scan_symbols_total',
  help: 'Symbols evaluated by scans, by record status',
  labelNames: ['status'],
});

export const scanDurationSeconds = new client.Histogram({
  name: 'ath_scan_duration_seconds',
  help: 'Wall-clock duration of completed scans',
  buckets: [60, 300, 600, 1200, 1800, 3600, 7200],
});

export const lastScanAthCount = new client.Gauge({
  name: 'ath_last_scan_ath_count',
  help: 'Stocks flagged at an all-time high by the last published scan',
});

export const historyFetchAttemptsTotal = new client.Counter({
  name: 'ath_history_fetch_attempts_total',
  help: 'Price-history HTTP attempts, by outcome',
  labelNames: ['outcome'],
});

export function recordFetchAttempt(outcome: string): void {
  historyFetchAttemptsTotal.inc({ outcome });
}

export const metricsRegistry = client.register;

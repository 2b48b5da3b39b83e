/**
 * ScanCoordinator: one full pass over the symbol universe.
 *
 * Owns the run-state token (via ScanState), fans history fetches out over a
 * bounded worker pool, folds every per-symbol outcome into a ScanRecord and
 * publishes one immutable snapshot at the end. Per-symbol failures never
 * abort the run; directory and storage failures do.
 */

import { v4 as uuidv4 } from 'uuid';
import {
  ATH_THRESHOLD,
  SCAN_CONCURRENCY,
  SCAN_INCLUDE_ALL_RECORDS,
  SCAN_PROGRESS_LOG_EVERY,
} from '../config.js';
import type { SnapshotStore } from '../data/resultStore.js';
import {
  SNAPSHOT_SCHEMA_VERSION,
  type ListedSymbol,
  type ScanRecord,
  type ScanSnapshot,
  type SymbolUniverse,
} from '../data/schemas.js';
import { formatScanDate, formatScanTime } from '../lib/dateUtils.js';
import { FetchError, ScanStoppedError, StorageError, errorMessage } from '../lib/errors.js';
import { mapWithConcurrency, type Settled } from '../lib/mapWithConcurrency.js';
import { ScanState, type ScanStatusPayload } from '../lib/ScanState.js';
import { lastScanAthCount, scanDurationSeconds, scanSymbolsTotal, scansTotal } from '../metrics.js';
import { evaluateAth } from './athRule.js';
import type { FetchResult } from './historyFetcher.js';

export interface ScanCoordinatorDeps {
  directory: { getUniverse(forceRefresh: boolean): Promise<SymbolUniverse> };
  fetcher: { fetchHistory(symbol: ListedSymbol, signal?: AbortSignal | null): Promise<FetchResult> };
  store: Pick<SnapshotStore, 'publish'>;
  concurrency?: number;
  progressLogEvery?: number;
  includeAllRecords?: boolean;
  threshold?: number;
  now?: () => Date;
  newScanId?: () => string;
}

export interface RunScanOptions {
  refreshSymbols?: boolean;
  trigger?: string;
}

function compareRecords(a: ScanRecord, b: ScanRecord): number {
  if (a.exchange !== b.exchange) return a.exchange < b.exchange ? -1 : 1;
  if (a.ticker !== b.ticker) return a.ticker < b.ticker ? -1 : 1;
  return 0;
}

function failureRecord(symbol: ListedSymbol, error: FetchError): ScanRecord {
  return {
    ticker: symbol.ticker,
    exchange: symbol.exchange,
    name: symbol.name,
    series: symbol.series,
    status: error.kind === 'NotFound' ? 'DATA_UNAVAILABLE' : 'FETCH_ERROR',
    latestClose: null,
    latestDate: null,
    highClose: null,
    highDate: null,
    ratio: null,
    isAth: false,
    points: 0,
    errorKind: error.kind,
    errorMessage: error.message,
  };
}

/** Classify one fetch outcome into a record. */
export function buildScanRecord(symbol: ListedSymbol, result: FetchResult, threshold: number = ATH_THRESHOLD): ScanRecord {
  if (!result.ok) return failureRecord(symbol, result.error);
  const evaluation = evaluateAth(result.series, threshold);
  if (!evaluation) {
    return failureRecord(symbol, new FetchError('NotFound', `${symbol.ticker} returned no closes`));
  }
  return {
    ticker: symbol.ticker,
    exchange: symbol.exchange,
    name: symbol.name,
    series: symbol.series,
    status: 'OK',
    latestClose: evaluation.latestClose,
    latestDate: evaluation.latestDate,
    highClose: evaluation.highClose,
    highDate: evaluation.highDate,
    ratio: evaluation.ratio,
    isAth: evaluation.isAth,
    points: result.series.points.length,
    errorKind: null,
    errorMessage: null,
  };
}

function formatCurrency(value: number | null): string {
  return value === null ? '-' : `₹${value.toFixed(2)}`;
}

export class ScanCoordinator {
  readonly state: ScanState;
  private readonly deps: ScanCoordinatorDeps;
  private readonly now: () => Date;
  private readonly newScanId: () => string;

  constructor(deps: ScanCoordinatorDeps, state: ScanState = new ScanState('ath-scan')) {
    this.deps = deps;
    this.state = state;
    this.now = deps.now ?? (() => new Date());
    this.newScanId = deps.newScanId ?? (() => uuidv4());
  }

  isRunning(): boolean {
    return this.state.isRunning;
  }

  progress(): { completed: number; total: number } {
    return this.state.progress();
  }

  getStatus(): ScanStatusPayload {
    return this.state.getStatus();
  }

  /** Abort the current run. It will publish nothing. Returns false when idle. */
  requestStop(): boolean {
    const stopping = this.state.requestStop();
    if (stopping) console.log('[scan] Stop requested');
    return stopping;
  }

  /**
   * Run one scan and publish its snapshot. Rejects with AlreadyRunningError
   * when a scan is in progress, ScanStoppedError after requestStop(), and
   * with the directory or storage error when either fails.
   */
  async runScan(options: RunScanOptions = {}): Promise<ScanSnapshot> {
    const startedAt = this.now();
    const scanId = this.newScanId();
    // Throws before any await when a run already holds the token.
    const abortController = this.state.beginRun(scanId, startedAt.toISOString());
    const trigger = String(options.trigger || 'manual').trim() || 'manual';
    console.log(`[scan] Scan ${scanId} started (trigger: ${trigger})`);

    try {
      const universe = await this.deps.directory.getUniverse(Boolean(options.refreshSymbols));
      if (this.state.shouldStop) throw new ScanStoppedError();

      const records = await this.scanUniverse(universe.symbols, abortController.signal, startedAt);
      if (this.state.shouldStop) throw new ScanStoppedError();

      const finishedAt = this.now();
      const snapshot = this.buildSnapshot(scanId, startedAt, finishedAt, universe, records);
      await this.deps.store.publish(snapshot);

      this.state.markCompleted(finishedAt.toISOString());
      scansTotal.inc({ outcome: 'completed' });
      scanDurationSeconds.observe(snapshot.durationMs / 1000);
      lastScanAthCount.set(snapshot.athCount);
      console.log(
        `[scan] Scan complete in ${Math.round(snapshot.durationMs / 1000)}s | ATH stocks: ${snapshot.athCount} of ${snapshot.totalSymbols} (${snapshot.failed} failed)`,
      );
      return snapshot;
    } catch (err: unknown) {
      const finishedAt = this.now().toISOString();
      if (!(err instanceof StorageError) && (err instanceof ScanStoppedError || this.state.isStopping)) {
        this.state.markStopped(finishedAt);
        scansTotal.inc({ outcome: 'stopped' });
        console.warn(`[scan] Scan ${scanId} stopped; nothing published`);
        throw err instanceof ScanStoppedError ? err : new ScanStoppedError();
      }
      const message = errorMessage(err);
      this.state.markFailed(finishedAt, message);
      scansTotal.inc({ outcome: 'failed' });
      console.error(`[scan] Scan ${scanId} failed: ${message}`);
      throw err;
    } finally {
      this.state.cleanup(abortController);
    }
  }

  private async scanUniverse(
    symbols: readonly ListedSymbol[],
    signal: AbortSignal,
    startedAt: Date,
  ): Promise<ScanRecord[]> {
    const total = symbols.length;
    const concurrency = this.deps.concurrency ?? SCAN_CONCURRENCY;
    const logEvery = Math.max(1, this.deps.progressLogEvery ?? SCAN_PROGRESS_LOG_EVERY);
    const threshold = this.deps.threshold ?? ATH_THRESHOLD;
    this.state.setTotal(total);
    console.log(`[scan] Scanning ${total} equity symbols with ${concurrency} workers`);

    let processed = 0;
    let failed = 0;
    let athCount = 0;

    const onSettled = (settled: Settled<ScanRecord>, _index: number, symbol: ListedSymbol) => {
      if (this.state.shouldStop) return;
      processed += 1;
      const record = 'error' in settled ? null : settled;
      if (!record || record.status !== 'OK') failed += 1;
      if (record?.isAth) {
        athCount += 1;
        console.log(`[scan] ★ ATH: ${symbol.ticker} — ${symbol.name || symbol.ticker} @ ${formatCurrency(record.latestClose)}`);
      }
      this.state.updateProgress(processed, failed, athCount);

      if (processed % logEvery === 0) {
        const elapsedMs = this.now().getTime() - startedAt.getTime();
        const rate = elapsedMs > 0 ? processed / elapsedMs : 0;
        const etaSeconds = rate > 0 ? Math.round((total - processed) / rate / 1000) : 0;
        console.log(
          `[scan] Progress: ${processed}/${total} (${Math.floor((processed * 100) / total)}%) | ATH found: ${athCount} | ETA: ${etaSeconds}s`,
        );
      }
    };

    const results = await mapWithConcurrency(
      symbols,
      concurrency,
      async (symbol) => buildScanRecord(symbol, await this.deps.fetcher.fetchHistory(symbol, signal), threshold),
      onSettled,
      () => this.state.shouldStop,
    );

    if (this.state.shouldStop) return [];

    return results.map((settled, index) => {
      if (!('error' in settled)) return settled;
      const symbol = symbols[index];
      const error = new FetchError('Upstream', errorMessage(settled.error));
      console.error(`[scan] ${symbol.ticker} worker failed: ${error.message}`);
      return failureRecord(symbol, error);
    });
  }

  private buildSnapshot(
    scanId: string,
    startedAt: Date,
    finishedAt: Date,
    universe: SymbolUniverse,
    unordered: readonly ScanRecord[],
  ): ScanSnapshot {
    const records = [...unordered].sort(compareRecords);
    let succeeded = 0;
    let dataUnavailable = 0;
    let fetchErrors = 0;
    for (const record of records) {
      if (record.status === 'OK') succeeded += 1;
      else if (record.status === 'DATA_UNAVAILABLE') dataUnavailable += 1;
      else fetchErrors += 1;
      scanSymbolsTotal.inc({ status: record.status });
    }
    const athRecords = records.filter((record) => record.isAth);
    const includeAll = this.deps.includeAllRecords ?? SCAN_INCLUDE_ALL_RECORDS;

    return {
      schemaVersion: SNAPSHOT_SCHEMA_VERSION,
      scanId,
      startedAt: startedAt.toISOString(),
      finishedAt: finishedAt.toISOString(),
      durationMs: Math.max(0, finishedAt.getTime() - startedAt.getTime()),
      scanDate: formatScanDate(finishedAt),
      scanTime: formatScanTime(finishedAt),
      universeGeneratedAt: universe.generatedAt,
      totalSymbols: records.length,
      succeeded,
      failed: dataUnavailable + fetchErrors,
      dataUnavailable,
      fetchErrors,
      athCount: athRecords.length,
      sourceErrors: universe.sourceErrors,
      athRecords,
      records: includeAll ? records : null,
    };
  }
}

import type { ListedSymbol, ScanRecord, ScanSnapshot } from '../server/data/schemas.js';

export function listedSymbol(ticker: string, overrides: Partial<ListedSymbol> = {}): ListedSymbol {
  return {
    ticker,
    exchange: ticker.endsWith('.BO') ? 'BSE' : 'NSE',
    name: `${ticker.split('.')[0]} Ltd`,
    series: 'EQ',
    ...overrides,
  };
}

export function okRecord(ticker: string, isAth: boolean): ScanRecord {
  return {
    ...listedSymbol(ticker),
    status: 'OK',
    latestClose: isAth ? 100 : 80,
    latestDate: '2026-10-16',
    highClose: 100,
    highDate: '2026-09-01',
    ratio: isAth ? 1 : 0.8,
    isAth,
    points: 1200,
    errorKind: null,
    errorMessage: null,
  };
}

export function snapshot(scanId: string, records: ScanRecord[] = []): ScanSnapshot {
  const athRecords = records.filter((r) => r.isAth);
  return {
    schemaVersion: 1,
    scanId,
    startedAt: '2026-10-19T10:01:00.000Z',
    finishedAt: '2026-10-19T10:31:00.000Z',
    durationMs: 1_800_000,
    scanDate: '19 Oct 2026',
    scanTime: '04:01 PM IST',
    universeGeneratedAt: '2026-10-18T00:00:00.000Z',
    totalSymbols: records.length,
    succeeded: records.length,
    failed: 0,
    dataUnavailable: 0,
    fetchErrors: 0,
    athCount: athRecords.length,
    sourceErrors: [],
    athRecords,
    records,
  };
}

/** Minimal Response stand-in for an injected fetch. */
export function textResponse(status: number, body: string, headers: Record<string, string> = {}): Response {
  return new Response(body, { status, headers });
}

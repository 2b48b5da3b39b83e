/**
 * Domain types for the scanner and the zod schemas of the two on-disk
 * artifacts (symbol universe cache and result snapshot). Both files are
 * versioned so a future shape change is detected instead of misread.
 */

import { z } from 'zod';

export const UNIVERSE_SCHEMA_VERSION = 1;
export const SNAPSHOT_SCHEMA_VERSION = 1;

export const EXCHANGES = ['NSE', 'BSE'] as const;
export const ExchangeSchema = z.enum(EXCHANGES);
export type Exchange = z.infer<typeof ExchangeSchema>;

export const SymbolSchema = z.object({
  ticker: z.string().min(1),
  exchange: ExchangeSchema,
  name: z.string(),
  series: z.string(),
});
export type ListedSymbol = z.infer<typeof SymbolSchema>;

export const SourceFailureSchema = z.object({
  source: z.string(),
  message: z.string(),
});

export const SymbolUniverseSchema = z.object({
  generatedAt: z.string(),
  symbols: z.array(SymbolSchema),
  sourceErrors: z.array(SourceFailureSchema),
});
export type SymbolUniverse = z.infer<typeof SymbolUniverseSchema>;

export interface PricePoint {
  /** Exchange-local trading date, YYYY-MM-DD. */
  date: string;
  close: number;
}

/** Daily closes, ascending by date, strictly increasing, closes > 0. */
export interface PriceSeries {
  ticker: string;
  points: readonly PricePoint[];
}

export const SCAN_RECORD_STATUSES = ['OK', 'DATA_UNAVAILABLE', 'FETCH_ERROR'] as const;
export const ScanRecordStatusSchema = z.enum(SCAN_RECORD_STATUSES);
export type ScanRecordStatus = z.infer<typeof ScanRecordStatusSchema>;

export const ScanRecordSchema = z.object({
  ticker: z.string(),
  exchange: ExchangeSchema,
  name: z.string(),
  series: z.string(),
  status: ScanRecordStatusSchema,
  latestClose: z.number().nullable(),
  latestDate: z.string().nullable(),
  highClose: z.number().nullable(),
  highDate: z.string().nullable(),
  ratio: z.number().nullable(),
  isAth: z.boolean(),
  points: z.number().int().nonnegative(),
  errorKind: z.string().nullable(),
  errorMessage: z.string().nullable(),
});
export type ScanRecord = z.infer<typeof ScanRecordSchema>;

export const ScanSnapshotSchema = z.object({
  schemaVersion: z.literal(SNAPSHOT_SCHEMA_VERSION),
  scanId: z.string(),
  startedAt: z.string(),
  finishedAt: z.string(),
  durationMs: z.number().nonnegative(),
  scanDate: z.string(),
  scanTime: z.string(),
  universeGeneratedAt: z.string(),
  totalSymbols: z.number().int().nonnegative(),
  succeeded: z.number().int().nonnegative(),
  failed: z.number().int().nonnegative(),
  dataUnavailable: z.number().int().nonnegative(),
  fetchErrors: z.number().int().nonnegative(),
  athCount: z.number().int().nonnegative(),
  sourceErrors: z.array(SourceFailureSchema),
  athRecords: z.array(ScanRecordSchema),
  records: z.array(ScanRecordSchema).nullable(),
});
export type ScanSnapshot = z.infer<typeof ScanSnapshotSchema>;

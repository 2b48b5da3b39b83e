/**
 * Exchange symbol-list sources.
 *
 * NSE publishes its equity list as CSV; BSE serves its scrip list as JSON.
 * Each source turns one HTTP response into normalized ListedSymbol records
 * and throws on any transport or format problem; the directory decides what
 * a failed source means for the refresh.
 */

import { parse } from 'csv-parse/sync';
import { z } from 'zod';
import {
  BSE_SCRIP_LIST_URL,
  HTTP_USER_AGENT,
  NSE_EQUITY_LIST_URL,
  SYMBOL_SOURCE_TIMEOUT_MS,
} from '../config.js';
import { BseScripListSchema, validateApiResponse } from '../lib/apiSchemas.js';
import { fetchTextWithTimeout, type FetchLike } from '../lib/httpText.js';
import type { Exchange, ListedSymbol } from '../data/schemas.js';

export interface SymbolSource {
  readonly name: Exchange;
  fetchSymbols(signal?: AbortSignal | null): Promise<ListedSymbol[]>;
}

export interface SymbolSourceOptions {
  fetchImpl?: FetchLike;
  url?: string;
  timeoutMs?: number;
  userAgent?: string;
}

const CsvRowsSchema = z.array(z.record(z.string()));

async function fetchSourceText(
  label: string,
  url: string,
  fetchImpl: FetchLike,
  timeoutMs: number,
  headers: Record<string, string>,
  signal?: AbortSignal | null,
): Promise<string> {
  const result = await fetchTextWithTimeout(fetchImpl, url, { label, timeoutMs, signal, headers });
  if (result.kind === 'timeout') {
    throw new Error(`${label} symbol list timed out after ${result.timeoutMs}ms`);
  }
  if (result.status < 200 || result.status >= 300) {
    throw new Error(`${label} symbol list request failed (${result.status})`);
  }
  return result.text;
}

/** Parse the NSE equity CSV. Header names are trimmed; unknown columns are ignored. */
export function parseNseEquityCsv(text: string): ListedSymbol[] {
  const raw: unknown = parse(text, {
    columns: (header: string[]) => header.map((column) => column.trim()),
    skip_empty_lines: true,
    relax_column_count: true,
    trim: true,
    bom: true,
  });
  const rows = CsvRowsSchema.parse(raw);
  const symbols: ListedSymbol[] = [];
  for (const row of rows) {
    const symbol = String(row['SYMBOL'] ?? '').trim();
    if (!symbol || symbol === 'SYMBOL') continue;
    symbols.push({
      ticker: `${symbol}.NS`,
      exchange: 'NSE',
      name: String(row['NAME OF COMPANY'] ?? '').trim(),
      series: String(row['SERIES'] ?? '').trim(),
    });
  }
  return symbols;
}

/** Parse the BSE scrip list (`{ Table: [...] }` or a bare array). */
export function parseBseScripList(payload: unknown): ListedSymbol[] {
  const list = validateApiResponse(BseScripListSchema, payload, 'BSE scrip list');
  if (!list) throw new Error('BSE scrip list has an unexpected shape');
  const items = Array.isArray(list) ? list : list.Table;
  const symbols: ListedSymbol[] = [];
  for (const item of items) {
    const scrip = String(item.short_name ?? '').trim();
    if (!scrip) continue;
    symbols.push({
      ticker: `${scrip}.BO`,
      exchange: 'BSE',
      name: String(item.LONGNAME ?? item.Scrip_Name ?? '').trim(),
      series: 'EQ',
    });
  }
  return symbols;
}

export class NseEquitySource implements SymbolSource {
  readonly name = 'NSE';
  private readonly fetchImpl: FetchLike;
  private readonly url: string;
  private readonly timeoutMs: number;
  private readonly userAgent: string;

  constructor(options: SymbolSourceOptions = {}) {
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.url = options.url ?? NSE_EQUITY_LIST_URL;
    this.timeoutMs = options.timeoutMs ?? SYMBOL_SOURCE_TIMEOUT_MS;
    this.userAgent = options.userAgent ?? HTTP_USER_AGENT;
  }

  async fetchSymbols(signal?: AbortSignal | null): Promise<ListedSymbol[]> {
    const text = await fetchSourceText(
      this.name,
      this.url,
      this.fetchImpl,
      this.timeoutMs,
      { 'User-Agent': this.userAgent, Accept: '*/*' },
      signal,
    );
    const symbols = parseNseEquityCsv(text);
    console.log(`[symbols] NSE: ${symbols.length} symbols fetched`);
    return symbols;
  }
}

export class BseScripSource implements SymbolSource {
  readonly name = 'BSE';
  private readonly fetchImpl: FetchLike;
  private readonly url: string;
  private readonly timeoutMs: number;
  private readonly userAgent: string;

  constructor(options: SymbolSourceOptions = {}) {
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.url = options.url ?? BSE_SCRIP_LIST_URL;
    this.timeoutMs = options.timeoutMs ?? SYMBOL_SOURCE_TIMEOUT_MS;
    this.userAgent = options.userAgent ?? HTTP_USER_AGENT;
  }

  async fetchSymbols(signal?: AbortSignal | null): Promise<ListedSymbol[]> {
    const text = await fetchSourceText(
      this.name,
      this.url,
      this.fetchImpl,
      this.timeoutMs,
      { 'User-Agent': this.userAgent, Accept: 'application/json' },
      signal,
    );
    let payload: unknown;
    try {
      payload = JSON.parse(text);
    } catch {
      throw new Error('BSE scrip list is not valid JSON');
    }
    const symbols = parseBseScripList(payload);
    console.log(`[symbols] BSE: ${symbols.length} symbols fetched`);
    return symbols;
  }
}

export function createDefaultSymbolSources(fetchImpl?: FetchLike): SymbolSource[] {
  return [new NseEquitySource({ fetchImpl }), new BseScripSource({ fetchImpl })];
}

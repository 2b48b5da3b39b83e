import { SYMBOL_CACHE_MAX_AGE_MS } from '../config.js';
import type { UniverseCacheStore } from '../data/resultStore.js';
import type { ListedSymbol, SymbolUniverse } from '../data/schemas.js';
import { SourceUnavailableError, errorMessage, type SourceFailure } from '../lib/errors.js';
import type { SymbolSource } from './symbolSources.js';

/** NSE series that trade as ordinary equity (rolling, trade-for-trade, SME, …). */
export const NSE_EQUITY_SERIES: ReadonlySet<string> = new Set(['EQ', 'BE', 'BZ', 'SM', 'ST', 'N', 'W', 'M', '']);

export interface SymbolDirectoryOptions {
  sources: readonly SymbolSource[];
  cache: UniverseCacheStore;
  maxAgeMs?: number;
  now?: () => Date;
}

export function isEquitySymbol(symbol: ListedSymbol): boolean {
  return symbol.exchange === 'BSE' || NSE_EQUITY_SERIES.has(symbol.series);
}

/** Equity filter plus (ticker, exchange) dedupe; the first occurrence wins. */
export function normalizeSymbols(symbols: readonly ListedSymbol[]): ListedSymbol[] {
  const seen = new Set<string>();
  const out: ListedSymbol[] = [];
  for (const symbol of symbols) {
    if (!isEquitySymbol(symbol)) continue;
    const key = `${symbol.exchange}:${symbol.ticker}`;
    if (seen.has(key)) continue;
    seen.add(key);
    out.push(symbol);
  }
  return out;
}

/**
 * Owns the symbol universe. Serves the on-disk cache while it is fresh and
 * refreshes from the exchange sources otherwise. Concurrent callers during
 * a refresh share the same in-flight promise.
 */
export class SymbolDirectory {
  private readonly sources: readonly SymbolSource[];
  private readonly cache: UniverseCacheStore;
  private readonly maxAgeMs: number;
  private readonly now: () => Date;
  private cached: SymbolUniverse | null = null;
  private cacheLoaded = false;
  private inFlightRefresh: Promise<SymbolUniverse> | null = null;

  constructor(options: SymbolDirectoryOptions) {
    this.sources = options.sources;
    this.cache = options.cache;
    this.maxAgeMs = options.maxAgeMs ?? SYMBOL_CACHE_MAX_AGE_MS;
    this.now = options.now ?? (() => new Date());
  }

  async getUniverse(forceRefresh = false): Promise<SymbolUniverse> {
    const cached = await this.loadCached();
    if (!forceRefresh && cached && cached.symbols.length > 0 && this.isFresh(cached)) {
      console.log(`[symbols] Loaded ${cached.symbols.length} symbols from cache`);
      return cached;
    }

    if (!this.inFlightRefresh) {
      this.inFlightRefresh = this.refresh().finally(() => {
        this.inFlightRefresh = null;
      });
    }
    return this.inFlightRefresh;
  }

  /** Size of the cached universe, without touching the network. */
  async cachedCount(): Promise<number> {
    const cached = await this.loadCached();
    return cached ? cached.symbols.length : 0;
  }

  private isFresh(universe: SymbolUniverse): boolean {
    const generatedMs = Date.parse(universe.generatedAt);
    if (!Number.isFinite(generatedMs)) return false;
    return this.now().getTime() - generatedMs < this.maxAgeMs;
  }

  private async loadCached(): Promise<SymbolUniverse | null> {
    if (!this.cacheLoaded) {
      this.cached = await this.cache.loadUniverse();
      this.cacheLoaded = true;
    }
    return this.cached;
  }

  private async refresh(): Promise<SymbolUniverse> {
    console.log(`[symbols] Fetching symbol lists from ${this.sources.map((s) => s.name).join(' + ')}...`);
    const settled = await Promise.allSettled(this.sources.map((source) => source.fetchSymbols()));

    const failures: SourceFailure[] = [];
    const merged: ListedSymbol[] = [];
    settled.forEach((outcome, index) => {
      const source = this.sources[index].name;
      if (outcome.status === 'rejected') {
        const message = errorMessage(outcome.reason);
        console.error(`[symbols] ${source} fetch error: ${message}`);
        failures.push({ source, message });
        return;
      }
      if (outcome.value.length === 0) {
        failures.push({ source, message: 'source returned no symbols' });
        return;
      }
      merged.push(...outcome.value);
    });

    const symbols = normalizeSymbols(merged);
    if (symbols.length === 0) {
      const error = new SourceUnavailableError(failures);
      const fallback = this.cached;
      if (fallback && fallback.symbols.length > 0) {
        console.warn(
          `[symbols] ${error.message}; using cached universe from ${fallback.generatedAt} (${fallback.symbols.length} symbols)`,
        );
        return fallback;
      }
      throw error;
    }

    const universe: SymbolUniverse = {
      generatedAt: this.now().toISOString(),
      symbols,
      sourceErrors: failures,
    };
    await this.cache.saveUniverse(universe);
    this.cached = universe;
    this.cacheLoaded = true;
    console.log(`[symbols] Total: ${symbols.length} equity symbols (${merged.length} listed)`);
    return universe;
  }
}

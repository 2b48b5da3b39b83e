import test from 'node:test';
import assert from 'node:assert/strict';

import { SymbolDirectory, normalizeSymbols } from '../server/services/symbolDirectory.js';
import type { SymbolSource } from '../server/services/symbolSources.js';
import type { UniverseCacheStore } from '../server/data/resultStore.js';
import type { Exchange, ListedSymbol, SymbolUniverse } from '../server/data/schemas.js';
import { SourceUnavailableError } from '../server/lib/errors.js';
import { listedSymbol } from './fixtures.js';

const NOW = new Date('2026-10-19T06:00:00.000Z');
const DAY_MS = 24 * 60 * 60 * 1000;

class FakeSource implements SymbolSource {
  calls = 0;
  constructor(
    readonly name: Exchange,
    private readonly result: ListedSymbol[] | Error,
  ) {}

  async fetchSymbols(): Promise<ListedSymbol[]> {
    this.calls += 1;
    await new Promise((resolve) => setImmediate(resolve));
    if (this.result instanceof Error) throw this.result;
    return this.result;
  }
}

class MemoryCache implements UniverseCacheStore {
  saved: SymbolUniverse[] = [];
  constructor(private stored: SymbolUniverse | null = null) {}

  async loadUniverse(): Promise<SymbolUniverse | null> {
    return this.stored;
  }

  async saveUniverse(universe: SymbolUniverse): Promise<void> {
    this.saved.push(universe);
    this.stored = universe;
  }
}

function cachedUniverse(ageMs: number, tickers: string[] = ['OLD.NS']): SymbolUniverse {
  return {
    generatedAt: new Date(NOW.getTime() - ageMs).toISOString(),
    symbols: tickers.map((t) => listedSymbol(t)),
    sourceErrors: [],
  };
}

test('normalizeSymbols keeps NSE equity series and every BSE entry', () => {
  const input = [
    listedSymbol('AAA.NS', { series: 'EQ' }),
    listedSymbol('BND.NS', { series: 'GB' }),
    listedSymbol('SME.NS', { series: 'SM' }),
    listedSymbol('NOS.NS', { series: '' }),
    listedSymbol('XYZ.BO', { series: 'EQ' }),
    listedSymbol('ODD.BO', { series: 'ZZ' }),
  ];
  assert.deepEqual(
    normalizeSymbols(input).map((s) => s.ticker),
    ['AAA.NS', 'SME.NS', 'NOS.NS', 'XYZ.BO', 'ODD.BO'],
  );
});

test('normalizeSymbols drops duplicate (ticker, exchange) pairs, first wins', () => {
  const input = [
    listedSymbol('AAA.NS', { name: 'first' }),
    listedSymbol('AAA.NS', { name: 'second' }),
    listedSymbol('AAA.BO'),
  ];
  const out = normalizeSymbols(input);
  assert.deepEqual(
    out.map((s) => `${s.exchange}:${s.ticker}:${s.name}`),
    ['NSE:AAA.NS:first', 'BSE:AAA.BO:AAA Ltd'],
  );
});

test('getUniverse(false) serves a fresh cache without calling any source', async () => {
  const nse = new FakeSource('NSE', [listedSymbol('NEW.NS')]);
  const cache = new MemoryCache(cachedUniverse(DAY_MS));
  const directory = new SymbolDirectory({ sources: [nse], cache, maxAgeMs: 7 * DAY_MS, now: () => NOW });

  const first = await directory.getUniverse(false);
  const second = await directory.getUniverse(false);
  assert.deepEqual(first.symbols.map((s) => s.ticker), ['OLD.NS']);
  assert.equal(second, first);
  assert.equal(nse.calls, 0);
});

test('getUniverse(false) refreshes once when the cache is missing', async () => {
  const nse = new FakeSource('NSE', [listedSymbol('NEW.NS')]);
  const cache = new MemoryCache();
  const directory = new SymbolDirectory({ sources: [nse], cache, now: () => NOW });

  await directory.getUniverse(false);
  const again = await directory.getUniverse(false);
  assert.equal(nse.calls, 1);
  assert.deepEqual(again.symbols.map((s) => s.ticker), ['NEW.NS']);
  assert.equal(again.generatedAt, NOW.toISOString());
  assert.equal(cache.saved.length, 1);
});

test('getUniverse refreshes a stale cache', async () => {
  const nse = new FakeSource('NSE', [listedSymbol('NEW.NS')]);
  const cache = new MemoryCache(cachedUniverse(8 * DAY_MS));
  const directory = new SymbolDirectory({ sources: [nse], cache, maxAgeMs: 7 * DAY_MS, now: () => NOW });

  const universe = await directory.getUniverse(false);
  assert.equal(nse.calls, 1);
  assert.deepEqual(universe.symbols.map((s) => s.ticker), ['NEW.NS']);
});

test('getUniverse(true) bypasses a fresh cache', async () => {
  const nse = new FakeSource('NSE', [listedSymbol('NEW.NS')]);
  const cache = new MemoryCache(cachedUniverse(DAY_MS));
  const directory = new SymbolDirectory({ sources: [nse], cache, now: () => NOW });

  const universe = await directory.getUniverse(true);
  assert.equal(nse.calls, 1);
  assert.deepEqual(universe.symbols.map((s) => s.ticker), ['NEW.NS']);
});

test('a failing source is recorded while the other still yields a universe', async () => {
  const nse = new FakeSource('NSE', [listedSymbol('AAA.NS')]);
  const bse = new FakeSource('BSE', new Error('BSE symbol list request failed (503)'));
  const cache = new MemoryCache();
  const directory = new SymbolDirectory({ sources: [nse, bse], cache, now: () => NOW });

  const universe = await directory.getUniverse(true);
  assert.deepEqual(universe.symbols.map((s) => s.ticker), ['AAA.NS']);
  assert.deepEqual(universe.sourceErrors, [{ source: 'BSE', message: 'BSE symbol list request failed (503)' }]);
});

test('total source failure falls back to a stale cache without overwriting it', async () => {
  const nse = new FakeSource('NSE', new Error('NSE down'));
  const bse = new FakeSource('BSE', new Error('BSE down'));
  const stale = cachedUniverse(30 * DAY_MS);
  const cache = new MemoryCache(stale);
  const directory = new SymbolDirectory({ sources: [nse, bse], cache, maxAgeMs: 7 * DAY_MS, now: () => NOW });

  const universe = await directory.getUniverse(false);
  assert.equal(universe, stale);
  assert.equal(cache.saved.length, 0);
});

test('total source failure without a cache throws SourceUnavailableError', async () => {
  const nse = new FakeSource('NSE', new Error('NSE down'));
  const bse = new FakeSource('BSE', []);
  const directory = new SymbolDirectory({ sources: [nse, bse], cache: new MemoryCache(), now: () => NOW });

  await assert.rejects(directory.getUniverse(false), (err: unknown) => {
    assert.ok(err instanceof SourceUnavailableError);
    assert.deepEqual(err.failures, [
      { source: 'NSE', message: 'NSE down' },
      { source: 'BSE', message: 'source returned no symbols' },
    ]);
    return true;
  });
});

test('concurrent callers share one in-flight refresh', async () => {
  const nse = new FakeSource('NSE', [listedSymbol('AAA.NS')]);
  const directory = new SymbolDirectory({ sources: [nse], cache: new MemoryCache(), now: () => NOW });

  const [a, b, c] = await Promise.all([
    directory.getUniverse(true),
    directory.getUniverse(true),
    directory.getUniverse(false),
  ]);
  assert.equal(nse.calls, 1);
  assert.equal(a, b);
  assert.equal(b, c);
});

test('cachedCount reports the cached universe size without fetching', async () => {
  const nse = new FakeSource('NSE', [listedSymbol('NEW.NS')]);
  const directory = new SymbolDirectory({
    sources: [nse],
    cache: new MemoryCache(cachedUniverse(30 * DAY_MS, ['A.NS', 'B.NS'])),
    now: () => NOW,
  });
  assert.equal(await directory.cachedCount(), 2);
  assert.equal(nse.calls, 0);

  const empty = new SymbolDirectory({ sources: [nse], cache: new MemoryCache(), now: () => NOW });
  assert.equal(await empty.cachedCount(), 0);
});

import {
  DATA_DIR,
  PRICE_API_MAX_REQUESTS_PER_SECOND,
  PRICE_API_RATE_BUCKET_CAPACITY,
} from './config.js';
import { ResultStore } from './data/resultStore.js';
import { TokenBucketRateLimiter } from './lib/rateLimiter.js';
import { HistoryFetcher } from './services/historyFetcher.js';
import { ScanCoordinator } from './services/scanCoordinator.js';
import { SymbolDirectory } from './services/symbolDirectory.js';
import { createDefaultSymbolSources } from './services/symbolSources.js';

export interface ScannerComponents {
  store: ResultStore;
  directory: SymbolDirectory;
  fetcher: HistoryFetcher;
  coordinator: ScanCoordinator;
}

/** Wire the production components. One rate limiter is shared by every fetch. */
export function createScanner(options: { dataDir?: string } = {}): ScannerComponents {
  const store = new ResultStore({ dataDir: options.dataDir ?? DATA_DIR });
  const directory = new SymbolDirectory({ sources: createDefaultSymbolSources(), cache: store });
  const rateLimiter = new TokenBucketRateLimiter({
    ratePerSecond: PRICE_API_MAX_REQUESTS_PER_SECOND,
    capacity: PRICE_API_RATE_BUCKET_CAPACITY,
  });
  const fetcher = new HistoryFetcher({ rateLimiter });
  const coordinator = new ScanCoordinator({ directory, fetcher, store });
  return { store, directory, fetcher, coordinator };
}

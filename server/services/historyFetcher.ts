/**
 * Five-year daily close history for one symbol from the chart endpoint.
 *
 * Every attempt takes a token from the shared rate limiter before the request
 * goes out and runs under its own timeout. Per-symbol failures come back as a
 * FetchError value; only an abort of the caller's signal rejects.
 */

import {
  FETCH_MAX_ATTEMPTS,
  FETCH_RETRY_BASE_MS,
  FETCH_RETRY_JITTER_RATIO,
  FETCH_RETRY_MAX_MS,
  HISTORY_RANGE,
  HTTP_USER_AGENT,
  MIN_HISTORY_POINTS,
  PRICE_API_BASE,
  PRICE_API_TIMEOUT_MS,
} from '../config.js';
import type { ListedSymbol, PricePoint, PriceSeries } from '../data/schemas.js';
import { recordFetchAttempt } from '../metrics.js';
import { ChartResponseSchema, validateApiResponse, type ChartResponse } from '../lib/apiSchemas.js';
import { istDateStringFromUnixSeconds } from '../lib/dateUtils.js';
import { FetchError, errorMessage, isAbortError } from '../lib/errors.js';
import { fetchTextWithTimeout, type FetchLike, type HttpTextResult } from '../lib/httpText.js';
import type { TokenBucketRateLimiter } from '../lib/rateLimiter.js';
import { RetryPolicy } from '../lib/retryPolicy.js';

export type FetchResult = { ok: true; series: PriceSeries } | { ok: false; error: FetchError };

export interface HistoryFetcherOptions {
  rateLimiter: Pick<TokenBucketRateLimiter, 'acquire'>;
  retryPolicy?: RetryPolicy;
  fetchImpl?: FetchLike;
  baseUrl?: string;
  timeoutMs?: number;
  minPoints?: number;
  range?: string;
}

/** Parse a Retry-After header (delta-seconds or HTTP date) into milliseconds. */
export function parseRetryAfterMs(value: string | null, nowMs: number = Date.now()): number | null {
  const raw = String(value ?? '').trim();
  if (!raw) return null;
  if (/^\d+(\.\d+)?$/.test(raw)) return Math.ceil(Number(raw) * 1000);
  const dateMs = Date.parse(raw);
  if (!Number.isFinite(dateMs)) return null;
  return Math.max(0, dateMs - nowMs);
}

export function isRetryableFetchError(err: unknown): boolean {
  return err instanceof FetchError && err.transient && err.kind !== 'NotFound' && err.kind !== 'MalformedResponse';
}

export function createHistoryRetryPolicy(overrides: Partial<ConstructorParameters<typeof RetryPolicy>[0]> = {}): RetryPolicy {
  return new RetryPolicy({
    maxAttempts: FETCH_MAX_ATTEMPTS,
    baseDelayMs: FETCH_RETRY_BASE_MS,
    maxDelayMs: FETCH_RETRY_MAX_MS,
    jitterRatio: FETCH_RETRY_JITTER_RATIO,
    isRetryable: isRetryableFetchError,
    minDelayFor: (err) => (err instanceof FetchError ? err.retryAfterMs : null),
    ...overrides,
  });
}

/**
 * Turn a validated chart payload into ascending, de-duplicated closes.
 * Null, non-finite and non-positive closes are dropped; a repeated date keeps
 * the later value.
 */
export function extractClosePoints(chart: ChartResponse): PricePoint[] {
  const result = chart.chart.result?.[0];
  if (!result) return [];
  const timestamps = result.timestamp ?? [];
  const closes = result.indicators.quote?.[0]?.close ?? [];

  const byDate = new Map<string, number>();
  const count = Math.min(timestamps.length, closes.length);
  for (let i = 0; i < count; i++) {
    const close = closes[i];
    if (close === null || !Number.isFinite(close) || close <= 0) continue;
    const date = istDateStringFromUnixSeconds(timestamps[i]);
    if (!date) continue;
    byDate.set(date, close);
  }
  return [...byDate.entries()]
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([date, close]) => ({ date, close }));
}

function describeBody(text: string): string {
  return text.trim().slice(0, 180);
}

export class HistoryFetcher {
  private readonly rateLimiter: Pick<TokenBucketRateLimiter, 'acquire'>;
  private readonly retryPolicy: RetryPolicy;
  private readonly fetchImpl: FetchLike;
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly minPoints: number;
  private readonly range: string;

  constructor(options: HistoryFetcherOptions) {
    this.rateLimiter = options.rateLimiter;
    this.retryPolicy = options.retryPolicy ?? createHistoryRetryPolicy();
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.baseUrl = (options.baseUrl ?? PRICE_API_BASE).replace(/\/+$/, '');
    this.timeoutMs = options.timeoutMs ?? PRICE_API_TIMEOUT_MS;
    this.minPoints = options.minPoints ?? MIN_HISTORY_POINTS;
    this.range = options.range ?? HISTORY_RANGE;
  }

  buildUrl(ticker: string): string {
    const params = new URLSearchParams({ interval: '1d', range: this.range });
    return `${this.baseUrl}/v8/finance/chart/${encodeURIComponent(ticker)}?${params.toString()}`;
  }

  async fetchHistory(symbol: Pick<ListedSymbol, 'ticker'>, signal?: AbortSignal | null): Promise<FetchResult> {
    try {
      const series = await this.retryPolicy.execute(() => this.fetchOnce(symbol.ticker, signal), {
        signal,
        onRetry: ({ attempt, delayMs, error }) => {
          console.warn(
            `[history] ${symbol.ticker} ${errorMessage(error)} (attempt ${attempt}/${this.retryPolicy.maxAttempts}), retrying in ${delayMs}ms`,
          );
        },
      });
      return { ok: true, series };
    } catch (err: unknown) {
      if (signal?.aborted || isAbortError(err)) throw err;
      if (err instanceof FetchError) return { ok: false, error: err };
      return { ok: false, error: new FetchError('Upstream', errorMessage(err)) };
    }
  }

  private async fetchOnce(ticker: string, signal?: AbortSignal | null): Promise<PriceSeries> {
    await this.rateLimiter.acquire(signal);
    try {
      const series = await this.requestSeries(ticker, signal);
      recordFetchAttempt('ok');
      return series;
    } catch (err: unknown) {
      recordFetchAttempt(err instanceof FetchError ? err.kind : 'Aborted');
      throw err;
    }
  }

  private async requestSeries(ticker: string, signal?: AbortSignal | null): Promise<PriceSeries> {
    let result: HttpTextResult;
    try {
      result = await fetchTextWithTimeout(this.fetchImpl, this.buildUrl(ticker), {
        label: ticker,
        timeoutMs: this.timeoutMs,
        signal,
        headers: { 'User-Agent': HTTP_USER_AGENT, Accept: 'application/json' },
      });
    } catch (err: unknown) {
      if (signal?.aborted) throw err;
      throw new FetchError('Upstream', `${ticker} request failed: ${errorMessage(err)}`);
    }

    if (result.kind === 'timeout') {
      throw new FetchError('Timeout', `${ticker} request timed out after ${result.timeoutMs}ms`);
    }

    const { status, text } = result;
    if (status === 404 || status === 422) {
      throw new FetchError('NotFound', `${ticker} not found (${status})`, { httpStatus: status });
    }
    if (status === 429) {
      throw new FetchError('RateLimited', `${ticker} rate-limited (429)`, {
        httpStatus: status,
        retryAfterMs: parseRetryAfterMs(result.headers.get('retry-after')),
      });
    }
    if (status >= 500) {
      throw new FetchError('Upstream', `${ticker} request failed (${status}): ${describeBody(text) || 'server error'}`, {
        httpStatus: status,
      });
    }
    if (status < 200 || status >= 300) {
      throw new FetchError('Upstream', `${ticker} request rejected (${status}): ${describeBody(text) || 'client error'}`, {
        httpStatus: status,
        transient: false,
      });
    }

    let payload: unknown;
    try {
      payload = JSON.parse(text);
    } catch {
      throw new FetchError('MalformedResponse', `${ticker} response is not JSON`, { httpStatus: status });
    }
    const chart = validateApiResponse(ChartResponseSchema, payload, `chart ${ticker}`);
    if (!chart) {
      throw new FetchError('MalformedResponse', `${ticker} response failed validation`, { httpStatus: status });
    }

    const apiError = chart.chart.error;
    if (apiError) {
      const detail = apiError.description || apiError.code || 'unknown error';
      if (/not\s*found|no data/i.test(`${apiError.code ?? ''} ${apiError.description ?? ''}`)) {
        throw new FetchError('NotFound', `${ticker} not found: ${detail}`, { httpStatus: status });
      }
      throw new FetchError('MalformedResponse', `${ticker} API error: ${detail}`, { httpStatus: status });
    }
    if (!chart.chart.result || chart.chart.result.length === 0) {
      throw new FetchError('NotFound', `${ticker} returned no chart data`, { httpStatus: status });
    }

    const points = extractClosePoints(chart);
    if (points.length < this.minPoints) {
      throw new FetchError('NotFound', `${ticker} has ${points.length} usable closes (need ${this.minPoints})`, {
        httpStatus: status,
      });
    }
    return { ticker, points };
  }
}

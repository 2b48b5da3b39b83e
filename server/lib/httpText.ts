import { linkAbortSignalToController } from './abort.js';
import { buildRequestAbortError } from './errors.js';

/** Subset of the global fetch used by the sources and the history fetcher. */
export type FetchLike = (url: string, init?: RequestInit) => Promise<Response>;

export type HttpTextResult =
  | { kind: 'response'; status: number; headers: Headers; text: string }
  | { kind: 'timeout'; timeoutMs: number };

/**
 * GET `url` and read the whole body as text under a per-request timeout.
 *
 * A timeout resolves to `{ kind: 'timeout' }`; an abort of `signal` rejects
 * with an AbortError; network failures reject with the fetch error.
 */
export async function fetchTextWithTimeout(
  fetchImpl: FetchLike,
  url: string,
  options: { timeoutMs: number; signal?: AbortSignal | null; headers?: Record<string, string>; label: string },
): Promise<HttpTextResult> {
  const externalSignal = options.signal ?? null;
  if (externalSignal?.aborted) throw buildRequestAbortError(`${options.label} request aborted`);

  const controller = new AbortController();
  let timedOut = false;
  const timeout = setTimeout(() => {
    timedOut = true;
    controller.abort();
  }, options.timeoutMs);
  const unlink = linkAbortSignalToController(externalSignal, controller);

  try {
    const resp = await fetchImpl(url, { signal: controller.signal, headers: options.headers });
    const text = await resp.text();
    return { kind: 'response', status: resp.status, headers: resp.headers, text };
  } catch (err: unknown) {
    if (externalSignal?.aborted) {
      throw buildRequestAbortError(`${options.label} request aborted`);
    }
    if (timedOut) {
      return { kind: 'timeout', timeoutMs: options.timeoutMs };
    }
    throw err;
  } finally {
    clearTimeout(timeout);
    unlink();
  }
}

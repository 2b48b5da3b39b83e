import { buildRequestAbortError } from './errors.js';

export type Sleep = (ms: number, signal?: AbortSignal | null) => Promise<void>;

export function sleepWithAbort(ms: number, signal?: AbortSignal | null): Promise<void> {
  const waitMs = Math.max(0, Math.ceil(Number(ms) || 0));
  return new Promise((resolve, reject) => {
    let settled = false;
    const done = (fn: () => void): void => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      if (signal) {
        signal.removeEventListener('abort', onAbort);
      }
      fn();
    };
    const onAbort = () => done(() => reject(buildRequestAbortError('Request aborted while waiting')));
    const timer = setTimeout(() => done(resolve), waitMs);
    if (signal) {
      if (signal.aborted) {
        onAbort();
        return;
      }
      signal.addEventListener('abort', onAbort, { once: true });
    }
  });
}

/**
 * Forward aborts from `parentSignal` into `controller`. Returns an unlink
 * function that must be called once the child request settles.
 */
export function linkAbortSignalToController(parentSignal: AbortSignal | null | undefined, controller: AbortController): () => void {
  if (!parentSignal) return () => {};
  const forwardAbort = () => {
    if (!controller.signal.aborted) controller.abort();
  };
  if (parentSignal.aborted) {
    forwardAbort();
    return () => {};
  }
  parentSignal.addEventListener('abort', forwardAbort, { once: true });
  return () => {
    parentSignal.removeEventListener('abort', forwardAbort);
  };
}

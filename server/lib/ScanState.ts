/**
 * ScanState: run-state token and progress fields for the scan job.
 *
 * All mutable fields are private. The coordinator drives the lifecycle
 * (beginRun → updateProgress → markCompleted/markFailed/markStopped → cleanup);
 * pollers only read through isRunning, progress() and getStatus().
 */

import { AlreadyRunningError } from './errors.js';

export type RunPhase = 'idle' | 'running';

export type ScanStatusLabel =
  | 'idle'
  | 'running'
  | 'stopping'
  | 'completed'
  | 'completed-with-errors'
  | 'failed'
  | 'stopped';

/** Status fields maintained by a ScanState instance. */
export interface ScanStatusFields {
  status: ScanStatusLabel;
  scanId: string | null;
  totalSymbols: number;
  processedSymbols: number;
  errorSymbols: number;
  athSymbols: number;
  message: string;
  startedAt: string | null;
  finishedAt: string | null;
  lastError: string | null;
}

/** Wire shape served by GET /api/status. */
export interface ScanStatusPayload {
  running: boolean;
  stop_requested: boolean;
  status: ScanStatusLabel;
  scan_id: string | null;
  total: number;
  progress: number;
  errors: number;
  found: number;
  message: string;
  started_at: string | null;
  finished_at: string | null;
  last_error: string | null;
}

const IDLE_STATUS: ScanStatusFields = {
  status: 'idle',
  scanId: null,
  totalSymbols: 0,
  processedSymbols: 0,
  errorSymbols: 0,
  athSymbols: 0,
  message: 'Idle',
  startedAt: null,
  finishedAt: null,
  lastError: null,
};

export class ScanState {
  readonly name: string;

  private _phase: RunPhase = 'idle';
  private _stopRequested = false;
  private _abortController: AbortController | null = null;
  private _status: ScanStatusFields = { ...IDLE_STATUS };

  constructor(name: string) {
    this.name = name;
  }

  /** True while a scan job owns this state object. */
  get isRunning(): boolean {
    return this._phase === 'running';
  }

  /** True if requestStop() was called during the current run. */
  get isStopping(): boolean {
    return this._stopRequested;
  }

  get shouldStop(): boolean {
    return this._stopRequested || Boolean(this._abortController?.signal.aborted);
  }

  /** The AbortSignal for the current run, or null if not running. */
  get signal(): AbortSignal | null {
    return this._abortController?.signal ?? null;
  }

  progress(): { completed: number; total: number } {
    return { completed: this._status.processedSymbols, total: this._status.totalSymbols };
  }

  getStatus(): ScanStatusPayload {
    const s = this._status;
    return {
      running: this.isRunning,
      stop_requested: this._stopRequested,
      status: s.status,
      scan_id: s.scanId,
      total: s.totalSymbols,
      progress: s.processedSymbols,
      errors: s.errorSymbols,
      found: s.athSymbols,
      message: s.message,
      started_at: s.startedAt,
      finished_at: s.finishedAt,
      last_error: s.lastError,
    };
  }

  /**
   * Claim the run token. The check and the flip happen in one synchronous
   * step, so two callers on the event loop can never both succeed.
   */
  beginRun(scanId: string, startedAt: string): AbortController {
    if (this._phase === 'running') {
      throw new AlreadyRunningError();
    }
    this._phase = 'running';
    this._stopRequested = false;
    this._abortController = new AbortController();
    this._status = {
      ...IDLE_STATUS,
      status: 'running',
      scanId,
      startedAt,
      message: 'Starting scan...',
    };
    return this._abortController;
  }

  /**
   * Signal the running job to stop and abort its in-flight requests.
   * Returns false if not currently running.
   */
  requestStop(): boolean {
    if (this._phase !== 'running') return false;
    this._stopRequested = true;
    this._status = { ...this._status, status: 'stopping', message: 'Stopping scan...' };
    if (this._abortController && !this._abortController.signal.aborted) {
      this._abortController.abort();
    }
    return true;
  }

  setTotal(totalSymbols: number): void {
    this._status = { ...this._status, totalSymbols };
  }

  updateProgress(processedSymbols: number, errorSymbols: number, athSymbols: number): void {
    this._status = {
      ...this._status,
      processedSymbols,
      errorSymbols,
      athSymbols,
      status: this._stopRequested ? 'stopping' : this._status.status,
      message: this._stopRequested
        ? 'Stopping scan...'
        : `Scanning... ${processedSymbols}/${this._status.totalSymbols} stocks`,
    };
  }

  /** Transition to 'completed' (or 'completed-with-errors'). */
  markCompleted(finishedAt: string): void {
    const hasErrors = this._status.errorSymbols > 0;
    this._stopRequested = false;
    this._status = {
      ...this._status,
      status: hasErrors ? 'completed-with-errors' : 'completed',
      finishedAt,
      lastError: null,
      message: `Scan complete! Found ${this._status.athSymbols} ATH stocks.`,
    };
  }

  markFailed(finishedAt: string, error: string): void {
    this._stopRequested = false;
    this._status = { ...this._status, status: 'failed', finishedAt, lastError: error, message: `Error: ${error}` };
  }

  markStopped(finishedAt: string): void {
    this._stopRequested = false;
    this._status = { ...this._status, status: 'stopped', finishedAt, message: 'Scan stopped' };
  }

  /**
   * Release the run token. If `abortRef` is given it must match the stored
   * controller. Always call this in a finally block.
   */
  cleanup(abortRef?: AbortController): void {
    if (!abortRef || this._abortController === abortRef) {
      this._abortController = null;
    }
    this._phase = 'idle';
  }
}

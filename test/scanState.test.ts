import test from 'node:test';
import assert from 'node:assert/strict';

import { ScanState } from '../server/lib/ScanState.js';
import { AlreadyRunningError } from '../server/lib/errors.js';

// ---------------------------------------------------------------------------
// ScanState: initial state
// ---------------------------------------------------------------------------

test('ScanState initial state has expected defaults', () => {
  const s = new ScanState('testScan');
  assert.equal(s.name, 'testScan');
  assert.equal(s.isRunning, false);
  assert.equal(s.isStopping, false);
  assert.equal(s.shouldStop, false);
  assert.equal(s.signal, null);
  assert.deepEqual(s.progress(), { completed: 0, total: 0 });
  assert.deepEqual(s.getStatus(), {
    running: false,
    stop_requested: false,
    status: 'idle',
    scan_id: null,
    total: 0,
    progress: 0,
    errors: 0,
    found: 0,
    message: 'Idle',
    started_at: null,
    finished_at: null,
    last_error: null,
  });
});

// ---------------------------------------------------------------------------
// beginRun
// ---------------------------------------------------------------------------

test('beginRun returns an AbortController and sets isRunning', () => {
  const s = new ScanState('s');
  const ac = s.beginRun('scan-1', '2026-10-19T10:01:00.000Z');
  assert.ok(ac instanceof AbortController);
  assert.equal(s.isRunning, true);
  assert.equal(s.signal, ac.signal);
  const status = s.getStatus();
  assert.equal(status.status, 'running');
  assert.equal(status.scan_id, 'scan-1');
  assert.equal(status.started_at, '2026-10-19T10:01:00.000Z');
  assert.equal(status.message, 'Starting scan...');
});

test('beginRun throws AlreadyRunningError while a run holds the token', () => {
  const s = new ScanState('s');
  s.beginRun('scan-1', '2026-10-19T10:01:00.000Z');
  assert.throws(() => s.beginRun('scan-2', '2026-10-19T10:02:00.000Z'), AlreadyRunningError);
  assert.equal(s.getStatus().scan_id, 'scan-1');
});

test('beginRun resets counters from the previous run', () => {
  const s = new ScanState('s');
  const ac = s.beginRun('scan-1', 't0');
  s.setTotal(10);
  s.updateProgress(10, 2, 1);
  s.markCompleted('t1');
  s.cleanup(ac);

  s.beginRun('scan-2', 't2');
  assert.deepEqual(s.progress(), { completed: 0, total: 0 });
  assert.equal(s.getStatus().found, 0);
  assert.equal(s.getStatus().finished_at, null);
});

// ---------------------------------------------------------------------------
// Progress and completion
// ---------------------------------------------------------------------------

test('updateProgress tracks counters and the scanning message', () => {
  const s = new ScanState('s');
  s.beginRun('scan-1', 't0');
  s.setTotal(200);
  s.updateProgress(100, 3, 4);
  assert.deepEqual(s.progress(), { completed: 100, total: 200 });
  const status = s.getStatus();
  assert.equal(status.errors, 3);
  assert.equal(status.found, 4);
  assert.equal(status.message, 'Scanning... 100/200 stocks');
});

test('markCompleted reports the ATH count and errors', () => {
  const s = new ScanState('s');
  s.beginRun('scan-1', 't0');
  s.setTotal(3);
  s.updateProgress(3, 1, 2);
  s.markCompleted('t1');
  const status = s.getStatus();
  assert.equal(status.status, 'completed-with-errors');
  assert.equal(status.finished_at, 't1');
  assert.equal(status.message, 'Scan complete! Found 2 ATH stocks.');
});

test('markCompleted without failures is plain completed', () => {
  const s = new ScanState('s');
  s.beginRun('scan-1', 't0');
  s.updateProgress(1, 0, 0);
  s.markCompleted('t1');
  assert.equal(s.getStatus().status, 'completed');
});

test('markFailed records the error message', () => {
  const s = new ScanState('s');
  s.beginRun('scan-1', 't0');
  s.markFailed('t1', 'All symbol sources failed');
  const status = s.getStatus();
  assert.equal(status.status, 'failed');
  assert.equal(status.last_error, 'All symbol sources failed');
  assert.equal(status.message, 'Error: All symbol sources failed');
});

// ---------------------------------------------------------------------------
// requestStop / cleanup
// ---------------------------------------------------------------------------

test('requestStop returns false when idle', () => {
  const s = new ScanState('s');
  assert.equal(s.requestStop(), false);
  assert.equal(s.isStopping, false);
});

test('requestStop aborts the run signal and marks stopping', () => {
  const s = new ScanState('s');
  const ac = s.beginRun('scan-1', 't0');
  assert.equal(s.requestStop(), true);
  assert.equal(ac.signal.aborted, true);
  assert.equal(s.isStopping, true);
  assert.equal(s.shouldStop, true);
  assert.equal(s.getStatus().status, 'stopping');
});

test('cleanup releases the token so a new run can begin', () => {
  const s = new ScanState('s');
  const ac = s.beginRun('scan-1', 't0');
  s.markStopped('t1');
  s.cleanup(ac);
  assert.equal(s.isRunning, false);
  assert.equal(s.signal, null);
  assert.equal(s.getStatus().status, 'stopped');
  assert.doesNotThrow(() => s.beginRun('scan-2', 't2'));
});

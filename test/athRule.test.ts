import test from 'node:test';
import assert from 'node:assert/strict';

import { evaluateAth } from '../server/services/athRule.js';
import type { PriceSeries } from '../server/data/schemas.js';

function series(closes: number[]): PriceSeries {
  return {
    ticker: 'TEST.NS',
    points: closes.map((close, i) => ({ date: `2026-01-${String(i + 1).padStart(2, '0')}`, close })),
  };
}

test('evaluateAth flags a latest close within 0.5% of the high', () => {
  const result = evaluateAth(series([100, 100, 100, 100, 99.6]));
  assert.ok(result);
  assert.equal(result.isAth, true);
  assert.equal(result.highClose, 100);
  assert.equal(result.highDate, '2026-01-01');
  assert.equal(result.latestClose, 99.6);
  assert.equal(result.latestDate, '2026-01-05');
  assert.ok(Math.abs(result.ratio - 0.996) < 1e-12);
});

test('evaluateAth does not flag a close well below the high', () => {
  const result = evaluateAth(series([50, 60, 55]));
  assert.ok(result);
  assert.equal(result.isAth, false);
  assert.equal(result.highClose, 60);
  assert.equal(result.highDate, '2026-01-02');
  assert.ok(Math.abs(result.ratio - 55 / 60) < 1e-12);
});

test('evaluateAth treats exactly 99.5% of the high as an ATH', () => {
  const result = evaluateAth(series([100, 99.5]));
  assert.ok(result);
  assert.equal(result.isAth, true);
});

test('evaluateAth flags rupee closes at exactly 99.5% of the high', () => {
  for (const [high, latest] of [
    [160, 159.2],
    [148, 147.26],
  ]) {
    const result = evaluateAth(series([high, latest]));
    assert.ok(result);
    assert.equal(result.isAth, true, `${latest} vs high ${high}`);
  }
});

test('evaluateAth rejects a close just under the threshold', () => {
  const result = evaluateAth(series([100, 99.49999]));
  assert.ok(result);
  assert.equal(result.isAth, false);
});

test('evaluateAth flags a new high on the latest day with ratio 1', () => {
  const result = evaluateAth(series([10, 11, 12]));
  assert.ok(result);
  assert.equal(result.isAth, true);
  assert.equal(result.ratio, 1);
  assert.equal(result.highDate, '2026-01-03');
});

test('evaluateAth keeps the earliest date when the high repeats', () => {
  const result = evaluateAth(series([70, 80, 75, 80, 79]));
  assert.ok(result);
  assert.equal(result.highDate, '2026-01-02');
});

test('evaluateAth returns null for an empty series', () => {
  assert.equal(evaluateAth({ ticker: 'EMPTY.NS', points: [] }), null);
});

test('evaluateAth honours a custom threshold', () => {
  const result = evaluateAth(series([100, 95]), 0.95);
  assert.ok(result);
  assert.equal(result.isAth, true);
});

import { ATH_THRESHOLD } from '../config.js';
import type { PriceSeries } from '../data/schemas.js';

export interface AthEvaluation {
  highClose: number;
  highDate: string;
  latestClose: number;
  latestDate: string;
  /** latestClose / highClose, in (0, 1]. Reported only; the flag compares closes directly. */
  ratio: number;
  isAth: boolean;
}

/**
 * Compare the most recent close with the highest close of the series.
 * Returns null for an empty series. On ties the earliest high date wins.
 */
export function evaluateAth(series: PriceSeries, threshold: number = ATH_THRESHOLD): AthEvaluation | null {
  const { points } = series;
  if (points.length === 0) return null;

  let high = points[0];
  for (const point of points) {
    if (point.close > high.close) high = point;
  }
  const latest = points[points.length - 1];
  const ratio = latest.close / high.close;

  return {
    highClose: high.close,
    highDate: high.date,
    latestClose: latest.close,
    latestDate: latest.date,
    ratio,
    isAth: latest.close >= threshold * high.close,
  };
}

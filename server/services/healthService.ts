import type { ScanSnapshot } from '../data/schemas.js';

interface HealthPayloadOptions {
  isShuttingDown: boolean;
  nowIso: string;
  uptimeSeconds: number;
  scanRunning: boolean;
  latest: ScanSnapshot | null;
  scheduler: { enabled: boolean; nextRunUtc: string | null };
}

const RESULT_STALENESS_WARN_HOURS = 96;

function buildHealthPayload(options: HealthPayloadOptions) {
  const { isShuttingDown, nowIso, uptimeSeconds, scanRunning, latest, scheduler } = options;

  const warnings: string[] = [];
  if (!latest) {
    warnings.push('no scan results published yet');
  } else {
    const hoursSinceScan = (Date.parse(nowIso) - Date.parse(latest.finishedAt)) / (60 * 60 * 1000);
    if (hoursSinceScan > RESULT_STALENESS_WARN_HOURS) {
      warnings.push(`scan results are stale; last scan finished ${Math.floor(hoursSinceScan)}h ago`);
    }
  }

  return {
    status: 'ok',
    timestamp: nowIso,
    uptimeSeconds,
    shuttingDown: isShuttingDown,
    scanRunning,
    lastScanId: latest?.scanId ?? null,
    lastScanFinishedAt: latest?.finishedAt ?? null,
    scheduler,
    degraded: warnings.length > 0,
    warnings,
  };
}

export { buildHealthPayload };

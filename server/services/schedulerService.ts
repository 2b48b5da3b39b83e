import { SCHEDULER_ENABLED, SCHEDULER_RUN_HOUR, SCHEDULER_RUN_MINUTE } from '../config.js';
import { addUtcDays, istDateTimeParts, istLocalToUtcMs } from '../lib/dateUtils.js';
import { AlreadyRunningError, ScanStoppedError, errorMessage } from '../lib/errors.js';

export type ScheduledScanRunner = (options: { trigger: string }) => Promise<unknown>;

let schedulerEnabledRuntime = SCHEDULER_ENABLED;
let schedulerTimer: ReturnType<typeof setTimeout> | null = null;
let nextScanUtcMs: number | null = null;
let scanRunner: ScheduledScanRunner | null = null;

function isWeekday(day: Date): boolean {
  const weekday = day.getUTCDay();
  return weekday >= 1 && weekday <= 5;
}

/** Next Mon–Fri run time (15:31 IST by default) strictly after `nowUtc`, as UTC ms. */
export function getNextScanUtcMs(
  nowUtc = new Date(),
  runHour: number = SCHEDULER_RUN_HOUR,
  runMinute: number = SCHEDULER_RUN_MINUTE,
): number {
  const now = istDateTimeParts(nowUtc);
  let candidate = new Date(Date.UTC(now.year, now.month - 1, now.day));
  const beforeRunTime = now.hour < runHour || (now.hour === runHour && now.minute < runMinute);

  if (!beforeRunTime || !isWeekday(candidate)) {
    candidate = addUtcDays(candidate, 1);
    for (let i = 0; i < 7 && !isWeekday(candidate); i += 1) {
      candidate = addUtcDays(candidate, 1);
    }
  }

  return istLocalToUtcMs(
    candidate.getUTCFullYear(),
    candidate.getUTCMonth() + 1,
    candidate.getUTCDate(),
    runHour,
    runMinute,
  );
}

/**
 * Run one scheduled scan. A scan that is already running (manual trigger)
 * makes this a no-op; every other failure is logged, never rethrown.
 */
export async function runScheduledScan(runner: ScheduledScanRunner): Promise<'completed' | 'skipped' | 'failed'> {
  console.log('[scheduler] Scheduled scan starting');
  try {
    await runner({ trigger: 'scheduler' });
    console.log('[scheduler] Scheduled scan completed');
    return 'completed';
  } catch (err: unknown) {
    if (err instanceof AlreadyRunningError) {
      console.warn('[scheduler] Scan already running; skipping scheduled run');
      return 'skipped';
    }
    if (err instanceof ScanStoppedError) {
      console.warn('[scheduler] Scheduled scan was stopped');
      return 'failed';
    }
    console.error(`[scheduler] Scheduled scan failed: ${errorMessage(err)}`);
    return 'failed';
  }
}

function clearSchedulerTimer(): void {
  if (schedulerTimer) clearTimeout(schedulerTimer);
  schedulerTimer = null;
  nextScanUtcMs = null;
}

export function scheduleNextScan(): void {
  const runner = scanRunner;
  if (!schedulerEnabledRuntime || !runner) {
    clearSchedulerTimer();
    return;
  }

  if (schedulerTimer) clearTimeout(schedulerTimer);
  const nextRunMs = getNextScanUtcMs(new Date());
  nextScanUtcMs = nextRunMs;
  const delayMs = Math.max(1000, nextRunMs - Date.now());

  const timer = setTimeout(async () => {
    try {
      await runScheduledScan(runner);
    } finally {
      nextScanUtcMs = null;
      if (schedulerEnabledRuntime) {
        scheduleNextScan();
      }
    }
  }, delayMs);
  if (typeof timer.unref === 'function') timer.unref();
  schedulerTimer = timer;

  console.log(`[scheduler] Next scan scheduled for ${new Date(nextRunMs).toISOString()} (in ${Math.round(delayMs / 60000)} min)`);
}

export function startScanScheduler(runner: ScheduledScanRunner): void {
  scanRunner = runner;
  if (!schedulerEnabledRuntime) {
    console.log('[scheduler] Disabled by configuration');
    return;
  }
  scheduleNextScan();
}

export function stopScanScheduler(): void {
  schedulerEnabledRuntime = false;
  clearSchedulerTimer();
}

export function getSchedulerStatus(): { enabled: boolean; nextRunUtc: string | null } {
  return {
    enabled: schedulerEnabledRuntime,
    nextRunUtc: nextScanUtcMs === null ? null : new Date(nextScanUtcMs).toISOString(),
  };
}

import 'dotenv/config';

export function readEnvNumber(name: string, fallback: number, min: number, env: NodeJS.ProcessEnv = process.env): number {
  const raw = env[name];
  const numeric = Number(raw);
  if (raw === undefined || raw === '' || !Number.isFinite(numeric)) return Math.max(min, fallback);
  return Math.max(min, numeric);
}

export function readEnvBoolean(name: string, fallback: boolean, env: NodeJS.ProcessEnv = process.env): boolean {
  const raw = String(env[name] ?? '').trim().toLowerCase();
  if (!raw) return fallback;
  return raw !== 'false' && raw !== '0' && raw !== 'no';
}

export function readEnvString(name: string, fallback: string, env: NodeJS.ProcessEnv = process.env): string {
  const raw = String(env[name] ?? '').trim();
  return raw || fallback;
}

// --- Server ---
export const PORT = readEnvNumber('PORT', 5000, 1);
export const HOST = readEnvString('HOST', '0.0.0.0');
/** Optional shared secret required by POST /api/scan. Empty = open. */
export const SCAN_SECRET = readEnvString('SCAN_SECRET', '');

// --- Storage ---
export const DATA_DIR = readEnvString('DATA_DIR', 'data');
export const SCAN_LOG_FILE = readEnvString('SCAN_LOG_FILE', `${DATA_DIR}/scanner.log`);
export const SCAN_LOG_TAIL_LINES = 100;

// --- Price provider ---
export const PRICE_API_BASE = readEnvString('PRICE_API_BASE', 'https://query1.finance.yahoo.com');
export const PRICE_API_TIMEOUT_MS = readEnvNumber('PRICE_API_TIMEOUT_MS', 20_000, 1_000);
/** Maximum upstream price requests per second across all scan workers. */
export const PRICE_API_MAX_REQUESTS_PER_SECOND = readEnvNumber('PRICE_API_MAX_REQUESTS_PER_SECOND', 5, 0.1);
export const PRICE_API_RATE_BUCKET_CAPACITY = readEnvNumber(
  'PRICE_API_RATE_BUCKET_CAPACITY',
  Math.max(1, Math.floor(PRICE_API_MAX_REQUESTS_PER_SECOND)),
  1,
);
export const HISTORY_RANGE = '5y';
export const MIN_HISTORY_POINTS = Math.floor(readEnvNumber('MIN_HISTORY_POINTS', 20, 1));

// --- Retry ---
export const FETCH_MAX_ATTEMPTS = Math.floor(readEnvNumber('FETCH_MAX_ATTEMPTS', 4, 1));
export const FETCH_RETRY_BASE_MS = readEnvNumber('FETCH_RETRY_BASE_MS', 1_000, 0);
export const FETCH_RETRY_MAX_MS = readEnvNumber('FETCH_RETRY_MAX_MS', 30_000, 0);
export const FETCH_RETRY_JITTER_RATIO = 0.5;

// --- Scan ---
export const SCAN_CONCURRENCY = Math.floor(readEnvNumber('SCAN_CONCURRENCY', 6, 1));
export const SCAN_PROGRESS_LOG_EVERY = Math.floor(readEnvNumber('SCAN_PROGRESS_LOG_EVERY', 100, 1));
export const SCAN_INCLUDE_ALL_RECORDS = readEnvBoolean('SCAN_INCLUDE_ALL_RECORDS', true);
/** Latest close must be at least this fraction of the 5-year high close. */
export const ATH_THRESHOLD = 0.995;

// --- Symbol universe ---
export const SYMBOL_CACHE_MAX_AGE_MS = readEnvNumber('SYMBOL_CACHE_MAX_AGE_HOURS', 24 * 7, 0) * 60 * 60 * 1000;
export const SYMBOL_SOURCE_TIMEOUT_MS = readEnvNumber('SYMBOL_SOURCE_TIMEOUT_MS', 30_000, 1_000);
export const NSE_EQUITY_LIST_URL = readEnvString(
  'NSE_EQUITY_LIST_URL',
  'https://archives.nseindia.com/content/equities/EQUITY_L.csv',
);
export const BSE_SCRIP_LIST_URL = readEnvString(
  'BSE_SCRIP_LIST_URL',
  'https://api.bseindia.com/BseIndiaAPI/api/getScripData/w?strCat=-1&strPrevClose=&strSector=&strIndex=0&strstart=0&strEnd=&strstock=',
);
export const HTTP_USER_AGENT = 'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36';

// --- Scheduler ---
export const SCHEDULER_ENABLED = readEnvBoolean('SCHEDULER_ENABLED', true);
export const SCHEDULER_RUN_HOUR = 15;
export const SCHEDULER_RUN_MINUTE = 31;

// --- Startup validation ---
export function validateStartupEnvironment(env: NodeJS.ProcessEnv = process.env): string[] {
  const warnings: string[] = [];
  const warnIfInvalidPositiveNumber = (name: string) => {
    const raw = env[name];
    if (raw === undefined || raw === '') return;
    const numeric = Number(raw);
    if (!Number.isFinite(numeric) || numeric <= 0) {
      warnings.push(`${name} should be a positive number (received: ${String(raw)})`);
    }
  };

  [
    'PORT',
    'PRICE_API_TIMEOUT_MS',
    'PRICE_API_MAX_REQUESTS_PER_SECOND',
    'PRICE_API_RATE_BUCKET_CAPACITY',
    'FETCH_MAX_ATTEMPTS',
    'SCAN_CONCURRENCY',
    'SCAN_PROGRESS_LOG_EVERY',
    'MIN_HISTORY_POINTS',
    'SYMBOL_SOURCE_TIMEOUT_MS',
  ].forEach(warnIfInvalidPositiveNumber);

  if (!String(env.SCAN_SECRET || '').trim()) {
    warnings.push('SCAN_SECRET is not set; POST /api/scan is unprotected');
  }
  if (Number(env.SCAN_CONCURRENCY) > 32) {
    warnings.push('SCAN_CONCURRENCY above 32 mostly queues on the rate limiter');
  }

  for (const warning of warnings) {
    console.warn(`[startup-env] ${warning}`);
  }
  return warnings;
}

import pino from 'pino';
import { SCAN_LOG_FILE } from './config.js';

const LOG_LEVELS: readonly pino.Level[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace'];

function resolveLevel(raw: string | undefined): pino.Level {
  const value = String(raw || '').trim().toLowerCase();
  return LOG_LEVELS.find((candidate) => candidate === value) ?? 'info';
}

const level = resolveLevel(process.env.LOG_LEVEL);

// Every line goes to stdout and to the scan log file that /api/log tails.
const streams = pino.multistream([
  { level, stream: process.stdout },
  { level, stream: pino.destination({ dest: SCAN_LOG_FILE, mkdir: true, sync: false }) },
]);

const logger: pino.Logger = pino(
  {
    level,
    formatters: {
      level(label: string) {
        return { level: label };
      },
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  },
  streams,
);

// Redirect console methods to pino so modules that log with console.*
// produce structured JSON output.
function formatArgs(args: unknown[]): string {
  return args
    .map((a) => {
      if (a instanceof Error) return a.stack || a.message;
      if (typeof a === 'object' && a !== null) {
        try {
          return JSON.stringify(a);
        } catch {
          return String(a);
        }
      }
      return String(a);
    })
    .join(' ');
}

console.log = (...args: unknown[]) => logger.info(formatArgs(args));
console.error = (...args: unknown[]) => logger.error(formatArgs(args));
console.warn = (...args: unknown[]) => logger.warn(formatArgs(args));
console.info = (...args: unknown[]) => logger.info(formatArgs(args));
console.debug = (...args: unknown[]) => logger.debug(formatArgs(args));

export default logger;

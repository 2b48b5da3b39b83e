import logger from './server/logger.js';
import { HOST, PORT, SCAN_LOG_FILE, SCAN_LOG_TAIL_LINES, SCAN_SECRET, validateStartupEnvironment } from './server/config.js';
import { buildApp } from './server/app.js';
import { errorMessage } from './server/lib/errors.js';
import { metricsRegistry } from './server/metrics.js';
import { createScanner } from './server/scanner.js';
import { readLogTail } from './server/services/logTail.js';
import { getSchedulerStatus, startScanScheduler, stopScanScheduler } from './server/services/schedulerService.js';

validateStartupEnvironment();

const { store, directory, coordinator } = createScanner();
let isShuttingDown = false;

const app = buildApp({
  scanner: coordinator,
  store,
  directory,
  metricsRegistry,
  readLogTail: () => readLogTail(SCAN_LOG_FILE, SCAN_LOG_TAIL_LINES),
  getSchedulerStatus,
  isShuttingDown: () => isShuttingDown,
  scanSecret: SCAN_SECRET,
  requestLogger: logger,
});

async function startServer(): Promise<void> {
  await store.load();
  await app.listen({ port: PORT, host: HOST });
  console.log(`Server running on port ${PORT}`);
  startScanScheduler((options) => coordinator.runScan(options));
}

async function shutdownServer(signal: string): Promise<void> {
  if (isShuttingDown) return;
  isShuttingDown = true;
  console.log(`Received ${signal}; shutting down gracefully...`);

  stopScanScheduler();
  // A stopped scan publishes nothing; the previous snapshot stays on disk.
  coordinator.requestStop();

  const forceExitTimer = setTimeout(() => {
    console.error('Graceful shutdown timed out; forcing exit');
    process.exit(1);
  }, 15000);
  if (typeof forceExitTimer.unref === 'function') {
    forceExitTimer.unref();
  }

  try {
    await app.close();
    console.log('Shutdown complete');
    clearTimeout(forceExitTimer);
    logger.flush();
    process.exit(0);
  } catch (err: unknown) {
    console.error(`Graceful shutdown failed: ${errorMessage(err)}`);
    clearTimeout(forceExitTimer);
    process.exit(1);
  }
}

startServer().catch((err: unknown) => {
  console.error(`Fatal: server failed to start: ${errorMessage(err)}`);
  process.exit(1);
});

process.on('unhandledRejection', (reason) => {
  console.error('Unhandled promise rejection:', reason);
});
process.on('uncaughtException', (err) => {
  console.error('Uncaught exception:', err);
  void shutdownServer('uncaughtException');
});
process.on('SIGINT', () => {
  void shutdownServer('SIGINT');
});
process.on('SIGTERM', () => {
  void shutdownServer('SIGTERM');
});

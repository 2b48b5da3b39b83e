/**
 * One-shot scan from the command line:
 *   npm run scan                      # use the cached symbol list when fresh
 *   npm run scan -- --refresh-symbols # re-download NSE/BSE symbol lists first
 */

import '../logger.js';
import { validateStartupEnvironment } from '../config.js';
import { errorMessage } from '../lib/errors.js';
import { createScanner } from '../scanner.js';

async function main(argv: readonly string[]): Promise<number> {
  validateStartupEnvironment();
  const refreshSymbols = argv.includes('--refresh-symbols');
  const { store, coordinator } = createScanner();
  await store.load();

  const stop = () => {
    coordinator.requestStop();
  };
  process.once('SIGINT', stop);
  process.once('SIGTERM', stop);

  console.log('[cli] ATH scanner started');
  const snapshot = await coordinator.runScan({ refreshSymbols, trigger: 'cli' });
  console.log(`[cli] DONE: ${snapshot.athCount} ATH stocks out of ${snapshot.totalSymbols} scanned`);
  return 0;
}

main(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    console.error(`[cli] Scan failed: ${errorMessage(err)}`);
    process.exitCode = 1;
  });

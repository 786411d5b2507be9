import { env } from '@/config/env';
import { logger } from '@/adapters/logging/LoggerFactory';
import { openLedger } from '@/config/dependencies';

/**
 * Entry Point
 * Opens the ledger in DATA_DIR (bootstrapping it on first run) and logs a
 * summary. Interactive sessions embed openLedger instead.
 */
function main(): void {
  const ledger = openLedger();
  const { loadReport } = ledger;

  logger.info(
    {
      dataDir: env.DATA_DIR,
      users: ledger.store.tables.users.size,
      accounts: ledger.store.tables.accounts.size,
      nextAccountNumber: ledger.store.tables.nextAccountNumber,
      skippedLines: loadReport.skippedLines.length,
      integrityIssues: loadReport.integrityIssues.length,
      bootstrapped: ledger.bootstrapped,
    },
    'Ledger ready'
  );

  if (loadReport.integrityIssues.some((issue) => issue.code === 'NO_ADMIN')) {
    logger.warn('No admin user found; some operations need an admin. Consider registering one.');
  }
}

process.on('uncaughtException', (error) => {
  logger.fatal({ error }, 'Uncaught Exception');
  process.exit(1);
});

main();

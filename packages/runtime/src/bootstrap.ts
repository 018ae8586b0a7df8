// Wiring for a Postgres-backed ledger

import { postgres } from '@careledger/repositories';
import { requireDatabaseUrl, type LedgerConfig } from './config.js';
import { createLogger, type Logger } from './logger.js';
import { createLedger, type Ledger } from './ledger/index.js';

export type PostgresLedger = {
  ledger: Ledger;
  logger: Logger;
  /** Drain the connection pool */
  close(): Promise<void>;
};

/**
 * Build a ledger over a Postgres pool from loaded configuration.
 * No connection is opened until the first mutation.
 *
 * @throws ConfigError when DATABASE_URL is not set
 */
export function createPostgresLedger(config: LedgerConfig, logger?: Logger): PostgresLedger {
  const rootLogger = logger ?? createLogger({ level: config.logLevel });
  const { db, client } = postgres.createDatabase({
    connectionString: requireDatabaseUrl(config),
    maxConnections: config.dbPoolMax,
  });

  return {
    ledger: createLedger({
      repos: postgres.createTransactionalPgRepositoryContext(db),
      logger: rootLogger,
    }),
    logger: rootLogger,
    close: () => postgres.closeDatabase(client),
  };
}

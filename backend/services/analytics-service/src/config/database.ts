import knex, { Knex } from 'knex';
import { config, DatabaseConfig } from './index';
import { createLogger } from '../utils/logger';

const log = createLogger('database');

let db: Knex | undefined;

export function buildKnexConfig(dbConfig: DatabaseConfig): Knex.Config {
  return {
    client: 'pg',
    connection: {
      host: dbConfig.host,
      port: dbConfig.port,
      database: dbConfig.database,
      user: dbConfig.user,
      password: dbConfig.password,
    },
    pool: {
      min: dbConfig.pool.min,
      max: dbConfig.pool.max,
      createTimeoutMillis: 3000,
      acquireTimeoutMillis: 30000,
      idleTimeoutMillis: 30000,
      reapIntervalMillis: 1000,
      createRetryIntervalMillis: 100,
    },
    acquireConnectionTimeout: 30000,
  };
}

/**
 * Transaction options under which every statement of a transaction reads the
 * same snapshot. PostgreSQL's default READ COMMITTED takes a new snapshot per
 * statement, so it is raised to REPEATABLE READ there. Other clients get their
 * default (SQLite transactions are already serializable).
 */
export function snapshotTransactionConfig(instance: Knex): Knex.TransactionConfig | undefined {
  const client: unknown = instance.client.config.client;
  if (client === 'pg' || client === 'postgres' || client === 'postgresql') {
    return { isolationLevel: 'repeatable read' };
  }
  return undefined;
}

export function createDatabase(dbConfig: DatabaseConfig = config.database): Knex {
  const instance = knex(buildKnexConfig(dbConfig));
  log.info('Database handle created', {
    host: dbConfig.host,
    database: dbConfig.database,
  });
  return instance;
}

export function getDb(): Knex {
  if (!db) {
    db = createDatabase();
  }
  return db;
}

export async function closeDatabase(): Promise<void> {
  if (db) {
    const instance = db;
    db = undefined;
    await instance.destroy();
    log.info('Database connection closed');
  }
}

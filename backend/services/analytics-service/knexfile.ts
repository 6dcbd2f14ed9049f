/**
 * Knex Configuration
 *
 * Used by the knex CLI (`knex migrate:latest`, `knex seed:run`). Connection
 * settings come from the same validated environment as the service.
 */

import type { Knex } from 'knex';
import { config } from './src/config';
import { buildKnexConfig } from './src/config/database';
import { migrationSource } from './src/migrations';
import { seedSource } from './src/seeds';

const knexConfig: Knex.Config = {
  ...buildKnexConfig(config.database),
  migrations: {
    migrationSource,
    tableName: 'knex_migrations',
  },
  seeds: {
    seedSource,
  },
};

export default knexConfig;

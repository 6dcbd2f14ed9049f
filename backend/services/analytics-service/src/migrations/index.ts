import { Knex } from 'knex';
import * as ticketingBaseline from './001_ticketing_baseline';

interface MigrationSpec {
  name: string;
  migration: Knex.Migration;
}

const migrations: MigrationSpec[] = [
  { name: '001_ticketing_baseline', migration: ticketingBaseline },
];

/**
 * In-code migration source, so migrations run the same way from compiled
 * output, ts sources, or a test runner.
 */
export const migrationSource: Knex.MigrationSource<MigrationSpec> = {
  async getMigrations() {
    return migrations;
  },
  getMigrationName(spec) {
    return spec.name;
  },
  async getMigration(spec) {
    return spec.migration;
  },
};

export async function migrateLatest(db: Knex): Promise<void> {
  await db.migrate.latest({ migrationSource });
}

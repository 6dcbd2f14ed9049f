import { Knex } from 'knex';
import * as sampleData from './sample-data';

interface SeedSpec {
  name: string;
  seed: Knex.Seed;
}

const seeds: SeedSpec[] = [
  { name: 'sample-data', seed: sampleData },
];

/**
 * In-code seed source, the counterpart of the migration source.
 */
export const seedSource: Knex.SeedSource<SeedSpec> = {
  async getSeeds() {
    return seeds;
  },
  async getSeed(spec) {
    return spec.seed;
  },
};

export async function runSeeds(db: Knex): Promise<void> {
  await db.seed.run({ seedSource });
}

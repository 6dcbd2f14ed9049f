export { EventAnalyticsService, EventAnalyticsOptions } from './services/event-analytics.service';
export { createDatabase, getDb, closeDatabase, buildKnexConfig, snapshotTransactionConfig } from './config/database';
export { config, loadConfig, ServiceConfig, DatabaseConfig } from './config';
export { AppError, ValidationError, NotFoundError, isAppError } from './errors';
export { seedSampleData, SampleDataOptions, SampleDataSummary } from './seeds/sample-data';
export { seedSource, runSeeds } from './seeds';
export { migrationSource, migrateLatest } from './migrations';
export * from './types';

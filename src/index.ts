/**
 * @agreement-ledger/db - Framework agreement ledger on Drizzle ORM
 *
 * Importing this entry point opens the Postgres pool (DATABASE_URL must be
 * set). The modules under domain/, analytics/ and ledger/ need no database.
 */

export { db, schema, closeDatabase } from './client';
export * from './schema';

export * from './domain/enums';
export * from './domain/currency';
export * from './domain/dates';
export * from './domain/derived-fields';
export * from './domain/lifecycle';
export * from './domain/validation';
export type * from './domain/types';
export * from './errors';
export { loadDatabaseConfig, type DatabaseConfig } from './config';

export * from './ledger/ledger';
export type * from './ledger/repository';
export { DrizzleLedgerRepository, type LedgerDatabase } from './ledger/drizzle-repository';

export * from './analytics/aggregations';
export * from './analytics/analytics.service';

export * from './exports/csv';
export * from './imports/parse-csv';
export * from './imports/agreements';
export * from './imports/purchase-orders';
export type * from './imports/types';

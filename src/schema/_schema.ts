import { pgSchema } from 'drizzle-orm/pg-core';

export const LEDGER_SCHEMA_NAME = 'framework_agreements';

/**
 * All ledger tables live in their own Postgres schema so the ledger can share
 * a database with other applications.
 */
export const ledgerSchema = pgSchema(LEDGER_SCHEMA_NAME);

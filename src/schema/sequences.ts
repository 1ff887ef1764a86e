import { varchar, integer } from 'drizzle-orm/pg-core';
import { ledgerSchema } from './_schema';

/**
 * Sequences - named counters for human-readable ids
 *
 * Agreement ids use one counter per calendar year ('agreement-2026').
 */
export const sequences = ledgerSchema.table('sequences', {
  name: varchar('seq_name').primaryKey(),
  value: integer('seq_value').notNull().default(0),
});

export type SequenceRow = typeof sequences.$inferSelect;

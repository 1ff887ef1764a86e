import { serial, varchar, timestamp, index } from 'drizzle-orm/pg-core';
import { ledgerSchema } from './_schema';
import { agreements } from './agreements';
import type { AgreementStatus } from '../domain/enums';

/**
 * Status History - append-only log of agreement status transitions
 *
 * One row on creation (old_status NULL) and one per status change.
 * Rows are only removed together with their agreement.
 */
export const statusHistory = ledgerSchema.table('status_history', {
  id: serial('id').primaryKey(),
  agreementId: varchar('agreement_id')
    .notNull()
    .references(() => agreements.id, { onDelete: 'cascade' }),
  oldStatus: varchar('old_status').$type<AgreementStatus>(),
  newStatus: varchar('new_status').$type<AgreementStatus>().notNull(),
  changedAt: timestamp('changed_at', { withTimezone: true }).notNull().defaultNow(),
  changedBy: varchar('changed_by'),
}, (table) => [
  index('status_history_agreement_id_idx').on(table.agreementId),
]);

export type StatusHistoryRow = typeof statusHistory.$inferSelect;
export type NewStatusHistoryRow = typeof statusHistory.$inferInsert;

import { varchar, text, numeric, date, timestamp, index } from 'drizzle-orm/pg-core';
import { ledgerSchema } from './_schema';
import { agreements } from './agreements';
import type { Currency } from '../domain/enums';

/**
 * POs - purchase orders drawn down against an agreement's ceiling
 *
 * customer_name and account_manager are denormalized copies of the parent
 * agreement's values at creation time.
 */
export const pos = ledgerSchema.table('pos', {
  // PO-<agreement suffix>-<3-digit sequence>, sequence scoped per agreement
  id: varchar('po_id').primaryKey(),
  agreementId: varchar('agreement_id')
    .notNull()
    .references(() => agreements.id, { onDelete: 'cascade' }),
  poNumber: varchar('po_number'),
  date: date('po_date').notNull(),
  value: numeric('po_value').notNull(),
  currency: varchar('currency', { length: 3 }).$type<Currency>().notNull().default('SAR'),
  customerName: varchar('customer_name').notNull(),
  accountManager: varchar('account_manager'),
  notes: text('notes'),
  createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
  lastUpdated: timestamp('last_updated', { withTimezone: true }).notNull().defaultNow(),
}, (table) => [
  index('pos_agreement_id_idx').on(table.agreementId),
  index('pos_po_date_idx').on(table.date),
]);

export type PORow = typeof pos.$inferSelect;
export type NewPORow = typeof pos.$inferInsert;

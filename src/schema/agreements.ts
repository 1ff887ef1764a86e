import { varchar, text, numeric, date, timestamp, index } from 'drizzle-orm/pg-core';
import { ledgerSchema } from './_schema';
import type { AgreementStatus, AgreementType, Currency, CustomerSegment } from '../domain/enums';

/**
 * Agreements - framework agreements tracked from pipeline to monetization
 *
 * Only raw fields are stored. Utilization, aging and risk are derived on every
 * read from this row plus its purchase orders and are never persisted.
 *
 * Enum-like columns are plain varchar; values are validated before insert.
 */
export const agreements = ledgerSchema.table('agreements', {
  // AGR-<year>-<4-digit sequence>
  id: varchar('agreement_id').primaryKey(),

  name: varchar('agreement_name').notNull(),
  customerName: varchar('customer_name').notNull(),
  customerSegment: varchar('customer_segment').$type<CustomerSegment>().notNull(),
  region: varchar('region'),
  industry: varchar('industry'),
  agreementType: varchar('agreement_type').$type<AgreementType>().notNull(),
  startDate: date('start_date'),
  endDate: date('end_date'),

  // Commercial terms
  valueCeiling: numeric('agreement_value_ceiling').notNull(),
  currency: varchar('currency', { length: 3 }).$type<Currency>().notNull().default('SAR'),

  // Lifecycle
  status: varchar('status').$type<AgreementStatus>().notNull().default('Pipeline'),
  statusDate: date('status_date').notNull(),
  probabilityToSign: numeric('probability_to_sign'),
  expectedSignatureDate: date('expected_signature_date'),
  signedDate: date('signed_date'),

  // Ownership
  accountManager: varchar('account_manager').notNull(),
  salesOwner: varchar('sales_owner'),
  partnershipsVendors: text('partnerships_vendors'),

  renewalTerms: text('renewal_terms'),
  notes: text('notes'),
  attachments: text('attachments'),

  createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
  lastUpdated: timestamp('last_updated', { withTimezone: true }).notNull().defaultNow(),
}, (table) => [
  index('agreements_status_idx').on(table.status),
  index('agreements_account_manager_idx').on(table.accountManager),
  index('agreements_last_updated_idx').on(table.lastUpdated),
]);

export type AgreementRow = typeof agreements.$inferSelect;
export type NewAgreementRow = typeof agreements.$inferInsert;

import { and, asc, desc, eq, ilike, inArray, sql, type SQL } from 'drizzle-orm';
import type { PgDatabase } from 'drizzle-orm/pg-core';
import type { PostgresJsQueryResultHKT } from 'drizzle-orm/postgres-js';
import * as schema from '../schema';
import {
  agreements,
  pos,
  sequences,
  statusHistory,
  type AgreementRow,
  type NewAgreementRow,
  type PORow,
  type StatusHistoryRow,
} from '../schema';
import type { Agreement, PurchaseOrder, StatusTransition } from '../domain/types';
import type { AgreementChanges, AgreementListFilters, LedgerRepository } from './repository';

/** The pooled client or an open transaction; both expose the same query API. */
export type LedgerDatabase = PgDatabase<PostgresJsQueryResultHKT, typeof schema>;

/**
 * Escape LIKE wildcards so user input matches literally.
 */
const escapeLike = (value: string): string => value.replace(/[\\%_]/g, (ch) => `\\${ch}`);

function toAgreement(row: AgreementRow): Agreement {
  return {
    ...row,
    valueCeiling: Number(row.valueCeiling),
    probabilityToSign: row.probabilityToSign === null ? null : Number(row.probabilityToSign),
  };
}

function toPurchaseOrder(row: PORow): PurchaseOrder {
  return { ...row, value: Number(row.value) };
}

function toStatusTransition(row: StatusHistoryRow): StatusTransition {
  return {
    agreementId: row.agreementId,
    oldStatus: row.oldStatus,
    newStatus: row.newStatus,
    changedAt: row.changedAt,
    changedBy: row.changedBy,
  };
}

/**
 * Postgres-backed ledger storage on Drizzle ORM.
 */
export class DrizzleLedgerRepository implements LedgerRepository {
  constructor(private readonly db: LedgerDatabase) {}

  async transaction<T>(work: (tx: LedgerRepository) => Promise<T>): Promise<T> {
    return this.db.transaction(async (tx) => work(new DrizzleLedgerRepository(tx)));
  }

  async nextSequenceValue(name: string): Promise<number> {
    const [row] = await this.db
      .insert(sequences)
      .values({ name, value: 1 })
      .onConflictDoUpdate({
        target: sequences.name,
        set: { value: sql`${sequences.value} + 1` },
      })
      .returning({ value: sequences.value });

    return row.value;
  }

  async insertAgreement(agreement: Agreement): Promise<void> {
    await this.db.insert(agreements).values({
      ...agreement,
      valueCeiling: String(agreement.valueCeiling),
      probabilityToSign: agreement.probabilityToSign === null ? null : String(agreement.probabilityToSign),
    });
  }

  async findAgreement(id: string, options: { forUpdate?: boolean } = {}): Promise<Agreement | undefined> {
    const query = this.db.select().from(agreements).where(eq(agreements.id, id));
    const rows = options.forUpdate ? await query.for('update') : await query;
    return rows.length > 0 ? toAgreement(rows[0]) : undefined;
  }

  async listAgreements(filters: AgreementListFilters = {}): Promise<Agreement[]> {
    const conditions: SQL[] = [];
    if (filters.status) conditions.push(eq(agreements.status, filters.status));
    if (filters.accountManager) conditions.push(eq(agreements.accountManager, filters.accountManager));
    if (filters.customerName) {
      conditions.push(ilike(agreements.customerName, `%${escapeLike(filters.customerName)}%`));
    }
    if (filters.region) conditions.push(eq(agreements.region, filters.region));
    if (filters.industry) conditions.push(eq(agreements.industry, filters.industry));
    if (filters.customerSegment) conditions.push(eq(agreements.customerSegment, filters.customerSegment));

    const rows = await this.db
      .select()
      .from(agreements)
      .where(and(...conditions))
      .orderBy(desc(agreements.lastUpdated));

    return rows.map(toAgreement);
  }

  async updateAgreement(id: string, changes: AgreementChanges): Promise<void> {
    const { valueCeiling, probabilityToSign, ...rest } = changes;
    const set: Partial<NewAgreementRow> = { ...rest };
    if (valueCeiling !== undefined) {
      set.valueCeiling = String(valueCeiling);
    }
    if (probabilityToSign !== undefined) {
      set.probabilityToSign = probabilityToSign === null ? null : String(probabilityToSign);
    }

    await this.db.update(agreements).set(set).where(eq(agreements.id, id));
  }

  async deleteAgreement(id: string): Promise<boolean> {
    const deleted = await this.db
      .delete(agreements)
      .where(eq(agreements.id, id))
      .returning({ id: agreements.id });
    return deleted.length > 0;
  }

  async insertPurchaseOrder(po: PurchaseOrder): Promise<void> {
    await this.db.insert(pos).values({ ...po, value: String(po.value) });
  }

  async findPurchaseOrder(id: string): Promise<PurchaseOrder | undefined> {
    const rows = await this.db.select().from(pos).where(eq(pos.id, id));
    return rows.length > 0 ? toPurchaseOrder(rows[0]) : undefined;
  }

  async listPurchaseOrders(agreementIds?: readonly string[]): Promise<PurchaseOrder[]> {
    if (agreementIds !== undefined && agreementIds.length === 0) {
      return [];
    }

    const rows = await this.db
      .select()
      .from(pos)
      .where(agreementIds === undefined ? undefined : inArray(pos.agreementId, [...agreementIds]))
      .orderBy(desc(pos.date), asc(pos.id));

    return rows.map(toPurchaseOrder);
  }

  async deletePurchaseOrder(id: string): Promise<boolean> {
    const deleted = await this.db.delete(pos).where(eq(pos.id, id)).returning({ id: pos.id });
    return deleted.length > 0;
  }

  async deletePurchaseOrdersForAgreement(agreementId: string): Promise<number> {
    const deleted = await this.db
      .delete(pos)
      .where(eq(pos.agreementId, agreementId))
      .returning({ id: pos.id });
    return deleted.length;
  }

  async appendStatusTransition(entry: StatusTransition): Promise<void> {
    await this.db.insert(statusHistory).values(entry);
  }

  async listStatusHistory(agreementId: string): Promise<StatusTransition[]> {
    const rows = await this.db
      .select()
      .from(statusHistory)
      .where(eq(statusHistory.agreementId, agreementId))
      .orderBy(asc(statusHistory.changedAt), asc(statusHistory.id));
    return rows.map(toStatusTransition);
  }

  async deleteStatusHistory(agreementId: string): Promise<number> {
    const deleted = await this.db
      .delete(statusHistory)
      .where(eq(statusHistory.agreementId, agreementId))
      .returning({ id: statusHistory.id });
    return deleted.length;
  }
}

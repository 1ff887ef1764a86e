import type { AgreementStatus, CustomerSegment } from '../domain/enums';
import type { Agreement, PurchaseOrder, StatusTransition } from '../domain/types';

export interface AgreementListFilters {
  status?: AgreementStatus;
  accountManager?: string;
  /** Case-insensitive substring match. */
  customerName?: string;
  region?: string;
  industry?: string;
  customerSegment?: CustomerSegment;
}

/** Fields that may change after creation. */
export type AgreementChanges = Partial<Omit<Agreement, 'id' | 'createdAt'>>;

/**
 * Storage contract the Ledger needs. Implementations hold raw records only;
 * derived fields are never written.
 *
 * Keys set to `undefined` in an AgreementChanges object are left untouched.
 */
export interface LedgerRepository {
  /**
   * Run `work` atomically. Everything written through the repository handed to
   * `work` commits together or not at all.
   */
  transaction<T>(work: (tx: LedgerRepository) => Promise<T>): Promise<T>;

  /** Increment the named counter and return its new value (first call returns 1). */
  nextSequenceValue(name: string): Promise<number>;

  insertAgreement(agreement: Agreement): Promise<void>;
  /** With `forUpdate`, the row stays locked until the surrounding transaction ends. */
  findAgreement(id: string, options?: { forUpdate?: boolean }): Promise<Agreement | undefined>;
  /** Most recently updated first. */
  listAgreements(filters?: AgreementListFilters): Promise<Agreement[]>;
  updateAgreement(id: string, changes: AgreementChanges): Promise<void>;
  deleteAgreement(id: string): Promise<boolean>;

  insertPurchaseOrder(po: PurchaseOrder): Promise<void>;
  findPurchaseOrder(id: string): Promise<PurchaseOrder | undefined>;
  /** All purchase orders, or only those of the given agreements; latest PO date first. */
  listPurchaseOrders(agreementIds?: readonly string[]): Promise<PurchaseOrder[]>;
  deletePurchaseOrder(id: string): Promise<boolean>;
  deletePurchaseOrdersForAgreement(agreementId: string): Promise<number>;

  appendStatusTransition(entry: StatusTransition): Promise<void>;
  /** Oldest first. */
  listStatusHistory(agreementId: string): Promise<StatusTransition[]>;
  deleteStatusHistory(agreementId: string): Promise<number>;
}

import type { Agreement, PurchaseOrder, StatusTransition } from '../../src/domain/types';
import type { AgreementChanges, AgreementListFilters, LedgerRepository } from '../../src/ledger/repository';

interface State {
  agreements: Map<string, Agreement>;
  purchaseOrders: Map<string, PurchaseOrder>;
  history: StatusTransition[];
  sequences: Map<string, number>;
}

const cloneState = (state: State): State => ({
  agreements: new Map([...state.agreements].map(([id, a]) => [id, { ...a }])),
  purchaseOrders: new Map([...state.purchaseOrders].map(([id, po]) => [id, { ...po }])),
  history: state.history.map((entry) => ({ ...entry })),
  sequences: new Map(state.sequences),
});

/**
 * In-process stand-in for the Postgres repository.
 *
 * Transactions run one at a time and restore the previous state when the
 * work throws, which is what the ledger relies on from the real store.
 */
export class InMemoryLedgerRepository implements LedgerRepository {
  private state: State = {
    agreements: new Map(),
    purchaseOrders: new Map(),
    history: [],
    sequences: new Map(),
  };
  private queue: Promise<unknown> = Promise.resolve();
  transactionCount = 0;

  async transaction<T>(work: (tx: LedgerRepository) => Promise<T>): Promise<T> {
    const run = async (): Promise<T> => {
      this.transactionCount += 1;
      const snapshot = cloneState(this.state);
      try {
        return await work(this);
      } catch (error) {
        this.state = snapshot;
        throw error;
      }
    };

    const result = this.queue.then(run, run);
    this.queue = result.catch(() => undefined);
    return result;
  }

  async nextSequenceValue(name: string): Promise<number> {
    const next = (this.state.sequences.get(name) ?? 0) + 1;
    this.state.sequences.set(name, next);
    return next;
  }

  async insertAgreement(agreement: Agreement): Promise<void> {
    if (this.state.agreements.has(agreement.id)) {
      throw new Error(`duplicate key agreement_id=${agreement.id}`);
    }
    this.state.agreements.set(agreement.id, { ...agreement });
  }

  async findAgreement(id: string): Promise<Agreement | undefined> {
    const found = this.state.agreements.get(id);
    return found ? { ...found } : undefined;
  }

  async listAgreements(filters: AgreementListFilters = {}): Promise<Agreement[]> {
    const needle = filters.customerName?.toLowerCase();
    return [...this.state.agreements.values()]
      .filter((a) => !filters.status || a.status === filters.status)
      .filter((a) => !filters.accountManager || a.accountManager === filters.accountManager)
      .filter((a) => !needle || a.customerName.toLowerCase().includes(needle))
      .filter((a) => !filters.region || a.region === filters.region)
      .filter((a) => !filters.industry || a.industry === filters.industry)
      .filter((a) => !filters.customerSegment || a.customerSegment === filters.customerSegment)
      .sort((a, b) => b.lastUpdated.getTime() - a.lastUpdated.getTime())
      .map((a) => ({ ...a }));
  }

  async updateAgreement(id: string, changes: AgreementChanges): Promise<void> {
    const current = this.state.agreements.get(id);
    if (!current) return;
    const next: Agreement = { ...current };
    Object.assign(next, Object.fromEntries(Object.entries(changes).filter(([, value]) => value !== undefined)));
    this.state.agreements.set(id, next);
  }

  async deleteAgreement(id: string): Promise<boolean> {
    return this.state.agreements.delete(id);
  }

  async insertPurchaseOrder(po: PurchaseOrder): Promise<void> {
    if (!this.state.agreements.has(po.agreementId)) {
      throw new Error(`foreign key violation: agreement ${po.agreementId}`);
    }
    if (this.state.purchaseOrders.has(po.id)) {
      throw new Error(`duplicate key po_id=${po.id}`);
    }
    this.state.purchaseOrders.set(po.id, { ...po });
  }

  async findPurchaseOrder(id: string): Promise<PurchaseOrder | undefined> {
    const found = this.state.purchaseOrders.get(id);
    return found ? { ...found } : undefined;
  }

  async listPurchaseOrders(agreementIds?: readonly string[]): Promise<PurchaseOrder[]> {
    return [...this.state.purchaseOrders.values()]
      .filter((po) => agreementIds === undefined || agreementIds.includes(po.agreementId))
      .sort((a, b) => b.date.localeCompare(a.date) || a.id.localeCompare(b.id))
      .map((po) => ({ ...po }));
  }

  async deletePurchaseOrder(id: string): Promise<boolean> {
    return this.state.purchaseOrders.delete(id);
  }

  async deletePurchaseOrdersForAgreement(agreementId: string): Promise<number> {
    let removed = 0;
    for (const [id, po] of this.state.purchaseOrders) {
      if (po.agreementId === agreementId) {
        this.state.purchaseOrders.delete(id);
        removed += 1;
      }
    }
    return removed;
  }

  async appendStatusTransition(entry: StatusTransition): Promise<void> {
    this.state.history.push({ ...entry });
  }

  async listStatusHistory(agreementId: string): Promise<StatusTransition[]> {
    return this.state.history.filter((entry) => entry.agreementId === agreementId).map((entry) => ({ ...entry }));
  }

  async deleteStatusHistory(agreementId: string): Promise<number> {
    const before = this.state.history.length;
    this.state.history = this.state.history.filter((entry) => entry.agreementId !== agreementId);
    return before - this.state.history.length;
  }
}

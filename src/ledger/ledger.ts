import {
  createCurrencyNormalizer,
  DEFAULT_FX_RATES,
  toMinorUnits,
  type CurrencyNormalizer,
  type FxRateTable,
} from '../domain/currency';
import { toIsoDate } from '../domain/dates';
import { sumNormalizedPOs, toAgreementView } from '../domain/derived-fields';
import { isPostSignatureStatus, type AgreementStatus, type AgreementType, type Currency, type CustomerSegment } from '../domain/enums';
import { planTransition } from '../domain/lifecycle';
import type { Agreement, AgreementView, IsoDate, PurchaseOrder, StatusTransition } from '../domain/types';
import { parseAgreementPatch, parseNewAgreement, parseNewPurchaseOrder } from '../domain/validation';
import { CeilingExceededError, NotFoundError, ValidationError } from '../errors';
import type { AgreementChanges, AgreementListFilters, LedgerRepository } from './repository';

export interface NewAgreementInput {
  name: string;
  customerName: string;
  customerSegment: CustomerSegment;
  agreementType: AgreementType;
  accountManager: string;
  valueCeiling: number;
  currency?: Currency;
  /** Defaults to Pipeline. */
  status?: AgreementStatus;
  /** Defaults to today. */
  statusDate?: IsoDate;
  region?: string | null;
  industry?: string | null;
  startDate?: IsoDate | null;
  endDate?: IsoDate | null;
  salesOwner?: string | null;
  partnershipsVendors?: string | null;
  probabilityToSign?: number | null;
  expectedSignatureDate?: IsoDate | null;
  signedDate?: IsoDate | null;
  renewalTerms?: string | null;
  notes?: string | null;
  attachments?: string | null;
}

export type AgreementPatch = Partial<NewAgreementInput>;

export interface NewPurchaseOrderInput {
  agreementId: string;
  value: number;
  date: IsoDate;
  currency?: Currency;
  poNumber?: string | null;
  /** Defaults to the agreement's customer. */
  customerName?: string | null;
  /** Defaults to the agreement's account manager. */
  accountManager?: string | null;
  notes?: string | null;
}

export interface CreatePOOptions {
  /** Accept the purchase order even if it pushes the agreement past its ceiling. */
  overrideCeiling?: boolean;
}

export interface ChangeOptions {
  /** Recorded on the status history entry. */
  changedBy?: string;
}

export type LedgerLogger = Pick<Console, 'info' | 'warn'>;

export interface LedgerOptions {
  repository: LedgerRepository;
  rates?: FxRateTable;
  now?: () => Date;
  logger?: LedgerLogger;
}

const AGREEMENT_ID_PREFIX = 'AGR-';

export function formatAgreementId(year: number, sequence: number): string {
  return `${AGREEMENT_ID_PREFIX}${year}-${String(sequence).padStart(4, '0')}`;
}

/**
 * Next purchase order id for an agreement: one past the highest sequence
 * already used under it, so ids stay unique after deletions.
 */
export function nextPurchaseOrderId(agreementId: string, existing: readonly Pick<PurchaseOrder, 'id'>[]): string {
  const suffix = agreementId.startsWith(AGREEMENT_ID_PREFIX)
    ? agreementId.slice(AGREEMENT_ID_PREFIX.length)
    : agreementId;
  const prefix = `PO-${suffix}-`;

  let highest = 0;
  for (const po of existing) {
    if (!po.id.startsWith(prefix)) continue;
    const sequence = Number.parseInt(po.id.slice(prefix.length), 10);
    if (Number.isInteger(sequence) && sequence > highest) {
      highest = sequence;
    }
  }

  return `${prefix}${String(highest + 1).padStart(3, '0')}`;
}

/**
 * Agreements, purchase orders and the status log.
 *
 * Every mutation runs in a single repository transaction. Every read returns
 * agreements with their derived fields computed from current data.
 */
export class Ledger {
  private readonly repository: LedgerRepository;
  /** Converts amounts to SAR with this ledger's rate table. */
  readonly normalize: CurrencyNormalizer;
  private readonly now: () => Date;
  private readonly logger: LedgerLogger;

  constructor(options: LedgerOptions) {
    this.repository = options.repository;
    this.normalize = createCurrencyNormalizer(options.rates ?? DEFAULT_FX_RATES);
    this.now = options.now ?? (() => new Date());
    this.logger = options.logger ?? console;
  }

  private today(): IsoDate {
    return toIsoDate(this.now());
  }

  // ── Agreements ────────────────────────────────────────────────────────────

  async createAgreement(input: NewAgreementInput, options: ChangeOptions = {}): Promise<string> {
    const data = parseNewAgreement(input);
    const now = this.now();
    const today = toIsoDate(now);

    const id = await this.repository.transaction(async (tx) => {
      const year = now.getUTCFullYear();
      const sequence = await tx.nextSequenceValue(`agreement-${year}`);
      const agreementId = formatAgreementId(year, sequence);

      const agreement: Agreement = {
        id: agreementId,
        name: data.name,
        customerName: data.customerName,
        customerSegment: data.customerSegment,
        region: data.region ?? null,
        industry: data.industry ?? null,
        agreementType: data.agreementType,
        startDate: data.startDate ?? null,
        endDate: data.endDate ?? null,
        valueCeiling: data.valueCeiling,
        currency: data.currency,
        status: data.status,
        statusDate: data.statusDate ?? today,
        accountManager: data.accountManager,
        salesOwner: data.salesOwner ?? null,
        partnershipsVendors: data.partnershipsVendors ?? null,
        probabilityToSign: data.probabilityToSign ?? null,
        expectedSignatureDate: data.expectedSignatureDate ?? null,
        signedDate: data.signedDate ?? (isPostSignatureStatus(data.status) ? today : null),
        renewalTerms: data.renewalTerms ?? null,
        notes: data.notes ?? null,
        attachments: data.attachments ?? null,
        createdAt: now,
        lastUpdated: now,
      };

      await tx.insertAgreement(agreement);
      await tx.appendStatusTransition({
        agreementId,
        oldStatus: null,
        newStatus: agreement.status,
        changedAt: now,
        changedBy: options.changedBy ?? null,
      });

      return agreementId;
    });

    this.logger.info(`Created agreement ${id} (${data.status})`);
    return id;
  }

  /**
   * Apply a partial update. A status change must follow an allowed lifecycle
   * edge; it is logged and committed together with the other changed fields.
   */
  async updateAgreement(id: string, patch: AgreementPatch, options: ChangeOptions = {}): Promise<AgreementView> {
    const data = parseAgreementPatch(patch);
    const now = this.now();
    const today = toIsoDate(now);

    const transition = await this.repository.transaction(async (tx) => {
      const current = await tx.findAgreement(id, { forUpdate: true });
      if (!current) {
        throw new NotFoundError('agreement', id);
      }

      const plan = data.status === undefined ? { kind: 'unchanged' as const } : planTransition(current, data.status, today);
      const resultingStatus = plan.kind === 'transition' ? plan.to : current.status;
      if (data.signedDate === null && isPostSignatureStatus(resultingStatus)) {
        throw new ValidationError(
          `Invalid agreement update: signedDate: is required while the agreement is ${resultingStatus}`,
        );
      }

      const changes: AgreementChanges = { ...data, lastUpdated: now };

      if (plan.kind === 'transition') {
        changes.statusDate = data.statusDate ?? plan.statusDate;
        if (plan.signedDate && data.signedDate === undefined) {
          changes.signedDate = plan.signedDate;
        }
      }

      await tx.updateAgreement(id, changes);

      if (plan.kind === 'unchanged') {
        return null;
      }

      await tx.appendStatusTransition({
        agreementId: id,
        oldStatus: plan.from,
        newStatus: plan.to,
        changedAt: now,
        changedBy: options.changedBy ?? null,
      });
      return plan;
    });

    if (transition) {
      this.logger.info(`Agreement ${id} moved ${transition.from} -> ${transition.to}`);
    }

    return this.requireAgreement(id);
  }

  /**
   * Remove an agreement with its purchase orders and status history.
   * Unknown ids are a no-op and return false.
   */
  async deleteAgreement(id: string): Promise<boolean> {
    const removed = await this.repository.transaction(async (tx) => {
      await tx.deletePurchaseOrdersForAgreement(id);
      await tx.deleteStatusHistory(id);
      return tx.deleteAgreement(id);
    });

    if (removed) {
      this.logger.info(`Deleted agreement ${id}`);
    }
    return removed;
  }

  async getAgreement(id: string): Promise<AgreementView | undefined> {
    const agreement = await this.repository.findAgreement(id);
    if (!agreement) return undefined;

    const purchaseOrders = await this.repository.listPurchaseOrders([id]);
    return toAgreementView(agreement, purchaseOrders, { today: this.today(), normalize: this.normalize });
  }

  async requireAgreement(id: string): Promise<AgreementView> {
    const view = await this.getAgreement(id);
    if (!view) {
      throw new NotFoundError('agreement', id);
    }
    return view;
  }

  async listAgreements(filters: AgreementListFilters = {}): Promise<AgreementView[]> {
    const found = await this.repository.listAgreements(filters);
    const purchaseOrders = await this.repository.listPurchaseOrders(found.map((a) => a.id));

    const byAgreement = new Map<string, PurchaseOrder[]>();
    for (const po of purchaseOrders) {
      const list = byAgreement.get(po.agreementId);
      if (list) {
        list.push(po);
      } else {
        byAgreement.set(po.agreementId, [po]);
      }
    }

    const today = this.today();
    return found.map((agreement) =>
      toAgreementView(agreement, byAgreement.get(agreement.id) ?? [], { today, normalize: this.normalize }),
    );
  }

  async getStatusHistory(agreementId: string): Promise<StatusTransition[]> {
    return this.repository.listStatusHistory(agreementId);
  }

  // ── Purchase orders ───────────────────────────────────────────────────────

  /**
   * Record a purchase order against an agreement.
   *
   * The agreement row is locked while the running total is read and the new
   * order inserted, so concurrent orders against one agreement are checked
   * one at a time.
   */
  async createPO(input: NewPurchaseOrderInput, options: CreatePOOptions = {}): Promise<string> {
    const data = parseNewPurchaseOrder(input);
    const now = this.now();

    const { id, overCeiling } = await this.repository.transaction(async (tx) => {
      const agreement = await tx.findAgreement(data.agreementId, { forUpdate: true });
      if (!agreement) {
        throw new NotFoundError('agreement', data.agreementId);
      }

      const existing = await tx.listPurchaseOrders([agreement.id]);
      const currentTotal = sumNormalizedPOs(existing, this.normalize);
      const newValue = this.normalize(data.value, data.currency);
      const ceiling = this.normalize(agreement.valueCeiling, agreement.currency);
      // Compared in hundredths: an exact fill is within the ceiling.
      const totalAfter = sumNormalizedPOs([...existing, { value: data.value, currency: data.currency }], this.normalize);
      const exceeds = toMinorUnits(totalAfter) > toMinorUnits(ceiling);

      if (exceeds && !options.overrideCeiling) {
        throw new CeilingExceededError(agreement.id, currentTotal, newValue, ceiling);
      }

      const po: PurchaseOrder = {
        id: nextPurchaseOrderId(agreement.id, existing),
        agreementId: agreement.id,
        poNumber: data.poNumber ?? null,
        date: data.date,
        value: data.value,
        currency: data.currency,
        customerName: data.customerName ?? agreement.customerName,
        accountManager: data.accountManager ?? agreement.accountManager,
        notes: data.notes ?? null,
        createdAt: now,
        lastUpdated: now,
      };
      await tx.insertPurchaseOrder(po);

      return { id: po.id, overCeiling: exceeds };
    });

    if (overCeiling) {
      this.logger.warn(`Purchase order ${id} exceeds the ceiling of ${data.agreementId} (override)`);
    }
    return id;
  }

  /**
   * Remove a purchase order. Ceilings are not re-checked.
   */
  async deletePO(id: string): Promise<boolean> {
    return this.repository.transaction((tx) => tx.deletePurchaseOrder(id));
  }

  async getPO(id: string): Promise<PurchaseOrder | undefined> {
    return this.repository.findPurchaseOrder(id);
  }

  async listPOsForAgreement(agreementId: string): Promise<PurchaseOrder[]> {
    return this.repository.listPurchaseOrders([agreementId]);
  }

  /** Purchase orders of several agreements in one read, PO date descending. */
  async listPOsForAgreements(agreementIds: readonly string[]): Promise<PurchaseOrder[]> {
    return this.repository.listPurchaseOrders(agreementIds);
  }

  async listAllPOs(): Promise<PurchaseOrder[]> {
    return this.repository.listPurchaseOrders();
  }
}

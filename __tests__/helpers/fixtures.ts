import { vi } from 'vitest';
import type { Agreement, PurchaseOrder } from '../../src/domain/types';
import { Ledger, type LedgerLogger, type NewAgreementInput } from '../../src/ledger/ledger';
import { InMemoryLedgerRepository } from './in-memory-repository';

export const NOW = new Date('2026-03-15T10:00:00.000Z');
export const TODAY = '2026-03-15';

/** ISO date `days` before TODAY. */
export function daysAgo(days: number): string {
  const date = new Date(Date.UTC(2026, 2, 15));
  date.setUTCDate(date.getUTCDate() - days);
  return date.toISOString().slice(0, 10);
}

export function makeAgreement(overrides: Partial<Agreement> = {}): Agreement {
  return {
    id: 'AGR-2026-0001',
    name: 'Smart Parking Framework',
    customerName: 'Riyadh Municipality',
    customerSegment: 'Government',
    region: 'Central',
    industry: 'Public Sector',
    agreementType: 'Framework',
    startDate: null,
    endDate: null,
    valueCeiling: 1_000_000,
    currency: 'SAR',
    status: 'Pipeline',
    statusDate: TODAY,
    accountManager: 'Sara Ahmed',
    salesOwner: null,
    partnershipsVendors: null,
    probabilityToSign: null,
    expectedSignatureDate: null,
    signedDate: null,
    renewalTerms: null,
    notes: null,
    attachments: null,
    createdAt: NOW,
    lastUpdated: NOW,
    ...overrides,
  };
}

export function makePO(overrides: Partial<PurchaseOrder> = {}): PurchaseOrder {
  return {
    id: 'PO-2026-0001-001',
    agreementId: 'AGR-2026-0001',
    poNumber: null,
    date: TODAY,
    value: 1000,
    currency: 'SAR',
    customerName: 'Riyadh Municipality',
    accountManager: 'Sara Ahmed',
    notes: null,
    createdAt: NOW,
    lastUpdated: NOW,
    ...overrides,
  };
}

export const baseAgreementInput: NewAgreementInput = {
  name: 'Smart Parking Framework',
  customerName: 'Riyadh Municipality',
  customerSegment: 'Government',
  agreementType: 'Framework',
  accountManager: 'Sara Ahmed',
  valueCeiling: 1_000_000,
};

export function silentLogger(): LedgerLogger {
  return { info: vi.fn(), warn: vi.fn() };
}

export interface TestLedger {
  ledger: Ledger;
  repository: InMemoryLedgerRepository;
  logger: LedgerLogger;
  /** Move the ledger's clock. */
  setNow: (instant: Date) => void;
}

export function createTestLedger(): TestLedger {
  const repository = new InMemoryLedgerRepository();
  const logger = silentLogger();
  let current = NOW;
  const ledger = new Ledger({ repository, logger, now: () => current });
  return {
    ledger,
    repository,
    logger,
    setNow: (instant) => {
      current = instant;
    },
  };
}

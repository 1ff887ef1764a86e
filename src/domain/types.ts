import type {
  AgingBucket,
  AgreementStatus,
  AgreementType,
  Currency,
  CustomerSegment,
  RiskFlag,
} from './enums';

/** Calendar date as `YYYY-MM-DD`. */
export type IsoDate = string;

/**
 * Raw agreement as stored. Amounts are in the agreement's own currency.
 */
export interface Agreement {
  id: string;
  name: string;
  customerName: string;
  customerSegment: CustomerSegment;
  region: string | null;
  industry: string | null;
  agreementType: AgreementType;
  startDate: IsoDate | null;
  endDate: IsoDate | null;
  valueCeiling: number;
  currency: Currency;
  status: AgreementStatus;
  statusDate: IsoDate;
  accountManager: string;
  salesOwner: string | null;
  partnershipsVendors: string | null;
  probabilityToSign: number | null;
  expectedSignatureDate: IsoDate | null;
  signedDate: IsoDate | null;
  renewalTerms: string | null;
  notes: string | null;
  attachments: string | null;
  createdAt: Date;
  lastUpdated: Date;
}

export interface PurchaseOrder {
  id: string;
  agreementId: string;
  poNumber: string | null;
  date: IsoDate;
  value: number;
  currency: Currency;
  customerName: string;
  accountManager: string | null;
  notes: string | null;
  createdAt: Date;
  lastUpdated: Date;
}

export interface StatusTransition {
  agreementId: string;
  oldStatus: AgreementStatus | null;
  newStatus: AgreementStatus;
  changedAt: Date;
  changedBy: string | null;
}

/**
 * Values computed from an agreement and its purchase orders on every read.
 * All amounts are in the base currency.
 */
export interface DerivedFields {
  totalPosValue: number;
  ceilingNormalized: number;
  utilizationPercent: number;
  daysSinceSignature: number | null;
  agingBucket: AgingBucket | null;
  riskFlag: RiskFlag;
  isMonetizing: boolean;
}

export type AgreementView = Agreement & DerivedFields;

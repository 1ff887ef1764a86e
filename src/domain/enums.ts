export const AGREEMENT_STATUSES = [
  'Pipeline',
  'Draft',
  'LegalReview',
  'SignaturePending',
  'Signed',
  'Active',
  'Expired',
  'Terminated',
] as const;
export type AgreementStatus = (typeof AGREEMENT_STATUSES)[number];

export const PRE_SIGNATURE_STATUSES = [
  'Pipeline',
  'Draft',
  'LegalReview',
  'SignaturePending',
] as const satisfies readonly AgreementStatus[];
export type PreSignatureStatus = (typeof PRE_SIGNATURE_STATUSES)[number];

export const POST_SIGNATURE_STATUSES = ['Signed', 'Active'] as const satisfies readonly AgreementStatus[];
export type PostSignatureStatus = (typeof POST_SIGNATURE_STATUSES)[number];

export const CUSTOMER_SEGMENTS = ['Government', 'Smart City', 'Enterprise', 'SME', 'Other'] as const;
export type CustomerSegment = (typeof CUSTOMER_SEGMENTS)[number];

export const AGREEMENT_TYPES = ['Framework', 'Master Services', 'Blanket PO', 'Other'] as const;
export type AgreementType = (typeof AGREEMENT_TYPES)[number];

export const CURRENCIES = ['SAR', 'USD', 'EUR'] as const;
export type Currency = (typeof CURRENCIES)[number];

/** Normalization target for every amount the ledger compares or aggregates. */
export const BASE_CURRENCY: Currency = 'SAR';

export const RISK_FLAGS = ['Green', 'Amber', 'Red'] as const;
export type RiskFlag = (typeof RISK_FLAGS)[number];

export const AGING_BUCKETS = ['<30d', '30-60d', '61-90d', '>90d'] as const;
export type AgingBucket = (typeof AGING_BUCKETS)[number];

/**
 * Compact spellings accepted on input, mapped to the stored value.
 */
export const CUSTOMER_SEGMENT_ALIASES: Readonly<Record<string, CustomerSegment>> = {
  SmartCity: 'Smart City',
};

export const AGREEMENT_TYPE_ALIASES: Readonly<Record<string, AgreementType>> = {
  MasterServices: 'Master Services',
  BlanketPO: 'Blanket PO',
};

/** Stored statuses are plain text; rows written outside the ledger may hold anything. */
export function isAgreementStatus(value: string): value is AgreementStatus {
  return (AGREEMENT_STATUSES as readonly string[]).includes(value);
}

export function isPreSignatureStatus(status: AgreementStatus): status is PreSignatureStatus {
  return (PRE_SIGNATURE_STATUSES as readonly AgreementStatus[]).includes(status);
}

export function isPostSignatureStatus(status: AgreementStatus): status is PostSignatureStatus {
  return (POST_SIGNATURE_STATUSES as readonly AgreementStatus[]).includes(status);
}

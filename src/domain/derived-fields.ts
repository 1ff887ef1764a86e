import { isPostSignatureStatus, type AgingBucket, type AgreementStatus, type RiskFlag } from './enums';
import { normalizeToBase, roundMoney, type CurrencyNormalizer } from './currency';
import { daysBetween } from './dates';
import type { Agreement, AgreementView, DerivedFields, IsoDate, PurchaseOrder } from './types';

export interface DeriveOptions {
  today: IsoDate;
  normalize?: CurrencyNormalizer;
}

export function calculateDaysSinceSignature(signedDate: IsoDate | null, today: IsoDate): number | null {
  if (!signedDate) return null;
  return daysBetween(signedDate, today);
}

export function calculateAgingBucket(days: number | null): AgingBucket | null {
  if (days === null) return null;
  if (days < 30) return '<30d';
  if (days <= 60) return '30-60d';
  if (days <= 90) return '61-90d';
  return '>90d';
}

export function calculateUtilization(totalPosValue: number, ceilingNormalized: number): number {
  if (ceilingNormalized <= 0) return 0;
  return (totalPosValue / ceilingNormalized) * 100;
}

/**
 * Traffic-light monetization health. Only Signed and Active agreements can be
 * anything other than Green.
 *
 * - Red: more than 90 days since signature with no purchase orders
 * - Amber: 31-90 days with no purchase orders, or under 10% utilization after 60 days
 */
export function calculateRiskFlag(
  status: AgreementStatus,
  daysSinceSignature: number | null,
  totalPosValue: number,
  utilizationPercent: number,
): RiskFlag {
  if (!isPostSignatureStatus(status)) return 'Green';
  if (daysSinceSignature === null) return 'Green';

  if (daysSinceSignature > 90 && totalPosValue === 0) {
    return 'Red';
  }

  const unmonetizedMidTerm = daysSinceSignature >= 31 && daysSinceSignature <= 90 && totalPosValue === 0;
  const underUtilized = daysSinceSignature > 60 && utilizationPercent < 10;
  if (unmonetizedMidTerm || underUtilized) {
    return 'Amber';
  }

  return 'Green';
}

/**
 * Base-currency total of the given purchase orders, rounded to hundredths
 * after summing.
 */
export function sumNormalizedPOs(
  purchaseOrders: readonly Pick<PurchaseOrder, 'value' | 'currency'>[],
  normalize: CurrencyNormalizer = normalizeToBase,
): number {
  return roundMoney(purchaseOrders.reduce((total, po) => total + normalize(po.value, po.currency), 0));
}

/**
 * Compute every derived field for one agreement from its raw record and its
 * purchase orders. Pure: the same inputs always give the same output.
 */
export function deriveFields(
  agreement: Agreement,
  purchaseOrders: readonly PurchaseOrder[],
  { today, normalize = normalizeToBase }: DeriveOptions,
): DerivedFields {
  const totalPosValue = sumNormalizedPOs(purchaseOrders, normalize);
  const ceilingNormalized = normalize(agreement.valueCeiling, agreement.currency);
  const utilizationPercent = calculateUtilization(totalPosValue, ceilingNormalized);
  const daysSinceSignature = calculateDaysSinceSignature(agreement.signedDate, today);

  return {
    totalPosValue,
    ceilingNormalized,
    utilizationPercent,
    daysSinceSignature,
    agingBucket: calculateAgingBucket(daysSinceSignature),
    riskFlag: calculateRiskFlag(agreement.status, daysSinceSignature, totalPosValue, utilizationPercent),
    isMonetizing: totalPosValue > 0,
  };
}

export function toAgreementView(
  agreement: Agreement,
  purchaseOrders: readonly PurchaseOrder[],
  options: DeriveOptions,
): AgreementView {
  return { ...agreement, ...deriveFields(agreement, purchaseOrders, options) };
}

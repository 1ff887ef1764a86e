import {
  isPostSignatureStatus,
  isPreSignatureStatus,
  type AgingBucket,
  type PreSignatureStatus,
  type RiskFlag,
} from '../domain/enums';
import { normalizeToBase, type CurrencyNormalizer } from '../domain/currency';
import type { AgreementView, PurchaseOrder } from '../domain/types';

export interface PipelineStats {
  totalCount: number;
  byStatus: Record<PreSignatureStatus, number>;
  /** Sum of normalized ceilings. */
  totalPotentialCeiling: number;
  avgProbability: number;
  /** Sum of ceiling x probability. */
  weightedValue: number;
}

export interface MonetizationStats {
  agreementsCount: number;
  totalSignedCeiling: number;
  totalMonetizedValue: number;
  overallUtilization: number;
  agreementsWithoutPos: number;
  byRisk: Record<RiskFlag, number>;
}

export interface AccountManagerStats {
  accountManager: string;
  totalAgreements: number;
  signedAgreements: number;
  signedValue: number;
  monetizedValue: number;
  utilization: number;
}

export type AgingRiskMatrix = Record<AgingBucket, Record<RiskFlag, number>>;

export interface ForecastData {
  expectedPipelineValue: number;
  /** Normalized PO value per calendar month (`YYYY-MM`), months ascending. */
  monthlyPos: Record<string, number>;
}

const emptyRiskCounts = (): Record<RiskFlag, number> => ({ Green: 0, Amber: 0, Red: 0 });

const utilizationOf = (monetized: number, ceiling: number): number =>
  ceiling > 0 ? (monetized / ceiling) * 100 : 0;

/**
 * Pre-signature funnel. A missing probability counts as 0%.
 */
export function computePipelineStats(agreements: readonly AgreementView[]): PipelineStats {
  const byStatus: Record<PreSignatureStatus, number> = { Pipeline: 0, Draft: 0, LegalReview: 0, SignaturePending: 0 };

  let totalPotentialCeiling = 0;
  let weightedValue = 0;
  let probabilitySum = 0;
  let totalCount = 0;

  for (const agreement of agreements) {
    if (!isPreSignatureStatus(agreement.status)) continue;

    const probability = agreement.probabilityToSign ?? 0;
    byStatus[agreement.status] += 1;
    totalCount += 1;
    totalPotentialCeiling += agreement.ceilingNormalized;
    weightedValue += agreement.ceilingNormalized * (probability / 100);
    probabilitySum += probability;
  }

  return {
    totalCount,
    byStatus,
    totalPotentialCeiling,
    avgProbability: totalCount > 0 ? probabilitySum / totalCount : 0,
    weightedValue,
  };
}

export function computeMonetizationStats(agreements: readonly AgreementView[]): MonetizationStats {
  const stats: MonetizationStats = {
    agreementsCount: 0,
    totalSignedCeiling: 0,
    totalMonetizedValue: 0,
    overallUtilization: 0,
    agreementsWithoutPos: 0,
    byRisk: emptyRiskCounts(),
  };

  for (const agreement of agreements) {
    if (!isPostSignatureStatus(agreement.status)) continue;

    stats.agreementsCount += 1;
    stats.totalSignedCeiling += agreement.ceilingNormalized;
    stats.totalMonetizedValue += agreement.totalPosValue;
    if (!agreement.isMonetizing) {
      stats.agreementsWithoutPos += 1;
    }
    stats.byRisk[agreement.riskFlag] += 1;
  }

  stats.overallUtilization = utilizationOf(stats.totalMonetizedValue, stats.totalSignedCeiling);
  return stats;
}

/**
 * Per account manager, highest monetized value first.
 */
export function computeAccountManagerStats(agreements: readonly AgreementView[]): AccountManagerStats[] {
  const byManager = new Map<string, AccountManagerStats>();

  for (const agreement of agreements) {
    let stats = byManager.get(agreement.accountManager);
    if (!stats) {
      stats = {
        accountManager: agreement.accountManager,
        totalAgreements: 0,
        signedAgreements: 0,
        signedValue: 0,
        monetizedValue: 0,
        utilization: 0,
      };
      byManager.set(agreement.accountManager, stats);
    }

    stats.totalAgreements += 1;
    if (isPostSignatureStatus(agreement.status)) {
      stats.signedAgreements += 1;
      stats.signedValue += agreement.ceilingNormalized;
      stats.monetizedValue += agreement.totalPosValue;
    }
  }

  return [...byManager.values()]
    .map((stats) => ({ ...stats, utilization: utilizationOf(stats.monetizedValue, stats.signedValue) }))
    .sort((a, b) => b.monetizedValue - a.monetizedValue);
}

/**
 * Post-signature agreement counts by aging bucket and risk flag.
 */
export function computeAgingRiskMatrix(agreements: readonly AgreementView[]): AgingRiskMatrix {
  const matrix: AgingRiskMatrix = {
    '<30d': emptyRiskCounts(),
    '30-60d': emptyRiskCounts(),
    '61-90d': emptyRiskCounts(),
    '>90d': emptyRiskCounts(),
  };

  for (const agreement of agreements) {
    if (!isPostSignatureStatus(agreement.status) || agreement.agingBucket === null) continue;
    matrix[agreement.agingBucket][agreement.riskFlag] += 1;
  }

  return matrix;
}

export function computeForecast(
  agreements: readonly AgreementView[],
  purchaseOrders: readonly PurchaseOrder[],
  normalize: CurrencyNormalizer = normalizeToBase,
): ForecastData {
  const expectedPipelineValue = agreements
    .filter((agreement) => isPreSignatureStatus(agreement.status))
    .reduce((sum, agreement) => sum + agreement.ceilingNormalized * ((agreement.probabilityToSign ?? 0) / 100), 0);

  const totals = new Map<string, number>();
  for (const po of purchaseOrders) {
    const month = po.date.slice(0, 7);
    totals.set(month, (totals.get(month) ?? 0) + normalize(po.value, po.currency));
  }

  const monthlyPos: Record<string, number> = {};
  for (const month of [...totals.keys()].sort()) {
    monthlyPos[month] = totals.get(month) ?? 0;
  }

  return { expectedPipelineValue, monthlyPos };
}

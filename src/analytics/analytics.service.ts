import type { PurchaseOrder } from '../domain/types';
import type { Ledger } from '../ledger/ledger';
import type { AgreementListFilters } from '../ledger/repository';
import {
  computeAccountManagerStats,
  computeAgingRiskMatrix,
  computeForecast,
  computeMonetizationStats,
  computePipelineStats,
  type AccountManagerStats,
  type AgingRiskMatrix,
  type ForecastData,
  type MonetizationStats,
  type PipelineStats,
} from './aggregations';

export interface DashboardSnapshot {
  pipeline: PipelineStats;
  monetization: MonetizationStats;
  accountManagers: AccountManagerStats[];
  agingRisk: AgingRiskMatrix;
  forecast: ForecastData;
}

/**
 * Read-side statistics over the ledger. Nothing is cached: each call reads
 * the agreements again and derives every figure from current data.
 */
export class AnalyticsService {
  constructor(private readonly ledger: Ledger) {}

  /**
   * Every purchase order, or only those of the filtered agreements when
   * filters are given.
   */
  private async purchaseOrdersFor(
    agreementIds: readonly string[],
    filters?: AgreementListFilters,
  ): Promise<PurchaseOrder[]> {
    return filters ? this.ledger.listPOsForAgreements(agreementIds) : this.ledger.listAllPOs();
  }

  async getPipelineStats(filters?: AgreementListFilters): Promise<PipelineStats> {
    return computePipelineStats(await this.ledger.listAgreements(filters));
  }

  async getMonetizationStats(filters?: AgreementListFilters): Promise<MonetizationStats> {
    return computeMonetizationStats(await this.ledger.listAgreements(filters));
  }

  async getAccountManagerStats(filters?: AgreementListFilters): Promise<AccountManagerStats[]> {
    return computeAccountManagerStats(await this.ledger.listAgreements(filters));
  }

  async getAgingRiskMatrix(filters?: AgreementListFilters): Promise<AgingRiskMatrix> {
    return computeAgingRiskMatrix(await this.ledger.listAgreements(filters));
  }

  async getForecastData(filters?: AgreementListFilters): Promise<ForecastData> {
    const agreements = await this.ledger.listAgreements(filters);
    const purchaseOrders = await this.purchaseOrdersFor(agreements.map((a) => a.id), filters);
    return computeForecast(agreements, purchaseOrders, this.ledger.normalize);
  }

  /**
   * All statistics from one read of the ledger.
   */
  async getSnapshot(filters?: AgreementListFilters): Promise<DashboardSnapshot> {
    const agreements = await this.ledger.listAgreements(filters);
    const purchaseOrders = await this.purchaseOrdersFor(agreements.map((a) => a.id), filters);

    return {
      pipeline: computePipelineStats(agreements),
      monetization: computeMonetizationStats(agreements),
      accountManagers: computeAccountManagerStats(agreements),
      agingRisk: computeAgingRiskMatrix(agreements),
      forecast: computeForecast(agreements, purchaseOrders, this.ledger.normalize),
    };
  }
}

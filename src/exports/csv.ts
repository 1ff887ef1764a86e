import { stringify } from 'csv-stringify/sync';
import type { AgreementView, PurchaseOrder } from '../domain/types';

/**
 * Column order of the agreements export. The derived columns are written for
 * reporting and ignored when the file is imported again.
 */
export const AGREEMENT_EXPORT_COLUMNS = [
  'agreement_id',
  'agreement_name',
  'customer_name',
  'customer_segment',
  'region',
  'industry',
  'agreement_type',
  'start_date',
  'end_date',
  'agreement_value_ceiling',
  'currency',
  'status',
  'status_date',
  'account_manager',
  'sales_owner',
  'partnerships_vendors',
  'probability_to_sign',
  'expected_signature_date',
  'signed_date',
  'total_pos_value_to_date',
  'utilization_percent',
  'risk_flag',
  'notes',
] as const;

export const PO_EXPORT_COLUMNS = [
  'po_id',
  'agreement_id',
  'po_number',
  'po_date',
  'po_value',
  'currency',
  'customer_name',
  'account_manager',
  'notes',
] as const;

type AgreementExportRow = Record<(typeof AGREEMENT_EXPORT_COLUMNS)[number], string | number | null>;
type POExportRow = Record<(typeof PO_EXPORT_COLUMNS)[number], string | number | null>;

function toAgreementExportRow(a: AgreementView): AgreementExportRow {
  return {
    agreement_id: a.id,
    agreement_name: a.name,
    customer_name: a.customerName,
    customer_segment: a.customerSegment,
    region: a.region,
    industry: a.industry,
    agreement_type: a.agreementType,
    start_date: a.startDate,
    end_date: a.endDate,
    agreement_value_ceiling: a.valueCeiling,
    currency: a.currency,
    status: a.status,
    status_date: a.statusDate,
    account_manager: a.accountManager,
    sales_owner: a.salesOwner,
    partnerships_vendors: a.partnershipsVendors,
    probability_to_sign: a.probabilityToSign,
    expected_signature_date: a.expectedSignatureDate,
    signed_date: a.signedDate,
    total_pos_value_to_date: a.totalPosValue,
    utilization_percent: a.utilizationPercent,
    risk_flag: a.riskFlag,
    notes: a.notes,
  };
}

function toPOExportRow(po: PurchaseOrder): POExportRow {
  return {
    po_id: po.id,
    agreement_id: po.agreementId,
    po_number: po.poNumber,
    po_date: po.date,
    po_value: po.value,
    currency: po.currency,
    customer_name: po.customerName,
    account_manager: po.accountManager,
    notes: po.notes,
  };
}

/**
 * Agreements as CSV with a header row; an empty string when there are none.
 */
export function exportAgreementsCsv(agreements: readonly AgreementView[]): string {
  if (agreements.length === 0) return '';
  return stringify(agreements.map(toAgreementExportRow), {
    header: true,
    columns: [...AGREEMENT_EXPORT_COLUMNS],
  });
}

export function exportPOsCsv(purchaseOrders: readonly PurchaseOrder[]): string {
  if (purchaseOrders.length === 0) return '';
  return stringify(purchaseOrders.map(toPOExportRow), {
    header: true,
    columns: [...PO_EXPORT_COLUMNS],
  });
}

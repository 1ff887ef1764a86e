import { parseNewAgreement } from '../domain/validation';
import { AppError } from '../errors';
import type { Ledger } from '../ledger/ledger';
import { pickColumns, type CsvRecord } from './parse-csv';
import type { ImportOptions, ImportResult } from './types';

/**
 * CSV header → agreement field. agreement_id and the derived export columns
 * are not read: every imported row becomes a new agreement with a fresh id.
 */
export const AGREEMENT_IMPORT_COLUMNS = {
  agreement_name: 'name',
  customer_name: 'customerName',
  customer_segment: 'customerSegment',
  region: 'region',
  industry: 'industry',
  agreement_type: 'agreementType',
  start_date: 'startDate',
  end_date: 'endDate',
  agreement_value_ceiling: 'valueCeiling',
  currency: 'currency',
  status: 'status',
  status_date: 'statusDate',
  account_manager: 'accountManager',
  sales_owner: 'salesOwner',
  partnerships_vendors: 'partnershipsVendors',
  probability_to_sign: 'probabilityToSign',
  expected_signature_date: 'expectedSignatureDate',
  signed_date: 'signedDate',
  renewal_terms: 'renewalTerms',
  notes: 'notes',
  attachments: 'attachments',
} as const;

/**
 * Create one agreement per row. Rows rejected by validation are reported and
 * skipped; storage failures abort the import.
 */
export async function importAgreements(
  ledger: Ledger,
  rows: readonly CsvRecord[],
  options: ImportOptions = {},
): Promise<ImportResult> {
  const result: ImportResult = { imported: [], accepted: 0, failures: [] };

  for (const [index, row] of rows.entries()) {
    try {
      const input = parseNewAgreement(pickColumns(row, AGREEMENT_IMPORT_COLUMNS));
      if (!options.dryRun) {
        result.imported.push(await ledger.createAgreement(input, { changedBy: 'csv-import' }));
      }
      result.accepted += 1;
    } catch (error) {
      if (!(error instanceof AppError)) throw error;
      result.failures.push({ row: index + 1, message: error.message });
    }
  }

  return result;
}

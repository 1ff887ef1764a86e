import { parseNewPurchaseOrder } from '../domain/validation';
import { AppError, NotFoundError } from '../errors';
import type { Ledger } from '../ledger/ledger';
import { pickColumns, type CsvRecord } from './parse-csv';
import type { ImportOptions, ImportResult } from './types';

/** CSV header → purchase order field. po_id is reassigned on import. */
export const PO_IMPORT_COLUMNS = {
  agreement_id: 'agreementId',
  po_number: 'poNumber',
  po_date: 'date',
  po_value: 'value',
  currency: 'currency',
  customer_name: 'customerName',
  account_manager: 'accountManager',
  notes: 'notes',
} as const;

/**
 * Create one purchase order per row. Historical data may predate ceiling
 * enforcement, so every row is written with the ceiling override.
 */
export async function importPOs(
  ledger: Ledger,
  rows: readonly CsvRecord[],
  options: ImportOptions = {},
): Promise<ImportResult> {
  const result: ImportResult = { imported: [], accepted: 0, failures: [] };

  for (const [index, row] of rows.entries()) {
    try {
      const input = parseNewPurchaseOrder(pickColumns(row, PO_IMPORT_COLUMNS));
      if (options.dryRun) {
        if (!(await ledger.getAgreement(input.agreementId))) {
          throw new NotFoundError('agreement', input.agreementId);
        }
      } else {
        result.imported.push(await ledger.createPO(input, { overrideCeiling: true }));
      }
      result.accepted += 1;
    } catch (error) {
      if (!(error instanceof AppError)) throw error;
      result.failures.push({ row: index + 1, message: error.message });
    }
  }

  return result;
}

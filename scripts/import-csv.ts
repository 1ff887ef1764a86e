#!/usr/bin/env npx tsx
/**
 * CSV Import Script
 *
 * Loads agreements or purchase orders from a CSV file in the export layout:
 * - Agreements get fresh AGR ids; agreement_id and derived columns are ignored
 * - Purchase orders reference existing agreement ids and bypass the ceiling check
 * - Invalid rows are reported and skipped; the script exits 1 if any failed
 *
 * Usage:
 *   npx tsx scripts/import-csv.ts agreements ./data/agreements.csv
 *   npx tsx scripts/import-csv.ts pos ./data/purchase_orders.csv
 *   npx tsx scripts/import-csv.ts pos ./data/purchase_orders.csv --dry-run
 */

import 'dotenv/config';
import { readFile } from 'fs/promises';
import { closeDatabase, db } from '../src/client';
import { importAgreements } from '../src/imports/agreements';
import { parseCsv } from '../src/imports/parse-csv';
import { importPOs } from '../src/imports/purchase-orders';
import type { ImportResult } from '../src/imports/types';
import { DrizzleLedgerRepository } from '../src/ledger/drizzle-repository';
import { Ledger } from '../src/ledger/ledger';

const args = process.argv.slice(2);
const DRY_RUN = args.includes('--dry-run');
const [kind, filePath] = args.filter((arg) => !arg.startsWith('--'));

async function main(): Promise<number> {
  if ((kind !== 'agreements' && kind !== 'pos') || !filePath) {
    console.error('Usage: import-csv.ts <agreements|pos> <file.csv> [--dry-run]');
    return 2;
  }

  console.log('='.repeat(60));
  console.log(`${kind === 'agreements' ? 'Agreements' : 'Purchase Orders'} Import`);
  console.log('='.repeat(60));
  if (DRY_RUN) {
    console.log('*** DRY RUN MODE - No changes will be made ***\n');
  }

  console.log('\n[1/2] Loading CSV...');
  const rows = parseCsv(await readFile(filePath, 'utf8'));
  console.log(`  Loaded ${rows.length.toLocaleString()} rows from ${filePath}`);

  console.log('\n[2/2] Importing...');
  const ledger = new Ledger({ repository: new DrizzleLedgerRepository(db) });
  const startTime = Date.now();
  const result: ImportResult = kind === 'agreements'
    ? await importAgreements(ledger, rows, { dryRun: DRY_RUN })
    : await importPOs(ledger, rows, { dryRun: DRY_RUN });
  const elapsed = ((Date.now() - startTime) / 1000).toFixed(1);

  console.log('\n' + '='.repeat(60));
  console.log(DRY_RUN ? 'DRY RUN COMPLETE - No changes made' : 'Import Complete');
  console.log('='.repeat(60));
  console.log(`  Accepted: ${result.accepted.toLocaleString()}`);
  console.log(`  Failed:   ${result.failures.length.toLocaleString()}`);
  console.log(`  Time: ${elapsed}s`);

  for (const failure of result.failures.slice(0, 20)) {
    console.error(`  Row ${failure.row}: ${failure.message}`);
  }
  if (result.failures.length > 20) {
    console.error(`  ... and ${result.failures.length - 20} more`);
  }

  return result.failures.length > 0 ? 1 : 0;
}

main()
  .then(async (code) => {
    await closeDatabase();
    process.exit(code);
  })
  .catch(async (error: unknown) => {
    console.error('Import failed:', error);
    await closeDatabase();
    process.exit(1);
  });

#!/usr/bin/env npx tsx
/**
 * CSV Export Script
 *
 * Writes agreements (with utilization and risk columns) or purchase orders
 * as CSV to a file, or to stdout when no file is given.
 *
 * Usage:
 *   npx tsx scripts/export-csv.ts agreements ./exports/agreements.csv
 *   npx tsx scripts/export-csv.ts pos > purchase_orders.csv
 */

import 'dotenv/config';
import { writeFile } from 'fs/promises';
import { closeDatabase, db } from '../src/client';
import { exportAgreementsCsv, exportPOsCsv } from '../src/exports/csv';
import { DrizzleLedgerRepository } from '../src/ledger/drizzle-repository';
import { Ledger } from '../src/ledger/ledger';

const [kind, outFile] = process.argv.slice(2);

async function main(): Promise<number> {
  if (kind !== 'agreements' && kind !== 'pos') {
    console.error('Usage: export-csv.ts <agreements|pos> [out.csv]');
    return 2;
  }

  const ledger = new Ledger({ repository: new DrizzleLedgerRepository(db) });
  const csv = kind === 'agreements'
    ? exportAgreementsCsv(await ledger.listAgreements())
    : exportPOsCsv(await ledger.listAllPOs());

  if (outFile) {
    await writeFile(outFile, csv, 'utf8');
    // stderr, so piping stdout never mixes status text into the CSV
    console.error(`✓ Wrote ${outFile}`);
  } else {
    process.stdout.write(csv);
  }
  return 0;
}

main()
  .then(async (code) => {
    await closeDatabase();
    process.exit(code);
  })
  .catch(async (error: unknown) => {
    console.error('Export failed:', error);
    await closeDatabase();
    process.exit(1);
  });

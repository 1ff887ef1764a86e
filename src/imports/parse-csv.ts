import { parse } from 'csv-parse/sync';
import { z } from 'zod';

/** One data row keyed by header name. */
export type CsvRecord = Record<string, string>;

const recordsSchema = z.array(z.record(z.string()));

/**
 * Parse CSV text with a header row into records. Cells are trimmed and blank
 * lines skipped.
 */
export function parseCsv(text: string): CsvRecord[] {
  const records: unknown = parse(text, {
    columns: true,
    skip_empty_lines: true,
    trim: true,
    bom: true,
  });
  return recordsSchema.parse(records);
}

/**
 * Copy the non-empty cells named in `columns` under their field names.
 * Empty and missing cells are left out so they read as absent.
 */
export function pickColumns<F extends string>(
  row: CsvRecord,
  columns: Readonly<Record<string, F>>,
): Partial<Record<F, string>> {
  const picked: Partial<Record<F, string>> = {};
  for (const [column, field] of Object.entries(columns)) {
    const value = row[column];
    if (value !== undefined && value !== '') {
      picked[field] = value;
    }
  }
  return picked;
}

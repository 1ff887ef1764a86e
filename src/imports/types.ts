export interface ImportFailure {
  /** 1-based data row (the header is not counted). */
  row: number;
  message: string;
}

export interface ImportResult {
  /** Ids created, in file order. Empty on a dry run. */
  imported: string[];
  /** Rows that passed validation on a dry run, or were written otherwise. */
  accepted: number;
  failures: ImportFailure[];
}

export interface ImportOptions {
  /** Validate every row without writing anything. */
  dryRun?: boolean;
}

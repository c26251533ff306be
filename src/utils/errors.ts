/**
 * Error types raised or reported by the ledger pipeline.
 */

export class LedgerError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** The store could not be reached or authorised. Fatal to the current operation. */
export class ConnectionError extends LedgerError {}

/** Required columns are missing from the source rows. */
export class SchemaError extends LedgerError {
  readonly missingColumns: readonly string[];

  constructor(missingColumns: readonly string[]) {
    super(
      `Column(s) ${missingColumns.map((c) => `'${c}'`).join(", ")} not found in the ledger sheet. Check the header row (row 1).`
    );
    this.missingColumns = missingColumns;
  }
}

/** Reading rows from the store failed after a connection was obtained. */
export class LoadError extends LedgerError {}

/** The store rejected or failed an append. */
export class WriteError extends LedgerError {
  readonly status?: number;

  constructor(message: string, options?: ErrorOptions & { status?: number }) {
    super(message, options);
    this.status = options?.status;
  }
}

/**
 * Shape used when an error crosses the presentation boundary.
 */
export interface ErrorSummary {
  kind: string;
  message: string;
}

export function summarizeError(error: Error | null): ErrorSummary | null {
  if (!error) {
    return null;
  }
  return { kind: error.name, message: error.message };
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

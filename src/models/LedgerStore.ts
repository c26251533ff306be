/**
 * External ledger store contract
 */

/**
 * Sheet columns, in the positional order rows are written.
 */
export const LEDGER_COLUMNS = [
  "Date",
  "TransactionType",
  "Description",
  "Amount",
  "GoldGrams",
] as const;

export type LedgerColumn = (typeof LEDGER_COLUMNS)[number];

export type RawCell = string | number | null;

/** One sheet row keyed by header name. */
export type RawRecord = Record<string, RawCell>;

/** One row in LEDGER_COLUMNS order: date, type, description, amount, gold grams. */
export type LedgerRow = [string, string, string, number, number];

export interface LedgerStore {
  /**
   * Seconds the handle's credentials stay usable after connecting, when they expire.
   * A connection cache drops the handle no later than this.
   */
  readonly credentialLifetimeSeconds?: number;
  /** Every data row below the header, keyed by header name. */
  readAll(): Promise<RawRecord[]>;
  /** Append one row positionally. Either the whole row lands or none of it. */
  appendRow(row: LedgerRow): Promise<void>;
}

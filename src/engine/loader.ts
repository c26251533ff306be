import { bucketize, Ledger, Transaction } from "../models/Transaction";
import { LEDGER_COLUMNS, RawRecord } from "../models/LedgerStore";
import { coerceDate, coerceNumber, coerceText } from "../utils/coercion";
import { LoadError, SchemaError } from "../utils/errors";

/**
 * Result of loading a ledger. `error` is set only when the ledger is empty because
 * the source could not be used; an empty ledger with no error simply means no rows yet.
 */
export interface LedgerLoadResult {
  ledger: Ledger;
  error: SchemaError | LoadError | null;
}

export const EMPTY_LEDGER: Ledger = Object.freeze([]);

/**
 * Returns the required columns that appear in none of the records.
 */
export function findMissingColumns(rawRows: readonly RawRecord[]): string[] {
  const present = new Set<string>();
  for (const row of rawRows) {
    for (const key of Object.keys(row)) {
      present.add(key);
    }
  }
  return LEDGER_COLUMNS.filter((column) => !present.has(column));
}

/**
 * Cleans one raw record into a transaction. Bad cells degrade to defaults
 * (null date, zero amounts); the row itself is always kept.
 */
export function toTransaction(raw: RawRecord): Transaction {
  const type = coerceText(raw.TransactionType ?? null);
  const amount = coerceNumber(raw.Amount ?? null);

  return {
    date: coerceDate(raw.Date ?? null),
    type,
    description: coerceText(raw.Description ?? null),
    amount,
    goldGrams: coerceNumber(raw.GoldGrams ?? null),
    ...bucketize(type, amount),
  };
}

/**
 * Validates the column set and coerces every row, preserving source order.
 *
 * A missing column yields the empty ledger and a SchemaError without touching any row.
 */
export function loadLedger(rawRows: readonly RawRecord[]): LedgerLoadResult {
  if (rawRows.length === 0) {
    return { ledger: EMPTY_LEDGER, error: null };
  }

  const missing = findMissingColumns(rawRows);
  if (missing.length > 0) {
    return { ledger: EMPTY_LEDGER, error: new SchemaError(missing) };
  }

  return { ledger: Object.freeze(rawRows.map(toTransaction)), error: null };
}

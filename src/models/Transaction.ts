/**
 * Transaction data structures
 */

export const TRANSACTION_TYPES = [
  "Income",
  "DailyExpense",
  "StockSavings",
  "GoldPurchase",
] as const;

export type TransactionType = (typeof TRANSACTION_TYPES)[number];

export interface TransactionBuckets {
  incomeAmount: number;
  expenseAmount: number;
  stockInvestmentAmount: number;
  goldPurchaseAmount: number;
}

export interface Transaction extends TransactionBuckets {
  date: string | null; // YYYY-MM-DD, null when the source cell could not be parsed
  type: string; // raw value, may fall outside TransactionType
  description: string;
  amount: number;
  goldGrams: number;
}

/**
 * A proposed transaction, as accepted from the presentation layer.
 */
export interface TransactionDraft {
  date: string; // YYYY-MM-DD
  type: TransactionType;
  description: string;
  amount: number;
  goldGrams: number;
}

export type Ledger = readonly Transaction[];

export function isTransactionType(value: string): value is TransactionType {
  return (TRANSACTION_TYPES as readonly string[]).includes(value);
}

/**
 * Derive the four category amounts for a row.
 * At most one bucket carries the amount, chosen by exact match on the type.
 */
export function bucketize(type: string, amount: number): TransactionBuckets {
  return {
    incomeAmount: type === "Income" ? amount : 0,
    expenseAmount: type === "DailyExpense" ? amount : 0,
    stockInvestmentAmount: type === "StockSavings" ? amount : 0,
    goldPurchaseAmount: type === "GoldPurchase" ? amount : 0,
  };
}

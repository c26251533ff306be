import { Ledger, Transaction } from "../models/Transaction";
import {
  AllocationSlice,
  HistoryRow,
  MetricsSnapshot,
  TrendPoint,
} from "../models/MetricsSnapshot";
import { ALLOCATION_TYPES, DEFAULT_GOLD_PRICE_PER_GRAM } from "../utils/constants";
import { formatGrams, formatRupiah } from "../utils/format";

export interface AggregateOptions {
  /** Fixed valuation for the wealth estimate; defaults to DEFAULT_GOLD_PRICE_PER_GRAM. */
  goldPricePerGram?: number;
}

function sumBy(ledger: Ledger, pick: (t: Transaction) => number): number {
  return ledger.reduce((sum, t) => sum + pick(t), 0);
}

/**
 * Running net cash flow over dated rows in ascending date order.
 * Array.prototype.sort is stable, so rows sharing a date keep ledger order.
 */
export function buildCumulativeTrend(ledger: Ledger): TrendPoint[] {
  const dated = ledger.filter(
    (t): t is Transaction & { date: string } => t.date !== null
  );
  const ordered = [...dated].sort((a, b) => (a.date < b.date ? -1 : a.date > b.date ? 1 : 0));

  let running = 0;
  return ordered.map((t) => {
    running += t.incomeAmount - t.expenseAmount;
    return { date: t.date, cumulativeNetCashFlow: running };
  });
}

/**
 * Sum of raw amounts for the spending and saving types present in the ledger.
 * Empty when there is nothing positive to break down.
 */
export function buildAllocation(ledger: Ledger): AllocationSlice[] {
  const slices: AllocationSlice[] = [];
  for (const type of ALLOCATION_TYPES) {
    const rows = ledger.filter((t) => t.type === type);
    if (rows.length > 0) {
      slices.push({ type, amount: sumBy(rows, (t) => t.amount) });
    }
  }

  const total = slices.reduce((sum, slice) => sum + slice.amount, 0);
  return total > 0 ? slices : [];
}

/**
 * Computes the dashboard figures for a ledger. Pure: the same ledger always
 * produces an equal snapshot, and the ledger is never modified.
 *
 * @example
 * ```ts
 * aggregateMetrics(loadLedger(rows).ledger, { goldPricePerGram: 900_000 })
 * ```
 */
export function aggregateMetrics(ledger: Ledger, options: AggregateOptions = {}): MetricsSnapshot {
  const goldPricePerGram = options.goldPricePerGram ?? DEFAULT_GOLD_PRICE_PER_GRAM;

  const totalIncome = sumBy(ledger, (t) => t.incomeAmount);
  const totalExpense = sumBy(ledger, (t) => t.expenseAmount);
  const totalStockInvestment = sumBy(ledger, (t) => t.stockInvestmentAmount);
  const totalGoldGrams = sumBy(ledger, (t) => t.goldGrams);
  const netCashFlow = totalIncome - totalExpense;

  return Object.freeze({
    transactionCount: ledger.length,
    undatedCount: ledger.filter((t) => t.date === null).length,
    totalIncome,
    totalExpense,
    totalStockInvestment,
    totalGoldGrams,
    netCashFlow,
    estimatedTotalWealth: netCashFlow + totalStockInvestment + totalGoldGrams * goldPricePerGram,
    cumulativeTrend: Object.freeze(buildCumulativeTrend(ledger)),
    allocation: Object.freeze(buildAllocation(ledger)),
  });
}

/**
 * Detailed history, newest first. Undated rows go last, ties keep ledger order.
 */
export function buildHistory(ledger: Ledger): HistoryRow[] {
  const ordered = [...ledger].sort((a, b) => {
    if (a.date === b.date) return 0;
    if (a.date === null) return 1;
    if (b.date === null) return -1;
    return a.date < b.date ? 1 : -1;
  });

  return ordered.map((t) => ({
    date: t.date,
    type: t.type,
    description: t.description,
    amount: formatRupiah(t.amount),
    goldGrams: t.goldGrams > 0 ? formatGrams(t.goldGrams) : "",
  }));
}

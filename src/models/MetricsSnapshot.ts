/**
 * Metrics snapshot data structures
 */

export interface TrendPoint {
  date: string;
  cumulativeNetCashFlow: number;
}

export interface AllocationSlice {
  type: string;
  amount: number;
}

export interface MetricsSnapshot {
  transactionCount: number;
  undatedCount: number; // rows left out of the trend
  totalIncome: number;
  totalExpense: number;
  totalStockInvestment: number;
  totalGoldGrams: number;
  netCashFlow: number;
  /**
   * Net cash flow plus stock savings plus gold valued at a fixed price per gram.
   * An estimate only; the gold price is configuration, not a market quote.
   */
  estimatedTotalWealth: number;
  cumulativeTrend: readonly TrendPoint[];
  allocation: readonly AllocationSlice[];
}

/**
 * One line of the detailed history listing, formatted for display.
 */
export interface HistoryRow {
  date: string | null;
  type: string;
  description: string;
  amount: string;
  goldGrams: string;
}

/**
 * Shared constants for the ledger pipeline.
 * Centralizing these makes behavior consistent and easier to tune.
 */

/** Rough gold valuation (Rp per gram) used for the wealth estimate. Not a live price. */
export const DEFAULT_GOLD_PRICE_PER_GRAM = 900_000;

/** Store connections are reused for this long (seconds). */
export const CONNECTION_TTL_SECONDS = 3600;

/** Loaded ledgers are served from cache for this long (seconds). */
export const LEDGER_TTL_SECONDS = 60;

/** Types that make up the allocation breakdown, in display order. */
export const ALLOCATION_TYPES = ["DailyExpense", "StockSavings", "GoldPurchase"] as const;

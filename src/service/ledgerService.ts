import { ConnectionCache, Connector } from "../cache/connectionCache";
import { LedgerCache } from "../cache/ledgerCache";
import { Clock } from "../cache/ttlSlot";
import { aggregateMetrics, buildHistory } from "../engine/aggregator";
import { appendTransaction } from "../engine/appendPath";
import { LedgerLoadResult } from "../engine/loader";
import { AppendOutcome } from "../models/AppendOutcome";
import { HistoryRow, MetricsSnapshot } from "../models/MetricsSnapshot";
import { Ledger, TransactionDraft } from "../models/Transaction";
import {
  CONNECTION_TTL_SECONDS,
  DEFAULT_GOLD_PRICE_PER_GRAM,
  LEDGER_TTL_SECONDS,
} from "../utils/constants";
import { LoadError, SchemaError } from "../utils/errors";

/**
 * Settings for a ledger service.
 *
 * @property connect - Opens a store handle; called at most once per connection TTL
 * @property goldPricePerGram - Fixed valuation for the wealth estimate, not a live price
 * @property clock - Millisecond clock shared by both caches
 */
export interface LedgerServiceOptions {
  connect: Connector;
  goldPricePerGram?: number;
  connectionTtlSeconds?: number;
  ledgerTtlSeconds?: number;
  clock?: Clock;
}

/**
 * Everything a dashboard shows, taken from one cached load.
 */
export interface DashboardView {
  ledger: Ledger;
  error: SchemaError | LoadError | null;
  metrics: MetricsSnapshot;
  history: HistoryRow[];
}

/**
 * Read-then-display entry point for the presentation layer.
 *
 * Reads go through the ledger cache (and, behind it, the connection cache); each call is
 * a single cycle and nothing is recomputed in the background. A ConnectionError is thrown
 * from any method and stops that cycle.
 */
export class LedgerService {
  readonly connections: ConnectionCache;
  readonly ledgerCache: LedgerCache;
  readonly goldPricePerGram: number;

  constructor(options: LedgerServiceOptions) {
    this.connections = new ConnectionCache(options.connect, {
      ttlSeconds: options.connectionTtlSeconds ?? CONNECTION_TTL_SECONDS,
      clock: options.clock,
    });
    this.ledgerCache = new LedgerCache(this.connections, {
      ttlSeconds: options.ledgerTtlSeconds ?? LEDGER_TTL_SECONDS,
      clock: options.clock,
    });
    this.goldPricePerGram = options.goldPricePerGram ?? DEFAULT_GOLD_PRICE_PER_GRAM;
  }

  getLedger(): Promise<LedgerLoadResult> {
    return this.ledgerCache.get();
  }

  async getMetrics(): Promise<{ metrics: MetricsSnapshot; error: SchemaError | LoadError | null }> {
    const { ledger, error } = await this.ledgerCache.get();
    return { metrics: aggregateMetrics(ledger, { goldPricePerGram: this.goldPricePerGram }), error };
  }

  async getHistory(): Promise<{ rows: HistoryRow[]; error: SchemaError | LoadError | null }> {
    const { ledger, error } = await this.ledgerCache.get();
    return { rows: buildHistory(ledger), error };
  }

  async getDashboard(): Promise<DashboardView> {
    const { ledger, error } = await this.ledgerCache.get();
    return {
      ledger,
      error,
      metrics: aggregateMetrics(ledger, { goldPricePerGram: this.goldPricePerGram }),
      history: buildHistory(ledger),
    };
  }

  append(draft: TransactionDraft): Promise<AppendOutcome> {
    return appendTransaction(draft, {
      getStore: () => this.connections.get(),
      invalidateLedger: () => this.ledgerCache.invalidate(),
    });
  }
}

import { EMPTY_LEDGER, LedgerLoadResult, loadLedger } from "../engine/loader";
import { RawRecord } from "../models/LedgerStore";
import { LEDGER_TTL_SECONDS } from "../utils/constants";
import { errorMessage, LoadError } from "../utils/errors";
import { ConnectionCache } from "./connectionCache";
import { Clock, TtlSlot } from "./ttlSlot";

export interface LedgerCacheOptions {
  ttlSeconds?: number;
  clock?: Clock;
}

/**
 * Most recent load result, reloaded after the TTL (one minute by default) or after
 * `invalidate()`.
 *
 * A failed read replaces whatever was cached with the empty ledger and a LoadError;
 * stale rows are never served after a failed refresh. A ConnectionError from the
 * connection cache is not caught here.
 */
export class LedgerCache extends TtlSlot<LedgerLoadResult> {
  constructor(connections: ConnectionCache, options: LedgerCacheOptions = {}) {
    super(
      async () => {
        const store = await connections.get();

        let rows: RawRecord[];
        try {
          rows = await store.readAll();
        } catch (err) {
          console.error("Failed to read ledger rows:", errorMessage(err));
          const error =
            err instanceof LoadError
              ? err
              : new LoadError(`Failed to read rows from the ledger store: ${errorMessage(err)}`, {
                  cause: err,
                });
          return { ledger: EMPTY_LEDGER, error };
        }

        const result = loadLedger(rows);
        if (result.error) {
          console.error("Ledger rejected:", result.error.message);
        }
        return result;
      },
      { ttlSeconds: options.ttlSeconds ?? LEDGER_TTL_SECONDS, clock: options.clock }
    );
  }
}

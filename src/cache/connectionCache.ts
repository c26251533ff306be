import { LedgerStore } from "../models/LedgerStore";
import { CONNECTION_TTL_SECONDS } from "../utils/constants";
import { ConnectionError, errorMessage } from "../utils/errors";
import { Clock, TtlSlot } from "./ttlSlot";

export type Connector = () => Promise<LedgerStore>;

export interface ConnectionCacheOptions {
  ttlSeconds?: number;
  clock?: Clock;
}

/**
 * Long-lived store handle, reconnected once it is older than the TTL (one hour by default)
 * or than the handle's credential lifetime, whichever is shorter.
 * Any connect failure surfaces as a ConnectionError and nothing is cached.
 */
export class ConnectionCache extends TtlSlot<LedgerStore> {
  constructor(connect: Connector, options: ConnectionCacheOptions = {}) {
    super(
      async () => {
        try {
          return await connect();
        } catch (err) {
          console.error("Ledger store connection failed:", errorMessage(err));
          if (err instanceof ConnectionError) {
            throw err;
          }
          throw new ConnectionError(`Could not connect to the ledger store: ${errorMessage(err)}`, {
            cause: err,
          });
        }
      },
      { ttlSeconds: options.ttlSeconds ?? CONNECTION_TTL_SECONDS, clock: options.clock }
    );
  }

  protected ttlSecondsFor(store: LedgerStore): number {
    const lifetime = store.credentialLifetimeSeconds;
    return lifetime === undefined ? this.ttlSeconds : Math.min(this.ttlSeconds, lifetime);
  }
}

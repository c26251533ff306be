import { AppendOutcome } from "../models/AppendOutcome";
import { LedgerRow, LedgerStore } from "../models/LedgerStore";
import { TransactionDraft } from "../models/Transaction";
import { errorMessage, WriteError } from "../utils/errors";
import { formatRupiah } from "../utils/format";

export const EMPTY_DRAFT_REASON = "Enter an amount (Rp) or a gold weight (grams).";

export interface AppendDependencies {
  /** Resolves the current store handle; a ConnectionError from here propagates. */
  getStore: () => Promise<LedgerStore>;
  /** Called only after the store confirms the write. */
  invalidateLedger: () => void;
}

/**
 * Serialises a draft in sheet column order.
 */
export function toLedgerRow(draft: TransactionDraft): LedgerRow {
  return [draft.date, draft.type, draft.description, draft.amount, draft.goldGrams];
}

/**
 * Validates and writes one transaction.
 *
 * A draft with neither money nor gold is rejected before any I/O. A failed write is
 * reported as a WriteError outcome and leaves the ledger cache untouched; there is no retry.
 */
export async function appendTransaction(
  draft: TransactionDraft,
  deps: AppendDependencies
): Promise<AppendOutcome> {
  if (draft.amount === 0 && draft.goldGrams === 0) {
    return { status: "rejected", reason: EMPTY_DRAFT_REASON };
  }

  const store = await deps.getStore();

  try {
    await store.appendRow(toLedgerRow(draft));
  } catch (err) {
    console.error("Failed to append transaction:", errorMessage(err));
    const error =
      err instanceof WriteError
        ? err
        : new WriteError(`Failed to save the transaction: ${errorMessage(err)}`, { cause: err });
    return { status: "write_error", error };
  }

  deps.invalidateLedger();

  const formattedAmount = formatRupiah(draft.amount);
  return {
    status: "ok",
    type: draft.type,
    amount: draft.amount,
    formattedAmount,
    message: `Transaction '${draft.type}' of ${formattedAmount} saved.`,
  };
}

import { WriteError } from "../utils/errors";

/**
 * Append result data structures
 */

export interface AppendAccepted {
  status: "ok";
  type: string;
  amount: number;
  formattedAmount: string;
  message: string;
}

export interface AppendRejected {
  status: "rejected";
  reason: string;
}

export interface AppendFailed {
  status: "write_error";
  error: WriteError;
}

export type AppendOutcome = AppendAccepted | AppendRejected | AppendFailed;

import { z } from "zod";
import { TRANSACTION_TYPES } from "../models/Transaction";
import { coerceDate } from "./coercion";

/**
 * Zod validation schemas for input data validation.
 * These guard the presentation boundary; the ledger core only enforces the amount/grams rule.
 */

/**
 * Schema for a calendar date written as YYYY-MM-DD that names a real day.
 */
export const IsoDateSchema = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}$/, "Expected a date formatted as YYYY-MM-DD")
  .refine((value) => coerceDate(value) === value, "Not a valid calendar date");

/**
 * Schema for a transaction draft submitted for appending.
 * Amount and grams must be finite and non-negative; the type must be one of the four categories.
 */
export const TransactionDraftSchema = z.object({
  date: IsoDateSchema,
  type: z.enum(TRANSACTION_TYPES),
  description: z.string().max(500).default(""),
  amount: z.number().finite().min(0),
  goldGrams: z.number().finite().min(0).default(0),
});

export type TransactionDraftInput = z.input<typeof TransactionDraftSchema>;

/**
 * Schema for a Google service account key, as downloaded from the cloud console.
 */
export const ServiceAccountKeySchema = z.object({
  client_email: z.string().email(),
  private_key: z.string().min(1),
});

export type ServiceAccountKey = z.infer<typeof ServiceAccountKeySchema>;

/**
 * Formats zod issues as "path: message" lines.
 */
export function describeIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) =>
    issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message
  );
}

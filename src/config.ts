import { z } from "zod";
import {
  CONNECTION_TTL_SECONDS,
  DEFAULT_GOLD_PRICE_PER_GRAM,
  LEDGER_TTL_SECONDS,
} from "./utils/constants";
import { LedgerError } from "./utils/errors";
import { describeIssues, ServiceAccountKey, ServiceAccountKeySchema } from "./utils/validation";

/**
 * Runtime configuration read from environment variables.
 */

const EnvSchema = z
  .object({
    PORT: z.coerce.number().int().positive().default(3000),
    LEDGER_BACKEND: z.enum(["google-sheets", "memory"]).default("google-sheets"),
    GOLD_PRICE_PER_GRAM: z.coerce.number().nonnegative().default(DEFAULT_GOLD_PRICE_PER_GRAM),
    CONNECTION_TTL_SECONDS: z.coerce.number().positive().default(CONNECTION_TTL_SECONDS),
    LEDGER_TTL_SECONDS: z.coerce.number().positive().default(LEDGER_TTL_SECONDS),
    GOOGLE_SHEETS_SPREADSHEET_ID: z.string().min(1).optional(),
    GOOGLE_SHEETS_WORKSHEET: z.string().min(1).optional(),
    GOOGLE_SERVICE_ACCOUNT_JSON: z.string().min(1).optional(),
  })
  .superRefine((env, ctx) => {
    if (env.LEDGER_BACKEND !== "google-sheets") {
      return;
    }
    for (const key of ["GOOGLE_SHEETS_SPREADSHEET_ID", "GOOGLE_SERVICE_ACCOUNT_JSON"] as const) {
      if (!env[key]) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [key],
          message: "Required when LEDGER_BACKEND is google-sheets",
        });
      }
    }
  });

export interface GoogleSheetsConfig {
  spreadsheetId: string;
  worksheet?: string;
  serviceAccount: ServiceAccountKey;
}

export interface AppConfig {
  port: number;
  backend: "google-sheets" | "memory";
  goldPricePerGram: number;
  connectionTtlSeconds: number;
  ledgerTtlSeconds: number;
  googleSheets?: GoogleSheetsConfig;
}

export class ConfigError extends LedgerError {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration:\n  ${issues.join("\n  ")}`);
  }
}

function parseServiceAccount(raw: string): ServiceAccountKey {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    throw new ConfigError(["GOOGLE_SERVICE_ACCOUNT_JSON: not valid JSON"]);
  }
  const parsed = ServiceAccountKeySchema.safeParse(json);
  if (!parsed.success) {
    throw new ConfigError(
      describeIssues(parsed.error).map((issue) => `GOOGLE_SERVICE_ACCOUNT_JSON.${issue}`)
    );
  }
  // keys pasted into a single-line env var carry literal "\n"
  return { ...parsed.data, private_key: parsed.data.private_key.replace(/\\n/g, "\n") };
}

/**
 * Builds the application config, failing with every problem listed at once.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(describeIssues(parsed.error));
  }
  const values = parsed.data;

  const config: AppConfig = {
    port: values.PORT,
    backend: values.LEDGER_BACKEND,
    goldPricePerGram: values.GOLD_PRICE_PER_GRAM,
    connectionTtlSeconds: values.CONNECTION_TTL_SECONDS,
    ledgerTtlSeconds: values.LEDGER_TTL_SECONDS,
  };

  if (
    values.LEDGER_BACKEND === "google-sheets" &&
    values.GOOGLE_SHEETS_SPREADSHEET_ID &&
    values.GOOGLE_SERVICE_ACCOUNT_JSON
  ) {
    config.googleSheets = {
      spreadsheetId: values.GOOGLE_SHEETS_SPREADSHEET_ID,
      worksheet: values.GOOGLE_SHEETS_WORKSHEET,
      serviceAccount: parseServiceAccount(values.GOOGLE_SERVICE_ACCOUNT_JSON),
    };
  }

  return config;
}

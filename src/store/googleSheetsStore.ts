import { importPKCS8, SignJWT } from "jose";
import { z } from "zod";
import { LedgerRow, LedgerStore, RawCell, RawRecord } from "../models/LedgerStore";
import { ConnectionError, errorMessage, LoadError, WriteError } from "../utils/errors";
import { ServiceAccountKey } from "../utils/validation";

export const SHEETS_SCOPE = "https://www.googleapis.com/auth/spreadsheets";
export const GOOGLE_TOKEN_URL = "https://oauth2.googleapis.com/token";
export const SHEETS_API_URL = "https://sheets.googleapis.com/v4/spreadsheets";
/** Stop using an access token this long before Google says it expires. */
export const TOKEN_EXPIRY_MARGIN_SECONDS = 300;

/** The part of a fetch Response the store reads. */
export interface FetchResponse {
  ok: boolean;
  status: number;
  json(): Promise<unknown>;
  text(): Promise<string>;
}

export type FetchFn = (url: string, init: RequestInit) => Promise<FetchResponse>;

export interface GoogleSheetsOptions {
  spreadsheetId: string;
  /** Worksheet title; the first worksheet when omitted. */
  worksheet?: string;
  serviceAccount: ServiceAccountKey;
  fetchImpl?: FetchFn;
}

export interface AccessToken {
  token: string;
  /** Lifetime reported by the token endpoint, when it reports one. */
  expiresInSeconds?: number;
}

interface SheetsSession {
  spreadsheetId: string;
  worksheet: string;
  accessToken: AccessToken;
  fetchImpl: FetchFn;
}

const TokenResponseSchema = z.object({
  access_token: z.string().min(1),
  expires_in: z.number().optional(),
  token_type: z.string().optional(),
});

const SpreadsheetSchema = z.object({
  sheets: z.array(z.object({ properties: z.object({ title: z.string() }) })).default([]),
});

const ValueRangeSchema = z.object({
  values: z.array(z.array(z.union([z.string(), z.number(), z.boolean()]))).optional(),
});

const AppendResponseSchema = z.object({
  updates: z.object({
    updatedRange: z.string(),
    updatedRows: z.number().int().min(1),
  }),
});

type ErrorFactory = (message: string, options: { cause?: unknown; status?: number }) => Error;

/**
 * Performs a request and returns the parsed JSON body, mapping network failures,
 * non-2xx statuses and unparseable bodies through `fail`.
 */
async function requestJson(
  fetchImpl: FetchFn,
  url: string,
  init: RequestInit,
  what: string,
  fail: ErrorFactory
): Promise<unknown> {
  let response: FetchResponse;
  try {
    response = await fetchImpl(url, init);
  } catch (err) {
    throw fail(`${what} failed: ${errorMessage(err)}`, { cause: err });
  }

  if (!response.ok) {
    const detail = await response.text().catch(() => "");
    throw fail(`${what} failed with status ${response.status}${detail ? `: ${detail}` : ""}`, {
      status: response.status,
    });
  }

  try {
    return await response.json();
  } catch (err) {
    throw fail(`${what} returned a malformed response`, { cause: err, status: response.status });
  }
}

const connectionFailure: ErrorFactory = (message, { cause }) => new ConnectionError(message, { cause });
const loadFailure: ErrorFactory = (message, { cause }) => new LoadError(message, { cause });
const writeFailure: ErrorFactory = (message, { cause, status }) =>
  new WriteError(message, { cause, status });

/**
 * Exchanges a signed service-account assertion for an OAuth access token.
 */
export async function requestAccessToken(
  serviceAccount: ServiceAccountKey,
  fetchImpl: FetchFn = fetch
): Promise<AccessToken> {
  const key = await importPKCS8(serviceAccount.private_key, "RS256");
  const assertion = await new SignJWT({ scope: SHEETS_SCOPE })
    .setProtectedHeader({ alg: "RS256", typ: "JWT" })
    .setIssuer(serviceAccount.client_email)
    .setAudience(GOOGLE_TOKEN_URL)
    .setIssuedAt()
    .setExpirationTime("1h")
    .sign(key);

  const body = await requestJson(
    fetchImpl,
    GOOGLE_TOKEN_URL,
    {
      method: "POST",
      headers: { "Content-Type": "application/x-www-form-urlencoded" },
      body: new URLSearchParams({
        grant_type: "urn:ietf:params:oauth:grant-type:jwt-bearer",
        assertion,
      }).toString(),
    },
    "Token exchange",
    connectionFailure
  );

  const parsed = TokenResponseSchema.safeParse(body);
  if (!parsed.success) {
    throw new ConnectionError("Token exchange returned no access token");
  }
  return { token: parsed.data.access_token, expiresInSeconds: parsed.data.expires_in };
}

/**
 * Turns a worksheet value grid into header-keyed records.
 * Row 1 is the header; short rows are padded with empty strings.
 */
export function recordsFromValues(values: readonly (readonly (string | number | boolean)[])[]): RawRecord[] {
  if (values.length === 0) {
    return [];
  }
  const header = values[0].map((cell) => String(cell));

  return values.slice(1).map((row) => {
    const record: RawRecord = {};
    header.forEach((column, i) => {
      const cell = row[i];
      const value: RawCell = cell === undefined ? "" : typeof cell === "boolean" ? String(cell) : cell;
      record[column] = value;
    });
    return record;
  });
}

/**
 * Ledger store backed by one worksheet of a Google spreadsheet.
 * Built by `connectGoogleSheets`, which owns authentication.
 */
export class GoogleSheetsLedgerStore implements LedgerStore {
  constructor(private readonly session: SheetsSession) {}

  get worksheet(): string {
    return this.session.worksheet;
  }

  get credentialLifetimeSeconds(): number | undefined {
    const expiresIn = this.session.accessToken.expiresInSeconds;
    return expiresIn === undefined ? undefined : Math.max(0, expiresIn - TOKEN_EXPIRY_MARGIN_SECONDS);
  }

  private valuesUrl(suffix: string): string {
    const range = `'${this.session.worksheet.replace(/'/g, "''")}'`;
    return `${SHEETS_API_URL}/${encodeURIComponent(this.session.spreadsheetId)}/values/${encodeURIComponent(range)}${suffix}`;
  }

  private get authHeaders(): Record<string, string> {
    return { Authorization: `Bearer ${this.session.accessToken.token}` };
  }

  /** Cells formatted as dates arrive as serial day numbers, whatever the sheet's locale. */
  async readAll(): Promise<RawRecord[]> {
    const body = await requestJson(
      this.session.fetchImpl,
      this.valuesUrl("?valueRenderOption=UNFORMATTED_VALUE&dateTimeRenderOption=SERIAL_NUMBER"),
      { method: "GET", headers: this.authHeaders },
      "Reading the ledger sheet",
      loadFailure
    );

    const parsed = ValueRangeSchema.safeParse(body);
    if (!parsed.success) {
      throw new LoadError("Reading the ledger sheet returned an unexpected value range");
    }
    return recordsFromValues(parsed.data.values ?? []);
  }

  async appendRow(row: LedgerRow): Promise<void> {
    const body = await requestJson(
      this.session.fetchImpl,
      this.valuesUrl(":append?valueInputOption=RAW&insertDataOption=INSERT_ROWS"),
      {
        method: "POST",
        headers: { ...this.authHeaders, "Content-Type": "application/json" },
        body: JSON.stringify({ majorDimension: "ROWS", values: [row] }),
      },
      "Appending to the ledger sheet",
      writeFailure
    );

    if (!AppendResponseSchema.safeParse(body).success) {
      throw new WriteError("Appending to the ledger sheet returned an unexpected response");
    }
  }
}

/**
 * Authenticates with the service account and resolves the worksheet to use.
 * Every failure, including a missing worksheet, is a ConnectionError.
 */
export async function connectGoogleSheets(options: GoogleSheetsOptions): Promise<GoogleSheetsLedgerStore> {
  const fetchImpl: FetchFn = options.fetchImpl ?? fetch;

  let accessToken: AccessToken;
  try {
    accessToken = await requestAccessToken(options.serviceAccount, fetchImpl);
  } catch (err) {
    if (err instanceof ConnectionError) {
      throw err;
    }
    // key import or signing failed
    throw new ConnectionError(`Invalid service account key: ${errorMessage(err)}`, { cause: err });
  }

  const body = await requestJson(
    fetchImpl,
    `${SHEETS_API_URL}/${encodeURIComponent(options.spreadsheetId)}?fields=sheets.properties.title`,
    { method: "GET", headers: { Authorization: `Bearer ${accessToken.token}` } },
    "Opening the spreadsheet",
    connectionFailure
  );

  const parsed = SpreadsheetSchema.safeParse(body);
  if (!parsed.success) {
    throw new ConnectionError("Opening the spreadsheet returned unexpected metadata");
  }

  const titles = parsed.data.sheets.map((sheet) => sheet.properties.title);
  const worksheet = options.worksheet ?? titles[0];
  if (worksheet === undefined || !titles.includes(worksheet)) {
    throw new ConnectionError(
      options.worksheet
        ? `Worksheet '${options.worksheet}' not found in the spreadsheet`
        : "The spreadsheet has no worksheets"
    );
  }

  return new GoogleSheetsLedgerStore({
    spreadsheetId: options.spreadsheetId,
    worksheet,
    accessToken,
    fetchImpl,
  });
}

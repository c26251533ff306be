import { generateKeyPairSync } from 'node:crypto';
import { importSPKI, jwtVerify } from 'jose';
import { loadLedger } from '../../engine/loader';
import {
  connectGoogleSheets,
  FetchFn,
  FetchResponse,
  GOOGLE_TOKEN_URL,
  GoogleSheetsOptions,
  recordsFromValues,
  SHEETS_SCOPE,
  TOKEN_EXPIRY_MARGIN_SECONDS,
} from '../../store/googleSheetsStore';
import { ConnectionError, LoadError, WriteError } from '../../utils/errors';

const { privateKey, publicKey } = generateKeyPairSync('rsa', {
  modulusLength: 2048,
  privateKeyEncoding: { type: 'pkcs8', format: 'pem' },
  publicKeyEncoding: { type: 'spki', format: 'pem' },
});

const SPREADSHEET_URL = 'https://sheets.googleapis.com/v4/spreadsheets/sheet-123';
const VALUES_URL = `${SPREADSHEET_URL}/values/'Ledger'`;

function jsonResponse(body: unknown, status = 200): FetchResponse {
  return {
    ok: status >= 200 && status < 300,
    status,
    json: async () => body,
    text: async () => (typeof body === 'string' ? body : JSON.stringify(body)),
  };
}

interface Route {
  method: string;
  url: string;
  respond: (init: RequestInit) => FetchResponse;
}

/**
 * In-process stand-in for the Google endpoints. Unmatched requests fail the test.
 */
function fakeGoogle(routes: Route[]) {
  const calls: Array<{ url: string; init: RequestInit }> = [];
  const fetchImpl: FetchFn = async (url, init) => {
    calls.push({ url, init });
    const route = routes.find((r) => r.url === url && r.method === (init.method ?? 'GET'));
    if (!route) {
      throw new Error(`unexpected request ${init.method} ${url}`);
    }
    return route.respond(init);
  };
  return { fetchImpl, calls };
}

const tokenRoute: Route = {
  method: 'POST',
  url: GOOGLE_TOKEN_URL,
  respond: () => jsonResponse({ access_token: 'test-token', expires_in: 3600, token_type: 'Bearer' }),
};

const metadataRoute: Route = {
  method: 'GET',
  url: `${SPREADSHEET_URL}?fields=sheets.properties.title`,
  respond: () => jsonResponse({ sheets: [{ properties: { title: 'Ledger' } }, { properties: { title: 'Archive' } }] }),
};

function options(fetchImpl: FetchFn, worksheet?: string): GoogleSheetsOptions {
  return {
    spreadsheetId: 'sheet-123',
    worksheet,
    serviceAccount: { client_email: 'ledger@test-project.iam.gserviceaccount.com', private_key: privateKey },
    fetchImpl,
  };
}

describe('connectGoogleSheets', () => {
  it('should exchange a signed service-account assertion for a token', async () => {
    const google = fakeGoogle([tokenRoute, metadataRoute]);

    await connectGoogleSheets(options(google.fetchImpl));

    const tokenCall = google.calls[0];
    expect(tokenCall.url).toBe(GOOGLE_TOKEN_URL);
    const form = new URLSearchParams(String(tokenCall.init.body));
    expect(form.get('grant_type')).toBe('urn:ietf:params:oauth:grant-type:jwt-bearer');

    const assertion = form.get('assertion') ?? '';
    const { payload } = await jwtVerify(assertion, await importSPKI(publicKey, 'RS256'), {
      issuer: 'ledger@test-project.iam.gserviceaccount.com',
      audience: GOOGLE_TOKEN_URL,
    });
    expect(payload.scope).toBe(SHEETS_SCOPE);
    expect(Number(payload.exp)).toBeGreaterThan(Number(payload.iat));
  });

  it('should default to the first worksheet', async () => {
    const google = fakeGoogle([tokenRoute, metadataRoute]);
    const store = await connectGoogleSheets(options(google.fetchImpl));

    expect(store.worksheet).toBe('Ledger');
    expect(google.calls[1].init.headers).toEqual({ Authorization: 'Bearer test-token' });
  });

  it('should report the token lifetime less the expiry margin', async () => {
    const google = fakeGoogle([tokenRoute, metadataRoute]);
    const store = await connectGoogleSheets(options(google.fetchImpl));

    expect(store.credentialLifetimeSeconds).toBe(3600 - TOKEN_EXPIRY_MARGIN_SECONDS);
  });

  it('should report no lifetime when the token endpoint gives none', async () => {
    const google = fakeGoogle([
      { ...tokenRoute, respond: () => jsonResponse({ access_token: 'test-token' }) },
      metadataRoute,
    ]);
    const store = await connectGoogleSheets(options(google.fetchImpl));

    expect(store.credentialLifetimeSeconds).toBeUndefined();
  });

  it('should use the configured worksheet', async () => {
    const google = fakeGoogle([tokenRoute, metadataRoute]);
    const store = await connectGoogleSheets(options(google.fetchImpl, 'Archive'));
    expect(store.worksheet).toBe('Archive');
  });

  it('should fail with a ConnectionError when the worksheet does not exist', async () => {
    const google = fakeGoogle([tokenRoute, metadataRoute]);

    await expect(connectGoogleSheets(options(google.fetchImpl, 'Budget'))).rejects.toThrow(
      new ConnectionError("Worksheet 'Budget' not found in the spreadsheet")
    );
  });

  it('should fail with a ConnectionError when authorisation is refused', async () => {
    const google = fakeGoogle([
      { method: 'POST', url: GOOGLE_TOKEN_URL, respond: () => jsonResponse('invalid_grant', 400) },
    ]);

    const error = await connectGoogleSheets(options(google.fetchImpl)).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(ConnectionError);
    expect(error instanceof Error && error.message).toBe('Token exchange failed with status 400: invalid_grant');
  });

  it('should fail with a ConnectionError when the spreadsheet is not shared', async () => {
    const google = fakeGoogle([
      tokenRoute,
      { ...metadataRoute, respond: () => jsonResponse({ error: { code: 403 } }, 403) },
    ]);

    await expect(connectGoogleSheets(options(google.fetchImpl))).rejects.toBeInstanceOf(ConnectionError);
  });

  it('should fail with a ConnectionError for an unusable private key', async () => {
    const google = fakeGoogle([tokenRoute, metadataRoute]);
    const badKey = {
      ...options(google.fetchImpl),
      serviceAccount: { client_email: 'ledger@test-project.iam.gserviceaccount.com', private_key: 'not-a-key' },
    };

    await expect(connectGoogleSheets(badKey)).rejects.toBeInstanceOf(ConnectionError);
    expect(google.calls).toHaveLength(0);
  });
});

describe('GoogleSheetsLedgerStore', () => {
  const readUrl = `${VALUES_URL}?valueRenderOption=UNFORMATTED_VALUE&dateTimeRenderOption=SERIAL_NUMBER`;
  const appendUrl = `${VALUES_URL}:append?valueInputOption=RAW&insertDataOption=INSERT_ROWS`;

  it('should read rows as header-keyed records', async () => {
    const google = fakeGoogle([
      tokenRoute,
      metadataRoute,
      {
        method: 'GET',
        url: readUrl,
        respond: () =>
          jsonResponse({
            range: 'Ledger!A1:E3',
            values: [
              ['Date', 'TransactionType', 'Description', 'Amount', 'GoldGrams'],
              ['2024-01-01', 'Income', 'Salary', 5000000, 0],
              ['2024-01-02', 'DailyExpense', '', 25000],
            ],
          }),
      },
    ]);
    const store = await connectGoogleSheets(options(google.fetchImpl));

    expect(await store.readAll()).toEqual([
      { Date: '2024-01-01', TransactionType: 'Income', Description: 'Salary', Amount: 5000000, GoldGrams: 0 },
      { Date: '2024-01-02', TransactionType: 'DailyExpense', Description: '', Amount: 25000, GoldGrams: '' },
    ]);
  });

  it('should read date cells as serial days independent of the sheet locale', async () => {
    const google = fakeGoogle([
      tokenRoute,
      metadataRoute,
      {
        method: 'GET',
        url: readUrl,
        respond: () =>
          jsonResponse({
            values: [
              ['Date', 'TransactionType', 'Description', 'Amount', 'GoldGrams'],
              [45306, 'Income', 'Salary', 5000000, 0],
              ['2024-01-16', 'DailyExpense', 'Typed as text', 25000, 0],
            ],
          }),
      },
    ]);
    const store = await connectGoogleSheets(options(google.fetchImpl));

    const { ledger, error } = loadLedger(await store.readAll());

    expect(error).toBeNull();
    expect(ledger.map((t) => t.date)).toEqual(['2024-01-15', '2024-01-16']);
  });

  it('should read an empty worksheet as no rows', async () => {
    const google = fakeGoogle([
      tokenRoute,
      metadataRoute,
      { method: 'GET', url: readUrl, respond: () => jsonResponse({ range: 'Ledger!A1:Z1000' }) },
    ]);
    const store = await connectGoogleSheets(options(google.fetchImpl));

    expect(await store.readAll()).toEqual([]);
  });

  it('should raise a LoadError when the read fails', async () => {
    const google = fakeGoogle([
      tokenRoute,
      metadataRoute,
      { method: 'GET', url: readUrl, respond: () => jsonResponse('backend error', 500) },
    ]);
    const store = await connectGoogleSheets(options(google.fetchImpl));

    await expect(store.readAll()).rejects.toBeInstanceOf(LoadError);
  });

  it('should append the row in column order as raw values', async () => {
    const google = fakeGoogle([
      tokenRoute,
      metadataRoute,
      {
        method: 'POST',
        url: appendUrl,
        respond: () => jsonResponse({ updates: { updatedRange: 'Ledger!A4:E4', updatedRows: 1 } }),
      },
    ]);
    const store = await connectGoogleSheets(options(google.fetchImpl));

    await store.appendRow(['2024-04-01', 'Income', 'Salary April', 5000000, 0]);

    const appendCall = google.calls[2];
    expect(JSON.parse(String(appendCall.init.body))).toEqual({
      majorDimension: 'ROWS',
      values: [['2024-04-01', 'Income', 'Salary April', 5000000, 0]],
    });
  });

  it('should raise a WriteError with the status when the append is refused', async () => {
    const google = fakeGoogle([
      tokenRoute,
      metadataRoute,
      { method: 'POST', url: appendUrl, respond: () => jsonResponse('PERMISSION_DENIED', 403) },
    ]);
    const store = await connectGoogleSheets(options(google.fetchImpl));

    const error = await store.appendRow(['2024-04-01', 'Income', '', 1, 0]).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(WriteError);
    expect(error instanceof WriteError && error.status).toBe(403);
  });

  it('should raise a WriteError for a malformed append response', async () => {
    const google = fakeGoogle([
      tokenRoute,
      metadataRoute,
      { method: 'POST', url: appendUrl, respond: () => jsonResponse({ spreadsheetId: 'sheet-123' }) },
    ]);
    const store = await connectGoogleSheets(options(google.fetchImpl));

    await expect(store.appendRow(['2024-04-01', 'Income', '', 1, 0])).rejects.toThrow(
      'Appending to the ledger sheet returned an unexpected response'
    );
  });
});

describe('recordsFromValues', () => {
  it('should return nothing for a header-only grid', () => {
    expect(recordsFromValues([['Date', 'Amount']])).toEqual([]);
  });

  it('should stringify boolean cells', () => {
    expect(recordsFromValues([['Description'], [true]])).toEqual([{ Description: 'true' }]);
  });
});

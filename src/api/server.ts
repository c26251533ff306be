import express, { Express, NextFunction, Request, Response } from "express";
import { AppConfig, loadConfig } from "../config";
import { Connector } from "../cache/connectionCache";
import { LedgerService } from "../service/ledgerService";
import { connectGoogleSheets } from "../store/googleSheetsStore";
import { InMemoryLedgerStore } from "../store/inMemoryStore";
import { ConnectionError } from "../utils/errors";
import { createRouter } from "./routes";

/**
 * Builds the Express app around a ledger service.
 */
export function createApp(service: LedgerService): Express {
  const app = express();

  // Middleware
  app.use(express.json());
  app.use(express.urlencoded({ extended: true }));

  // CORS headers for development
  app.use((req, res, next) => {
    res.header("Access-Control-Allow-Origin", "*");
    res.header("Access-Control-Allow-Methods", "GET, POST, OPTIONS");
    res.header("Access-Control-Allow-Headers", "Origin, X-Requested-With, Content-Type, Accept");
    if (req.method === "OPTIONS") {
      res.sendStatus(200);
    } else {
      next();
    }
  });

  // Routes
  app.use("/api", createRouter(service));

  // Error handling middleware
  app.use((err: unknown, req: Request, res: Response, next: NextFunction) => {
    if (err instanceof ConnectionError) {
      console.error("Ledger store unavailable:", err.message);
      res.status(503).json({ error: "Ledger store unavailable", kind: err.name, message: err.message });
      return;
    }
    if (err instanceof SyntaxError) {
      res.status(400).json({ error: "Malformed JSON body" });
      return;
    }
    console.error("Unhandled error:", err);
    res.status(500).json({
      error: "Internal server error",
      message: err instanceof Error ? err.message : String(err),
    });
  });

  return app;
}

/**
 * Chooses the store backend named by the config.
 */
export function createConnector(config: AppConfig): Connector {
  if (config.backend === "memory") {
    const store = new InMemoryLedgerStore();
    return async () => store;
  }
  const sheets = config.googleSheets;
  if (!sheets) {
    throw new ConnectionError("Google Sheets backend selected without spreadsheet settings");
  }
  return () => connectGoogleSheets(sheets);
}

export function createService(config: AppConfig): LedgerService {
  return new LedgerService({
    connect: createConnector(config),
    goldPricePerGram: config.goldPricePerGram,
    connectionTtlSeconds: config.connectionTtlSeconds,
    ledgerTtlSeconds: config.ledgerTtlSeconds,
  });
}

// Start server
if (require.main === module) {
  const config = loadConfig();
  const app = createApp(createService(config));
  app.listen(config.port, () => {
    console.log(`Server running on port ${config.port} (${config.backend} backend)`);
    console.log(`API available at http://localhost:${config.port}/api`);
  });
}

import { NextFunction, Request, Response, Router } from "express";
import { LedgerService } from "../service/ledgerService";
import { summarizeError } from "../utils/errors";
import { describeIssues, TransactionDraftSchema } from "../utils/validation";

/**
 * Builds the API router around a ledger service.
 * Fatal errors (a ConnectionError) are passed to the error middleware in server.ts.
 */
export function createRouter(service: LedgerService): Router {
  const router = Router();

  /**
   * GET /api/ledger
   * Every transaction in sheet order, plus the load error when the ledger could not be used
   */
  router.get("/ledger", async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { ledger, error } = await service.getLedger();
      res.json({ transactions: ledger, error: summarizeError(error) });
    } catch (error) {
      next(error);
    }
  });

  /**
   * GET /api/metrics
   * Totals, net cash flow, estimated wealth, cumulative trend and allocation breakdown
   */
  router.get("/metrics", async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { metrics, error } = await service.getMetrics();
      res.json({
        metrics,
        error: summarizeError(error),
        goldPricePerGram: service.goldPricePerGram,
        goldPriceIsEstimate: true,
      });
    } catch (error) {
      next(error);
    }
  });

  /**
   * GET /api/history
   * Formatted transaction history, newest first
   */
  router.get("/history", async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { rows, error } = await service.getHistory();
      res.json({ rows, error: summarizeError(error) });
    } catch (error) {
      next(error);
    }
  });

  /**
   * GET /api/dashboard
   * Metrics, transactions and history from a single load
   */
  router.get("/dashboard", async (req: Request, res: Response, next: NextFunction) => {
    try {
      const view = await service.getDashboard();
      res.json({
        metrics: view.metrics,
        transactions: view.ledger,
        history: view.history,
        error: summarizeError(view.error),
        goldPricePerGram: service.goldPricePerGram,
        goldPriceIsEstimate: true,
      });
    } catch (error) {
      next(error);
    }
  });

  /**
   * POST /api/transactions
   * Append one transaction to the ledger sheet
   */
  router.post("/transactions", async (req: Request, res: Response, next: NextFunction) => {
    const parsed = TransactionDraftSchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({
        error: "Invalid transaction",
        details: describeIssues(parsed.error),
      });
      return;
    }

    try {
      const outcome = await service.append(parsed.data);
      if (outcome.status === "ok") {
        console.log(outcome.message);
        res.status(201).json(outcome);
      } else if (outcome.status === "rejected") {
        res.status(422).json({ status: outcome.status, error: outcome.reason });
      } else {
        res.status(502).json({ status: outcome.status, error: summarizeError(outcome.error) });
      }
    } catch (error) {
      next(error);
    }
  });

  /**
   * GET /api
   * API information endpoint
   */
  router.get("/", (req: Request, res: Response) => {
    res.json({
      message: "Household Ledger API",
      version: "1.0.0",
      endpoints: {
        ledger: "GET /api/ledger - Cleaned transactions in sheet order",
        metrics: "GET /api/metrics - Totals, wealth estimate and cumulative cash-flow trend",
        history: "GET /api/history - Formatted transaction history, newest first",
        dashboard: "GET /api/dashboard - Metrics, transactions and history in one read",
        append: "POST /api/transactions - Record a new transaction",
        health: "GET /api/health - Health check",
      },
    });
  });

  /**
   * GET /api/health
   * Health check endpoint
   */
  router.get("/health", (req: Request, res: Response) => {
    res.json({ status: "ok", timestamp: new Date().toISOString() });
  });

  return router;
}

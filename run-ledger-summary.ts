import * as fs from "fs";
import * as path from "path";
import { aggregateMetrics } from "./src/engine/aggregator";
import { loadLedger } from "./src/engine/loader";
import { RawRecord } from "./src/models/LedgerStore";
import { DEFAULT_GOLD_PRICE_PER_GRAM } from "./src/utils/constants";
import { formatGrams, formatRupiah } from "./src/utils/format";

/**
 * Load raw ledger rows from a JSON file, print the dashboard figures and write
 * them to ledger-summary-output.json (generated in project root).
 * Usage: npx ts-node run-ledger-summary.ts [rows-file] [gold-price-per-gram]
 * Default input: example-rows.json
 */
const inputPath = process.argv[2] ?? "example-rows.json";
const goldPricePerGram = process.argv[3] ? Number(process.argv[3]) : DEFAULT_GOLD_PRICE_PER_GRAM;

if (!Number.isFinite(goldPricePerGram) || goldPricePerGram < 0) {
  console.error(`Gold price per gram must be a non-negative number, got "${process.argv[3]}".`);
  process.exit(1);
}

let inputData: unknown;
try {
  const raw = fs.readFileSync(path.resolve(inputPath), "utf-8");
  inputData = JSON.parse(raw);
} catch (err) {
  const message = err instanceof Error ? err.message : String(err);
  console.error(`Failed to read or parse input file "${inputPath}": ${message}`);
  process.exit(1);
}

function isRawRecord(value: unknown): value is RawRecord {
  return (
    typeof value === "object" &&
    value !== null &&
    !Array.isArray(value) &&
    Object.values(value).every((cell) => cell === null || typeof cell === "string" || typeof cell === "number")
  );
}

if (!Array.isArray(inputData) || !inputData.every(isRawRecord)) {
  console.error("Input file must contain an array of row objects with string, number or null cells.");
  process.exit(1);
}

const { ledger, error } = loadLedger(inputData);
if (error) {
  console.error(`${error.name}: ${error.message}`);
}

const metrics = aggregateMetrics(ledger, { goldPricePerGram });

console.log(`Transactions:            ${metrics.transactionCount} (${metrics.undatedCount} without a valid date)`);
console.log(`Estimated total wealth:  ${formatRupiah(metrics.estimatedTotalWealth)}`);
console.log(`Net cash flow:           ${formatRupiah(metrics.netCashFlow)}`);
console.log(`Stock savings:           ${formatRupiah(metrics.totalStockInvestment)}`);
console.log(`Gold savings:            ${formatGrams(metrics.totalGoldGrams)} g`);

if (metrics.cumulativeTrend.length === 0) {
  console.log("\nNot enough dated rows for a cumulative trend.");
} else {
  console.log("\nCumulative net cash flow:");
  for (const point of metrics.cumulativeTrend) {
    console.log(`  ${point.date}  ${formatRupiah(point.cumulativeNetCashFlow)}`);
  }
}

fs.writeFileSync(
  "ledger-summary-output.json",
  JSON.stringify({ metrics, error: error ? { kind: error.name, message: error.message } : null }, null, 2)
);
console.log("\nSummary saved to ledger-summary-output.json");

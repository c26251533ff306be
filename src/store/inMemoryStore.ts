import { LEDGER_COLUMNS, LedgerRow, LedgerStore, RawCell, RawRecord } from "../models/LedgerStore";

/**
 * Store kept in process memory, laid out like a worksheet: a header row plus
 * positional data rows. Used by the `memory` backend and by tests.
 */
export class InMemoryLedgerStore implements LedgerStore {
  private readonly header: readonly string[];
  private rows: readonly (readonly RawCell[])[];

  constructor(records: readonly RawRecord[] = [], header: readonly string[] = LEDGER_COLUMNS) {
    this.header = [...header];
    this.rows = records.map((record) => this.header.map((column) => record[column] ?? ""));
  }

  get rowCount(): number {
    return this.rows.length;
  }

  async readAll(): Promise<RawRecord[]> {
    return this.rows.map((row) => {
      const record: RawRecord = {};
      this.header.forEach((column, i) => {
        record[column] = row[i] ?? "";
      });
      return record;
    });
  }

  async appendRow(row: LedgerRow): Promise<void> {
    this.rows = [...this.rows, [...row]];
  }
}

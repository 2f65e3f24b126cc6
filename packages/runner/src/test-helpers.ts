/**
 * Shared test helpers: reusable across all test files.
 */
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { HyperautoConfigSchema } from "./types/config.js";
import type { HyperautoConfig, ResultSchemaInput } from "./types/config.js";
import type { RunContext } from "./types/report.js";
import type { CellWrite, GridSize, TableStore } from "./sheet/table-store.js";

/**
 * Creates a temp dir, runs fn, cleans up in finally.
 */
export async function withTmpDir(fn: (dir: string) => Promise<void>): Promise<void> {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "hyperauto-test-"));
  try {
    await fn(dir);
  } finally {
    fs.rmSync(dir, { recursive: true, force: true });
  }
}

/**
 * Sync version of withTmpDir.
 */
export function withTmpDirSync(fn: (dir: string) => void): void {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "hyperauto-test-"));
  try {
    fn(dir);
  } finally {
    fs.rmSync(dir, { recursive: true, force: true });
  }
}

/** hyperopt-show output with every section the extractor reads. */
export function loadSampleReport(): string {
  return fs.readFileSync(new URL("../fixtures/hyperopt-show.txt", import.meta.url), "utf8");
}

export const sampleSchemaInput: ResultSchemaInput = {
  context: [
    { name: "Date and Time", from: "timestamp" },
    { name: "Run #", from: "runNumber" },
    { name: "Strategy", from: "strategy" },
    { name: "Epochs", from: "epochs" },
    { name: "random-state", from: "seed" },
    { name: "Timerange", from: "timerange" },
    { name: "Pairs", from: "pairs" },
  ],
  strategy: [
    "EMA_1D_1",
    "EMA_1D_2",
    { name: "EMA_slow1_5m", keys: ["ema_slow_5m"] },
    { name: "Entry_volume_1H", keys: ["long_volume_threshold_1h", "short_volume_threshold_1h"] },
    { name: "max_scale_in", keys: ["max_scale_ins"] },
    {
      name: "sl_volume",
      keys: ["long_sl_volume_threshold_exit", "short_sl_volume_threshold_exit"],
      prefer: "sell",
    },
    { name: "Trailing", keys: ["trailing_stop"] },
  ],
  metrics: ["Trades #", "% Win", "Avg. Profit %", "Profit %", "Duration min", "DrawDown %"],
};

export const sampleContext: RunContext = {
  strategy: "Foo",
  config: "config.json",
  epochs: "50",
  timerange: "20230101-20230201",
  pairs: "BTC/USDT",
  seed: "12345",
  runNumber: 7,
  timestamp: new Date(Date.UTC(2024, 0, 2, 3, 4, 5)),
};

/** A validated config rooted at `hostUserDataPath`, with no settle delay. */
export function makeConfig(hostUserDataPath = "/data/user_data"): HyperautoConfig {
  return HyperautoConfigSchema.parse({
    docker: { hostUserDataPath },
    workbook: { path: "runs.xlsx" },
    schema: sampleSchemaInput,
    resultSettleMs: 0,
  });
}

/**
 * In-memory TableStore over a grid of strings. Records every batch of cell
 * writes; `failUpdates` makes updateCells throw.
 */
export class MemoryTableStore implements TableStore {
  readonly grid: string[][];
  readonly writes: CellWrite[][] = [];
  failUpdates = false;
  private rows: number;
  private cols: number;

  constructor(rows: string[][] = []) {
    this.grid = rows.map((r) => [...r]);
    this.rows = rows.length;
    this.cols = Math.max(0, ...rows.map((r) => r.length));
  }

  cell(row: number, col: number): string {
    return this.grid[row - 1]?.[col - 1] ?? "";
  }

  async size(): Promise<GridSize> {
    return { rows: this.rows, cols: this.cols };
  }

  async readRow(row: number): Promise<string[]> {
    return trimTrailing(Array.from({ length: this.cols }, (_, c) => this.cell(row, c + 1)));
  }

  async readColumn(col: number): Promise<string[]> {
    return trimTrailing(Array.from({ length: this.rows }, (_, r) => this.cell(r + 1, col)));
  }

  async resize({ rows, cols }: GridSize): Promise<void> {
    this.rows = rows;
    this.cols = cols;
  }

  async updateCells(cells: readonly CellWrite[]): Promise<void> {
    if (this.failUpdates) throw new Error("store unavailable");
    this.writes.push([...cells]);
    for (const { row, col, value } of cells) {
      while (this.grid.length < row) this.grid.push([]);
      const line = this.grid[row - 1];
      while (line.length < col) line.push("");
      line[col - 1] = value;
      this.rows = Math.max(this.rows, row);
      this.cols = Math.max(this.cols, col);
    }
  }
}

function trimTrailing(values: string[]): string[] {
  let end = values.length;
  while (end > 0 && values[end - 1] === "") end--;
  return values.slice(0, end);
}

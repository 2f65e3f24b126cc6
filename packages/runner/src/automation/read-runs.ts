import { z } from "zod";
import { formatZodErrors } from "@hyperauto/kit";
import { logger } from "../lib/logger.js";
import type { RunDefinition } from "../types/run.js";

const requiredCell = (column: string) =>
  z
    .string({ required_error: `${column} is required` })
    .trim()
    .min(1, `${column} is required`);

/** Blank cells and `OFF` mean "leave the flag out". */
const optionalCell = z
  .string()
  .trim()
  .default("")
  .transform((v) => (v === "" || v.toUpperCase() === "OFF" ? undefined : v));

const RunRowSchema = z.object({
  Strategy: requiredCell("Strategy"),
  epochs: requiredCell("epochs").regex(/^\d+$/, "epochs must be a whole number"),
  timerange: requiredCell("timerange"),
  Config: optionalCell,
  Pairs: optionalCell,
  Leverage: optionalCell,
  "% per trade": optionalCell,
  spaces: optionalCell,
  loss_function: optionalCell,
  jobs: optionalCell,
  min_trades: optionalCell,
  random_state: optionalCell,
});

type RunRow = z.output<typeof RunRowSchema>;

function toRunDefinition(row: RunRow, rowNumber: number, defaultConfig: string): RunDefinition {
  return {
    row: rowNumber,
    strategy: row.Strategy,
    config: row.Config ?? defaultConfig,
    epochs: row.epochs,
    timerange: row.timerange,
    pairs: row.Pairs,
    leverage: row.Leverage,
    riskPerTrade: row["% per trade"],
    spaces: row.spaces,
    lossFunction: row.loss_function,
    jobs: row.jobs,
    minTrades: row.min_trades,
    randomState: row.random_state,
  };
}

/**
 * Validates runs-sheet rows (header row excluded) into run definitions.
 * Invalid rows are skipped with a warning naming the sheet row.
 */
export function readRunDefinitions(
  rows: readonly Record<string, string>[],
  defaultConfig: string,
): RunDefinition[] {
  const log = logger.createChild("read-runs");
  const runs: RunDefinition[] = [];

  rows.forEach((raw, i) => {
    const rowNumber = i + 2;
    const parsed = RunRowSchema.safeParse(raw);
    if (!parsed.success) {
      log.warn({ row: rowNumber, problems: formatZodErrors(parsed.error) }, "skipping run row");
      return;
    }
    runs.push(toRunDefinition(parsed.data, rowNumber, defaultConfig));
  });

  if (!runs.length) log.warn({ rows: rows.length }, "no valid runs found");
  else log.info({ runs: runs.length, rows: rows.length }, "prepared runs");
  return runs;
}

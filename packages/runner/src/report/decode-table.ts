import { VERTICAL_GLYPHS, startsWithVerticalGlyph } from "./scan-sections.js";
import { parseDuration } from "./parse-duration.js";
import { MISSING } from "../types/report.js";
import type { Decoded, MetricMap, MetricValue, RawSection } from "../types/report.js";
import type { LabelRule } from "../types/config.js";

/** Canonical metric keys the table decoders produce. */
export const METRIC_KEYS = {
  trades: "Trades #",
  winRate: "% Win",
  avgProfitPct: "Avg. Profit %",
  totalProfitPct: "Profit %",
  durationMin: "Duration min",
  drawdownPct: "DrawDown %",
} as const;

export const DEFAULT_LABEL_RULES: readonly LabelRule[] = [
  { contains: "Total/Daily Avg Trades", key: METRIC_KEYS.trades, transform: "before-slash" },
  { contains: "Total profit %", key: METRIC_KEYS.totalProfitPct, transform: "strip-percent" },
  { contains: "Absolute Drawdown (Account)", key: METRIC_KEYS.drawdownPct, transform: "strip-percent" },
  { contains: "Max % of account underwater", key: METRIC_KEYS.drawdownPct, transform: "strip-percent" },
];

export interface TableDecodeOptions {
  rules?: readonly LabelRule[];
  /** Also keep every label/value pair verbatim, keyed by its label. */
  passthrough?: boolean;
}

const stripPercent = (v: string): string => v.replace(/%/g, "").trim();

function applyTransform(value: string, transform: LabelRule["transform"]): string {
  switch (transform) {
    case "before-slash":
      return value.split("/")[0].trim();
    case "strip-percent":
      return stripPercent(value);
    case "none":
      return value;
  }
}

/**
 * Splits a table row into trimmed, non-empty cells: on a vertical glyph when
 * the row has one, else on runs of two or more spaces.
 */
export function splitRow(row: string): string[] {
  const glyph = VERTICAL_GLYPHS.find((g) => row.includes(g));
  const cells = glyph ? row.split(glyph) : row.trim().split(/\s{2,}/);
  return cells.map((c) => c.trim()).filter(Boolean);
}

/** Label/value table (SUMMARY METRICS) to a metric fragment. */
export function decodeMetricTable(
  rows: RawSection,
  { rules = DEFAULT_LABEL_RULES, passthrough = false }: TableDecodeOptions = {},
): Decoded<MetricMap> {
  const value: Record<string, MetricValue> = {};
  let pairs = 0;

  for (const row of rows) {
    const cells = splitRow(row);
    if (cells.length < 2) continue;
    const label = cells[0];
    const raw = cells[cells.length - 1];
    pairs++;

    if (passthrough) value[label] = raw;
    const rule = rules.find((r) => label.includes(r.contains));
    if (rule) value[rule.key] = applyTransform(raw, rule.transform);
  }

  const warnings = rows.length && !pairs ? ["summary table: no label/value rows"] : [];
  return { value, warnings };
}

/** Last whitespace token of a cell: the Win% of a combined `Win Draw Loss Win%` column. */
function lastToken(cell: string): string {
  const tokens = cell.split(/\s+/);
  return tokens[tokens.length - 1];
}

const NUMERIC_CELL = /^[+-]?(?:\d|\.\d)/;
const TOTAL_COLUMNS = 5;

/**
 * The backtesting report TOTAL row to a metric fragment. Columns are
 * positional after an optional label cell: trades, avg profit %, abs profit,
 * total profit %, avg duration, ..., win rate (last cell, or last cell of the
 * final continuation row when the terminal wrapped it). A row whose trade
 * count or duration does not read yields nothing.
 */
export function decodeTotalRow(rows: RawSection): Decoded<MetricMap> {
  if (!rows.length) return { value: {}, warnings: [] };

  const fields = splitRow(rows[0]);
  const columns = fields.length && !NUMERIC_CELL.test(fields[0]) ? fields.slice(1) : fields;
  if (!startsWithVerticalGlyph(rows[0]) || columns.length < TOTAL_COLUMNS) {
    return {
      value: {},
      warnings: [`backtest TOTAL row: expected ${TOTAL_COLUMNS}+ columns, got ${columns.length}`],
    };
  }

  const [trades, avgProfit, , totalProfit, duration] = columns;
  if (!/^\d+$/.test(trades)) {
    return { value: {}, warnings: [`backtest TOTAL row: unreadable trade count "${trades}"`] };
  }
  const minutes = parseDuration(duration);
  if (minutes === MISSING) {
    return { value: {}, warnings: [`backtest TOTAL row: unreadable duration "${duration}"`] };
  }

  const value: Record<string, MetricValue> = {
    [METRIC_KEYS.trades]: trades,
    [METRIC_KEYS.avgProfitPct]: stripPercent(avgProfit),
    [METRIC_KEYS.totalProfitPct]: stripPercent(totalProfit),
    [METRIC_KEYS.durationMin]: minutes,
  };

  const continuation = rows.length > 1 ? splitRow(rows[rows.length - 1]) : [];
  if (continuation.length) {
    value[METRIC_KEYS.winRate] = stripPercent(lastToken(continuation[continuation.length - 1]));
  } else if (columns.length > TOTAL_COLUMNS) {
    value[METRIC_KEYS.winRate] = stripPercent(lastToken(columns[columns.length - 1]));
  }

  return { value, warnings: [] };
}

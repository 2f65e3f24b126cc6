import { stripVTControlCharacters } from "node:util";
import type { RawSection, ReportMarkers, ReportSections } from "../types/report.js";

export const DEFAULT_MARKERS: ReportMarkers = {
  buyParams: "# Buy hyperspace params:",
  sellParams: "# Sell hyperspace params:",
  roi: "# ROI table:",
  stoploss: "# Stoploss:",
  trailingStop: "# Trailing stop:",
  maxOpenTrades: "# Max Open Trades:",
  summaryMetrics: "SUMMARY METRICS",
  backtestReport: "BACKTESTING REPORT",
};

export const VERTICAL_GLYPHS = ["│", "┃", "|"] as const;
const CLOSING_BORDERS = ["└", "╰"] as const;
const TOTAL_TOKEN = /\bTOTAL\b/;
const COMMENT_HEADER = /^#\s.*:$/;
const MAX_CONTINUATION_ROWS = 2;

/**
 * Splits report text into lines after NFC normalization (box-drawing glyph
 * variants collapse to one code point) and removal of terminal escapes.
 */
export function toReportLines(text: string): string[] {
  return stripVTControlCharacters(text.normalize("NFC")).split(/\r?\n/);
}

export function startsWithVerticalGlyph(text: string): boolean {
  return VERTICAL_GLYPHS.some((g) => text.startsWith(g));
}

function lastIndexOfMarker(lines: readonly string[], marker: string): number {
  for (let i = lines.length - 1; i >= 0; i--) {
    if (lines[i].includes(marker)) return i;
  }
  return -1;
}

function isMarkerLine(text: string, markers: ReportMarkers): boolean {
  return COMMENT_HEADER.test(text) || Object.values(markers).some((m) => text.includes(m));
}

type ParamState = "outside" | "in-buy" | "in-sell" | "cleared";

/**
 * Collects the quoted-key lines of the most recent buy/sell parameter blocks.
 * Reports can carry stale blocks from earlier epochs, so the walk starts at the
 * last buy marker (the last sell marker when there is no buy block).
 */
export function scanParameterBlocks(
  lines: readonly string[],
  markers: ReportMarkers = DEFAULT_MARKERS,
): { buy: RawSection; sell: RawSection } {
  let start = lastIndexOfMarker(lines, markers.buyParams);
  if (start === -1) start = lastIndexOfMarker(lines, markers.sellParams);
  if (start === -1) return { buy: [], sell: [] };

  const buy: string[] = [];
  const sell: string[] = [];
  let state: ParamState = "outside";

  for (const line of lines.slice(start)) {
    const text = line.trim();
    if (text.includes(markers.buyParams)) {
      state = "in-buy";
      continue;
    }
    if (text.includes(markers.sellParams)) {
      state = "in-sell";
      continue;
    }
    if (text.includes(markers.roi) || text.includes(markers.stoploss)) {
      state = "cleared";
      continue;
    }
    if (text.includes(markers.trailingStop) || text.includes(markers.maxOpenTrades)) break;
    if (!text.startsWith('"') && !text.startsWith("'")) continue;

    if (state === "in-buy") buy.push(line);
    else if (state === "in-sell") sell.push(line);
  }

  return { buy, sell };
}

type TableState = "outside" | "in-table";

/**
 * Rows of the summary metrics table: everything non-empty between the
 * marker and the closing border. Plain-text tables without a border end at
 * the first blank line after their rows.
 */
export function scanSummaryTable(
  lines: readonly string[],
  markers: ReportMarkers = DEFAULT_MARKERS,
): RawSection {
  const rows: string[] = [];
  let state: TableState = "outside";

  for (const line of lines) {
    const text = line.trim();
    if (state === "outside") {
      if (text.includes(markers.summaryMetrics)) state = "in-table";
      continue;
    }
    if (CLOSING_BORDERS.some((b) => text.startsWith(b))) break;
    if (!text) {
      if (rows.length) break;
      continue;
    }
    rows.push(text);
  }

  return rows;
}

/** Glyph-started rows that are only rules: `|---|---|`, `│ ─── │`. */
const RULE_ROW = /^[|│┃\s\-:+=─━┼╪╋]+$/;
const INNER_BORDER = /^[┏┡┌╭├┣╞+]/;

/**
 * Last data row of the first table after `start`. Borders and the blank lines
 * before the table are skipped; any other line ends it.
 */
function lastTableRow(lines: readonly string[], start: number): string | undefined {
  let last: string | undefined;
  for (let i = start + 1; i < lines.length; i++) {
    const text = lines[i].trim();
    if (startsWithVerticalGlyph(text)) {
      if (!RULE_ROW.test(text)) last = text;
    } else if (!INNER_BORDER.test(text) && (last !== undefined || text)) {
      break;
    }
  }
  return last;
}

/**
 * The TOTAL row of the backtesting report plus up to two continuation rows
 * (narrow terminals wrap the win-rate column onto the next line). A table
 * printed without the TOTAL label falls back to its last data row.
 */
export function scanBacktestTotal(
  lines: readonly string[],
  markers: ReportMarkers = DEFAULT_MARKERS,
): RawSection {
  const start = lines.findIndex((l) => l.includes(markers.backtestReport));
  if (start === -1) return [];

  for (let i = start + 1; i < lines.length; i++) {
    if (!TOTAL_TOKEN.test(lines[i])) continue;
    const captured = [lines[i].trim()];
    for (let j = i + 1; j < lines.length && captured.length <= MAX_CONTINUATION_ROWS; j++) {
      const next = lines[j].trim();
      if (!startsWithVerticalGlyph(next) || TOTAL_TOKEN.test(next)) break;
      captured.push(next);
    }
    return captured;
  }

  const last = lastTableRow(lines, start);
  return last === undefined ? [] : [last];
}

/** Non-empty lines after the last trailing-stop marker, up to the next marker. */
export function scanTrailingStop(
  lines: readonly string[],
  markers: ReportMarkers = DEFAULT_MARKERS,
): RawSection {
  const start = lastIndexOfMarker(lines, markers.trailingStop);
  if (start === -1) return [];

  const block: string[] = [];
  for (const line of lines.slice(start + 1)) {
    const text = line.trim();
    if (isMarkerLine(text, markers)) break;
    if (text) block.push(text);
  }
  return block;
}

export function scanMaxOpenTrades(
  lines: readonly string[],
  markers: ReportMarkers = DEFAULT_MARKERS,
): RawSection {
  const start = lastIndexOfMarker(lines, markers.maxOpenTrades);
  if (start === -1) return [];

  for (const line of lines.slice(start + 1)) {
    const text = line.trim();
    if (!text) continue;
    return isMarkerLine(text, markers) ? [] : [text];
  }
  return [];
}

export function scanReport(
  lines: readonly string[],
  markers: ReportMarkers = DEFAULT_MARKERS,
): ReportSections {
  const { buy, sell } = scanParameterBlocks(lines, markers);
  return {
    "buy-params": buy,
    "sell-params": sell,
    "summary-table": scanSummaryTable(lines, markers),
    "backtest-total": scanBacktestTotal(lines, markers),
    "trailing-stop": scanTrailingStop(lines, markers),
    "max-open-trades": scanMaxOpenTrades(lines, markers),
  };
}

import { DEFAULT_MARKERS, scanReport, toReportLines } from "./scan-sections.js";
import { decodeParameterBlock } from "./decode-literal.js";
import { DEFAULT_LABEL_RULES, decodeMetricTable, decodeTotalRow } from "./decode-table.js";
import { decodeScalarLines } from "./decode-scalar-lines.js";
import { DEFAULT_METRIC_PRECEDENCE, normalizeRecord } from "./normalize-record.js";
import type { ResultSchema } from "./schema-registry.js";
import type {
  Decoded,
  Extraction,
  MetricFragment,
  MetricMap,
  MetricSource,
  ParameterSet,
  ReportMarkers,
  RunContext,
} from "../types/report.js";
import type { LabelRule } from "../types/config.js";

export interface ExtractOptions {
  markers?: Partial<ReportMarkers>;
  /** Checked before the built-in label rules. */
  labelRules?: readonly LabelRule[];
  passthrough?: boolean;
  precedence?: readonly MetricSource[];
}

/** Runs one decoder; an unexpected throw becomes a warning and an empty result. */
function guarded<T>(label: string, empty: T, decode: () => Decoded<T>): Decoded<T> {
  try {
    return decode();
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    return { value: empty, warnings: [`${label}: ${reason}`] };
  }
}

/**
 * Report text to a schema-complete record. Missing or malformed sections only
 * add warnings; the result is null only when the text is empty.
 */
export function extractReport(
  text: string | null | undefined,
  schema: ResultSchema,
  context: RunContext,
  options: ExtractOptions = {},
): Extraction | null {
  if (!text || !text.trim()) return null;

  const markers: ReportMarkers = { ...DEFAULT_MARKERS, ...options.markers };
  const sections = scanReport(toReportLines(text), markers);
  const warnings: string[] = [];
  const emptySet: ParameterSet = {};
  const emptyMap: MetricMap = {};

  if (!sections["buy-params"].length && !sections["sell-params"].length) {
    warnings.push("no hyperspace parameter block found");
  }
  if (!sections["summary-table"].length) warnings.push("SUMMARY METRICS table not found");
  if (!sections["backtest-total"].length) warnings.push("TOTAL row not found in BACKTESTING REPORT");

  const buy = guarded("buy params", emptySet, () => decodeParameterBlock(sections["buy-params"], "buy params"));
  const sell = guarded("sell params", emptySet, () => decodeParameterBlock(sections["sell-params"], "sell params"));
  const settings = guarded("settings", emptySet, () =>
    decodeScalarLines([...sections["trailing-stop"], ...sections["max-open-trades"]]),
  );
  const summary = guarded("summary table", emptyMap, () =>
    decodeMetricTable(sections["summary-table"], {
      rules: [...(options.labelRules ?? []), ...DEFAULT_LABEL_RULES],
      passthrough: options.passthrough,
    }),
  );
  const total = guarded("backtest TOTAL row", emptyMap, () => decodeTotalRow(sections["backtest-total"]));

  for (const decoded of [buy, sell, settings, summary, total]) warnings.push(...decoded.warnings);

  const fragments: MetricFragment[] = [
    { source: "summary-metrics", metrics: summary.value },
    { source: "backtest-total", metrics: total.value },
  ];

  const record = normalizeRecord(
    schema,
    context,
    { buy: buy.value, sell: sell.value, settings: settings.value },
    fragments,
    options.precedence ?? DEFAULT_METRIC_PRECEDENCE,
  );

  return { record, warnings };
}

// --- Sentinels ---

export const MISSING = "N/A";
export const FAILED = "FAILED";

// --- Sections ---

export type SectionName =
  | "buy-params"
  | "sell-params"
  | "summary-table"
  | "backtest-total"
  | "trailing-stop"
  | "max-open-trades";

/** Lines of one report section; empty when its marker was not found. */
export type RawSection = readonly string[];

export type ReportSections = Readonly<Record<SectionName, RawSection>>;

export interface ReportMarkers {
  buyParams: string;
  sellParams: string;
  roi: string;
  stoploss: string;
  trailingStop: string;
  maxOpenTrades: string;
  summaryMetrics: string;
  backtestReport: string;
}

// --- Decoded values ---

export type LiteralValue =
  | string
  | number
  | boolean
  | null
  | LiteralValue[]
  | { [key: string]: LiteralValue };

export type ParameterSet = Readonly<Record<string, LiteralValue>>;

export type MetricValue = string | number;

export type MetricMap = Readonly<Record<string, MetricValue>>;

export type MetricSource = "summary-metrics" | "backtest-total";

export interface MetricFragment {
  source: MetricSource;
  metrics: MetricMap;
}

/** Result of a decoder: the value is always usable, warnings are advisory. */
export interface Decoded<T> {
  value: T;
  warnings: string[];
}

export interface DecodedParameters {
  buy: ParameterSet;
  sell: ParameterSet;
  /** trailing-stop and max-open-trades settings */
  settings: ParameterSet;
}

// --- Run context & record ---

export interface RunContext {
  strategy: string;
  config: string;
  epochs: string;
  timerange: string;
  pairs?: string;
  leverage?: string;
  riskPerTrade?: string;
  lossFunction?: string;
  seed: string | null;
  runNumber?: number;
  timestamp: Date;
}

export type RunContextKey = keyof RunContext;

export type ResultRecord = Readonly<Record<string, string>>;

export interface Extraction {
  record: ResultRecord;
  warnings: string[];
}

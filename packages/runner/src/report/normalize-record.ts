import { formatLiteral } from "./decode-literal.js";
import { FAILED, MISSING } from "../types/report.js";
import type {
  DecodedParameters,
  LiteralValue,
  MetricFragment,
  MetricSource,
  MetricValue,
  ResultRecord,
  RunContext,
  RunContextKey,
} from "../types/report.js";
import type { ContextField, StrategyField } from "../types/config.js";
import type { ResultSchema } from "./schema-registry.js";

/** Later entries win when two tables report the same metric. */
export const DEFAULT_METRIC_PRECEDENCE: readonly MetricSource[] = ["summary-metrics", "backtest-total"];

const pad = (n: number): string => String(n).padStart(2, "0");

/** `YYYY-MM-DD HH:MM:SS UTC` */
export function formatUtcTimestamp(date: Date): string {
  return (
    `${date.getUTCFullYear()}-${pad(date.getUTCMonth() + 1)}-${pad(date.getUTCDate())} ` +
    `${pad(date.getUTCHours())}:${pad(date.getUTCMinutes())}:${pad(date.getUTCSeconds())} UTC`
  );
}

function isEmpty(value: LiteralValue | MetricValue | undefined): value is undefined | null | "" {
  return value === undefined || value === null || value === "";
}

function displayValue(value: LiteralValue | MetricValue): string {
  if (typeof value === "string") return value;
  if (typeof value === "number") return String(value);
  return formatLiteral(value);
}

/** Own entries only, so keys like `constructor` never resolve through the prototype. */
function ownValue<T>(map: { readonly [key: string]: T }, key: string): T | undefined {
  return Object.hasOwn(map, key) ? map[key] : undefined;
}

function contextValue(context: RunContext, key: RunContextKey): string | undefined {
  const value = context[key];
  if (value instanceof Date) return formatUtcTimestamp(value);
  if (value === undefined || value === null || value === "") return undefined;
  return String(value);
}

/**
 * The ordered lookups for one strategy field: each declared key on the
 * preferred side, then on the other side. With the default buy preference and
 * keys [long_x, short_x] this is buy-long, sell-long, buy-short, sell-short.
 */
export function strategyLookupChain(
  field: StrategyField,
): { side: "buy" | "sell"; key: string }[] {
  const other = field.prefer === "buy" ? "sell" : "buy";
  return field.keys.flatMap((key) => [
    { side: field.prefer, key },
    { side: other, key },
  ]);
}

export function resolveStrategyValue(
  field: StrategyField,
  params: DecodedParameters,
): LiteralValue | undefined {
  for (const { side, key } of strategyLookupChain(field)) {
    const value = ownValue(params[side], key);
    if (!isEmpty(value)) return value;
  }
  for (const key of field.keys) {
    const value = ownValue(params.settings, key);
    if (!isEmpty(value)) return value;
  }
  return undefined;
}

/** Orders fragments by the precedence policy; sources not listed keep arrival order, first. */
function orderFragments(
  fragments: readonly MetricFragment[],
  precedence: readonly MetricSource[],
): MetricFragment[] {
  const rank = (f: MetricFragment): number => precedence.indexOf(f.source);
  return fragments
    .map((f, i) => ({ f, i }))
    .sort((a, b) => rank(a.f) - rank(b.f) || a.i - b.i)
    .map(({ f }) => f);
}

export function resolveMetricValue(
  name: string,
  fragments: readonly MetricFragment[],
  precedence: readonly MetricSource[] = DEFAULT_METRIC_PRECEDENCE,
): MetricValue | undefined {
  let found: MetricValue | undefined;
  for (const { metrics } of orderFragments(fragments, precedence)) {
    const value = ownValue(metrics, name);
    if (!isEmpty(value)) found = value;
  }
  return found;
}

function fillContext(
  record: Record<string, string>,
  fields: readonly ContextField[],
  context: RunContext,
): void {
  for (const { name, from } of fields) {
    const value = contextValue(context, from);
    if (value !== undefined) record[name] = value;
  }
}

const EMPTY_PARAMETERS: DecodedParameters = { buy: {}, sell: {}, settings: {} };

/**
 * Merges run context, parameter sets and metric fragments into a record with
 * exactly the schema's fields. Anything unresolved is "N/A".
 */
export function normalizeRecord(
  schema: ResultSchema,
  context: RunContext,
  params: DecodedParameters = EMPTY_PARAMETERS,
  fragments: readonly MetricFragment[] = [],
  precedence: readonly MetricSource[] = DEFAULT_METRIC_PRECEDENCE,
): ResultRecord {
  const record: Record<string, string> = Object.fromEntries(schema.fields.map((f) => [f, MISSING]));

  fillContext(record, schema.context, context);

  for (const field of schema.strategy) {
    const value = resolveStrategyValue(field, params);
    if (value !== undefined) record[field.name] = displayValue(value);
  }

  for (const name of schema.metrics) {
    const value = resolveMetricValue(name, fragments, precedence);
    if (value !== undefined) record[name] = displayValue(value);
  }

  return Object.freeze(record);
}

/** Placeholder written when a run produced no usable report. */
export function buildFailedRecord(schema: ResultSchema, context: RunContext): ResultRecord {
  const record: Record<string, string> = Object.fromEntries(schema.fields.map((f) => [f, FAILED]));
  fillContext(record, schema.context, context);
  return Object.freeze(record);
}

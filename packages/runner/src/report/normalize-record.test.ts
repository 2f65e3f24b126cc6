import { describe, it, expect } from "vitest";
import {
  buildFailedRecord,
  formatUtcTimestamp,
  normalizeRecord,
  resolveMetricValue,
  resolveStrategyValue,
  strategyLookupChain,
} from "./normalize-record.js";
import { createResultSchema } from "./schema-registry.js";
import { sampleContext, sampleSchemaInput } from "../test-helpers.js";
import type { DecodedParameters, MetricFragment } from "../types/report.js";
import type { StrategyField } from "../types/config.js";

const schema = createResultSchema(sampleSchemaInput);
const field = (keys: string[], prefer: "buy" | "sell" = "buy"): StrategyField => ({ name: "X", keys, prefer });
const params = (p: Partial<DecodedParameters>): DecodedParameters => ({ buy: {}, sell: {}, settings: {}, ...p });

describe("formatUtcTimestamp", () => {
  it("prints UTC with a suffix", () => {
    expect(formatUtcTimestamp(new Date(Date.UTC(2024, 0, 2, 3, 4, 5)))).toBe("2024-01-02 03:04:05 UTC");
  });
});

describe("strategyLookupChain", () => {
  it("tries each key on the preferred side first", () => {
    expect(strategyLookupChain(field(["long_x", "short_x"]))).toEqual([
      { side: "buy", key: "long_x" },
      { side: "sell", key: "long_x" },
      { side: "buy", key: "short_x" },
      { side: "sell", key: "short_x" },
    ]);
  });

  it("starts on the sell side when preferred", () => {
    expect(strategyLookupChain(field(["k"], "sell"))).toEqual([
      { side: "sell", key: "k" },
      { side: "buy", key: "k" },
    ]);
  });
});

describe("resolveStrategyValue", () => {
  it("falls back to the sell side", () => {
    expect(resolveStrategyValue(field(["a"]), params({ sell: { a: 12 } }))).toBe(12);
  });

  it("prefers the buy side when both exist", () => {
    expect(resolveStrategyValue(field(["a"]), params({ buy: { a: 10 }, sell: { a: 12 } }))).toBe(10);
  });

  it("treats 0 and false as values, null and empty string as missing", () => {
    expect(resolveStrategyValue(field(["a"]), params({ buy: { a: 0 }, sell: { a: 5 } }))).toBe(0);
    expect(resolveStrategyValue(field(["a"]), params({ buy: { a: false }, sell: { a: 5 } }))).toBe(false);
    expect(resolveStrategyValue(field(["a"]), params({ buy: { a: null }, sell: { a: 5 } }))).toBe(5);
    expect(resolveStrategyValue(field(["a"]), params({ buy: { a: "" }, sell: { a: 5 } }))).toBe(5);
  });

  it("walks to the second key before giving up", () => {
    const p = params({ sell: { short_x: 0.8 } });
    expect(resolveStrategyValue(field(["long_x", "short_x"]), p)).toBe(0.8);
  });

  it("consults settings last", () => {
    expect(resolveStrategyValue(field(["trailing_stop"]), params({ settings: { trailing_stop: true } }))).toBe(true);
  });

  it("returns undefined when nothing matches", () => {
    expect(resolveStrategyValue(field(["a"]), params({}))).toBeUndefined();
  });
});

describe("resolveMetricValue", () => {
  const summary: MetricFragment = { source: "summary-metrics", metrics: { "Profit %": "5.00" } };
  const total: MetricFragment = { source: "backtest-total", metrics: { "Profit %": "7.89" } };

  it("lets the backtest TOTAL row win by default, whatever the arrival order", () => {
    expect(resolveMetricValue("Profit %", [summary, total])).toBe("7.89");
    expect(resolveMetricValue("Profit %", [total, summary])).toBe("7.89");
  });

  it("follows a reversed precedence policy", () => {
    expect(resolveMetricValue("Profit %", [summary, total], ["backtest-total", "summary-metrics"])).toBe("5.00");
  });

  it("skips empty values", () => {
    const blank: MetricFragment = { source: "backtest-total", metrics: { "Profit %": "" } };
    expect(resolveMetricValue("Profit %", [summary, blank])).toBe("5.00");
  });
});

describe("normalizeRecord", () => {
  it("returns exactly the schema's fields", () => {
    const record = normalizeRecord(schema, sampleContext);
    expect(Object.keys(record)).toEqual(schema.fields);
    expect(Object.isFrozen(record)).toBe(true);
  });

  it("fills context fields and leaves the rest N/A", () => {
    const record = normalizeRecord(schema, sampleContext);
    expect(record["Date and Time"]).toBe("2024-01-02 03:04:05 UTC");
    expect(record["Run #"]).toBe("7");
    expect(record["Strategy"]).toBe("Foo");
    expect(record["random-state"]).toBe("12345");
    expect(record["Pairs"]).toBe("BTC/USDT");
    expect(record["EMA_1D_1"]).toBe("N/A");
    expect(record["Trades #"]).toBe("N/A");
  });

  it("keeps N/A for a null seed", () => {
    expect(normalizeRecord(schema, { ...sampleContext, seed: null })["random-state"]).toBe("N/A");
  });

  it("formats literal values for display", () => {
    const record = normalizeRecord(
      schema,
      sampleContext,
      params({ buy: { ema_1d_1: [1, 2], long_volume_threshold_1h: 1.5 }, settings: { trailing_stop: true } }),
      [{ source: "backtest-total", metrics: { "Duration min": 75 } }],
    );
    expect(record["EMA_1D_1"]).toBe("[1, 2]");
    expect(record["Entry_volume_1H"]).toBe("1.5");
    expect(record["Trailing"]).toBe("True");
    expect(record["Duration min"]).toBe("75");
  });
});

describe("buildFailedRecord", () => {
  it("marks every field FAILED and keeps the context", () => {
    const record = buildFailedRecord(schema, { ...sampleContext, seed: null });
    expect(Object.keys(record)).toEqual(schema.fields);
    expect(record["Strategy"]).toBe("Foo");
    expect(record["Epochs"]).toBe("50");
    expect(record["random-state"]).toBe("FAILED");
    expect(record["EMA_1D_1"]).toBe("FAILED");
    expect(record["Trades #"]).toBe("FAILED");
  });
});

describe("inherited property names", () => {
  it("never resolves a strategy key through the prototype", () => {
    expect(resolveStrategyValue(field(["constructor", "tostring"]), params({}))).toBeUndefined();
  });

  it("never resolves a metric through the prototype", () => {
    expect(resolveMetricValue("toString", [{ source: "summary-metrics", metrics: {} }])).toBeUndefined();
  });

  it("leaves such fields at N/A in the record", () => {
    const inherited = createResultSchema({ strategy: ["Constructor"], metrics: ["hasOwnProperty"] });
    expect(normalizeRecord(inherited, sampleContext, params({}), [])).toEqual({
      Constructor: "N/A",
      hasOwnProperty: "N/A",
    });
  });
});

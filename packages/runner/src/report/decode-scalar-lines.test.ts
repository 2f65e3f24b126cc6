import { describe, it, expect } from "vitest";
import { decodeScalarLines } from "./decode-scalar-lines.js";
import { scanMaxOpenTrades, scanTrailingStop, toReportLines } from "./scan-sections.js";
import { loadSampleReport } from "../test-helpers.js";

describe("decodeScalarLines", () => {
  it("decodes trailing stop and max open trades settings", () => {
    const lines = toReportLines(loadSampleReport());
    expect(decodeScalarLines([...scanTrailingStop(lines), ...scanMaxOpenTrades(lines)])).toEqual({
      value: {
        trailing_stop: true,
        trailing_stop_positive: 0.01,
        trailing_stop_positive_offset: 0.02,
        trailing_only_offset_is_reached: true,
        max_open_trades: 3,
      },
      warnings: [],
    });
  });

  it("ignores unrecognized keys and non-assignments", () => {
    expect(decodeScalarLines(["stoploss = -0.1", "hello"]).value).toEqual({});
  });

  it("keeps bare words as raw strings", () => {
    expect(decodeScalarLines(["max_open_trades = inf"]).value).toEqual({ max_open_trades: "inf" });
  });

  it("warns on an empty value", () => {
    expect(decodeScalarLines(["trailing_stop =   "])).toEqual({
      value: {},
      warnings: ["trailing_stop: empty value"],
    });
  });

  it("accepts a custom recognized set", () => {
    expect(decodeScalarLines(["stoploss = -0.1"], new Set(["stoploss"])).value).toEqual({ stoploss: -0.1 });
  });
});

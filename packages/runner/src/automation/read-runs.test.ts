import { describe, it, expect } from "vitest";
import { readRunDefinitions } from "./read-runs.js";

describe("readRunDefinitions", () => {
  it("maps sheet columns to a run definition", () => {
    const runs = readRunDefinitions(
      [
        {
          Runs: "1",
          Config: "config_futures.json",
          Strategy: " Foo ",
          Pairs: "BTC/USDT:USDT",
          Leverage: "3",
          "% per trade": "10",
          epochs: "50",
          spaces: "buy sell",
          timerange: "20230101-20230201",
          loss_function: "CalmarHyperOptLoss",
          jobs: "4",
          min_trades: "20",
          random_state: "42",
        },
      ],
      "config.json",
    );
    expect(runs).toEqual([
      {
        row: 2,
        strategy: "Foo",
        config: "config_futures.json",
        epochs: "50",
        timerange: "20230101-20230201",
        pairs: "BTC/USDT:USDT",
        leverage: "3",
        riskPerTrade: "10",
        spaces: "buy sell",
        lossFunction: "CalmarHyperOptLoss",
        jobs: "4",
        minTrades: "20",
        randomState: "42",
      },
    ]);
  });

  it("omits blank and OFF flags and defaults the config file", () => {
    const [run] = readRunDefinitions(
      [{ Strategy: "Foo", epochs: "50", timerange: "20230101-", spaces: "OFF", jobs: "", random_state: "off" }],
      "config.json",
    );
    expect(run.config).toBe("config.json");
    expect(run.spaces).toBeUndefined();
    expect(run.jobs).toBeUndefined();
    expect(run.randomState).toBeUndefined();
  });

  it("skips rows missing a required column", () => {
    const runs = readRunDefinitions(
      [
        { Strategy: "", epochs: "50", timerange: "20230101-" },
        { Strategy: "Foo", epochs: "", timerange: "20230101-" },
        { Strategy: "Foo", epochs: "50" },
        { Strategy: "Foo", epochs: "fifty", timerange: "20230101-" },
        { Strategy: "Bar", epochs: "10", timerange: "20230101-" },
      ],
      "config.json",
    );
    expect(runs.map((r) => [r.row, r.strategy])).toEqual([[6, "Bar"]]);
  });
});

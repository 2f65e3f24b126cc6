import { describe, it, expect, vi } from "vitest";
import fs from "node:fs";
import path from "node:path";
import { buildRunContext, processRun } from "./process-run.js";
import { buildHyperoptArgs } from "../automation/build-docker-args.js";
import { findLatestResultFile } from "../automation/find-latest-result.js";
import { createResultSchema } from "../report/schema-registry.js";
import { loadSampleReport, makeConfig, sampleSchemaInput, withTmpDir } from "../test-helpers.js";
import type { RunDeps } from "./process-run.js";
import type { RunDefinition } from "../types/run.js";

const config = makeConfig("/data/user_data");
const schema = createResultSchema(sampleSchemaInput);
const RESULT_FILE = "/data/user_data/hyperopt_results/strategy_Foo_1.fthypt";

const run: RunDefinition = {
  row: 2,
  strategy: "Foo",
  config: "config.json",
  epochs: "50",
  timerange: "20230101-20230201",
};

function makeDeps(overrides: Partial<RunDeps> = {}): RunDeps {
  return {
    runHyperopt: vi.fn<RunDeps["runHyperopt"]>(async () => ({ ok: true, seed: "12345", exitCode: 0 })),
    runHyperoptShow: vi.fn<RunDeps["runHyperoptShow"]>(async () => loadSampleReport()),
    findLatestResultFile: vi.fn<RunDeps["findLatestResultFile"]>(() => RESULT_FILE),
    saveShowOutput: vi.fn<RunDeps["saveShowOutput"]>(async () => {}),
    sleep: vi.fn<RunDeps["sleep"]>(async () => {}),
    now: () => new Date(Date.UTC(2024, 0, 2, 3, 4, 5)),
    ...overrides,
  };
}

describe("buildRunContext", () => {
  it("defaults the loss function", () => {
    const context = buildRunContext(run, config, 3, null, new Date(0));
    expect(context.lossFunction).toBe("SharpeHyperOptLoss");
    expect(context.runNumber).toBe(3);
    expect(context.seed).toBeNull();
  });
});

describe("processRun", () => {
  it("optimizes, renders, saves and extracts one run", async () => {
    const deps = makeDeps();
    const outcome = await processRun(run, 7, config, schema, deps);

    expect(outcome.ok).toBe(true);
    expect(outcome.warnings).toEqual([]);
    expect(outcome.record).toMatchObject({
      "Date and Time": "2024-01-02 03:04:05 UTC",
      "Run #": "7",
      Strategy: "Foo",
      "random-state": "12345",
      Pairs: "N/A",
      EMA_1D_1: "10",
      "Profit %": "7.89",
    });
    expect(deps.runHyperopt).toHaveBeenCalledWith(buildHyperoptArgs(run, config.docker), {
      suppliedSeed: undefined,
    });
    expect(deps.sleep).toHaveBeenCalledWith(0);
    expect(deps.findLatestResultFile).toHaveBeenCalledWith(path.join("/data/user_data", "hyperopt_results"), "Foo");
    expect(deps.runHyperoptShow).toHaveBeenCalledWith(expect.arrayContaining(["strategy_Foo_1.fthypt"]));
    expect(deps.saveShowOutput).toHaveBeenCalledWith(
      path.join("/data/user_data", "hyperopt_show_output.txt"),
      loadSampleReport(),
    );
  });

  it("forwards a supplied seed", async () => {
    const deps = makeDeps();
    await processRun({ ...run, randomState: "42" }, 1, config, schema, deps);
    expect(deps.runHyperopt).toHaveBeenCalledWith(expect.arrayContaining(["--random-state", "42"]), {
      suppliedSeed: "42",
    });
  });

  it("writes a FAILED record when hyperopt fails", async () => {
    const deps = makeDeps({
      runHyperopt: vi.fn<RunDeps["runHyperopt"]>(async () => ({ ok: false, seed: "99", exitCode: 2 })),
    });
    const outcome = await processRun(run, 7, config, schema, deps);

    expect(outcome.ok).toBe(false);
    expect(outcome.failure).toBe("hyperopt exited with code 2");
    expect(outcome.record).toMatchObject({
      "Run #": "7",
      Strategy: "Foo",
      "random-state": "99",
      EMA_1D_1: "FAILED",
      "Trades #": "FAILED",
    });
    expect(deps.findLatestResultFile).not.toHaveBeenCalled();
  });

  it("fails when no result file is found", async () => {
    const deps = makeDeps({ findLatestResultFile: vi.fn<RunDeps["findLatestResultFile"]>(() => null) });
    const outcome = await processRun(run, 7, config, schema, deps);
    expect(outcome.failure).toBe("no result file found");
    expect(deps.runHyperoptShow).not.toHaveBeenCalled();
  });

  it("writes a FAILED record when a step throws", async () => {
    const deps = makeDeps({
      findLatestResultFile: vi.fn<RunDeps["findLatestResultFile"]>(() => {
        throw new Error("EACCES: permission denied");
      }),
    });
    const outcome = await processRun(run, 7, config, schema, deps);
    expect(outcome.ok).toBe(false);
    expect(outcome.failure).toBe("run aborted: EACCES: permission denied");
    expect(outcome.record).toMatchObject({ Strategy: "Foo", "random-state": "12345", "Trades #": "FAILED" });
  });

  it("fails cleanly when the results path is not a directory", async () => {
    await withTmpDir(async (dir) => {
      fs.writeFileSync(path.join(dir, "hyperopt_results"), "");
      const deps = makeDeps({ findLatestResultFile });
      const outcome = await processRun(run, 7, makeConfig(dir), schema, deps);
      expect(outcome.ok).toBe(false);
      expect(outcome.failure).toBe("no result file found");
      expect(outcome.record["Trades #"]).toBe("FAILED");
    });
  });

  it("fails when hyperopt-show fails", async () => {
    const deps = makeDeps({ runHyperoptShow: vi.fn<RunDeps["runHyperoptShow"]>(async () => null) });
    const outcome = await processRun(run, 7, config, schema, deps);
    expect(outcome.failure).toBe("hyperopt-show failed");
    expect(deps.saveShowOutput).not.toHaveBeenCalled();
  });

  it("fails when hyperopt-show prints nothing", async () => {
    const deps = makeDeps({ runHyperoptShow: vi.fn<RunDeps["runHyperoptShow"]>(async () => "") });
    const outcome = await processRun(run, 7, config, schema, deps);
    expect(outcome.failure).toBe("hyperopt-show printed nothing");
    expect(outcome.record["Trades #"]).toBe("FAILED");
  });

  it("still extracts when the output cannot be saved", async () => {
    const deps = makeDeps({
      saveShowOutput: vi.fn<RunDeps["saveShowOutput"]>(async () => {
        throw new Error("EACCES");
      }),
    });
    const outcome = await processRun(run, 7, config, schema, deps);
    expect(outcome.ok).toBe(true);
    expect(outcome.record["Trades #"]).toBe("42");
  });
});

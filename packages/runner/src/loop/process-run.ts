import { setTimeout as delay } from "node:timers/promises";
import writeFileAtomic from "write-file-atomic";
import { buildHyperoptArgs, buildShowArgs } from "../automation/build-docker-args.js";
import { findLatestResultFile } from "../automation/find-latest-result.js";
import { runHyperopt } from "../automation/run-hyperopt.js";
import { runHyperoptShow } from "../automation/run-hyperopt-show.js";
import { resolveExtractOptions, resolveHostPaths } from "../lib/config.js";
import { logger } from "../lib/logger.js";
import { extractReport } from "../report/extract-report.js";
import { buildFailedRecord } from "../report/normalize-record.js";
import type { ResultSchema } from "../report/schema-registry.js";
import type { RunHyperoptOptions } from "../automation/run-hyperopt.js";
import type { Logger } from "../lib/logger.js";
import type { HyperautoConfig } from "../types/config.js";
import type { ResultRecord, RunContext } from "../types/report.js";
import type { HyperoptOutcome, RunDefinition } from "../types/run.js";

/** Side effects of one run, swappable in tests. */
export interface RunDeps {
  runHyperopt: (args: string[], opts: RunHyperoptOptions) => Promise<HyperoptOutcome>;
  runHyperoptShow: (args: string[]) => Promise<string | null>;
  findLatestResultFile: (dir: string, strategy: string) => string | null;
  saveShowOutput: (file: string, text: string) => Promise<void>;
  sleep: (ms: number) => Promise<void>;
  now: () => Date;
}

export const defaultRunDeps: RunDeps = {
  runHyperopt,
  runHyperoptShow,
  findLatestResultFile,
  saveShowOutput: (file, text) => writeFileAtomic(file, text, "utf8"),
  sleep: (ms) => delay(ms),
  now: () => new Date(),
};

export interface RunOutcome {
  ok: boolean;
  record: ResultRecord;
  warnings: string[];
  /** Why the run fell back to a FAILED record. */
  failure?: string;
}

export function buildRunContext(
  run: RunDefinition,
  config: HyperautoConfig,
  runNumber: number,
  seed: string | null,
  timestamp: Date,
): RunContext {
  return {
    strategy: run.strategy,
    config: run.config,
    epochs: run.epochs,
    timerange: run.timerange,
    pairs: run.pairs,
    leverage: run.leverage,
    riskPerTrade: run.riskPerTrade,
    lossFunction: run.lossFunction ?? config.docker.defaultLossFunction,
    seed,
    runNumber,
    timestamp,
  };
}

/**
 * One batch step: optimize, locate the result file, render it with
 * hyperopt-show, save the output and extract a record. Any failure along the
 * way yields a FAILED record carrying the run's context.
 */
export async function processRun(
  run: RunDefinition,
  runNumber: number,
  config: HyperautoConfig,
  schema: ResultSchema,
  deps: RunDeps = defaultRunDeps,
  log: Logger = logger.createChild("process-run"),
): Promise<RunOutcome> {
  const { resultsDir, showOutputFile } = resolveHostPaths(config);

  const outcome = await deps.runHyperopt(buildHyperoptArgs(run, config.docker), {
    suppliedSeed: run.randomState,
  });

  const fail = (failure: string): RunOutcome => {
    log.error({ runNumber, strategy: run.strategy, failure }, "run failed");
    const context = buildRunContext(run, config, runNumber, outcome.seed, deps.now());
    return { ok: false, record: buildFailedRecord(schema, context), warnings: [], failure };
  };

  if (!outcome.ok) return fail(`hyperopt exited with code ${outcome.exitCode ?? "none"}`);

  try {
    await deps.sleep(config.resultSettleMs);
    const resultFile = deps.findLatestResultFile(resultsDir, run.strategy);
    if (!resultFile) return fail("no result file found");

    const output = await deps.runHyperoptShow(buildShowArgs(config.docker, run.config, resultFile));
    if (output === null) return fail("hyperopt-show failed");

    try {
      await deps.saveShowOutput(showOutputFile, output);
      log.info({ file: showOutputFile }, "saved hyperopt-show output");
    } catch (err) {
      log.warn({ err, file: showOutputFile }, "could not save hyperopt-show output");
    }

    const context = buildRunContext(run, config, runNumber, outcome.seed, deps.now());
    const extraction = extractReport(output, schema, context, resolveExtractOptions(config));
    if (!extraction) return fail("hyperopt-show printed nothing");

    for (const warning of extraction.warnings) log.warn({ runNumber }, warning);
    return { ok: true, record: extraction.record, warnings: extraction.warnings };
  } catch (err) {
    return fail(`run aborted: ${err instanceof Error ? err.message : String(err)}`);
  }
}

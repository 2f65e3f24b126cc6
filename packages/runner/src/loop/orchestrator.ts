#!/usr/bin/env node
/**
 * orchestrator.ts: hyperopt batch driver
 *
 * Reads run definitions from the workbook's runs sheet, runs each through
 * hyperopt and hyperopt-show in Docker, and appends one record per run to the
 * results sheet (a FAILED record when anything along the way breaks).
 *
 * Usage: hyperauto [--config=path] [--dry-run]
 *        hyperauto --report=hyperopt_show_output.txt [--strategy=Name]
 */

import fs from "node:fs";
import path from "node:path";
import { isMainModule } from "@hyperauto/kit";
import { loadConfig, resolveExtractOptions } from "../lib/config.js";
import { acquireLock, releaseLock } from "../lib/lock.js";
import { logger } from "../lib/logger.js";
import { readRunDefinitions } from "../automation/read-runs.js";
import { extractReport } from "../report/extract-report.js";
import { createResultSchema } from "../report/schema-registry.js";
import { appendRecord, nextRunNumber } from "../sheet/append-writer.js";
import { XlsxTableStore, readSheetRecords } from "../sheet/xlsx-store.js";
import { parseArgs } from "./parse-args.js";
import { defaultRunDeps, processRun } from "./process-run.js";
import type { Logger } from "../lib/logger.js";
import type { ResultSchema } from "../report/schema-registry.js";
import type { TableStore } from "../sheet/table-store.js";
import type { HyperautoConfig } from "../types/config.js";
import type { Extraction, ResultRecord } from "../types/report.js";
import type { RunDefinition } from "../types/run.js";
import type { RunDeps } from "./process-run.js";

export interface BatchInput {
  config: HyperautoConfig;
  schema: ResultSchema;
  runs: readonly RunDefinition[];
  store: TableStore;
  /** Records are logged, never written. */
  dryRun?: boolean;
  deps?: RunDeps;
  log?: Logger;
}

export interface BatchSummary {
  succeeded: number;
  failed: number;
  records: ResultRecord[];
}

/**
 * Runs every definition in order, one optimizer at a time. A run counts as
 * succeeded only when its record was extracted and written.
 */
export async function runBatch({
  config,
  schema,
  runs,
  store,
  dryRun = false,
  deps = defaultRunDeps,
  log = logger.createChild("orchestrator"),
}: BatchInput): Promise<BatchSummary> {
  const { layout } = config.workbook;
  const runField = schema.context.find((f) => f.from === "runNumber")?.name;
  const firstRun = runField ? await nextRunNumber(store, runField, layout) : 1;
  log.info({ runs: runs.length, firstRun }, "starting batch");

  const summary: BatchSummary = { succeeded: 0, failed: 0, records: [] };

  for (const [i, run] of runs.entries()) {
    const runNumber = firstRun + i;
    log.info({ runNumber, strategy: run.strategy, row: run.row }, "run started");

    const outcome = await processRun(run, runNumber, config, schema, deps);
    summary.records.push(outcome.record);

    let written = true;
    if (dryRun) log.info({ runNumber, record: outcome.record }, "dry run, record not written");
    else written = await appendRecord(store, outcome.record, { layout });

    if (outcome.ok && written) summary.succeeded++;
    else summary.failed++;
    log.info({ runNumber, ok: outcome.ok, written }, "run finished");
  }

  return summary;
}

/** Extracts a saved hyperopt-show output without running anything. */
export function extractSavedReport(
  file: string,
  config: HyperautoConfig,
  schema: ResultSchema,
  strategy = "",
  now: Date = new Date(),
): Extraction | null {
  const text = fs.readFileSync(file, "utf8");
  return extractReport(
    text,
    schema,
    {
      strategy,
      config: config.docker.defaultConfigFilename,
      epochs: "",
      timerange: "",
      lossFunction: config.docker.defaultLossFunction,
      seed: null,
      timestamp: now,
    },
    resolveExtractOptions(config),
  );
}

/** CLI entry; resolves to the process exit code. */
export async function main(argv: string[] = process.argv): Promise<number> {
  const cli = parseArgs(argv);
  if (cli.help) return 0;

  const config = loadConfig(cli.configPath);
  logger.setModuleLevels(config.logLevels);
  const log = logger.createChild("orchestrator");
  const schema = createResultSchema(config.schema);

  if (cli.reportFile) {
    const extraction = extractSavedReport(cli.reportFile, config, schema, cli.strategy);
    if (!extraction) {
      log.error({ file: cli.reportFile }, "report is empty");
      return 1;
    }
    for (const warning of extraction.warnings) log.warn(warning);
    process.stdout.write(`${JSON.stringify(extraction.record, null, 2)}\n`);
    return 0;
  }

  const workbook = path.resolve(path.dirname(cli.configPath), config.workbook.path);
  const lockName = `batch-${path.basename(workbook)}`;
  const startedAt = Date.now();

  // Everything after this MUST stay inside try/finally
  acquireLock(lockName);
  try {
    const rows = readSheetRecords(workbook, config.workbook.runsSheet);
    const runs = readRunDefinitions(rows, config.docker.defaultConfigFilename);
    if (!runs.length) {
      log.error({ workbook, sheet: config.workbook.runsSheet }, "no valid runs, nothing to do");
      return 1;
    }

    const store = XlsxTableStore.open(workbook, config.workbook.resultsSheet);
    const summary = await runBatch({ config, schema, runs, store, dryRun: cli.dryRun, log });

    log.info(
      {
        succeeded: summary.succeeded,
        failed: summary.failed,
        elapsedSec: Math.round((Date.now() - startedAt) / 1000),
      },
      "batch finished",
    );
    return summary.failed ? 1 : 0;
  } finally {
    releaseLock(lockName);
    log.info({ lock: lockName }, "lock released");
  }
}

// Only run when executed directly
if (isMainModule(import.meta.url)) {
  main().then(
    (code) => process.exit(code),
    (err: unknown) => {
      logger.fatal({ err }, "orchestrator error");
      process.exit(1);
    },
  );
}

import { cac } from "cac";
import { env } from "../lib/env.js";

export interface CliOptions {
  configPath: string;
  dryRun: boolean;
  /** Saved hyperopt-show output to extract instead of running a batch. */
  reportFile?: string;
  /** Strategy name for the --report context. */
  strategy?: string;
  help: boolean;
}

function stringOption(value: unknown): string | undefined {
  if (typeof value === "string" && value.trim()) return value.trim();
  if (typeof value === "number") return String(value);
  return undefined;
}

/**
 * Parse CLI arguments, falling back to HYPERAUTO_CONFIG for the config path.
 */
export function parseArgs(argv: string[] = process.argv): CliOptions {
  const cli = cac("hyperauto");
  cli.option("--config <path>", "Path to hyperauto.config.json");
  cli.option("--dry-run", "Extract and log records without writing to the workbook");
  cli.option("--report <file>", "Extract a saved hyperopt-show output and print the record");
  cli.option("--strategy <name>", "Strategy name recorded with --report");
  cli.help();

  const { options } = cli.parse(argv);

  return {
    configPath: stringOption(options.config) ?? env.HYPERAUTO_CONFIG,
    dryRun: Boolean(options.dryRun),
    reportFile: stringOption(options.report),
    strategy: stringOption(options.strategy),
    help: Boolean(options.help),
  };
}

import fs from "node:fs";
import path from "node:path";
import { parseOrThrow } from "@hyperauto/kit";
import { HyperautoConfigSchema } from "../types/config.js";
import type { HyperautoConfig } from "../types/config.js";
import type { ExtractOptions } from "../report/extract-report.js";

/**
 * Loads and validates hyperauto.config.json using Zod.
 * Returns a fully-typed HyperautoConfig with defaults applied for missing fields;
 * throws with one line per problem otherwise.
 */
export function loadConfig(configPath: string): HyperautoConfig {
  if (!fs.existsSync(configPath)) {
    throw new Error(`Config file not found: ${configPath}`);
  }
  const raw = fs.readFileSync(configPath, "utf8");
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new Error(`Config file is not valid JSON: ${configPath} (${reason})`);
  }
  return parseOrThrow(HyperautoConfigSchema, json, `config ${configPath}`);
}

/** Host-side locations derived from the docker section. */
export function resolveHostPaths(config: HyperautoConfig): {
  resultsDir: string;
  showOutputFile: string;
} {
  const { hostUserDataPath, resultsDir, showOutputFile } = config.docker;
  return {
    resultsDir: path.join(hostUserDataPath, resultsDir),
    showOutputFile: path.join(hostUserDataPath, showOutputFile),
  };
}

export function resolveExtractOptions(config: HyperautoConfig): ExtractOptions {
  return {
    markers: config.markers,
    labelRules: config.metrics.labels,
    passthrough: config.metrics.passthrough,
    precedence: config.metrics.precedence,
  };
}

import fs from "node:fs";
import path from "node:path";
import { logger } from "../lib/logger.js";

export const RESULT_EXTENSION = ".fthypt";

/**
 * Newest `strategy_<name>*.fthypt` in `dir` by modification time, or null
 * when the directory or a matching file is missing or cannot be read.
 */
export function findLatestResultFile(dir: string, strategy: string): string | null {
  const log = logger.createChild("find-latest-result");
  if (!fs.existsSync(dir)) {
    log.error({ dir }, "results directory not found");
    return null;
  }

  const prefix = `strategy_${strategy}`;
  let files: { name: string; mtime: number }[];
  try {
    files = fs
      .readdirSync(dir)
      .filter((f) => f.startsWith(prefix) && f.endsWith(RESULT_EXTENSION))
      .map((f) => ({ name: f, mtime: fs.statSync(path.join(dir, f)).mtimeMs }))
      .sort((a, b) => b.mtime - a.mtime);
  } catch (err) {
    log.error({ err, dir }, "could not list result files");
    return null;
  }

  if (!files.length) {
    log.warn({ dir, pattern: `${prefix}*${RESULT_EXTENSION}` }, "no result files found");
    return null;
  }

  log.info({ file: files[0].name, candidates: files.length }, "found result file");
  return path.join(dir, files[0].name);
}

import { stripVTControlCharacters } from "node:util";
import { execa } from "execa";
import { logger } from "../lib/logger.js";
import type { HyperoptOutcome } from "../types/run.js";

const SEED_PATTERN = /optimizer random state:\s*(\d+)/i;

export function detectSeed(line: string): string | null {
  const match = SEED_PATTERN.exec(stripVTControlCharacters(line));
  return match ? match[1] : null;
}

export interface RunHyperoptOptions {
  /** Seed passed with --random-state; when set, nothing is captured. */
  suppliedSeed?: string;
  /** Receives every output line as it arrives. Defaults to stdout. */
  echo?: (line: string) => void;
}

const writeStdout = (line: string): void => {
  process.stdout.write(`${line}\n`);
};

/**
 * Runs `docker` with the hyperopt arguments, streaming merged stdout/stderr
 * line by line. Never throws: spawn errors and non-zero exits come back as
 * `ok: false`.
 */
export async function runHyperopt(
  args: string[],
  { suppliedSeed, echo = writeStdout }: RunHyperoptOptions = {},
): Promise<HyperoptOutcome> {
  const log = logger.createChild("run-hyperopt");
  let captured: string | null = null;

  log.info({ command: ["docker", ...args].join(" ") }, "starting hyperopt");

  try {
    // -it needs the caller's terminal on stdin
    const subprocess = execa("docker", args, {
      all: true,
      buffer: false,
      reject: false,
      stdin: "inherit",
    });

    for await (const line of subprocess.iterable({ from: "all" })) {
      echo(line);
      if (suppliedSeed === undefined && captured === null) {
        captured = detectSeed(line);
        if (captured !== null) log.info({ seed: captured }, "captured optimizer random state");
      }
    }

    const result = await subprocess;
    const seed = captured ?? suppliedSeed ?? null;
    if (result.exitCode !== 0) {
      log.error({ exitCode: result.exitCode ?? null }, "hyperopt failed");
      return { ok: false, seed, exitCode: result.exitCode ?? null };
    }
    log.info("hyperopt finished");
    return { ok: true, seed, exitCode: 0 };
  } catch (err) {
    log.error({ err }, "could not run hyperopt");
    return { ok: false, seed: captured ?? suppliedSeed ?? null, exitCode: null };
  }
}

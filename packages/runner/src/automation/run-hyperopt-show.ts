import { execa } from "execa";
import { logger } from "../lib/logger.js";

/** Captured stdout of `hyperopt-show`, or null when the command failed. */
export async function runHyperoptShow(args: string[]): Promise<string | null> {
  const log = logger.createChild("run-hyperopt-show");
  log.info({ command: ["docker", ...args].join(" ") }, "starting hyperopt-show");

  try {
    const result = await execa("docker", args, { stdin: "ignore", reject: false });
    if (result.exitCode !== 0) {
      log.error({ exitCode: result.exitCode ?? null, stderr: result.stderr }, "hyperopt-show failed");
      return null;
    }
    return result.stdout;
  } catch (err) {
    log.error({ err }, "could not run hyperopt-show");
    return null;
  }
}

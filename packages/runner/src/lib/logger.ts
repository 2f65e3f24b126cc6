import pino from "pino";
import { join } from "node:path";
import { env } from "./env.js";
import type { LogLevel } from "../types/config.js";

export type Logger = pino.Logger;

let moduleLevels: Partial<Record<string, LogLevel>> = {};

/**
 * Stdout plus a daily-rotated ndjson file under LOG_DIR. Silent under Vitest
 * so tests never spawn transport workers.
 */
function createRootLogger(): Logger {
  if (env.VITEST) return pino({ level: "silent" });

  return pino(
    { level: env.LOG_LEVEL },
    pino.transport({
      targets: [
        { target: "pino/file", level: env.LOG_LEVEL, options: { destination: 1 } },
        {
          target: "pino-roll",
          level: env.LOG_LEVEL,
          options: {
            file: join(env.LOG_DIR, "hyperauto"),
            frequency: "daily",
            dateFormat: "yyyy-MM-dd",
            extension: ".ndjson",
            mkdir: true,
          },
        },
      ],
    }),
  );
}

const root = createRootLogger();

export const logger = Object.assign(root, {
  /** Per-module levels from the config file's `logLevels`. */
  setModuleLevels(levels: Partial<Record<string, LogLevel>>): void {
    moduleLevels = levels;
  },

  /** Child tagged with `module`; level resolved when called. */
  createChild(module: string): Logger {
    const child = root.child({ module });
    const level = moduleLevels[module];
    if (level && !env.VITEST) child.level = level;
    return child;
  },
});

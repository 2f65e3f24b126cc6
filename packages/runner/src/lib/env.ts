import dotenv from "dotenv";
import { join, dirname } from "node:path";
import { fileURLToPath } from "node:url";
import { z } from "zod";
import { parseEnv } from "@hyperauto/kit";
import { LogLevelSchema } from "../types/config.js";

const __dirname = dirname(fileURLToPath(import.meta.url));
export const PACKAGE_ROOT = join(__dirname, "../..");

dotenv.config({ path: join(PACKAGE_ROOT, ".env") });

const EnvSchema = z.object({
  HYPERAUTO_CONFIG: z.string().default(join(PACKAGE_ROOT, "hyperauto.config.json")),
  LOG_LEVEL: LogLevelSchema.default("info"),
  LOG_DIR: z.string().default(join(PACKAGE_ROOT, "logs")),
  VITEST: z.string().optional(),
});

export type Env = z.infer<typeof EnvSchema>;
export const env = parseEnv(EnvSchema);

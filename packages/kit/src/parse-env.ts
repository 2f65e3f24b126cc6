import type { z } from "zod";
import { parseOrThrow } from "./zod-helpers.js";

export function parseEnv<T extends z.ZodTypeAny>(
  schema: T,
  source: NodeJS.ProcessEnv = process.env,
): z.output<T> {
  return parseOrThrow(schema, source, "environment");
}

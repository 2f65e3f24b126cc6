import type { z } from "zod";

export function formatZodErrors(error: z.ZodError): string[] {
  return error.issues.map((i) => {
    const where = i.path.length ? i.path.join(".") : "(root)";
    return `${where}: ${i.message}`;
  });
}

/**
 * Parses `value` against `schema`, throwing a single Error whose message lists
 * every issue on its own line, prefixed by `label`.
 */
export function parseOrThrow<T extends z.ZodTypeAny>(
  schema: T,
  value: unknown,
  label: string,
): z.output<T> {
  const result = schema.safeParse(value);
  if (result.success) return result.data;
  const lines = formatZodErrors(result.error).map((l) => `  - ${l}`);
  throw new Error(`Invalid ${label}:\n${lines.join("\n")}`);
}

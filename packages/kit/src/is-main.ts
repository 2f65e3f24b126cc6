import path from "node:path";
import { fileURLToPath } from "node:url";

/**
 * True when the module at `importMetaUrl` is the script node was started with.
 * Extensions are ignored so the check holds for both `tsx src/x.ts` and `node dist/x.js`.
 */
export function isMainModule(
  importMetaUrl: string,
  entry: string | undefined = process.argv[1],
): boolean {
  if (!entry) return false;
  const strip = (p: string): string => p.replace(/\.(?:[cm]?[jt]s)$/, "");
  return strip(fileURLToPath(importMetaUrl)) === strip(path.resolve(entry));
}

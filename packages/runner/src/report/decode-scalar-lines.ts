import { parseLiteral } from "./decode-literal.js";
import type { Decoded, LiteralValue, ParameterSet, RawSection } from "../types/report.js";

export const RECOGNIZED_SETTINGS: ReadonlySet<string> = new Set([
  "trailing_stop",
  "trailing_stop_positive",
  "trailing_stop_positive_offset",
  "trailing_only_offset_is_reached",
  "max_open_trades",
]);

const ASSIGNMENT = /^([A-Za-z_]\w*)\s*=\s*(.*?)\s*(?:#.*)?$/;

function decodeScalar(raw: string): LiteralValue {
  try {
    return parseLiteral(raw);
  } catch {
    // bare words like `inf` stay as written
    return raw;
  }
}

/** Reads `key = value  # comment` lines, keeping only recognized keys. */
export function decodeScalarLines(
  lines: RawSection,
  recognized: ReadonlySet<string> = RECOGNIZED_SETTINGS,
): Decoded<ParameterSet> {
  const value: Record<string, LiteralValue> = {};
  const warnings: string[] = [];

  for (const line of lines) {
    const match = ASSIGNMENT.exec(line.trim());
    if (!match) continue;
    const key = match[1].toLowerCase();
    if (!recognized.has(key)) continue;
    if (!match[2]) {
      warnings.push(`${key}: empty value`);
      continue;
    }
    value[key] = decodeScalar(match[2]);
  }

  return { value, warnings };
}

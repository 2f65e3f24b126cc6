import { MISSING } from "../types/report.js";

/**
 * Converts `H:MM:SS` or `M:SS` to whole minutes, rounding to nearest
 * (half up). Any other shape gives the "N/A" sentinel.
 */
export function parseDuration(text: string): number | typeof MISSING {
  const parts = text.trim().split(":");
  if (!parts.every((p) => /^\d+$/.test(p))) return MISSING;
  const nums = parts.map(Number);

  if (nums.length === 3) {
    const [h, m, s] = nums;
    return Math.round(h * 60 + m + s / 60);
  }
  if (nums.length === 2) {
    const [m, s] = nums;
    return Math.round(m + s / 60);
  }
  return MISSING;
}

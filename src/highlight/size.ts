import type { SizeThresholds, Style } from "../types.js";
import { parseStyle } from "./color.js";

const UNITS: Record<string, number> = {
  "": 1,
  b: 1,
  k: 1e3,
  kb: 1e3,
  m: 1e6,
  mb: 1e6,
  g: 1e9,
  gb: 1e9,
  t: 1e12,
  tb: 1e12,
  p: 1e15,
  pb: 1e15,
  ki: 1024,
  kib: 1024,
  mi: 1024 ** 2,
  mib: 1024 ** 2,
  gi: 1024 ** 3,
  gib: 1024 ** 3,
  ti: 1024 ** 4,
  tib: 1024 ** 4,
  pi: 1024 ** 5,
  pib: 1024 ** 5,
};

export const DEFAULT_SIZE_THRESHOLDS: SizeThresholds = {
  yellow: 20e6,
  red: 100e6,
};

const GREEN = parseStyle("green");
const YELLOW = parseStyle("yellow");
const RED = parseStyle("red");

/**
 * Parse a human-readable byte size such as `126M`, `8.4 MB` or `2KiB`.
 * Decimal units are powers of 1000, `i` units powers of 1024.
 * Returns undefined when the text is not a size.
 */
export function parseByteSize(text: string): number | undefined {
  const match = /^(\d+(?:\.\d+)?|\.\d+)\s*([a-zA-Z]*)$/.exec(text.trim());
  if (!match) return undefined;
  const unit = match[2].toLowerCase();
  if (!Object.hasOwn(UNITS, unit)) return undefined;
  return Math.round(parseFloat(match[1]) * UNITS[unit]);
}

/** Green up to `yellow`, yellow up to `red`, red above. */
export function sizeStyle(bytes: number, thresholds: SizeThresholds): Style {
  if (bytes > thresholds.red) return RED;
  if (bytes > thresholds.yellow) return YELLOW;
  return GREEN;
}

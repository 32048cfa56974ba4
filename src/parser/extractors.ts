/**
 * Field extractors
 *
 * Each extractor scans the raw order text for one piece of metadata and
 * returns null when it is absent. Token order does not matter; the first
 * pattern that matches wins.
 *
 *   vs250.32 / tt69.86 / t 171.10   → stock reference
 *   30d / on a 11d / -15d            → delta
 *   1058x / 2k                       → quantity
 *   20.50 bid / 2.4b / @ 1.60        → price and quote side
 *   1X2                              → ratio
 *   1X over / putover / call over    → modifier
 *   PS / risky / fly                 → structure type
 *   LIVE                             → no stock hedge
 *   delta to the 2x / delta like put → delta direction
 */

import type { QuoteSide, StructureType } from "../types/options.js";
import { STRUCTURE_ALIASES } from "./tables.js";

export interface PriceAndSide {
  price: number;
  side: QuoteSide;
}

/** Relative leg weights, e.g. 1X2 → [1, 2] */
export type Ratio = readonly [number, number];

const NUM = String.raw`(\d+\.?\d*)`;

const STOCK_REF_PATTERNS: readonly RegExp[] = [
  new RegExp(String.raw`\bvs\.?\s*${NUM}`, "i"),
  new RegExp(String.raw`\btt\s*${NUM}`, "i"),
  // "t" needs a space so tickers such as "T" or "TT" never match
  new RegExp(String.raw`\bt\s+${NUM}`, "i"),
];

const PRICE_PATTERNS: ReadonlyArray<readonly [RegExp, QuoteSide]> = [
  [new RegExp(String.raw`${NUM}\s+bid\b`, "i"), "bid"],
  [new RegExp(String.raw`${NUM}\s+(?:offer|ask)\b`, "i"), "offer"],
  [new RegExp(String.raw`${NUM}b\b`, "i"), "bid"],
  [new RegExp(String.raw`${NUM}o\b`, "i"), "offer"],
  [new RegExp(String.raw`@\s*${NUM}`, "i"), "offer"],
  [new RegExp(String.raw`\bat\s+${NUM}\b`, "i"), "offer"],
];

const QUANTITY_PATTERN = /(\d+)\s*([xk])\b/i;

const ALIASES_LONGEST_FIRST = [...STRUCTURE_ALIASES.entries()]
  .sort(([a], [b]) => b.length - a.length)
  .map(([alias, canonical]) => ({
    pattern: new RegExp(String.raw`\b${escapeRegExp(alias)}\b`),
    canonical,
  }));

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

function isDigit(ch: string | undefined): boolean {
  return ch !== undefined && ch >= "0" && ch <= "9";
}

export function extractStockRef(text: string): number | null {
  for (const pattern of STOCK_REF_PATTERNS) {
    const m = pattern.exec(text);
    if (m) return parseFloat(m[1]);
  }
  return null;
}

export function extractDelta(text: string): number | null {
  const m = /(?:on\s+a\s+)?([+-]?\d+)\s*d\b/i.exec(text);
  return m ? parseFloat(m[1]) : null;
}

/**
 * Contract count from `<n>x` or `<n>k` (thousands).
 * A match whose next character is a digit is the left half of a ratio;
 * in that case only a later, non-ratio occurrence counts.
 */
export function extractQuantity(text: string): number | null {
  const m = QUANTITY_PATTERN.exec(text);
  if (!m) return null;

  const end = m.index + m[0].length;
  if (!isDigit(text[end])) return quantityOf(m);

  const rest = text.slice(end);
  const m2 = QUANTITY_PATTERN.exec(rest);
  if (m2 && !isDigit(rest[m2.index + m2[0].length])) return quantityOf(m2);
  return null;
}

function quantityOf(m: RegExpExecArray): number {
  const n = parseInt(m[1], 10);
  return m[2].toLowerCase() === "k" ? n * 1000 : n;
}

export function extractPriceAndSide(text: string): PriceAndSide | null {
  for (const [pattern, side] of PRICE_PATTERNS) {
    const m = pattern.exec(text);
    if (m) return { price: parseFloat(m[1]), side };
  }
  return null;
}

export function extractRatio(text: string): Ratio | null {
  const m = /\b(\d+)\s*x\s*(\d+)\b/i.exec(text);
  if (!m) return null;
  const a = parseInt(m[1], 10);
  const b = parseInt(m[2], 10);
  // 500x followed by a number is not a ratio
  if (b > 1 && a < b) return [a, b];
  return null;
}

export function extractModifier(text: string): string | null {
  const nxOver = /\b(\d+)x\s+over\b/i.exec(text);
  if (nxOver) return `${nxOver[1]}x_over`;
  if (/\bput\s*over\b/i.test(text)) return "putover";
  if (/\bcall\s*over\b/i.test(text)) return "callover";
  return null;
}

export function extractStructureType(text: string): StructureType | null {
  const lower = text.toLowerCase();
  for (const { pattern, canonical } of ALIASES_LONGEST_FIRST) {
    if (pattern.test(lower)) return canonical;
  }
  return null;
}

/** LIVE means options only, no stock hedge */
export function extractIsLive(text: string): boolean {
  return /\bLIVE\b/i.test(text);
}

/**
 * "delta to the 1x" → "1x", "delta like put" → "put".
 */
export function extractDeltaDirection(text: string): string | null {
  const toThe = /\bdelta\s+to\s+the\s+(\d+)x\b/i.exec(text);
  if (toThe) return `${toThe[1]}x`;

  const likeType = /\bdelta\s+(?:to|like)\s+(put|call)\b/i.exec(text);
  if (likeType) return likeType[1].toLowerCase();

  return null;
}

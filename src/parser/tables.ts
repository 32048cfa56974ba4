/**
 * Static lookup data for the shorthand parser.
 */

import type { StructureType } from "../types/options.js";

export const MONTHS: ReadonlyMap<string, number> = new Map([
  ["jan", 1], ["feb", 2], ["mar", 3], ["apr", 4],
  ["may", 5], ["jun", 6], ["jul", 7], ["aug", 8],
  ["sep", 9], ["oct", 10], ["nov", 11], ["dec", 12],
]);

/** Broker aliases → canonical structure type */
export const STRUCTURE_ALIASES: ReadonlyMap<string, StructureType> = new Map<string, StructureType>([
  ["ps", "put_spread"],
  ["cs", "call_spread"],
  ["put spread", "put_spread"],
  ["call spread", "call_spread"],
  ["risky", "risk_reversal"],
  ["risk reversal", "risk_reversal"],
  ["rr", "risk_reversal"],
  ["strad", "straddle"],
  ["straddle", "straddle"],
  ["strangle", "strangle"],
  ["fly", "butterfly"],
  ["butterfly", "butterfly"],
  ["collar", "collar"],
]);

/** Structures whose month token may be followed by several bare strikes */
export const MULTI_LEG_STRUCTURES: ReadonlySet<StructureType> = new Set<StructureType>([
  "put_spread",
  "call_spread",
  "spread",
  "risk_reversal",
  "strangle",
  "butterfly",
]);

const STRUCTURE_TYPES: ReadonlySet<string> = new Set<StructureType>([
  "single",
  ...STRUCTURE_ALIASES.values(),
  "spread",
]);

export function isStructureType(value: string): value is StructureType {
  return STRUCTURE_TYPES.has(value);
}

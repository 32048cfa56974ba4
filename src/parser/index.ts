/**
 * Broker shorthand order parser.
 *
 * Handles flexible token ordering and the usual inter-dealer conventions:
 *   "AAPL jun26 300 calls vs250.32 30d 20.50 bid 1058x"
 *   "UBER Jun26 45P tt69.86 3d 0.41 bid 1058x"
 *   "QCOM 85P Jan27 tt141.17 7d 2.4b 600x"
 *   "VST Apr 130p 500 @ 2.55 tt 171.10 on a 11d"
 *   "IWM feb 257 apr 280 Risky vs 262.54 52d 2500x @ 1.60"
 *   "AAPL Jun26 240/220 PS 1X2 vs250 15d 500x @ 3.50 1X over"
 */

import type { ParsedOrder, StructureType } from "../types/options.js";
import { InvalidOrderError } from "../utils/errors.js";
import {
  extractDelta,
  extractDeltaDirection,
  extractIsLive,
  extractModifier,
  extractPriceAndSide,
  extractQuantity,
  extractRatio,
  extractStockRef,
  extractStructureType,
} from "./extractors.js";
import { buildLegs, inferStructureType, structureDisplayName } from "./structure-builder.js";
import { tokenizeOrder } from "./tokenizer.js";

export interface ParseOptions {
  /** Reference date for month tokens without a year */
  today?: Date;
}

/**
 * Parse a broker shorthand order string.
 * @throws InvalidOrderError when the text cannot be parsed
 */
export function parseOrder(text: string, options: ParseOptions = {}): ParsedOrder {
  const original = text.trim();
  if (!original) {
    throw new InvalidOrderError("Empty order string");
  }

  let stockRef = extractStockRef(original);
  let delta = extractDelta(original);
  const quantity = extractQuantity(original);
  const priceAndSide = extractPriceAndSide(original);
  const ratio = extractRatio(original);
  const modifier = extractModifier(original);
  const explicitType = extractStructureType(original);
  const isLive = extractIsLive(original);
  const deltaDirection = extractDeltaDirection(original);

  const { ticker, legSpecs, defaultOptionType } = tokenizeOrder(
    original,
    explicitType,
    options.today
  );

  const structureType = explicitType ?? inferStructureType(legSpecs, defaultOptionType);

  const legs = buildLegs({
    ticker,
    legSpecs,
    defaultOptionType,
    structureType,
    ratio,
    modifier,
    quantity: quantity || 1,
  });

  if (isLive) {
    stockRef = 0;
    delta = 0;
  }

  if (delta && deltaDirection) {
    delta = applyDeltaDirection(delta, deltaDirection, structureType);
  }

  return Object.freeze({
    underlying: ticker,
    structure: Object.freeze({
      name: structureDisplayName(structureType),
      legs: Object.freeze(legs),
      description: original,
    }),
    stockRef: stockRef || 0,
    delta: delta || 0,
    price: priceAndSide?.price || 0,
    quoteSide: priceAndSide?.side ?? "bid",
    quantity: quantity || 0,
    rawText: original,
  });
}

/**
 * Sign the delta from a direction qualifier.
 * "2x" negates for both spread types.
 */
export function applyDeltaDirection(
  delta: number,
  deltaDirection: string,
  structureType: StructureType
): number {
  const isSpread = structureType === "call_spread" || structureType === "put_spread";
  switch (deltaDirection) {
    case "put":
      return -Math.abs(delta);
    case "call":
      return Math.abs(delta);
    case "1x":
      return isSpread ? Math.abs(delta) : delta;
    case "2x":
      return isSpread ? -Math.abs(delta) : delta;
    default:
      return delta;
  }
}

export { InvalidOrderError } from "../utils/errors.js";
export { parseExpiry, formatIsoDate, formatExpiryLabel } from "./expiry.js";
export * from "./extractors.js";
export { tokenizeOrder, type LegSpec } from "./tokenizer.js";
export { buildLegs, inferStructureType, structureDisplayName } from "./structure-builder.js";

/**
 * Structure Market Pricer
 *
 * Aggregates per-leg screen quotes into a structure bid/offer and the size
 * available on each side.
 *
 *   BUY leg:  bid −= leg bid × qty    offer −= leg offer × qty
 *   SELL leg: bid += leg offer × qty  offer += leg bid × qty
 *
 * The pair is swapped when bid > offer so structureBid ≤ structureOffer.
 * Signs are kept (negative = net debit); take the absolute value only for
 * display.
 */

import type {
  LegMarketData,
  OptionLeg,
  ParsedOrder,
  StructureMarketData,
} from "../types/options.js";
import { LegCountMismatchError } from "../utils/errors.js";

export type StructureSide = "bid" | "offer";

export function priceStructureFromMarket(
  order: ParsedOrder,
  legMarket: readonly LegMarketData[],
  stockPrice: number
): StructureMarketData {
  const legs = order.structure.legs;
  if (legs.length !== legMarket.length) {
    throw new LegCountMismatchError(legs.length, legMarket.length);
  }

  let rawBid = 0;
  let rawOffer = 0;
  legs.forEach((leg, i) => {
    const mkt = legMarket[i];
    if (leg.side === "buy") {
      rawBid -= mkt.bid * leg.quantity;
      rawOffer -= mkt.offer * leg.quantity;
    } else {
      rawBid += mkt.offer * leg.quantity;
      rawOffer += mkt.bid * leg.quantity;
    }
  });

  const [structureBid, structureOffer] =
    rawBid > rawOffer ? [rawOffer, rawBid] : [rawBid, rawOffer];

  return Object.freeze({
    legData: Object.freeze(legs.map((leg, i) => [leg, legMarket[i]] as const)),
    stockPrice,
    stockRef: order.stockRef,
    delta: order.delta,
    structureBid,
    structureOffer,
    structureBidSize: calcStructureSize(legs, legMarket, "bid"),
    structureOfferSize: calcStructureSize(legs, legMarket, "offer"),
    structureMid: (structureBid + structureOffer) / 2,
  });
}

/**
 * Whole structures the screen can fill on one side.
 *
 * Each leg's constraining size is divided by its weight relative to the
 * smallest leg; the thinnest leg sets the size.
 */
export function calcStructureSize(
  legs: readonly OptionLeg[],
  legMarket: readonly LegMarketData[],
  side: StructureSide
): number {
  if (legs.length === 0) return 0;

  const baseQty = Math.min(...legs.map((leg) => leg.quantity));
  let minStructures = Infinity;

  legs.forEach((leg, i) => {
    const mkt = legMarket[i];
    let available: number;
    if (side === "bid") {
      // Selling the structure: buy back the short legs, sell the long legs
      available = leg.side === "sell" ? mkt.offerSize : mkt.bidSize;
    } else {
      // Buying the structure: lift the long legs, hit the short legs
      available = leg.side === "buy" ? mkt.offerSize : mkt.bidSize;
    }

    if (leg.quantity > 0) {
      minStructures = Math.min(minStructures, available / (leg.quantity / baseQty));
    }
  });

  return Number.isFinite(minStructures) ? Math.floor(minStructures) : 0;
}

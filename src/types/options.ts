/**
 * Core option order type definitions.
 * Covers legs, structures, parsed broker orders and screen market data.
 */

export type OptionType = "call" | "put";
export type Side = "buy" | "sell";
export type QuoteSide = "bid" | "offer";

/** Canonical structure names produced by the parser */
export type StructureType =
  | "single"
  | "put_spread"
  | "call_spread"
  | "spread"
  | "risk_reversal"
  | "straddle"
  | "strangle"
  | "butterfly"
  | "collar";

/** One contract line inside a structure */
export interface OptionLeg {
  readonly underlying: string;
  /** Calendar date at UTC midnight */
  readonly expiry: Date;
  readonly strike: number;
  readonly optionType: OptionType;
  readonly side: Side;
  /** Total contracts for this leg */
  readonly quantity: number;
  /** Weight relative to the structure's base unit */
  readonly ratio: number;
}

/** Named combination of legs traded as one unit */
export interface OptionStructure {
  readonly name: string;
  readonly legs: readonly OptionLeg[];
  readonly description: string;
}

/**
 * Result of parsing a broker shorthand order.
 * stockRef, delta and price use 0 for "not present".
 */
export interface ParsedOrder {
  readonly underlying: string;
  readonly structure: OptionStructure;
  readonly stockRef: number;
  readonly delta: number;
  readonly price: number;
  readonly quoteSide: QuoteSide;
  readonly quantity: number;
  readonly rawText: string;
}

/** Screen quote for a single leg */
export interface LegMarketData {
  readonly bid: number;
  readonly bidSize: number;
  readonly offer: number;
  readonly offerSize: number;
}

/** Structure-level market computed from per-leg quotes */
export interface StructureMarketData {
  readonly legData: ReadonlyArray<readonly [OptionLeg, LegMarketData]>;
  readonly stockPrice: number;
  readonly stockRef: number;
  readonly delta: number;
  readonly structureBid: number;
  readonly structureOffer: number;
  readonly structureBidSize: number;
  readonly structureOfferSize: number;
  readonly structureMid: number;
}

export const EMPTY_QUOTE: LegMarketData = Object.freeze({
  bid: 0,
  bidSize: 0,
  offer: 0,
  offerSize: 0,
});

/** +1 for buy, -1 for sell */
export function direction(side: Side): 1 | -1 {
  return side === "buy" ? 1 : -1;
}

export function legMid(mkt: LegMarketData): number {
  if (mkt.bid > 0 && mkt.offer > 0) return (mkt.bid + mkt.offer) / 2;
  return mkt.bid || mkt.offer || 0;
}

/** Signed sum of direction × quantity across legs */
export function netQuantity(structure: OptionStructure): number {
  return structure.legs.reduce((sum, leg) => sum + direction(leg.side) * leg.quantity, 0);
}

export function structureUnderlyings(structure: OptionStructure): Set<string> {
  return new Set(structure.legs.map((leg) => leg.underlying));
}

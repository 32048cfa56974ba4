/**
 * Expiration payoff for legs and structures.
 * Output points can feed any charting library.
 */

import { direction, type OptionLeg, type OptionStructure } from "../types/options.js";

export interface PayoffPoint {
  underlyingPrice: number;
  pnl: number;
}

/** Signed intrinsic value of a leg at expiry, times its quantity */
export function legPayoff(leg: OptionLeg, spot: number): number {
  const intrinsic =
    leg.optionType === "call" ? Math.max(spot - leg.strike, 0) : Math.max(leg.strike - spot, 0);
  return direction(leg.side) * leg.quantity * intrinsic;
}

export function structurePayoff(structure: OptionStructure, spot: number): number {
  return structure.legs.reduce((sum, leg) => sum + legPayoff(leg, spot), 0);
}

/** Payoff sampled at steps + 1 evenly spaced spots from low to high */
export function payoffRange(
  structure: OptionStructure,
  spotLow: number,
  spotHigh: number,
  steps: number = 200
): PayoffPoint[] {
  const step = (spotHigh - spotLow) / steps;
  const points: PayoffPoint[] = [];
  for (let i = 0; i <= steps; i++) {
    const price = spotLow + i * step;
    points.push({ underlyingPrice: price, pnl: structurePayoff(structure, price) });
  }
  return points;
}

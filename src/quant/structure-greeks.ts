/**
 * Theoretical structure pricing.
 *
 * Prices every leg with Black-Scholes and scales by direction × quantity,
 * so a short leg contributes negative premium and negative Greeks.
 */

import { direction, type OptionStructure } from "../types/options.js";
import { optionPriceWithGreeks, type OptionPrice } from "./black-scholes.js";

export interface StructurePrice {
  totalPrice: number;
  totalDelta: number;
  totalGamma: number;
  totalTheta: number;
  totalVega: number;
  totalRho: number;
  /** Signed, quantity-scaled price and Greeks per leg */
  legPrices: OptionPrice[];
}

export interface TheoreticalInputs {
  spot: number;
  r: number;
  /** One vol for every leg, or a strike → vol map */
  sigma: number | ReadonlyMap<number, number>;
  /** Years to expiry, applied to every leg */
  T: number;
  q?: number;
}

export function priceStructureTheoretical(
  structure: OptionStructure,
  inputs: TheoreticalInputs
): StructurePrice {
  const { spot, r, sigma, T, q = 0 } = inputs;
  const result: StructurePrice = {
    totalPrice: 0,
    totalDelta: 0,
    totalGamma: 0,
    totalTheta: 0,
    totalVega: 0,
    totalRho: 0,
    legPrices: [],
  };

  for (const leg of structure.legs) {
    const vol = typeof sigma === "number" ? sigma : sigma.get(leg.strike);
    if (vol === undefined) {
      const known = typeof sigma === "number" ? [] : [...sigma.keys()].sort((a, b) => a - b);
      throw new Error(`No vol provided for strike ${leg.strike}. Available strikes: ${known.join(", ")}`);
    }

    const raw = optionPriceWithGreeks({ S: spot, K: leg.strike, T, r, sigma: vol, q }, leg.optionType);
    const scale = direction(leg.side) * leg.quantity;
    const scaled: OptionPrice = {
      price: raw.price * scale,
      delta: raw.delta * scale,
      gamma: raw.gamma * scale,
      theta: raw.theta * scale,
      vega: raw.vega * scale,
      rho: raw.rho * scale,
    };

    result.legPrices.push(scaled);
    result.totalPrice += scaled.price;
    result.totalDelta += scaled.delta;
    result.totalGamma += scaled.gamma;
    result.totalTheta += scaled.theta;
    result.totalVega += scaled.vega;
    result.totalRho += scaled.rho;
  }

  return result;
}

/**
 * Black-Scholes Option Pricing Model
 *
 * Analytical European price and first-order Greeks with a continuous
 * dividend yield. Used by the mock market data provider and the
 * theoretical structure pricer.
 *
 * Reference: Black, F. & Scholes, M. (1973)
 */

import type { OptionType } from "../types/options.js";

/**
 * Standard normal CDF.
 * Abramowitz & Stegun erf approximation (7.1.26), Φ(x) = (1 + erf(x/√2)) / 2
 */
export function normalCDF(x: number): number {
  const a1 = 0.254829592;
  const a2 = -0.284496736;
  const a3 = 1.421413741;
  const a4 = -1.453152027;
  const a5 = 1.061405429;
  const p = 0.3275911;

  const sign = x < 0 ? -1 : 1;
  const z = Math.abs(x) / Math.SQRT2;
  const t = 1.0 / (1.0 + p * z);
  const y =
    1.0 -
    ((((a5 * t + a4) * t + a3) * t + a2) * t + a1) * t * Math.exp(-z * z);

  return 0.5 * (1.0 + sign * y);
}

/** Standard normal PDF */
export function normalPDF(x: number): number {
  return Math.exp(-0.5 * x * x) / Math.sqrt(2 * Math.PI);
}

/** Black-Scholes input parameters */
export interface BSParams {
  /** Spot price of the underlying */
  S: number;
  /** Strike price */
  K: number;
  /** Time to expiration in years */
  T: number;
  /** Risk-free rate (annualized, 0.05 = 5%) */
  r: number;
  /** Implied volatility (annualized) */
  sigma: number;
  /** Continuous dividend yield */
  q?: number;
}

/** Price plus Greeks for one contract, per share */
export interface OptionPrice {
  price: number;
  delta: number;
  gamma: number;
  /** Per calendar day */
  theta: number;
  /** Per 1 vol point */
  vega: number;
  /** Per 1% rate move */
  rho: number;
}

export function calcD1D2(params: BSParams): { d1: number; d2: number } {
  const { S, K, T, r, sigma, q = 0 } = params;

  if (T <= 0 || sigma <= 0) {
    throw new Error("T and sigma must be positive");
  }

  const sqrtT = Math.sqrt(T);
  const d1 = (Math.log(S / K) + (r - q + 0.5 * sigma * sigma) * T) / (sigma * sqrtT);
  return { d1, d2: d1 - sigma * sqrtT };
}

function intrinsic(S: number, K: number, type: OptionType): number {
  return type === "call" ? Math.max(S - K, 0) : Math.max(K - S, 0);
}

/**
 * Call: C = S·e^(-qT)·N(d1) - K·e^(-rT)·N(d2)
 * Put:  P = K·e^(-rT)·N(-d2) - S·e^(-qT)·N(-d1)
 *
 * At or past expiry the intrinsic value is returned.
 */
export function blackScholesPrice(params: BSParams, type: OptionType): number {
  const { S, K, T, r, q = 0 } = params;
  if (T <= 0) return intrinsic(S, K, type);

  const { d1, d2 } = calcD1D2(params);
  const discount = Math.exp(-r * T);
  const carry = Math.exp(-q * T);

  if (type === "call") {
    return S * carry * normalCDF(d1) - K * discount * normalCDF(d2);
  }
  return K * discount * normalCDF(-d2) - S * carry * normalCDF(-d1);
}

export function optionPriceWithGreeks(params: BSParams, type: OptionType): OptionPrice {
  const { S, K, T, r, sigma, q = 0 } = params;
  const price = blackScholesPrice(params, type);

  if (T <= 0) {
    const itm = intrinsic(S, K, type) > 0;
    const delta = itm ? (type === "call" ? 1 : -1) : 0;
    return { price, delta, gamma: 0, theta: 0, vega: 0, rho: 0 };
  }

  const { d1, d2 } = calcD1D2(params);
  const sqrtT = Math.sqrt(T);
  const carry = Math.exp(-q * T);
  const discount = Math.exp(-r * T);
  const pdf = normalPDF(d1);

  const gamma = (carry * pdf) / (S * sigma * sqrtT);
  const vega = (S * carry * pdf * sqrtT) / 100;
  const decay = -(S * carry * pdf * sigma) / (2 * sqrtT);

  if (type === "call") {
    return {
      price,
      delta: carry * normalCDF(d1),
      gamma,
      theta: (decay + q * S * carry * normalCDF(d1) - r * K * discount * normalCDF(d2)) / 365,
      vega,
      rho: (K * T * discount * normalCDF(d2)) / 100,
    };
  }
  return {
    price,
    delta: carry * (normalCDF(d1) - 1),
    gamma,
    theta: (decay - q * S * carry * normalCDF(-d1) + r * K * discount * normalCDF(-d2)) / 365,
    vega,
    rho: (-K * T * discount * normalCDF(-d2)) / 100,
  };
}

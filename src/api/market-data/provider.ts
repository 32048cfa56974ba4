/**
 * Market data provider contract.
 *
 * The parser and structure pricer never call a provider themselves; callers
 * fetch one quote per leg and hand the list to the pricer. Providers own
 * their timeouts and retries.
 */

import type { LegMarketData, OptionType } from "../../types/options.js";

export type ProviderMode = "live" | "mock";

/** Screen quote for one option; all zero when unavailable */
export type OptionQuote = LegMarketData;

export interface MarketDataProvider {
  readonly mode: ProviderMode;
  /** Last price of the underlying, null if unknown */
  getSpot(ticker: string): Promise<number | null>;
  getOptionQuote(
    ticker: string,
    expiry: Date,
    strike: number,
    optionType: OptionType
  ): Promise<OptionQuote>;
  /** Shares per contract; 100 when unknown */
  getContractMultiplier(ticker: string): Promise<number>;
}

export const DEFAULT_MULTIPLIER = 100;

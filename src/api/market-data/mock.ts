/**
 * Mock Market Data: development provider
 *
 * Generates screen-like quotes without a market data terminal:
 *   - spot and base vol per ticker from data/mock-market.json
 *   - put skew: OTM strikes below spot get extra vol
 *   - Black-Scholes theo with a spread that widens away from the money
 *   - bid/offer sizes from a generator seeded by strike and spot
 */

import fs from "fs";
import path from "path";
import { fileURLToPath } from "url";
import { z } from "zod";
import { blackScholesPrice } from "../../quant/black-scholes.js";
import type { OptionType } from "../../types/options.js";
import { componentLogger } from "../../utils/logger.js";
import { DEFAULT_MULTIPLIER, type MarketDataProvider, type OptionQuote } from "./provider.js";

const __dirname = path.dirname(fileURLToPath(import.meta.url));
const MOCK_DATA_FILE = path.resolve(__dirname, "../../../data/mock-market.json");

const log = componentLogger("mock-market");

const MockMarketSchema = z.object({
  spots: z.record(z.number().positive()),
  vols: z.record(z.number().positive()),
});

export type MockMarketTable = z.infer<typeof MockMarketSchema>;

export const UNKNOWN_SPOT = 100;
export const UNKNOWN_VOL = 0.25;
const MIN_YEARS = 0.001;
const DAY_MS = 86_400_000;

export interface MockProviderOptions {
  table?: MockMarketTable;
  riskFreeRate?: number;
  dividendYield?: number;
  /** Clock used for time to expiry */
  now?: () => Date;
}

export function loadMockMarketTable(file: string = MOCK_DATA_FILE): MockMarketTable {
  const raw = fs.readFileSync(file, "utf-8");
  return MockMarketSchema.parse(JSON.parse(raw));
}

/** mulberry32 */
function seededRandom(seed: number): () => number {
  let a = seed | 0;
  return () => {
    let t = (a += 0x6d2b79f5);
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

function randomInt(rng: () => number, min: number, max: number): number {
  return min + Math.floor(rng() * (max - min + 1));
}

const roundCents = (x: number): number => Math.round(x * 100) / 100;

export class MockMarketDataProvider implements MarketDataProvider {
  readonly mode = "mock" as const;

  private readonly table: MockMarketTable;
  private readonly riskFreeRate: number;
  private readonly dividendYield: number;
  private readonly now: () => Date;

  constructor(options: MockProviderOptions = {}) {
    this.table = options.table ?? loadMockMarketTable();
    this.riskFreeRate = options.riskFreeRate ?? 0.05;
    this.dividendYield = options.dividendYield ?? 0;
    this.now = options.now ?? (() => new Date());
    log.debug(`Loaded ${Object.keys(this.table.spots).length} mock tickers`);
  }

  async getSpot(ticker: string): Promise<number> {
    return this.spotOf(ticker);
  }

  async getOptionQuote(
    ticker: string,
    expiry: Date,
    strike: number,
    optionType: OptionType
  ): Promise<OptionQuote> {
    const spot = this.spotOf(ticker);
    const sigma = this.volOf(ticker, strike, spot);
    const T = Math.max((expiry.getTime() - this.today().getTime()) / DAY_MS / 365, MIN_YEARS);

    const theo = blackScholesPrice(
      { S: spot, K: strike, T, r: this.riskFreeRate, sigma, q: this.dividendYield },
      optionType
    );

    // 2% spread at the money, up to ~5% further out
    const moneyness = Math.abs(spot - strike) / spot;
    const halfSpread = Math.max(theo * (0.02 + 0.03 * moneyness), 0.05);

    const rng = seededRandom(Math.trunc(strike * 100 + spot * 10));
    return {
      bid: roundCents(Math.max(theo - halfSpread, 0.01)),
      bidSize: randomInt(rng, 100, 1000),
      offer: roundCents(theo + halfSpread),
      offerSize: randomInt(rng, 100, 800),
    };
  }

  async getContractMultiplier(_ticker: string): Promise<number> {
    return DEFAULT_MULTIPLIER;
  }

  /** Base vol plus put skew */
  volOf(ticker: string, strike: number, spot: number): number {
    const base = this.table.vols[ticker.toUpperCase()] ?? UNKNOWN_VOL;
    const moneyness = strike / spot;
    return moneyness < 1 ? base + 0.05 * (1 - moneyness) : base;
  }

  private spotOf(ticker: string): number {
    return this.table.spots[ticker.toUpperCase()] ?? UNKNOWN_SPOT;
  }

  private today(): Date {
    const now = this.now();
    return new Date(Date.UTC(now.getFullYear(), now.getMonth(), now.getDate()));
  }
}

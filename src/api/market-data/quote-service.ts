/**
 * Quote Service
 *
 * Fetches spot, per-leg quotes and the contract multiplier from a provider,
 * then runs the structure pricer. A provider failure on one leg yields an
 * empty quote for that leg only.
 */

import { priceStructureFromMarket } from "../../quant/structure-pricer.js";
import {
  EMPTY_QUOTE,
  type LegMarketData,
  type OptionType,
  type ParsedOrder,
  type StructureMarketData,
} from "../../types/options.js";
import { componentLogger } from "../../utils/logger.js";
import { DEFAULT_MULTIPLIER, type MarketDataProvider, type OptionQuote } from "./provider.js";

const log = componentLogger("quotes");

/** Spot used when neither the provider nor the order's tie has one */
export const FALLBACK_SPOT = 100;

export interface QuoteRequestLeg {
  /** null when the caller sent an unusable expiry */
  expiry: Date | null;
  strike: number;
  optionType: OptionType;
}

export interface LegQuotes {
  spot: number | null;
  quotes: OptionQuote[];
  multiplier: number;
}

export interface PricedOrder {
  order: ParsedOrder;
  spot: number;
  legMarket: LegMarketData[];
  market: StructureMarketData;
  multiplier: number;
  /** Broker price minus screen mid; null when the order carries no price */
  edge: number | null;
}

export async function fetchQuotesForLegs(
  provider: MarketDataProvider,
  underlying: string,
  legs: readonly QuoteRequestLeg[]
): Promise<LegQuotes> {
  const ticker = underlying.toUpperCase();

  let spot: number | null = null;
  try {
    spot = await provider.getSpot(ticker);
  } catch (err) {
    log.warn(`Failed to fetch spot for ${ticker}`, { error: String(err) });
  }

  const quotes = await Promise.all(
    legs.map(async (leg): Promise<OptionQuote> => {
      if (!leg.expiry) return EMPTY_QUOTE;
      try {
        return await provider.getOptionQuote(ticker, leg.expiry, leg.strike, leg.optionType);
      } catch (err) {
        log.warn(`Failed to fetch ${ticker} ${leg.strike} ${leg.optionType} quote`, {
          error: String(err),
        });
        return EMPTY_QUOTE;
      }
    })
  );

  let multiplier = DEFAULT_MULTIPLIER;
  try {
    multiplier = await provider.getContractMultiplier(ticker);
  } catch (err) {
    log.warn(`Failed to fetch multiplier for ${ticker}, defaulting to ${DEFAULT_MULTIPLIER}`, {
      error: String(err),
    });
  }

  return { spot, quotes, multiplier };
}

export function fetchLegQuotes(
  provider: MarketDataProvider,
  order: ParsedOrder
): Promise<LegQuotes> {
  return fetchQuotesForLegs(provider, order.underlying, order.structure.legs);
}

/**
 * Price an order from already-fetched quotes.
 * Missing quotes are padded with empty ones; extra quotes are a mismatch.
 */
export function priceWithQuotes(order: ParsedOrder, legQuotes: LegQuotes): PricedOrder {
  const spot =
    legQuotes.spot || (order.stockRef > 0 ? order.stockRef : FALLBACK_SPOT);

  const legMarket = [...legQuotes.quotes];
  while (legMarket.length < order.structure.legs.length) {
    legMarket.push(EMPTY_QUOTE);
  }

  const market = priceStructureFromMarket(order, legMarket, spot);
  const edge = order.price > 0 ? order.price - Math.abs(market.structureMid) : null;

  return { order, spot, legMarket, market, multiplier: legQuotes.multiplier, edge };
}

export async function priceOrder(
  provider: MarketDataProvider,
  order: ParsedOrder
): Promise<PricedOrder> {
  const legQuotes = await fetchLegQuotes(provider, order);
  const priced = priceWithQuotes(order, legQuotes);
  log.debug(
    `${order.underlying} ${order.structure.name}: ` +
      `${priced.market.structureBid.toFixed(2)} / ${priced.market.structureOffer.toFixed(2)}`
  );
  return priced;
}

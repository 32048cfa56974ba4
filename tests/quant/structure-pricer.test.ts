/**
 * Structure Market Pricer Tests
 */

import { describe, it, expect } from "vitest";
import { parseOrder } from "../../src/parser/index.js";
import { calcStructureSize, priceStructureFromMarket } from "../../src/quant/structure-pricer.js";
import { LegCountMismatchError } from "../../src/utils/errors.js";
import { legMid, type LegMarketData } from "../../src/types/options.js";

const TODAY = new Date(2025, 9, 15);

// SELL 240P ×500, BUY 220P ×1000
const putSpread = parseOrder("AAPL Jun26 240/220 PS 1X2 vs250 15d 500x @ 3.50", { today: TODAY });
const putSpreadMarket: LegMarketData[] = [
  { bid: 10, bidSize: 250, offer: 10.5, offerSize: 300 },
  { bid: 4, bidSize: 400, offer: 4.4, offerSize: 1000 },
];

describe("priceStructureFromMarket", () => {
  it("should price a ratio put spread from leg quotes", () => {
    const market = priceStructureFromMarket(putSpread, putSpreadMarket, 250.3);

    // raw bid = 10.5×500 − 4×1000 = 1250, raw offer = 10×500 − 4.4×1000 = 600
    expect(market.structureBid).toBeCloseTo(600, 8);
    expect(market.structureOffer).toBeCloseTo(1250, 8);
    expect(market.structureMid).toBeCloseTo(925, 8);
    expect(market.stockPrice).toBe(250.3);
    expect(market.stockRef).toBe(250);
    expect(market.delta).toBe(15);
  });

  it("should pair each leg with its quote", () => {
    const market = priceStructureFromMarket(putSpread, putSpreadMarket, 250);
    expect(market.legData).toHaveLength(2);
    expect(market.legData[0][0].strike).toBe(240);
    expect(market.legData[0][1]).toEqual(putSpreadMarket[0]);
    expect(market.legData[1][0].strike).toBe(220);
  });

  it("should keep a long single option negative", () => {
    const call = parseOrder("AAPL Jun26 300c 10x", { today: TODAY });
    const market = priceStructureFromMarket(
      call,
      [{ bid: 20, bidSize: 50, offer: 21, offerSize: 40 }],
      250
    );
    expect(market.structureBid).toBe(-210);
    expect(market.structureOffer).toBe(-200);
    expect(market.structureMid).toBe(-205);
    expect(market.structureBid).toBeLessThanOrEqual(market.structureOffer);
  });

  it("should price a zero market when every quote is empty", () => {
    const empty = { bid: 0, bidSize: 0, offer: 0, offerSize: 0 };
    const market = priceStructureFromMarket(putSpread, [empty, empty], 250);
    expect(market.structureBid).toBe(0);
    expect(market.structureOffer).toBe(0);
    expect(market.structureBidSize).toBe(0);
    expect(market.structureOfferSize).toBe(0);
  });

  it("should reject a leg/quote count mismatch", () => {
    expect(() => priceStructureFromMarket(putSpread, [putSpreadMarket[0]], 250)).toThrow(
      LegCountMismatchError
    );
    try {
      priceStructureFromMarket(putSpread, [putSpreadMarket[0]], 250);
    } catch (err) {
      expect(err).toBeInstanceOf(LegCountMismatchError);
      if (err instanceof LegCountMismatchError) {
        expect(err.legCount).toBe(2);
        expect(err.marketCount).toBe(1);
        expect(err.message).toBe("Leg count mismatch: 2 legs but 1 market entries");
      }
    }
  });
});

describe("priceStructureFromMarket: long and short legs", () => {
  it("should mid a straddle at the summed leg mids", () => {
    const straddle = parseOrder("SPY Dec25 600 straddle", { today: TODAY });
    const quotes: LegMarketData[] = [
      { bid: 10, bidSize: 50, offer: 11, offerSize: 60 },
      { bid: 8, bidSize: 40, offer: 9, offerSize: 70 },
    ];
    const market = priceStructureFromMarket(straddle, quotes, 600);

    // both legs bought: bid = −(11 + 9), offer = −(10 + 8)
    expect(market.structureBid).toBe(-20);
    expect(market.structureOffer).toBe(-18);
    expect(market.structureMid).toBe(-19);
    expect(-market.structureMid).toBe(legMid(quotes[0]) + legMid(quotes[1]));
  });

  it.each([
    ["risk reversal", "IWM Jun26 250 280 Risky 100x"],
    ["ratio put spread", "AAPL Jun26 240/220 PS 1X2 500x"],
    ["butterfly", "SPY Dec25 580 600 620 fly 10x"],
  ])("should keep bid at or below offer for a %s", (_name, text) => {
    const order = parseOrder(text, { today: TODAY });
    const quotes = order.structure.legs.map(
      (_leg, i): LegMarketData => ({ bid: 5 + i, bidSize: 100, offer: 5.6 + i, offerSize: 100 })
    );
    const market = priceStructureFromMarket(order, quotes, 250);

    expect(market.structureBid).toBeLessThanOrEqual(market.structureOffer);
    expect(market.structureMid).toBeCloseTo((market.structureBid + market.structureOffer) / 2, 10);
  });
});

describe("calcStructureSize", () => {
  it("should size the bid from short-leg offers and long-leg bids", () => {
    // 240P: offerSize 300 / 1 = 300; 220P: bidSize 400 / 2 = 200
    expect(calcStructureSize(putSpread.structure.legs, putSpreadMarket, "bid")).toBe(200);
  });

  it("should size the offer from long-leg offers and short-leg bids", () => {
    // 240P: bidSize 250 / 1 = 250; 220P: offerSize 1000 / 2 = 500
    expect(calcStructureSize(putSpread.structure.legs, putSpreadMarket, "offer")).toBe(250);
  });

  it("should floor fractional structures", () => {
    const market: LegMarketData[] = [
      { bid: 10, bidSize: 250, offer: 10.5, offerSize: 300 },
      { bid: 4, bidSize: 401, offer: 4.4, offerSize: 1000 },
    ];
    expect(calcStructureSize(putSpread.structure.legs, market, "bid")).toBe(200);
  });

  it("should be zero without legs", () => {
    expect(calcStructureSize([], [], "bid")).toBe(0);
  });
});

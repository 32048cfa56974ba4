/**
 * Express API Server: pricing bridge
 *
 *   GET    /api/status              Provider mode
 *   GET    /api/spot/:ticker        Underlying last price
 *   GET    /api/multiplier/:ticker  Contract multiplier
 *   POST   /api/option_quotes       Per-leg screen quotes
 *   POST   /api/parse               Broker shorthand → structured order
 *   POST   /api/price               Parse + structure bid/offer/mid
 *   GET    /api/orders              Blotter rows
 *   POST   /api/orders              Price an order and add it to the blotter
 *   GET    /api/orders/:id/recall   Reprice a stored order
 *   PATCH  /api/orders/:id          Trade-capture edits
 *   DELETE /api/orders/:id          Remove a blotter row
 */

import express, { type Response } from "express";
import { z } from "zod";
import type { MarketDataProvider } from "./api/market-data/provider.js";
import {
  fetchQuotesForLegs,
  priceOrder,
  type PricedOrder,
} from "./api/market-data/quote-service.js";
import { parseOrder } from "./parser/index.js";
import { formatIsoDate, parseIsoDate } from "./parser/expiry.js";
import { BlotterEditsSchema, buildOrderRecord, type OrderBlotter } from "./storage/blotter.js";
import { deserializeParsedOrder, serializeParsedOrder } from "./storage/order-codec.js";
import { legMid } from "./types/options.js";
import { InvalidOrderError, LegCountMismatchError } from "./utils/errors.js";
import { componentLogger } from "./utils/logger.js";
import {
  NewOrderRequestSchema,
  OptionQuotesRequestSchema,
  OrderTextSchema,
  TickerSchema,
} from "./utils/validation.js";

const log = componentLogger("server");

export interface AppDependencies {
  provider: MarketDataProvider;
  blotter: OrderBlotter;
}

function sendError(res: Response, err: unknown): void {
  if (err instanceof InvalidOrderError) {
    res.status(400).json({ success: false, error: err.message });
    return;
  }
  if (err instanceof z.ZodError) {
    const error = err.issues.map((i) => `${i.path.join(".") || "body"}: ${i.message}`).join("; ");
    res.status(400).json({ success: false, error });
    return;
  }
  if (err instanceof LegCountMismatchError) {
    log.error(err.message);
  } else {
    log.error("Request failed", { error: String(err) });
  }
  res.status(500).json({ success: false, error: String(err) });
}

function pricedResponse(priced: PricedOrder) {
  const { market } = priced;
  return {
    order: serializeParsedOrder(priced.order),
    spot: priced.spot,
    multiplier: priced.multiplier,
    market: {
      bid: market.structureBid,
      mid: market.structureMid,
      offer: market.structureOffer,
      bidSize: market.structureBidSize,
      offerSize: market.structureOfferSize,
      legs: market.legData.map(([leg, quote]) => ({
        expiry: formatIsoDate(leg.expiry),
        strike: leg.strike,
        optionType: leg.optionType,
        side: leg.side,
        quantity: leg.quantity,
        ...quote,
        mid: legMid(quote),
      })),
    },
    edge: priced.edge,
  };
}

export function createApp({ provider, blotter }: AppDependencies): express.Express {
  const app = express();

  app.use(express.json());

  // ── CORS for local development ──────────────────────────────
  app.use((_req, res, next) => {
    res.header("Access-Control-Allow-Origin", "*");
    res.header("Access-Control-Allow-Headers", "Content-Type");
    res.header("Access-Control-Allow-Methods", "GET, POST, PATCH, DELETE");
    next();
  });

  // ══════════════════════════════════════════════════════════════
  //  MARKET DATA
  // ══════════════════════════════════════════════════════════════

  app.get("/api/status", (_req, res) => {
    res.json({ success: true, data: { status: provider.mode } });
  });

  app.get("/api/spot/:ticker", async (req, res) => {
    try {
      const ticker = TickerSchema.parse(req.params.ticker);
      const spot = await provider.getSpot(ticker);
      res.json({ success: true, data: { ticker, spot } });
    } catch (err) {
      sendError(res, err);
    }
  });

  app.get("/api/multiplier/:ticker", async (req, res) => {
    try {
      const ticker = TickerSchema.parse(req.params.ticker);
      const multiplier = await provider.getContractMultiplier(ticker);
      res.json({ success: true, data: { ticker, multiplier } });
    } catch (err) {
      sendError(res, err);
    }
  });

  /**
   * POST /api/option_quotes: one quote per requested leg, in order.
   * Legs whose expiry does not parse come back all zero.
   */
  app.post("/api/option_quotes", async (req, res) => {
    try {
      const body = OptionQuotesRequestSchema.parse(req.body);
      const legs = body.legs.map((leg) => ({
        expiry: parseIsoDate(leg.expiry),
        strike: leg.strike,
        optionType: leg.option_type,
      }));
      const data = await fetchQuotesForLegs(provider, body.underlying, legs);
      res.json({ success: true, data });
    } catch (err) {
      sendError(res, err);
    }
  });

  // ══════════════════════════════════════════════════════════════
  //  PARSING & PRICING
  // ══════════════════════════════════════════════════════════════

  app.post("/api/parse", (req, res) => {
    try {
      const { text } = OrderTextSchema.parse(req.body);
      const order = parseOrder(text);
      res.json({ success: true, data: serializeParsedOrder(order) });
    } catch (err) {
      sendError(res, err);
    }
  });

  app.post("/api/price", async (req, res) => {
    try {
      const { text } = OrderTextSchema.parse(req.body);
      const priced = await priceOrder(provider, parseOrder(text));
      res.json({ success: true, data: pricedResponse(priced) });
    } catch (err) {
      sendError(res, err);
    }
  });

  // ══════════════════════════════════════════════════════════════
  //  BLOTTER
  // ══════════════════════════════════════════════════════════════

  app.get("/api/orders", (_req, res) => {
    try {
      res.json({ success: true, data: blotter.list() });
    } catch (err) {
      sendError(res, err);
    }
  });

  app.post("/api/orders", async (req, res) => {
    try {
      const body = NewOrderRequestSchema.parse(req.body);
      const order = parseOrder(body.text);
      const priced = await priceOrder(provider, order);
      const row = blotter.add(
        buildOrderRecord(priced, {
          createdBy: body.createdBy,
          side: body.side ?? order.quoteSide,
          size: body.size,
        })
      );
      res.status(201).json({ success: true, data: row });
    } catch (err) {
      sendError(res, err);
    }
  });

  /** Rebuild the order captured with a row and price it on the current screen */
  app.get("/api/orders/:id/recall", async (req, res) => {
    try {
      const row = blotter.list().find((r) => r.id === req.params.id);
      if (!row) {
        res.status(404).json({ success: false, error: "Order not found" });
        return;
      }
      if (!row.order) {
        res.status(404).json({ success: false, error: "Order has no recall data" });
        return;
      }
      const priced = await priceOrder(provider, deserializeParsedOrder(row.order));
      res.json({ success: true, data: pricedResponse(priced) });
    } catch (err) {
      sendError(res, err);
    }
  });

  app.patch("/api/orders/:id", (req, res) => {
    try {
      const edits = BlotterEditsSchema.parse(req.body);
      const row = blotter.update(req.params.id, edits);
      if (!row) {
        res.status(404).json({ success: false, error: "Order not found" });
        return;
      }
      res.json({ success: true, data: row });
    } catch (err) {
      sendError(res, err);
    }
  });

  app.delete("/api/orders/:id", (req, res) => {
    try {
      if (!blotter.remove(req.params.id)) {
        res.status(404).json({ success: false, error: "Order not found" });
        return;
      }
      res.json({ success: true, data: { id: req.params.id } });
    } catch (err) {
      sendError(res, err);
    }
  });

  return app;
}

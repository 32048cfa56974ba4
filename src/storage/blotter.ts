/**
 * Order Blotter
 *
 * Flattened, display-ready rows for priced orders, persisted through an
 * OrderStore. Only trade-capture fields are editable after a row is added;
 * P&L is recomputed from them on every edit.
 *
 * Emits "changed" after every successful write.
 */

import { EventEmitter } from "eventemitter3";
import { z } from "zod";
import type { PricedOrder } from "../api/market-data/quote-service.js";
import { formatExpiryLabel } from "../parser/expiry.js";
import type { OptionLeg, QuoteSide } from "../types/options.js";
import { componentLogger } from "../utils/logger.js";
import { generateId } from "../utils/validation.js";
import { SerializedOrderSchema, serializeParsedOrder } from "./order-codec.js";
import type { OrderStore } from "./order-store.js";

const log = componentLogger("blotter");

// ── Schema ──────────────────────────────────────────────────

const BlotterFieldsSchema = z.object({
  addedTime: z.string(),
  createdBy: z.string().default(""),
  underlying: z.string(),
  structure: z.string(),
  bidSize: z.number().int().nonnegative(),
  bid: z.string(),
  mid: z.string(),
  offer: z.string(),
  offerSize: z.number().int().nonnegative(),
  side: z.enum(["Bid", "Offered", ""]).default(""),
  size: z.string().default(""),
  traded: z.enum(["Yes", "No"]).default("No"),
  boughtSold: z.enum(["Bought", "Sold", ""]).default(""),
  tradedPrice: z.string().default(""),
  initiator: z.string().default(""),
  pnl: z.string().default(""),
  multiplier: z.number().int().positive().default(100),
  /** Parsed order for recall */
  order: SerializedOrderSchema.optional(),
});

export const BlotterOrderSchema = BlotterFieldsSchema.extend({
  id: z.string().min(1),
});

export type BlotterOrder = z.infer<typeof BlotterOrderSchema>;
export type NewBlotterOrder = z.infer<typeof BlotterFieldsSchema>;

/** Fields a trader may edit on an existing row */
export const BlotterEditsSchema = z.object({
  side: z.enum(["Bid", "Offered", ""]).optional(),
  size: z.string().optional(),
  traded: z.enum(["Yes", "No"]).optional(),
  boughtSold: z.enum(["Bought", "Sold", ""]).optional(),
  tradedPrice: z.string().optional(),
  initiator: z.string().optional(),
});

export type BlotterEdits = z.infer<typeof BlotterEditsSchema>;

export type BlotterAction = "added" | "updated" | "deleted";

export interface BlotterChange {
  action: BlotterAction;
  id: string;
}

interface BlotterEvents {
  changed: (change: BlotterChange) => void;
}

// ── Row building ────────────────────────────────────────────

export interface OrderRecordOptions {
  createdBy?: string;
  side?: QuoteSide;
  /** Order size in structures */
  size?: number;
  now?: Date;
}

function formatStrike(strike: number): string {
  return Number.isInteger(strike) ? strike.toFixed(0) : String(strike);
}

/** "240P Jun26" */
export function legLabel(leg: OptionLeg): string {
  const type = leg.optionType === "call" ? "C" : "P";
  return `${formatStrike(leg.strike)}${type} ${formatExpiryLabel(leg.expiry)}`;
}

function formatTime(date: Date): string {
  const hh = String(date.getHours()).padStart(2, "0");
  const mm = String(date.getMinutes()).padStart(2, "0");
  return `${hh}:${mm}`;
}

/**
 * Flatten a priced order into a blotter row. Prices are shown unsigned.
 */
export function buildOrderRecord(
  priced: PricedOrder,
  options: OrderRecordOptions = {}
): NewBlotterOrder {
  const { order, market, multiplier } = priced;
  const detail = order.structure.legs.map(legLabel).join(" / ");
  const size = options.size ?? order.quantity;

  return {
    addedTime: formatTime(options.now ?? new Date()),
    createdBy: options.createdBy ?? "",
    underlying: order.underlying,
    structure: `${order.structure.name.toUpperCase()} ${detail}`,
    bidSize: market.structureBidSize,
    bid: Math.abs(market.structureBid).toFixed(2),
    mid: Math.abs(market.structureMid).toFixed(2),
    offer: Math.abs(market.structureOffer).toFixed(2),
    offerSize: market.structureOfferSize,
    side: options.side === "bid" ? "Bid" : options.side === "offer" ? "Offered" : "",
    size: size > 0 ? String(size) : "",
    traded: "No",
    boughtSold: "",
    tradedPrice: "",
    initiator: "",
    pnl: "",
    multiplier,
    order: serializeParsedOrder(order),
  };
}

/**
 * P&L of a traded row against the mid captured when it was added.
 * Bought: (mid − traded) × size × multiplier; Sold: the reverse.
 */
export function computePnl(row: BlotterOrder): string {
  if (row.traded !== "Yes" || row.tradedPrice === "" || row.boughtSold === "") {
    return "";
  }

  const mid = parseFloat(row.mid);
  const tradedPrice = parseFloat(row.tradedPrice);
  const size = parseInt(row.size, 10);
  if ([mid, tradedPrice, size].some((n) => Number.isNaN(n))) return "";

  const perUnit = row.boughtSold === "Bought" ? mid - tradedPrice : tradedPrice - mid;
  const pnl = perUnit * size * row.multiplier;
  const sign = pnl < 0 ? "-" : "+";
  return `${sign}${Math.abs(pnl).toLocaleString("en-US", { maximumFractionDigits: 0 })}`;
}

// ── Blotter ─────────────────────────────────────────────────

export class OrderBlotter extends EventEmitter<BlotterEvents> {
  constructor(private readonly store: OrderStore) {
    super();
  }

  /** Stored rows in insertion order; rows that fail validation are skipped */
  list(): BlotterOrder[] {
    const rows: BlotterOrder[] = [];
    for (const record of this.store.load()) {
      const parsed = BlotterOrderSchema.safeParse(record);
      if (parsed.success) {
        rows.push(parsed.data);
      } else {
        log.warn(`Skipping malformed blotter row ${record.id}`);
      }
    }
    return rows;
  }

  add(input: NewBlotterOrder): BlotterOrder {
    const row = BlotterOrderSchema.parse({ ...input, id: generateId() });
    const records = this.store.load();
    records.push(row);
    this.store.save(records);
    log.info(`Added ${row.underlying} ${row.structure}`);
    this.emit("changed", { action: "added", id: row.id });
    return row;
  }

  /**
   * Apply trade-capture edits; null when the id is unknown.
   * Fields the row schema does not know are kept on the stored record.
   */
  update(id: string, edits: BlotterEdits): BlotterOrder | null {
    const records = this.store.load();
    const index = records.findIndex((record) => record.id === id);
    if (index < 0) return null;

    const stored = BlotterOrderSchema.safeParse(records[index]);
    if (!stored.success) {
      throw new Error(`Stored order ${id} is not a valid blotter row`);
    }

    const e = BlotterEditsSchema.parse(edits);
    const current = stored.data;
    const merged: BlotterOrder = {
      ...current,
      side: e.side ?? current.side,
      size: e.size ?? current.size,
      traded: e.traded ?? current.traded,
      boughtSold: e.boughtSold ?? current.boughtSold,
      tradedPrice: e.tradedPrice ?? current.tradedPrice,
      initiator: e.initiator ?? current.initiator,
    };
    const updated: BlotterOrder = { ...merged, pnl: computePnl(merged) };
    records[index] = { ...records[index], ...updated };

    this.store.save(records);
    this.emit("changed", { action: "updated", id });
    return updated;
  }

  remove(id: string): boolean {
    const records = this.store.load();
    const remaining = records.filter((record) => record.id !== id);
    if (remaining.length === records.length) return false;

    this.store.save(remaining);
    log.info(`Deleted order ${id}`);
    this.emit("changed", { action: "deleted", id });
    return true;
  }
}

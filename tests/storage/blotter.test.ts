/**
 * Order blotter tests: in-memory store, no files.
 */

import { beforeEach, describe, it, expect, vi } from "vitest";
import { priceWithQuotes } from "../../src/api/market-data/quote-service.js";
import { parseOrder } from "../../src/parser/index.js";
import {
  OrderBlotter,
  buildOrderRecord,
  computePnl,
  legLabel,
  type BlotterOrder,
  type NewBlotterOrder,
} from "../../src/storage/blotter.js";
import type { OrderRecord, OrderStore } from "../../src/storage/order-store.js";

const TODAY = new Date(2025, 9, 15);

function memoryStore(initial: OrderRecord[] = []): OrderStore {
  let records = [...initial];
  return {
    load: () => [...records],
    save: (orders) => {
      records = [...orders];
    },
  };
}

const ROW: NewBlotterOrder = {
  addedTime: "09:30",
  createdBy: "desk",
  underlying: "AAPL",
  structure: "SINGLE 300C Jun26",
  bidSize: 50,
  bid: "2.40",
  mid: "2.50",
  offer: "2.60",
  offerSize: 40,
  side: "Bid",
  size: "10",
  traded: "No",
  boughtSold: "",
  tradedPrice: "",
  initiator: "",
  pnl: "",
  multiplier: 100,
};

describe("buildOrderRecord", () => {
  // SELL 240P ×500, BUY 220P ×1000
  const order = parseOrder("AAPL Jun26 240/220 PS 1X2 vs250 15d 500x @ 3.50", { today: TODAY });
  const priced = priceWithQuotes(order, {
    spot: 250,
    quotes: [
      { bid: 10, bidSize: 250, offer: 10.5, offerSize: 300 },
      { bid: 4, bidSize: 400, offer: 4.4, offerSize: 1000 },
    ],
    multiplier: 100,
  });

  it("should flatten a priced order into a display row", () => {
    const row = buildOrderRecord(priced, {
      createdBy: "desk",
      side: "offer",
      now: new Date(2025, 9, 15, 9, 5),
    });

    expect(row).toMatchObject({
      addedTime: "09:05",
      createdBy: "desk",
      underlying: "AAPL",
      structure: "PUT SPREAD 240P Jun26 / 220P Jun26",
      bidSize: 200,
      bid: "600.00",
      mid: "925.00",
      offer: "1250.00",
      offerSize: 250,
      side: "Offered",
      size: "500",
      traded: "No",
      pnl: "",
      multiplier: 100,
    });
    expect(row.order?.legs).toHaveLength(2);
  });

  it("should show prices unsigned", () => {
    const call = parseOrder("AAPL Jun26 300c 10x", { today: TODAY });
    const row = buildOrderRecord(
      priceWithQuotes(call, {
        spot: 250,
        quotes: [{ bid: 20, bidSize: 50, offer: 21, offerSize: 40 }],
        multiplier: 100,
      }),
      { size: 3 }
    );
    expect([row.bid, row.mid, row.offer]).toEqual(["210.00", "205.00", "200.00"]);
    expect(row.size).toBe("3");
    expect(row.side).toBe("");
  });

  it("should label fractional strikes without rounding", () => {
    const leg = parseOrder("SPY Dec25 602.5c", { today: TODAY }).structure.legs[0];
    expect(legLabel(leg)).toBe("602.5C Dec25");
  });
});

describe("computePnl", () => {
  const traded = (overrides: Partial<BlotterOrder>): BlotterOrder => ({
    ...ROW,
    id: "r1",
    traded: "Yes",
    ...overrides,
  });

  it("should credit a purchase below mid", () => {
    expect(computePnl(traded({ boughtSold: "Bought", tradedPrice: "2.00" }))).toBe("+500");
  });

  it("should debit a sale below mid", () => {
    expect(computePnl(traded({ boughtSold: "Sold", tradedPrice: "2.00" }))).toBe("-500");
  });

  it("should group thousands", () => {
    const row = traded({ mid: "12.75", boughtSold: "Bought", tradedPrice: "0.25", size: "1000" });
    expect(computePnl(row)).toBe("+1,250,000");
  });

  it("should be blank until traded with a price and direction", () => {
    expect(computePnl(traded({ traded: "No", boughtSold: "Bought", tradedPrice: "2" }))).toBe("");
    expect(computePnl(traded({ boughtSold: "", tradedPrice: "2" }))).toBe("");
    expect(computePnl(traded({ boughtSold: "Bought", tradedPrice: "" }))).toBe("");
    expect(computePnl(traded({ boughtSold: "Bought", tradedPrice: "abc" }))).toBe("");
  });
});

describe("OrderBlotter", () => {
  let blotter: OrderBlotter;

  beforeEach(() => {
    blotter = new OrderBlotter(memoryStore());
  });

  it("should assign ids and emit on add", () => {
    const onChange = vi.fn();
    blotter.on("changed", onChange);

    const row = blotter.add(ROW);

    expect(row.id).not.toBe("");
    expect(blotter.list()).toEqual([row]);
    expect(onChange).toHaveBeenCalledWith({ action: "added", id: row.id });
  });

  it("should apply only editable fields and recompute P&L", () => {
    const { id } = blotter.add(ROW);
    const onChange = vi.fn();
    blotter.on("changed", onChange);

    const updated = blotter.update(id, {
      traded: "Yes",
      boughtSold: "Sold",
      tradedPrice: "3.10",
      initiator: "JS",
    });

    expect(updated).toMatchObject({
      id,
      mid: "2.50",
      traded: "Yes",
      boughtSold: "Sold",
      tradedPrice: "3.10",
      initiator: "JS",
      pnl: "+600",
    });
    expect(blotter.list()[0]).toEqual(updated);
    expect(onChange).toHaveBeenCalledWith({ action: "updated", id });
  });

  it("should return null for an unknown id", () => {
    blotter.add(ROW);
    expect(blotter.update("missing", { size: "5" })).toBeNull();
  });

  it("should remove rows", () => {
    const a = blotter.add(ROW);
    const b = blotter.add({ ...ROW, underlying: "MSFT" });
    const onChange = vi.fn();
    blotter.on("changed", onChange);

    expect(blotter.remove(a.id)).toBe(true);
    expect(blotter.remove(a.id)).toBe(false);
    expect(blotter.list().map((r) => r.id)).toEqual([b.id]);
    expect(onChange).toHaveBeenCalledTimes(1);
  });

  it("should skip malformed stored rows", () => {
    const seeded = new OrderBlotter(memoryStore([{ id: "bad", bid: 12 }]));
    expect(seeded.list()).toEqual([]);
  });
});

describe("OrderBlotter with records from other writers", () => {
  const seed = (): OrderRecord[] => [
    { ...ROW, id: "a1", deskNote: "keep me" },
    { id: "legacy-1", note: "old format" },
  ];

  it("should keep unknown fields and rows when editing", () => {
    const store = memoryStore(seed());
    const updated = new OrderBlotter(store).update("a1", { initiator: "JS" });

    expect(updated?.initiator).toBe("JS");
    const saved = store.load();
    expect(saved.map((r) => r.id)).toEqual(["a1", "legacy-1"]);
    expect(saved[0]).toMatchObject({ id: "a1", initiator: "JS", deskNote: "keep me" });
    expect(saved[1]).toEqual({ id: "legacy-1", note: "old format" });
  });

  it("should keep foreign rows when adding and removing", () => {
    const store = memoryStore(seed());
    const blotter = new OrderBlotter(store);

    const added = blotter.add({ ...ROW, underlying: "MSFT" });
    expect(store.load().map((r) => r.id)).toEqual(["a1", "legacy-1", added.id]);

    expect(blotter.remove("a1")).toBe(true);
    expect(store.load()).toEqual([
      { id: "legacy-1", note: "old format" },
      expect.objectContaining({ id: added.id, underlying: "MSFT" }),
    ]);
    expect(blotter.list().map((r) => r.id)).toEqual([added.id]);
  });

  it("should refuse to edit a row it cannot read", () => {
    const store = memoryStore(seed());
    expect(() => new OrderBlotter(store).update("legacy-1", { size: "5" })).toThrow(
      "Stored order legacy-1 is not a valid blotter row"
    );
    expect(store.load()).toEqual(seed());
  });
});

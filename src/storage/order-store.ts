/**
 * Order blotter persistence: JSON file storage
 *
 * Stores every blotter row in one file as { "orders": [...] }.
 * Writes go to a temp file beside the target, then rename over it.
 * A missing or corrupt file reads as an empty blotter.
 * Concurrent writers: last write wins.
 */

import fs from "fs";
import path from "path";
import { z } from "zod";
import { componentLogger } from "../utils/logger.js";
import { generateId } from "../utils/validation.js";

const log = componentLogger("order-store");

// ── Schema ──────────────────────────────────────────────────

export const OrderRecordSchema = z.object({ id: z.string().min(1) }).passthrough();

export type OrderRecord = z.infer<typeof OrderRecordSchema>;

const OrdersFileSchema = z.object({
  orders: z.array(OrderRecordSchema).default([]),
});

/** Full-replace persistence of an ordered list of records */
export interface OrderStore {
  load(): OrderRecord[];
  save(orders: readonly OrderRecord[]): void;
}

// ── Public API ──────────────────────────────────────────────

export function loadOrders(file: string): OrderRecord[] {
  if (!fs.existsSync(file)) return [];
  try {
    const raw = fs.readFileSync(file, "utf-8");
    return OrdersFileSchema.parse(JSON.parse(raw)).orders;
  } catch (err) {
    log.warn(`Unreadable order file ${file}, starting empty`, { error: String(err) });
    return [];
  }
}

/**
 * Replace the whole file. Writes a temp file beside the target, then renames.
 */
export function saveOrders(orders: readonly OrderRecord[], file: string): void {
  const dir = path.dirname(file);
  fs.mkdirSync(dir, { recursive: true });

  const tmpFile = path.join(dir, `.orders_${generateId()}.tmp`);
  try {
    fs.writeFileSync(tmpFile, JSON.stringify({ orders }, null, 2), "utf-8");
    fs.renameSync(tmpFile, file);
  } catch (err) {
    fs.rmSync(tmpFile, { force: true });
    throw err;
  }
}

export function addOrder(order: OrderRecord, file: string): OrderRecord[] {
  const orders = loadOrders(file);
  orders.push(order);
  saveOrders(orders, file);
  return orders;
}

/** Merge `updates` into the record with `id`; unknown ids change nothing */
export function updateOrder(
  id: string,
  updates: Record<string, unknown>,
  file: string
): OrderRecord[] {
  const orders = loadOrders(file).map(
    (order): OrderRecord => (order.id === id ? { ...order, ...updates, id } : order)
  );
  saveOrders(orders, file);
  return orders;
}

export function deleteOrder(id: string, file: string): OrderRecord[] {
  const orders = loadOrders(file).filter((order) => order.id !== id);
  saveOrders(orders, file);
  return orders;
}

/** OrderStore backed by a JSON file */
export function jsonOrderStore(file: string): OrderStore {
  return {
    load: () => loadOrders(file),
    save: (orders) => saveOrders(orders, file),
  };
}

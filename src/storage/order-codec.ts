/**
 * JSON-safe form of a ParsedOrder, used to hand parsed orders to a UI and
 * to recall them later. Expiries travel as ISO dates.
 */

import { z } from "zod";
import { formatIsoDate, parseIsoDate } from "../parser/expiry.js";
import type { OptionLeg, ParsedOrder } from "../types/options.js";
import { InvalidOrderError } from "../utils/errors.js";

const IsoDateSchema = z.string().refine((v) => parseIsoDate(v) !== null, {
  message: "Expected a YYYY-MM-DD date",
});

export const SerializedLegSchema = z.object({
  underlying: z.string().min(1),
  expiry: IsoDateSchema,
  strike: z.number().positive(),
  optionType: z.enum(["call", "put"]),
  side: z.enum(["buy", "sell"]),
  quantity: z.number().int().positive(),
  ratio: z.number().int().positive().default(1),
});

export const SerializedOrderSchema = z.object({
  underlying: z.string().min(1),
  structureName: z.string(),
  structureDescription: z.string().default(""),
  legs: z.array(SerializedLegSchema).min(1),
  stockRef: z.number(),
  delta: z.number(),
  price: z.number(),
  quoteSide: z.enum(["bid", "offer"]),
  quantity: z.number().int().nonnegative(),
  rawText: z.string().default(""),
});

export type SerializedLeg = z.infer<typeof SerializedLegSchema>;
export type SerializedOrder = z.infer<typeof SerializedOrderSchema>;

export function serializeParsedOrder(order: ParsedOrder): SerializedOrder {
  return {
    underlying: order.underlying,
    structureName: order.structure.name,
    structureDescription: order.structure.description,
    legs: order.structure.legs.map((leg) => ({
      underlying: leg.underlying,
      expiry: formatIsoDate(leg.expiry),
      strike: leg.strike,
      optionType: leg.optionType,
      side: leg.side,
      quantity: leg.quantity,
      ratio: leg.ratio,
    })),
    stockRef: order.stockRef,
    delta: order.delta,
    price: order.price,
    quoteSide: order.quoteSide,
    quantity: order.quantity,
    rawText: order.rawText,
  };
}

/**
 * Rebuild a ParsedOrder from its serialized form.
 * @throws InvalidOrderError when the record does not match the schema
 */
export function deserializeParsedOrder(data: unknown): ParsedOrder {
  const result = SerializedOrderSchema.safeParse(data);
  if (!result.success) {
    const issues = result.error.issues
      .map((i) => `${i.path.join(".")}: ${i.message}`)
      .join("; ");
    throw new InvalidOrderError(`Invalid serialized order: ${issues}`);
  }

  const record = result.data;
  const legs: OptionLeg[] = record.legs.map((leg) => {
    const expiry = parseIsoDate(leg.expiry);
    if (!expiry) throw new InvalidOrderError(`Invalid expiry: ${leg.expiry}`);
    return Object.freeze({ ...leg, expiry });
  });

  return Object.freeze({
    underlying: record.underlying,
    structure: Object.freeze({
      name: record.structureName,
      legs: Object.freeze(legs),
      description: record.structureDescription,
    }),
    stockRef: record.stockRef,
    delta: record.delta,
    price: record.price,
    quoteSide: record.quoteSide,
    quantity: record.quantity,
    rawText: record.rawText,
  });
}

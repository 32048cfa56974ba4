/**
 * Input validation utilities.
 */

import { z } from "zod";

/** Validate a stock ticker symbol (any case; normalized to upper) */
export const TickerSchema = z
  .string()
  .trim()
  .min(1)
  .max(10)
  .regex(/^[A-Za-z.]{1,10}$/, "Ticker must be 1-10 letters")
  .transform((t) => t.toUpperCase());

/** Body of POST /api/option_quotes */
export const OptionQuotesRequestSchema = z.object({
  underlying: TickerSchema,
  legs: z.array(
    z.object({
      expiry: z.string().default(""),
      strike: z.coerce.number().nonnegative().default(0),
      option_type: z.enum(["call", "put"]).default("call"),
    })
  ),
});

/** Body of POST /api/parse and POST /api/price */
export const OrderTextSchema = z.object({
  text: z.string(),
});

/** Body of POST /api/orders */
export const NewOrderRequestSchema = OrderTextSchema.extend({
  side: z.enum(["bid", "offer"]).optional(),
  size: z.coerce.number().int().positive().optional(),
  createdBy: z.string().max(64).optional(),
});

/** Generate a unique correlation ID */
export function generateId(): string {
  return `${Date.now()}-${Math.random().toString(36).slice(2, 9)}`;
}

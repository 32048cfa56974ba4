/**
 * Centralized configuration loaded from environment variables.
 * Uses zod for runtime validation.
 */

import os from "os";
import path from "path";
import { z } from "zod";
import dotenv from "dotenv";

dotenv.config();

const DEFAULT_ORDERS_FILE = path.join(os.homedir(), ".options_pricer", "orders.json");

const ConfigSchema = z.object({
  // HTTP bridge
  host: z.string().default("127.0.0.1"),
  port: z.coerce.number().int().positive().default(8195),

  // Order blotter
  ordersFile: z.string().min(1).default(DEFAULT_ORDERS_FILE),

  // Pricing
  pricing: z.object({
    riskFreeRate: z.coerce.number().default(0.05),
    dividendYield: z.coerce.number().default(0),
  }),

  // System
  logLevel: z.enum(["debug", "info", "warn", "error"]).default("info"),
  nodeEnv: z.enum(["development", "production", "test"]).default("development"),
});

export type Config = z.infer<typeof ConfigSchema>;

function loadConfig(): Config {
  const raw = {
    host: process.env.HOST,
    port: process.env.PORT,
    ordersFile: process.env.ORDERS_FILE,
    pricing: {
      riskFreeRate: process.env.RISK_FREE_RATE,
      dividendYield: process.env.DIVIDEND_YIELD,
    },
    logLevel: process.env.LOG_LEVEL,
    nodeEnv: process.env.NODE_ENV,
  };

  return ConfigSchema.parse(raw);
}

/** Singleton config instance */
export const config = loadConfig();

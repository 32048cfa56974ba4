/**
 * Options pricer: entry point.
 *
 * Serves the pricing bridge on HOST:PORT with the mock market-data provider
 * and a JSON-file blotter at ORDERS_FILE.
 */

import { MockMarketDataProvider } from "./api/market-data/mock.js";
import { config } from "./config/index.js";
import { createApp } from "./server.js";
import { OrderBlotter } from "./storage/blotter.js";
import { jsonOrderStore } from "./storage/order-store.js";
import { logger } from "./utils/logger.js";

function main(): void {
  logger.info(`Environment: ${config.nodeEnv}`);

  const provider = new MockMarketDataProvider({
    riskFreeRate: config.pricing.riskFreeRate,
    dividendYield: config.pricing.dividendYield,
  });
  const blotter = new OrderBlotter(jsonOrderStore(config.ordersFile));

  blotter.on("changed", ({ action, id }) => {
    logger.debug(`Blotter ${action}: ${id}`);
  });

  const app = createApp({ provider, blotter });
  const server = app.listen(config.port, config.host, () => {
    logger.info(`Pricing bridge on http://${config.host}:${config.port} (${provider.mode} data)`);
    logger.info(`Blotter file: ${config.ordersFile}`);
  });

  // ── Graceful Shutdown ─────────────────────────────────────
  const shutdown = (signal: string) => {
    logger.info(`Received ${signal}, shutting down...`);
    server.close(() => process.exit(0));
  };

  process.on("SIGINT", () => shutdown("SIGINT"));
  process.on("SIGTERM", () => shutdown("SIGTERM"));
}

main();

#!/usr/bin/env node

import { setTimeout as sleep } from "node:timers/promises";
import { createCartModule } from "../modules/cart/cart.index.js";
import { createCatalogModule } from "../modules/catalog/catalog.index.js";
import {
  createCheckoutModule,
  createPaymentGatewayAdapter,
} from "../modules/checkout/checkout.index.js";
import { loadConfig } from "../modules/shared/infra/config.js";
import { createDb } from "../modules/shared/infra/db.js";
import { createLogger } from "../modules/shared/infra/logger.js";

const config = loadConfig();
const logger = createLogger({
  level: config.logLevel,
  pretty: !config.isProduction,
});

main().catch((err) => {
  logger.error({ err }, "reservation-sweeper error");
  process.exit(1);
});

/**
 * Releases reservations held by checkout attempts that stopped moving
 * (crashed process, dropped request). Runs until SIGINT or SIGTERM.
 */
async function main() {
  const db = createDb(config.databaseUrl);
  const catalogPort = createCatalogModule({ db, logger });
  const checkout = createCheckoutModule({
    cartPort: createCartModule({ catalogPort, db, logger }),
    payment: createPaymentGatewayAdapter({
      baseUrl: config.paymentGatewayUrl,
      logger,
    }),
    settings: {
      paymentTimeoutMs: config.paymentTimeoutMs,
      recordCancelledOrders: config.recordCancelledOrders,
    },
    db,
    logger,
  });

  const controller = new AbortController();
  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.once(signal, () => controller.abort());
  }

  while (!controller.signal.aborted) {
    const olderThan = new Date(Date.now() - config.reservationStaleAfterMs);
    const recovered = await checkout.recoverStaleAttempts({ olderThan });
    if (recovered > 0) {
      logger.info({ recovered }, "reservation-sweeper recovered attempts");
    }

    try {
      await sleep(config.sweepIntervalMs, undefined, {
        signal: controller.signal,
      });
    } catch (error) {
      if (!controller.signal.aborted) throw error;
    }
  }

  logger.info("reservation-sweeper stopped");
  await db.destroy();
}

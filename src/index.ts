import { serve } from "@hono/node-server";
import { Hono } from "hono";
import { createCartModule } from "./modules/cart/cart.index.js";
import { createCatalogModule } from "./modules/catalog/catalog.index.js";
import {
  createCheckoutHttpAdapter,
  createCheckoutModule,
  createPaymentGatewayAdapter,
} from "./modules/checkout/checkout.index.js";
import {
  createOrderHttpAdapter,
  createOrderModule,
} from "./modules/order/order.index.js";
import { loadConfig } from "./modules/shared/infra/config.js";
import { createDb } from "./modules/shared/infra/db.js";
import { createLogger } from "./modules/shared/infra/logger.js";

const config = loadConfig();
const logger = createLogger({
  level: config.logLevel,
  pretty: !config.isProduction,
});
const db = createDb(config.databaseUrl);

const app = new Hono();

app.get("/", (c) => {
  return c.text("OK");
});

/**
 * Order module starts here
 */
const orderPort = createOrderModule({ db, logger });
app.route("", createOrderHttpAdapter({ orderPort, logger }));

/**
 * Checkout module starts here
 */
const catalogPort = createCatalogModule({ db, logger });
const checkoutPort = createCheckoutModule({
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
app.route("", createCheckoutHttpAdapter({ checkoutPort, logger }));

serve(
  {
    fetch: app.fetch,
    port: config.port,
  },
  (info) => {
    logger.info({ port: info.port }, `Server is running on http://localhost:${info.port}`);
  },
);

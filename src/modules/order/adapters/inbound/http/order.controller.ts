/**
 * Order HTTP Controller - Inbound adapter for HTTP requests
 * Translates HTTP requests to use case calls
 */

import { Hono } from "hono";
import { createContextMiddleware } from "../../../../shared/hono/context-middleware.js";
import type { Logger } from "../../../../shared/infra/logger.js";
import type { OrderPort } from "../../../application/ports/inbound/order.port.js";
import { InvalidTransitionError, OrderNotFoundError } from "../../../errors.js";

export function createOrderController({
  orderPort,
  logger,
}: {
  orderPort: OrderPort;
  logger: Logger;
}) {
  const app = new Hono();
  app.use(createContextMiddleware());

  app.get("/api/orders/:orderId", async (c) => {
    const orderId = c.req.param("orderId");
    try {
      const result = await orderPort.findById(orderId);
      return c.json(result);
    } catch (error) {
      if (error instanceof OrderNotFoundError) {
        return c.json({ message: "Order not found" }, 404);
      }
      logger.error({ error }, "getOrderById");
      return c.json({ message: "Failed to get order" }, 500);
    }
  });

  app.get("/api/customers/:customerId/orders", async (c) => {
    const customerId = c.req.param("customerId");
    try {
      const result = await orderPort.findByCustomer(customerId);
      return c.json(result);
    } catch (error) {
      logger.error({ error }, "getOrdersByCustomer");
      return c.json({ message: "Failed to get orders" }, 500);
    }
  });

  app.post("/api/orders/:orderId/cancel", async (c) => {
    const orderId = c.req.param("orderId");
    try {
      const result = await orderPort.cancel(orderId);
      return c.json(result);
    } catch (error) {
      if (error instanceof OrderNotFoundError) {
        return c.json({ message: "Order not found" }, 404);
      }
      if (error instanceof InvalidTransitionError) {
        return c.json({ message: "Order cannot be cancelled" }, 409);
      }
      logger.error({ error }, "cancelOrder");
      return c.json({ message: "Failed to cancel order" }, 500);
    }
  });

  return app;
}

/**
 * Checkout HTTP Controller - Inbound adapter for HTTP requests
 * Translates HTTP requests to use case calls
 */

import { Hono } from "hono";
import type { ContentfulStatusCode } from "hono/utils/http-status";
import { z } from "zod";
import { createContextMiddleware } from "../../../../shared/hono/context-middleware.js";
import type { Logger } from "../../../../shared/infra/logger.js";
import type { CheckoutPort } from "../../../application/ports/inbound/checkout.port.js";
import type { ReleaseReason } from "../../../domain/checkout-attempt.entity.js";
import type { CheckoutOutcome } from "../../../domain/checkout-outcome.js";
import { CheckoutInvalidInputError } from "../../../errors.js";

const CheckoutBodySchema = z.object({
  shippingAddress: z.string().min(1).optional(),
  paymentMethod: z.string().min(1).optional(),
});

export function createCheckoutController({
  checkoutPort,
  logger,
}: {
  checkoutPort: CheckoutPort;
  logger: Logger;
}) {
  const app = new Hono();
  app.use(createContextMiddleware());

  app.post("/api/customers/:customerId/checkouts", async (c) => {
    const customerId = c.req.param("customerId");
    const idempotencyKey = c.req.header("Idempotency-Key");
    if (!idempotencyKey) {
      return c.json({ message: "Idempotency-Key header is required" }, 400);
    }
    try {
      const text = await c.req.text();
      const body = CheckoutBodySchema.safeParse(
        text.trim() === "" ? {} : JSON.parse(text),
      );
      if (!body.success) {
        return c.json({ message: z.prettifyError(body.error) }, 400);
      }
      const outcome = await checkoutPort.checkout({
        ...body.data,
        idempotencyKey,
        customerId,
      });
      if (outcome.status === "Failed") {
        return c.json({ message: "Checkout failed" }, 500);
      }
      return c.json(outcome, statusFor(outcome));
    } catch (error) {
      if (error instanceof SyntaxError) {
        return c.json({ message: "Request body must be JSON" }, 400);
      }
      if (error instanceof CheckoutInvalidInputError) {
        return c.json({ message: error.message }, 400);
      }
      logger.error({ error }, "checkout");
      return c.json({ message: "Checkout failed" }, 500);
    }
  });

  return app;
}

function statusFor(outcome: CheckoutOutcome): ContentfulStatusCode {
  switch (outcome.status) {
    case "Placed":
      return 201;
    case "Released":
      return RELEASED_STATUS[outcome.reason];
    case "Rejected":
      return 422;
    case "InProgress":
      return 202;
    case "Failed":
      return 500;
  }
}

const RELEASED_STATUS = {
  InsufficientStock: 409,
  PaymentDeclined: 402,
  PaymentTimeout: 504,
  Abandoned: 409,
} as const satisfies Record<ReleaseReason, ContentfulStatusCode>;

/**
 * Checkout Module - Composition root
 * Wires together all the dependencies following hexagonal architecture
 */

import type { CartPort } from "../cart/cart.index.js";
import { createInventoryModule } from "../inventory/inventory.index.js";
import { createOrderRepository } from "../order/order.index.js";
import { getContext } from "../shared/hono/context-middleware.js";
import type { DatabaseExecutor } from "../shared/infra/db.js";
import type { Logger } from "../shared/infra/logger.js";
import { createCheckoutController } from "./adapters/inbound/http/checkout.controller.js";
import { createCheckoutAttemptRepository } from "./adapters/outbound/persistence/checkout-attempt.repository.js";
import { createCheckoutUnitOfWork } from "./adapters/outbound/persistence/checkout-unit-of-work.js";
import type { CheckoutPort } from "./application/ports/inbound/checkout.port.js";
import type { PaymentPort } from "./application/ports/outbound/payment.port.js";
import {
  createCheckoutService,
  type CheckoutSettings,
} from "./application/services/checkout.service.js";

/**
 * Creates the Checkout Port (application service).
 * The coordinator is the only writer of orders.
 */
export function createCheckoutModule({
  cartPort,
  payment,
  settings,
  db,
  logger,
}: {
  cartPort: CartPort;
  payment: PaymentPort;
  settings: CheckoutSettings;
  db: DatabaseExecutor;
  logger: Logger;
}): CheckoutPort {
  return createCheckoutService({
    attempts: createCheckoutAttemptRepository({ db, logger }),
    cart: cartPort,
    ledger: createInventoryModule({ db, logger }),
    orders: createOrderRepository({ db, logger }),
    payment,
    unitOfWork: createCheckoutUnitOfWork({ db, logger }),
    logger,
    getContext,
    settings,
  });
}

/**
 * Creates the Checkout HTTP Controller
 */
export function createCheckoutHttpAdapter({
  checkoutPort,
  logger,
}: {
  checkoutPort: CheckoutPort;
  logger: Logger;
}) {
  return createCheckoutController({ checkoutPort, logger });
}

export { createPaymentGatewayAdapter } from "./adapters/outbound/services/payment-gateway.adapter.js";
export type { CheckoutPort } from "./application/ports/inbound/checkout.port.js";
export type {
  PaymentPort,
  PaymentResult,
} from "./application/ports/outbound/payment.port.js";
export type { CheckoutSettings } from "./application/services/checkout.service.js";
export type {
  CheckoutInput,
  CheckoutState,
} from "./domain/checkout-attempt.entity.js";
export type {
  CheckoutOutcome,
  RejectReason,
} from "./domain/checkout-outcome.js";

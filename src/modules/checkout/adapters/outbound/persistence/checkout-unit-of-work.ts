/**
 * Checkout Unit of Work Adapter - Builds every store the finishing writes touch on one transaction
 */

import { createCartRepository } from "../../../../cart/cart.index.js";
import { createInventoryModule } from "../../../../inventory/inventory.index.js";
import { createOrderRepository } from "../../../../order/order.index.js";
import {
  inTransaction,
  type DatabaseExecutor,
} from "../../../../shared/infra/db.js";
import type { Logger } from "../../../../shared/infra/logger.js";
import type { CheckoutUnitOfWorkPort } from "../../../application/ports/outbound/checkout-unit-of-work.port.js";
import { createCheckoutAttemptRepository } from "./checkout-attempt.repository.js";

export function createCheckoutUnitOfWork({
  db,
  logger,
}: {
  db: DatabaseExecutor;
  logger: Logger;
}): CheckoutUnitOfWorkPort {
  return {
    run: (work) =>
      inTransaction(db, (trx) =>
        work({
          attempts: createCheckoutAttemptRepository({ db: trx, logger }),
          ledger: createInventoryModule({ db: trx, logger }),
          orders: createOrderRepository({ db: trx, logger }),
          cart: createCartRepository({ db: trx, logger }),
        }),
      ),
  };
}

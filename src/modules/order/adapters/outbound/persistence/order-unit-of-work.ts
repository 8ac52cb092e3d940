/**
 * Order Unit of Work Adapter - Builds the order and stock adapters on one transaction
 */

import { createInventoryModule } from "../../../../inventory/inventory.index.js";
import {
  inTransaction,
  type DatabaseExecutor,
} from "../../../../shared/infra/db.js";
import type { Logger } from "../../../../shared/infra/logger.js";
import type { OrderUnitOfWorkPort } from "../../../application/ports/outbound/order-unit-of-work.port.js";
import { createStockRestockAdapter } from "../services/stock-restock.adapter.js";
import { createOrderRepository } from "./order.repository.js";

export function createOrderUnitOfWork({
  db,
  logger,
}: {
  db: DatabaseExecutor;
  logger: Logger;
}): OrderUnitOfWorkPort {
  return {
    run: (work) =>
      inTransaction(db, (trx) =>
        work({
          orders: createOrderRepository({ db: trx, logger }),
          stock: createStockRestockAdapter(
            createInventoryModule({ db: trx, logger }),
          ),
        }),
      ),
  };
}

/**
 * Order Module - Composition root
 * Wires together all the dependencies following hexagonal architecture
 */

import type { DatabaseExecutor } from "../shared/infra/db.js";
import type { Logger } from "../shared/infra/logger.js";
import { createOrderController } from "./adapters/inbound/http/order.controller.js";
import { createOrderUnitOfWork } from "./adapters/outbound/persistence/order-unit-of-work.js";
import { createOrderRepository } from "./adapters/outbound/persistence/order.repository.js";
import type { OrderPort } from "./application/ports/inbound/order.port.js";
import { createOrderService } from "./application/services/order.service.js";

/**
 * Creates the Order Port (application service)
 */
export function createOrderModule({
  db,
  logger,
}: {
  db: DatabaseExecutor;
  logger: Logger;
}): OrderPort {
  return createOrderService({
    repository: createOrderRepository({ db, logger }),
    unitOfWork: createOrderUnitOfWork({ db, logger }),
  });
}

/**
 * Creates the Order HTTP Controller
 */
export function createOrderHttpAdapter({
  orderPort,
  logger,
}: {
  orderPort: OrderPort;
  logger: Logger;
}) {
  return createOrderController({ orderPort, logger });
}

// The Order Store itself; checkout writes orders through it inside its own transactions.
export { createOrderRepository } from "./adapters/outbound/persistence/order.repository.js";
export type { OrderPort } from "./application/ports/inbound/order.port.js";
export type { OrderRepositoryPort } from "./application/ports/outbound/order-repository.port.js";
export {
  buildOrder,
  type OrderEntity,
  type OrderLine,
  type OrderStatus,
} from "./domain/order.entity.js";

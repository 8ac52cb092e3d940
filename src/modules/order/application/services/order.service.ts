/**
 * Order Application Service - Implements the inbound port (use cases)
 */

import { OrderNotFoundError } from "../../errors.js";
import type { OrderPort } from "../ports/inbound/order.port.js";
import type { OrderRepositoryPort } from "../ports/outbound/order-repository.port.js";
import type { OrderUnitOfWorkPort } from "../ports/outbound/order-unit-of-work.port.js";

type Dependencies = {
  repository: OrderRepositoryPort;
  unitOfWork: OrderUnitOfWorkPort;
};

export function createOrderService(deps: Dependencies): OrderPort {
  return {
    findById: createFindOrderByIdUseCase(deps),
    findByCustomer: createFindOrdersByCustomerUseCase(deps),
    cancel: createCancelOrderUseCase(deps),
  };
}

function createFindOrderByIdUseCase({
  repository,
}: Pick<Dependencies, "repository">) {
  return async (orderId: string) => {
    const order = await repository.findById(orderId);
    if (!order) throw new OrderNotFoundError(orderId);
    return order;
  };
}

function createFindOrdersByCustomerUseCase({
  repository,
}: Pick<Dependencies, "repository">) {
  return async (customerId: string) => {
    return await repository.findByCustomer(customerId);
  };
}

/**
 * Order-level cancellation: independent of reservation tickets, which are
 * terminal by the time an order exists. The restock is keyed by order id.
 */
function createCancelOrderUseCase({
  unitOfWork,
}: Pick<Dependencies, "unitOfWork">) {
  return async (orderId: string) => {
    return await unitOfWork.run(async ({ orders, stock }) => {
      const order = await orders.cancel(orderId);
      await stock.restock(order.id, order.lines);
      return order;
    });
  };
}

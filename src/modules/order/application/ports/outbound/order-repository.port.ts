/**
 * Outbound Port - Order Store persistence
 */

import type { OrderEntity } from "../../../domain/order.entity.js";

export interface OrderRepositoryPort {
  /**
   * Writes the order and its lines atomically.
   * @throws DuplicateOrderError if the id is taken
   */
  save(order: OrderEntity): Promise<OrderEntity>;

  /**
   * Placed -> Cancelled, the only mutation an order allows.
   * @throws OrderNotFoundError
   * @throws InvalidTransitionError if already Cancelled
   */
  cancel(orderId: string): Promise<OrderEntity>;

  findById(orderId: string): Promise<OrderEntity | undefined>;
  findByCustomer(customerId: string): Promise<OrderEntity[]>;
}

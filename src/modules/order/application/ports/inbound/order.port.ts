/**
 * Inbound Port - What the Order module offers to the outside world
 */

import type { OrderEntity } from "../../../domain/order.entity.js";

export interface OrderPort {
  /**
   * @throws OrderNotFoundError if the order doesn't exist
   */
  findById(orderId: string): Promise<OrderEntity>;

  /**
   * Newest first.
   */
  findByCustomer(customerId: string): Promise<OrderEntity[]>;

  /**
   * Cancels a Placed order and puts its quantities back in stock, atomically.
   * @throws OrderNotFoundError
   * @throws InvalidTransitionError if already Cancelled
   */
  cancel(orderId: string): Promise<OrderEntity>;
}

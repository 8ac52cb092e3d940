/**
 * Outbound Port - What the Checkout module needs from the Order Store
 */

import type { OrderEntity } from "../../../../order/order.index.js";

export interface OrderStorePort {
  save(order: OrderEntity): Promise<OrderEntity>;
  findById(orderId: string): Promise<OrderEntity | undefined>;
}

/**
 * Order Module Public API
 */
export {
  buildOrder,
  createOrderHttpAdapter,
  createOrderModule,
  createOrderRepository,
  type OrderEntity,
  type OrderLine,
  type OrderPort,
  type OrderRepositoryPort,
  type OrderStatus,
} from "./order.module.js";
export { DuplicateOrderError, OrderNotFoundError } from "./errors.js";

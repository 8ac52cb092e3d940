/**
 * Outbound Port - Runs order and stock writes in one transaction
 */

import type { OrderRepositoryPort } from "./order-repository.port.js";
import type { StockRestockPort } from "./stock-restock.port.js";

export type OrderTransactionContext = {
  orders: OrderRepositoryPort;
  stock: StockRestockPort;
};

export interface OrderUnitOfWorkPort {
  run<T>(work: (ctx: OrderTransactionContext) => Promise<T>): Promise<T>;
}

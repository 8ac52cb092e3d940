/**
 * Outbound Port - Runs the finishing writes of an attempt in one transaction
 */

import type { CartCleanupPort } from "./cart.port.js";
import type { CheckoutAttemptRepositoryPort } from "./checkout-attempt-repository.port.js";
import type { OrderStorePort } from "./order-store.port.js";
import type { StockReservationPort } from "./stock-reservation.port.js";

export type CheckoutTransactionContext = {
  attempts: CheckoutAttemptRepositoryPort;
  ledger: StockReservationPort;
  orders: OrderStorePort;
  cart: CartCleanupPort;
};

export interface CheckoutUnitOfWorkPort {
  run<T>(work: (ctx: CheckoutTransactionContext) => Promise<T>): Promise<T>;
}

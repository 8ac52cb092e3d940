/**
 * Cart Module Public API
 */
export {
  createCartModule,
  createCartRepository,
  type CartLine,
  type CartPort,
  type CartRepositoryPort,
  type CartSnapshot,
  type CartSnapshotLine,
} from "./cart.module.js";
export { EmptyCartError, InvalidLineError } from "./errors.js";

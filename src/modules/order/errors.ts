/**
 * Each module has one errors.ts file. All errors in the module are exported from here.
 */

export { InvalidTransitionError } from "../inventory/inventory.index.js";

export class DuplicateOrderError extends Error {
  constructor(orderId: string) {
    super(`Order already exists: ${orderId}`);
    this.name = "DuplicateOrderError";
  }
}

export class OrderNotFoundError extends Error {
  constructor(orderId: string) {
    super(`Order not found: ${orderId}`);
    this.name = "OrderNotFoundError";
  }
}

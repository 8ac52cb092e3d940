/**
 * Inbound Port - What the Cart module offers to checkout
 */

import type { CartSnapshot } from "../../../domain/cart.entity.js";

export interface CartPort {
  /**
   * Reads the customer's live cart and freezes it with current catalog prices.
   * @throws EmptyCartError if the cart has no lines
   * @throws InvalidLineError if a line has a bad quantity or unknown product
   */
  takeSnapshot(customerId: string): Promise<CartSnapshot>;
}

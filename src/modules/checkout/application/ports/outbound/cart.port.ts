/**
 * Outbound Ports - What the Checkout module needs from the Cart module
 */

import type { CartLine, CartSnapshot } from "../../../../cart/cart.index.js";

export interface CartSnapshotPort {
  takeSnapshot(customerId: string): Promise<CartSnapshot>;
}

export interface CartCleanupPort {
  removeCheckedOut(
    customerId: string,
    lines: readonly CartLine[],
  ): Promise<void>;
}

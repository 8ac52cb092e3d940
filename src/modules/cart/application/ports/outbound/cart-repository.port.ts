/**
 * Outbound Port - What the Cart module needs from persistence
 */

import type { CartLine } from "../../../domain/cart.entity.js";

export interface CartRepositoryPort {
  findLines(customerId: string): Promise<CartLine[]>;

  /**
   * Subtracts checked-out quantities from the live cart and drops lines that
   * reach zero. Items added after the snapshot are left alone.
   */
  removeCheckedOut(
    customerId: string,
    lines: readonly CartLine[],
  ): Promise<void>;
}

/**
 * Cart Repository Adapter - Reads and trims the live `cart_items` rows
 */

import {
  dbQuery,
  inTransaction,
  type DatabaseExecutor,
} from "../../../../shared/infra/db.js";
import type { Logger } from "../../../../shared/infra/logger.js";
import type { CartRepositoryPort } from "../../../application/ports/outbound/cart-repository.port.js";
import type { CartLine } from "../../../domain/cart.entity.js";

export function createCartRepository({
  db,
  logger,
}: {
  db: DatabaseExecutor;
  logger: Logger;
}): CartRepositoryPort {
  return {
    async findLines(customerId: string) {
      logger.info({ customerId }, "cart.repository.findLines");
      const rows = await dbQuery(
        () =>
          db
            .selectFrom("cart_items")
            .where("customer_id", "=", customerId)
            .select(["product_id", "quantity"])
            .orderBy("product_id")
            .execute(),
        `Failed to read cart for customer ${customerId}`,
      );
      return rows.map((row) => ({
        productId: row.product_id,
        quantity: row.quantity,
      }));
    },
    async removeCheckedOut(customerId: string, lines: readonly CartLine[]) {
      logger.info({ customerId, lines }, "cart.repository.removeCheckedOut");
      if (lines.length === 0) return;
      await inTransaction(db, async (trx) => {
        for (const line of lines) {
          await dbQuery(
            () =>
              trx
                .updateTable("cart_items")
                .set((eb) => ({
                  quantity: eb("quantity", "-", line.quantity),
                }))
                .where("customer_id", "=", customerId)
                .where("product_id", "=", line.productId)
                .execute(),
            `Failed to trim cart line ${line.productId} of ${customerId}`,
          );
        }
        await dbQuery(
          () =>
            trx
              .deleteFrom("cart_items")
              .where("customer_id", "=", customerId)
              .where("quantity", "<=", 0)
              .execute(),
          `Failed to drop emptied cart lines of ${customerId}`,
        );
      });
    },
  };
}

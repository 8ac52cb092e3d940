/**
 * Catalog Repository Adapter - Kysely reads over the `products` table
 */

import {
  dbQuery,
  type DatabaseExecutor,
} from "../../../../shared/infra/db.js";
import type { ProductsTable } from "../../../../shared/infra/db-schema.js";
import type { Logger } from "../../../../shared/infra/logger.js";
import type { CatalogPort } from "../../../application/ports/inbound/catalog.port.js";
import type { ProductEntity } from "../../../domain/product.entity.js";

export function createCatalogRepository({
  db,
  logger,
}: {
  db: DatabaseExecutor;
  logger: Logger;
}): CatalogPort {
  return {
    async getProduct(productId: string) {
      logger.info({ productId }, "catalog.repository.getProduct");
      const row = await dbQuery(
        () =>
          db
            .selectFrom("products")
            .where("id", "=", productId)
            .selectAll()
            .executeTakeFirst(),
        `Failed to read product ${productId}`,
      );
      return row ? mapToEntity(row) : undefined;
    },
    async getProducts(productIds: readonly string[]) {
      logger.info({ productIds }, "catalog.repository.getProducts");
      if (productIds.length === 0) return [];
      const rows = await dbQuery(
        () =>
          db
            .selectFrom("products")
            .where("id", "in", [...productIds])
            .selectAll()
            .orderBy("id")
            .execute(),
        "Failed to read products",
      );
      return rows.map(mapToEntity);
    },
  };
}

function mapToEntity(row: ProductsTable): ProductEntity {
  return {
    id: row.id,
    name: row.name,
    priceCents: row.price_cents,
    availableQuantity: row.available_quantity,
  };
}

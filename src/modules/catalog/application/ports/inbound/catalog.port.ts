/**
 * Inbound Port - Read-only view of the catalog offered to other modules.
 * Writes to products (admin editing) happen outside this service.
 */

import type { ProductEntity } from "../../../domain/product.entity.js";

export interface CatalogPort {
  /**
   * Returns `undefined` when the product does not exist.
   */
  getProduct(productId: string): Promise<ProductEntity | undefined>;

  getProducts(productIds: readonly string[]): Promise<ProductEntity[]>;
}

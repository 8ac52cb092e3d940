/**
 * Catalog Reader Adapter - Adapts the Catalog module's port to the Cart module's needs
 */

import type { CatalogPort } from "../../../../catalog/catalog.index.js";
import type { CatalogReaderPort } from "../../../application/ports/outbound/catalog-reader.port.js";

export function createCatalogReaderAdapter(
  catalogPort: CatalogPort,
): CatalogReaderPort {
  return {
    getProducts: async (productIds: readonly string[]) => {
      const products = await catalogPort.getProducts(productIds);
      return products.map(({ id, name, priceCents }) => ({
        id,
        name,
        priceCents,
      }));
    },
  };
}

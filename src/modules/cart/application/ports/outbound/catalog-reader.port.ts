/**
 * Outbound Port - What the Cart module needs from the Catalog module
 */

export type CatalogProduct = {
  id: string;
  name: string;
  priceCents: number;
};

export interface CatalogReaderPort {
  getProducts(productIds: readonly string[]): Promise<CatalogProduct[]>;
}

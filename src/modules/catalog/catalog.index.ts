/**
 * Catalog Module Public API
 */
export {
  createCatalogModule,
  type CatalogPort,
  type ProductEntity,
} from "./catalog.module.js";

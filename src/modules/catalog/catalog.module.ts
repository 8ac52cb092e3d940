/**
 * Catalog Module - Composition root
 */

import type { DatabaseExecutor } from "../shared/infra/db.js";
import type { Logger } from "../shared/infra/logger.js";
import { createCatalogRepository } from "./adapters/outbound/persistence/catalog.repository.js";
import type { CatalogPort } from "./application/ports/inbound/catalog.port.js";

export function createCatalogModule({
  db,
  logger,
}: {
  db: DatabaseExecutor;
  logger: Logger;
}): CatalogPort {
  return createCatalogRepository({ db, logger });
}

export type { CatalogPort } from "./application/ports/inbound/catalog.port.js";
export type { ProductEntity } from "./domain/product.entity.js";

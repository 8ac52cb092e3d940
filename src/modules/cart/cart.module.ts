/**
 * Cart Module - Composition root
 * Only the snapshot side of the cart lives here; editing the cart is another feature.
 */

import type { CatalogPort } from "../catalog/catalog.index.js";
import type { DatabaseExecutor } from "../shared/infra/db.js";
import type { Logger } from "../shared/infra/logger.js";
import { createCartRepository } from "./adapters/outbound/persistence/cart.repository.js";
import { createCatalogReaderAdapter } from "./adapters/outbound/services/catalog-reader.adapter.js";
import type { CartPort } from "./application/ports/inbound/cart.port.js";
import { createCartSnapshotService } from "./application/services/cart-snapshot.service.js";

export function createCartModule({
  catalogPort,
  db,
  logger,
}: {
  catalogPort: CatalogPort;
  db: DatabaseExecutor;
  logger: Logger;
}): CartPort {
  return createCartSnapshotService({
    repository: createCartRepository({ db, logger }),
    catalog: createCatalogReaderAdapter(catalogPort),
  });
}

export { createCartRepository } from "./adapters/outbound/persistence/cart.repository.js";
export type { CartPort } from "./application/ports/inbound/cart.port.js";
export type { CartRepositoryPort } from "./application/ports/outbound/cart-repository.port.js";
export type {
  CartLine,
  CartSnapshot,
  CartSnapshotLine,
} from "./domain/cart.entity.js";

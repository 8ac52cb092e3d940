/**
 * Cart Snapshot Service - Turns the mutable cart into an immutable, priced snapshot
 */

import { nowIso } from "../../../shared/infra/db.js";
import {
  CartLineSchema,
  type CartLine,
  type CartSnapshot,
  type CartSnapshotLine,
} from "../../domain/cart.entity.js";
import { EmptyCartError, InvalidLineError } from "../../errors.js";
import type { CartPort } from "../ports/inbound/cart.port.js";
import type { CartRepositoryPort } from "../ports/outbound/cart-repository.port.js";
import type { CatalogReaderPort } from "../ports/outbound/catalog-reader.port.js";

type Dependencies = {
  repository: CartRepositoryPort;
  catalog: CatalogReaderPort;
  now?: () => string;
};

export function createCartSnapshotService(deps: Dependencies): CartPort {
  return {
    async takeSnapshot(customerId: string) {
      const lines = await deps.repository.findLines(customerId);
      return await buildCartSnapshot({
        customerId,
        lines,
        catalog: deps.catalog,
        now: deps.now,
      });
    },
  };
}

/**
 * Pure read + transform: no writes happen here.
 */
export async function buildCartSnapshot({
  customerId,
  lines,
  catalog,
  now = nowIso,
}: {
  customerId: string;
  lines: readonly CartLine[];
  catalog: CatalogReaderPort;
  now?: () => string;
}): Promise<CartSnapshot> {
  if (lines.length === 0) {
    throw new EmptyCartError(`Cart is empty for customer ${customerId}`);
  }

  const quantities = new Map<string, number>();
  for (const line of lines) {
    const parsed = CartLineSchema.safeParse(line);
    if (!parsed.success) {
      throw new InvalidLineError(
        line.productId,
        `Invalid cart line for product ${line.productId}`,
      );
    }
    const { productId, quantity } = parsed.data;
    quantities.set(productId, (quantities.get(productId) ?? 0) + quantity);
  }

  const merged = [...quantities.entries()].sort(([a], [b]) =>
    compareIds(a, b),
  );
  const products = new Map(
    (await catalog.getProducts(merged.map(([productId]) => productId))).map(
      (p) => [p.id, p],
    ),
  );

  const snapshotLines: CartSnapshotLine[] = merged.map(
    ([productId, quantity]) => {
      const product = products.get(productId);
      if (!product) {
        throw new InvalidLineError(
          productId,
          `Product not found: ${productId}`,
        );
      }
      return {
        productId,
        name: product.name,
        quantity,
        unitPriceCents: product.priceCents,
        subtotalCents: product.priceCents * quantity,
      };
    },
  );

  return {
    customerId,
    takenAt: now(),
    lines: snapshotLines,
    totalCents: snapshotLines.reduce((sum, l) => sum + l.subtotalCents, 0),
  };
}

function compareIds(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

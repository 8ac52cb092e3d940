import { afterAll, beforeAll, describe, expect, it, vi } from "vitest";
import { createTestDb } from "../../../dev-tools/database/create-test-db.js";
import { seedTestDb } from "../../../dev-tools/database/seed-test-db.js";
import { createCatalogModule } from "../../catalog/catalog.index.js";
import type { DatabaseExecutor } from "../../shared/infra/db.js";
import type { Logger } from "../../shared/infra/logger.js";
import {
  createCartModule,
  createCartRepository,
  InvalidLineError,
} from "../cart.index.js";

describe("Cart Integration", () => {
  const logger: Logger = {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  };

  let db: DatabaseExecutor;
  let seed: ReturnType<typeof seedTestDb>;

  beforeAll(async () => {
    db = await createTestDb();
    seed = seedTestDb(db);
  });

  afterAll(async () => {
    await db.destroy();
  });

  it("should snapshot the live cart at catalog prices", async () => {
    const cart = createCartModule({
      catalogPort: createCatalogModule({ db, logger }),
      db,
      logger,
    });
    const product = await seed.createProduct({
      id: "p-cart-1",
      name: "Teapot",
      priceCents: 2000,
    });
    await seed.addToCart("customer-cart-1", product.id, 2);

    const snapshot = await cart.takeSnapshot("customer-cart-1");

    expect(snapshot.lines).toEqual([
      {
        productId: "p-cart-1",
        name: "Teapot",
        quantity: 2,
        unitPriceCents: 2000,
        subtotalCents: 4000,
      },
    ]);
    expect(snapshot.totalCents).toBe(4000);
  });

  it("should flag a cart line whose product no longer exists", async () => {
    const cart = createCartModule({
      catalogPort: createCatalogModule({ db, logger }),
      db,
      logger,
    });
    await seed.addToCart("customer-cart-2", "p-cart-gone", 1);

    await expect(cart.takeSnapshot("customer-cart-2")).rejects.toBeInstanceOf(
      InvalidLineError,
    );
  });

  it("should subtract checked-out quantities and drop emptied lines", async () => {
    const repository = createCartRepository({ db, logger });
    await seed.addToCart("customer-cart-3", "p-a", 2);
    await seed.addToCart("customer-cart-3", "p-b", 5);

    await repository.removeCheckedOut("customer-cart-3", [
      { productId: "p-a", quantity: 2 },
      { productId: "p-b", quantity: 3 },
    ]);

    expect(await repository.findLines("customer-cart-3")).toEqual([
      { productId: "p-b", quantity: 2 },
    ]);
  });
});

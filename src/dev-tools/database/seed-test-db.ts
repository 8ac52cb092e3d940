import { faker } from "@faker-js/faker";
import crypto from "node:crypto";
import { nowIso, type DatabaseExecutor } from "../../modules/shared/infra/db.js";

export function seedTestDb(db: DatabaseExecutor) {
  return {
    async createProduct({
      id = crypto.randomUUID(),
      name = faker.commerce.productName(),
      priceCents = faker.number.int({ min: 100, max: 10_000 }),
      availableQuantity = 10,
    }: {
      id?: string;
      name?: string;
      priceCents?: number;
      availableQuantity?: number;
    } = {}) {
      await db
        .insertInto("products")
        .values({
          id,
          name,
          price_cents: priceCents,
          available_quantity: availableQuantity,
          updated_at: nowIso(),
        })
        .execute();
      return { id, name, priceCents, availableQuantity };
    },

    async setPrice(productId: string, priceCents: number) {
      await db
        .updateTable("products")
        .set({ price_cents: priceCents, updated_at: nowIso() })
        .where("id", "=", productId)
        .execute();
    },

    async addToCart(customerId: string, productId: string, quantity: number) {
      await db
        .insertInto("cart_items")
        .values({
          customer_id: customerId,
          product_id: productId,
          quantity,
          added_at: nowIso(),
        })
        .onConflict((oc) =>
          oc.columns(["customer_id", "product_id"]).doUpdateSet((eb) => ({
            quantity: eb("cart_items.quantity", "+", quantity),
          })),
        )
        .execute();
    },

    async availableQuantity(productId: string) {
      const row = await db
        .selectFrom("products")
        .select("available_quantity")
        .where("id", "=", productId)
        .executeTakeFirstOrThrow();
      return row.available_quantity;
    },
  };
}

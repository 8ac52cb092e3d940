import { sql, type Kysely } from "kysely";

// Migrations are frozen in time, so they do not use the app's `DB` interface.
export async function up(db: Kysely<unknown>): Promise<void> {
  await db.schema
    .createTable("products")
    .ifNotExists()
    .addColumn("id", "text", (col) => col.notNull())
    .addColumn("name", "text", (col) => col.notNull())
    .addColumn("price_cents", "integer", (col) => col.notNull())
    .addColumn("available_quantity", "integer", (col) =>
      col.notNull().defaultTo(0),
    )
    .addColumn("updated_at", "text", (col) => col.notNull())
    .addPrimaryKeyConstraint("pk_products", ["id"])
    .addCheckConstraint(
      "ck_products_available_quantity",
      sql`available_quantity >= 0`,
    )
    .addCheckConstraint("ck_products_price_cents", sql`price_cents >= 0`)
    .execute();

  await db.schema
    .createTable("cart_items")
    .ifNotExists()
    .addColumn("customer_id", "text", (col) => col.notNull())
    .addColumn("product_id", "text", (col) => col.notNull())
    .addColumn("quantity", "integer", (col) => col.notNull())
    .addColumn("added_at", "text", (col) => col.notNull())
    .addPrimaryKeyConstraint("pk_cart_items", ["customer_id", "product_id"])
    .execute();
}

export async function down(db: Kysely<unknown>): Promise<void> {
  await db.schema.dropTable("cart_items").ifExists().execute();
  await db.schema.dropTable("products").ifExists().execute();
}

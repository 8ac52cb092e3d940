import type { Kysely } from "kysely";

export async function up(db: Kysely<unknown>): Promise<void> {
  await db.schema
    .createTable("orders")
    .ifNotExists()
    .addColumn("id", "text", (col) => col.notNull())
    .addColumn("customer_id", "text", (col) => col.notNull())
    .addColumn("ticket_id", "text", (col) => col.notNull())
    .addColumn("status", "text", (col) => col.notNull())
    .addColumn("total_cents", "integer", (col) => col.notNull())
    .addColumn("shipping_address", "text")
    .addColumn("payment_method", "text")
    .addColumn("ordered_at", "text", (col) => col.notNull())
    .addColumn("cancelled_at", "text")
    .addPrimaryKeyConstraint("pk_orders", ["id"])
    .execute();

  await db.schema
    .createIndex("idx_orders_customer")
    .on("orders")
    .columns(["customer_id", "ordered_at"])
    .execute();

  // Price at purchase lives here and is never updated.
  await db.schema
    .createTable("order_lines")
    .ifNotExists()
    .addColumn("order_id", "text", (col) => col.notNull())
    .addColumn("line_no", "integer", (col) => col.notNull())
    .addColumn("product_id", "text", (col) => col.notNull())
    .addColumn("quantity", "integer", (col) => col.notNull())
    .addColumn("unit_price_cents", "integer", (col) => col.notNull())
    .addColumn("subtotal_cents", "integer", (col) => col.notNull())
    .addPrimaryKeyConstraint("pk_order_lines", ["order_id", "line_no"])
    .execute();
}

export async function down(db: Kysely<unknown>): Promise<void> {
  await db.schema.dropTable("order_lines").ifExists().execute();
  await db.schema.dropIndex("idx_orders_customer").ifExists().execute();
  await db.schema.dropTable("orders").ifExists().execute();
}

import type { Kysely } from "kysely";

export async function up(db: Kysely<unknown>): Promise<void> {
  await db.schema
    .createTable("checkout_attempts")
    .ifNotExists()
    .addColumn("idempotency_key", "text", (col) => col.notNull())
    .addColumn("customer_id", "text", (col) => col.notNull())
    .addColumn("state", "text", (col) => col.notNull())
    .addColumn("ticket_id", "text")
    .addColumn("order_id", "text")
    .addColumn("outcome", "text")
    .addColumn("failed_product_id", "text")
    .addColumn("shipping_address", "text")
    .addColumn("payment_method", "text")
    .addColumn("created_at", "text", (col) => col.notNull())
    .addColumn("updated_at", "text", (col) => col.notNull())
    .addPrimaryKeyConstraint("pk_checkout_attempts", ["idempotency_key"])
    .execute();

  // The sweeper scans unfinished attempts by age.
  await db.schema
    .createIndex("idx_checkout_attempts_state_updated")
    .on("checkout_attempts")
    .columns(["state", "updated_at"])
    .execute();
}

export async function down(db: Kysely<unknown>): Promise<void> {
  await db.schema
    .dropIndex("idx_checkout_attempts_state_updated")
    .ifExists()
    .execute();
  await db.schema.dropTable("checkout_attempts").ifExists().execute();
}

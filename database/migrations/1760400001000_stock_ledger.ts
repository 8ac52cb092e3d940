import type { Kysely } from "kysely";

export async function up(db: Kysely<unknown>): Promise<void> {
  /**
   * ================================================
   * Reservations (tickets)
   * ================================================
   */
  await db.schema
    .createTable("reservations")
    .ifNotExists()
    .addColumn("id", "text", (col) => col.notNull())
    .addColumn("idempotency_key", "text", (col) => col.notNull())
    .addColumn("status", "text", (col) => col.notNull())
    .addColumn("total_cents", "integer", (col) => col.notNull())
    .addColumn("created_at", "text", (col) => col.notNull())
    .addColumn("updated_at", "text", (col) => col.notNull())
    .addColumn("archived_at", "text")
    .addPrimaryKeyConstraint("pk_reservations", ["id"])
    .addUniqueConstraint("uq_reservations_idempotency_key", [
      "idempotency_key",
    ])
    .execute();

  await db.schema
    .createTable("reservation_lines")
    .ifNotExists()
    .addColumn("reservation_id", "text", (col) => col.notNull())
    .addColumn("product_id", "text", (col) => col.notNull())
    .addColumn("quantity", "integer", (col) => col.notNull())
    .addColumn("unit_price_cents", "integer", (col) => col.notNull())
    .addPrimaryKeyConstraint("pk_reservation_lines", [
      "reservation_id",
      "product_id",
    ])
    .execute();

  /**
   * ================================================
   * Ledger entries (append-only)
   * ================================================
   */
  await db.schema
    .createTable("stock_ledger_entries")
    .ifNotExists()
    .addColumn("id", "text", (col) => col.notNull())
    .addColumn("product_id", "text", (col) => col.notNull())
    .addColumn("entry_type", "text", (col) => col.notNull())
    .addColumn("quantity_delta", "integer", (col) => col.notNull())
    .addColumn("balance_after", "integer")
    .addColumn("reference", "text", (col) => col.notNull())
    .addColumn("recorded_at", "text", (col) => col.notNull())
    .addPrimaryKeyConstraint("pk_stock_ledger_entries", ["id"])
    .execute();

  await db.schema
    .createIndex("idx_stock_ledger_entries_product")
    .on("stock_ledger_entries")
    .columns(["product_id", "recorded_at"])
    .execute();

  await db.schema
    .createIndex("idx_stock_ledger_entries_reference")
    .on("stock_ledger_entries")
    .columns(["reference", "entry_type"])
    .execute();
}

export async function down(db: Kysely<unknown>): Promise<void> {
  await db.schema
    .dropIndex("idx_stock_ledger_entries_reference")
    .ifExists()
    .execute();
  await db.schema
    .dropIndex("idx_stock_ledger_entries_product")
    .ifExists()
    .execute();
  await db.schema.dropTable("stock_ledger_entries").ifExists().execute();
  await db.schema.dropTable("reservation_lines").ifExists().execute();
  await db.schema.dropTable("reservations").ifExists().execute();
}

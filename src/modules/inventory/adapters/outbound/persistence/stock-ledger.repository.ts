/**
 * Stock Ledger Adapter - Kysely implementation of the ledger port
 *
 * Stock changes are conditional updates on the product row
 * (`available_quantity >= q`), so the check and the decrement are one
 * statement and the row stays locked until the transaction ends. Rows are
 * always touched in product id order.
 */

import crypto from "node:crypto";
import {
  dbQuery,
  inTransaction,
  nowIso,
  type DatabaseExecutor,
} from "../../../../shared/infra/db.js";
import type {
  ReservationsTable,
  StockLedgerEntriesTable,
} from "../../../../shared/infra/db-schema.js";
import type { Logger } from "../../../../shared/infra/logger.js";
import type { StockLedgerPort } from "../../../application/ports/inbound/stock-ledger.port.js";
import {
  TicketStatusSchema,
  type ReservationLine,
  type ReservationRequestLine,
  type ReservationTicket,
  type TicketStatus,
} from "../../../domain/reservation.entity.js";
import {
  LedgerEntryTypeSchema,
  type LedgerEntryType,
  type StockLedgerEntry,
} from "../../../domain/stock-ledger-entry.entity.js";
import {
  DuplicateRequestError,
  InsufficientStockError,
  InvalidTransitionError,
  UnknownTicketError,
} from "../../../errors.js";

type PendingEntry = {
  productId: string;
  type: LedgerEntryType;
  quantityDelta: number;
  balanceAfter: number | null;
};

export function createStockLedger({
  db,
  logger,
}: {
  db: DatabaseExecutor;
  logger: Logger;
}): StockLedgerPort {
  return {
    async reserve(lines, idempotencyKey) {
      logger.info({ idempotencyKey, lines }, "inventory.ledger.reserve");
      const merged = mergeLines(lines);

      return await inTransaction(db, async (trx) => {
        const existing = await findTicketRowByKey(trx, idempotencyKey);
        if (existing) {
          return await resolveExistingTicket(trx, existing);
        }

        const now = nowIso();
        const ticketId = crypto.randomUUID();
        // Claim the key first: a concurrent reserve with the same key waits
        // here and then sees the winner's ticket.
        const claimed = await dbQuery(
          () =>
            trx
              .insertInto("reservations")
              .values({
                id: ticketId,
                idempotency_key: idempotencyKey,
                status: TicketStatusSchema.enum.Pending,
                total_cents: 0,
                created_at: now,
                updated_at: now,
                archived_at: null,
              })
              .onConflict((oc) => oc.column("idempotency_key").doNothing())
              .returning("id")
              .executeTakeFirst(),
          `Failed to claim reservation key ${idempotencyKey}`,
        );
        if (!claimed) {
          const winner = await findTicketRowByKey(trx, idempotencyKey);
          if (!winner) {
            throw new Error(
              `Reservation for key ${idempotencyKey} vanished after conflict`,
            );
          }
          return await resolveExistingTicket(trx, winner);
        }

        const reserved: ReservationLine[] = [];
        const entries: PendingEntry[] = [];
        for (const line of merged) {
          const updated = await dbQuery(
            () =>
              trx
                .updateTable("products")
                .set((eb) => ({
                  available_quantity: eb(
                    "available_quantity",
                    "-",
                    line.quantity,
                  ),
                }))
                .where("id", "=", line.productId)
                .where("available_quantity", ">=", line.quantity)
                .returning(["available_quantity", "price_cents"])
                .executeTakeFirst(),
            `Failed to reserve stock of product ${line.productId}`,
          );
          if (!updated) {
            const available = await readAvailableQuantity(trx, line.productId);
            // Throwing rolls back every decrement above and the ticket row.
            throw new InsufficientStockError({
              productId: line.productId,
              requested: line.quantity,
              available: available ?? 0,
            });
          }
          reserved.push({
            productId: line.productId,
            quantity: line.quantity,
            unitPriceCents: updated.price_cents,
          });
          entries.push({
            productId: line.productId,
            type: "StockReserved",
            quantityDelta: -line.quantity,
            balanceAfter: updated.available_quantity,
          });
        }

        const totalCents = reserved.reduce(
          (sum, l) => sum + l.quantity * l.unitPriceCents,
          0,
        );
        await dbQuery(
          () =>
            trx
              .insertInto("reservation_lines")
              .values(
                reserved.map((l) => ({
                  reservation_id: ticketId,
                  product_id: l.productId,
                  quantity: l.quantity,
                  unit_price_cents: l.unitPriceCents,
                })),
              )
              .execute(),
          `Failed to write lines of reservation ${ticketId}`,
        );
        await dbQuery(
          () =>
            trx
              .updateTable("reservations")
              .set({ total_cents: totalCents })
              .where("id", "=", ticketId)
              .execute(),
          `Failed to write total of reservation ${ticketId}`,
        );
        await recordEntries(trx, ticketId, entries, now);

        logger.info(
          { idempotencyKey, ticketId, totalCents },
          "inventory.ledger.reserved",
        );
        return {
          id: ticketId,
          idempotencyKey,
          status: TicketStatusSchema.enum.Pending,
          lines: reserved,
          totalCents,
          createdAt: now,
          updatedAt: now,
          archivedAt: null,
        };
      });
    },

    async commit(ticketId) {
      logger.info({ ticketId }, "inventory.ledger.commit");
      return await inTransaction(db, async (trx) => {
        const { ticket, changed } = await transitionTicket(
          trx,
          ticketId,
          "Committed",
        );
        if (changed) {
          await recordEntries(
            trx,
            ticket.id,
            ticket.lines.map((l) => ({
              productId: l.productId,
              type: "StockCommitted",
              quantityDelta: 0,
              balanceAfter: null,
            })),
            ticket.updatedAt,
          );
        }
        return ticket;
      });
    },

    async release(ticketId) {
      logger.info({ ticketId }, "inventory.ledger.release");
      return await inTransaction(db, async (trx) => {
        const { ticket, changed } = await transitionTicket(
          trx,
          ticketId,
          "Released",
        );
        if (changed) {
          const entries = await returnToStock(
            trx,
            ticket.lines,
            "StockReleased",
            logger,
          );
          await recordEntries(trx, ticket.id, entries, ticket.updatedAt);
        }
        return ticket;
      });
    },

    async restock(reference, lines) {
      logger.info({ reference, lines }, "inventory.ledger.restock");
      const merged = mergeLines(lines);
      return await inTransaction(db, async (trx) => {
        const already = await dbQuery(
          () =>
            trx
              .selectFrom("stock_ledger_entries")
              .select("id")
              .where("reference", "=", reference)
              .where(
                "entry_type",
                "=",
                LedgerEntryTypeSchema.enum.StockRestocked,
              )
              .executeTakeFirst(),
          `Failed to read restock entries for ${reference}`,
        );
        if (already) return false;

        const entries = await returnToStock(
          trx,
          merged,
          "StockRestocked",
          logger,
        );
        await recordEntries(trx, reference, entries, nowIso());
        return true;
      });
    },

    async findTicket(ticketId) {
      const row = await findTicketRow(db, ticketId);
      return row ? await loadTicket(db, row) : undefined;
    },

    async findTicketByIdempotencyKey(idempotencyKey) {
      const row = await findTicketRowByKey(db, idempotencyKey);
      return row ? await loadTicket(db, row) : undefined;
    },

    async getAvailableQuantity(productId) {
      return await readAvailableQuantity(db, productId);
    },

    async listEntries(productId) {
      const rows = await dbQuery(
        () =>
          db
            .selectFrom("stock_ledger_entries")
            .where("product_id", "=", productId)
            .selectAll()
            .orderBy("recorded_at")
            .orderBy("id")
            .execute(),
        `Failed to list ledger entries of product ${productId}`,
      );
      return rows.map(mapEntry);
    },
  };
}

/**
 * Sums quantities per product and sorts by product id, which is the lock
 * order every multi-row write follows.
 */
export function mergeLines(
  lines: readonly ReservationRequestLine[],
): ReservationRequestLine[] {
  if (lines.length === 0) {
    throw new Error("Cannot reserve an empty list of lines");
  }
  const quantities = new Map<string, number>();
  for (const { productId, quantity } of lines) {
    if (!Number.isInteger(quantity) || quantity <= 0) {
      throw new Error(
        `Quantity for product ${productId} must be a positive integer`,
      );
    }
    quantities.set(productId, (quantities.get(productId) ?? 0) + quantity);
  }
  return [...quantities.entries()]
    .sort(([a], [b]) => (a === b ? 0 : a < b ? -1 : 1))
    .map(([productId, quantity]) => ({ productId, quantity }));
}

async function transitionTicket(
  trx: DatabaseExecutor,
  ticketId: string,
  target: Exclude<TicketStatus, "Pending">,
): Promise<{ ticket: ReservationTicket; changed: boolean }> {
  // At most two rounds: a lost CAS means the ticket is already terminal.
  for (let round = 0; round < 2; round++) {
    const row = await findTicketRow(trx, ticketId);
    if (!row) throw new UnknownTicketError(ticketId);

    const status = TicketStatusSchema.parse(row.status);
    if (status === target) {
      return { ticket: await loadTicket(trx, row), changed: false };
    }
    if (status !== "Pending") {
      throw new InvalidTransitionError("ticket", status, target);
    }

    const now = nowIso();
    const updated = await dbQuery(
      () =>
        trx
          .updateTable("reservations")
          .set({ status: target, updated_at: now, archived_at: now })
          .where("id", "=", ticketId)
          .where("status", "=", TicketStatusSchema.enum.Pending)
          .returningAll()
          .executeTakeFirst(),
      `Failed to move ticket ${ticketId} to ${target}`,
    );
    if (updated) {
      return { ticket: await loadTicket(trx, updated), changed: true };
    }
  }
  throw new Error(`Ticket ${ticketId} kept changing during ${target}`);
}

/**
 * A product removed from the catalog after the reservation has no row to
 * return stock to. The entry is still written, without a balance, so the
 * ticket or order can reach its final state.
 */
async function returnToStock(
  trx: DatabaseExecutor,
  lines: readonly ReservationRequestLine[],
  type: LedgerEntryType,
  logger: Logger,
): Promise<PendingEntry[]> {
  const entries: PendingEntry[] = [];
  for (const line of mergeLines(lines)) {
    const updated = await dbQuery(
      () =>
        trx
          .updateTable("products")
          .set((eb) => ({
            available_quantity: eb("available_quantity", "+", line.quantity),
          }))
          .where("id", "=", line.productId)
          .returning("available_quantity")
          .executeTakeFirst(),
      `Failed to return stock of product ${line.productId}`,
    );
    if (!updated) {
      logger.warn(
        { productId: line.productId, quantity: line.quantity, type },
        "inventory.ledger.productMissing",
      );
    }
    entries.push({
      productId: line.productId,
      type,
      quantityDelta: line.quantity,
      balanceAfter: updated?.available_quantity ?? null,
    });
  }
  return entries;
}

async function recordEntries(
  trx: DatabaseExecutor,
  reference: string,
  entries: readonly PendingEntry[],
  recordedAt: string,
): Promise<void> {
  if (entries.length === 0) return;
  await dbQuery(
    () =>
      trx
        .insertInto("stock_ledger_entries")
        .values(
          entries.map((e) => ({
            id: crypto.randomUUID(),
            product_id: e.productId,
            entry_type: e.type,
            quantity_delta: e.quantityDelta,
            balance_after: e.balanceAfter,
            reference,
            recorded_at: recordedAt,
          })),
        )
        .execute(),
    `Failed to record ledger entries for ${reference}`,
  );
}

async function resolveExistingTicket(
  trx: DatabaseExecutor,
  row: ReservationsTable,
): Promise<ReservationTicket> {
  if (TicketStatusSchema.parse(row.status) === "Released") {
    throw new DuplicateRequestError(row.idempotency_key);
  }
  return await loadTicket(trx, row);
}

async function readAvailableQuantity(
  executor: DatabaseExecutor,
  productId: string,
): Promise<number | undefined> {
  const row = await dbQuery(
    () =>
      executor
        .selectFrom("products")
        .select("available_quantity")
        .where("id", "=", productId)
        .executeTakeFirst(),
    `Failed to read stock of product ${productId}`,
  );
  return row?.available_quantity;
}

async function findTicketRow(
  executor: DatabaseExecutor,
  ticketId: string,
): Promise<ReservationsTable | undefined> {
  return await dbQuery(
    () =>
      executor
        .selectFrom("reservations")
        .where("id", "=", ticketId)
        .selectAll()
        .executeTakeFirst(),
    `Failed to read ticket ${ticketId}`,
  );
}

async function findTicketRowByKey(
  executor: DatabaseExecutor,
  idempotencyKey: string,
): Promise<ReservationsTable | undefined> {
  return await dbQuery(
    () =>
      executor
        .selectFrom("reservations")
        .where("idempotency_key", "=", idempotencyKey)
        .selectAll()
        .executeTakeFirst(),
    `Failed to read ticket for key ${idempotencyKey}`,
  );
}

async function loadTicket(
  executor: DatabaseExecutor,
  row: ReservationsTable,
): Promise<ReservationTicket> {
  const lines = await dbQuery(
    () =>
      executor
        .selectFrom("reservation_lines")
        .where("reservation_id", "=", row.id)
        .select(["product_id", "quantity", "unit_price_cents"])
        .orderBy("product_id")
        .execute(),
    `Failed to read lines of ticket ${row.id}`,
  );
  return {
    id: row.id,
    idempotencyKey: row.idempotency_key,
    status: TicketStatusSchema.parse(row.status),
    lines: lines.map((l) => ({
      productId: l.product_id,
      quantity: l.quantity,
      unitPriceCents: l.unit_price_cents,
    })),
    totalCents: row.total_cents,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
    archivedAt: row.archived_at,
  };
}

function mapEntry(row: StockLedgerEntriesTable): StockLedgerEntry {
  return {
    id: row.id,
    productId: row.product_id,
    type: LedgerEntryTypeSchema.parse(row.entry_type),
    quantityDelta: row.quantity_delta,
    balanceAfter: row.balance_after,
    reference: row.reference,
    recordedAt: row.recorded_at,
  };
}

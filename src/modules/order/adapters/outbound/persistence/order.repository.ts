/**
 * Order Repository Adapter - Kysely persistence for orders and their lines
 */

import {
  dbQuery,
  inTransaction,
  nowIso,
  type DatabaseExecutor,
} from "../../../../shared/infra/db.js";
import type {
  OrderLinesTable,
  OrdersTable,
} from "../../../../shared/infra/db-schema.js";
import type { Logger } from "../../../../shared/infra/logger.js";
import type { OrderRepositoryPort } from "../../../application/ports/outbound/order-repository.port.js";
import {
  OrderStatusSchema,
  type OrderEntity,
} from "../../../domain/order.entity.js";
import {
  DuplicateOrderError,
  InvalidTransitionError,
  OrderNotFoundError,
} from "../../../errors.js";

export function createOrderRepository({
  db,
  logger,
}: {
  db: DatabaseExecutor;
  logger: Logger;
}): OrderRepositoryPort {
  return {
    async save(order: OrderEntity) {
      logger.info(
        { orderId: order.id, status: order.status },
        "order.repository.save",
      );
      await inTransaction(db, async (trx) => {
        const inserted = await dbQuery(
          () =>
            trx
              .insertInto("orders")
              .values({
                id: order.id,
                customer_id: order.customerId,
                ticket_id: order.ticketId,
                status: order.status,
                total_cents: order.totalCents,
                shipping_address: order.shippingAddress,
                payment_method: order.paymentMethod,
                ordered_at: order.orderedAt,
                cancelled_at: order.cancelledAt,
              })
              .onConflict((oc) => oc.column("id").doNothing())
              .returning("id")
              .executeTakeFirst(),
          `Failed to save order ${order.id}`,
        );
        if (!inserted) throw new DuplicateOrderError(order.id);

        if (order.lines.length > 0) {
          await dbQuery(
            () =>
              trx
                .insertInto("order_lines")
                .values(
                  order.lines.map((l, index) => ({
                    order_id: order.id,
                    line_no: index + 1,
                    product_id: l.productId,
                    quantity: l.quantity,
                    unit_price_cents: l.unitPriceCents,
                    subtotal_cents: l.subtotalCents,
                  })),
                )
                .execute(),
            `Failed to save lines of order ${order.id}`,
          );
        }
      });
      return order;
    },

    async cancel(orderId: string) {
      logger.info({ orderId }, "order.repository.cancel");
      return await inTransaction(db, async (trx) => {
        const updated = await dbQuery(
          () =>
            trx
              .updateTable("orders")
              .set({
                status: OrderStatusSchema.enum.Cancelled,
                cancelled_at: nowIso(),
              })
              .where("id", "=", orderId)
              .where("status", "=", OrderStatusSchema.enum.Placed)
              .returningAll()
              .executeTakeFirst(),
          `Failed to cancel order ${orderId}`,
        );
        if (updated) {
          const [order] = await withLines(trx, [updated]);
          return order;
        }
        const current = await dbQuery(
          () =>
            trx
              .selectFrom("orders")
              .select("status")
              .where("id", "=", orderId)
              .executeTakeFirst(),
          `Failed to read order ${orderId}`,
        );
        if (!current) throw new OrderNotFoundError(orderId);
        throw new InvalidTransitionError("order", current.status, "Cancelled");
      });
    },

    async findById(orderId: string) {
      logger.info({ orderId }, "order.repository.findById");
      const row = await dbQuery(
        () =>
          db
            .selectFrom("orders")
            .where("id", "=", orderId)
            .selectAll()
            .executeTakeFirst(),
        `Failed to read order ${orderId}`,
      );
      if (!row) return undefined;
      const [order] = await withLines(db, [row]);
      return order;
    },

    async findByCustomer(customerId: string) {
      logger.info({ customerId }, "order.repository.findByCustomer");
      const rows = await dbQuery(
        () =>
          db
            .selectFrom("orders")
            .where("customer_id", "=", customerId)
            .selectAll()
            .orderBy("ordered_at", "desc")
            .orderBy("id")
            .execute(),
        `Failed to list orders of customer ${customerId}`,
      );
      return await withLines(db, rows);
    },
  };
}

async function withLines(
  executor: DatabaseExecutor,
  rows: OrdersTable[],
): Promise<OrderEntity[]> {
  if (rows.length === 0) return [];
  const lineRows = await dbQuery(
    () =>
      executor
        .selectFrom("order_lines")
        .where(
          "order_id",
          "in",
          rows.map((r) => r.id),
        )
        .selectAll()
        .orderBy("order_id")
        .orderBy("line_no")
        .execute(),
    "Failed to read order lines",
  );

  const linesByOrder = new Map<string, OrderLinesTable[]>();
  for (const line of lineRows) {
    const list = linesByOrder.get(line.order_id) ?? [];
    list.push(line);
    linesByOrder.set(line.order_id, list);
  }
  return rows.map((row) => mapToEntity(row, linesByOrder.get(row.id) ?? []));
}

function mapToEntity(row: OrdersTable, lines: OrderLinesTable[]): OrderEntity {
  return {
    id: row.id,
    customerId: row.customer_id,
    ticketId: row.ticket_id,
    status: OrderStatusSchema.parse(row.status),
    lines: lines.map((l) => ({
      productId: l.product_id,
      quantity: l.quantity,
      unitPriceCents: l.unit_price_cents,
      subtotalCents: l.subtotal_cents,
    })),
    totalCents: row.total_cents,
    shippingAddress: row.shipping_address,
    paymentMethod: row.payment_method,
    orderedAt: row.ordered_at,
    cancelledAt: row.cancelled_at,
  };
}

/**
 * Checkout Attempt Repository Adapter - Kysely persistence of coordinator state
 */

import {
  dbQuery,
  nowIso,
  type DatabaseExecutor,
} from "../../../../shared/infra/db.js";
import type { CheckoutAttemptsTable } from "../../../../shared/infra/db-schema.js";
import type { Logger } from "../../../../shared/infra/logger.js";
import type { CheckoutAttemptRepositoryPort } from "../../../application/ports/outbound/checkout-attempt-repository.port.js";
import {
  AttemptOutcomeSchema,
  CheckoutStateSchema,
  type CheckoutAttempt,
} from "../../../domain/checkout-attempt.entity.js";

export function createCheckoutAttemptRepository({
  db,
  logger,
}: {
  db: DatabaseExecutor;
  logger: Logger;
}): CheckoutAttemptRepositoryPort {
  return {
    async find(idempotencyKey) {
      const row = await dbQuery(
        () =>
          db
            .selectFrom("checkout_attempts")
            .where("idempotency_key", "=", idempotencyKey)
            .selectAll()
            .executeTakeFirst(),
        `Failed to read checkout attempt ${idempotencyKey}`,
      );
      return row ? mapToEntity(row) : undefined;
    },

    async claim(attempt) {
      logger.info(
        { idempotencyKey: attempt.idempotencyKey, customerId: attempt.customerId },
        "checkout.repository.claim",
      );
      const now = nowIso();
      const inserted = await dbQuery(
        () =>
          db
            .insertInto("checkout_attempts")
            .values({
              idempotency_key: attempt.idempotencyKey,
              customer_id: attempt.customerId,
              state: attempt.state,
              ticket_id: attempt.ticketId,
              order_id: attempt.orderId,
              outcome: attempt.outcome,
              failed_product_id: attempt.failedProductId,
              shipping_address: attempt.shippingAddress,
              payment_method: attempt.paymentMethod,
              created_at: now,
              updated_at: now,
            })
            .onConflict((oc) => oc.column("idempotency_key").doNothing())
            .returning("idempotency_key")
            .executeTakeFirst(),
        `Failed to claim checkout attempt ${attempt.idempotencyKey}`,
      );
      return inserted !== undefined;
    },

    async transition(idempotencyKey, { from, to, set = {} }) {
      logger.info(
        { idempotencyKey, from, to, ...set },
        "checkout.repository.transition",
      );
      const updated = await dbQuery(
        () =>
          db
            .updateTable("checkout_attempts")
            .set({
              state: to,
              updated_at: nowIso(),
              ...(set.ticketId !== undefined ? { ticket_id: set.ticketId } : {}),
              ...(set.orderId !== undefined ? { order_id: set.orderId } : {}),
              ...(set.outcome !== undefined ? { outcome: set.outcome } : {}),
              ...(set.failedProductId !== undefined
                ? { failed_product_id: set.failedProductId }
                : {}),
            })
            .where("idempotency_key", "=", idempotencyKey)
            .where("state", "in", [...from])
            .returning("idempotency_key")
            .executeTakeFirst(),
        `Failed to move checkout attempt ${idempotencyKey} to ${to}`,
      );
      return updated !== undefined;
    },

    async findStale({ states, olderThan, limit }) {
      if (states.length === 0) return [];
      const rows = await dbQuery(
        () =>
          db
            .selectFrom("checkout_attempts")
            .where("state", "in", [...states])
            .where("updated_at", "<", olderThan)
            .selectAll()
            .orderBy("updated_at")
            .limit(limit)
            .execute(),
        "Failed to list stale checkout attempts",
      );
      return rows.map(mapToEntity);
    },
  };
}

function mapToEntity(row: CheckoutAttemptsTable): CheckoutAttempt {
  return {
    idempotencyKey: row.idempotency_key,
    customerId: row.customer_id,
    state: CheckoutStateSchema.parse(row.state),
    ticketId: row.ticket_id,
    orderId: row.order_id,
    outcome: row.outcome === null ? null : AttemptOutcomeSchema.parse(row.outcome),
    failedProductId: row.failed_product_id,
    shippingAddress: row.shipping_address,
    paymentMethod: row.payment_method,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

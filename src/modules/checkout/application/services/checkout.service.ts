/**
 * Checkout Coordinator - Drives one attempt from cart snapshot to a placed or released order
 *
 * Every state change of an attempt is a compare-and-swap on its row, so the
 * request handling the attempt and the stale-attempt sweeper never both
 * finish it. The payment call is the only wait, and no transaction is open
 * across it.
 */

import crypto from "node:crypto";
import { z } from "zod";
import {
  EmptyCartError,
  InvalidLineError,
  type CartSnapshot,
} from "../../../cart/cart.index.js";
import {
  DuplicateRequestError,
  InsufficientStockError,
  InvalidTransitionError,
  UnknownTicketError,
  type ReservationTicket,
} from "../../../inventory/inventory.index.js";
import {
  buildOrder,
  DuplicateOrderError,
  OrderNotFoundError,
} from "../../../order/order.index.js";
import type { AppContext } from "../../../shared/hono/context-middleware.js";
import { nowIso } from "../../../shared/infra/db.js";
import type { Logger } from "../../../shared/infra/logger.js";
import {
  CheckoutInputSchema,
  type CheckoutAttempt,
  type CheckoutInput,
  type CheckoutState,
  type ReleaseReason,
} from "../../domain/checkout-attempt.entity.js";
import type {
  CheckoutOutcome,
  RejectReason,
} from "../../domain/checkout-outcome.js";
import { CheckoutIntegrityError, CheckoutInvalidInputError } from "../../errors.js";
import type { CheckoutPort } from "../ports/inbound/checkout.port.js";
import type { CartSnapshotPort } from "../ports/outbound/cart.port.js";
import type { CheckoutAttemptRepositoryPort } from "../ports/outbound/checkout-attempt-repository.port.js";
import type { CheckoutUnitOfWorkPort } from "../ports/outbound/checkout-unit-of-work.port.js";
import type { OrderStorePort } from "../ports/outbound/order-store.port.js";
import type { PaymentPort } from "../ports/outbound/payment.port.js";
import type { StockReservationPort } from "../ports/outbound/stock-reservation.port.js";
import { chargeWithDeadline } from "./payment-deadline.js";

export type CheckoutSettings = {
  paymentTimeoutMs: number;
  recordCancelledOrders: boolean;
};

type Dependencies = {
  attempts: CheckoutAttemptRepositoryPort;
  cart: CartSnapshotPort;
  ledger: StockReservationPort;
  orders: OrderStorePort;
  payment: PaymentPort;
  unitOfWork: CheckoutUnitOfWorkPort;
  logger: Logger;
  getContext: () => AppContext;
  settings: CheckoutSettings;
  generateId?: () => string;
};

const RECOVERABLE_STATES: readonly CheckoutState[] = [
  "Reserving",
  "AwaitingPayment",
  "Releasing",
  "Finalizing",
];

export function createCheckoutService(deps: Dependencies): CheckoutPort {
  const generateId = deps.generateId ?? (() => crypto.randomUUID());
  const finalize = createFinalize(deps);
  const releaseAttempt = createReleaseAttempt({ ...deps, generateId });
  const replay = createReplay({ ...deps, finalize });

  async function settle(idempotencyKey: string): Promise<CheckoutOutcome> {
    const attempt = await deps.attempts.find(idempotencyKey);
    if (!attempt) {
      throw new CheckoutIntegrityError(
        `Checkout attempt vanished: ${idempotencyKey}`,
      );
    }
    return await replay(attempt, attempt.customerId);
  }

  async function run(request: CheckoutInput): Promise<CheckoutOutcome> {
    const { idempotencyKey, customerId } = request;
    const { requestId } = deps.getContext();

    const existing = await deps.attempts.find(idempotencyKey);
    if (existing) {
      deps.logger.info(
        { requestId, idempotencyKey, state: existing.state },
        "checkout.coordinator.replay",
      );
      return await replay(existing, customerId);
    }

    let snapshot: CartSnapshot;
    try {
      snapshot = await deps.cart.takeSnapshot(customerId);
    } catch (error) {
      if (error instanceof EmptyCartError) {
        return rejected(idempotencyKey, "EmptyCart", null);
      }
      if (error instanceof InvalidLineError) {
        return rejected(idempotencyKey, "InvalidLine", error.productId);
      }
      throw error;
    }

    const claimed = await deps.attempts.claim({
      idempotencyKey,
      customerId,
      state: "Reserving",
      ticketId: null,
      orderId: null,
      outcome: null,
      failedProductId: null,
      shippingAddress: request.shippingAddress ?? null,
      paymentMethod: request.paymentMethod ?? null,
    });
    if (!claimed) {
      const winner = await deps.attempts.find(idempotencyKey);
      if (!winner) {
        throw new CheckoutIntegrityError(
          `Checkout attempt vanished after claim conflict: ${idempotencyKey}`,
        );
      }
      return await replay(winner, customerId);
    }
    deps.logger.info(
      { requestId, idempotencyKey, customerId, totalCents: snapshot.totalCents },
      "checkout.coordinator.reserving",
    );

    let ticket: ReservationTicket;
    try {
      ticket = await deps.ledger.reserve(
        snapshot.lines.map(({ productId, quantity }) => ({
          productId,
          quantity,
        })),
        idempotencyKey,
      );
    } catch (error) {
      if (!(error instanceof InsufficientStockError)) throw error;
      const recorded = await deps.attempts.transition(idempotencyKey, {
        from: ["Reserving"],
        to: "Done",
        set: { outcome: "InsufficientStock", failedProductId: error.productId },
      });
      if (!recorded) return await settle(idempotencyKey);
      deps.logger.info(
        { requestId, idempotencyKey, productId: error.productId },
        "checkout.coordinator.insufficientStock",
      );
      return released(idempotencyKey, "InsufficientStock", error.productId, null);
    }

    const awaiting = await deps.attempts.transition(idempotencyKey, {
      from: ["Reserving"],
      to: "AwaitingPayment",
      set: { ticketId: ticket.id },
    });
    if (!awaiting) {
      // The sweeper took the attempt over before the ticket was visible to it.
      deps.logger.warn(
        { requestId, idempotencyKey, ticketId: ticket.id },
        "checkout.coordinator.reservationOrphaned",
      );
      await deps.ledger.release(ticket.id);
      return await settle(idempotencyKey);
    }

    const result = await chargeWithDeadline({
      payment: deps.payment,
      amountCents: ticket.totalCents,
      reference: ticket.id,
      timeoutMs: deps.settings.paymentTimeoutMs,
      logger: deps.logger,
    });
    deps.logger.info(
      { requestId, idempotencyKey, ticketId: ticket.id, payment: result.status },
      "checkout.coordinator.paymentResult",
    );

    if (result.status === "Success") {
      const finalizing = await deps.attempts.transition(idempotencyKey, {
        from: ["AwaitingPayment"],
        to: "Finalizing",
        set: { orderId: generateId() },
      });
      if (!finalizing) {
        deps.logger.warn(
          { requestId, idempotencyKey, ticketId: ticket.id },
          "checkout.payment.lateResultDiscarded",
        );
        return await settle(idempotencyKey);
      }
      return (await finalize(idempotencyKey)) ?? (await settle(idempotencyKey));
    }

    const releasing = await deps.attempts.transition(idempotencyKey, {
      from: ["AwaitingPayment"],
      to: "Releasing",
    });
    if (!releasing) return await settle(idempotencyKey);
    const reason: ReleaseReason =
      result.status === "Declined" ? "PaymentDeclined" : "PaymentTimeout";
    return (
      (await releaseAttempt(idempotencyKey, reason)) ??
      (await settle(idempotencyKey))
    );
  }

  return {
    async checkout(input: unknown) {
      const parsed = CheckoutInputSchema.safeParse(input);
      if (!parsed.success) {
        throw new CheckoutInvalidInputError(z.prettifyError(parsed.error));
      }
      const { idempotencyKey } = parsed.data;
      try {
        return await run(parsed.data);
      } catch (error) {
        if (!isIntegrityError(error)) throw error;
        deps.logger.error(
          { error, idempotencyKey, requestId: deps.getContext().requestId },
          "checkout.coordinator.integrityError",
        );
        return { status: "Failed", idempotencyKey, reason: "InternalError" };
      }
    },

    async recoverStaleAttempts({ olderThan, limit = 100 }) {
      const stale = await deps.attempts.findStale({
        states: RECOVERABLE_STATES,
        olderThan: olderThan.toISOString(),
        limit,
      });
      let recovered = 0;
      for (const attempt of stale) {
        const { idempotencyKey, state } = attempt;
        try {
          let outcome: CheckoutOutcome | undefined;
          if (state === "Finalizing") {
            outcome = await finalize(idempotencyKey);
          } else {
            const claimed =
              state === "Releasing" ||
              (await deps.attempts.transition(idempotencyKey, {
                from: [state],
                to: "Releasing",
              }));
            if (claimed) {
              outcome = await releaseAttempt(
                idempotencyKey,
                staleReleaseReason(attempt),
              );
            }
          }
          if (outcome) {
            recovered++;
            deps.logger.info(
              { idempotencyKey, from: state, outcome: outcome.status },
              "checkout.recovery.recovered",
            );
          }
        } catch (error) {
          // One broken attempt must not stop the sweep; it is retried next round.
          deps.logger.error(
            { error, idempotencyKey, state },
            "checkout.recovery.failed",
          );
        }
      }
      return recovered;
    },
  };
}

/**
 * Commits the ticket, writes the Placed order and trims the cart in one
 * transaction. Returns undefined when another actor already finished the
 * attempt.
 */
function createFinalize({
  unitOfWork,
  logger,
}: Pick<Dependencies, "unitOfWork" | "logger">) {
  return async (idempotencyKey: string): Promise<CheckoutOutcome | undefined> => {
    const order = await unitOfWork.run(async (ctx) => {
      const attempt = await ctx.attempts.find(idempotencyKey);
      if (!attempt || attempt.state !== "Finalizing") return undefined;
      if (!attempt.ticketId || !attempt.orderId) {
        throw new CheckoutIntegrityError(
          `Finalizing attempt without ticket or order id: ${idempotencyKey}`,
        );
      }
      const done = await ctx.attempts.transition(idempotencyKey, {
        from: ["Finalizing"],
        to: "Done",
        set: { outcome: "Placed" },
      });
      if (!done) return undefined;

      const ticket = await ctx.ledger.commit(attempt.ticketId);
      const saved = await ctx.orders.save(
        buildOrder({
          id: attempt.orderId,
          customerId: attempt.customerId,
          ticketId: ticket.id,
          status: "Placed",
          lines: ticket.lines,
          shippingAddress: attempt.shippingAddress,
          paymentMethod: attempt.paymentMethod,
          orderedAt: nowIso(),
        }),
      );
      await ctx.cart.removeCheckedOut(
        attempt.customerId,
        ticket.lines.map(({ productId, quantity }) => ({ productId, quantity })),
      );
      return saved;
    });
    if (!order) return undefined;

    logger.info(
      { idempotencyKey, orderId: order.id, totalCents: order.totalCents },
      "checkout.coordinator.placed",
    );
    return { status: "Placed", idempotencyKey, order, replayed: false };
  };
}

/**
 * Finishes a `Releasing` attempt: returns the reserved stock and, when
 * configured, keeps a Cancelled order as the record of the failed payment.
 */
function createReleaseAttempt({
  unitOfWork,
  logger,
  settings,
  generateId,
}: Pick<Dependencies, "unitOfWork" | "logger" | "settings"> & {
  generateId: () => string;
}) {
  return async (
    idempotencyKey: string,
    reason: ReleaseReason,
  ): Promise<CheckoutOutcome | undefined> => {
    const cancelledOrderId = await unitOfWork.run(async (ctx) => {
      const attempt = await ctx.attempts.find(idempotencyKey);
      if (!attempt || attempt.state !== "Releasing") return undefined;
      const done = await ctx.attempts.transition(idempotencyKey, {
        from: ["Releasing"],
        to: "Done",
        set: { outcome: reason },
      });
      if (!done) return undefined;

      const ticketId =
        attempt.ticketId ??
        (await ctx.ledger.findTicketByIdempotencyKey(idempotencyKey))?.id;
      // Crashed before the reservation landed: nothing to give back.
      if (!ticketId) return null;
      const ticket = await ctx.ledger.release(ticketId);
      if (!settings.recordCancelledOrders) return null;

      const order = await ctx.orders.save(
        buildOrder({
          id: generateId(),
          customerId: attempt.customerId,
          ticketId: ticket.id,
          status: "Cancelled",
          lines: ticket.lines,
          shippingAddress: attempt.shippingAddress,
          paymentMethod: attempt.paymentMethod,
          orderedAt: nowIso(),
        }),
      );
      await ctx.attempts.transition(idempotencyKey, {
        from: ["Done"],
        to: "Done",
        set: { orderId: order.id },
      });
      return order.id;
    });
    if (cancelledOrderId === undefined) return undefined;

    logger.info(
      { idempotencyKey, reason, cancelledOrderId },
      "checkout.coordinator.released",
    );
    return released(idempotencyKey, reason, null, cancelledOrderId);
  };
}

function createReplay({
  orders,
  logger,
  finalize,
}: Pick<Dependencies, "orders" | "logger"> & {
  finalize: (idempotencyKey: string) => Promise<CheckoutOutcome | undefined>;
}) {
  return async function replay(
    attempt: CheckoutAttempt,
    customerId: string,
  ): Promise<CheckoutOutcome> {
    const { idempotencyKey } = attempt;
    if (attempt.customerId !== customerId) {
      logger.warn({ idempotencyKey }, "checkout.coordinator.keyReused");
      return rejected(idempotencyKey, "IdempotencyKeyReused", null);
    }

    switch (attempt.state) {
      case "Done":
        return await storedOutcome(attempt);
      case "Finalizing": {
        const outcome = await finalize(idempotencyKey);
        if (outcome) return outcome;
        return { status: "InProgress", idempotencyKey };
      }
      default:
        return { status: "InProgress", idempotencyKey };
    }
  };

  async function storedOutcome(
    attempt: CheckoutAttempt,
  ): Promise<CheckoutOutcome> {
    const { idempotencyKey, outcome } = attempt;
    if (outcome === null) {
      throw new CheckoutIntegrityError(
        `Finished attempt without outcome: ${idempotencyKey}`,
      );
    }
    if (outcome === "Placed") {
      const order = attempt.orderId
        ? await orders.findById(attempt.orderId)
        : undefined;
      if (!order) {
        throw new CheckoutIntegrityError(
          `Placed attempt without its order: ${idempotencyKey}`,
        );
      }
      return { status: "Placed", idempotencyKey, order, replayed: true };
    }
    return {
      status: "Released",
      idempotencyKey,
      reason: outcome,
      productId: attempt.failedProductId,
      cancelledOrderId: attempt.orderId,
      replayed: true,
    };
  }
}

function rejected(
  idempotencyKey: string,
  reason: RejectReason,
  productId: string | null,
): CheckoutOutcome {
  return { status: "Rejected", idempotencyKey, reason, productId };
}

function released(
  idempotencyKey: string,
  reason: ReleaseReason,
  productId: string | null,
  cancelledOrderId: string | null,
): CheckoutOutcome {
  return {
    status: "Released",
    idempotencyKey,
    reason,
    productId,
    cancelledOrderId,
    replayed: false,
  };
}

/**
 * An attempt that never got past `Reserving` never reached the payment
 * collaborator. A `Releasing` attempt without a ticket id was claimed from
 * `Reserving` by an earlier sweep.
 */
function staleReleaseReason(attempt: CheckoutAttempt): ReleaseReason {
  if (attempt.state === "Reserving") return "Abandoned";
  if (attempt.state === "Releasing" && attempt.ticketId === null) {
    return "Abandoned";
  }
  return "PaymentTimeout";
}

function isIntegrityError(error: unknown): boolean {
  return (
    error instanceof UnknownTicketError ||
    error instanceof InvalidTransitionError ||
    error instanceof DuplicateRequestError ||
    error instanceof DuplicateOrderError ||
    error instanceof OrderNotFoundError ||
    error instanceof CheckoutIntegrityError
  );
}

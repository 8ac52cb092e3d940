import type { OrderEntity } from "../../order/order.index.js";
import type { ReleaseReason } from "./checkout-attempt.entity.js";

export type RejectReason = "EmptyCart" | "InvalidLine" | "IdempotencyKeyReused";

/**
 * What a caller gets back from checkout. `replayed` is true when the outcome
 * was recorded by an earlier invocation with the same idempotency key.
 */
export type CheckoutOutcome =
  | {
      status: "Placed";
      idempotencyKey: string;
      order: OrderEntity;
      replayed: boolean;
    }
  | {
      status: "Released";
      idempotencyKey: string;
      reason: ReleaseReason;
      productId: string | null;
      cancelledOrderId: string | null;
      replayed: boolean;
    }
  | {
      status: "Rejected";
      idempotencyKey: string;
      reason: RejectReason;
      productId: string | null;
    }
  | { status: "InProgress"; idempotencyKey: string }
  | { status: "Failed"; idempotencyKey: string; reason: "InternalError" };

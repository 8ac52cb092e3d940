import { z } from "zod";

/**
 * Persisted states of one checkout attempt. `Building` happens before the
 * attempt row exists; `Releasing` is the claimed half of the release
 * transition so that only one actor (request or sweeper) performs it.
 */
export const CheckoutStateSchema = z.enum([
  "Reserving",
  "AwaitingPayment",
  "Finalizing",
  "Releasing",
  "Done",
]);
export type CheckoutState = z.infer<typeof CheckoutStateSchema>;

export const AttemptOutcomeSchema = z.enum([
  "Placed",
  "InsufficientStock",
  "PaymentDeclined",
  "PaymentTimeout",
  "Abandoned",
]);
export type AttemptOutcome = z.infer<typeof AttemptOutcomeSchema>;
export type ReleaseReason = Exclude<AttemptOutcome, "Placed">;

export const CheckoutInputSchema = z.object({
  idempotencyKey: z.string().min(1).max(255),
  customerId: z.string().min(1),
  shippingAddress: z.string().min(1).nullish(),
  paymentMethod: z.string().min(1).nullish(),
});
export type CheckoutInput = z.infer<typeof CheckoutInputSchema>;

export type CheckoutAttempt = {
  idempotencyKey: string;
  customerId: string;
  state: CheckoutState;
  ticketId: string | null;
  // Placed order, or the Cancelled record of a failed payment
  orderId: string | null;
  outcome: AttemptOutcome | null;
  failedProductId: string | null;
  shippingAddress: string | null;
  paymentMethod: string | null;
  createdAt: string;
  updatedAt: string;
};

/**
 * Outbound Port - Persistence of checkout attempts (coordinator state)
 */

import type {
  AttemptOutcome,
  CheckoutAttempt,
  CheckoutState,
} from "../../../domain/checkout-attempt.entity.js";

export type AttemptPatch = Partial<{
  ticketId: string;
  orderId: string;
  outcome: AttemptOutcome;
  failedProductId: string;
}>;

export interface CheckoutAttemptRepositoryPort {
  find(idempotencyKey: string): Promise<CheckoutAttempt | undefined>;

  /**
   * Inserts a new attempt. Returns false when the key is already taken.
   */
  claim(
    attempt: Omit<CheckoutAttempt, "createdAt" | "updatedAt">,
  ): Promise<boolean>;

  /**
   * Compare-and-swap on the state. Returns false when the attempt is no
   * longer in one of the `from` states.
   */
  transition(
    idempotencyKey: string,
    change: {
      from: readonly CheckoutState[];
      to: CheckoutState;
      set?: AttemptPatch;
    },
  ): Promise<boolean>;

  findStale(options: {
    states: readonly CheckoutState[];
    olderThan: string;
    limit: number;
  }): Promise<CheckoutAttempt[]>;
}

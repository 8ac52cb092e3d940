/**
 * Inbound Port - The Checkout Coordinator
 */

import type { CheckoutOutcome } from "../../../domain/checkout-outcome.js";

export interface CheckoutPort {
  /**
   * Runs one checkout attempt for the customer's current cart. Safe to call
   * again with the same idempotency key: a finished attempt returns its
   * recorded outcome, an unfinished one reports InProgress.
   * @throws CheckoutInvalidInputError if input is invalid
   */
  checkout(input: unknown): Promise<CheckoutOutcome>;

  /**
   * Finishes attempts abandoned mid-flight (crash, lost request) whose last
   * transition is older than `olderThan`. Returns how many were recovered.
   */
  recoverStaleAttempts(options: {
    olderThan: Date;
    limit?: number;
  }): Promise<number>;
}

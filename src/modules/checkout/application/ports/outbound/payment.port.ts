/**
 * Outbound Port - The external payment collaborator
 * `reference` is the reservation ticket id, so the collaborator can dedupe retries.
 */

export type PaymentResult =
  | { status: "Success" }
  | { status: "Declined"; reason?: string }
  | { status: "Timeout" };

export interface PaymentPort {
  charge(request: {
    amountCents: number;
    reference: string;
    signal: AbortSignal;
  }): Promise<PaymentResult>;
}

/**
 * Each module has one errors.ts file. All errors in the module are exported from here.
 */

export class CheckoutInvalidInputError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CheckoutInvalidInputError";
  }
}

/**
 * Persisted checkout state that contradicts the state machine,
 * e.g. a Finalizing attempt without a ticket.
 */
export class CheckoutIntegrityError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CheckoutIntegrityError";
  }
}

export class PaymentGatewayError extends Error {
  readonly status: number;

  constructor(status: number, message: string) {
    super(message);
    this.name = "PaymentGatewayError";
    this.status = status;
  }
}

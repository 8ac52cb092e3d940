/**
 * Each module has one errors.ts file. All errors in the module are exported from here.
 */

export class InsufficientStockError extends Error {
  readonly productId: string;
  readonly requested: number;
  readonly available: number;

  constructor({
    productId,
    requested,
    available,
  }: {
    productId: string;
    requested: number;
    available: number;
  }) {
    super(
      `Insufficient stock for product ${productId}: requested ${requested}, available ${available}`,
    );
    this.name = "InsufficientStockError";
    this.productId = productId;
    this.requested = requested;
    this.available = available;
  }
}

export class DuplicateRequestError extends Error {
  readonly idempotencyKey: string;

  constructor(idempotencyKey: string) {
    super(`Reservation already released for key ${idempotencyKey}`);
    this.name = "DuplicateRequestError";
    this.idempotencyKey = idempotencyKey;
  }
}

export class UnknownTicketError extends Error {
  constructor(ticketId: string) {
    super(`Reservation ticket not found: ${ticketId}`);
    this.name = "UnknownTicketError";
  }
}

/**
 * A state change that the entity's lifecycle does not allow.
 * Shared by tickets and orders; it signals a defect, not a user error.
 */
export class InvalidTransitionError extends Error {
  readonly from: string;
  readonly to: string;

  constructor(entity: string, from: string, to: string) {
    super(`Invalid ${entity} transition: ${from} -> ${to}`);
    this.name = "InvalidTransitionError";
    this.from = from;
    this.to = to;
  }
}

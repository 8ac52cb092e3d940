/**
 * Each module has one errors.ts file. All errors in the module are exported from here.
 */

export class EmptyCartError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "EmptyCartError";
  }
}

export class InvalidLineError extends Error {
  readonly productId: string;

  constructor(productId: string, message: string) {
    super(message);
    this.name = "InvalidLineError";
    this.productId = productId;
  }
}

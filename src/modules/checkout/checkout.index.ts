/**
 * Checkout Module Public API
 */
export {
  createCheckoutHttpAdapter,
  createCheckoutModule,
  createPaymentGatewayAdapter,
  type CheckoutInput,
  type CheckoutOutcome,
  type CheckoutPort,
  type CheckoutSettings,
  type CheckoutState,
  type PaymentPort,
  type PaymentResult,
  type RejectReason,
} from "./checkout.module.js";
export {
  CheckoutIntegrityError,
  CheckoutInvalidInputError,
  PaymentGatewayError,
} from "./errors.js";

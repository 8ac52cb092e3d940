/**
 * Payment Gateway Adapter - HTTP client for the external payment collaborator
 */

import { z } from "zod";
import type { Logger } from "../../../../shared/infra/logger.js";
import type {
  PaymentPort,
  PaymentResult,
} from "../../../application/ports/outbound/payment.port.js";
import { PaymentGatewayError } from "../../../errors.js";

const ChargeResponseSchema = z.discriminatedUnion("status", [
  z.object({ status: z.literal("Success") }),
  z.object({ status: z.literal("Declined"), reason: z.string().optional() }),
  z.object({ status: z.literal("Timeout") }),
]);

export function createPaymentGatewayAdapter({
  baseUrl,
  logger,
  fetchFn = fetch,
}: {
  baseUrl: string;
  logger: Logger;
  fetchFn?: typeof fetch;
}): PaymentPort {
  const endpoint = new URL("charges", baseUrl.endsWith("/") ? baseUrl : `${baseUrl}/`);

  return {
    async charge({ amountCents, reference, signal }): Promise<PaymentResult> {
      logger.info({ amountCents, reference }, "checkout.payment.charge");
      const response = await fetchFn(endpoint, {
        method: "POST",
        headers: {
          "Content-Type": "application/json",
          "Idempotency-Key": reference,
        },
        body: JSON.stringify({ amountCents, reference }),
        signal,
      });
      if (!response.ok) {
        throw new PaymentGatewayError(
          response.status,
          `Payment gateway responded with ${response.status}`,
        );
      }
      const parsed = ChargeResponseSchema.safeParse(await response.json());
      if (!parsed.success) {
        throw new PaymentGatewayError(
          response.status,
          `Unexpected payment gateway response: ${z.prettifyError(parsed.error)}`,
        );
      }
      return parsed.data;
    },
  };
}

import type { Logger } from "../../../shared/infra/logger.js";
import type {
  PaymentPort,
  PaymentResult,
} from "../ports/outbound/payment.port.js";

/**
 * Charges through the collaborator, turning a missed deadline into a Timeout.
 * The request is aborted when the deadline fires; whatever the collaborator
 * answers afterwards is logged and discarded. A rejected charge counts as a
 * decline.
 */
export async function chargeWithDeadline({
  payment,
  amountCents,
  reference,
  timeoutMs,
  logger,
}: {
  payment: PaymentPort;
  amountCents: number;
  reference: string;
  timeoutMs: number;
  logger: Logger;
}): Promise<PaymentResult> {
  const controller = new AbortController();
  let timedOut = false;
  let timer: ReturnType<typeof setTimeout> | undefined;

  const deadline = new Promise<PaymentResult>((resolve) => {
    timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
      resolve({ status: "Timeout" });
    }, timeoutMs);
  });

  const charge = payment
    .charge({ amountCents, reference, signal: controller.signal })
    .then(
      (result): PaymentResult => {
        if (timedOut) {
          logger.warn(
            { reference, status: result.status },
            "checkout.payment.lateResultDiscarded",
          );
        }
        return result;
      },
      (error: unknown): PaymentResult => {
        if (timedOut) {
          logger.debug({ reference, error }, "checkout.payment.abortedAfterDeadline");
        } else {
          logger.error({ reference, error }, "checkout.payment.chargeFailed");
        }
        return { status: "Declined", reason: "PaymentError" };
      },
    );

  try {
    return await Promise.race([charge, deadline]);
  } finally {
    clearTimeout(timer);
  }
}

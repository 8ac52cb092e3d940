import {
  afterEach,
  beforeEach,
  describe,
  expect,
  it,
  type Mock,
  vi,
} from "vitest";
import type { Logger } from "../../shared/infra/logger.js";
import type {
  PaymentPort,
  PaymentResult,
} from "../application/ports/outbound/payment.port.js";
import { chargeWithDeadline } from "../application/services/payment-deadline.js";

describe("chargeWithDeadline", () => {
  let logger: Logger;
  let charge: Mock<PaymentPort["charge"]>;

  beforeEach(() => {
    vi.useFakeTimers();
    logger = { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() };
    charge = vi.fn<PaymentPort["charge"]>();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  function run() {
    return chargeWithDeadline({
      payment: { charge },
      amountCents: 1200,
      reference: "ticket-1",
      timeoutMs: 1000,
      logger,
    });
  }

  it("should return the collaborator's answer when it comes in time", async () => {
    charge.mockResolvedValue({ status: "Success" });

    await expect(run()).resolves.toEqual({ status: "Success" });
    expect(charge).toHaveBeenCalledWith({
      amountCents: 1200,
      reference: "ticket-1",
      signal: expect.any(AbortSignal),
    });
    expect(logger.warn).not.toHaveBeenCalled();
  });

  it("should pass a decline through", async () => {
    charge.mockResolvedValue({ status: "Declined", reason: "card_declined" });

    await expect(run()).resolves.toEqual({
      status: "Declined",
      reason: "card_declined",
    });
  });

  it("should time out and abort the request when the deadline passes", async () => {
    let signal: AbortSignal | undefined;
    charge.mockImplementation(
      (request) =>
        new Promise<PaymentResult>((_, reject) => {
          signal = request.signal;
          request.signal.addEventListener("abort", () =>
            reject(new Error("aborted")),
          );
        }),
    );

    const result = run();
    await vi.advanceTimersByTimeAsync(1000);

    await expect(result).resolves.toEqual({ status: "Timeout" });
    expect(signal?.aborted).toBe(true);
    expect(logger.error).not.toHaveBeenCalled();
    expect(logger.debug).toHaveBeenCalledWith(
      expect.objectContaining({ reference: "ticket-1" }),
      "checkout.payment.abortedAfterDeadline",
    );
  });

  it("should discard and log a success that arrives after the deadline", async () => {
    let resolveCharge: (result: PaymentResult) => void = () => {};
    charge.mockImplementation(
      () =>
        new Promise<PaymentResult>((resolve) => {
          resolveCharge = resolve;
        }),
    );

    const result = run();
    await vi.advanceTimersByTimeAsync(1000);
    await expect(result).resolves.toEqual({ status: "Timeout" });

    resolveCharge({ status: "Success" });
    await vi.waitFor(() =>
      expect(logger.warn).toHaveBeenCalledWith(
        { reference: "ticket-1", status: "Success" },
        "checkout.payment.lateResultDiscarded",
      ),
    );
  });

  it("should treat a failed call as a decline", async () => {
    charge.mockRejectedValue(new Error("connection reset"));

    await expect(run()).resolves.toEqual({
      status: "Declined",
      reason: "PaymentError",
    });
    expect(logger.error).toHaveBeenCalledWith(
      expect.objectContaining({ reference: "ticket-1" }),
      "checkout.payment.chargeFailed",
    );
  });
});

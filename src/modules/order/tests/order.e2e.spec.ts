import crypto from "node:crypto";
import type { Hono } from "hono";
import { afterAll, beforeAll, describe, expect, it, vi } from "vitest";
import { createTestDb } from "../../../dev-tools/database/create-test-db.js";
import type { DatabaseExecutor } from "../../shared/infra/db.js";
import type { Logger } from "../../shared/infra/logger.js";
import {
  buildOrder,
  createOrderHttpAdapter,
  createOrderModule,
  createOrderRepository,
  type OrderEntity,
} from "../order.index.js";

describe("Order HTTP", () => {
  const logger: Logger = {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  };

  let app: Hono;
  let db: DatabaseExecutor;
  let order: OrderEntity;

  beforeAll(async () => {
    db = await createTestDb();
    app = createOrderHttpAdapter({
      orderPort: createOrderModule({ db, logger }),
      logger,
    });
    await db
      .insertInto("products")
      .values({
        id: "p-e2e",
        name: "Kettle",
        price_cents: 4500,
        available_quantity: 0,
        updated_at: "2026-03-01T00:00:00.000Z",
      })
      .execute();
    order = buildOrder({
      id: crypto.randomUUID(),
      customerId: "customer-e2e",
      ticketId: crypto.randomUUID(),
      status: "Placed",
      lines: [{ productId: "p-e2e", quantity: 1, unitPriceCents: 4500 }],
      shippingAddress: null,
      paymentMethod: null,
      orderedAt: "2026-03-01T12:00:00.000Z",
    });
    await createOrderRepository({ db, logger }).save(order);
  });

  afterAll(async () => {
    await db.destroy();
  });

  it("should get an order by id", async () => {
    const response = await app.request(`/api/orders/${order.id}`);

    expect(response.status).toBe(200);
    expect(await response.json()).toEqual(order);
  });

  it("should return 404 for an unknown order", async () => {
    const response = await app.request("/api/orders/no-such-order");

    expect(response.status).toBe(404);
    expect(await response.json()).toEqual({ message: "Order not found" });
  });

  it("should list a customer's orders", async () => {
    const response = await app.request("/api/customers/customer-e2e/orders");

    expect(response.status).toBe(200);
    expect(await response.json()).toEqual([order]);
  });

  it("should cancel once and answer 409 the second time", async () => {
    const first = await app.request(`/api/orders/${order.id}/cancel`, {
      method: "POST",
    });
    expect(first.status).toBe(200);
    expect(await first.json()).toMatchObject({ id: order.id, status: "Cancelled" });

    const second = await app.request(`/api/orders/${order.id}/cancel`, {
      method: "POST",
    });
    expect(second.status).toBe(409);
    expect(await second.json()).toEqual({ message: "Order cannot be cancelled" });
  });

  it("should answer 404 when cancelling an unknown order", async () => {
    const response = await app.request("/api/orders/no-such-order/cancel", {
      method: "POST",
    });

    expect(response.status).toBe(404);
  });
});

import { describe, expect, it, vi } from "vitest";
import type { CatalogReaderPort } from "../application/ports/outbound/catalog-reader.port.js";
import {
  buildCartSnapshot,
  createCartSnapshotService,
} from "../application/services/cart-snapshot.service.js";
import { EmptyCartError, InvalidLineError } from "../errors.js";

describe("Cart Snapshot Unit Tests", () => {
  const takenAt = "2026-01-01T00:00:00.000Z";
  const catalog: CatalogReaderPort = {
    getProducts: vi.fn(async (ids: readonly string[]) =>
      [
        { id: "p-apple", name: "Apple", priceCents: 120 },
        { id: "p-bread", name: "Bread", priceCents: 350 },
      ].filter((p) => ids.includes(p.id)),
    ),
  };

  it("should price lines at the current catalog price and sort by product id", async () => {
    const snapshot = await buildCartSnapshot({
      customerId: "c-1",
      lines: [
        { productId: "p-bread", quantity: 1 },
        { productId: "p-apple", quantity: 3 },
      ],
      catalog,
      now: () => takenAt,
    });

    expect(snapshot).toEqual({
      customerId: "c-1",
      takenAt,
      lines: [
        {
          productId: "p-apple",
          name: "Apple",
          quantity: 3,
          unitPriceCents: 120,
          subtotalCents: 360,
        },
        {
          productId: "p-bread",
          name: "Bread",
          quantity: 1,
          unitPriceCents: 350,
          subtotalCents: 350,
        },
      ],
      totalCents: 710,
    });
  });

  it("should merge duplicate lines of the same product", async () => {
    const snapshot = await buildCartSnapshot({
      customerId: "c-1",
      lines: [
        { productId: "p-apple", quantity: 1 },
        { productId: "p-apple", quantity: 2 },
      ],
      catalog,
      now: () => takenAt,
    });

    expect(snapshot.lines).toHaveLength(1);
    expect(snapshot.lines[0].quantity).toBe(3);
    expect(snapshot.totalCents).toBe(360);
  });

  it("should reject an empty cart", async () => {
    await expect(
      buildCartSnapshot({ customerId: "c-1", lines: [], catalog }),
    ).rejects.toBeInstanceOf(EmptyCartError);
  });

  it("should reject a non-positive quantity with the offending product", async () => {
    const result = buildCartSnapshot({
      customerId: "c-1",
      lines: [{ productId: "p-apple", quantity: 0 }],
      catalog,
    });

    await expect(result).rejects.toBeInstanceOf(InvalidLineError);
    await expect(result).rejects.toMatchObject({ productId: "p-apple" });
  });

  it("should reject a product the catalog does not know", async () => {
    await expect(
      buildCartSnapshot({
        customerId: "c-1",
        lines: [{ productId: "p-ghost", quantity: 1 }],
        catalog,
      }),
    ).rejects.toMatchObject({ name: "InvalidLineError", productId: "p-ghost" });
  });

  it("should read the cart through the repository and never write to it", async () => {
    const repository = {
      findLines: vi.fn(async () => [{ productId: "p-bread", quantity: 2 }]),
      removeCheckedOut: vi.fn(async () => {}),
    };
    const service = createCartSnapshotService({
      repository,
      catalog,
      now: () => takenAt,
    });

    const snapshot = await service.takeSnapshot("c-2");

    expect(repository.findLines).toHaveBeenCalledWith("c-2");
    expect(repository.removeCheckedOut).not.toHaveBeenCalled();
    expect(snapshot.totalCents).toBe(700);
  });
});

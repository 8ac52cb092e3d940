import { describe, expect, it } from "vitest";
import { mergeLines } from "../adapters/outbound/persistence/stock-ledger.repository.js";

describe("mergeLines", () => {
  it("should sum quantities per product and sort by product id", () => {
    expect(
      mergeLines([
        { productId: "b", quantity: 1 },
        { productId: "a", quantity: 2 },
        { productId: "b", quantity: 4 },
      ]),
    ).toEqual([
      { productId: "a", quantity: 2 },
      { productId: "b", quantity: 5 },
    ]);
  });

  it("should reject an empty request", () => {
    expect(() => mergeLines([])).toThrow("Cannot reserve an empty list of lines");
  });

  it.each([0, -1, 1.5])("should reject quantity %s", (quantity) => {
    expect(() => mergeLines([{ productId: "a", quantity }])).toThrow(
      "Quantity for product a must be a positive integer",
    );
  });
});

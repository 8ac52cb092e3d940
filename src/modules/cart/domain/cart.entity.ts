import { z } from "zod";

export const CartLineSchema = z.object({
  productId: z.string().min(1),
  quantity: z.number().int().positive(),
});

export type CartLine = z.infer<typeof CartLineSchema>;

export type CartSnapshotLine = {
  productId: string;
  name: string;
  quantity: number;
  unitPriceCents: number;
  subtotalCents: number;
};

/**
 * Immutable copy of a customer's cart taken when checkout begins.
 * Lines are sorted by product id; prices are advisory and get re-confirmed
 * when stock is reserved.
 */
export type CartSnapshot = {
  readonly customerId: string;
  readonly takenAt: string;
  readonly lines: readonly CartSnapshotLine[];
  readonly totalCents: number;
};

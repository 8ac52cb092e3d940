import { z } from "zod";

export const OrderStatusSchema = z.enum(["Placed", "Cancelled"]);
export type OrderStatus = z.infer<typeof OrderStatusSchema>;

export type OrderLine = {
  productId: string;
  quantity: number;
  unitPriceCents: number;
  subtotalCents: number;
};

/**
 * Immutable once saved. The only change ever applied is Placed -> Cancelled.
 */
export type OrderEntity = {
  id: string;
  customerId: string;
  ticketId: string;
  status: OrderStatus;
  lines: OrderLine[];
  totalCents: number;
  shippingAddress: string | null;
  paymentMethod: string | null;
  orderedAt: string;
  cancelledAt: string | null;
};

/**
 * Builds an order from already-priced lines; totals are derived, never supplied.
 */
export function buildOrder(input: {
  id: string;
  customerId: string;
  ticketId: string;
  status: OrderStatus;
  lines: ReadonlyArray<{
    productId: string;
    quantity: number;
    unitPriceCents: number;
  }>;
  shippingAddress: string | null;
  paymentMethod: string | null;
  orderedAt: string;
}): OrderEntity {
  const lines = input.lines.map((l) => ({
    productId: l.productId,
    quantity: l.quantity,
    unitPriceCents: l.unitPriceCents,
    subtotalCents: l.quantity * l.unitPriceCents,
  }));
  return {
    id: input.id,
    customerId: input.customerId,
    ticketId: input.ticketId,
    status: input.status,
    lines,
    totalCents: lines.reduce((sum, l) => sum + l.subtotalCents, 0),
    shippingAddress: input.shippingAddress,
    paymentMethod: input.paymentMethod,
    orderedAt: input.orderedAt,
    cancelledAt: input.status === "Cancelled" ? input.orderedAt : null,
  };
}

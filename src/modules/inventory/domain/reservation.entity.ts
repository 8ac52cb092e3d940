import { z } from "zod";

export const TicketStatusSchema = z.enum(["Pending", "Committed", "Released"]);
export type TicketStatus = z.infer<typeof TicketStatusSchema>;

export type ReservationRequestLine = {
  productId: string;
  quantity: number;
};

export type ReservationLine = ReservationRequestLine & {
  unitPriceCents: number;
};

export type ReservationTicket = {
  id: string;
  idempotencyKey: string;
  status: TicketStatus;
  lines: ReservationLine[];
  totalCents: number;
  createdAt: string;
  updatedAt: string;
  archivedAt: string | null;
};

/**
 * Outbound Port - What the Checkout module needs from the Stock Ledger
 */

import type {
  ReservationRequestLine,
  ReservationTicket,
} from "../../../../inventory/inventory.index.js";

export interface StockReservationPort {
  reserve(
    lines: readonly ReservationRequestLine[],
    idempotencyKey: string,
  ): Promise<ReservationTicket>;
  commit(ticketId: string): Promise<ReservationTicket>;
  release(ticketId: string): Promise<ReservationTicket>;
  findTicketByIdempotencyKey(
    idempotencyKey: string,
  ): Promise<ReservationTicket | undefined>;
}

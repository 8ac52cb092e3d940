/**
 * Inbound Port - The Stock Ledger contract
 * Every method runs as one atomic unit against the product quantity rows.
 */

import type {
  ReservationRequestLine,
  ReservationTicket,
} from "../../../domain/reservation.entity.js";
import type { StockLedgerEntry } from "../../../domain/stock-ledger-entry.entity.js";

export interface StockLedgerPort {
  /**
   * Decrements every line or none. Re-invoking with the key of a Pending or
   * Committed ticket returns that ticket without reserving again.
   * @throws InsufficientStockError if any line would take stock below zero
   * @throws DuplicateRequestError if the key belongs to a Released ticket
   */
  reserve(
    lines: readonly ReservationRequestLine[],
    idempotencyKey: string,
  ): Promise<ReservationTicket>;

  /**
   * Idempotent for a Committed ticket.
   * @throws UnknownTicketError
   * @throws InvalidTransitionError if the ticket is Released
   */
  commit(ticketId: string): Promise<ReservationTicket>;

  /**
   * Returns the reserved quantities to stock. Idempotent for a Released ticket.
   * @throws UnknownTicketError
   * @throws InvalidTransitionError if the ticket is Committed
   */
  release(ticketId: string): Promise<ReservationTicket>;

  /**
   * Puts stock back for a cancelled order. Returns false when `reference`
   * was already restocked.
   */
  restock(
    reference: string,
    lines: readonly ReservationRequestLine[],
  ): Promise<boolean>;

  findTicket(ticketId: string): Promise<ReservationTicket | undefined>;
  findTicketByIdempotencyKey(
    idempotencyKey: string,
  ): Promise<ReservationTicket | undefined>;
  getAvailableQuantity(productId: string): Promise<number | undefined>;
  listEntries(productId: string): Promise<StockLedgerEntry[]>;
}

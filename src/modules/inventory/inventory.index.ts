/**
 * Inventory Module Public API
 */
export {
  createInventoryModule,
  type LedgerEntryType,
  type ReservationLine,
  type ReservationRequestLine,
  type ReservationTicket,
  type StockLedgerEntry,
  type StockLedgerPort,
  type TicketStatus,
} from "./inventory.module.js";
export {
  DuplicateRequestError,
  InsufficientStockError,
  InvalidTransitionError,
  UnknownTicketError,
} from "./errors.js";

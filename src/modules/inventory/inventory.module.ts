/**
 * Inventory Module - Composition root
 */

import type { DatabaseExecutor } from "../shared/infra/db.js";
import type { Logger } from "../shared/infra/logger.js";
import { createStockLedger } from "./adapters/outbound/persistence/stock-ledger.repository.js";
import type { StockLedgerPort } from "./application/ports/inbound/stock-ledger.port.js";

/**
 * Creates the Stock Ledger port. Pass a transaction as `db` to make the
 * ledger's writes part of a larger unit of work.
 */
export function createInventoryModule({
  db,
  logger,
}: {
  db: DatabaseExecutor;
  logger: Logger;
}): StockLedgerPort {
  return createStockLedger({ db, logger });
}

export type { StockLedgerPort } from "./application/ports/inbound/stock-ledger.port.js";
export type {
  ReservationLine,
  ReservationRequestLine,
  ReservationTicket,
  TicketStatus,
} from "./domain/reservation.entity.js";
export type {
  LedgerEntryType,
  StockLedgerEntry,
} from "./domain/stock-ledger-entry.entity.js";

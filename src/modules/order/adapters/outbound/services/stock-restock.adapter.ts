/**
 * Stock Restock Adapter - Adapts the Inventory module's ledger to the Order module's needs
 */

import type { StockLedgerPort } from "../../../../inventory/inventory.index.js";
import type { StockRestockPort } from "../../../application/ports/outbound/stock-restock.port.js";

export function createStockRestockAdapter(
  ledger: StockLedgerPort,
): StockRestockPort {
  return {
    restock: async (reference, lines) => {
      return await ledger.restock(reference, lines);
    },
  };
}

import { z } from "zod";

export const LedgerEntryTypeSchema = z.enum([
  "StockReserved",
  "StockCommitted",
  "StockReleased",
  "StockRestocked",
]);
export type LedgerEntryType = z.infer<typeof LedgerEntryTypeSchema>;

export type StockLedgerEntry = {
  id: string;
  productId: string;
  type: LedgerEntryType;
  quantityDelta: number;
  // null for entries that do not touch the counter (commits)
  balanceAfter: number | null;
  reference: string;
  recordedAt: string;
};

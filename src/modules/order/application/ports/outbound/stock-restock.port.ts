/**
 * Outbound Port - What the Order module needs from the Inventory module
 */

export interface StockRestockPort {
  restock(
    reference: string,
    lines: ReadonlyArray<{ productId: string; quantity: number }>,
  ): Promise<boolean>;
}

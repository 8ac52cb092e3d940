/**
 * A catalog product as seen by checkout: identity, current price and the
 * authoritative available quantity. Prices are integer cents.
 */
export type ProductEntity = {
  id: string;
  name: string;
  priceCents: number;
  availableQuantity: number;
};

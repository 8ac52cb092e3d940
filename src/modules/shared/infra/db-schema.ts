/**
 * Table types for every relation the service reads or writes.
 * Kept by hand next to `database/migrations`; columns are text and integer.
 */

export interface ProductsTable {
  id: string;
  name: string;
  price_cents: number;
  available_quantity: number;
  updated_at: string;
}

export interface CartItemsTable {
  customer_id: string;
  product_id: string;
  quantity: number;
  added_at: string;
}

export interface ReservationsTable {
  id: string;
  idempotency_key: string;
  status: string;
  total_cents: number;
  created_at: string;
  updated_at: string;
  archived_at: string | null;
}

export interface ReservationLinesTable {
  reservation_id: string;
  product_id: string;
  quantity: number;
  unit_price_cents: number;
}

export interface StockLedgerEntriesTable {
  id: string;
  product_id: string;
  entry_type: string;
  quantity_delta: number;
  balance_after: number | null;
  reference: string;
  recorded_at: string;
}

export interface OrdersTable {
  id: string;
  customer_id: string;
  ticket_id: string;
  status: string;
  total_cents: number;
  shipping_address: string | null;
  payment_method: string | null;
  ordered_at: string;
  cancelled_at: string | null;
}

export interface OrderLinesTable {
  order_id: string;
  line_no: number;
  product_id: string;
  quantity: number;
  unit_price_cents: number;
  subtotal_cents: number;
}

export interface CheckoutAttemptsTable {
  idempotency_key: string;
  customer_id: string;
  state: string;
  ticket_id: string | null;
  order_id: string | null;
  outcome: string | null;
  failed_product_id: string | null;
  shipping_address: string | null;
  payment_method: string | null;
  created_at: string;
  updated_at: string;
}

export interface DB {
  products: ProductsTable;
  cart_items: CartItemsTable;
  reservations: ReservationsTable;
  reservation_lines: ReservationLinesTable;
  stock_ledger_entries: StockLedgerEntriesTable;
  orders: OrdersTable;
  order_lines: OrderLinesTable;
  checkout_attempts: CheckoutAttemptsTable;
}

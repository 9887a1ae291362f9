/**
 * Receipt domain types
 */

// Snapshot of an item's price and description at the time of sale
export interface SaleLine {
  itemId: string;
  description: string;
  unitPriceCents: number;
  qty: number;
}

export interface Receipt {
  receiptNo: number;
  canceled: boolean;
  createdAt: Date;
  lines: SaleLine[];
}

// Derived from `canceled` and the remaining lines; never stored
export enum ReceiptStatus {
  OPEN = 'OPEN',
  CANCELED = 'CANCELED',
  FULLY_RETURNED = 'FULLY_RETURNED',
}

export interface ReceiptView extends Receipt {
  status: ReceiptStatus;
  totalCents: number;
  total: string;
}

// Database row types (snake_case from PostgreSQL)
export interface ReceiptLineRow {
  item_id: string;
  line_no: number;
  description: string;
  unit_price_cents: number;
  qty: number;
}

export interface ReceiptRow {
  receipt_no: number;
  canceled: boolean;
  created_at: string;
  receipt_lines: ReceiptLineRow[] | null;
}

/**
 * Item domain types
 */

export interface Item {
  id: string;
  description: string;
  onHand: number;
  unitPriceCents: number;
  maxQty: number;
  orderThreshold: number;
  replenishmentQty: number;
}

// Database row type (snake_case from PostgreSQL)
export interface ItemRow {
  item_id: string;
  description: string;
  on_hand: number;
  unit_price_cents: number;
  max_qty: number;
  order_threshold: number;
  replenishment_qty: number;
}

// Item requested by the operator for a sale, before price/description are resolved
export interface ItemRequest {
  itemId: string;
  qty: number;
}

// Row of the reorder report
export interface ReorderSuggestion {
  item: Item;
  suggestedOrderQty: number;
}

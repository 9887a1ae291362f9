import { SupabaseClient } from '@supabase/supabase-js';
import { Item, ItemRow } from '../../types/item.types';
import { InventoryLedger } from '../../types/storage.types';
import { StorageFaultError } from '../../types/error.types';
import { componentLogger } from '../../config/logger';
import { NO_ROWS, PosOperation, itemRowSchema, parseRow } from './operations';

const logger = componentLogger('supabase-inventory');

/**
 * Map database row to domain model
 */
export const mapToItem = (row: ItemRow): Item => ({
  id: row.item_id,
  description: row.description,
  onHand: row.on_hand,
  unitPriceCents: row.unit_price_cents,
  maxQty: row.max_qty,
  orderThreshold: row.order_threshold,
  replenishmentQty: row.replenishment_qty,
});

export const mapToItemRow = (item: Item): ItemRow => ({
  item_id: item.id,
  description: item.description,
  on_hand: item.onHand,
  unit_price_cents: item.unitPriceCents,
  max_qty: item.maxQty,
  order_threshold: item.orderThreshold,
  replenishment_qty: item.replenishmentQty,
});

/**
 * Supabase Inventory Ledger (one per scope)
 *
 * Reads go to the `items` table; deltas are buffered into `operations`
 * and reflected in later reads of the same scope.
 */
export class SupabaseInventoryLedger implements InventoryLedger {
  private observed = new Map<string, Item>();
  private pending = new Map<string, number>();

  constructor(
    private client: SupabaseClient,
    private operations: PosOperation[]
  ) {}

  async get(itemId: string): Promise<Item | null> {
    let item = this.observed.get(itemId);

    if (!item) {
      const { data, error } = await this.client
        .from('items')
        .select('*')
        .eq('item_id', itemId)
        .single();

      if (error) {
        if (error.code === NO_ROWS) return null;
        logger.error('Failed to find item', { itemId, error: error.message });
        throw new StorageFaultError(`Failed to find item: ${error.message}`);
      }

      item = mapToItem(parseRow(itemRowSchema, data, 'item'));
      this.observed.set(itemId, item);
    }

    return this.withPending(item);
  }

  async list(): Promise<Item[]> {
    const { data, error } = await this.client.from('items').select('*').order('item_id');

    if (error) {
      logger.error('Failed to list items', { error: error.message });
      throw new StorageFaultError(`Failed to list items: ${error.message}`);
    }

    const rows: unknown[] = Array.isArray(data) ? data : [];
    return rows.map((row) => {
      const item = mapToItem(parseRow(itemRowSchema, row, 'item'));
      // Keep the first observation so commit guards stay consistent
      if (!this.observed.has(item.id)) this.observed.set(item.id, item);
      return this.withPending(this.observed.get(item.id) ?? item);
    });
  }

  async applyDelta(itemId: string, delta: number): Promise<boolean> {
    const current = await this.get(itemId);
    if (!current) return false;

    const result = current.onHand + delta;
    this.operations.push({
      op: 'apply_item_delta',
      item_id: itemId,
      delta,
      // A scope that saw stock stay non-negative must not commit an oversell
      min_on_hand: result >= 0 ? 0 : null,
    });
    this.pending.set(itemId, (this.pending.get(itemId) ?? 0) + delta);

    return true;
  }

  private withPending(item: Item): Item {
    return { ...item, onHand: item.onHand + (this.pending.get(item.id) ?? 0) };
  }
}

/**
 * Upsert items into the `items` table (inventory import)
 */
export async function upsertItems(client: SupabaseClient, items: Item[]): Promise<number> {
  if (items.length === 0) return 0;

  const { error } = await client
    .from('items')
    .upsert(items.map(mapToItemRow), { onConflict: 'item_id' });

  if (error) {
    logger.error('Failed to upsert items', { error: error.message });
    throw new StorageFaultError(`Failed to upsert items: ${error.message}`);
  }

  logger.info('Items upserted', { count: items.length });
  return items.length;
}

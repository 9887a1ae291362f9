import { Item, ReorderSuggestion } from '../types/item.types';
import { TransactionManager } from '../types/storage.types';
import { AppError, ErrorCode } from '../types/error.types';
import { componentLogger } from '../config/logger';

const logger = componentLogger('inventory-service');

/**
 * Quantity to order so stock is replenished without exceeding max_qty
 */
export function suggestedOrderQty(item: Item): number {
  return Math.max(0, Math.min(item.replenishmentQty, item.maxQty - item.onHand));
}

/**
 * Inventory Service
 *
 * Read side of the inventory ledger: enumeration for display and reorder report
 */
export class InventoryService {
  constructor(private tx: TransactionManager) {}

  async listItems(): Promise<Item[]> {
    return this.tx.run(({ inventory }) => inventory.list());
  }

  async getItem(id: string): Promise<Item> {
    logger.debug('Getting item', { id });

    const item = await this.tx.run(({ inventory }) => inventory.get(id));

    if (!item) {
      throw new AppError(ErrorCode.ITEM_NOT_FOUND, `Item with ID ${id} not found`, 404);
    }

    return item;
  }

  /**
   * Items at or below their order threshold
   */
  async reorderReport(): Promise<ReorderSuggestion[]> {
    const items = await this.listItems();

    const report = items
      .filter((item) => item.onHand <= item.orderThreshold)
      .map((item) => ({ item, suggestedOrderQty: suggestedOrderQty(item) }));

    logger.debug('Reorder report built', { items: items.length, belowThreshold: report.length });
    return report;
  }
}

import { Item } from '../../types/item.types';
import { InventoryLedger } from '../../types/storage.types';

export type InventorySnapshot = ReadonlyMap<string, Item>;

/**
 * In-memory Inventory Ledger
 *
 * Holds item records keyed by item ID. Items are replaced, never mutated in
 * place, so a snapshot only needs to copy the map.
 */
export class InMemoryInventoryLedger implements InventoryLedger {
  private items = new Map<string, Item>();
  private revisionCounter = 0;

  constructor(items: Item[] = []) {
    for (const item of items) {
      this.items.set(item.id, { ...item });
    }
  }

  // Bumped by every applied delta
  get revision(): number {
    return this.revisionCounter;
  }

  async get(itemId: string): Promise<Item | null> {
    const item = this.items.get(itemId);
    return item ? { ...item } : null;
  }

  async list(): Promise<Item[]> {
    return Array.from(this.items.values(), (item) => ({ ...item }));
  }

  async applyDelta(itemId: string, delta: number): Promise<boolean> {
    const item = this.items.get(itemId);
    if (!item) return false;

    this.items.set(itemId, { ...item, onHand: item.onHand + delta });
    this.revisionCounter += 1;
    return true;
  }

  snapshot(): InventorySnapshot {
    return new Map(this.items);
  }

  restore(snapshot: InventorySnapshot): void {
    this.items = new Map(snapshot);
  }
}

import { Item } from '../types/item.types';
import { SaleLine } from '../types/receipt.types';
import { sumLinesCents } from '../utils/money';

/**
 * Candidate lines of a sale that has not been committed yet.
 *
 * Adding an item that is already on the draft grows its line, so a
 * committed receipt never holds two lines for one item.
 */
export class SaleDraft {
  private entries: SaleLine[] = [];

  addItem(item: Item, qty: number): SaleLine {
    if (!Number.isInteger(qty) || qty <= 0) {
      throw new RangeError(`Quantity must be a positive integer, got ${qty}`);
    }

    const index = this.entries.findIndex((line) => line.itemId === item.id);
    const existing = this.entries[index];

    if (existing) {
      const merged = { ...existing, qty: existing.qty + qty };
      this.entries[index] = merged;
      return { ...merged };
    }

    const line: SaleLine = {
      itemId: item.id,
      description: item.description,
      unitPriceCents: item.unitPriceCents,
      qty,
    };
    this.entries.push(line);
    return { ...line };
  }

  // Zero-based index into lines()
  removeLine(index: number): SaleLine {
    const [removed] = index >= 0 ? this.entries.splice(index, 1) : [];
    if (!removed) {
      throw new RangeError(`No line at position ${index}`);
    }
    return removed;
  }

  lines(): SaleLine[] {
    return this.entries.map((line) => ({ ...line }));
  }

  totalCents(): number {
    return sumLinesCents(this.entries);
  }

  isEmpty(): boolean {
    return this.entries.length === 0;
  }
}

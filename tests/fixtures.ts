import { Item } from '../src/types/item.types';
import { CommitResult, Rejection } from '../src/types/result.types';
import { InMemoryInventoryLedger } from '../src/repositories/memory/inventory-ledger.repository';
import { InMemoryReceiptStore } from '../src/repositories/memory/receipt-store.repository';
import {
  InMemoryTransactionManager,
  MemoryTransactionOptions,
} from '../src/repositories/memory/transaction-manager';

export const makeItem = (overrides: Partial<Item> & Pick<Item, 'id'>): Item => ({
  description: `Item ${overrides.id}`,
  onHand: 10,
  unitPriceCents: 100,
  maxQty: 50,
  orderThreshold: 5,
  replenishmentQty: 20,
  ...overrides,
});

// X: 10 on hand at 1.50, Y: 20 on hand at 2.00
export const standardItems = (): Item[] => [
  makeItem({ id: 'X', description: 'Widget', onHand: 10, unitPriceCents: 150 }),
  makeItem({ id: 'Y', description: 'Gadget', onHand: 20, unitPriceCents: 200 }),
];

export function createMemoryLedger(items: Item[] = standardItems(), options: MemoryTransactionOptions = {}) {
  const inventory = new InMemoryInventoryLedger(items);
  const receipts = new InMemoryReceiptStore();
  const tx = new InMemoryTransactionManager(inventory, receipts, options);
  return { inventory, receipts, tx };
}

export function expectCommitted<T>(result: CommitResult<T>): T {
  if (!result.ok) {
    throw new Error(`Expected commit, got ${result.rejection.reason}: ${result.rejection.message}`);
  }
  return result.value;
}

export function expectRejected<T>(result: CommitResult<T>): Rejection {
  if (result.ok) {
    throw new Error('Expected rejection, operation committed');
  }
  return result.rejection;
}

/**
 * Storage contracts shared by the memory and Supabase backends
 */
import { Item } from './item.types';
import { Receipt, SaleLine } from './receipt.types';

export interface InventoryLedger {
  get(itemId: string): Promise<Item | null>;
  list(): Promise<Item[]>;
  // Returns false when the item does not exist. No bounds check on the result.
  applyDelta(itemId: string, delta: number): Promise<boolean>;
}

export interface ReceiptStore {
  nextReceiptNo(): Promise<number>;
  createReceipt(lines: SaleLine[]): Promise<number>;
  getReceipt(receiptNo: number): Promise<Receipt | null>;
  setCanceled(receiptNo: number): Promise<void>;
  // newQty <= 0 deletes the line
  updateLineQty(receiptNo: number, itemId: string, newQty: number): Promise<void>;
}

export interface LedgerScope {
  inventory: InventoryLedger;
  receipts: ReceiptStore;
}

/**
 * Runs `work` against a scope whose mutations are committed together,
 * or not at all when `work` throws.
 */
export interface TransactionManager {
  run<T>(work: (scope: LedgerScope) => Promise<T>): Promise<T>;
}

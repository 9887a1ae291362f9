import { LedgerScope, TransactionManager } from '../../types/storage.types';
import { StorageFaultError } from '../../types/error.types';
import { componentLogger } from '../../config/logger';
import { InMemoryInventoryLedger } from './inventory-ledger.repository';
import { InMemoryReceiptStore } from './receipt-store.repository';

const logger = componentLogger('memory-transaction');

export interface CommitContext {
  inventoryChanged: boolean;
}

export interface MemoryTransactionOptions {
  /**
   * Runs after `work` succeeds and before the scope is released.
   * Throwing here rolls the scope back.
   */
  onCommit?: (scope: LedgerScope, context: CommitContext) => Promise<void>;
}

/**
 * In-memory Transaction Manager
 *
 * Scopes run one at a time in arrival order, so every on-hand and receipt
 * mutation is a critical section. State is snapshotted when a scope opens
 * and restored if the work (or the commit hook) throws.
 */
export class InMemoryTransactionManager implements TransactionManager {
  private tail: Promise<void> = Promise.resolve();

  constructor(
    private inventory: InMemoryInventoryLedger,
    private receipts: InMemoryReceiptStore,
    private options: MemoryTransactionOptions = {}
  ) {}

  run<T>(work: (scope: LedgerScope) => Promise<T>): Promise<T> {
    const result = this.tail.then(() => this.execute(work));
    this.tail = result.then(
      () => undefined,
      () => undefined
    );
    return result;
  }

  private async execute<T>(work: (scope: LedgerScope) => Promise<T>): Promise<T> {
    const inventorySnapshot = this.inventory.snapshot();
    const receiptSnapshot = this.receipts.snapshot();
    const revision = this.inventory.revision;
    const scope: LedgerScope = { inventory: this.inventory, receipts: this.receipts };

    try {
      const result = await work(scope);
      await this.commit(scope, { inventoryChanged: this.inventory.revision !== revision });
      return result;
    } catch (error) {
      this.inventory.restore(inventorySnapshot);
      this.receipts.restore(receiptSnapshot);
      logger.warn('Ledger scope rolled back', {
        error: error instanceof Error ? error.message : String(error),
      });
      throw error;
    }
  }

  private async commit(scope: LedgerScope, context: CommitContext): Promise<void> {
    if (!this.options.onCommit) return;

    try {
      await this.options.onCommit(scope, context);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger.error('Commit hook failed', { error: message });
      throw new StorageFaultError(`Failed to persist ledger state: ${message}`);
    }
  }
}

import { SupabaseClient } from '@supabase/supabase-js';
import { LedgerScope, TransactionManager } from '../../types/storage.types';
import { AppError, ErrorCode, StorageFaultError } from '../../types/error.types';
import { componentLogger } from '../../config/logger';
import { SupabaseInventoryLedger } from './inventory-ledger.repository';
import { SupabaseReceiptStore } from './receipt-store.repository';
import { PosOperation, SERIALIZATION_FAILURE } from './operations';

const logger = componentLogger('supabase-transaction');

export interface SupabaseTransactionOptions {
  maxAttempts: number;
}

/**
 * Supabase Transaction Manager
 *
 * Concurrency approach:
 * 1. `work` runs against a fresh scope; reads hit the database, writes are
 *    buffered as operations guarded by what the scope observed
 * 2. The whole batch is sent to `apply_pos_operations`, which applies it in
 *    one Postgres transaction, locking each items/receipts row it touches
 * 3. If a guard no longer holds the function raises 40001,
 *    nothing is applied, and `work` is run again on a new scope
 *
 * A crash between the inventory and receipt writes is impossible: both are
 * part of the same database transaction.
 */
export class SupabaseTransactionManager implements TransactionManager {
  constructor(
    private client: SupabaseClient,
    private options: SupabaseTransactionOptions
  ) {}

  async run<T>(work: (scope: LedgerScope) => Promise<T>): Promise<T> {
    for (let attempt = 1; attempt <= this.options.maxAttempts; attempt++) {
      const operations: PosOperation[] = [];
      const scope: LedgerScope = {
        inventory: new SupabaseInventoryLedger(this.client, operations),
        receipts: new SupabaseReceiptStore(this.client, operations),
      };

      const result = await work(scope);

      // Read-only scope
      if (operations.length === 0) return result;

      const { error } = await this.client.rpc('apply_pos_operations', {
        p_operations: operations,
      });

      if (!error) {
        logger.debug('Ledger operations applied', { count: operations.length, attempt });
        return result;
      }

      if (error.code === SERIALIZATION_FAILURE) {
        logger.warn('Ledger scope conflicted with a concurrent commit, retrying', {
          attempt,
          error: error.message,
        });
        continue;
      }

      logger.error('Failed to apply ledger operations', {
        error: error.message,
        code: error.code,
        details: error.details,
        hint: error.hint,
      });
      throw new StorageFaultError(`Failed to apply ledger operations: ${error.message}`);
    }

    throw new AppError(
      ErrorCode.CONCURRENT_MODIFICATION,
      `Ledger operation conflicted with concurrent updates ${this.options.maxAttempts} times`,
      409,
      { attempts: this.options.maxAttempts }
    );
  }
}

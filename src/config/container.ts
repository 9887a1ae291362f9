import { Item } from '../types/item.types';
import { TransactionManager } from '../types/storage.types';
import { InMemoryInventoryLedger } from '../repositories/memory/inventory-ledger.repository';
import { InMemoryReceiptStore } from '../repositories/memory/receipt-store.repository';
import {
  InMemoryTransactionManager,
  MemoryTransactionOptions,
} from '../repositories/memory/transaction-manager';
import { InventoryFileRepository } from '../repositories/memory/inventory-file.repository';
import { SupabaseTransactionManager } from '../repositories/supabase/transaction-manager';
import { InventoryService } from '../services/inventory.service';
import { ReceiptService } from '../services/receipt.service';
import { ReturnService } from '../services/return.service';
import { SaleService } from '../services/sale.service';
import { env } from './environment';
import { getSupabaseClient } from './database';
import { logger } from './logger';

export type StorageDriver = 'memory' | 'supabase';

/**
 * Services wired to one storage backend
 */
export interface PosContainer {
  storage: StorageDriver;
  inventoryService: InventoryService;
  saleService: SaleService;
  returnService: ReturnService;
  receiptService: ReceiptService;
}

export interface ContainerOptions {
  allowNegativeStock: boolean;
}

export function createServices(
  storage: StorageDriver,
  tx: TransactionManager,
  options: ContainerOptions
): PosContainer {
  return {
    storage,
    inventoryService: new InventoryService(tx),
    saleService: new SaleService(tx, { allowNegativeStock: options.allowNegativeStock }),
    returnService: new ReturnService(tx),
    receiptService: new ReceiptService(tx),
  };
}

/**
 * Memory-backed container (development, demo and tests)
 */
export function createMemoryContainer(
  items: Item[],
  options: ContainerOptions,
  transactionOptions: MemoryTransactionOptions = {}
): PosContainer {
  const tx = new InMemoryTransactionManager(
    new InMemoryInventoryLedger(items),
    new InMemoryReceiptStore(),
    transactionOptions
  );
  return createServices('memory', tx, options);
}

/**
 * Build the container described by the environment
 */
export async function createContainer(): Promise<PosContainer> {
  const options: ContainerOptions = { allowNegativeStock: env.ALLOW_NEGATIVE_STOCK };

  if (env.STORAGE_DRIVER === 'supabase') {
    const tx = new SupabaseTransactionManager(getSupabaseClient(), {
      maxAttempts: env.TX_MAX_ATTEMPTS,
    });
    return createServices('supabase', tx, options);
  }

  if (!env.INVENTORY_CSV_PATH) {
    logger.warn('INVENTORY_CSV_PATH not set, starting with an empty inventory');
    return createMemoryContainer([], options);
  }

  const file = new InventoryFileRepository(env.INVENTORY_CSV_PATH);
  const { items } = await file.load();

  const transactionOptions: MemoryTransactionOptions = env.INVENTORY_WRITE_THROUGH
    ? {
        onCommit: async ({ inventory }, { inventoryChanged }) => {
          if (inventoryChanged) await file.save(await inventory.list());
        },
      }
    : {};

  return createMemoryContainer(items, options, transactionOptions);
}

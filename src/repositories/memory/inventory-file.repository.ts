import { promises as fs } from 'fs';
import path from 'path';
import { Item } from '../../types/item.types';
import { StorageFaultError } from '../../types/error.types';
import { componentLogger } from '../../config/logger';
import { ParsedInventory, parseInventoryCsv, serializeInventoryCsv } from '../../utils/inventory-csv';

const logger = componentLogger('inventory-file');

/**
 * Inventory CSV on disk: seed for the memory ledger and
 * write-through target for on-hand changes.
 */
export class InventoryFileRepository {
  constructor(private filePath: string) {}

  async load(): Promise<ParsedInventory> {
    let text: string;
    try {
      text = await fs.readFile(this.filePath, 'utf8');
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new StorageFaultError(`Failed to read inventory file: ${message}`, { path: this.filePath });
    }

    const parsed = parseInventoryCsv(text);

    for (const err of parsed.errors) {
      logger.warn('Skipped malformed inventory row', { path: this.filePath, ...err });
    }
    logger.info('Inventory loaded', { path: this.filePath, items: parsed.items.length });

    return parsed;
  }

  /**
   * Rewrite the whole file via a temp file and rename
   */
  async save(items: Item[]): Promise<void> {
    const tmpPath = path.join(path.dirname(this.filePath), `.${path.basename(this.filePath)}.tmp`);

    try {
      await fs.writeFile(tmpPath, `${serializeInventoryCsv(items)}\n`, 'utf8');
      await fs.rename(tmpPath, this.filePath);
    } catch (error) {
      await fs.rm(tmpPath, { force: true });
      throw error;
    }

    logger.debug('Inventory written', { path: this.filePath, items: items.length });
  }
}

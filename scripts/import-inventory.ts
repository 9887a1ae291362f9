import { getSupabaseClient } from '../src/config/database';
import { upsertItems } from '../src/repositories/supabase/inventory-ledger.repository';
import { InventoryFileRepository } from '../src/repositories/memory/inventory-file.repository';

/**
 * Upsert an inventory CSV into the Supabase items table
 *
 * Usage: npm run import:inventory -- data/inventory.csv
 */
async function importInventory(): Promise<void> {
  const filePath = process.argv[2];
  if (!filePath) {
    console.error('Usage: npm run import:inventory -- <inventory.csv>');
    process.exit(1);
  }

  const { items, errors } = await new InventoryFileRepository(filePath).load();
  for (const err of errors) {
    console.warn(`⚠️  line ${err.line}: ${err.message}`);
  }

  const count = await upsertItems(getSupabaseClient(), items);
  console.log(`✅ Imported ${count} items (${errors.length} rows skipped)`);
}

importInventory().catch((error: unknown) => {
  console.error('❌ Import failed:', error);
  process.exit(1);
});

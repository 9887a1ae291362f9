import path from 'path';
import { createMemoryContainer } from '../src/config/container';
import { InventoryFileRepository } from '../src/repositories/memory/inventory-file.repository';
import { formatCents } from '../src/utils/money';

/**
 * Non-interactive demo against the sample inventory (nothing is written back):
 * sell one unit of the first in-stock item, then return it.
 */
async function runDemo(): Promise<void> {
  const inventoryPath = process.argv[2] ?? path.join(__dirname, '../data/inventory.sample.csv');
  const { items } = await new InventoryFileRepository(inventoryPath).load();
  const { inventoryService, saleService, receiptService, returnService } = createMemoryContainer(items, {
    allowNegativeStock: false,
  });

  console.log('=== POS LEDGER | DEMO ===');
  for (const item of (await inventoryService.listItems()).slice(0, 3)) {
    console.log(`- ${item.id} | ${item.description} | $${formatCents(item.unitPriceCents)} | on_hand=${item.onHand}`);
  }

  const first = (await inventoryService.listItems()).find((item) => item.onHand > 0);
  if (!first) {
    console.log('Demo cannot run: no item in stock.');
    return;
  }

  const quote = await saleService.quote([{ itemId: first.id, qty: 1 }]);
  if (!quote.ok) throw new Error(quote.rejection.message);

  const tenderedCents = quote.value.totalCents + 100;
  const sale = await saleService.checkout([{ itemId: first.id, qty: 1 }], tenderedCents);
  if (!sale.ok) throw new Error(sale.rejection.message);

  console.log(
    `SALE: 1 x ${first.description} | total=$${quote.value.total} | cash=$${formatCents(tenderedCents)} | change=$${formatCents(sale.value.changeCents)}`
  );
  console.log(`RECEIPT: ${sale.value.receiptNo}`);

  const returned = await returnService.returnPartial(sale.value.receiptNo, first.id, 1);
  if (!returned.ok) throw new Error(returned.rejection.message);

  const receipt = await receiptService.getReceipt(sale.value.receiptNo);
  const after = await inventoryService.getItem(first.id);
  console.log(`RETURN: 1 x ${first.description} | receipt=${receipt.receiptNo} | status=${receipt.status}`);
  console.log(`ON HAND: ${first.id} ${first.onHand} -> ${after.onHand}`);
  console.log('=== DEMO COMPLETE ===');
}

runDemo().catch((error: unknown) => {
  console.error('Demo failed:', error);
  process.exit(1);
});

import { describe, expect, it } from 'vitest';
import { ReturnService } from '../src/services/return.service';
import { SaleService } from '../src/services/sale.service';
import { StorageFaultError } from '../src/types/error.types';
import { RejectionReason } from '../src/types/result.types';
import { createMemoryLedger, expectCommitted, expectRejected } from './fixtures';

async function setupWithSale(lines: Array<{ itemId: string; qty: number }>) {
  const ledger = createMemoryLedger();
  const sales = new SaleService(ledger.tx);
  const returns = new ReturnService(ledger.tx);
  const sale = expectCommitted(await sales.checkout(lines, 100000));
  return { ...ledger, sales, returns, receiptNo: sale.receiptNo };
}

describe('ReturnService', () => {
  describe('returnAll', () => {
    it('restores inventory and cancels the receipt', async () => {
      const { inventory, receipts, returns, receiptNo } = await setupWithSale([{ itemId: 'X', qty: 3 }]);
      expect((await inventory.get('X'))?.onHand).toBe(7);

      const result = expectCommitted(await returns.returnAll(receiptNo));

      expect(result).toEqual({ receiptNo, restored: [{ itemId: 'X', qty: 3 }] });
      expect((await inventory.get('X'))?.onHand).toBe(10);
      expect((await receipts.getReceipt(receiptNo))?.canceled).toBe(true);
    });

    it('rejects a second full return without restoring twice', async () => {
      const { inventory, returns, receiptNo } = await setupWithSale([
        { itemId: 'X', qty: 3 },
        { itemId: 'Y', qty: 4 },
      ]);

      expectCommitted(await returns.returnAll(receiptNo));
      const second = expectRejected(await returns.returnAll(receiptNo));

      expect(second.reason).toBe(RejectionReason.ALREADY_CANCELED);
      expect((await inventory.get('X'))?.onHand).toBe(10);
      expect((await inventory.get('Y'))?.onHand).toBe(20);
    });

    it('rejects an unknown receipt', async () => {
      const { returns } = await setupWithSale([{ itemId: 'X', qty: 1 }]);

      const rejection = expectRejected(await returns.returnAll(42));

      expect(rejection.reason).toBe(RejectionReason.NOT_FOUND);
      expect(rejection.details).toEqual({ receiptNo: 42 });
    });

    it('restores only what remains after a partial return', async () => {
      const { inventory, returns, receiptNo } = await setupWithSale([{ itemId: 'Y', qty: 5 }]);

      expectCommitted(await returns.returnPartial(receiptNo, 'Y', 2));
      const result = expectCommitted(await returns.returnAll(receiptNo));

      expect(result.restored).toEqual([{ itemId: 'Y', qty: 3 }]);
      expect((await inventory.get('Y'))?.onHand).toBe(20);
    });

    it('cancels a receipt whose lines were all returned without restoring anything', async () => {
      const { inventory, receipts, returns, receiptNo } = await setupWithSale([{ itemId: 'X', qty: 2 }]);

      expectCommitted(await returns.returnPartial(receiptNo, 'X', 2));
      const result = expectCommitted(await returns.returnAll(receiptNo));

      expect(result.restored).toEqual([]);
      expect((await inventory.get('X'))?.onHand).toBe(10);
      expect((await receipts.getReceipt(receiptNo))?.canceled).toBe(true);
    });

    it('throws a storage fault and rolls back when a receipt item left inventory', async () => {
      const { inventory, receipts, tx } = createMemoryLedger();
      const returns = new ReturnService(tx);
      const receiptNo = await receipts.createReceipt([
        { itemId: 'X', description: 'Widget', unitPriceCents: 150, qty: 2 },
        { itemId: 'GHOST', description: 'Gone', unitPriceCents: 100, qty: 1 },
      ]);

      await expect(returns.returnAll(receiptNo)).rejects.toBeInstanceOf(StorageFaultError);

      expect((await inventory.get('X'))?.onHand).toBe(10);
      expect((await receipts.getReceipt(receiptNo))?.canceled).toBe(false);
    });
  });

  describe('returnPartial', () => {
    it('restores units and shrinks the line', async () => {
      const { inventory, receipts, returns, receiptNo } = await setupWithSale([{ itemId: 'Y', qty: 5 }]);
      expect((await inventory.get('Y'))?.onHand).toBe(15);

      const result = expectCommitted(await returns.returnPartial(receiptNo, 'Y', 2));

      expect(result).toEqual({ receiptNo, itemId: 'Y', returnedQty: 2, remainingQty: 3, lineRemoved: false });
      expect((await inventory.get('Y'))?.onHand).toBe(17);
      expect((await receipts.getReceipt(receiptNo))?.lines[0]?.qty).toBe(3);
    });

    it('removes the line when the whole quantity comes back', async () => {
      const { inventory, receipts, returns, receiptNo } = await setupWithSale([
        { itemId: 'X', qty: 3 },
        { itemId: 'Y', qty: 1 },
      ]);

      const result = expectCommitted(await returns.returnPartial(receiptNo, 'X', 3));

      expect(result.lineRemoved).toBe(true);
      expect(result.remainingQty).toBe(0);
      expect((await inventory.get('X'))?.onHand).toBe(10);
      const receipt = await receipts.getReceipt(receiptNo);
      expect(receipt?.lines.map((line) => line.itemId)).toEqual(['Y']);
      expect(receipt?.canceled).toBe(false);
    });

    it('rejects returning more than was sold on the line', async () => {
      const { inventory, receipts, returns, receiptNo } = await setupWithSale([{ itemId: 'Y', qty: 5 }]);

      const rejection = expectRejected(await returns.returnPartial(receiptNo, 'Y', 6));

      expect(rejection.reason).toBe(RejectionReason.INVALID_QTY);
      expect(rejection.message).toBe('Return quantity must be between 1 and 5, got 6');
      expect((await inventory.get('Y'))?.onHand).toBe(15);
      expect((await receipts.getReceipt(receiptNo))?.lines[0]?.qty).toBe(5);
    });

    it.each([0, -1, 1.5])('rejects return quantity %s', async (qty) => {
      const { returns, receiptNo } = await setupWithSale([{ itemId: 'Y', qty: 5 }]);

      expect(expectRejected(await returns.returnPartial(receiptNo, 'Y', qty)).reason).toBe(
        RejectionReason.INVALID_QTY
      );
    });

    it('rejects an item that is not on the receipt', async () => {
      const { returns, receiptNo } = await setupWithSale([{ itemId: 'Y', qty: 5 }]);

      const rejection = expectRejected(await returns.returnPartial(receiptNo, 'X', 1));

      expect(rejection.reason).toBe(RejectionReason.LINE_NOT_FOUND);
      expect(rejection.details).toEqual({ receiptNo, itemId: 'X' });
    });

    it('rejects a line that an earlier partial return removed', async () => {
      const { returns, receiptNo } = await setupWithSale([{ itemId: 'Y', qty: 2 }]);

      expectCommitted(await returns.returnPartial(receiptNo, 'Y', 2));

      expect(expectRejected(await returns.returnPartial(receiptNo, 'Y', 1)).reason).toBe(
        RejectionReason.LINE_NOT_FOUND
      );
    });

    it('rejects an unknown receipt', async () => {
      const { returns } = await setupWithSale([{ itemId: 'Y', qty: 2 }]);

      expect(expectRejected(await returns.returnPartial(99, 'Y', 1)).reason).toBe(RejectionReason.NOT_FOUND);
    });

    it('rejects a canceled receipt', async () => {
      const { inventory, returns, receiptNo } = await setupWithSale([{ itemId: 'Y', qty: 5 }]);

      expectCommitted(await returns.returnAll(receiptNo));
      const rejection = expectRejected(await returns.returnPartial(receiptNo, 'Y', 1));

      expect(rejection.reason).toBe(RejectionReason.ALREADY_CANCELED);
      expect((await inventory.get('Y'))?.onHand).toBe(20);
    });

    it('never returns more units in total than were sold', async () => {
      const { inventory, returns, receiptNo } = await setupWithSale([{ itemId: 'Y', qty: 5 }]);

      expectCommitted(await returns.returnPartial(receiptNo, 'Y', 2));
      expectCommitted(await returns.returnPartial(receiptNo, 'Y', 2));
      expectRejected(await returns.returnPartial(receiptNo, 'Y', 2));
      expectCommitted(await returns.returnPartial(receiptNo, 'Y', 1));

      expect((await inventory.get('Y'))?.onHand).toBe(20);
    });
  });
});

import { FullReturnResult, PartialReturnResult } from '../types/return.types';
import { TransactionManager } from '../types/storage.types';
import { StorageFaultError } from '../types/error.types';
import { CommitResult, RejectionReason, committed, rejected } from '../types/result.types';
import { componentLogger } from '../config/logger';

const logger = componentLogger('return-service');

/**
 * Return Service
 *
 * Return transaction coordinator. Receipt state machine:
 * - OPEN --returnAll--> CANCELED (terminal)
 * - OPEN --returnPartial--> OPEN, the line shrinks and is dropped at zero
 *
 * A receipt whose every line was returned stays un-canceled; it can still
 * be fully returned, which only sets the flag.
 */
export class ReturnService {
  constructor(private tx: TransactionManager) {}

  /**
   * Restore every line's quantity to inventory and cancel the receipt
   */
  async returnAll(receiptNo: number): Promise<CommitResult<FullReturnResult>> {
    logger.info('Processing full return', { receiptNo });

    return this.tx.run(async ({ inventory, receipts }) => {
      const receipt = await receipts.getReceipt(receiptNo);

      if (!receipt) {
        return rejected(RejectionReason.NOT_FOUND, `Receipt ${receiptNo} not found`, { receiptNo });
      }

      if (receipt.canceled) {
        logger.debug('Receipt already canceled', { receiptNo });
        return rejected(RejectionReason.ALREADY_CANCELED, `Receipt ${receiptNo} was already fully returned`, {
          receiptNo,
        });
      }

      for (const line of receipt.lines) {
        const applied = await inventory.applyDelta(line.itemId, line.qty);
        if (!applied) {
          throw new StorageFaultError(`Item ${line.itemId} on receipt ${receiptNo} is missing from inventory`);
        }
      }

      await receipts.setCanceled(receiptNo);

      const restored = receipt.lines.map((line) => ({ itemId: line.itemId, qty: line.qty }));
      logger.info('Full return completed', { receiptNo, lines: restored.length });

      return committed({ receiptNo, restored });
    });
  }

  /**
   * Return part (or all) of a single receipt line
   */
  async returnPartial(
    receiptNo: number,
    itemId: string,
    returnQty: number
  ): Promise<CommitResult<PartialReturnResult>> {
    logger.info('Processing partial return', { receiptNo, itemId, returnQty });

    return this.tx.run(async ({ inventory, receipts }) => {
      const receipt = await receipts.getReceipt(receiptNo);

      if (!receipt) {
        return rejected(RejectionReason.NOT_FOUND, `Receipt ${receiptNo} not found`, { receiptNo });
      }

      if (receipt.canceled) {
        return rejected(RejectionReason.ALREADY_CANCELED, `Receipt ${receiptNo} was already fully returned`, {
          receiptNo,
        });
      }

      const line = receipt.lines.find((l) => l.itemId === itemId);
      if (!line) {
        return rejected(RejectionReason.LINE_NOT_FOUND, `Receipt ${receiptNo} has no line for item ${itemId}`, {
          receiptNo,
          itemId,
        });
      }

      if (!Number.isInteger(returnQty) || returnQty <= 0 || returnQty > line.qty) {
        return rejected(
          RejectionReason.INVALID_QTY,
          `Return quantity must be between 1 and ${line.qty}, got ${returnQty}`,
          { receiptNo, itemId, requested: returnQty, available: line.qty }
        );
      }

      const applied = await inventory.applyDelta(itemId, returnQty);
      if (!applied) {
        throw new StorageFaultError(`Item ${itemId} on receipt ${receiptNo} is missing from inventory`);
      }

      const remainingQty = line.qty - returnQty;
      await receipts.updateLineQty(receiptNo, itemId, remainingQty);

      logger.info('Partial return completed', { receiptNo, itemId, returnQty, remainingQty });

      return committed({
        receiptNo,
        itemId,
        returnedQty: returnQty,
        remainingQty,
        lineRemoved: remainingQty === 0,
      });
    });
  }
}

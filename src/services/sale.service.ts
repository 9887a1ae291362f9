import { ItemRequest } from '../types/item.types';
import { SaleLine } from '../types/receipt.types';
import { SaleCommit, SaleOptions, SaleQuote } from '../types/sale.types';
import { LedgerScope, TransactionManager } from '../types/storage.types';
import { StorageFaultError } from '../types/error.types';
import { CommitResult, RejectionReason, committed, rejected } from '../types/result.types';
import { componentLogger } from '../config/logger';
import { formatCents, sumLinesCents } from '../utils/money';
import { SaleDraft } from './sale-draft';

const logger = componentLogger('sale-service');

/**
 * Sale Service
 *
 * Sale transaction coordinator: turns candidate lines into a receipt and
 * the matching inventory decrement, committed as one scope.
 */
export class SaleService {
  constructor(
    private tx: TransactionManager,
    private options: SaleOptions = {}
  ) {}

  /**
   * Price the requested items against current inventory (running total).
   * Nothing is written.
   */
  async quote(requests: ItemRequest[]): Promise<CommitResult<SaleQuote>> {
    return this.tx.run(async (scope) => {
      const draft = await this.buildDraft(scope, requests);
      if (!draft.ok) return draft;

      const totalCents = draft.value.totalCents();
      return committed({
        lines: draft.value.lines(),
        totalCents,
        total: formatCents(totalCents),
      });
    });
  }

  /**
   * Resolve requested items to price snapshots and commit them,
   * all inside one scope so the prices charged are the prices recorded.
   */
  async checkout(requests: ItemRequest[], tenderedCents: number): Promise<CommitResult<SaleCommit>> {
    logger.info('Checking out sale', { lines: requests.length, tenderedCents });

    return this.tx.run(async (scope) => {
      const draft = await this.buildDraft(scope, requests);
      if (!draft.ok) return draft;

      return this.commitInScope(scope, draft.value.lines(), tenderedCents);
    });
  }

  /**
   * Commit a sale
   *
   * 1. Validate lines (non-empty, positive quantities, one line per item, items exist)
   * 2. Reject if tender is below the total
   * 3. Reject oversell unless negative stock is allowed
   * 4. Decrement inventory for every line and create the receipt
   *
   * Step 4 runs inside the transaction scope: either every decrement and the
   * receipt are stored, or none of them.
   */
  async commitSale(lines: SaleLine[], tenderedCents: number): Promise<CommitResult<SaleCommit>> {
    logger.info('Committing sale', { lines: lines.length, tenderedCents });

    return this.tx.run((scope) => this.commitInScope(scope, lines, tenderedCents));
  }

  private async commitInScope(
    scope: LedgerScope,
    lines: SaleLine[],
    tenderedCents: number
  ): Promise<CommitResult<SaleCommit>> {
    if (lines.length === 0) {
      return rejected(RejectionReason.EMPTY_SALE, 'Sale has no lines');
    }

    const seen = new Set<string>();
    for (const line of lines) {
      if (!Number.isInteger(line.qty) || line.qty <= 0) {
        return rejected(RejectionReason.INVALID_QTY, `Quantity for item ${line.itemId} must be a positive integer`, {
          itemId: line.itemId,
          qty: line.qty,
        });
      }
      if (seen.has(line.itemId)) {
        return rejected(RejectionReason.DUPLICATE_LINE, `Item ${line.itemId} appears on more than one line`, {
          itemId: line.itemId,
        });
      }
      seen.add(line.itemId);
    }

    const onHand = new Map<string, number>();
    for (const line of lines) {
      const item = await scope.inventory.get(line.itemId);
      if (!item) {
        return rejected(RejectionReason.NOT_FOUND, `Item with ID ${line.itemId} not found`, {
          itemId: line.itemId,
        });
      }
      onHand.set(item.id, item.onHand);
    }

    const totalCents = sumLinesCents(lines);
    if (tenderedCents < totalCents) {
      logger.debug('Insufficient tender', { totalCents, tenderedCents });
      return rejected(
        RejectionReason.INSUFFICIENT_TENDER,
        `Tendered ${formatCents(tenderedCents)} is less than total ${formatCents(totalCents)}`,
        { totalCents, tenderedCents }
      );
    }

    if (!this.options.allowNegativeStock) {
      for (const line of lines) {
        const available = onHand.get(line.itemId) ?? 0;
        if (line.qty > available) {
          logger.debug('Insufficient stock', { itemId: line.itemId, requested: line.qty, available });
          return rejected(
            RejectionReason.INSUFFICIENT_STOCK,
            `Cannot sell ${line.qty} units of ${line.itemId}. Only ${available} on hand.`,
            { itemId: line.itemId, requested: line.qty, available }
          );
        }
      }
    }

    for (const line of lines) {
      const applied = await scope.inventory.applyDelta(line.itemId, -line.qty);
      if (!applied) {
        // Checked above; only a storage inconsistency lands here
        throw new StorageFaultError(`Item ${line.itemId} disappeared during sale`);
      }
    }

    const receiptNo = await scope.receipts.createReceipt(lines);
    const changeCents = tenderedCents - totalCents;

    logger.info('Sale committed', { receiptNo, totalCents, changeCents });

    return committed({
      receiptNo,
      lines: lines.map((line) => ({ ...line })),
      totalCents,
      tenderedCents,
      changeCents,
    });
  }

  private async buildDraft(scope: LedgerScope, requests: ItemRequest[]): Promise<CommitResult<SaleDraft>> {
    const draft = new SaleDraft();

    for (const request of requests) {
      if (!Number.isInteger(request.qty) || request.qty <= 0) {
        return rejected(RejectionReason.INVALID_QTY, `Quantity for item ${request.itemId} must be a positive integer`, {
          itemId: request.itemId,
          qty: request.qty,
        });
      }

      const item = await scope.inventory.get(request.itemId);
      if (!item) {
        return rejected(RejectionReason.NOT_FOUND, `Item with ID ${request.itemId} not found`, {
          itemId: request.itemId,
        });
      }

      draft.addItem(item, request.qty);
    }

    return committed(draft);
  }
}

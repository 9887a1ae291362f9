import { SupabaseClient } from '@supabase/supabase-js';
import { z } from 'zod';
import { Receipt, ReceiptRow, SaleLine } from '../../types/receipt.types';
import { ReceiptStore } from '../../types/storage.types';
import { StorageFaultError } from '../../types/error.types';
import { componentLogger } from '../../config/logger';
import { NO_ROWS, PosOperation, parseRow, receiptRowSchema } from './operations';

const logger = componentLogger('supabase-receipts');

const RECEIPT_COLUMNS =
  'receipt_no, canceled, created_at, receipt_lines(item_id, line_no, description, unit_price_cents, qty)';

/**
 * Map database row to domain model
 */
export const mapToReceipt = (row: ReceiptRow): Receipt => ({
  receiptNo: row.receipt_no,
  canceled: row.canceled,
  createdAt: new Date(row.created_at),
  lines: [...(row.receipt_lines ?? [])]
    .sort((a, b) => a.line_no - b.line_no)
    .map((line) => ({
      itemId: line.item_id,
      description: line.description,
      unitPriceCents: line.unit_price_cents,
      qty: line.qty,
    })),
});

const copyReceipt = (receipt: Receipt): Receipt => ({
  ...receipt,
  lines: receipt.lines.map((line) => ({ ...line })),
});

/**
 * Supabase Receipt Store (one per scope)
 *
 * Receipt numbers come straight from the `receipt_no_seq` sequence, so they
 * are unique across concurrent scopes; numbers taken by a scope that never
 * commits are skipped. All writes are buffered into `operations`.
 */
export class SupabaseReceiptStore implements ReceiptStore {
  // Receipts read or written by this scope, with pending writes applied
  private touched = new Map<number, Receipt>();

  constructor(
    private client: SupabaseClient,
    private operations: PosOperation[]
  ) {}

  async nextReceiptNo(): Promise<number> {
    const { data, error } = await this.client.rpc('next_receipt_no');

    if (error) {
      logger.error('Failed to allocate receipt number', { error: error.message });
      throw new StorageFaultError(`Failed to allocate receipt number: ${error.message}`);
    }

    return parseRow(z.coerce.number().int().positive(), data, 'receipt number');
  }

  async createReceipt(lines: SaleLine[]): Promise<number> {
    const receiptNo = await this.nextReceiptNo();

    this.operations.push({
      op: 'insert_receipt',
      receipt_no: receiptNo,
      lines: lines.map((line) => ({
        item_id: line.itemId,
        description: line.description,
        unit_price_cents: line.unitPriceCents,
        qty: line.qty,
      })),
    });

    this.touched.set(receiptNo, {
      receiptNo,
      canceled: false,
      createdAt: new Date(),
      lines: lines.map((line) => ({ ...line })),
    });

    logger.debug('Receipt insert buffered', { receiptNo, lines: lines.length });
    return receiptNo;
  }

  async getReceipt(receiptNo: number): Promise<Receipt | null> {
    const receipt = await this.load(receiptNo);
    return receipt ? copyReceipt(receipt) : null;
  }

  async setCanceled(receiptNo: number): Promise<void> {
    const receipt = await this.load(receiptNo);

    this.operations.push({
      op: 'cancel_receipt',
      receipt_no: receiptNo,
      expect_open: receipt !== null && !receipt.canceled,
    });

    if (receipt) this.touched.set(receiptNo, { ...receipt, canceled: true });
  }

  async updateLineQty(receiptNo: number, itemId: string, newQty: number): Promise<void> {
    const receipt = await this.load(receiptNo);
    const line = receipt?.lines.find((l) => l.itemId === itemId);

    this.operations.push({
      op: 'set_line_qty',
      receipt_no: receiptNo,
      item_id: itemId,
      new_qty: newQty,
      expected_qty: line ? line.qty : null,
    });

    if (!receipt) return;

    const lines =
      newQty <= 0
        ? receipt.lines.filter((l) => l.itemId !== itemId)
        : receipt.lines.map((l) => (l.itemId === itemId ? { ...l, qty: newQty } : l));
    this.touched.set(receiptNo, { ...receipt, lines });
  }

  private async load(receiptNo: number): Promise<Receipt | null> {
    const cached = this.touched.get(receiptNo);
    if (cached) return cached;

    const { data, error } = await this.client
      .from('receipts')
      .select(RECEIPT_COLUMNS)
      .eq('receipt_no', receiptNo)
      .single();

    if (error) {
      if (error.code === NO_ROWS) return null;
      logger.error('Failed to find receipt', { receiptNo, error: error.message });
      throw new StorageFaultError(`Failed to find receipt: ${error.message}`);
    }

    const receipt = mapToReceipt(parseRow(receiptRowSchema, data, 'receipt'));
    this.touched.set(receiptNo, receipt);
    return receipt;
  }
}

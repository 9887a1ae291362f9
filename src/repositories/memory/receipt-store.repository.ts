import { Receipt, SaleLine } from '../../types/receipt.types';
import { ReceiptStore } from '../../types/storage.types';

export type ReceiptSnapshot = ReadonlyMap<number, Receipt>;

const copyReceipt = (receipt: Receipt): Receipt => ({
  ...receipt,
  createdAt: new Date(receipt.createdAt.getTime()),
  lines: receipt.lines.map((line) => ({ ...line })),
});

/**
 * In-memory Receipt Store
 *
 * Dumb record keeper: no business validation happens here.
 * Receipt numbers are never handed out twice, including numbers
 * allocated by a scope that was later rolled back.
 */
export class InMemoryReceiptStore implements ReceiptStore {
  private receipts = new Map<number, Receipt>();
  private lastReceiptNo: number;

  constructor(lastReceiptNo = 0) {
    this.lastReceiptNo = lastReceiptNo;
  }

  async nextReceiptNo(): Promise<number> {
    this.lastReceiptNo += 1;
    return this.lastReceiptNo;
  }

  async createReceipt(lines: SaleLine[]): Promise<number> {
    const receiptNo = await this.nextReceiptNo();

    this.receipts.set(receiptNo, {
      receiptNo,
      canceled: false,
      createdAt: new Date(),
      lines: lines.map((line) => ({ ...line })),
    });

    return receiptNo;
  }

  async getReceipt(receiptNo: number): Promise<Receipt | null> {
    const receipt = this.receipts.get(receiptNo);
    return receipt ? copyReceipt(receipt) : null;
  }

  async setCanceled(receiptNo: number): Promise<void> {
    const receipt = this.receipts.get(receiptNo);
    if (!receipt) return;

    this.receipts.set(receiptNo, { ...receipt, canceled: true });
  }

  async updateLineQty(receiptNo: number, itemId: string, newQty: number): Promise<void> {
    const receipt = this.receipts.get(receiptNo);
    if (!receipt) return;

    const lines =
      newQty <= 0
        ? receipt.lines.filter((line) => line.itemId !== itemId)
        : receipt.lines.map((line) => (line.itemId === itemId ? { ...line, qty: newQty } : line));

    this.receipts.set(receiptNo, { ...receipt, lines });
  }

  snapshot(): ReceiptSnapshot {
    return new Map(this.receipts);
  }

  restore(snapshot: ReceiptSnapshot): void {
    this.receipts = new Map(snapshot);
  }
}

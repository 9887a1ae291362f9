import { Receipt, ReceiptStatus, ReceiptView } from '../types/receipt.types';
import { TransactionManager } from '../types/storage.types';
import { AppError, ErrorCode } from '../types/error.types';
import { formatCents, sumLinesCents } from '../utils/money';

export function receiptStatus(receipt: Receipt): ReceiptStatus {
  if (receipt.canceled) return ReceiptStatus.CANCELED;
  return receipt.lines.length === 0 ? ReceiptStatus.FULLY_RETURNED : ReceiptStatus.OPEN;
}

export function toReceiptView(receipt: Receipt): ReceiptView {
  const totalCents = sumLinesCents(receipt.lines);
  return {
    ...receipt,
    status: receiptStatus(receipt),
    totalCents,
    total: formatCents(totalCents),
  };
}

/**
 * Receipt Service
 */
export class ReceiptService {
  constructor(private tx: TransactionManager) {}

  async getReceipt(receiptNo: number): Promise<ReceiptView> {
    const receipt = await this.tx.run(({ receipts }) => receipts.getReceipt(receiptNo));

    if (!receipt) {
      throw new AppError(ErrorCode.RECEIPT_NOT_FOUND, `Receipt ${receiptNo} not found`, 404);
    }

    return toReceiptView(receipt);
  }
}

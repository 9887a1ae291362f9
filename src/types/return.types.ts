/**
 * Return domain types
 */

export interface RestoredLine {
  itemId: string;
  qty: number;
}

export interface FullReturnResult {
  receiptNo: number;
  restored: RestoredLine[];
}

export interface PartialReturnResult {
  receiptNo: number;
  itemId: string;
  returnedQty: number;
  remainingQty: number;
  lineRemoved: boolean;
}

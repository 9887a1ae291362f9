/**
 * Sale domain types
 */
import { SaleLine } from './receipt.types';

export interface SaleQuote {
  lines: SaleLine[];
  totalCents: number;
  total: string;
}

export interface SaleCommit {
  receiptNo: number;
  lines: SaleLine[];
  totalCents: number;
  tenderedCents: number;
  changeCents: number;
}

export interface SaleOptions {
  // Permit a sale line to take on-hand stock below zero
  allowNegativeStock?: boolean;
}

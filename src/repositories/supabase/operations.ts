import { z } from 'zod';
import { ItemRow } from '../../types/item.types';
import { ReceiptLineRow, ReceiptRow } from '../../types/receipt.types';
import { StorageFaultError } from '../../types/error.types';

/**
 * Buffered write applied by the `apply_pos_operations` database function.
 *
 * Receipt operations carry the value the scope observed; the function raises
 * SQLSTATE 40001 when the stored value differs at commit time. Item deltas
 * carry a floor instead: 40001 only when the new on_hand would drop below it,
 * so concurrent sales of one item commit side by side while stock lasts.
 */
export type PosOperation =
  | { op: 'apply_item_delta'; item_id: string; delta: number; min_on_hand: number | null }
  | {
      op: 'insert_receipt';
      receipt_no: number;
      lines: Array<Pick<ReceiptLineRow, 'item_id' | 'description' | 'unit_price_cents' | 'qty'>>;
    }
  | { op: 'cancel_receipt'; receipt_no: number; expect_open: boolean }
  | {
      op: 'set_line_qty';
      receipt_no: number;
      item_id: string;
      new_qty: number;
      expected_qty: number | null;
    };

// PostgREST "no rows" for .single()
export const NO_ROWS = 'PGRST116';
// Postgres serialization_failure, raised by the commit guards
export const SERIALIZATION_FAILURE = '40001';

export const itemRowSchema: z.ZodType<ItemRow> = z.object({
  item_id: z.string(),
  description: z.string(),
  on_hand: z.number().int(),
  unit_price_cents: z.number().int(),
  max_qty: z.number().int(),
  order_threshold: z.number().int(),
  replenishment_qty: z.number().int(),
});

const receiptLineRowSchema: z.ZodType<ReceiptLineRow> = z.object({
  item_id: z.string(),
  line_no: z.number().int(),
  description: z.string(),
  unit_price_cents: z.number().int(),
  qty: z.number().int(),
});

export const receiptRowSchema: z.ZodType<ReceiptRow> = z.object({
  receipt_no: z.coerce.number().int(),
  canceled: z.boolean(),
  created_at: z.string(),
  receipt_lines: z.array(receiptLineRowSchema).nullable(),
});

/**
 * Validate a row returned by PostgREST against its schema
 */
export function parseRow<T>(schema: z.ZodType<T>, data: unknown, what: string): T {
  const result = schema.safeParse(data);
  if (!result.success) {
    throw new StorageFaultError(`Malformed ${what} row returned by database`, {
      issues: result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    });
  }
  return result.data;
}

import { z } from 'zod';
import { itemIdSchema } from './item.validator';
import { MAX_LINE_QTY } from './sale.validator';

/**
 * Receipt validation schemas
 */

const receiptNoParam = z
  .string()
  .regex(/^\d+$/, 'Receipt number must be a positive integer')
  .transform(Number)
  .pipe(z.number().int().positive('Receipt number must be a positive integer'));

// Get receipt / full return schema
export const receiptParamsSchema = z.object({
  params: z.object({
    receiptNo: receiptNoParam,
  }),
});

// Partial return schema
export const returnLineSchema = z.object({
  params: z.object({
    receiptNo: receiptNoParam,
    itemId: itemIdSchema,
  }),
  body: z.object({
    qty: z
      .number({
        required_error: 'Quantity is required',
        invalid_type_error: 'Quantity must be a number',
      })
      .int('Quantity must be an integer')
      .max(MAX_LINE_QTY, `Quantity cannot exceed ${MAX_LINE_QTY}`),
  }),
});

export type ReceiptParamsRequest = z.infer<typeof receiptParamsSchema>;
export type ReturnLineRequest = z.infer<typeof returnLineSchema>;

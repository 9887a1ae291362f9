import { z } from 'zod';
import { hasCentPrecision } from '../utils/money';
import { itemIdSchema } from './item.validator';

// Keep every cent amount derived from a request well inside Number.MAX_SAFE_INTEGER
export const MAX_LINE_QTY = 100_000;
export const MAX_TENDERED_CASH = 1_000_000;

/**
 * Sale validation schemas
 *
 * Quantities are only checked for being integers here; the sale coordinator
 * rejects empty sales and non-positive quantities itself.
 */

const saleLineSchema = z.object({
  item_id: itemIdSchema,
  qty: z
    .number({
      required_error: 'Quantity is required',
      invalid_type_error: 'Quantity must be a number',
    })
    .int('Quantity must be an integer')
    .max(MAX_LINE_QTY, `Quantity cannot exceed ${MAX_LINE_QTY}`),
});

const linesSchema = z.array(saleLineSchema, {
  required_error: 'Lines are required',
  invalid_type_error: 'Lines must be an array',
});

// Quote (running total) schema
export const quoteSaleSchema = z.object({
  body: z.object({
    lines: linesSchema,
  }),
});

// Commit sale schema
export const createSaleSchema = z.object({
  body: z.object({
    lines: linesSchema,
    tendered_cash: z
      .number({
        required_error: 'Tendered cash is required',
        invalid_type_error: 'Tendered cash must be a number',
      })
      .nonnegative('Tendered cash cannot be negative')
      .max(MAX_TENDERED_CASH, `Tendered cash cannot exceed ${MAX_TENDERED_CASH}`)
      .refine(hasCentPrecision, 'Tendered cash must have at most two decimal places'),
  }),
});

export type QuoteSaleRequest = z.infer<typeof quoteSaleSchema>;
export type CreateSaleRequest = z.infer<typeof createSaleSchema>;

import { z } from 'zod';

/**
 * Item validation schemas
 */

// UPC or any other opaque item code; shared by sale lines and return paths
export const itemIdSchema = z
  .string({ required_error: 'Item ID is required', invalid_type_error: 'Item ID must be a string' })
  .trim()
  .min(1, 'Item ID is required')
  .max(64, 'Item ID must be at most 64 characters');

export const getItemSchema = z.object({
  params: z.object({
    id: itemIdSchema,
  }),
});

export type GetItemRequest = z.infer<typeof getItemSchema>;

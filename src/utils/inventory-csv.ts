import Papa from 'papaparse';
import { z } from 'zod';
import { Item } from '../types/item.types';
import { formatCents, toCents } from './money';

/**
 * Inventory file format (one row per item)
 */
export const INVENTORY_COLUMNS = [
  'Item_UPC',
  'Item_Description',
  'Item_Max_Qty',
  'Item_Order_Threshold',
  'Item_Replenishment_Order_Qty',
  'Item_On_Hand',
  'Item_Unit_Price',
] as const;

export interface InventoryParseError {
  // 1-based line in the file, header is line 1
  line: number;
  message: string;
}

export interface ParsedInventory {
  items: Item[];
  errors: InventoryParseError[];
}

const intCell = (name: string) =>
  z
    .string({ required_error: `${name} is required` })
    .trim()
    .regex(/^-?\d+$/, `${name} must be an integer`)
    .transform(Number);

const inventoryRowSchema = z.object({
  Item_UPC: z.string({ required_error: 'Item_UPC is required' }).trim().min(1, 'Item_UPC is required'),
  Item_Description: z.string({ required_error: 'Item_Description is required' }).trim(),
  Item_Max_Qty: intCell('Item_Max_Qty'),
  Item_Order_Threshold: intCell('Item_Order_Threshold'),
  Item_Replenishment_Order_Qty: intCell('Item_Replenishment_Order_Qty'),
  Item_On_Hand: intCell('Item_On_Hand'),
  Item_Unit_Price: z
    .string({ required_error: 'Item_Unit_Price is required' })
    .trim()
    .regex(/^\d+(\.\d+)?$/, 'Item_Unit_Price must be a non-negative decimal')
    .transform((val) => toCents(Number(val))),
});

/**
 * Parse an inventory CSV. Malformed rows are skipped and reported;
 * when a UPC repeats, the last row wins.
 */
export function parseInventoryCsv(text: string): ParsedInventory {
  const result = Papa.parse<Record<string, string>>(text, {
    header: true,
    skipEmptyLines: 'greedy',
    transformHeader: (header) => header.trim(),
  });

  const items = new Map<string, Item>();
  const errors: InventoryParseError[] = [];

  result.data.forEach((raw, index) => {
    const line = index + 2;
    const parsed = inventoryRowSchema.safeParse(raw);

    if (!parsed.success) {
      errors.push({
        line,
        message: parsed.error.issues.map((issue) => issue.message).join('; '),
      });
      return;
    }

    const row = parsed.data;
    items.set(row.Item_UPC, {
      id: row.Item_UPC,
      description: row.Item_Description,
      maxQty: row.Item_Max_Qty,
      orderThreshold: row.Item_Order_Threshold,
      replenishmentQty: row.Item_Replenishment_Order_Qty,
      onHand: row.Item_On_Hand,
      unitPriceCents: row.Item_Unit_Price,
    });
  });

  return { items: Array.from(items.values()), errors };
}

export function serializeInventoryCsv(items: Item[]): string {
  return Papa.unparse(
    items.map((item) => ({
      Item_UPC: item.id,
      Item_Description: item.description,
      Item_Max_Qty: item.maxQty,
      Item_Order_Threshold: item.orderThreshold,
      Item_Replenishment_Order_Qty: item.replenishmentQty,
      Item_On_Hand: item.onHand,
      Item_Unit_Price: formatCents(item.unitPriceCents),
    })),
    { columns: [...INVENTORY_COLUMNS], newline: '\n' }
  );
}

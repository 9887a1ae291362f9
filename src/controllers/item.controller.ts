import { Request, Response } from 'express';
import { InventoryService } from '../services/inventory.service';
import { createSuccessResponse } from '../utils/response-factory';
import { asyncHandler } from '../utils/async-handler';
import { parseRequest } from '../middleware/validation.middleware';
import { getItemSchema } from '../validators/item.validator';

/**
 * Item Controller
 *
 * HTTP request handlers for inventory endpoints
 */
export class ItemController {
  constructor(private inventoryService: InventoryService) {}

  /**
   * GET /v1/items
   * Enumerate current item state
   */
  listItems = asyncHandler(async (_req: Request, res: Response) => {
    const items = await this.inventoryService.listItems();

    res.status(200).json(createSuccessResponse(items));
  });

  /**
   * GET /v1/items/reorder
   * Items at or below their order threshold
   */
  reorderReport = asyncHandler(async (_req: Request, res: Response) => {
    const report = await this.inventoryService.reorderReport();

    res.status(200).json(createSuccessResponse(report));
  });

  /**
   * GET /v1/items/:id
   */
  getItem = asyncHandler(async (req: Request, res: Response) => {
    const { params } = parseRequest(getItemSchema, req);

    const item = await this.inventoryService.getItem(params.id);

    res.status(200).json(createSuccessResponse(item));
  });
}

import { Request, Response } from 'express';
import { SaleService } from '../services/sale.service';
import { ItemRequest } from '../types/item.types';
import { SaleResponseBody } from '../types/api.types';
import { rejectionToAppError } from '../types/error.types';
import { createSuccessResponse } from '../utils/response-factory';
import { asyncHandler } from '../utils/async-handler';
import { formatCents, toCents } from '../utils/money';
import { parseRequest } from '../middleware/validation.middleware';
import { createSaleSchema, quoteSaleSchema } from '../validators/sale.validator';

const toItemRequests = (lines: Array<{ item_id: string; qty: number }>): ItemRequest[] =>
  lines.map((line) => ({ itemId: line.item_id, qty: line.qty }));

/**
 * Sale Controller
 *
 * HTTP request handlers for sale endpoints
 */
export class SaleController {
  constructor(private saleService: SaleService) {}

  /**
   * POST /v1/sales/quote
   * Running total for candidate lines
   */
  quoteSale = asyncHandler(async (req: Request, res: Response) => {
    const { body } = parseRequest(quoteSaleSchema, req);

    const result = await this.saleService.quote(toItemRequests(body.lines));
    if (!result.ok) throw rejectionToAppError(result.rejection);

    res.status(200).json(createSuccessResponse(result.value));
  });

  /**
   * POST /v1/sales
   * Commit a sale and return the receipt number and change due
   */
  createSale = asyncHandler(async (req: Request, res: Response) => {
    const { body } = parseRequest(createSaleSchema, req);

    const result = await this.saleService.checkout(
      toItemRequests(body.lines),
      toCents(body.tendered_cash)
    );
    if (!result.ok) throw rejectionToAppError(result.rejection);

    const sale = result.value;
    const payload: SaleResponseBody = {
      ...sale,
      total: formatCents(sale.totalCents),
      tendered: formatCents(sale.tenderedCents),
      change: formatCents(sale.changeCents),
    };
    res.status(201).json(createSuccessResponse(payload, `Receipt ${sale.receiptNo} created`));
  });
}

import { Request, Response } from 'express';
import { ReceiptService } from '../services/receipt.service';
import { ReturnService } from '../services/return.service';
import { rejectionToAppError } from '../types/error.types';
import { createSuccessResponse } from '../utils/response-factory';
import { asyncHandler } from '../utils/async-handler';
import { parseRequest } from '../middleware/validation.middleware';
import { receiptParamsSchema, returnLineSchema } from '../validators/receipt.validator';

/**
 * Receipt Controller
 *
 * HTTP request handlers for receipt lookup and returns
 */
export class ReceiptController {
  constructor(
    private receiptService: ReceiptService,
    private returnService: ReturnService
  ) {}

  /**
   * GET /v1/receipts/:receiptNo
   */
  getReceipt = asyncHandler(async (req: Request, res: Response) => {
    const { params } = parseRequest(receiptParamsSchema, req);

    const receipt = await this.receiptService.getReceipt(params.receiptNo);

    res.status(200).json(createSuccessResponse(receipt));
  });

  /**
   * POST /v1/receipts/:receiptNo/return
   * Full return: restore every line and cancel the receipt
   */
  returnAll = asyncHandler(async (req: Request, res: Response) => {
    const { params } = parseRequest(receiptParamsSchema, req);

    const result = await this.returnService.returnAll(params.receiptNo);
    if (!result.ok) throw rejectionToAppError(result.rejection);

    res.status(200).json(createSuccessResponse(result.value, 'Full return completed'));
  });

  /**
   * POST /v1/receipts/:receiptNo/lines/:itemId/return
   * Partial return of one line
   */
  returnLine = asyncHandler(async (req: Request, res: Response) => {
    const { params, body } = parseRequest(returnLineSchema, req);

    const result = await this.returnService.returnPartial(params.receiptNo, params.itemId, body.qty);
    if (!result.ok) throw rejectionToAppError(result.rejection);

    res.status(200).json(createSuccessResponse(result.value, 'Partial return completed'));
  });
}

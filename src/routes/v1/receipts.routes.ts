import { Router } from 'express';
import { ReceiptController } from '../../controllers/receipt.controller';
import { ReceiptService } from '../../services/receipt.service';
import { ReturnService } from '../../services/return.service';
import { validate } from '../../middleware/validation.middleware';
import { receiptParamsSchema, returnLineSchema } from '../../validators/receipt.validator';

/**
 * Receipt routes (v1)
 */
export function createReceiptsRouter(receiptService: ReceiptService, returnService: ReturnService): Router {
  const router = Router();
  const receiptController = new ReceiptController(receiptService, returnService);

  /**
   * @swagger
   * /v1/receipts/{receiptNo}:
   *   get:
   *     summary: Get a receipt with its remaining lines and status
   *     tags: [Receipts]
   *     parameters:
   *       - in: path
   *         name: receiptNo
   *         required: true
   *         schema:
   *           type: integer
   *     responses:
   *       200:
   *         description: Receipt retrieved successfully
   *       404:
   *         description: Receipt not found
   */
  router.get('/:receiptNo', validate(receiptParamsSchema), receiptController.getReceipt);

  /**
   * @swagger
   * /v1/receipts/{receiptNo}/return:
   *   post:
   *     summary: Full return (restore all lines, cancel the receipt)
   *     tags: [Returns]
   *     parameters:
   *       - in: path
   *         name: receiptNo
   *         required: true
   *         schema:
   *           type: integer
   *     responses:
   *       200:
   *         description: Full return completed
   *       404:
   *         description: Receipt not found
   *       409:
   *         description: Receipt already canceled
   */
  router.post('/:receiptNo/return', validate(receiptParamsSchema), receiptController.returnAll);

  /**
   * @swagger
   * /v1/receipts/{receiptNo}/lines/{itemId}/return:
   *   post:
   *     summary: Partial return of one receipt line
   *     tags: [Returns]
   *     parameters:
   *       - in: path
   *         name: receiptNo
   *         required: true
   *         schema:
   *           type: integer
   *       - in: path
   *         name: itemId
   *         required: true
   *         schema:
   *           type: string
   *     requestBody:
   *       required: true
   *       content:
   *         application/json:
   *           schema:
   *             type: object
   *             required:
   *               - qty
   *             properties:
   *               qty:
   *                 type: integer
   *                 minimum: 1
   *     responses:
   *       200:
   *         description: Partial return completed
   *       400:
   *         description: Invalid return quantity
   *       404:
   *         description: Receipt or line not found
   *       409:
   *         description: Receipt already canceled
   */
  router.post(
    '/:receiptNo/lines/:itemId/return',
    validate(returnLineSchema),
    receiptController.returnLine
  );

  return router;
}

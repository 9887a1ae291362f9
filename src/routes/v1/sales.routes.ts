import { Router } from 'express';
import { SaleController } from '../../controllers/sale.controller';
import { SaleService } from '../../services/sale.service';
import { validate } from '../../middleware/validation.middleware';
import { createSaleSchema, quoteSaleSchema } from '../../validators/sale.validator';

/**
 * Sale routes (v1)
 */
export function createSalesRouter(saleService: SaleService): Router {
  const router = Router();
  const saleController = new SaleController(saleService);

  /**
   * @swagger
   * /v1/sales/quote:
   *   post:
   *     summary: Price candidate lines (running total), nothing is committed
   *     tags: [Sales]
   *     requestBody:
   *       required: true
   *       content:
   *         application/json:
   *           schema:
   *             type: object
   *             required:
   *               - lines
   *             properties:
   *               lines:
   *                 type: array
   *                 items:
   *                   $ref: '#/components/schemas/SaleLineRequest'
   *     responses:
   *       200:
   *         description: Quote computed
   *       404:
   *         description: Unknown item
   */
  router.post('/quote', validate(quoteSaleSchema), saleController.quoteSale);

  /**
   * @swagger
   * /v1/sales:
   *   post:
   *     summary: Commit a sale (receipt + inventory decrement)
   *     tags: [Sales]
   *     requestBody:
   *       required: true
   *       content:
   *         application/json:
   *           schema:
   *             type: object
   *             required:
   *               - lines
   *               - tendered_cash
   *             properties:
   *               lines:
   *                 type: array
   *                 items:
   *                   $ref: '#/components/schemas/SaleLineRequest'
   *               tendered_cash:
   *                 type: number
   *                 example: 15.00
   *     responses:
   *       201:
   *         description: Sale committed
   *       400:
   *         description: Empty sale, invalid quantity or insufficient tender
   *       404:
   *         description: Unknown item
   *       409:
   *         description: Insufficient stock
   */
  router.post('/', validate(createSaleSchema), saleController.createSale);

  return router;
}

import { Router } from 'express';
import { ItemController } from '../../controllers/item.controller';
import { InventoryService } from '../../services/inventory.service';
import { validate } from '../../middleware/validation.middleware';
import { getItemSchema } from '../../validators/item.validator';

/**
 * Item routes (v1)
 */
export function createItemsRouter(inventoryService: InventoryService): Router {
  const router = Router();
  const itemController = new ItemController(inventoryService);

  /**
   * @swagger
   * /v1/items:
   *   get:
   *     summary: List items with current on-hand counts
   *     tags: [Items]
   *     responses:
   *       200:
   *         description: Items retrieved successfully
   */
  router.get('/', itemController.listItems);

  /**
   * @swagger
   * /v1/items/reorder:
   *   get:
   *     summary: Items at or below their order threshold, with a suggested order quantity
   *     tags: [Items]
   *     responses:
   *       200:
   *         description: Reorder report
   */
  router.get('/reorder', itemController.reorderReport);

  /**
   * @swagger
   * /v1/items/{id}:
   *   get:
   *     summary: Get an item
   *     tags: [Items]
   *     parameters:
   *       - in: path
   *         name: id
   *         required: true
   *         schema:
   *           type: string
   *     responses:
   *       200:
   *         description: Item retrieved successfully
   *       404:
   *         description: Item not found
   */
  router.get('/:id', validate(getItemSchema), itemController.getItem);

  return router;
}

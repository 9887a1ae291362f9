import { Router } from 'express';
import { PosContainer } from '../config/container';
import { HealthCheckResponse, VersionInfo } from '../types/api.types';
import { createItemsRouter } from './v1/items.routes';
import { createSalesRouter } from './v1/sales.routes';
import { createReceiptsRouter } from './v1/receipts.routes';

/**
 * API Routes Aggregator
 */
export function createRoutes(container: PosContainer): Router {
  const router = Router();

  // v1 routes
  router.use('/v1/items', createItemsRouter(container.inventoryService));
  router.use('/v1/sales', createSalesRouter(container.saleService));
  router.use(
    '/v1/receipts',
    createReceiptsRouter(container.receiptService, container.returnService)
  );

  // Health check endpoint
  router.get('/health', (_req, res) => {
    const body: HealthCheckResponse = {
      status: 'healthy',
      timestamp: new Date().toISOString(),
      storage: container.storage,
      uptime: process.uptime(),
    };
    res.status(200).json(body);
  });

  // API version info
  router.get('/v1', (_req, res) => {
    const body: VersionInfo = { version: '1.0.0', api: 'POS Ledger API' };
    res.status(200).json(body);
  });

  return router;
}

import path from 'path';
import swaggerJsdoc from 'swagger-jsdoc';
import { env } from '../config/environment';

/**
 * Swagger/OpenAPI Configuration
 *
 * Generates OpenAPI 3.0 specification from JSDoc comments in route files
 */
const options: swaggerJsdoc.Options = {
  definition: {
    openapi: '3.0.0',
    info: {
      title: 'POS Ledger API',
      version: '1.0.0',
      description: `
A point-of-sale transaction ledger: inventory counts, receipts and returns.

## Consistency Guarantees
- A sale decrements inventory for every line and creates its receipt atomically
- A full return restores every line and cancels the receipt atomically
- A partial return restores the returned units and shrinks the line atomically
- Units returned on a line never exceed units sold on it
- Rejected operations (unknown item, bad quantity, insufficient tender, double return) change nothing

## Receipt Lifecycle
1. **OPEN**: created by a committed sale
2. **FULLY_RETURNED**: every line returned through partial returns (not canceled)
3. **CANCELED**: fully returned through the full-return endpoint (terminal)

Oversell is ${env.ALLOW_NEGATIVE_STOCK ? 'permitted' : 'rejected'} on this server.
      `.trim(),
      contact: {
        name: 'API Support',
      },
    },
    servers: [
      {
        url: `http://localhost:${env.PORT}`,
        description: env.NODE_ENV === 'production' ? 'Production server' : 'Development server',
      },
    ],
    tags: [
      { name: 'Items', description: 'Inventory enumeration and reorder report' },
      { name: 'Sales', description: 'Quotes and committed sales' },
      { name: 'Receipts', description: 'Receipt lookup' },
      { name: 'Returns', description: 'Full and partial returns' },
    ],
    components: {
      schemas: {
        Item: {
          type: 'object',
          properties: {
            id: { type: 'string', description: 'Unique item identifier (UPC)' },
            description: { type: 'string' },
            onHand: { type: 'integer', description: 'Current on-hand count' },
            unitPriceCents: { type: 'integer', minimum: 0 },
            maxQty: { type: 'integer' },
            orderThreshold: { type: 'integer' },
            replenishmentQty: { type: 'integer' },
          },
        },
        SaleLineRequest: {
          type: 'object',
          required: ['item_id', 'qty'],
          properties: {
            item_id: { type: 'string' },
            qty: { type: 'integer', minimum: 1 },
          },
        },
        SaleLine: {
          type: 'object',
          properties: {
            itemId: { type: 'string' },
            description: { type: 'string', description: 'Description at time of sale' },
            unitPriceCents: { type: 'integer', description: 'Price at time of sale' },
            qty: { type: 'integer', minimum: 1 },
          },
        },
        Receipt: {
          type: 'object',
          properties: {
            receiptNo: { type: 'integer' },
            canceled: { type: 'boolean' },
            createdAt: { type: 'string', format: 'date-time' },
            status: { type: 'string', enum: ['OPEN', 'CANCELED', 'FULLY_RETURNED'] },
            totalCents: { type: 'integer' },
            total: { type: 'string', example: '10.00' },
            lines: { type: 'array', items: { $ref: '#/components/schemas/SaleLine' } },
          },
        },
        Error: {
          type: 'object',
          properties: {
            error: {
              type: 'object',
              properties: {
                code: { type: 'string', description: 'Error code' },
                message: { type: 'string', description: 'Human-readable error message' },
                details: { type: 'object', description: 'Additional error details' },
              },
            },
          },
        },
      },
    },
  },
  apis: [path.join(__dirname, '../routes/**/*.{ts,js}')],
};

let cachedSpec: object | null = null;

// Route files are scanned on first use, not at import
export function getSwaggerSpec(): object {
  if (!cachedSpec) {
    cachedSpec = swaggerJsdoc(options);
  }
  return cachedSpec;
}

import { Application } from 'express';
import request from 'supertest';
import { beforeEach, describe, expect, it } from 'vitest';
import { createApp } from '../src/app';
import { createMemoryContainer } from '../src/config/container';
import { makeItem, standardItems } from './fixtures';

describe('POS Ledger API', () => {
  let app: Application;

  beforeEach(() => {
    app = createApp(
      createMemoryContainer(
        [...standardItems(), makeItem({ id: 'LOW', description: 'Low stock', onHand: 1, orderThreshold: 5 })],
        { allowNegativeStock: false }
      )
    );
  });

  const sell = (lines: Array<{ item_id: string; qty: number }>, tendered: number) =>
    request(app).post('/v1/sales').send({ lines, tendered_cash: tendered });

  describe('GET /health', () => {
    it('reports the storage driver', async () => {
      const res = await request(app).get('/health');

      expect(res.status).toBe(200);
      expect(res.body.status).toBe('healthy');
      expect(res.body.storage).toBe('memory');
    });
  });

  describe('items', () => {
    it('lists items', async () => {
      const res = await request(app).get('/v1/items');

      expect(res.status).toBe(200);
      expect(res.body.data.map((item: { id: string }) => item.id)).toEqual(['X', 'Y', 'LOW']);
    });

    it('gets one item', async () => {
      const res = await request(app).get('/v1/items/Y');

      expect(res.status).toBe(200);
      expect(res.body.data).toMatchObject({ id: 'Y', description: 'Gadget', onHand: 20, unitPriceCents: 200 });
    });

    it('returns 404 for an unknown item', async () => {
      const res = await request(app).get('/v1/items/NOPE');

      expect(res.status).toBe(404);
      expect(res.body.error.code).toBe('ITEM_NOT_FOUND');
    });

    it('builds the reorder report', async () => {
      const res = await request(app).get('/v1/items/reorder');

      expect(res.status).toBe(200);
      expect(res.body.data).toHaveLength(1);
      expect(res.body.data[0].item.id).toBe('LOW');
      expect(res.body.data[0].suggestedOrderQty).toBe(20);
    });
  });

  describe('sales', () => {
    it('quotes a running total', async () => {
      const res = await request(app)
        .post('/v1/sales/quote')
        .send({ lines: [{ item_id: 'X', qty: 2 }] });

      expect(res.status).toBe(200);
      expect(res.body.data.totalCents).toBe(300);
      expect(res.body.data.total).toBe('3.00');
    });

    it('commits a sale and reports change', async () => {
      const res = await sell([{ item_id: 'X', qty: 3 }], 5);

      expect(res.status).toBe(201);
      expect(res.body.message).toBe('Receipt 1 created');
      expect(res.body.data).toMatchObject({
        receiptNo: 1,
        totalCents: 450,
        changeCents: 50,
        total: '4.50',
        change: '0.50',
      });

      const item = await request(app).get('/v1/items/X');
      expect(item.body.data.onHand).toBe(7);
    });

    it('echoes tender and change as display strings', async () => {
      const res = await sell([{ item_id: 'Y', qty: 5 }], 15);

      expect(res.status).toBe(201);
      expect(res.body.data).toMatchObject({
        totalCents: 1000,
        tenderedCents: 1500,
        changeCents: 500,
        total: '10.00',
        tendered: '15.00',
        change: '5.00',
      });
    });

    it('rejects tendered cash above the accepted maximum', async () => {
      const res = await sell([{ item_id: 'X', qty: 1 }], 1e20);

      expect(res.status).toBe(400);
      expect(res.body.error.details.errors).toEqual([
        { field: 'body.tendered_cash', message: 'Tendered cash cannot exceed 1000000' },
      ]);
    });

    it('rejects a line quantity above the accepted maximum', async () => {
      const res = await sell([{ item_id: 'X', qty: 1e9 }], 10);

      expect(res.status).toBe(400);
      expect(res.body.error.details.errors).toEqual([
        { field: 'body.lines.0.qty', message: 'Quantity cannot exceed 100000' },
      ]);
    });

    it('rejects short tender with 400', async () => {
      const res = await sell([{ item_id: 'Y', qty: 5 }], 9.99);

      expect(res.status).toBe(400);
      expect(res.body.error.code).toBe('INSUFFICIENT_TENDER');
      expect(res.body.error.message).toBe('Tendered 9.99 is less than total 10.00');
    });

    it('rejects an unknown item with 404', async () => {
      const res = await sell([{ item_id: 'NOPE', qty: 1 }], 10);

      expect(res.status).toBe(404);
      expect(res.body.error.code).toBe('NOT_FOUND');
    });

    it('rejects a zero quantity with 400', async () => {
      const res = await sell([{ item_id: 'X', qty: 0 }], 10);

      expect(res.status).toBe(400);
      expect(res.body.error.code).toBe('INVALID_QUANTITY');
    });

    it('rejects an empty sale with 400', async () => {
      const res = await sell([], 10);

      expect(res.status).toBe(400);
      expect(res.body.error.code).toBe('EMPTY_SALE');
    });

    it('rejects oversell with 409', async () => {
      const res = await sell([{ item_id: 'X', qty: 11 }], 100);

      expect(res.status).toBe(409);
      expect(res.body.error.code).toBe('INSUFFICIENT_STOCK');
    });

    it('validates the request body', async () => {
      const res = await request(app)
        .post('/v1/sales')
        .send({ lines: [{ item_id: 'X', qty: 1 }], tendered_cash: 1.234 });

      expect(res.status).toBe(400);
      expect(res.body.error.code).toBe('VALIDATION_ERROR');
      expect(res.body.error.details.errors).toEqual([
        { field: 'body.tendered_cash', message: 'Tendered cash must have at most two decimal places' },
      ]);
    });

    it('rejects malformed JSON', async () => {
      const res = await request(app).post('/v1/sales').set('Content-Type', 'application/json').send('{"lines":');

      expect(res.status).toBe(400);
      expect(res.body.error.code).toBe('INVALID_INPUT');
    });
  });

  describe('receipts and returns', () => {
    it('shows a receipt with its status and total', async () => {
      await sell(
        [
          { item_id: 'X', qty: 1 },
          { item_id: 'Y', qty: 2 },
        ],
        10
      );

      const res = await request(app).get('/v1/receipts/1');

      expect(res.status).toBe(200);
      expect(res.body.data).toMatchObject({ receiptNo: 1, canceled: false, status: 'OPEN', total: '5.50' });
      expect(res.body.data.lines).toEqual([
        { itemId: 'X', description: 'Widget', unitPriceCents: 150, qty: 1 },
        { itemId: 'Y', description: 'Gadget', unitPriceCents: 200, qty: 2 },
      ]);
    });

    it('returns 404 for an unknown receipt', async () => {
      const res = await request(app).get('/v1/receipts/99');

      expect(res.status).toBe(404);
      expect(res.body.error.code).toBe('RECEIPT_NOT_FOUND');
    });

    it('validates the receipt number', async () => {
      const res = await request(app).get('/v1/receipts/abc');

      expect(res.status).toBe(400);
      expect(res.body.error.code).toBe('VALIDATION_ERROR');
    });

    it('fully returns a receipt once', async () => {
      await sell([{ item_id: 'X', qty: 3 }], 10);

      const first = await request(app).post('/v1/receipts/1/return');
      expect(first.status).toBe(200);
      expect(first.body.message).toBe('Full return completed');
      expect(first.body.data).toEqual({ receiptNo: 1, restored: [{ itemId: 'X', qty: 3 }] });

      const second = await request(app).post('/v1/receipts/1/return');
      expect(second.status).toBe(409);
      expect(second.body.error.code).toBe('ALREADY_CANCELED');

      const receipt = await request(app).get('/v1/receipts/1');
      expect(receipt.body.data.status).toBe('CANCELED');
      const item = await request(app).get('/v1/items/X');
      expect(item.body.data.onHand).toBe(10);
    });

    it('returns part of a line', async () => {
      await sell([{ item_id: 'Y', qty: 5 }], 10);

      const res = await request(app).post('/v1/receipts/1/lines/Y/return').send({ qty: 2 });

      expect(res.status).toBe(200);
      expect(res.body.data).toEqual({ receiptNo: 1, itemId: 'Y', returnedQty: 2, remainingQty: 3, lineRemoved: false });
      const item = await request(app).get('/v1/items/Y');
      expect(item.body.data.onHand).toBe(17);
    });

    it('marks a receipt fully returned once every line came back', async () => {
      await sell([{ item_id: 'Y', qty: 2 }], 10);
      await request(app).post('/v1/receipts/1/lines/Y/return').send({ qty: 2 });

      const res = await request(app).get('/v1/receipts/1');

      expect(res.body.data).toMatchObject({ status: 'FULLY_RETURNED', canceled: false, lines: [], total: '0.00' });
    });

    it('rejects returning more than the line holds', async () => {
      await sell([{ item_id: 'Y', qty: 5 }], 10);

      const res = await request(app).post('/v1/receipts/1/lines/Y/return').send({ qty: 6 });

      expect(res.status).toBe(400);
      expect(res.body.error.code).toBe('INVALID_QUANTITY');
    });

    it('rejects a return quantity above the accepted maximum', async () => {
      await sell([{ item_id: 'Y', qty: 5 }], 10);

      const res = await request(app).post('/v1/receipts/1/lines/Y/return').send({ qty: 1e9 });

      expect(res.status).toBe(400);
      expect(res.body.error.code).toBe('VALIDATION_ERROR');
    });

    it('rejects a line that is not on the receipt', async () => {
      await sell([{ item_id: 'Y', qty: 5 }], 10);

      const res = await request(app).post('/v1/receipts/1/lines/X/return').send({ qty: 1 });

      expect(res.status).toBe(404);
      expect(res.body.error.code).toBe('RECEIPT_LINE_NOT_FOUND');
    });
  });

  it('returns 404 for unknown routes', async () => {
    const res = await request(app).get('/v2/anything');

    expect(res.status).toBe(404);
    expect(res.body.error.code).toBe('NOT_FOUND');
  });
});

import { describe, expect, it } from 'vitest';
import { SaleDraft } from '../src/services/sale-draft';
import { makeItem } from './fixtures';

const widget = makeItem({ id: 'X', description: 'Widget', unitPriceCents: 150 });
const gadget = makeItem({ id: 'Y', description: 'Gadget', unitPriceCents: 200 });

describe('SaleDraft', () => {
  it('snapshots description and price and keeps a running total', () => {
    const draft = new SaleDraft();

    draft.addItem(widget, 2);
    draft.addItem(gadget, 1);

    expect(draft.lines()).toEqual([
      { itemId: 'X', description: 'Widget', unitPriceCents: 150, qty: 2 },
      { itemId: 'Y', description: 'Gadget', unitPriceCents: 200, qty: 1 },
    ]);
    expect(draft.totalCents()).toBe(500);
  });

  it('merges repeated items into one line', () => {
    const draft = new SaleDraft();

    draft.addItem(widget, 2);
    const merged = draft.addItem(widget, 3);

    expect(merged.qty).toBe(5);
    expect(draft.lines()).toHaveLength(1);
    expect(draft.totalCents()).toBe(750);
  });

  it('rejects non-positive or fractional quantities', () => {
    const draft = new SaleDraft();

    expect(() => draft.addItem(widget, 0)).toThrow(RangeError);
    expect(() => draft.addItem(widget, -1)).toThrow(RangeError);
    expect(() => draft.addItem(widget, 1.5)).toThrow(RangeError);
    expect(draft.isEmpty()).toBe(true);
  });

  it('removes a line by position', () => {
    const draft = new SaleDraft();
    draft.addItem(widget, 2);
    draft.addItem(gadget, 1);

    const removed = draft.removeLine(0);

    expect(removed.itemId).toBe('X');
    expect(draft.lines().map((line) => line.itemId)).toEqual(['Y']);
    expect(draft.totalCents()).toBe(200);
  });

  it('throws for a position with no line', () => {
    const draft = new SaleDraft();
    draft.addItem(widget, 1);

    expect(() => draft.removeLine(1)).toThrow('No line at position 1');
    expect(() => draft.removeLine(-1)).toThrow('No line at position -1');
  });
});

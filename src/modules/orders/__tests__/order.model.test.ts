import { describe, it, expect } from 'vitest';
import { IOrder, itemTotal, itemsTotal, setStatus, totalAmount, totalItemsCount } from '../order.model.js';
import { formatMoney } from '../../../shared/utils/money.util.js';

const order: IOrder = {
  customer: { name: 'Test Customer', phone: '5550001234' },
  items: [
    { menuItemId: 1, menuItemName: 'Bread Roll', quantity: 2, unitPrice: 250 },
    { menuItemId: 2, menuItemName: 'Side Salad', quantity: 2, unitPrice: 250 },
    { menuItemId: 3, menuItemName: 'Lemonade', quantity: 2, unitPrice: 250 },
  ],
  status: 'pending',
  deliveryFee: 299,
};

describe('order.model', () => {
  describe('aggregation', () => {
    it('computes each line total', () => {
      expect(itemTotal({ menuItemId: 1, menuItemName: 'Bread Roll', quantity: 3, unitPrice: 10 })).toBe(30);
    });

    it('sums line totals and adds the delivery fee', () => {
      expect(itemsTotal(order)).toBe(1500);
      expect(totalAmount(order)).toBe(1799);
    });

    it('sums lines with fractional unit prices without drift', () => {
      const lines: IOrder = {
        ...order,
        items: [
          { menuItemId: 1, menuItemName: 'Mint Candy', quantity: 3, unitPrice: 33 },
          { menuItemId: 2, menuItemName: 'Dinner Roll', quantity: 7, unitPrice: 101 },
        ],
      };

      expect(lines.items.map(itemTotal)).toEqual([99, 707]);
      expect(itemsTotal(lines)).toBe(806);
      expect(formatMoney(itemsTotal(lines))).toBe('8.06');
      expect(formatMoney(totalAmount(lines))).toBe('11.05');
    });

    it('counts units across lines', () => {
      expect(totalItemsCount(order)).toBe(6);
    });

    it('handles a free delivery', () => {
      expect(totalAmount({ ...order, deliveryFee: 0 })).toBe(1500);
    });
  });

  describe('setStatus', () => {
    it('returns a copy with the new status', () => {
      const updated = setStatus(order, 'delivered');

      expect(updated.status).toBe('delivered');
      expect(updated.items).toBe(order.items);
      expect(order.status).toBe('pending');
    });

    it('allows moving back to an earlier status', () => {
      const delivered = setStatus(order, 'delivered');

      expect(setStatus(delivered, 'pending').status).toBe('pending');
    });
  });
});

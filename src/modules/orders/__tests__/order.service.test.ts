import { describe, it, expect, beforeEach } from 'vitest';
import { OrderService } from '../order.service.js';
import { OrderStore } from '../order.store.js';
import { totalAmount } from '../order.model.js';
import { CatalogStore } from '../../menu/menu.store.js';
import { NotFoundError, ReferentialError, ValidationError } from '../../../shared/middleware/error.middleware.js';
import { createCatalog, orderCandidate } from './fixtures.js';

describe('OrderService', () => {
  let catalog: CatalogStore;
  let orders: OrderStore;
  let service: OrderService;

  beforeEach(() => {
    catalog = createCatalog();
    orders = new OrderStore();
    service = new OrderService(orders, catalog);
  });

  describe('createOrder', () => {
    it('stores a valid order under the next id', async () => {
      const order = await service.createOrder(orderCandidate({ deliveryFee: '2.99' }));

      expect(order.id).toBe(1);
      expect(order.status).toBe('pending');
      expect(totalAmount(order)).toBe(1399);
      expect(orders.size).toBe(1);
    });

    it('rejects a missing menu item without storing or consuming an id', async () => {
      const missing = orderCandidate({
        items: [{ menuItemId: 42, menuItemName: 'Ghost', quantity: 1, unitPrice: '1.00' }],
      });

      await expect(service.createOrder(missing)).rejects.toBeInstanceOf(ReferentialError);
      expect(orders.size).toBe(0);

      const accepted = await service.createOrder(orderCandidate());
      expect(accepted.id).toBe(1);
    });

    it('rejects an unavailable menu item without storing', async () => {
      const unavailable = orderCandidate({
        items: [{ menuItemId: 2, menuItemName: 'Iced Tea', quantity: 1, unitPrice: '3.00' }],
      });

      await expect(service.createOrder(unavailable)).rejects.toMatchObject({ code: 'MENU_ITEM_UNAVAILABLE' });
      expect(orders.findAll()).toEqual([]);
    });

    it('rejects a structurally invalid order without storing', async () => {
      await expect(service.createOrder(orderCandidate({ items: [] }))).rejects.toBeInstanceOf(ValidationError);
      expect(orders.size).toBe(0);
    });

    it('sees catalog changes made after construction', async () => {
      const tea = catalog.findById(2);
      if (!tea) throw new Error('Catalog fixture is missing item 2');
      const { id: _id, ...fields } = tea;
      catalog.upsert(2, { ...fields, isAvailable: true });

      const order = await service.createOrder(
        orderCandidate({ items: [{ menuItemId: 2, menuItemName: 'Iced Tea', quantity: 1, unitPrice: '3.00' }] })
      );

      expect(order.items[0]?.menuItemId).toBe(2);
    });

    it('keeps stored orders when the menu item is later removed', async () => {
      const order = await service.createOrder(orderCandidate());
      catalog.delete(1);

      expect(await service.getOrder(order.id)).toBe(order);
    });

    it('assigns distinct ids to concurrent orders', async () => {
      const created = await Promise.all(Array.from({ length: 20 }, () => service.createOrder(orderCandidate())));

      expect(created.map((order) => order.id)).toEqual(Array.from({ length: 20 }, (_, index) => index + 1));
      expect(orders.size).toBe(20);
    });
  });

  describe('queries', () => {
    it('lists orders in creation order', async () => {
      await service.createOrder(orderCandidate({ customer: { name: 'First Customer', phone: '5550000001' } }));
      await service.createOrder(orderCandidate({ customer: { name: 'Second Customer', phone: '5550000002' } }));

      const all = await service.getAllOrders();

      expect(all.map((order) => order.customer.name)).toEqual(['First Customer', 'Second Customer']);
    });

    it('throws not found for an unknown order', async () => {
      await expect(service.getOrder(7)).rejects.toBeInstanceOf(NotFoundError);
      await expect(service.getOrder(7)).rejects.toMatchObject({ message: 'Order not found' });
    });
  });

  describe('updateStatus', () => {
    it('overwrites the status and keeps everything else', async () => {
      const order = await service.createOrder(orderCandidate({ specialInstructions: 'No onions' }));

      const updated = await service.updateStatus(order.id, 'ready');

      expect(updated).toEqual({ ...order, status: 'ready' });
      expect(await service.getOrder(order.id)).toBe(updated);
    });

    it('allows any status to follow any other', async () => {
      const order = await service.createOrder(orderCandidate());

      await service.updateStatus(order.id, 'delivered');
      const reverted = await service.updateStatus(order.id, 'pending');

      expect(reverted.status).toBe('pending');
    });

    it('throws not found for an unknown order', async () => {
      await expect(service.updateStatus(3, 'confirmed')).rejects.toBeInstanceOf(NotFoundError);
    });
  });
});

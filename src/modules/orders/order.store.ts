import { InMemoryStore } from '../../shared/store/in-memory.store.js';
import { IOrder } from './order.model.js';

/**
 * Order collection
 */
export class OrderStore extends InMemoryStore<IOrder> {
  constructor() {
    super('Order');
  }
}

export const orderStore = new OrderStore();

/**
 * Order Service
 * Business logic for order management
 */

import { NotFoundError } from '../../shared/middleware/error.middleware.js';
import { logger } from '../../config/logger.js';
import { formatMoney } from '../../shared/utils/money.util.js';
import { CatalogStore, catalogStore } from '../menu/menu.store.js';
import { Order, OrderStatus, setStatus, totalAmount } from './order.model.js';
import { OrderStore, orderStore } from './order.store.js';
import { validateOrder } from './order.validation.js';

const ENTITY = 'Order';

// ============================================
// ORDER SERVICE CLASS
// ============================================

export class OrderService {
  constructor(
    private readonly orders: OrderStore = orderStore,
    private readonly catalog: CatalogStore = catalogStore
  ) {}

  /**
   * Validate an order against its own rules and the catalog, then store it.
   * A rejected order is never stored and consumes no id.
   */
  async createOrder(candidate: unknown): Promise<Order> {
    const result = validateOrder(candidate, this.catalog.asLookup());
    if (!result.success) {
      logger.info('Order rejected', { code: result.error.code, reason: result.error.message });
      throw result.error;
    }

    const order = this.orders.upsert(undefined, result.data);
    logger.info(`Order created: #${order.id}`, {
      orderId: order.id,
      items: order.items.length,
      totalAmount: formatMoney(totalAmount(order)),
    });
    return order;
  }

  async getAllOrders(): Promise<Order[]> {
    const orders = this.orders.findAll();
    logger.info(`Retrieved ${orders.length} orders`);
    return orders;
  }

  async getOrder(id: number): Promise<Order> {
    const order = this.orders.findById(id);
    if (!order) {
      throw new NotFoundError(ENTITY, id);
    }
    return order;
  }

  /**
   * Overwrite the order status. Every status is reachable from every other.
   */
  async updateStatus(id: number, status: OrderStatus): Promise<Order> {
    const order = this.orders.findById(id);
    if (!order) {
      throw new NotFoundError(ENTITY, id);
    }

    const updated = this.orders.upsert(id, setStatus(order, status));

    logger.info(`Order #${id} status updated`, { from: order.status, to: status });
    return updated;
  }
}

// Export singleton instance
export const orderService = new OrderService();

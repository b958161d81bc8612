/**
 * Order Controller
 * Request handlers for order management
 */

import { Request, Response, NextFunction } from 'express';
import { orderService, OrderService } from './order.service.js';
import { updateStatusSchema } from './order.validation.js';
import {
  ICustomer,
  Order,
  OrderStatus,
  itemTotal,
  itemsTotal,
  totalAmount,
  totalItemsCount,
} from './order.model.js';
import { HttpStatus } from '../../config/constants.js';
import { idParamsSchema } from '../../shared/middleware/validate.middleware.js';
import { createdResponse, listResponse, successResponse } from '../../shared/utils/response.util.js';
import { formatMoney } from '../../shared/utils/money.util.js';

// ============================================
// RESPONSE SHAPES
// ============================================

export interface OrderItemResponse {
  menuItemId: number;
  menuItemName: string;
  quantity: number;
  unitPrice: string;
  itemTotal: string;
}

export interface OrderResponse {
  id: number;
  customer: ICustomer;
  items: OrderItemResponse[];
  status: OrderStatus;
  deliveryFee: string;
  specialInstructions: string | null;
  itemsTotal: string;
  totalAmount: string;
  totalItemsCount: number;
}

export interface OrderSummaryResponse {
  id: number;
  customerName: string;
  status: OrderStatus;
  totalAmount: string;
  totalItemsCount: number;
}

export function transformOrder(order: Order): OrderResponse {
  return {
    id: order.id,
    customer: { ...order.customer },
    items: order.items.map((item) => ({
      menuItemId: item.menuItemId,
      menuItemName: item.menuItemName,
      quantity: item.quantity,
      unitPrice: formatMoney(item.unitPrice),
      itemTotal: formatMoney(itemTotal(item)),
    })),
    status: order.status,
    deliveryFee: formatMoney(order.deliveryFee),
    specialInstructions: order.specialInstructions ?? null,
    itemsTotal: formatMoney(itemsTotal(order)),
    totalAmount: formatMoney(totalAmount(order)),
    totalItemsCount: totalItemsCount(order),
  };
}

export function transformOrderSummary(order: Order): OrderSummaryResponse {
  return {
    id: order.id,
    customerName: order.customer.name,
    status: order.status,
    totalAmount: formatMoney(totalAmount(order)),
    totalItemsCount: totalItemsCount(order),
  };
}

// ============================================
// CONTROLLER CLASS
// ============================================

export class OrderController {
  constructor(private readonly service: OrderService = orderService) {}

  /**
   * Create a new order
   * POST /orders
   */
  async createOrder(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const order = await this.service.createOrder(req.body);
      res.status(HttpStatus.CREATED).json(createdResponse(transformOrder(order), 'Order created successfully'));
    } catch (error) {
      next(error);
    }
  }

  /**
   * List order summaries
   * GET /orders
   */
  async getAllOrders(_req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const orders = await this.service.getAllOrders();
      res.status(HttpStatus.OK).json(listResponse(orders.map(transformOrderSummary)));
    } catch (error) {
      next(error);
    }
  }

  /**
   * Get order details with derived totals
   * GET /orders/:id
   */
  async getOrder(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const { id } = idParamsSchema.parse(req.params);
      const order = await this.service.getOrder(id);
      res.status(HttpStatus.OK).json(successResponse(transformOrder(order)));
    } catch (error) {
      next(error);
    }
  }

  /**
   * Update order status
   * PUT /orders/:id/status
   */
  async updateStatus(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const { id } = idParamsSchema.parse(req.params);
      const { status } = updateStatusSchema.parse(req.body);
      const order = await this.service.updateStatus(id, status);
      res
        .status(HttpStatus.OK)
        .json(successResponse(transformOrder(order), undefined, `Order status updated to ${status}`));
    } catch (error) {
      next(error);
    }
  }
}

// Export singleton instance
export const orderController = new OrderController();

import type { Stored } from '../../shared/store/in-memory.store.js';
import { Cents, multiplyMoney, sumMoney } from '../../shared/utils/money.util.js';

// Order status types. Any status may follow any other; there is no transition table.
export const ORDER_STATUSES = ['pending', 'confirmed', 'ready', 'delivered'] as const;
export type OrderStatus = (typeof ORDER_STATUSES)[number];

export const DEFAULT_ORDER_STATUS: OrderStatus = 'pending';

export interface ICustomer {
  name: string;
  phone: string;
  address?: string;
}

// Order item (snapshot of the menu item name and price at order time)
export interface IOrderItem {
  menuItemId: number;
  menuItemName: string;
  quantity: number;
  unitPrice: Cents;
}

// Order as validated, before the store assigns an id
export interface IOrder {
  customer: ICustomer;
  items: IOrderItem[];
  status: OrderStatus;
  deliveryFee: Cents;
  specialInstructions?: string;
}

export type Order = Stored<IOrder>;

// ============================================
// AGGREGATION
// ============================================

export function itemTotal(item: IOrderItem): Cents {
  return multiplyMoney(item.unitPrice, item.quantity);
}

/**
 * Sum of line totals; each line is computed on its own, then summed
 */
export function itemsTotal(order: Pick<IOrder, 'items'>): Cents {
  return sumMoney(order.items.map(itemTotal));
}

export function totalAmount(order: Pick<IOrder, 'items' | 'deliveryFee'>): Cents {
  return sumMoney([itemsTotal(order), order.deliveryFee]);
}

export function totalItemsCount(order: Pick<IOrder, 'items'>): number {
  return order.items.reduce((count, item) => count + item.quantity, 0);
}

// ============================================
// STATUS
// ============================================

/**
 * Overwrite the status with any member of the status set
 */
export function setStatus<T extends IOrder>(order: T, status: OrderStatus): T {
  return { ...order, status };
}

import { z } from 'zod';
import { DeliveryConfig, OrderLimits } from '../../config/constants.js';
import {
  ReferentialError,
  ValidationError,
  formatZodIssues,
} from '../../shared/middleware/error.middleware.js';
import { moneySchema } from '../../shared/middleware/validate.middleware.js';
import { between, evaluateRules, lengthAtMost, lengthBetween, ValidationRule } from '../../shared/validation/rule-set.js';
import { Cents, formatMoney, parseMoney } from '../../shared/utils/money.util.js';
import type { ValidationIssue, ValidationResult } from '../../shared/types/index.js';
import type { CatalogLookup } from '../menu/food-item.model.js';
import { DEFAULT_ORDER_STATUS, ICustomer, IOrder, IOrderItem, ORDER_STATUSES } from './order.model.js';

const statusSchema = z.enum(ORDER_STATUSES, {
  errorMap: () => ({ message: `Status must be one of: ${ORDER_STATUSES.join(', ')}` }),
});

function resolveDefaultDeliveryFee(): Cents {
  const fee = parseMoney(DeliveryConfig.DEFAULT_DELIVERY_FEE);
  if (fee === null || fee < 0) {
    throw new Error(`Invalid DEFAULT_DELIVERY_FEE: ${DeliveryConfig.DEFAULT_DELIVERY_FEE}`);
  }
  return fee;
}

export const DEFAULT_DELIVERY_FEE_CENTS = resolveDefaultDeliveryFee();

// ============================================
// ORDER DECODING SCHEMAS
// ============================================

const customerSchema = z.object({
  name: z.string({ required_error: 'Customer name is required' }),
  phone: z.string({ required_error: 'Phone number is required' }),
  address: z
    .string()
    .nullish()
    .transform((val) => val ?? undefined),
});

const orderItemSchema = z.object({
  menuItemId: z
    .number({ required_error: 'Menu item ID is required' })
    .int('Menu item ID must be an integer'),
  menuItemName: z.string({ required_error: 'Menu item name is required' }),
  quantity: z
    .number({ required_error: 'Quantity is required' })
    .int('Quantity must be an integer'),
  unitPrice: moneySchema,
});

// Shape and types only; value constraints live in the rule lists below
export const createOrderSchema = z.object({
  customer: customerSchema,
  items: z.array(orderItemSchema, { required_error: 'Items are required' }),
  status: statusSchema.default(DEFAULT_ORDER_STATUS),
  deliveryFee: moneySchema.optional().transform((val) => val ?? DEFAULT_DELIVERY_FEE_CENTS),
  specialInstructions: z
    .string()
    .nullish()
    .transform((val) => val ?? undefined),
});

export type CreateOrderInput = z.input<typeof createOrderSchema>;

// ============================================
// ORDER RULES
// ============================================

const PHONE_PATTERN = /^\d{10}$/;

export const customerRules: readonly ValidationRule<ICustomer>[] = [
  {
    name: 'name.length',
    field: 'name',
    check: (customer) =>
      lengthBetween(customer.name, OrderLimits.CUSTOMER_NAME_MIN_LENGTH, OrderLimits.CUSTOMER_NAME_MAX_LENGTH),
    message: `Customer name must be between ${OrderLimits.CUSTOMER_NAME_MIN_LENGTH} and ${OrderLimits.CUSTOMER_NAME_MAX_LENGTH} characters`,
  },
  {
    name: 'phone.pattern',
    field: 'phone',
    check: (customer) => PHONE_PATTERN.test(customer.phone),
    message: 'Phone number must be exactly 10 digits',
  },
  {
    name: 'address.length',
    field: 'address',
    check: (customer) => lengthAtMost(customer.address, OrderLimits.ADDRESS_MAX_LENGTH),
    message: `Address cannot exceed ${OrderLimits.ADDRESS_MAX_LENGTH} characters`,
  },
];

export const orderItemRules: readonly ValidationRule<IOrderItem>[] = [
  {
    name: 'menuItemId.positive',
    field: 'menuItemId',
    check: (item) => item.menuItemId > 0,
    message: 'Menu item ID must be positive',
  },
  {
    name: 'menuItemName.length',
    field: 'menuItemName',
    check: (item) =>
      lengthBetween(item.menuItemName, OrderLimits.ITEM_NAME_MIN_LENGTH, OrderLimits.ITEM_NAME_MAX_LENGTH),
    message: `Menu item name must be between ${OrderLimits.ITEM_NAME_MIN_LENGTH} and ${OrderLimits.ITEM_NAME_MAX_LENGTH} characters`,
  },
  {
    name: 'quantity.range',
    field: 'quantity',
    check: (item) => between(item.quantity, OrderLimits.MIN_QUANTITY, OrderLimits.MAX_QUANTITY),
    message: `Quantity must be between ${OrderLimits.MIN_QUANTITY} and ${OrderLimits.MAX_QUANTITY}`,
  },
  {
    name: 'unitPrice.positive',
    field: 'unitPrice',
    check: (item) => item.unitPrice > 0,
    message: 'Unit price must be greater than 0',
    value: (item) => formatMoney(item.unitPrice),
  },
  {
    name: 'unitPrice.digits',
    field: 'unitPrice',
    check: (item) => item.unitPrice <= OrderLimits.MAX_UNIT_PRICE_CENTS,
    message: `Unit price cannot exceed ${formatMoney(OrderLimits.MAX_UNIT_PRICE_CENTS)}`,
    value: (item) => formatMoney(item.unitPrice),
  },
];

export const orderRules: readonly ValidationRule<IOrder>[] = [
  {
    name: 'items.nonEmpty',
    field: 'items',
    check: (order) => order.items.length > 0,
    message: 'Order must have at least one item',
  },
  {
    name: 'deliveryFee.nonNegative',
    field: 'deliveryFee',
    check: (order) => order.deliveryFee >= 0,
    message: 'Delivery fee cannot be negative',
    value: (order) => formatMoney(order.deliveryFee),
  },
  {
    name: 'deliveryFee.range',
    field: 'deliveryFee',
    check: (order) => order.deliveryFee <= OrderLimits.MAX_DELIVERY_FEE_CENTS,
    message: `Delivery fee cannot exceed ${formatMoney(OrderLimits.MAX_DELIVERY_FEE_CENTS)}`,
    value: (order) => formatMoney(order.deliveryFee),
  },
  {
    name: 'specialInstructions.length',
    field: 'specialInstructions',
    check: (order) => lengthAtMost(order.specialInstructions, OrderLimits.SPECIAL_INSTRUCTIONS_MAX_LENGTH),
    message: `Special instructions cannot exceed ${OrderLimits.SPECIAL_INSTRUCTIONS_MAX_LENGTH} characters`,
  },
];

// ============================================
// VALIDATORS
// ============================================

/**
 * Decode and check an order's own fields. Reports every failing rule.
 */
export function validateOrderStructure(candidate: unknown): ValidationResult<IOrder, ValidationError> {
  const decoded = createOrderSchema.safeParse(candidate);
  if (!decoded.success) {
    return { success: false, error: new ValidationError(formatZodIssues(decoded.error.issues)) };
  }

  const order: IOrder = decoded.data;
  const issues: ValidationIssue[] = [
    ...evaluateRules(customerRules, order.customer, 'customer'),
    ...order.items.flatMap((item, index) => evaluateRules(orderItemRules, item, `items.${index}`)),
    ...evaluateRules(orderRules, order),
  ];

  if (issues.length > 0) {
    return { success: false, error: new ValidationError(issues) };
  }

  return { success: true, data: order };
}

/**
 * Every referenced menu item must exist and be available.
 * Items are checked in order and the first failure is reported.
 */
export function checkCatalogReferences(
  items: readonly IOrderItem[],
  lookup: CatalogLookup
): ReferentialError | null {
  for (const item of items) {
    const menuItem = lookup(item.menuItemId);
    if (!menuItem) {
      return new ReferentialError(
        item.menuItemId,
        'not_found',
        `Menu item with ID ${item.menuItemId} not found`
      );
    }

    if (!menuItem.isAvailable) {
      return new ReferentialError(item.menuItemId, 'unavailable', `Menu item '${menuItem.name}' is not available`);
    }
  }

  return null;
}

/**
 * Full order validation: structure first, then catalog consistency.
 * The accepted order has no id; the store assigns one.
 */
export function validateOrder(
  candidate: unknown,
  lookup: CatalogLookup
): ValidationResult<IOrder, ValidationError | ReferentialError> {
  const structural = validateOrderStructure(candidate);
  if (!structural.success) {
    return structural;
  }

  const referentialError = checkCatalogReferences(structural.data.items, lookup);
  if (referentialError) {
    return { success: false, error: referentialError };
  }

  return structural;
}

// ============================================
// UPDATE STATUS SCHEMA
// ============================================

export const updateStatusSchema = z.object({
  status: statusSchema,
});

export type UpdateStatusInput = z.infer<typeof updateStatusSchema>;

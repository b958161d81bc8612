// Orders Module Exports

// Model and aggregation
export {
  ORDER_STATUSES,
  DEFAULT_ORDER_STATUS,
  itemTotal,
  itemsTotal,
  totalAmount,
  totalItemsCount,
  setStatus,
} from './order.model.js';
export type { OrderStatus, ICustomer, IOrderItem, IOrder, Order } from './order.model.js';

// Validation
export {
  createOrderSchema,
  updateStatusSchema,
  customerRules,
  orderItemRules,
  orderRules,
  validateOrderStructure,
  checkCatalogReferences,
  validateOrder,
  DEFAULT_DELIVERY_FEE_CENTS,
} from './order.validation.js';
export type { CreateOrderInput, UpdateStatusInput } from './order.validation.js';

// Store
export { OrderStore, orderStore } from './order.store.js';

// Service
export { OrderService, orderService } from './order.service.js';

// Controller
export { OrderController, orderController, transformOrder, transformOrderSummary } from './order.controller.js';
export type { OrderResponse, OrderItemResponse, OrderSummaryResponse } from './order.controller.js';

// Routes
export { default as orderRoutes } from './order.routes.js';

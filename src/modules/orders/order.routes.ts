import { Router } from 'express';
import { orderController } from './order.controller.js';
import { updateStatusSchema } from './order.validation.js';
import { idParamsSchema, validateBody, validateParams } from '../../shared/middleware/validate.middleware.js';

// ============================================
// ORDER ROUTES - /orders
// ============================================

const router = Router();

// POST /orders - Place an order (structure and catalog checks)
router.post('/', (req, res, next) => orderController.createOrder(req, res, next));

// GET /orders - Order summaries
router.get('/', (req, res, next) => orderController.getAllOrders(req, res, next));

// GET /orders/:id - Order details with totals
router.get(
  '/:id',
  validateParams(idParamsSchema),
  (req, res, next) => orderController.getOrder(req, res, next)
);

// PUT /orders/:id/status - Overwrite status
router.put(
  '/:id/status',
  validateParams(idParamsSchema),
  validateBody(updateStatusSchema),
  (req, res, next) => orderController.updateStatus(req, res, next)
);

export default router;

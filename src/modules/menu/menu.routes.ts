import { Router } from 'express';
import { menuController } from './menu.controller.js';
import { categoryParamSchema } from './menu.validation.js';
import { idParamsSchema, validateParams } from '../../shared/middleware/validate.middleware.js';

// ============================================
// MENU ROUTES - /menu
// ============================================

const router = Router();

// GET /menu - All menu items with derived price tier and dietary info
router.get('/', (req, res, next) => menuController.getAllItems(req, res, next));

// GET /menu/category/:category - Items in one category
router.get(
  '/category/:category',
  validateParams(categoryParamSchema),
  (req, res, next) => menuController.getItemsByCategory(req, res, next)
);

// GET /menu/:id - Single item
router.get(
  '/:id',
  validateParams(idParamsSchema),
  (req, res, next) => menuController.getItem(req, res, next)
);

// POST /menu - Add item (body checked by the catalog validator)
router.post('/', (req, res, next) => menuController.createItem(req, res, next));

// PUT /menu/:id - Full replace
router.put(
  '/:id',
  validateParams(idParamsSchema),
  (req, res, next) => menuController.updateItem(req, res, next)
);

// DELETE /menu/:id - Remove item
router.delete(
  '/:id',
  validateParams(idParamsSchema),
  (req, res, next) => menuController.deleteItem(req, res, next)
);

export default router;

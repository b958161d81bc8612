// Menu Module Exports

// Model and derived attributes
export { FOOD_CATEGORIES, PRICE_CATEGORIES, priceCategory, dietaryInfo } from './food-item.model.js';
export type { FoodCategory, PriceCategory, DietaryTag, IFoodItem, FoodItem, CatalogLookup } from './food-item.model.js';

// Validation
export { foodItemCandidateSchema, foodItemRules, validateFoodItem, categoryParamSchema } from './menu.validation.js';
export type { FoodItemCandidate, CategoryParam } from './menu.validation.js';

// Store
export { CatalogStore, catalogStore } from './menu.store.js';

// Service
export { MenuService, menuService } from './menu.service.js';

// Controller
export { MenuController, menuController, transformFoodItem } from './menu.controller.js';
export type { FoodItemResponse } from './menu.controller.js';

// Seeding
export { seedSampleMenu } from './menu.seed.js';

// Routes
export { default as menuRoutes } from './menu.routes.js';

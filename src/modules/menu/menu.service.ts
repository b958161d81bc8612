import { NotFoundError } from '../../shared/middleware/error.middleware.js';
import { logger } from '../../config/logger.js';
import { FoodCategory, FoodItem } from './food-item.model.js';
import { CatalogStore, catalogStore } from './menu.store.js';
import { validateFoodItem } from './menu.validation.js';

const ENTITY = 'Menu item';

export class MenuService {
  constructor(private readonly store: CatalogStore = catalogStore) {}

  // ============================================
  // QUERIES
  // ============================================

  /**
   * Get all food items, available or not
   */
  async getAllItems(): Promise<FoodItem[]> {
    const items = this.store.findAll();
    logger.info(`Retrieved ${items.length} menu items`);
    return items;
  }

  /**
   * Get a single food item by ID
   */
  async getItem(id: number): Promise<FoodItem> {
    const item = this.store.findById(id);
    if (!item) {
      throw new NotFoundError(ENTITY, id);
    }
    return item;
  }

  async getItemsByCategory(category: FoodCategory): Promise<FoodItem[]> {
    const items = this.store.findByCategory(category);
    logger.info(`Retrieved ${items.length} menu items for category`, { category });
    return items;
  }

  // ============================================
  // MUTATIONS
  // ============================================

  /**
   * Validate and add a food item to the catalog
   */
  async createItem(candidate: unknown): Promise<FoodItem> {
    const result = validateFoodItem(candidate);
    if (!result.success) {
      logger.info('Menu item rejected', { issues: result.error.issues.length });
      throw result.error;
    }

    const item = this.store.upsert(undefined, result.data);
    logger.info(`Menu item created: ${item.name}`, { itemId: item.id });
    return item;
  }

  /**
   * Replace an existing food item with a fully validated candidate
   */
  async updateItem(id: number, candidate: unknown): Promise<FoodItem> {
    if (!this.store.has(id)) {
      throw new NotFoundError(ENTITY, id);
    }

    const result = validateFoodItem(candidate);
    if (!result.success) {
      logger.info('Menu item update rejected', { itemId: id, issues: result.error.issues.length });
      throw result.error;
    }

    const item = this.store.upsert(id, result.data);
    logger.info(`Menu item updated: ${item.name}`, { itemId: id });
    return item;
  }

  async deleteItem(id: number): Promise<FoodItem> {
    const item = this.store.delete(id);
    if (!item) {
      throw new NotFoundError(ENTITY, id);
    }

    logger.info(`Menu item deleted: ${item.name}`, { itemId: id });
    return item;
  }
}

export const menuService = new MenuService();

import { InMemoryStore } from '../../shared/store/in-memory.store.js';
import { CatalogLookup, FoodCategory, FoodItem, IFoodItem } from './food-item.model.js';

/**
 * Catalog collection
 */
export class CatalogStore extends InMemoryStore<IFoodItem> {
  constructor() {
    super('Menu item');
  }

  findByCategory(category: FoodCategory): FoodItem[] {
    return this.findAll().filter((item) => item.category === category);
  }

  /**
   * Narrow read-only capability for validators that consult the catalog
   */
  asLookup(): CatalogLookup {
    return (id) => this.findById(id);
  }
}

export const catalogStore = new CatalogStore();

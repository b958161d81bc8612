import { CatalogStore } from '../../menu/menu.store.js';
import type { CreateOrderInput } from '../order.validation.js';

/**
 * Catalog with an available item (id 1) and an unavailable one (id 2)
 */
export function createCatalog(): CatalogStore {
  const catalog = new CatalogStore();
  catalog.upsert(undefined, {
    name: 'Garlic Bread',
    description: 'Toasted bread with garlic butter',
    category: 'appetizer',
    price: 550,
    isAvailable: true,
    preparationTime: 8,
    ingredients: ['bread', 'garlic', 'butter'],
    isVegetarian: true,
    isSpicy: false,
  });
  catalog.upsert(undefined, {
    name: 'Iced Tea',
    description: 'Black tea served over ice',
    category: 'beverage',
    price: 300,
    isAvailable: false,
    preparationTime: 2,
    ingredients: ['tea', 'ice'],
    isVegetarian: true,
    isSpicy: false,
  });
  return catalog;
}

export function orderCandidate(overrides: Partial<CreateOrderInput> = {}): CreateOrderInput {
  return {
    customer: { name: 'Test Customer', phone: '5550001234' },
    items: [{ menuItemId: 1, menuItemName: 'Garlic Bread', quantity: 2, unitPrice: '5.50' }],
    ...overrides,
  };
}

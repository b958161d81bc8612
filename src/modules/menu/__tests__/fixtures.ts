import type { FoodItemCandidate } from '../menu.validation.js';

/**
 * A candidate that passes every catalog rule; tests override one field at a time
 */
export function validCandidate(overrides: Partial<FoodItemCandidate> = {}): FoodItemCandidate {
  return {
    name: 'Garlic Bread',
    description: 'Toasted bread with garlic butter',
    category: 'appetizer',
    price: '5.50',
    preparationTime: 8,
    ingredients: ['bread', 'garlic', 'butter'],
    calories: 320,
    isVegetarian: true,
    isSpicy: false,
    ...overrides,
  };
}

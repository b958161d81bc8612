import { PriceTierThresholds } from '../../config/constants.js';
import type { Stored } from '../../shared/store/in-memory.store.js';
import type { Cents } from '../../shared/utils/money.util.js';

// Food categories
export const FOOD_CATEGORIES = ['appetizer', 'main_course', 'dessert', 'beverage', 'salad'] as const;
export type FoodCategory = (typeof FOOD_CATEGORIES)[number];

// Derived price tiers
export const PRICE_CATEGORIES = ['Budget', 'Mid-range', 'Premium'] as const;
export type PriceCategory = (typeof PRICE_CATEGORIES)[number];

export type DietaryTag = 'Vegetarian' | 'Spicy';

// Food item as validated, before the store assigns an id
export interface IFoodItem {
  name: string;
  description: string;
  category: FoodCategory;
  price: Cents;
  isAvailable: boolean;
  preparationTime: number; // in minutes
  ingredients: string[];
  calories?: number;
  isVegetarian: boolean;
  isSpicy: boolean;
}

export type FoodItem = Stored<IFoodItem>;

/**
 * Read-only catalog access handed to the order validator
 */
export type CatalogLookup = (id: number) => FoodItem | undefined;

// ============================================
// DERIVED ATTRIBUTES
// ============================================

/**
 * Budget below 10.00, Mid-range from 10.00 through 25.00, Premium above
 */
export function priceCategory(item: Pick<IFoodItem, 'price'>): PriceCategory {
  if (item.price < PriceTierThresholds.MID_RANGE_FROM_CENTS) {
    return 'Budget';
  }
  if (item.price <= PriceTierThresholds.MID_RANGE_TO_CENTS) {
    return 'Mid-range';
  }
  return 'Premium';
}

export function dietaryInfo(item: Pick<IFoodItem, 'isVegetarian' | 'isSpicy'>): DietaryTag[] {
  const info: DietaryTag[] = [];
  if (item.isVegetarian) {
    info.push('Vegetarian');
  }
  if (item.isSpicy) {
    info.push('Spicy');
  }
  return info;
}

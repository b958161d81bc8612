import { z } from 'zod';
import { MenuItemLimits } from '../../config/constants.js';
import { ValidationError, formatZodIssues } from '../../shared/middleware/error.middleware.js';
import { moneySchema } from '../../shared/middleware/validate.middleware.js';
import { evaluateRules, lengthBetween, between, ValidationRule } from '../../shared/validation/rule-set.js';
import { formatMoney } from '../../shared/utils/money.util.js';
import type { ValidationResult } from '../../shared/types/index.js';
import { FOOD_CATEGORIES, IFoodItem } from './food-item.model.js';

// ============================================
// FOOD ITEM DECODING SCHEMA
// ============================================

// Shape and types only; value constraints live in foodItemRules
export const foodItemCandidateSchema = z.object({
  name: z.string({ required_error: 'Name is required' }),
  description: z.string({ required_error: 'Description is required' }),
  category: z.enum(FOOD_CATEGORIES, {
    errorMap: () => ({ message: `Category must be one of: ${FOOD_CATEGORIES.join(', ')}` }),
  }),
  price: moneySchema,
  isAvailable: z.boolean().default(true),
  preparationTime: z
    .number({ required_error: 'Preparation time is required' })
    .int('Preparation time must be a whole number of minutes'),
  ingredients: z.array(z.string(), { required_error: 'Ingredients are required' }),
  calories: z
    .number()
    .int('Calories must be a whole number')
    .nullish()
    .transform((val) => val ?? undefined),
  isVegetarian: z.boolean().default(false),
  isSpicy: z.boolean().default(false),
});

export type FoodItemCandidate = z.input<typeof foodItemCandidateSchema>;

// ============================================
// FOOD ITEM RULES
// ============================================

const NAME_PATTERN = /^[a-zA-Z\s]+$/;

/**
 * Catalog rules. Each is an independent predicate over the whole item, so
 * cross-field rules (spicy vs category, calories vs vegetarian) see every
 * field regardless of declaration order.
 */
export const foodItemRules: readonly ValidationRule<IFoodItem>[] = [
  {
    name: 'name.length',
    field: 'name',
    check: (item) => lengthBetween(item.name, MenuItemLimits.NAME_MIN_LENGTH, MenuItemLimits.NAME_MAX_LENGTH),
    message: `Name must be between ${MenuItemLimits.NAME_MIN_LENGTH} and ${MenuItemLimits.NAME_MAX_LENGTH} characters`,
  },
  {
    name: 'name.pattern',
    field: 'name',
    check: (item) => NAME_PATTERN.test(item.name),
    message: 'Name should only contain letters and spaces',
  },
  {
    name: 'description.length',
    field: 'description',
    check: (item) =>
      lengthBetween(item.description, MenuItemLimits.DESCRIPTION_MIN_LENGTH, MenuItemLimits.DESCRIPTION_MAX_LENGTH),
    message: `Description must be between ${MenuItemLimits.DESCRIPTION_MIN_LENGTH} and ${MenuItemLimits.DESCRIPTION_MAX_LENGTH} characters`,
  },
  {
    name: 'price.range',
    field: 'price',
    check: (item) => between(item.price, MenuItemLimits.MIN_PRICE_CENTS, MenuItemLimits.MAX_PRICE_CENTS),
    message: `Price must be between $${formatMoney(MenuItemLimits.MIN_PRICE_CENTS)} and $${formatMoney(MenuItemLimits.MAX_PRICE_CENTS)}`,
    value: (item) => formatMoney(item.price),
  },
  {
    name: 'isSpicy.category',
    field: 'isSpicy',
    check: (item) => !(item.isSpicy && (item.category === 'dessert' || item.category === 'beverage')),
    message: 'Desserts and beverages cannot be spicy',
  },
  {
    name: 'calories.vegetarian',
    field: 'calories',
    check: (item) =>
      item.calories === undefined || !item.isVegetarian || item.calories < MenuItemLimits.VEGETARIAN_CALORIE_LIMIT,
    message: `Vegetarian items should have calories < ${MenuItemLimits.VEGETARIAN_CALORIE_LIMIT}`,
  },
  {
    name: 'calories.positive',
    field: 'calories',
    check: (item) => item.calories === undefined || item.calories > 0,
    message: 'Calories must be greater than 0',
  },
  {
    name: 'preparationTime.range',
    field: 'preparationTime',
    check: (item) =>
      between(item.preparationTime, MenuItemLimits.MIN_PREPARATION_TIME, MenuItemLimits.MAX_PREPARATION_TIME),
    message: `Preparation time must be between ${MenuItemLimits.MIN_PREPARATION_TIME} and ${MenuItemLimits.MAX_PREPARATION_TIME} minutes`,
  },
  {
    name: 'preparationTime.beverage',
    field: 'preparationTime',
    check: (item) =>
      item.category !== 'beverage' || item.preparationTime <= MenuItemLimits.MAX_BEVERAGE_PREPARATION_TIME,
    message: `Beverages should have preparation time ≤ ${MenuItemLimits.MAX_BEVERAGE_PREPARATION_TIME} minutes`,
  },
  {
    name: 'ingredients.nonEmpty',
    field: 'ingredients',
    check: (item) => item.ingredients.length > 0,
    message: 'At least one ingredient is required',
  },
];

// ============================================
// VALIDATOR
// ============================================

/**
 * Decode and validate a candidate food item.
 * Reports every failing rule. Never touches storage.
 */
export function validateFoodItem(candidate: unknown): ValidationResult<IFoodItem, ValidationError> {
  const decoded = foodItemCandidateSchema.safeParse(candidate);
  if (!decoded.success) {
    return { success: false, error: new ValidationError(formatZodIssues(decoded.error.issues)) };
  }

  const item: IFoodItem = decoded.data;
  const issues = evaluateRules(foodItemRules, item);
  if (issues.length > 0) {
    return { success: false, error: new ValidationError(issues) };
  }

  return { success: true, data: item };
}

// ============================================
// PARAMETER SCHEMAS
// ============================================

export const categoryParamSchema = z.object({
  category: z.enum(FOOD_CATEGORIES, {
    errorMap: () => ({ message: `Category must be one of: ${FOOD_CATEGORIES.join(', ')}` }),
  }),
});

export type CategoryParam = z.infer<typeof categoryParamSchema>;

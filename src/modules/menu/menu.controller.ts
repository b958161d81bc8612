import { Request, Response, NextFunction } from 'express';
import { menuService, MenuService } from './menu.service.js';
import { categoryParamSchema } from './menu.validation.js';
import { FoodItem, FoodCategory, PriceCategory, DietaryTag, priceCategory, dietaryInfo } from './food-item.model.js';
import { HttpStatus } from '../../config/constants.js';
import { idParamsSchema } from '../../shared/middleware/validate.middleware.js';
import { createdResponse, listResponse, successResponse } from '../../shared/utils/response.util.js';
import { formatMoney } from '../../shared/utils/money.util.js';

// Wire format of a food item, including derived attributes
export interface FoodItemResponse {
  id: number;
  name: string;
  description: string;
  category: FoodCategory;
  price: string;
  isAvailable: boolean;
  preparationTime: number;
  ingredients: string[];
  calories: number | null;
  isVegetarian: boolean;
  isSpicy: boolean;
  priceCategory: PriceCategory;
  dietaryInfo: DietaryTag[];
}

export function transformFoodItem(item: FoodItem): FoodItemResponse {
  return {
    id: item.id,
    name: item.name,
    description: item.description,
    category: item.category,
    price: formatMoney(item.price),
    isAvailable: item.isAvailable,
    preparationTime: item.preparationTime,
    ingredients: [...item.ingredients],
    calories: item.calories ?? null,
    isVegetarian: item.isVegetarian,
    isSpicy: item.isSpicy,
    priceCategory: priceCategory(item),
    dietaryInfo: dietaryInfo(item),
  };
}

export class MenuController {
  constructor(private readonly service: MenuService = menuService) {}

  /**
   * GET /menu - Get all menu items
   */
  async getAllItems(_req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const items = await this.service.getAllItems();
      res.status(HttpStatus.OK).json(listResponse(items.map(transformFoodItem)));
    } catch (error) {
      next(error);
    }
  }

  /**
   * GET /menu/:id - Get a single menu item
   */
  async getItem(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const { id } = idParamsSchema.parse(req.params);
      const item = await this.service.getItem(id);
      res.status(HttpStatus.OK).json(successResponse(transformFoodItem(item)));
    } catch (error) {
      next(error);
    }
  }

  /**
   * GET /menu/category/:category - Get menu items in one category
   */
  async getItemsByCategory(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const { category } = categoryParamSchema.parse(req.params);
      const items = await this.service.getItemsByCategory(category);
      res.status(HttpStatus.OK).json(listResponse(items.map(transformFoodItem), { category }));
    } catch (error) {
      next(error);
    }
  }

  /**
   * POST /menu - Add a menu item
   */
  async createItem(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const item = await this.service.createItem(req.body);
      res.status(HttpStatus.CREATED).json(createdResponse(transformFoodItem(item), 'Menu item created successfully'));
    } catch (error) {
      next(error);
    }
  }

  /**
   * PUT /menu/:id - Replace a menu item
   */
  async updateItem(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const { id } = idParamsSchema.parse(req.params);
      const item = await this.service.updateItem(id, req.body);
      res
        .status(HttpStatus.OK)
        .json(successResponse(transformFoodItem(item), undefined, 'Menu item updated successfully'));
    } catch (error) {
      next(error);
    }
  }

  /**
   * DELETE /menu/:id - Remove a menu item
   */
  async deleteItem(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const { id } = idParamsSchema.parse(req.params);
      await this.service.deleteItem(id);
      res
        .status(HttpStatus.OK)
        .json(successResponse({ deletedItemId: id }, undefined, 'Menu item deleted successfully'));
    } catch (error) {
      next(error);
    }
  }
}

export const menuController = new MenuController();

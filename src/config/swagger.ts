/**
 * Swagger API Documentation Configuration
 */

import swaggerJsdoc from 'swagger-jsdoc';
import { APP_VERSION, API_VERSION } from './constants.js';
import { FOOD_CATEGORIES } from '../modules/menu/food-item.model.js';
import { ORDER_STATUSES } from '../modules/orders/order.model.js';

const jsonBody = (ref: string) => ({
  required: true,
  content: {
    'application/json': {
      schema: { $ref: `#/components/schemas/${ref}` },
    },
  },
});

const jsonResponse = (description: string, ref: string) => ({
  description,
  content: {
    'application/json': {
      schema: { $ref: `#/components/schemas/${ref}` },
    },
  },
});

const idParameter = {
  name: 'id',
  in: 'path',
  required: true,
  schema: { type: 'integer', minimum: 1 },
} as const;

const errorResponses = {
  404: jsonResponse('Not found', 'ErrorResponse'),
  422: jsonResponse('Validation failed; details lists every failing rule', 'ErrorResponse'),
};

const options: swaggerJsdoc.Options = {
  definition: {
    openapi: '3.0.0',
    info: {
      title: 'Restaurant Order Service API',
      version: APP_VERSION,
      description: `
Menu catalog and order intake.

- Money is exchanged as decimal strings with two fractional digits (e.g. "12.50").
- A menu item is checked against every catalog rule; all failures are reported together.
- An order is accepted only when every referenced menu item exists and is available.
      `,
    },
    servers: [
      {
        url: API_VERSION,
        description: 'Current server',
      },
    ],
    tags: [
      { name: 'Menu', description: 'Menu catalog' },
      { name: 'Orders', description: 'Order intake and status' },
    ],
    components: {
      schemas: {
        ErrorResponse: {
          type: 'object',
          properties: {
            success: { type: 'boolean', example: false },
            error: {
              type: 'object',
              properties: {
                code: { type: 'string', example: 'VALIDATION_ERROR' },
                message: { type: 'string', example: 'price: Price must be between $1.00 and $100.00' },
                details: { type: 'object' },
              },
            },
            requestId: { type: 'string' },
            timestamp: { type: 'string', format: 'date-time' },
          },
        },
        FoodItemRequest: {
          type: 'object',
          required: ['name', 'description', 'category', 'price', 'preparationTime', 'ingredients'],
          properties: {
            name: { type: 'string', minLength: 3, maxLength: 100, example: 'Garlic Bread' },
            description: { type: 'string', minLength: 10, maxLength: 500, example: 'Toasted bread with garlic butter' },
            category: { type: 'string', enum: [...FOOD_CATEGORIES], example: 'appetizer' },
            price: { type: 'string', example: '5.50' },
            isAvailable: { type: 'boolean', default: true },
            preparationTime: { type: 'integer', minimum: 1, maximum: 120, example: 8 },
            ingredients: { type: 'array', items: { type: 'string' }, example: ['bread', 'garlic', 'butter'] },
            calories: { type: 'integer', nullable: true, example: 320 },
            isVegetarian: { type: 'boolean', default: false },
            isSpicy: { type: 'boolean', default: false },
          },
        },
        FoodItem: {
          allOf: [
            { $ref: '#/components/schemas/FoodItemRequest' },
            {
              type: 'object',
              properties: {
                id: { type: 'integer', example: 1 },
                priceCategory: { type: 'string', enum: ['Budget', 'Mid-range', 'Premium'] },
                dietaryInfo: { type: 'array', items: { type: 'string', enum: ['Vegetarian', 'Spicy'] } },
              },
            },
          ],
        },
        OrderItem: {
          type: 'object',
          required: ['menuItemId', 'menuItemName', 'quantity', 'unitPrice'],
          properties: {
            menuItemId: { type: 'integer', example: 1 },
            menuItemName: { type: 'string', example: 'Garlic Bread' },
            quantity: { type: 'integer', minimum: 1, maximum: 10, example: 2 },
            unitPrice: { type: 'string', example: '5.50' },
          },
        },
        CreateOrderRequest: {
          type: 'object',
          required: ['customer', 'items'],
          properties: {
            customer: {
              type: 'object',
              required: ['name', 'phone'],
              properties: {
                name: { type: 'string', minLength: 2, maxLength: 50, example: 'Test Customer' },
                phone: { type: 'string', pattern: '^\\d{10}$', example: '5550001234' },
                address: { type: 'string', maxLength: 200 },
              },
            },
            items: { type: 'array', minItems: 1, items: { $ref: '#/components/schemas/OrderItem' } },
            status: { type: 'string', enum: [...ORDER_STATUSES], default: 'pending' },
            deliveryFee: { type: 'string', example: '2.99' },
            specialInstructions: { type: 'string', maxLength: 200 },
          },
        },
        Order: {
          allOf: [
            { $ref: '#/components/schemas/CreateOrderRequest' },
            {
              type: 'object',
              properties: {
                id: { type: 'integer', example: 1 },
                itemsTotal: { type: 'string', example: '11.00' },
                totalAmount: { type: 'string', example: '13.99' },
                totalItemsCount: { type: 'integer', example: 2 },
              },
            },
          ],
        },
        UpdateStatusRequest: {
          type: 'object',
          required: ['status'],
          properties: {
            status: { type: 'string', enum: [...ORDER_STATUSES] },
          },
        },
      },
    },
    paths: {
      '/menu': {
        get: {
          tags: ['Menu'],
          summary: 'List menu items',
          responses: { 200: { description: 'Menu items' } },
        },
        post: {
          tags: ['Menu'],
          summary: 'Add a menu item',
          requestBody: jsonBody('FoodItemRequest'),
          responses: { 201: jsonResponse('Menu item created', 'FoodItem'), 422: errorResponses[422] },
        },
      },
      '/menu/category/{category}': {
        get: {
          tags: ['Menu'],
          summary: 'List menu items in a category',
          parameters: [
            { name: 'category', in: 'path', required: true, schema: { type: 'string', enum: [...FOOD_CATEGORIES] } },
          ],
          responses: { 200: { description: 'Menu items' }, 422: errorResponses[422] },
        },
      },
      '/menu/{id}': {
        get: {
          tags: ['Menu'],
          summary: 'Get a menu item',
          parameters: [idParameter],
          responses: { 200: jsonResponse('Menu item', 'FoodItem'), 404: errorResponses[404] },
        },
        put: {
          tags: ['Menu'],
          summary: 'Replace a menu item',
          parameters: [idParameter],
          requestBody: jsonBody('FoodItemRequest'),
          responses: { 200: jsonResponse('Menu item updated', 'FoodItem'), ...errorResponses },
        },
        delete: {
          tags: ['Menu'],
          summary: 'Delete a menu item',
          parameters: [idParameter],
          responses: { 200: { description: 'Menu item deleted' }, 404: errorResponses[404] },
        },
      },
      '/orders': {
        get: {
          tags: ['Orders'],
          summary: 'List order summaries',
          responses: { 200: { description: 'Order summaries' } },
        },
        post: {
          tags: ['Orders'],
          summary: 'Place an order',
          requestBody: jsonBody('CreateOrderRequest'),
          responses: {
            201: jsonResponse('Order created', 'Order'),
            400: jsonResponse('Referenced menu item missing or unavailable', 'ErrorResponse'),
            422: errorResponses[422],
          },
        },
      },
      '/orders/{id}': {
        get: {
          tags: ['Orders'],
          summary: 'Get an order with totals',
          parameters: [idParameter],
          responses: { 200: jsonResponse('Order', 'Order'), 404: errorResponses[404] },
        },
      },
      '/orders/{id}/status': {
        put: {
          tags: ['Orders'],
          summary: 'Set order status',
          parameters: [idParameter],
          requestBody: jsonBody('UpdateStatusRequest'),
          responses: { 200: jsonResponse('Order updated', 'Order'), ...errorResponses },
        },
      },
    },
  },
  apis: [], // All paths are defined inline above
};

export const swaggerSpec = swaggerJsdoc(options);
export default swaggerSpec;

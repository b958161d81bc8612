/**
 * Application Constants
 * Central location for all app-wide constant values
 */

// Server Configuration
export const ServerConfig = {
  PORT: parseInt(process.env['PORT'] ?? '3000', 10),
  HOST: process.env['HOST'] ?? '0.0.0.0',
  SHUTDOWN_TIMEOUT_MS: 10000,
  SEED_SAMPLE_MENU: process.env['SEED_SAMPLE_MENU'] === 'true',
} as const;

// API
export const API_VERSION = '/api/v1';
export const APP_VERSION = '1.0.0';

// Rate Limiting Configuration
export const RateLimitConfig = {
  GENERAL: {
    windowMs: parseInt(process.env['RATE_LIMIT_WINDOW_MS'] ?? '900000', 10), // 15 minutes
    maxRequests: parseInt(process.env['RATE_LIMIT_MAX_REQUESTS'] ?? '100', 10),
  },
} as const;

// Menu item constraints
export const MenuItemLimits = {
  NAME_MIN_LENGTH: 3,
  NAME_MAX_LENGTH: 100,
  DESCRIPTION_MIN_LENGTH: 10,
  DESCRIPTION_MAX_LENGTH: 500,
  MIN_PRICE_CENTS: 100,
  MAX_PRICE_CENTS: 10000,
  MIN_PREPARATION_TIME: 1,
  MAX_PREPARATION_TIME: 120, // minutes
  MAX_BEVERAGE_PREPARATION_TIME: 10, // minutes
  VEGETARIAN_CALORIE_LIMIT: 800, // exclusive
} as const;

// Price tier boundaries, in cents
export const PriceTierThresholds = {
  MID_RANGE_FROM_CENTS: 1000, // inclusive
  MID_RANGE_TO_CENTS: 2500, // inclusive
} as const;

// Order constraints
export const OrderLimits = {
  CUSTOMER_NAME_MIN_LENGTH: 2,
  CUSTOMER_NAME_MAX_LENGTH: 50,
  ADDRESS_MAX_LENGTH: 200,
  ITEM_NAME_MIN_LENGTH: 1,
  ITEM_NAME_MAX_LENGTH: 100,
  MIN_QUANTITY: 1,
  MAX_QUANTITY: 10,
  MAX_UNIT_PRICE_CENTS: 999999, // six significant digits
  SPECIAL_INSTRUCTIONS_MAX_LENGTH: 200,
  MAX_DELIVERY_FEE_CENTS: 999999,
} as const;

// Delivery Configuration
export const DeliveryConfig = {
  DEFAULT_DELIVERY_FEE: process.env['DEFAULT_DELIVERY_FEE'] ?? '2.99',
} as const;

// HTTP Status Codes
export const HttpStatus = {
  OK: 200,
  CREATED: 201,
  BAD_REQUEST: 400,
  NOT_FOUND: 404,
  UNPROCESSABLE_ENTITY: 422,
  INTERNAL_SERVER_ERROR: 500,
} as const;

// Error Messages
export const ErrorMessages = {
  NOT_FOUND: 'Resource not found',
  INTERNAL_ERROR: 'Internal server error',
  RATE_LIMIT_EXCEEDED: 'Too many requests, please try again later',
  INVALID_JSON: 'Invalid JSON in request body',
} as const;

/**
 * Response Utilities
 * Helper functions for formatting API responses
 */

import type { ApiResponse } from '../types/index.js';

// ============================================
// SUCCESS RESPONSE
// ============================================

/**
 * Format a successful API response
 * @param data - Response data
 * @param meta - Optional metadata
 * @param message - Optional success message
 */
export function successResponse<T>(
  data: T,
  meta?: Record<string, unknown>,
  message?: string
): ApiResponse<T> {
  const response: ApiResponse<T> = {
    success: true,
    data,
    timestamp: new Date().toISOString(),
  };

  if (message) {
    response.message = message;
  }

  if (meta) {
    response.meta = meta;
  }

  return response;
}

/**
 * Format a created response (201)
 */
export function createdResponse<T>(
  data: T,
  message: string = 'Resource created successfully'
): ApiResponse<T> {
  return successResponse(data, undefined, message);
}

/**
 * Create a response for a list/collection
 */
export function listResponse<T>(
  items: T[],
  meta?: Record<string, unknown>
): ApiResponse<T[]> {
  return successResponse(items, {
    count: items.length,
    ...meta,
  });
}

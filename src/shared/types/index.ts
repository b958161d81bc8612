/**
 * Shared TypeScript Types and Interfaces
 * Central location for all shared type definitions
 */

// ============================================
// API RESPONSE TYPES
// ============================================

/**
 * Standard API response wrapper
 */
export interface ApiResponse<T> {
  success: boolean;
  data: T;
  message?: string;
  meta?: Record<string, unknown>;
  requestId?: string;
  timestamp: string;
}

/**
 * Standard error response
 */
export interface ErrorResponse {
  success: false;
  error: {
    code: string;
    message: string;
    details?: Record<string, unknown> | unknown[];
    stack?: string;
  };
  requestId?: string;
  timestamp: string;
}

// ============================================
// EXPRESS EXTENSION
// ============================================

// Declaration merging to extend Express Request
declare global {
  namespace Express {
    interface Request {
      requestId?: string;
    }
  }
}

// ============================================
// VALIDATION TYPES
// ============================================

/**
 * A single failed check: which field, which rule, and a readable message
 */
export interface ValidationIssue {
  field: string;
  rule: string;
  message: string;
  value?: unknown;
}

/**
 * Outcome of a validator. Validators never throw for bad input.
 */
export type ValidationResult<T, E> = { success: true; data: T } | { success: false; error: E };

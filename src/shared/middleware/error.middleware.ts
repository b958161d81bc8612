/**
 * Error Handling Middleware
 * Centralized error handling for the application
 */

import { Request, Response, NextFunction } from 'express';
import { ZodError, ZodIssue } from 'zod';
import { HttpStatus, ErrorMessages } from '../../config/constants.js';
import { logger } from '../../config/logger.js';
import type { ErrorResponse, ValidationIssue } from '../types/index.js';

// ============================================
// APP ERROR CLASS
// ============================================

/**
 * Custom application error with status code and operational flag
 */
export class AppError extends Error {
  public readonly statusCode: number;
  public readonly code: string;
  public readonly isOperational: boolean;
  public readonly details?: Record<string, unknown> | unknown[];

  constructor(
    message: string,
    statusCode: number = 500,
    code: string = 'INTERNAL_ERROR',
    isOperational: boolean = true,
    details?: Record<string, unknown> | unknown[]
  ) {
    super(message);
    this.name = 'AppError';
    this.statusCode = statusCode;
    this.code = code;
    this.isOperational = isOperational;
    this.details = details;

    // Maintains proper stack trace for where error was thrown
    Error.captureStackTrace(this, this.constructor);
    Object.setPrototypeOf(this, new.target.prototype);
  }

  /**
   * Create a 404 Not Found error
   */
  static notFound(message: string = ErrorMessages.NOT_FOUND, code: string = 'NOT_FOUND'): AppError {
    return new AppError(message, HttpStatus.NOT_FOUND, code, true);
  }
}

// ============================================
// DOMAIN ERRORS
// ============================================

/**
 * Format Zod issues into validation issues
 */
export function formatZodIssues(issues: ZodIssue[]): ValidationIssue[] {
  return issues.map((issue) => ({
    field: issue.path.join('.'),
    rule: issue.code,
    message: issue.message,
  }));
}

/**
 * Build a readable summary from validation issues
 */
export function describeIssues(issues: ValidationIssue[]): string {
  if (issues.length === 1) {
    const issue = issues[0];
    return issue.field ? `${issue.field}: ${issue.message}` : issue.message;
  }
  return `Validation failed with ${issues.length} error(s)`;
}

/**
 * Structural or cross-field input failure (422)
 */
export class ValidationError extends AppError {
  public readonly issues: ValidationIssue[];

  constructor(issues: ValidationIssue[], message: string = describeIssues(issues)) {
    super(message, HttpStatus.UNPROCESSABLE_ENTITY, 'VALIDATION_ERROR', true, issues);
    this.name = 'ValidationError';
    this.issues = issues;
  }
}

/**
 * A path-addressed entity that does not exist (404)
 */
export class NotFoundError extends AppError {
  public readonly entity: string;
  public readonly id: number;

  constructor(entity: string, id: number) {
    super(`${entity} not found`, HttpStatus.NOT_FOUND, 'NOT_FOUND', true, { entity, id });
    this.name = 'NotFoundError';
    this.entity = entity;
    this.id = id;
  }
}

export type ReferentialFailure = 'not_found' | 'unavailable';

/**
 * An order references a menu item that is missing or not available (400).
 * The faulty input is the order body, so this is a client input error.
 */
export class ReferentialError extends AppError {
  public readonly menuItemId: number;
  public readonly reason: ReferentialFailure;

  constructor(menuItemId: number, reason: ReferentialFailure, message: string) {
    super(
      message,
      HttpStatus.BAD_REQUEST,
      reason === 'not_found' ? 'MENU_ITEM_NOT_FOUND' : 'MENU_ITEM_UNAVAILABLE',
      true,
      { menuItemId, reason }
    );
    this.name = 'ReferentialError';
    this.menuItemId = menuItemId;
    this.reason = reason;
  }
}

// ============================================
// ERROR FORMATTING HELPERS
// ============================================

/**
 * Format error response consistently
 */
function formatErrorResponse(
  code: string,
  message: string,
  requestId?: string,
  details?: Record<string, unknown> | unknown[],
  stack?: string
): ErrorResponse {
  const response: ErrorResponse = {
    success: false,
    error: {
      code,
      message,
    },
    timestamp: new Date().toISOString(),
  };

  if (requestId) {
    response.requestId = requestId;
  }

  if (details) {
    response.error.details = details;
  }

  // Only include stack trace in development
  if (stack && process.env['NODE_ENV'] === 'development') {
    response.error.stack = stack;
  }

  return response;
}

// ============================================
// GLOBAL ERROR HANDLER MIDDLEWARE
// ============================================

/**
 * Global error handler middleware
 * Catches all errors and formats them consistently
 */
export function globalErrorHandler(
  err: Error,
  req: Request,
  res: Response,
  _next: NextFunction
): void {
  // Default values
  let statusCode: number = HttpStatus.INTERNAL_SERVER_ERROR;
  let code: string = 'INTERNAL_ERROR';
  let message: string = ErrorMessages.INTERNAL_ERROR;
  let details: Record<string, unknown> | unknown[] | undefined;
  let isOperational = false;

  // Handle AppError instances
  if (err instanceof AppError) {
    statusCode = err.statusCode;
    code = err.code;
    message = err.message;
    details = err.details;
    isOperational = err.isOperational;
  }
  // Handle schema errors thrown by parse() outside the validate middleware
  else if (err instanceof ZodError) {
    const validationError = new ValidationError(formatZodIssues(err.issues));
    statusCode = validationError.statusCode;
    code = validationError.code;
    message = validationError.message;
    details = validationError.details;
    isOperational = true;
  }
  // Handle syntax errors (malformed JSON)
  else if (err instanceof SyntaxError && 'body' in err) {
    statusCode = HttpStatus.BAD_REQUEST;
    code = 'INVALID_JSON';
    message = ErrorMessages.INVALID_JSON;
    isOperational = true;
  }

  if (isOperational) {
    logger.warn('Operational error:', {
      code,
      error: message,
      path: req.path,
      method: req.method,
    });
  } else {
    logger.error('Unhandled error:', {
      error: err.message,
      stack: err.stack,
      requestId: req.requestId,
      path: req.path,
      method: req.method,
    });
  }

  const errorResponse = formatErrorResponse(code, message, req.requestId, details, err.stack);

  res.status(statusCode).json(errorResponse);
}

// ============================================
// NOT FOUND HANDLER
// ============================================

/**
 * Handle 404 for undefined routes
 */
export function notFoundHandler(req: Request, _res: Response, next: NextFunction): void {
  next(AppError.notFound(`Route ${req.method} ${req.originalUrl} not found`));
}

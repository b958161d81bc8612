/**
 * Validation Middleware
 * Generic validation using Zod schemas
 */

import { Request, Response, NextFunction } from 'express';
import { ZodError, ZodType, ZodTypeDef } from 'zod';
import { ValidationError, formatZodIssues } from './error.middleware.js';

// ============================================
// TYPES
// ============================================

/**
 * Source of data to validate
 */
export type ValidationSource = 'body' | 'params';

/**
 * Validation options
 */
export interface ValidationOptions {
  /** Custom error message */
  customMessage?: string;
}

// ============================================
// VALIDATION MIDDLEWARE
// ============================================

/**
 * Generic validation middleware using Zod schemas
 * @param schema - Zod schema to validate against
 * @param source - Source of data to validate (body or params)
 * @param options - Validation options
 */
export function validate<T>(
  schema: ZodType<T, ZodTypeDef, unknown>,
  source: ValidationSource = 'body',
  options: ValidationOptions = {}
) {
  const { customMessage } = options;

  return async (req: Request, _res: Response, next: NextFunction): Promise<void> => {
    try {
      const validatedData = await schema.parseAsync(req[source]);

      // Replace source data with validated/transformed data
      switch (source) {
        case 'body':
          req.body = validatedData;
          break;
        case 'params':
          (req as { params: unknown }).params = validatedData;
          break;
      }

      next();
    } catch (error) {
      if (error instanceof ZodError) {
        const issues = formatZodIssues(error.issues);
        next(new ValidationError(issues, customMessage));
      } else {
        next(error);
      }
    }
  };
}

/**
 * Validate request body
 */
export function validateBody<T>(schema: ZodType<T, ZodTypeDef, unknown>, options?: ValidationOptions) {
  return validate(schema, 'body', options);
}

/**
 * Validate route parameters
 */
export function validateParams<T>(schema: ZodType<T, ZodTypeDef, unknown>, options?: ValidationOptions) {
  return validate(schema, 'params', options);
}

// ============================================
// COMMON VALIDATION SCHEMAS
// ============================================

import { z } from 'zod';
import { parseMoney } from '../utils/money.util.js';

/**
 * Decimal amount with at most two fractional digits, decoded to integer cents.
 * Accepts a JSON number or a numeric string.
 */
export const moneySchema = z
  .union([z.number(), z.string()], {
    errorMap: () => ({ message: 'Expected a decimal amount' }),
  })
  .transform((value, ctx) => {
    const cents = parseMoney(value);
    if (cents === null) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'Must be a decimal amount with at most 2 fractional digits',
      });
      return z.NEVER;
    }
    return cents;
  });

/**
 * Positive integer id, from a path segment or a JSON number
 */
export const positiveIdSchema = z.coerce
  .number({ invalid_type_error: 'ID must be a number' })
  .int('ID must be an integer')
  .positive('ID must be positive');

/**
 * Common ID params schema
 */
export const idParamsSchema = z.object({
  id: positiveIdSchema,
});

export type IdParams = z.infer<typeof idParamsSchema>;

/**
 * Argument validation for analytics operations.
 */

import { z } from 'zod';
import { ValidationError } from '../errors';

// =============================================================================
// Analytics Argument Schemas
// =============================================================================

export const customerIdSchema = z
  .number({ invalid_type_error: 'customerId must be a number' })
  .int('customerId must be an integer')
  .positive('customerId must be positive');

// Non-positive limits are accepted here and produce an empty ranking
export const topSellingLimitSchema = z
  .number({ invalid_type_error: 'limit must be a number' })
  .int('limit must be an integer');

export const thresholdPercentageSchema = z
  .number({ invalid_type_error: 'thresholdPercentage must be a number' })
  .finite('thresholdPercentage must be finite')
  .min(0, 'thresholdPercentage must be between 0 and 100')
  .max(100, 'thresholdPercentage must be between 0 and 100');

// =============================================================================
// Validation Helpers
// =============================================================================

export function validateArgument<T>(schema: z.ZodSchema<T>, data: unknown, argument: string): T {
  const result = schema.safeParse(data);
  if (result.success) {
    return result.data;
  }

  const issues = result.error.issues.map((issue) => issue.message);
  throw new ValidationError(`Invalid ${argument}`, {
    detail: issues.join('; '),
    argument,
    issues,
  });
}

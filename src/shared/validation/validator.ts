/**
 * Validator Utilities
 */

import { z } from 'zod';
import { ValidationIssue, ValidationResult } from './types';

/**
 * Convert a zod error to field-level issues
 */
export function zodErrorToIssues(error: z.ZodError): ValidationIssue[] {
  return error.errors.map(err => ({
    field: err.path.length > 0 ? err.path.join('.') : '(root)',
    message: err.message
  }));
}

export function zodErrorToValidationResult(error: z.ZodError): ValidationResult {
  return {
    isValid: false,
    errors: zodErrorToIssues(error)
  };
}

/**
 * Validate without throwing
 */
export function validateWithSchema<T extends z.ZodTypeAny>(
  schema: T,
  value: unknown
): { result: ValidationResult; data?: z.output<T> } {
  const parsed = schema.safeParse(value);
  if (parsed.success) {
    return { result: { isValid: true, errors: [] }, data: parsed.data };
  }
  return { result: zodErrorToValidationResult(parsed.error) };
}

/**
 * One-line summary of issues, e.g. for an error message
 */
export function formatIssues(issues: ValidationIssue[]): string {
  return issues.map(issue => `${issue.field}: ${issue.message}`).join('; ');
}

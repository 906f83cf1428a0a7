/**
 * Validation Types
 */

/**
 * A problem with one field of a validated value
 */
export interface ValidationIssue {
  field: string;
  message: string;
}

/**
 * Result of validation
 */
export interface ValidationResult {
  isValid: boolean;
  errors: ValidationIssue[];
}

/**
 * Error Handler
 *
 * Helpers for turning arbitrary thrown values into AppErrors and for
 * presenting them to a user.
 */

import { AppError, ErrorCategory, ErrorSeverity } from './types';

export class ErrorHandler {
  /**
   * Wrap a value of unknown shape in an AppError
   */
  static createUnexpectedError(
    error: unknown,
    context?: Record<string, unknown>
  ): AppError {
    return new AppError({
      category: ErrorCategory.UNEXPECTED,
      severity: ErrorSeverity.CRITICAL,
      userMessage: 'An unexpected error occurred.',
      technicalDetails: this.describe(error),
      timestamp: new Date(),
      context,
      recoverable: false,
      cause: error
    });
  }

  /**
   * Pass AppErrors through, wrap everything else
   */
  static toAppError(error: unknown, context?: Record<string, unknown>): AppError {
    if (error instanceof AppError) {
      return error;
    }
    return this.createUnexpectedError(error, context);
  }

  /**
   * Format error message for display to user
   */
  static formatUserMessage(error: unknown): string {
    if (error instanceof AppError) {
      let message = error.userMessage;
      if (error.technicalDetails && error.technicalDetails !== error.userMessage) {
        message += `\n  ${error.technicalDetails}`;
      }
      if (error.suggestedAction) {
        message += `\n\n${error.suggestedAction}`;
      }
      return message;
    }
    return this.describe(error);
  }

  /**
   * Best-effort message extraction from a thrown value
   */
  static describe(error: unknown): string {
    if (error instanceof Error) {
      return error.message;
    }
    if (typeof error === 'string') {
      return error;
    }
    try {
      return JSON.stringify(error);
    } catch {
      return String(error);
    }
  }
}

/**
 * Errors Module
 *
 * Shared error types and presentation helpers.
 */

export * from './handler';
export * from './types';

/**
 * Validation Module
 *
 * Zod helpers shared by configuration, model-reply and request validation.
 */

export * from './validator';
export * from './schemas';
export * from './types';

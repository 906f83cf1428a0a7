/**
 * Shared Infrastructure
 *
 * Modules:
 * - llm: Unified LLM client (Anthropic + OpenAI)
 * - logging: pino logger and component loggers
 * - storage: File and in-memory storage for run artifacts
 * - validation: Zod helpers
 * - errors: Base error types
 */

export * from './llm';
export * from './logging/logger';
export * from './storage';
export * from './validation';
export * from './errors';

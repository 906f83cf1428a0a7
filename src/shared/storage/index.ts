/**
 * Storage Module
 */

export * from './interface';
export * from './fileStorage';
export * from './memoryStorage';

/**
 * Shared Zod primitives
 */

import { z } from 'zod';

export const NonEmptyStringSchema = z.string().trim().min(1, 'Must not be empty');

export const HttpUrlSchema = z
  .string()
  .url('Must be a valid URL')
  .refine(value => /^https?:\/\//i.test(value), 'Must be an http(s) URL');

/**
 * A similarity or threshold in [0, 1]
 */
export const UnitIntervalSchema = z.number().min(0, 'Must be >= 0').max(1, 'Must be <= 1');

/**
 * Arrays of strings coming back from a model: non-string members and blanks
 * are dropped rather than failing the whole reply.
 */
export const LenientStringListSchema = z
  .unknown()
  .transform(value =>
    (Array.isArray(value) ? value : [])
      .filter((item): item is string => typeof item === 'string')
      .map(item => item.trim())
      .filter(item => item.length > 0)
  );

/**
 * Optional string field from a model reply; non-strings become undefined
 */
export const LenientStringSchema = z
  .unknown()
  .transform(value => (typeof value === 'string' && value.trim().length > 0 ? value.trim() : undefined));

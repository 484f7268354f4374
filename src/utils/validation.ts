/**
 * Validation schemas and utilities for download options
 */

import { z } from 'zod';
import {
  FilterConfig,
  HISTORY_ORDERS,
  LIMIT_SCOPES,
  MEDIA_TYPES,
} from '../models';
import { fromZodError } from './errors';

const DAY_MS = 24 * 60 * 60 * 1000;

export const DEFAULT_LIMIT = 100;

// Numeric ID, negative for groups and channels (e.g. -1001234567890)
const entityIdSchema = z
  .string()
  .trim()
  .regex(/^-?\d+$/, { message: 'Entity ID must be an integer' });

// CLI values arrive as strings, programmatic callers may pass numbers
const nonNegativeIntSchema = z.coerce
  .number()
  .int({ message: 'Must be an integer' })
  .min(0, { message: 'Must be a non-negative integer' });

export const downloadOptionsSchema = z.object({
  entityId: entityIdSchema,
  mediaType: z.enum(MEDIA_TYPES).default('all'),
  limit: nonNegativeIntSchema.default(DEFAULT_LIMIT),
  limitScope: z.enum(LIMIT_SCOPES).default('qualifying'),
  days: nonNegativeIntSchema.optional(),
  contains: z.string().optional(),
  downloadDir: z.string().trim().min(1, { message: 'Download directory is required' }),
  order: z.enum(HISTORY_ORDERS).default('newest-first'),
});

export type DownloadOptionsInput = z.input<typeof downloadOptionsSchema>;
export type DownloadOptions = z.infer<typeof downloadOptionsSchema>;

/**
 * Validates raw download options, throws ValidationError listing every issue
 */
export function parseDownloadOptions(raw: unknown): DownloadOptions {
  const result = downloadOptionsSchema.safeParse(raw);
  if (!result.success) {
    throw fromZodError(result.error);
  }
  return result.data;
}

/**
 * Builds the immutable per-run filter. `days` of 0 or absent disables the date
 * bound, an empty `contains` disables the text match.
 */
export function buildFilterConfig(
  options: DownloadOptions,
  now: Date = new Date(),
): FilterConfig {
  const containsText = options.contains?.trim() ? options.contains : undefined;
  const minTimestamp = options.days
    ? new Date(now.getTime() - options.days * DAY_MS)
    : undefined;

  return Object.freeze({
    mediaType: options.mediaType,
    maxMessages: options.limit,
    limitScope: options.limitScope,
    ...(minTimestamp ? { minTimestamp } : {}),
    ...(containsText ? { containsText } : {}),
  });
}

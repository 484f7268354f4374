import { z } from 'zod';

const urlPrefix = /^https?:\/\//i;
const urlSchema = z.string().url();

/**
 * http(s) tokens of the text (split on whitespace) in order of appearance,
 * duplicates kept. Tokens that do not parse as URLs are dropped.
 */
export function extractUrls(text: string): string[] {
  if (!text) return [];

  return text
    .split(/\s+/)
    .filter((token) => urlPrefix.test(token) && isWellFormedUrl(token));
}

export function isWellFormedUrl(candidate: string): boolean {
  return urlSchema.safeParse(candidate).success;
}

/**
 * Filter model - immutable per-run download filter
 */

export const MEDIA_TYPES = [
  'all',
  'photos',
  'documents',
  'links',
  'gifs',
] as const;

export type MediaType = (typeof MEDIA_TYPES)[number];

// qualifying: limit counts messages passed downstream, scanned: raw messages pulled
export const LIMIT_SCOPES = ['qualifying', 'scanned'] as const;

export type LimitScope = (typeof LIMIT_SCOPES)[number];

export const HISTORY_ORDERS = ['newest-first', 'oldest-first'] as const;

export type HistoryOrder = (typeof HISTORY_ORDERS)[number];

export interface FilterConfig {
  readonly mediaType: MediaType;
  /** 0 = unlimited */
  readonly maxMessages: number;
  readonly limitScope: LimitScope;
  readonly minTimestamp?: Date;
  readonly containsText?: string;
}

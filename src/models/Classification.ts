/**
 * Classification model - what a qualifying message would produce on disk
 */

export type SkipReason =
  | 'no-media'
  | 'out-of-scope'
  | 'unrecognized-format'
  | 'malformed-link-text';

export type ClassificationResult<TSource = unknown> =
  | {
      kind: 'photo';
      source: TSource;
      fileName: string;
      extension: string;
    }
  | {
      kind: 'document';
      source: TSource;
      fileName: string;
      extension: string;
      originalName?: string;
    }
  | {
      kind: 'animated-image';
      source: TSource;
      fileName: string;
      extension: string;
    }
  | { kind: 'links'; urls: string[] }
  | { kind: 'none'; reason: SkipReason };

export type FileClassification<TSource = unknown> = Extract<
  ClassificationResult<TSource>,
  { fileName: string }
>;

import path from 'path';
import {
  ChatMessage,
  ClassificationResult,
  MediaType,
  MessageAttachment,
} from '../models';
import { extractUrls, isWellFormedUrl } from '../utils/links';
import { sanitizePathSegment } from '../utils/paths';

export interface ClassifierOptions {
  entityId: string;
  mediaType: MediaType;
}

export const DEFAULT_EXTENSION = '.bin';

// Фото в Telegram всегда хранятся в JPEG
const PHOTO_EXTENSION = '.jpg';

const mimePattern = /^[a-z0-9][\w.+-]*\/[\w.+-]+$/i;

const mimeExtensions: Record<string, string> = {
  'image/jpeg': '.jpg',
  'image/png': '.png',
  'image/gif': '.gif',
  'image/webp': '.webp',
  'image/heic': '.heic',
  'video/mp4': '.mp4',
  'video/quicktime': '.mov',
  'video/webm': '.webm',
  'audio/mpeg': '.mp3',
  'audio/ogg': '.ogg',
  'audio/mp4': '.m4a',
  'application/pdf': '.pdf',
  'application/zip': '.zip',
  'application/x-rar-compressed': '.rar',
  'application/x-7z-compressed': '.7z',
  'application/json': '.json',
  'application/msword': '.doc',
  'application/vnd.openxmlformats-officedocument.wordprocessingml.document':
    '.docx',
  'application/vnd.ms-excel': '.xls',
  'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet': '.xlsx',
  'application/vnd.android.package-archive': '.apk',
  'text/plain': '.txt',
  'text/csv': '.csv',
  'application/x-tgsticker': '.tgs',
};

type FileAttachment = Extract<
  MessageAttachment,
  { kind: 'document' | 'animated-image' }
>;

/**
 * Определяет тип медиа в сообщении и имя файла для сохранения.
 * Не выполняет I/O: одинаковое сообщение всегда дает одинаковый результат.
 */
export class MediaClassifier {
  constructor(private readonly options: ClassifierOptions) {}

  classify<TSource>(message: ChatMessage<TSource>): ClassificationResult<TSource> {
    const { mediaType } = this.options;

    if (mediaType === 'links') {
      return this.classifyLinks(message);
    }

    const media = message.media;
    if (!media) {
      return mediaType === 'all'
        ? this.classifyLinks(message)
        : { kind: 'none', reason: 'no-media' };
    }

    switch (media.kind) {
      case 'photo':
        if (!this.inScope('photos')) return { kind: 'none', reason: 'out-of-scope' };
        return {
          kind: 'photo',
          source: message.source,
          fileName: this.synthesizeName(message.id, PHOTO_EXTENSION),
          extension: PHOTO_EXTENSION,
        };

      case 'document': {
        if (!this.inScope('documents')) return { kind: 'none', reason: 'out-of-scope' };
        const extension = resolveExtension(media);
        if (!extension) return { kind: 'none', reason: 'unrecognized-format' };

        const originalName = sanitizePathSegment(media.fileName);
        return {
          kind: 'document',
          source: message.source,
          fileName: originalName || this.synthesizeName(message.id, extension),
          extension,
          ...(originalName ? { originalName } : {}),
        };
      }

      case 'animated-image': {
        if (!this.inScope('gifs')) return { kind: 'none', reason: 'out-of-scope' };
        const extension = resolveExtension(media);
        if (!extension) return { kind: 'none', reason: 'unrecognized-format' };

        return {
          kind: 'animated-image',
          source: message.source,
          fileName: this.synthesizeName(message.id, extension),
          extension,
        };
      }

      case 'unknown':
        return { kind: 'none', reason: 'unrecognized-format' };

      default: {
        const unreachable: never = media;
        throw new Error(`Unhandled attachment: ${JSON.stringify(unreachable)}`);
      }
    }
  }

  /**
   * Имя вида `{entityId}_{messageId}{ext}`
   */
  synthesizeName(messageId: number, extension: string): string {
    return `${this.options.entityId}_${messageId}${extension}`;
  }

  private inScope(mediaType: MediaType): boolean {
    return this.options.mediaType === 'all' || this.options.mediaType === mediaType;
  }

  private classifyLinks<TSource>(
    message: ChatMessage<TSource>,
  ): ClassificationResult<TSource> {
    const urls: string[] = [];

    const previewUrl = message.webPreview?.url;
    if (previewUrl && isWellFormedUrl(previewUrl)) {
      urls.push(previewUrl);
    }
    urls.push(...extractUrls(message.text));

    if (urls.length > 0) {
      return { kind: 'links', urls };
    }

    return {
      kind: 'none',
      reason: message.webPreview ? 'malformed-link-text' : 'no-media',
    };
  }
}

/**
 * Расширение по MIME-типу, затем по имени файла, иначе `.bin`.
 * Объявленный, но некорректный MIME-тип считается нераспознанным форматом.
 */
export function resolveExtension(attachment: FileAttachment): string | null {
  const mimeType = attachment.mimeType?.trim().toLowerCase();

  if (mimeType) {
    if (!mimePattern.test(mimeType)) return null;

    const known = mimeExtensions[mimeType];
    if (known) return known;
  }

  const fromName = path.extname(attachment.fileName?.trim() || '').toLowerCase();
  if (fromName.length > 1) return fromName;

  return DEFAULT_EXTENSION;
}

import fs from 'fs/promises';
import path from 'path';
import { Logger } from 'winston';
import { createLogger } from '../utils/logger';
import { describeError, SinkWriteError } from '../utils/errors';
import { fileExists, sanitizePathSegment } from '../utils/paths';
import { extractUrls } from '../utils/links';
import {
  ChatMessage,
  ClassificationResult,
  DownloadSink,
  FileClassification,
  FilterConfig,
  HistoryOrder,
  MediaType,
  MessageSource,
} from '../models';
import { filterMessages } from './MessageFilter';
import { MediaClassifier } from './MediaClassifier';

export const LINKS_FILE_NAME = 'extracted_links.txt';

export interface DownloadRequest {
  entityId: string;
  downloadDir: string;
  order: HistoryOrder;
  filter: FilterConfig;
}

export interface DownloadSummary {
  entityId: string;
  entityTitle: string;
  entityDir: string;
  /** Сообщения, прошедшие фильтр */
  inspected: number;
  downloaded: number;
  linksExtracted: number;
  skipped: number;
  failed: number;
  unsupported: number;
}

interface RunState {
  entityDir: string;
  linksPath: string | null;
  written: Set<string>;
  summary: DownloadSummary;
}

/**
 * Каталог загрузок чата: `<downloadDir>/<название>_<id>`
 */
export function entityDirectory(
  downloadDir: string,
  entityId: string,
  title: string,
): string {
  const name = sanitizePathSegment(title.replace(/[\\/]/g, '_')) || 'chat';
  return path.join(downloadDir, `${name}_${entityId}`);
}

export function collectsLinks(mediaType: MediaType): boolean {
  return mediaType === 'all' || mediaType === 'links';
}

/**
 * Последовательно проходит историю чата: фильтр → классификация → проверка
 * существования файла → загрузка. Ошибки пагинации прерывают запуск, ошибки
 * записи отдельного файла только логируются.
 */
export class DownloadService<TSource> {
  private logger: Logger;

  constructor(
    private readonly source: MessageSource<TSource>,
    private readonly sink: DownloadSink<TSource>,
  ) {
    this.logger = createLogger('DownloadService');
  }

  async downloadFromEntity(request: DownloadRequest): Promise<DownloadSummary> {
    const { filter } = request;
    const entity = await this.source.resolveEntity(request.entityId);
    const entityDir = entityDirectory(
      request.downloadDir,
      entity.id,
      entity.title,
    );

    await fs.mkdir(entityDir, { recursive: true });

    this.logger.info(`Загрузка ${filter.mediaType} из ${entity.title}`);
    this.logger.info(`Сохранение в: ${entityDir}`);

    const linksPath = collectsLinks(filter.mediaType)
      ? path.join(entityDir, LINKS_FILE_NAME)
      : null;
    if (linksPath) {
      await fs.writeFile(linksPath, '', 'utf-8');
    }

    const state: RunState = {
      entityDir,
      linksPath,
      written: new Set(),
      summary: {
        entityId: entity.id,
        entityTitle: entity.title,
        entityDir,
        inspected: 0,
        downloaded: 0,
        linksExtracted: 0,
        skipped: 0,
        failed: 0,
        unsupported: 0,
      },
    };

    const classifier = new MediaClassifier({
      entityId: entity.id,
      mediaType: filter.mediaType,
    });
    const history = this.source.paginate(entity.id, {
      order: request.order,
      since: filter.minTimestamp,
    });

    for await (const message of filterMessages(history, filter)) {
      state.summary.inspected++;
      await this.handle(classifier.classify(message), message, state);
    }

    this.logSummary(state.summary);
    return state.summary;
  }

  private async handle(
    result: ClassificationResult<TSource>,
    message: ChatMessage<TSource>,
    state: RunState,
  ): Promise<void> {
    switch (result.kind) {
      case 'photo':
      case 'document':
      case 'animated-image': {
        await this.saveFile(result, state);
        // Ссылки из подписи к медиа
        const captionUrls = extractUrls(message.text);
        if (captionUrls.length > 0) {
          await this.appendLinks(captionUrls, message.id, state);
        }
        return;
      }

      case 'links':
        await this.appendLinks(result.urls, message.id, state);
        return;

      case 'none':
        if (
          result.reason === 'unrecognized-format' ||
          result.reason === 'malformed-link-text'
        ) {
          state.summary.unsupported++;
        }
        this.logger.debug('Сообщение пропущено', {
          messageId: message.id,
          reason: result.reason,
        });
        return;

      default: {
        const unreachable: never = result;
        throw new Error(`Unhandled classification: ${JSON.stringify(unreachable)}`);
      }
    }
  }

  private async saveFile(
    result: FileClassification<TSource>,
    state: RunState,
  ): Promise<void> {
    const targetPath = path.join(state.entityDir, result.fileName);

    if (state.written.has(targetPath) || (await fileExists(targetPath))) {
      this.logger.info(`Пропуск существующего файла: ${result.fileName}`);
      state.summary.skipped++;
      return;
    }

    try {
      await this.sink.save(targetPath, result.source);
      state.written.add(targetPath);
      state.summary.downloaded++;
      this.logger.info(`Загружено: ${result.fileName}`, { kind: result.kind });
    } catch (error) {
      const failure =
        error instanceof SinkWriteError
          ? error
          : new SinkWriteError(targetPath, error);
      state.summary.failed++;
      this.logger.error(failure.message, { code: failure.code });
    }
  }

  private async appendLinks(
    urls: string[],
    messageId: number,
    state: RunState,
  ): Promise<void> {
    if (!state.linksPath) return;

    try {
      await fs.appendFile(
        state.linksPath,
        urls.map((url) => `${url}\n`).join(''),
        'utf-8',
      );
      state.summary.linksExtracted += urls.length;
    } catch (error) {
      state.summary.failed++;
      this.logger.error(
        `Ошибка записи ссылок из сообщения ${messageId}: ${describeError(error)}`,
      );
    }
  }

  private logSummary(summary: DownloadSummary): void {
    if (summary.inspected === 0) {
      this.logger.info('Подходящих сообщений не найдено');
      return;
    }

    this.logger.info(
      `Загружено/извлечено ${summary.downloaded + summary.linksExtracted} элементов из ${summary.entityTitle}`,
      {
        inspected: summary.inspected,
        downloaded: summary.downloaded,
        links: summary.linksExtracted,
      },
    );
    if (summary.skipped > 0) {
      this.logger.info(`Пропущено ${summary.skipped} уже существующих файлов`);
    }
    if (summary.failed > 0) {
      this.logger.warn(`Не удалось сохранить ${summary.failed} элементов`);
    }
  }
}

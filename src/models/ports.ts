import { ChatMessage } from './Message';
import { HistoryOrder } from './Filter';

export interface ChatEntity {
  id: string;
  title: string;
  type: 'group' | 'channel' | 'private';
  username?: string;
}

export interface PaginateOptions {
  order: HistoryOrder;
  /** Lower bound hint; implementations may start pagination there */
  since?: Date;
}

/**
 * Authenticated access to an entity's message history
 */
export interface MessageSource<TSource> {
  resolveEntity(entityId: string): Promise<Pick<ChatEntity, 'id' | 'title'>>;
  paginate(
    entityId: string,
    options: PaginateOptions,
  ): AsyncIterable<ChatMessage<TSource>>;
}

/**
 * Writes the media behind `source` to `targetPath` and resolves to the written path.
 * Callers only invoke it when `targetPath` does not exist yet.
 */
export interface DownloadSink<TSource> {
  save(targetPath: string, source: TSource): Promise<string>;
}

/// <reference path="../types/input.d.ts" />
import { Api, TelegramClient } from 'telegram';
import { StringSession } from 'telegram/sessions';
import { LogLevel } from 'telegram/extensions/Logger';
import bigInt from 'big-integer';
import input from 'input';
import { Logger } from 'winston';
import { createLogger } from '../utils/logger';
import { PartialFiles } from '../utils/paths';
import {
  describeError,
  SinkWriteError,
  TransientFetchError,
} from '../utils/errors';
import { SessionManager, DEVICE_MODEL } from './SessionManager';
import { toChatMessage } from './messageMapper';
import {
  ChatEntity,
  ChatMessage,
  DownloadSink,
  MessageSource,
  PaginateOptions,
} from '../models';

export interface UserbotConfig {
  apiId: number;
  apiHash: string;
  phoneNumber: string;
  sessionName: string;
  sessionPath?: string;
}

const CLIENT_PARAMS = {
  connectionRetries: 5,
  floodSleepThreshold: 300,
  deviceModel: DEVICE_MODEL,
  systemVersion: '1.0.0',
  appVersion: '1.0.0',
};

/**
 * Числовой ID, отрицательный для групп и каналов (-1001234567890)
 */
export function parseEntityId(entityId: string): bigInt.BigInteger {
  return bigInt(entityId);
}

/**
 * История `newest-first` идет по убыванию даты: первое сообщение старше
 * `since` завершает обход
 */
export async function* withinDateBound<TSource>(
  messages: AsyncIterable<ChatMessage<TSource>>,
  options: PaginateOptions,
): AsyncGenerator<ChatMessage<TSource>, void, undefined> {
  const { since } = options;

  for await (const message of messages) {
    if (options.order === 'newest-first' && since && message.date < since) {
      return;
    }
    yield message;
  }
}

async function* mapHistory(
  messages: AsyncIterable<Api.Message>,
): AsyncGenerator<ChatMessage<Api.Message>, void, undefined> {
  for await (const message of messages) {
    yield toChatMessage(message);
  }
}

export function entityTitle(entity: unknown, fallback: string): string {
  if (entity instanceof Api.User) {
    const fullName = [entity.firstName, entity.lastName]
      .filter(Boolean)
      .join(' ');
    return fullName || entity.username || fallback;
  }
  if (
    entity instanceof Api.Chat ||
    entity instanceof Api.Channel ||
    entity instanceof Api.ChatForbidden ||
    entity instanceof Api.ChannelForbidden
  ) {
    return entity.title || fallback;
  }
  return fallback;
}

/**
 * Аутентифицированный клиент Telegram: источник истории сообщений и
 * приемник загрузок для DownloadService
 */
export class TelegramUserbot
  implements MessageSource<Api.Message>, DownloadSink<Api.Message>
{
  private client: TelegramClient | null = null;
  private logger: Logger;
  private config: UserbotConfig;
  private sessionManager: SessionManager;
  private inputPeers = new Map<string, Api.TypeInputPeer>();
  private partialFiles = new PartialFiles();

  constructor(config: UserbotConfig) {
    this.config = config;
    this.logger = createLogger('TelegramUserbot');
    this.sessionManager = new SessionManager(
      config.sessionPath || './sessions',
    );
  }

  /**
   * Загружает сохраненную сессию из SessionManager
   */
  private async loadSession(): Promise<StringSession> {
    const session = await this.sessionManager.loadSession(
      this.config.sessionName,
    );
    if (session) {
      return session;
    }

    this.logger.info(
      'Сохраненная сессия не найдена, требуется новая аутентификация',
    );
    return new StringSession('');
  }

  /**
   * Подключается к Telegram API, при необходимости запрашивая код и пароль 2FA
   */
  async connect(): Promise<void> {
    try {
      this.logger.info('Подключение к Telegram API...');

      const session = await this.loadSession();
      const client = new TelegramClient(
        session,
        this.config.apiId,
        this.config.apiHash,
        CLIENT_PARAMS,
      );
      client.setLogLevel(LogLevel.ERROR);

      await client.start({
        phoneNumber: this.config.phoneNumber,
        phoneCode: async () =>
          input.text(
            `Код подтверждения отправлен на ${this.config.phoneNumber}. Введите код: `,
          ),
        password: async () =>
          input.password('Введите пароль двухэтапной аутентификации: '),
        onError: (err) => {
          this.logger.error('Ошибка аутентификации:', err);
        },
      });

      this.client = client;

      const me = await client.getMe();
      if (!(me instanceof Api.User)) {
        await this.sessionManager.saveSession(this.config.sessionName, session);
        return;
      }

      this.logger.info(
        `Авторизован как: ${me.firstName || ''} ${me.lastName || ''} (@${me.username || 'no_username'})`,
      );

      await this.sessionManager.saveSession(this.config.sessionName, session, {
        phoneNumber: this.config.phoneNumber,
        userId: me.id.toString(),
        username: me.username,
        firstName: me.firstName,
        lastName: me.lastName,
      });
    } catch (error) {
      this.logger.error('Ошибка подключения к Telegram API:', error);
      this.client = null;
      throw error;
    }
  }

  /**
   * Отключается от Telegram API
   */
  async disconnect(): Promise<void> {
    if (!this.client) return;

    try {
      await this.client.disconnect();
      this.logger.info('Отключен от Telegram API');
    } catch (error) {
      this.logger.error('Ошибка отключения:', error);
      throw error;
    } finally {
      this.client = null;
    }
  }

  /**
   * Прерывает запуск: отключается и удаляет незавершенные `.part` файлы
   */
  async abort(): Promise<void> {
    try {
      await this.disconnect();
    } finally {
      await this.partialFiles.discardAll();
    }
  }

  private getClient(): TelegramClient {
    if (!this.client) {
      throw new Error('Клиент не подключен. Вызовите connect() сначала.');
    }
    return this.client;
  }

  /**
   * Получает список групп, каналов и личных чатов пользователя
   */
  async listEntities(): Promise<ChatEntity[]> {
    const client = this.getClient();

    try {
      const dialogs = await client.getDialogs({});
      const entities: ChatEntity[] = [];

      for (const dialog of dialogs) {
        const entity = dialog.entity;
        const username =
          entity instanceof Api.Channel || entity instanceof Api.User
            ? entity.username
            : undefined;

        entities.push({
          id: dialog.id ? dialog.id.toString() : '',
          title: dialog.name || 'Без названия',
          type: dialog.isGroup
            ? 'group'
            : dialog.isChannel
              ? 'channel'
              : 'private',
          username,
        });
      }

      this.logger.info(`Найдено ${entities.length} диалогов`);
      return entities;
    } catch (error) {
      this.logger.error('Ошибка получения диалогов:', error);
      throw new TransientFetchError(
        `Не удалось получить список диалогов: ${describeError(error)}`,
        '',
        error,
      );
    }
  }

  /**
   * Находит чат и кэширует его input peer для последующей пагинации.
   * StringSession не хранит кэш сущностей, поэтому при промахе сначала
   * загружаются диалоги.
   */
  async resolveEntity(
    entityId: string,
  ): Promise<Pick<ChatEntity, 'id' | 'title'>> {
    const client = this.getClient();

    try {
      const entity = await this.lookupEntity(client, entityId);
      this.inputPeers.set(entityId, await client.getInputEntity(entity));
      return { id: entityId, title: entityTitle(entity, entityId) };
    } catch (error) {
      throw new TransientFetchError(
        `Не удалось найти чат ${entityId}: ${describeError(error)}`,
        entityId,
        error,
      );
    }
  }

  private async lookupEntity(client: TelegramClient, entityId: string) {
    const peer = parseEntityId(entityId);
    try {
      return await client.getEntity(peer);
    } catch (error) {
      this.logger.debug('Чат не найден в кэше, загружаем диалоги', {
        entityId,
        reason: describeError(error),
      });
      await client.getDialogs({});
      return await client.getEntity(peer);
    }
  }

  /**
   * Постранично читает историю. `oldest-first` начинает с `since` на стороне
   * сервера, `newest-first` идет от последнего сообщения до `since`.
   */
  async *paginate(
    entityId: string,
    options: PaginateOptions,
  ): AsyncGenerator<ChatMessage<Api.Message>, void, undefined> {
    const client = this.getClient();
    const reverse = options.order === 'oldest-first';
    const offsetDate =
      reverse && options.since
        ? Math.floor(options.since.getTime() / 1000)
        : undefined;

    try {
      const peer = this.inputPeers.get(entityId) ?? parseEntityId(entityId);
      const messages = client.iterMessages(peer, {
        reverse,
        ...(offsetDate !== undefined ? { offsetDate } : {}),
      });

      yield* withinDateBound(mapHistory(messages), options);
    } catch (error) {
      throw new TransientFetchError(
        `Ошибка получения истории ${entityId}: ${describeError(error)}`,
        entityId,
        error,
      );
    }
  }

  /**
   * Скачивает медиа во временный `.part` файл и переименовывает его после
   * успешной загрузки: `targetPath` появляется только целиком
   */
  async save(targetPath: string, source: Api.Message): Promise<string> {
    const client = this.getClient();
    const partialPath = this.partialFiles.track(targetPath);

    try {
      const result = await client.downloadMedia(source, {
        outputFile: partialPath,
      });
      if (result === undefined) {
        throw new Error('клиент не вернул данных');
      }

      await this.partialFiles.commit(partialPath, targetPath);
      return targetPath;
    } catch (error) {
      await this.partialFiles.discard(partialPath);
      throw new SinkWriteError(targetPath, error);
    }
  }
}

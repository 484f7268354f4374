import { StringSession } from 'telegram/sessions';
import { createLogger } from '../utils/logger';
import { ValidationError } from '../utils/errors';
import { fileExists, sanitizePathSegment } from '../utils/paths';
import { Logger } from 'winston';
import { z } from 'zod';
import fs from 'fs/promises';
import path from 'path';

export interface SessionUserInfo {
  phoneNumber: string;
  userId?: string;
  username?: string;
  firstName?: string;
  lastName?: string;
}

export interface SessionInfo extends SessionUserInfo {
  sessionName: string;
  createdAt: Date;
  lastUsed: Date;
  isActive: boolean;
}

const sessionMetadataSchema = z.object({
  sessionName: z.string(),
  phoneNumber: z.string(),
  userId: z.string().optional(),
  username: z.string().optional(),
  firstName: z.string().optional(),
  lastName: z.string().optional(),
  createdAt: z.string(),
  lastUsed: z.string(),
  isActive: z.boolean(),
  deviceModel: z.string(),
});

const metadataFileSchema = z.record(sessionMetadataSchema);

export type SessionMetadata = z.infer<typeof sessionMetadataSchema>;
type MetadataFile = z.infer<typeof metadataFileSchema>;

export const DEVICE_MODEL = 'Telegram Media Downloader';

export class SessionManager {
  private logger: Logger;
  private sessionsPath: string;
  private metadataPath: string;

  constructor(sessionsPath: string = './sessions') {
    this.logger = createLogger('SessionManager');
    this.sessionsPath = path.resolve(sessionsPath);
    this.metadataPath = path.join(this.sessionsPath, 'metadata.json');
  }

  /**
   * Инициализирует директорию для сессий
   */
  async initialize(): Promise<void> {
    try {
      await fs.mkdir(this.sessionsPath, { recursive: true });
      this.logger.debug(
        `Директория сессий инициализирована: ${this.sessionsPath}`,
      );
    } catch (error) {
      this.logger.error('Ошибка создания директории сессий:', error);
      throw error;
    }
  }

  /**
   * Загружает сессию по имени, `null` если файла нет
   */
  async loadSession(sessionName: string): Promise<StringSession | null> {
    const sessionPath = this.getSessionPath(sessionName);
    if (!(await fileExists(sessionPath))) {
      this.logger.info(`Сессия не найдена: ${sessionName}`);
      return null;
    }

    const sessionData = await fs.readFile(sessionPath, 'utf-8');
    await this.updateLastUsed(sessionName);

    this.logger.info(`Сессия загружена: ${sessionName}`);
    return new StringSession(sessionData.trim());
  }

  /**
   * Сохраняет сессию
   */
  async saveSession(
    sessionName: string,
    session: StringSession,
    userInfo?: SessionUserInfo,
  ): Promise<void> {
    try {
      await this.initialize();

      const sessionPath = this.getSessionPath(sessionName);
      await fs.writeFile(sessionPath, session.save(), {
        encoding: 'utf-8',
        mode: 0o600,
      });

      if (userInfo) {
        await this.updateMetadata(sessionName, userInfo);
      }

      this.logger.info(`Сессия сохранена: ${sessionName}`);
    } catch (error) {
      this.logger.error(`Ошибка сохранения сессии ${sessionName}:`, error);
      throw error;
    }
  }

  /**
   * Удаляет сессию
   */
  async deleteSession(sessionName: string): Promise<void> {
    try {
      await fs.rm(this.getSessionPath(sessionName), { force: true });
      await this.removeFromMetadata(sessionName);

      this.logger.info(`Сессия удалена: ${sessionName}`);
    } catch (error) {
      this.logger.error(`Ошибка удаления сессии ${sessionName}:`, error);
      throw error;
    }
  }

  /**
   * Получает список всех сессий, последние использованные первыми
   */
  async listSessions(): Promise<SessionInfo[]> {
    const metadata = await this.loadMetadata();
    const sessions: SessionInfo[] = [];

    for (const [sessionName, meta] of Object.entries(metadata)) {
      const exists = await fileExists(this.getSessionPath(sessionName));

      sessions.push({
        sessionName,
        phoneNumber: meta.phoneNumber,
        userId: meta.userId,
        username: meta.username,
        firstName: meta.firstName,
        lastName: meta.lastName,
        createdAt: new Date(meta.createdAt),
        lastUsed: new Date(meta.lastUsed),
        isActive: exists && meta.isActive,
      });
    }

    return sessions.sort(
      (a, b) => b.lastUsed.getTime() - a.lastUsed.getTime(),
    );
  }

  async sessionExists(sessionName: string): Promise<boolean> {
    return await fileExists(this.getSessionPath(sessionName));
  }

  /**
   * Удаляет сессии (файл и метаданные), которые не использовались дольше
   * `daysOld` дней
   */
  async cleanupOldSessions(
    daysOld: number = 30,
    now: Date = new Date(),
  ): Promise<number> {
    const sessions = await this.listSessions();
    const cutoffDate = new Date(now.getTime() - daysOld * 24 * 60 * 60 * 1000);
    let deletedCount = 0;

    for (const session of sessions) {
      if (session.lastUsed < cutoffDate) {
        await this.deleteSession(session.sessionName);
        deletedCount++;
      }
    }

    this.logger.info(
      `Очищено ${deletedCount} старых сессий (старше ${daysOld} дней)`,
    );
    return deletedCount;
  }

  /**
   * Имя сессии должно быть одним сегментом пути внутри `sessionsPath`
   */
  private getSessionPath(sessionName: string): string {
    if (sanitizePathSegment(sessionName) !== sessionName) {
      throw new ValidationError(`Некорректное имя сессии: ${sessionName}`);
    }
    return path.join(this.sessionsPath, `${sessionName}.session`);
  }

  private async loadMetadata(): Promise<MetadataFile> {
    if (!(await fileExists(this.metadataPath))) return {};

    const data = await fs.readFile(this.metadataPath, 'utf-8');
    try {
      const parsed = metadataFileSchema.safeParse(JSON.parse(data));
      if (parsed.success) return parsed.data;
    } catch (error) {
      this.logger.debug('metadata.json не является JSON', { error });
    }

    this.logger.warn(
      'Ошибка загрузки метаданных сессий, создается новый файл',
    );
    return {};
  }

  private async saveMetadata(metadata: MetadataFile): Promise<void> {
    await this.initialize();
    await fs.writeFile(
      this.metadataPath,
      JSON.stringify(metadata, null, 2),
      'utf-8',
    );
  }

  private async updateMetadata(
    sessionName: string,
    userInfo: SessionUserInfo,
  ): Promise<void> {
    const metadata = await this.loadMetadata();
    const now = new Date().toISOString();

    metadata[sessionName] = {
      sessionName,
      phoneNumber: userInfo.phoneNumber,
      userId: userInfo.userId,
      username: userInfo.username,
      firstName: userInfo.firstName,
      lastName: userInfo.lastName,
      createdAt: metadata[sessionName]?.createdAt || now,
      lastUsed: now,
      isActive: true,
      deviceModel: DEVICE_MODEL,
    };

    await this.saveMetadata(metadata);
  }

  private async updateLastUsed(sessionName: string): Promise<void> {
    const metadata = await this.loadMetadata();
    const entry = metadata[sessionName];
    if (entry) {
      entry.lastUsed = new Date().toISOString();
      await this.saveMetadata(metadata);
    }
  }

  private async removeFromMetadata(sessionName: string): Promise<void> {
    const metadata = await this.loadMetadata();
    if (!(sessionName in metadata)) return;

    delete metadata[sessionName];
    await this.saveMetadata(metadata);
  }
}

#!/usr/bin/env node

/**
 * Telegram Media Downloader
 *
 * Массовая загрузка файлов, фото, ссылок и GIF из групп и каналов Telegram,
 * в которых состоит пользователь.
 */

import { Command, Option } from 'commander';
import appConfig from './config';
import { createLogger } from './utils/logger';
import { describeError, reportFatalError } from './utils/errors';
import {
  DEFAULT_LIMIT,
  buildFilterConfig,
  parseDownloadOptions,
} from './utils/validation';
import {
  TelegramUserbot,
  createUserbotConfig,
  registerSessionCommands,
} from './userbot';
import { DownloadService } from './services/DownloadService';
import {
  ChatEntity,
  HISTORY_ORDERS,
  LIMIT_SCOPES,
  MEDIA_TYPES,
} from './models';

export const VERSION = '1.0.0';

const logger = createLogger('CLI');

let activeUserbot: TelegramUserbot | null = null;

/**
 * Подключается, выполняет действие и всегда отключается
 */
async function withUserbot<T>(
  action: (userbot: TelegramUserbot) => Promise<T>,
): Promise<T> {
  const userbot = new TelegramUserbot(createUserbotConfig());
  activeUserbot = userbot;

  try {
    await userbot.connect();
    return await action(userbot);
  } finally {
    activeUserbot = null;
    await userbot.disconnect();
  }
}

/**
 * Прерывает текущий запуск (SIGINT): отключает клиент и удаляет `.part` файлы
 */
export async function cancelActiveRun(): Promise<void> {
  const userbot = activeUserbot;
  activeUserbot = null;

  if (userbot) {
    await userbot.abort();
  }
}

export function formatEntityTable(entities: ChatEntity[]): string[] {
  const separator = '-'.repeat(60);
  const lines = [
    'Доступные группы и каналы Telegram:',
    separator,
    `${'#'.padEnd(6)} ${'ID'.padEnd(16)} ${'Тип'.padEnd(10)} Название`,
    separator,
  ];

  entities.forEach((entity, index) => {
    lines.push(
      `${String(index + 1).padEnd(6)} ${entity.id.padEnd(16)} ${entity.type.padEnd(10)} ${entity.title}`,
    );
  });

  return lines;
}

async function listEntities(): Promise<void> {
  const entities = await withUserbot((userbot) => userbot.listEntities());
  console.log('');
  formatEntityTable(entities).forEach((line) => console.log(line));
}

async function downloadMedia(rawOptions: Record<string, unknown>): Promise<void> {
  const options = parseDownloadOptions(rawOptions);
  const filter = buildFilterConfig(options);

  const summary = await withUserbot((userbot) =>
    new DownloadService(userbot, userbot).downloadFromEntity({
      entityId: options.entityId,
      downloadDir: options.downloadDir,
      order: options.order,
      filter,
    }),
  );

  console.log('');
  console.log(
    `Загружено/извлечено ${summary.downloaded + summary.linksExtracted} элементов из ${summary.entityTitle}.`,
  );
  if (summary.skipped > 0) {
    console.log(`Пропущено ${summary.skipped} уже существующих файлов.`);
  }
  if (summary.failed > 0) {
    console.log(`Не удалось сохранить ${summary.failed} элементов.`);
  }
  if (summary.unsupported > 0) {
    console.log(`Неподдерживаемый формат: ${summary.unsupported} сообщений.`);
  }
}

export function createProgram(): Command {
  const program = new Command()
    .name('telegram-media-downloader')
    .description(
      'Массовая загрузка фото, документов, ссылок и GIF из групп и каналов Telegram',
    )
    .version(VERSION, '-V, --version', 'Показать версию');

  program
    .command('list')
    .description('Показать доступные группы и каналы')
    .action(listEntities);

  program
    .command('download')
    .description('Загрузить медиа из группы или канала')
    .requiredOption('--entity-id <id>', 'ID группы/канала (см. команду list)')
    .addOption(
      new Option('--media-type <type>', 'Тип загружаемых медиа')
        .choices(MEDIA_TYPES)
        .default('all'),
    )
    .option(
      '--limit <n>',
      'Максимум подходящих сообщений (0 = без ограничения)',
      String(DEFAULT_LIMIT),
    )
    .addOption(
      new Option(
        '--limit-scope <scope>',
        'К чему применяется лимит: подходящие или просмотренные сообщения',
      )
        .choices(LIMIT_SCOPES)
        .default('qualifying'),
    )
    .option('--days <n>', 'Только медиа за последние N дней')
    .option('--contains <text>', 'Только сообщения, содержащие текст')
    .option(
      '--download-dir <dir>',
      'Каталог для загрузок',
      appConfig.downloadDir,
    )
    .addOption(
      new Option('--order <order>', 'Порядок обхода истории')
        .choices(HISTORY_ORDERS)
        .default('newest-first'),
    )
    .action(downloadMedia);

  registerSessionCommands(program);

  return program;
}

export async function main(argv: string[] = process.argv): Promise<number> {
  try {
    await createProgram().parseAsync(argv);
    return typeof process.exitCode === 'number' ? process.exitCode : 0;
  } catch (error) {
    return reportFatalError(error, logger);
  }
}

// Запускаем только если скрипт вызван напрямую
if (require.main === module) {
  process.on('SIGINT', () => {
    logger.warn('Операция отменена пользователем');
    cancelActiveRun()
      .catch((error: unknown) => {
        logger.error(`Ошибка при отмене: ${describeError(error)}`);
      })
      .finally(() => process.exit(130));
  });

  main()
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      process.exitCode = reportFatalError(error, logger);
    });
}

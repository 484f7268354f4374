/**
 * Команды управления сохраненными сессиями Telegram
 */

import { Command } from 'commander';
import { SessionManager } from './SessionManager';
import { DEFAULT_SESSION_PATH } from './config';
import { createLogger } from '../utils/logger';

const logger = createLogger('SessionCLI');

function createSessionManager(): SessionManager {
  return new SessionManager(process.env.SESSION_PATH || DEFAULT_SESSION_PATH);
}

async function listSessions(): Promise<void> {
  const sessions = await createSessionManager().listSessions();

  if (sessions.length === 0) {
    console.log('🔍 Сессии не найдены');
    return;
  }

  console.log(`📋 Найдено ${sessions.length} сессий:`);
  console.log('');

  sessions.forEach((session, index) => {
    console.log(`${index + 1}. ${session.sessionName}`);
    console.log(`   📱 Телефон: ${session.phoneNumber}`);
    if (session.username) console.log(`   👤 Username: @${session.username}`);
    if (session.firstName)
      console.log(`   👤 Имя: ${session.firstName} ${session.lastName || ''}`);
    console.log(`   📅 Создана: ${session.createdAt.toLocaleString('ru-RU')}`);
    console.log(
      `   🕒 Использована: ${session.lastUsed.toLocaleString('ru-RU')}`,
    );
    console.log(`   ✅ Активна: ${session.isActive ? 'Да' : 'Нет'}`);
    console.log('');
  });
}

async function deleteSession(sessionName: string): Promise<void> {
  const sessionManager = createSessionManager();

  if (!(await sessionManager.sessionExists(sessionName))) {
    console.log(`❌ Сессия "${sessionName}" не найдена`);
    return;
  }

  await sessionManager.deleteSession(sessionName);
  console.log(`✅ Сессия "${sessionName}" успешно удалена`);
}

async function cleanupSessions(days: number): Promise<void> {
  const deleted = await createSessionManager().cleanupOldSessions(days);

  if (deleted === 0) {
    console.log(`🧹 Старые сессии (старше ${days} дней) не найдены`);
  } else {
    console.log(`🧹 Удалено ${deleted} старых сессий (старше ${days} дней)`);
  }
}

export function registerSessionCommands(program: Command): void {
  const sessions = program
    .command('sessions')
    .description('Управление сохраненными сессиями');

  sessions
    .command('list')
    .alias('ls')
    .description('Показать все сессии')
    .action(listSessions);

  sessions
    .command('delete <sessionName>')
    .alias('rm')
    .description('Удалить сессию')
    .action(deleteSession);

  sessions
    .command('cleanup [days]')
    .alias('clean')
    .description('Удалить неактивные сессии старше N дней (по умолчанию 30)')
    .action(async (days?: string) => {
      const parsed = days ? parseInt(days, 10) : 30;
      if (Number.isNaN(parsed) || parsed < 0) {
        logger.error(`Некорректное количество дней: ${days}`);
        process.exitCode = 1;
        return;
      }
      await cleanupSessions(parsed);
    });
}

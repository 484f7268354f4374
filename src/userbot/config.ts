import { z } from 'zod';
import { ConfigurationError } from '../utils/errors';
import type { UserbotConfig } from './TelegramUserbot';

export const REQUIRED_VARIABLES = [
  'TELEGRAM_API_ID',
  'TELEGRAM_API_HASH',
  'TELEGRAM_PHONE_NUMBER',
] as const;

export const DEFAULT_SESSION_NAME = 'telegram_downloader_session';
export const DEFAULT_SESSION_PATH = './sessions';

const envSchema = z.object({
  TELEGRAM_API_ID: z.coerce
    .number()
    .int()
    .positive({ message: 'TELEGRAM_API_ID должен быть положительным числом' }),
  TELEGRAM_API_HASH: z.string().min(1),
  TELEGRAM_PHONE_NUMBER: z.string().regex(/^\+\d{10,15}$/, {
    message:
      'TELEGRAM_PHONE_NUMBER должен быть в международном формате (например, +1234567890)',
  }),
  SESSION_NAME: z.string().min(1).default(DEFAULT_SESSION_NAME),
  SESSION_PATH: z.string().min(1).default(DEFAULT_SESSION_PATH),
});

/**
 * Проверяет наличие всех необходимых переменных окружения
 */
export function validateEnvironmentVariables(
  env: NodeJS.ProcessEnv = process.env,
): {
  valid: boolean;
  missing: string[];
} {
  const missing = REQUIRED_VARIABLES.filter((key) => !env[key]);

  return {
    valid: missing.length === 0,
    missing,
  };
}

/**
 * Создает конфигурацию userbot'а из переменных окружения
 */
export function createUserbotConfig(
  env: NodeJS.ProcessEnv = process.env,
): UserbotConfig {
  const { valid, missing } = validateEnvironmentVariables(env);
  if (!valid) {
    throw new ConfigurationError(
      `Отсутствуют обязательные переменные окружения: ${missing.join(', ')}`,
      missing,
    );
  }

  const result = envSchema.safeParse({
    TELEGRAM_API_ID: env.TELEGRAM_API_ID,
    TELEGRAM_API_HASH: env.TELEGRAM_API_HASH,
    TELEGRAM_PHONE_NUMBER: env.TELEGRAM_PHONE_NUMBER,
    SESSION_NAME: env.SESSION_NAME || undefined,
    SESSION_PATH: env.SESSION_PATH || undefined,
  });

  if (!result.success) {
    const messages = result.error.errors.map((err) => err.message);
    throw new ConfigurationError(
      `Некорректная конфигурация: ${messages.join('; ')}`,
    );
  }

  return {
    apiId: result.data.TELEGRAM_API_ID,
    apiHash: result.data.TELEGRAM_API_HASH,
    phoneNumber: result.data.TELEGRAM_PHONE_NUMBER,
    sessionName: result.data.SESSION_NAME,
    sessionPath: result.data.SESSION_PATH,
  };
}

import winston from 'winston';
import path from 'path';
import config from '../config';

// stdout занят таблицами и итогами команд, журнал целиком уходит в stderr
const ALL_LEVELS = Object.keys(winston.config.npm.levels);

/**
 * `12:00:00 info [DownloadService] Загружено: a.jpg {"kind":"photo"}`
 */
export function formatConsoleLine(
  info: winston.Logform.TransformableInfo,
): string {
  const { timestamp, level, message, service, ...meta } = info;
  const label = typeof service === 'string' ? ` [${service}]` : '';
  const details =
    Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';

  return `${String(timestamp)} ${level}${label} ${String(message)}${details}`;
}

const consoleFormat = winston.format.combine(
  winston.format.errors({ stack: true }),
  winston.format.timestamp({ format: 'HH:mm:ss' }),
  winston.format.colorize(),
  winston.format.printf(formatConsoleLine),
);

const fileFormat = winston.format.combine(
  winston.format.errors({ stack: true }),
  winston.format.timestamp(),
  winston.format.json(),
);

const rootLogger = winston.createLogger({
  level: config.logLevel,
  silent: config.nodeEnv === 'test',
  transports: [
    new winston.transports.Console({
      format: consoleFormat,
      stderrLevels: ALL_LEVELS,
    }),
    ...(config.logFilePath
      ? [
          new winston.transports.File({
            filename: path.resolve(config.logFilePath),
            format: fileFormat,
            maxsize: 5 * 1024 * 1024,
            maxFiles: 3,
            tailable: true,
          }),
        ]
      : []),
  ],
});

export const createLogger = (service: string): winston.Logger =>
  rootLogger.child({ service });
